export { parseNumericValue, isNumericValue } from "./parseValue";
export { SheetFetchError } from "./errors";
export { buildExportCsvUrl, buildPublishedCsvUrl, buildSheetCsvUrl } from "./sheetUrls";
export { parseSheetCsv } from "./parseSheetCsv";
export {
  DEFAULT_FETCH_TIMEOUT_SECONDS,
  MAX_FETCH_TIMEOUT_SECONDS,
  fetchSheetTable
} from "./fetchSheet";
export { buildColumnStats } from "./columnStats";
export { inferDefaultColumns } from "./inferColumns";
export { findBestMetricColumn } from "./selectMetricColumn";
export { AGGREGATION_REDUCERS, groupAndAggregate, resolveReducer } from "./aggregate";
export type { GroupAndAggregateOptions } from "./aggregate";
export { filterRowsByValue } from "./filterRows";
export { summarizeSheet } from "./summarizeSheet";
export type { SheetRowFilter, SheetSummary, SummarizeSheetOptions } from "./summarizeSheet";
export type {
  AggregateRow,
  AggregationReducer,
  ColumnStats,
  DefaultColumns,
  FetchSheetOptions,
  SheetFetchErrorKind,
  SheetLocator,
  SheetRow,
  SheetTable
} from "./types";
