import { groupAndAggregate, resolveReducer } from "./aggregate";
import { buildColumnStats } from "./columnStats";
import { filterRowsByValue } from "./filterRows";
import { inferDefaultColumns } from "./inferColumns";
import { findBestMetricColumn } from "./selectMetricColumn";
import type { AggregateRow, AggregationReducer, ColumnStats, SheetTable } from "./types";

export type SheetRowFilter = {
  column: string;
  value: string;
};

export type SummarizeSheetOptions = {
  groupBy?: string | null;
  aggregate?: string | null;
  reducer?: string | null;
  preferredMetrics?: string[];
  filter?: SheetRowFilter | null;
};

export type SheetSummary = {
  headers: string[];
  rowCount: number;
  columns: ColumnStats[];
  groupBy: string | null;
  aggregate: string | null;
  reducer: AggregationReducer;
  groups: AggregateRow[];
};

export const summarizeSheet = (
  table: SheetTable,
  { groupBy, aggregate, reducer, preferredMetrics = [], filter }: SummarizeSheetOptions = {}
): SheetSummary => {
  const scoped: SheetTable = filter
    ? { headers: table.headers, rows: filterRowsByValue(table, filter.column, filter.value) }
    : table;

  const needsInference = !groupBy || !aggregate;
  const inferred = needsInference ? inferDefaultColumns(scoped) : null;

  const resolvedAggregate =
    aggregate || findBestMetricColumn(scoped, preferredMetrics) || inferred?.aggregate || null;
  const resolvedGroupBy = groupBy || inferred?.groupBy || null;
  const resolvedReducer = resolveReducer(reducer);

  const groups =
    resolvedGroupBy && resolvedAggregate
      ? groupAndAggregate(scoped, {
          groupBy: resolvedGroupBy,
          aggregate: resolvedAggregate,
          reducer: resolvedReducer
        })
      : [];

  return {
    headers: scoped.headers,
    rowCount: scoped.rows.length,
    columns: buildColumnStats(scoped),
    groupBy: resolvedGroupBy,
    aggregate: resolvedAggregate,
    reducer: resolvedReducer,
    groups
  };
};
