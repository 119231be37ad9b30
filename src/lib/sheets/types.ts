export type SheetRow = string[];

export type SheetTable = {
  headers: string[];
  rows: SheetRow[];
};

export type SheetLocator = {
  sheetId: string;
  sheetName?: string | null;
  gid?: string | number | null;
};

export type FetchSheetOptions = SheetLocator & {
  timeoutSeconds?: number;
};

export type AggregationReducer = "sum" | "count" | "avg" | "min" | "max";

export type AggregateRow = {
  group: string;
  metric: number;
};

export type ColumnStats = {
  name: string;
  index: number;
  numericRatio: number;
  cardinality: number;
};

export type DefaultColumns = {
  groupBy: string;
  aggregate: string;
};

export type SheetFetchErrorKind = "invalid-arguments" | "transport" | "network";
