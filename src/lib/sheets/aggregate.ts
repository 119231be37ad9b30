import { findColumnIndex } from "./columnStats";
import { parseNumericValue } from "./parseValue";
import type { AggregateRow, AggregationReducer, SheetTable } from "./types";

export const AGGREGATION_REDUCERS: readonly AggregationReducer[] = [
  "sum",
  "count",
  "avg",
  "min",
  "max"
];

const isAggregationReducer = (value: string): value is AggregationReducer =>
  AGGREGATION_REDUCERS.some((reducer) => reducer === value);

/** Unknown tags fall back to sum. */
export const resolveReducer = (tag: string | null | undefined): AggregationReducer =>
  tag && isAggregationReducer(tag) ? tag : "sum";

const sum = (values: number[]): number => values.reduce((total, value) => total + value, 0);

export const reduceValues = (values: number[], reducer: AggregationReducer): number => {
  if (values.length === 0) {
    return 0;
  }
  switch (reducer) {
    case "count":
      return values.length;
    case "avg":
      return sum(values) / values.length;
    case "min":
      return values.reduce((lowest, value) => Math.min(lowest, value));
    case "max":
      return values.reduce((highest, value) => Math.max(highest, value));
    case "sum":
      return sum(values);
  }
};

// Compares by code point, not UTF-16 code unit, so astral characters sort after U+E000..U+FFFF.
export const compareByCodePoint = (left: string, right: string): number => {
  const leftPoints = left[Symbol.iterator]();
  const rightPoints = right[Symbol.iterator]();
  for (;;) {
    const leftNext = leftPoints.next();
    const rightNext = rightPoints.next();
    if (leftNext.done || rightNext.done) {
      if (leftNext.done && rightNext.done) {
        return 0;
      }
      return leftNext.done ? -1 : 1;
    }
    const difference =
      (leftNext.value.codePointAt(0) ?? 0) - (rightNext.value.codePointAt(0) ?? 0);
    if (difference !== 0) {
      return difference;
    }
  }
};

const compareGroupLabels = (a: AggregateRow, b: AggregateRow): number =>
  compareByCodePoint(a.group.toLowerCase(), b.group.toLowerCase());

export type GroupAndAggregateOptions = {
  groupBy: string;
  aggregate: string;
  reducer?: string | null;
};

/**
 * Buckets rows by the exact group-by cell and reduces the aggregate column.
 * Non-numeric aggregate cells count as 0. Output is sorted case-insensitively.
 */
export const groupAndAggregate = (
  table: SheetTable,
  { groupBy, aggregate, reducer }: GroupAndAggregateOptions
): AggregateRow[] => {
  const { headers, rows } = table;
  const groupIndex = findColumnIndex(headers, groupBy);
  const valueIndex = findColumnIndex(headers, aggregate);
  if (groupIndex === null || valueIndex === null) {
    return [];
  }

  const buckets = new Map<string, number[]>();
  rows.forEach((row) => {
    const key = row[groupIndex] ?? "";
    const value = parseNumericValue(row[valueIndex]) ?? 0;
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.push(value);
    } else {
      buckets.set(key, [value]);
    }
  });

  const resolved = resolveReducer(reducer);
  return Array.from(buckets.entries())
    .map(([group, values]) => ({ group, metric: reduceValues(values, resolved) }))
    .sort(compareGroupLabels);
};
