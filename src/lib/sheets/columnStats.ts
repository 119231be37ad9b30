import { isNumericValue } from "./parseValue";
import type { ColumnStats, SheetRow, SheetTable } from "./types";

export const SAMPLE_ROW_LIMIT = 1000;
export const NUMERIC_RATIO_THRESHOLD = 0.5;

export const sampleRows = (rows: SheetRow[]): SheetRow[] => rows.slice(0, SAMPLE_ROW_LIMIT);

/** First index wins when a header name repeats. */
export const findColumnIndex = (headers: string[], name: string): number | null => {
  const index = headers.indexOf(name);
  return index === -1 ? null : index;
};

export const numericRatio = (sample: SheetRow[], index: number): number => {
  let total = 0;
  let numeric = 0;
  sample.forEach((row) => {
    if (index >= row.length) {
      return;
    }
    total += 1;
    if (isNumericValue(row[index])) {
      numeric += 1;
    }
  });
  return total === 0 ? 0 : numeric / total;
};

export const cardinality = (sample: SheetRow[], index: number): number => {
  const distinct = new Set<string>();
  sample.forEach((row) => {
    const value = (row[index] ?? "").trim();
    if (value) {
      distinct.add(value);
    }
  });
  return distinct.size;
};

/**
 * Running-maximum scan starting at the 0.5 threshold. Ties replace the current
 * pick, so the last column at the highest ratio wins.
 */
export const mostNumericColumnIndex = (ratios: number[]): number | null => {
  let bestIndex: number | null = null;
  let bestRatio = NUMERIC_RATIO_THRESHOLD;
  ratios.forEach((ratio, index) => {
    if (ratio >= bestRatio) {
      bestRatio = ratio;
      bestIndex = index;
    }
  });
  return bestIndex;
};

export const buildColumnStats = (table: SheetTable): ColumnStats[] => {
  const sample = sampleRows(table.rows);
  return table.headers.map((name, index) => ({
    name,
    index,
    numericRatio: numericRatio(sample, index),
    cardinality: cardinality(sample, index)
  }));
};
