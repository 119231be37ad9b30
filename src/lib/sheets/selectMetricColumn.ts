import {
  NUMERIC_RATIO_THRESHOLD,
  findColumnIndex,
  mostNumericColumnIndex,
  numericRatio,
  sampleRows
} from "./columnStats";
import type { SheetTable } from "./types";

export const findBestMetricColumn = (
  table: SheetTable,
  preferredNames: string[] = []
): string | null => {
  const { headers, rows } = table;
  if (headers.length === 0 || rows.length === 0) {
    return null;
  }

  const sample = sampleRows(rows);

  for (const name of preferredNames) {
    const index = findColumnIndex(headers, name);
    if (index !== null && numericRatio(sample, index) >= NUMERIC_RATIO_THRESHOLD) {
      return name;
    }
  }

  const ratios = headers.map((_, index) => numericRatio(sample, index));
  const bestIndex = mostNumericColumnIndex(ratios);
  return bestIndex === null ? null : headers[bestIndex];
};
