import {
  NUMERIC_RATIO_THRESHOLD,
  cardinality,
  mostNumericColumnIndex,
  numericRatio,
  sampleRows
} from "./columnStats";
import type { DefaultColumns, SheetTable } from "./types";

const MIN_GROUP_CARDINALITY = 2;
const MAX_GROUP_CARDINALITY = 50;

/**
 * Picks a (groupBy, aggregate) pair when the caller gave none.
 *
 * - aggregate: most numeric column at or above the threshold; the LAST column
 *   at the maximum wins.
 * - groupBy: FIRST mostly-text column with 2..50 distinct values.
 *
 * The two scans break ties in opposite directions; keep them separate.
 */
export const inferDefaultColumns = (table: SheetTable): DefaultColumns | null => {
  const { headers, rows } = table;
  if (headers.length === 0 || rows.length === 0) {
    return null;
  }

  const sample = sampleRows(rows);
  const ratios = headers.map((_, index) => numericRatio(sample, index));

  const aggregateIndex = mostNumericColumnIndex(ratios);

  let groupByIndex: number | null = null;
  for (let index = 0; index < ratios.length; index += 1) {
    if (ratios[index] >= NUMERIC_RATIO_THRESHOLD) {
      continue;
    }
    const distinct = cardinality(sample, index);
    if (distinct >= MIN_GROUP_CARDINALITY && distinct <= MAX_GROUP_CARDINALITY) {
      groupByIndex = index;
      break;
    }
  }

  return {
    groupBy: headers[groupByIndex ?? 0],
    aggregate: headers[aggregateIndex ?? (headers.length > 1 ? 1 : 0)]
  };
};
