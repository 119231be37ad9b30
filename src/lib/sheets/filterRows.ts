import { findColumnIndex } from "./columnStats";
import type { SheetRow, SheetTable } from "./types";

export const filterRowsByValue = (
  table: SheetTable,
  columnName: string,
  value: string
): SheetRow[] => {
  const { headers, rows } = table;
  if (headers.length === 0 || rows.length === 0) {
    return [];
  }
  const columnIndex = findColumnIndex(headers, columnName);
  if (columnIndex === null) {
    return [];
  }
  const target = value.trim();
  return rows.filter((row) => columnIndex < row.length && row[columnIndex].trim() === target);
};
