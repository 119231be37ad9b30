import Papa from "papaparse";
import type { SheetRow, SheetTable } from "./types";

const stripByteOrderMark = (text: string): string => text.replace(/^\uFEFF/, "");

/**
 * Rewrites unquoted CRLF and lone CR record breaks to LF so one sheet can mix
 * terminators. Line breaks inside quoted fields are left as they are.
 */
export const normalizeRecordBreaks = (text: string): string => {
  let result = "";
  let inQuotes = false;
  let atFieldStart = true;

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];

    if (inQuotes) {
      result += char;
      if (char === '"') {
        if (text[index + 1] === '"') {
          result += '"';
          index += 1;
        } else {
          inQuotes = false;
        }
      }
      continue;
    }

    if (char === "\r") {
      result += "\n";
      if (text[index + 1] === "\n") {
        index += 1;
      }
      atFieldStart = true;
      continue;
    }

    if (char === '"' && atFieldStart) {
      inQuotes = true;
    }
    result += char;
    atFieldStart = char === "," || char === "\n";
  }

  return result;
};

const isBlankRow = (row: string[]): boolean => row.every((cell) => cell.trim().length === 0);

export const normalizeRowLength = (row: string[], width: number): SheetRow =>
  Array.from({ length: width }, (_, index) => row[index] ?? "");

/**
 * Splits CSV text into a trimmed header row and data rows sized to the header.
 * Rows with no content are dropped; quoting problems are reported, not thrown.
 */
export const parseSheetCsv = (text: string): SheetTable => {
  const sanitized = normalizeRecordBreaks(stripByteOrderMark(text));
  if (sanitized.length === 0) {
    return { headers: [], rows: [] };
  }

  const parsed = Papa.parse<string[]>(sanitized, {
    delimiter: ",",
    newline: "\n",
    header: false,
    skipEmptyLines: false
  });

  if (parsed.errors.length > 0) {
    console.warn("[sheet-csv] parse issues", {
      count: parsed.errors.length,
      first: parsed.errors.slice(0, 3).map((error) => ({
        code: error.code,
        row: error.row,
        message: error.message
      }))
    });
  }

  const [headerRow, ...dataRows] = parsed.data;
  if (!headerRow) {
    return { headers: [], rows: [] };
  }

  // An empty first line is a record with no cells, not one blank header.
  const headers = sanitized.startsWith("\n") ? [] : headerRow.map((header) => header.trim());
  const rows = dataRows
    .filter((row) => !isBlankRow(row))
    .map((row) => normalizeRowLength(row, headers.length));

  return { headers, rows };
};
