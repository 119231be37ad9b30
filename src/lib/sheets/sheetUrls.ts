import { SheetFetchError } from "./errors";
import type { SheetLocator } from "./types";

const SHEETS_BASE_URL = "https://docs.google.com/spreadsheets/d";

// encodeURIComponent leaves !'()* alone; the export endpoints expect them encoded too.
const encodeStrict = (value: string): string =>
  encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );

/** gviz endpoint: selects the worksheet by tab name. The sheet must be published or public. */
export const buildPublishedCsvUrl = (sheetId: string, sheetName: string): string =>
  `${SHEETS_BASE_URL}/${sheetId}/gviz/tq?tqx=out:csv&sheet=${encodeStrict(sheetName)}`;

/** export endpoint: selects the worksheet by gid, works without knowing the tab name. */
export const buildExportCsvUrl = (sheetId: string, gid: string | number): string =>
  `${SHEETS_BASE_URL}/${sheetId}/export?format=csv&gid=${encodeStrict(String(gid))}`;

const hasValue = (value: string | number | null | undefined): value is string | number =>
  value !== null && value !== undefined && String(value) !== "";

export const buildSheetCsvUrl = ({ sheetId, sheetName, gid }: SheetLocator): string => {
  if (hasValue(gid)) {
    return buildExportCsvUrl(sheetId, gid);
  }
  if (!sheetName) {
    throw SheetFetchError.invalidArguments();
  }
  return buildPublishedCsvUrl(sheetId, sheetName);
};
