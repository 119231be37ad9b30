import { SheetFetchError } from "./errors";
import { parseSheetCsv } from "./parseSheetCsv";
import { buildSheetCsvUrl } from "./sheetUrls";
import type { FetchSheetOptions, SheetTable } from "./types";

export const DEFAULT_FETCH_TIMEOUT_SECONDS = 10;
export const MAX_FETCH_TIMEOUT_SECONDS = 120;

const describeNetworkFailure = (error: unknown, timedOut: boolean): string => {
  if (timedOut) {
    return "timed out";
  }
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error && cause.message) {
      return cause.message;
    }
    return error.message || error.name;
  }
  return String(error);
};

// Invalid UTF-8 sequences become U+FFFD rather than failing the fetch.
const decodeBody = (buffer: ArrayBuffer): string =>
  new TextDecoder("utf-8", { fatal: false }).decode(buffer);

const logFailure = (url: string, error: SheetFetchError) => {
  console.error("[sheet-fetch] fail", {
    url,
    kind: error.kind,
    status: error.status,
    reason: error.reason
  });
};

/**
 * Downloads a worksheet as CSV and returns its normalized table. A gid wins
 * over a sheet name when both are given.
 */
export const fetchSheetTable = async ({
  timeoutSeconds = DEFAULT_FETCH_TIMEOUT_SECONDS,
  ...locator
}: FetchSheetOptions): Promise<SheetTable> => {
  const url = buildSheetCsvUrl(locator);
  console.info("[sheet-fetch] start", { url, timeoutSeconds });

  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutSeconds * 1000);

  try {
    let response: Response;
    try {
      response = await fetch(url, { method: "GET", signal: controller.signal });
    } catch (error) {
      throw SheetFetchError.network(describeNetworkFailure(error, timedOut));
    }

    if (!response.ok) {
      throw SheetFetchError.transport(response.status, response.statusText);
    }

    let buffer: ArrayBuffer;
    try {
      buffer = await response.arrayBuffer();
    } catch (error) {
      throw SheetFetchError.network(describeNetworkFailure(error, timedOut));
    }

    const table = parseSheetCsv(decodeBody(buffer));
    console.info("[sheet-fetch] success", {
      url,
      status: response.status,
      bytes: buffer.byteLength,
      rows: table.rows.length
    });
    return table;
  } catch (error) {
    if (error instanceof SheetFetchError) {
      logFailure(url, error);
    }
    throw error;
  } finally {
    clearTimeout(timeout);
  }
};
