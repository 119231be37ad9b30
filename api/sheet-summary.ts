import { randomUUID } from "crypto";
import { z } from "zod";
import { loadSheetConfig, type SheetConfig } from "../src/lib/config";
import {
  MAX_FETCH_TIMEOUT_SECONDS,
  SheetFetchError,
  fetchSheetTable,
  summarizeSheet
} from "../src/lib/sheets";

export const config = {
  runtime: "nodejs"
};

const optionalParam = z
  .string()
  .transform((value) => value.trim())
  .optional()
  .transform((value) => (value ? value : undefined));

const querySchema = z
  .object({
    sheetId: optionalParam,
    sheetName: optionalParam,
    gid: optionalParam,
    timeout: z.coerce.number().finite().positive().max(MAX_FETCH_TIMEOUT_SECONDS).optional(),
    groupBy: optionalParam,
    metric: optionalParam,
    agg: optionalParam,
    preferred: optionalParam,
    filterColumn: optionalParam,
    filterValue: z.string().optional()
  })
  .strict();

type SummaryQuery = z.infer<typeof querySchema>;

// Structural subsets of node's IncomingMessage / ServerResponse.
export type HandlerRequest = {
  method?: string;
  url?: string;
};

export type HandlerResponse = {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body: string): unknown;
};

const jsonResponse = (
  res: HandlerResponse,
  statusCode: number,
  payload: Record<string, unknown>
) => {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(payload));
};

const createRequestId = (): string => {
  try {
    return randomUUID();
  } catch {
    return `req-${Math.random().toString(36).slice(2, 10)}`;
  }
};

const readQuery = (req: HandlerRequest): Record<string, string> => {
  const url = new URL(req.url ?? "/", "http://localhost");
  return Object.fromEntries(url.searchParams.entries());
};

const splitList = (value: string | undefined): string[] | undefined =>
  value
    ?.split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

const logStart = (payload: {
  requestId: string;
  method: string | undefined;
  sheetId: string | null;
  hasGid: boolean;
}) => {
  console.info("[sheet-summary] start", payload);
};

const logSuccess = (requestId: string, rowCount: number, groupCount: number) => {
  console.info("[sheet-summary] success", { requestId, rowCount, groupCount });
};

const logFailure = (requestId: string, error: unknown, fallbackMessage: string) => {
  const payload =
    error instanceof Error
      ? { message: error.message, stack: error.stack }
      : { message: fallbackMessage, stack: undefined };
  console.error("[sheet-summary] fail", { requestId, ...payload });
};

const errorStatus = (error: SheetFetchError): number => {
  switch (error.kind) {
    case "invalid-arguments":
      return 400;
    case "transport":
      return 502;
    case "network":
      return 504;
  }
};

const resolveLocator = (query: SummaryQuery, sheetConfig: SheetConfig) => ({
  sheetId: query.sheetId ?? sheetConfig.sheetId,
  sheetName: query.sheetName ?? sheetConfig.sheetName,
  gid: query.gid ?? sheetConfig.gid,
  timeoutSeconds: query.timeout ?? sheetConfig.timeoutSeconds
});

export default async function handler(req: HandlerRequest, res: HandlerResponse) {
  const requestId = createRequestId();

  if (req.method !== "GET") {
    logStart({ requestId, method: req.method, sheetId: null, hasGid: false });
    return jsonResponse(res, 405, { ok: false, error: "Method Not Allowed", requestId });
  }

  const validated = querySchema.safeParse(readQuery(req));
  if (!validated.success) {
    logStart({ requestId, method: req.method, sheetId: null, hasGid: false });
    logFailure(requestId, validated.error, "Invalid request");
    return jsonResponse(res, 400, {
      ok: false,
      error: "Invalid request",
      requestId,
      details: validated.error.issues.map((issue) => issue.path.join(".")).join(", ")
    });
  }

  let sheetConfig: SheetConfig;
  try {
    sheetConfig = loadSheetConfig();
  } catch (error) {
    logFailure(requestId, error, "Invalid configuration");
    return jsonResponse(res, 500, { ok: false, error: "Invalid configuration", requestId });
  }

  const query = validated.data;
  const { sheetId, ...locator } = resolveLocator(query, sheetConfig);
  logStart({
    requestId,
    method: req.method,
    sheetId: sheetId ?? null,
    hasGid: Boolean(locator.gid)
  });

  if (!sheetId) {
    logFailure(requestId, null, "Missing sheetId");
    return jsonResponse(res, 400, { ok: false, error: "Missing sheetId", requestId });
  }

  try {
    const table = await fetchSheetTable({ sheetId, ...locator });
    const filter =
      query.filterColumn && query.filterValue !== undefined
        ? { column: query.filterColumn, value: query.filterValue }
        : null;
    const result = summarizeSheet(table, {
      groupBy: query.groupBy,
      aggregate: query.metric,
      reducer: query.agg,
      preferredMetrics: splitList(query.preferred) ?? sheetConfig.preferredMetrics,
      filter
    });

    logSuccess(requestId, result.rowCount, result.groups.length);
    return jsonResponse(res, 200, { ok: true, requestId, result });
  } catch (error) {
    if (error instanceof SheetFetchError) {
      logFailure(requestId, error, error.message);
      return jsonResponse(res, errorStatus(error), {
        ok: false,
        error: error.message,
        requestId,
        ...(error.status !== undefined ? { status: error.status } : {})
      });
    }
    logFailure(requestId, error, "Unexpected error");
    return jsonResponse(res, 500, { ok: false, error: "Unexpected error", requestId });
  }
}
