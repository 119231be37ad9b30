import { z } from "zod";
import { DEFAULT_FETCH_TIMEOUT_SECONDS, MAX_FETCH_TIMEOUT_SECONDS } from "./sheets/fetchSheet";

const DEFAULT_PREFERRED_METRICS = ["Response", "CBR (%)"];

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalText = z.preprocess(
  blankToUndefined,
  z
    .string()
    .transform((value) => value.trim())
    .optional()
);

const splitList = (value: string): string[] =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

const envSchema = z.object({
  SHEET_ID: optionalText,
  SHEET_NAME: optionalText,
  SHEET_GID: optionalText,
  SHEET_FETCH_TIMEOUT_SECONDS: z.preprocess(
    blankToUndefined,
    z.coerce
      .number()
      .finite()
      .positive()
      .max(MAX_FETCH_TIMEOUT_SECONDS)
      .default(DEFAULT_FETCH_TIMEOUT_SECONDS)
  ),
  SHEET_PREFERRED_METRICS: z.preprocess(
    blankToUndefined,
    z.string().transform(splitList).default(DEFAULT_PREFERRED_METRICS.join(","))
  )
});

export type SheetConfig = {
  sheetId?: string;
  sheetName?: string;
  gid?: string;
  timeoutSeconds: number;
  preferredMetrics: string[];
};

export class SheetConfigError extends Error {
  keys: string[];

  constructor(keys: string[], details: string) {
    super(`Invalid sheet configuration (${keys.join(", ")}): ${details}`);
    this.name = "SheetConfigError";
    this.keys = keys;
  }
}

export const loadSheetConfig = (
  env: Record<string, string | undefined> = process.env
): SheetConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const keys = Array.from(new Set(parsed.error.issues.map((issue) => issue.path.join("."))));
    throw new SheetConfigError(keys, parsed.error.issues.map((issue) => issue.message).join("; "));
  }

  const data = parsed.data;
  return {
    sheetId: data.SHEET_ID,
    sheetName: data.SHEET_NAME,
    gid: data.SHEET_GID,
    timeoutSeconds: data.SHEET_FETCH_TIMEOUT_SECONDS,
    preferredMetrics: data.SHEET_PREFERRED_METRICS
  };
};
