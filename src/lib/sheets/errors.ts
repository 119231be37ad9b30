import type { SheetFetchErrorKind } from "./types";

export class SheetFetchError extends Error {
  kind: SheetFetchErrorKind;
  reason: string;
  status?: number;

  constructor(kind: SheetFetchErrorKind, message: string, reason: string, status?: number) {
    super(message);
    this.name = "SheetFetchError";
    this.kind = kind;
    this.reason = reason;
    this.status = status;
  }

  static invalidArguments(): SheetFetchError {
    const message = "Either sheetName or gid must be provided";
    return new SheetFetchError("invalid-arguments", message, message);
  }

  static transport(status: number, reason: string): SheetFetchError {
    return new SheetFetchError(
      "transport",
      `HTTP error fetching sheet: ${status} ${reason}`.trim(),
      reason,
      status
    );
  }

  static network(reason: string): SheetFetchError {
    return new SheetFetchError("network", `Network error fetching sheet: ${reason}`, reason);
  }
}
