import { beforeEach, describe, expect, it, vi } from "vitest";
import { SheetFetchError } from "../lib/sheets/errors";
import { fetchSheetTable } from "../lib/sheets/fetchSheet";

const captureRejection = async (promise: Promise<unknown>): Promise<unknown> => {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return null;
};

describe("sheet fetching", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("requests the export url and parses the payload", async () => {
    const fetchMock = vi.fn(async () => new Response("Program,Score\nA,1\n,\nB,2\n"));
    vi.stubGlobal("fetch", fetchMock);

    const table = await fetchSheetTable({ sheetId: "abc123", sheetName: "Data", gid: 7 });

    expect(fetchMock).toHaveBeenCalledWith(
      "https://docs.google.com/spreadsheets/d/abc123/export?format=csv&gid=7",
      expect.objectContaining({ method: "GET" })
    );
    expect(table).toEqual({
      headers: ["Program", "Score"],
      rows: [
        ["A", "1"],
        ["B", "2"]
      ]
    });
  });

  it("substitutes replacement characters for invalid UTF-8", async () => {
    const bytes = new Uint8Array([0x61, 0x2c, 0x62, 0x0a, 0x31, 0x2c, 0xff]);
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(bytes))
    );

    const table = await fetchSheetTable({ sheetId: "abc123", sheetName: "Data" });

    expect(table.rows).toEqual([["1", "\uFFFD"]]);
  });

  it("raises a transport error for non-2xx responses", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("nope", { status: 404, statusText: "Not Found" }))
    );

    const error = await captureRejection(fetchSheetTable({ sheetId: "abc123", gid: "0" }));

    expect(error).toBeInstanceOf(SheetFetchError);
    expect(error).toMatchObject({
      kind: "transport",
      status: 404,
      reason: "Not Found",
      message: "HTTP error fetching sheet: 404 Not Found"
    });
  });

  it("raises a network error carrying the underlying cause", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed", {
          cause: new Error("getaddrinfo ENOTFOUND docs.google.com")
        });
      })
    );

    const error = await captureRejection(fetchSheetTable({ sheetId: "abc123", gid: "0" }));

    expect(error).toMatchObject({
      kind: "network",
      reason: "getaddrinfo ENOTFOUND docs.google.com",
      message: "Network error fetching sheet: getaddrinfo ENOTFOUND docs.google.com"
    });
  });

  it("reports a timed out request as a network error", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        (_url: string, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => {
              reject(new Error("This operation was aborted"));
            });
          })
      )
    );

    const error = await captureRejection(
      fetchSheetTable({ sheetId: "abc123", gid: "0", timeoutSeconds: 0.01 })
    );

    expect(error).toMatchObject({ kind: "network", reason: "timed out" });
  });

  it("rejects before any request when neither name nor gid is given", async () => {
    const fetchMock = vi.fn(async () => new Response(""));
    vi.stubGlobal("fetch", fetchMock);

    await expect(fetchSheetTable({ sheetId: "abc123" })).rejects.toThrow(
      "Either sheetName or gid must be provided"
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
