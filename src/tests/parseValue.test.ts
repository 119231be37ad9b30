import { describe, expect, it } from "vitest";
import { isNumericValue, parseNumericValue } from "../lib/sheets/parseValue";

describe("numeric cell parsing", () => {
  it("strips thousands separators and a trailing percent sign", () => {
    expect(parseNumericValue("1,234.5%")).toBe(1234.5);
    expect(parseNumericValue("12 %")).toBe(12);
    expect(parseNumericValue(" 2,000 ")).toBe(2000);
  });

  it("reads signed, fractional and exponent forms", () => {
    expect(parseNumericValue("-3")).toBe(-3);
    expect(parseNumericValue("+4.25")).toBe(4.25);
    expect(parseNumericValue(".5")).toBe(0.5);
    expect(parseNumericValue("5.")).toBe(5);
    expect(parseNumericValue("1e3")).toBe(1000);
  });

  it("rejects blank and non-numeric cells", () => {
    expect(parseNumericValue("")).toBeNull();
    expect(parseNumericValue("  ")).toBeNull();
    expect(parseNumericValue("abc")).toBeNull();
    expect(parseNumericValue(null)).toBeNull();
    expect(parseNumericValue(undefined)).toBeNull();
  });

  it("reads infinity and nan words in any case", () => {
    expect(parseNumericValue("inf")).toBe(Infinity);
    expect(parseNumericValue("-Infinity")).toBe(-Infinity);
    expect(parseNumericValue("+INF%")).toBe(Infinity);
    expect(parseNumericValue("NaN")).toBeNaN();
    expect(isNumericValue("nan")).toBe(true);
    expect(parseNumericValue("infinite")).toBeNull();
  });

  it("allows underscores only between digits", () => {
    expect(parseNumericValue("1_000")).toBe(1000);
    expect(parseNumericValue("1_000.2_5")).toBe(1000.25);
    expect(parseNumericValue("_1")).toBeNull();
    expect(parseNumericValue("1__0")).toBeNull();
    expect(parseNumericValue("1_")).toBeNull();
  });

  it("only removes one percent sign and rejects hex literals", () => {
    expect(parseNumericValue("%")).toBeNull();
    expect(parseNumericValue("50%%")).toBeNull();
    expect(parseNumericValue("0x10")).toBeNull();
    expect(isNumericValue("10%")).toBe(true);
    expect(isNumericValue("n/a")).toBe(false);
  });
});
