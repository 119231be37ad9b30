// Underscores may only sit between digits: "1_000" reads, "_1" and "1__0" do not.
const digits = String.raw`\d(?:_?\d)*`;
const decimalPattern = new RegExp(
  `^[+-]?(?:${digits}(?:\\.(?:${digits})?)?|\\.${digits})(?:[eE][+-]?${digits})?$`
);
const specialPattern = /^([+-]?)(inf|infinity|nan)$/i;

const parseSpecial = (text: string): number | null => {
  const match = specialPattern.exec(text);
  if (!match) {
    return null;
  }
  if (match[2].toLowerCase() === "nan") {
    return Number.NaN;
  }
  return match[1] === "-" ? -Infinity : Infinity;
};

/**
 * Reads a spreadsheet cell as a number. Accepts thousands separators and a
 * single trailing percent sign, so "1,234.5%" reads as 1234.5. The words
 * inf, infinity and nan (any case) read as Infinity and NaN.
 */
export const parseNumericValue = (value: string | null | undefined): number | null => {
  if (value === null || value === undefined) {
    return null;
  }
  let text = value.trim();
  if (!text) {
    return null;
  }
  if (text.endsWith("%")) {
    text = text.slice(0, -1);
  }
  const cleaned = text.replace(/,/g, "").trim();
  if (decimalPattern.test(cleaned)) {
    return Number(cleaned.replace(/_/g, ""));
  }
  return parseSpecial(cleaned);
};

export const isNumericValue = (value: string | null | undefined): boolean =>
  parseNumericValue(value) !== null;
