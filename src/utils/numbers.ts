// src/utils/numbers.ts
import { RowCoercionError } from "./errors";

export const r2 = (n: number) => Math.round((n + Number.EPSILON) * 100) / 100;

const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;

// 1,234,567 or 1.234.567
const GROUPED_COMMA = /^[-+]?\d{1,3}(,\d{3})+$/;
const GROUPED_DOT = /^[-+]?\d{1,3}(\.\d{3})+$/;

/**
 * Rewrite locale separators into a plain decimal string, or return the
 * input unchanged when the separators are inconsistent.
 * With both "," and "." present the last one is the decimal mark and the
 * other must group the integer digits in threes. A single comma is a
 * decimal comma.
 */
function unLocalize(s: string): string {
  const lastComma = s.lastIndexOf(",");
  const lastDot = s.lastIndexOf(".");

  if (lastComma >= 0 && lastDot >= 0) {
    const decimalAt = Math.max(lastComma, lastDot);
    const intPart = s.slice(0, decimalAt);
    const grouped = lastComma > lastDot ? GROUPED_DOT : GROUPED_COMMA;
    if (!grouped.test(intPart)) return s;
    return `${intPart.replace(/[.,]/g, "")}.${s.slice(decimalAt + 1)}`;
  }
  if (lastComma >= 0) {
    if (s.indexOf(",") === lastComma) return s.replace(",", ".");
    return GROUPED_COMMA.test(s) ? s.replace(/,/g, "") : s;
  }
  if (lastDot >= 0 && s.indexOf(".") !== lastDot) {
    return GROUPED_DOT.test(s) ? s.replace(/\./g, "") : s;
  }
  return s;
}

/**
 * Coerce a spreadsheet/CSV cell into a finite number.
 * Terminal exports group thousands with spaces ("1 250.00"), commas or dots,
 * and some locales write the decimal part after a comma ("1.250,50").
 */
export function parseNumber(value: unknown, field = "value"): number {
  if (typeof value === "number") {
    if (Number.isFinite(value)) return value;
    throw new RowCoercionError(`${field} is not a finite number`);
  }
  if (typeof value !== "string") {
    throw new RowCoercionError(`${field} is empty`);
  }

  let s = value.replace(/\s/g, "");
  if (!s) throw new RowCoercionError(`${field} is empty`);

  s = unLocalize(s);
  if (!NUMERIC.test(s)) {
    throw new RowCoercionError(`${field} is not numeric: "${value}"`);
  }
  return parseFloat(s);
}

/** Like parseNumber, but null for blanks and garbage. */
export function parseOptionalNumber(value: unknown): number | null {
  if (value === null || value === undefined || value === "") return null;
  try {
    return parseNumber(value);
  } catch {
    return null;
  }
}
