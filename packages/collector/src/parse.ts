/**
 * @lpvault/collector — Text-to-number parsing for dashboard values.
 *
 * Format assumptions (en-US):
 * - "," groups thousands, "." is the decimal point
 * - up to four leading or trailing currency characters ("$", "OX", "USDC")
 * - a sign may come before or after the currency ("-$5", "$-5")
 * - "(1,234)" and "−1,234" (U+2212) are negative
 * - k / m / b suffixes scale by 10^3 / 10^6 / 10^9
 * - a trailing "%" divides by 100
 */

import { isCalendarDate } from "@lpvault/types";
import type { CalendarDate } from "@lpvault/types";

const PLACEHOLDERS = new Set(["", "-", "--", "—", "–", "n/a", "na", "null", "none"]);

const SUFFIX_SCALE: Readonly<Record<string, number>> = {
  k: 1e3,
  m: 1e6,
  b: 1e9,
};

const HEAD = /^[\s+-]*[^\d\s+.-]{0,4}[\s+-]*$/;
const TAIL = /^(\d+(?:\.\d+)?|\.\d+)\s*(?:([kmb])(?![a-z]))?\s*[^\d\s.,]{0,4}$/i;

/**
 * Parse a displayed metric into a number.
 *
 * @returns The value, or null when the text is a placeholder or not a number
 */
export function parseMetricValue(raw: string): number | null {
  let text = raw.replace(/\u2212/g, "-").replace(/["\u00a0]/g, " ").trim();
  if (PLACEHOLDERS.has(text.toLowerCase())) {
    return null;
  }

  let negative = false;
  const parenthesised = /^\((.*)\)$/.exec(text);
  if (parenthesised !== null) {
    negative = true;
    text = (parenthesised[1] ?? "").trim();
  }

  let divisor = 1;
  if (text.endsWith("%")) {
    divisor = 100;
    text = text.slice(0, -1).trim();
  }

  const firstDigit = text.search(/[\d.]/);
  if (firstDigit < 0) {
    return null;
  }

  const head = text.slice(0, firstDigit);
  if (!HEAD.test(head) || (head.match(/-/g) ?? []).length > 1) {
    return null;
  }
  if (head.includes("-")) {
    negative = !negative;
  }

  const match = TAIL.exec(text.slice(firstDigit).replace(/,/g, ""));
  if (match === null) {
    return null;
  }

  const magnitude = Number(match[1]);
  const scale = match[2] !== undefined ? (SUFFIX_SCALE[match[2].toLowerCase()] ?? 1) : 1;
  const value = ((negative ? -magnitude : magnitude) * scale) / divisor;

  return Number.isFinite(value) ? value : null;
}

/**
 * Parse a table date cell ("2024-05-01", "2024/05/01", "2024-05-01 00:00").
 *
 * @returns The calendar date, or null when the cell is not a date
 */
export function parseTableDate(raw: string): CalendarDate | null {
  const match = /^(\d{4})[-/.](\d{2})[-/.](\d{2})\b/.exec(raw.trim());
  if (match === null) {
    return null;
  }
  const date = `${match[1]}-${match[2]}-${match[3]}`;
  return isCalendarDate(date) ? date : null;
}
