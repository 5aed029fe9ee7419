/**
 * @lpvault/report — Number formatting for the report.
 */

export const MISSING = "n/a";

/**
 * `<sign><unit> <value>`: millions with two decimals ("OX 1.23m"),
 * thousands with none ("-OX 12k"), smaller amounts as integers.
 */
export function formatAmount(value: number | null, unit: string): string {
  if (value === null) return MISSING;

  const abs = Math.abs(value);
  let text: string;
  if (abs >= 1e6) {
    text = `${(abs / 1e6).toFixed(2)}m`;
  } else if (abs >= 1e3) {
    text = `${(abs / 1e3).toFixed(0)}k`;
  } else {
    text = abs.toFixed(0);
  }

  const sign = value < 0 && text !== "0" ? "-" : "";
  return `${sign}${unit} ${text}`;
}

/**
 * Ratio as a signed percentage with two decimals (0.0123 → "+1.23%").
 */
export function formatPercent(value: number | null): string {
  if (value === null) return MISSING;

  const text = (Math.abs(value) * 100).toFixed(2);
  if (text === "0.00") return "0.00%";
  return `${value < 0 ? "-" : "+"}${text}%`;
}

/**
 * Plain decimal, for share prices and other small values.
 */
export function formatDecimal(value: number | null, digits = 4): string {
  return value === null ? MISSING : value.toFixed(digits);
}
