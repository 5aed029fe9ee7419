/**
 * @lpvault/analytics — Summary statistics for the report header.
 */

import type { AnalyticsRecord, AnalyticsSummary } from "@lpvault/types";
import { defined, median } from "./stats.js";

export function summarize(records: readonly AnalyticsRecord[]): AnalyticsSummary {
  const count = records.length;
  const cumulative = defined(records.map((r) => r.cumulativePnl));
  const drawdowns = defined(records.map((r) => r.drawdown));

  const positiveDays = cumulative.filter((v) => v > 0).length;
  const negativeDays = cumulative.filter((v) => v < 0).length;

  return {
    count,
    firstDate: records[0]?.date ?? null,
    latest: records[count - 1] ?? null,
    previous: records[count - 2] ?? null,
    maxCumulativePnl: cumulative.length > 0 ? Math.max(...cumulative) : null,
    minCumulativePnl: cumulative.length > 0 ? Math.min(...cumulative) : null,
    medianCumulativePnl: median(cumulative),
    positiveDays,
    negativeDays,
    positiveShare: count > 0 ? positiveDays / count : null,
    negativeShare: count > 0 ? negativeDays / count : null,
    maxDrawdown: drawdowns.length > 0 ? Math.max(...drawdowns) : null,
  };
}

/**
 * Whole days from `from` to `to` (calendar dates, UTC).
 */
export function daysBetween(from: string, to: string): number {
  const ms = Date.parse(`${to}T00:00:00.000Z`) - Date.parse(`${from}T00:00:00.000Z`);
  return Math.round(ms / 86_400_000);
}
