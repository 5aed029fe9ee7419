/**
 * @lpvault/analytics — Analytics Engine.
 *
 * Derives per-date performance metrics from a History. Pure and
 * deterministic: the same History always yields the same records.
 *
 * Rules:
 * - One record per snapshot, same order
 * - Undefined arithmetic (missing input, zero denominator) is null, never 0
 * - Returns are measured on one basis field (balance by default: every
 *   daily table row carries it, backfilled days included)
 * - A day with unknown PnL has no cumulative PnL; the running sum
 *   carries on from the known days
 * - Gaps between dates are not interpolated; "period" means
 *   "since the previous snapshot"
 */

import type { AnalyticsRecord, History, Snapshot, ValueBasis } from "@lpvault/types";
import { defined, mean, sampleStdDev } from "./stats.js";

export const DEFAULT_VALUE_BASIS: ValueBasis = "balance";
export const DEFAULT_ROLLING_WINDOW = 7;

export interface AnalyticsOptions {
  /** Field returns are computed on. Default: balance */
  readonly basis?: ValueBasis;

  /** Trailing window for rolling statistics. Default: 7 */
  readonly window?: number;
}

/**
 * Compute one AnalyticsRecord per snapshot.
 *
 * @throws {RangeError} when `window` is not an integer of at least 2
 */
export function compute(history: History, options: AnalyticsOptions = {}): AnalyticsRecord[] {
  const basis = options.basis ?? DEFAULT_VALUE_BASIS;
  const window = options.window ?? DEFAULT_ROLLING_WINDOW;
  if (!Number.isInteger(window) || window < 2) {
    throw new RangeError(`Rolling window must be an integer >= 2, got ${window}`);
  }

  const records: AnalyticsRecord[] = [];
  const returns: (number | null)[] = [];

  let base: number | null = null;
  let peak: number | null = null;
  let runningPnl = 0;

  history.forEach((snapshot, i) => {
    const previous = i > 0 ? history[i - 1] : undefined;
    const value = snapshot[basis];
    const previousValue = previous !== undefined ? previous[basis] : null;

    const periodReturn = ratioChange(value, previousValue);
    returns.push(periodReturn);

    if (base === null && value !== null && value !== 0) {
      base = value;
    }
    const cumulativeReturn = ratioChange(value, base);

    let drawdown: number | null = null;
    if (cumulativeReturn !== null) {
      const growth = 1 + cumulativeReturn;
      peak = peak === null ? growth : Math.max(peak, growth);
      drawdown = peak > 0 ? (peak - growth) / peak : null;
    }

    const periodPnl = periodPnlOf(snapshot, previous);
    let cumulativePnl: number | null;
    if (previous === undefined) {
      runningPnl = snapshot.dailyPnl ?? 0;
      cumulativePnl = runningPnl;
    } else if (periodPnl === null) {
      cumulativePnl = null;
    } else {
      runningPnl += periodPnl;
      cumulativePnl = runningPnl;
    }

    const trailing = i + 1 >= window ? returns.slice(i + 1 - window) : [];
    const complete = trailing.length === window && trailing.every((r) => r !== null);

    records.push({
      date: snapshot.date,
      value,
      periodReturn,
      cumulativeReturn,
      periodPnl,
      cumulativePnl,
      drawdown,
      rollingMeanReturn: complete ? mean(defined(trailing)) : null,
      rollingVolatility: complete ? sampleStdDev(defined(trailing)) : null,
    });
  });

  return records;
}

// ─── Internal ────────────────────────────────────────────────────────────

/** current / reference - 1, or null when undefined */
function ratioChange(current: number | null, reference: number | null): number | null {
  if (current === null || reference === null || reference === 0) {
    return null;
  }
  return current / reference - 1;
}

function periodPnlOf(snapshot: Snapshot, previous: Snapshot | undefined): number | null {
  if (snapshot.dailyPnl !== null) {
    return snapshot.dailyPnl;
  }
  if (previous === undefined || snapshot.totalPnl === null || previous.totalPnl === null) {
    return null;
  }
  return snapshot.totalPnl - previous.totalPnl;
}
