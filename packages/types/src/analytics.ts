/**
 * Analytics Types
 *
 * Values derived from a History. Always recomputed, never stored as truth.
 * `null` marks an undefined quantity (missing input or zero denominator)
 * and is distinct from `0` ("no change").
 */

import type { CalendarDate } from "./snapshot.js";

/**
 * Which snapshot field returns are computed on.
 */
export type ValueBasis = "sharePrice" | "balance";

/**
 * Derived metrics for one History entry.
 */
export interface AnalyticsRecord {
  readonly date: CalendarDate;

  /** The basis value on this date */
  readonly value: number | null;

  /** v[t] / v[t-1] - 1 */
  readonly periodReturn: number | null;

  /** Growth since the first valid observation */
  readonly cumulativeReturn: number | null;

  /** PnL attributed to this period */
  readonly periodPnl: number | null;

  /** Running sum of period PnL since the first snapshot */
  readonly cumulativePnl: number | null;

  /** (peak - current) / peak of the cumulative growth index */
  readonly drawdown: number | null;

  /** Mean period return over the trailing window */
  readonly rollingMeanReturn: number | null;

  /** Sample standard deviation of period returns over the trailing window */
  readonly rollingVolatility: number | null;
}

/**
 * Descriptive statistics over a sequence of AnalyticsRecords.
 */
export interface AnalyticsSummary {
  readonly count: number;
  readonly firstDate: CalendarDate | null;
  readonly latest: AnalyticsRecord | null;
  readonly previous: AnalyticsRecord | null;

  readonly maxCumulativePnl: number | null;
  readonly minCumulativePnl: number | null;
  readonly medianCumulativePnl: number | null;

  /** Days with cumulative PnL above / below zero */
  readonly positiveDays: number;
  readonly negativeDays: number;

  /** Share of all records (0..1) */
  readonly positiveShare: number | null;
  readonly negativeShare: number | null;

  readonly maxDrawdown: number | null;
}

/**
 * A rendered report, keyed by the date of the run that produced it.
 */
export interface ReportArtifact {
  readonly date: CalendarDate;
  readonly fileName: string;
  readonly html: string;
  /** True when fewer than two records were available */
  readonly insufficientData: boolean;
}
