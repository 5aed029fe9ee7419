/**
 * Snapshot Types
 *
 * One observation of the vault, captured once per calendar day.
 *
 * Rules:
 * - `date` is the partition key (UTC calendar day, YYYY-MM-DD)
 * - Every metric is nullable: `null` means "not observed", never zero
 * - Snapshots are immutable after commit (same-day re-runs replace them)
 */

/**
 * Calendar day in `YYYY-MM-DD` form (UTC).
 */
export type CalendarDate = string;

/**
 * Names of the numeric metrics read from the vault dashboard.
 */
export type MetricName =
  | "balance"
  | "totalPnl"
  | "dailyPnl"
  | "sharePrice"
  | "valueUsd"
  | "perpsVolume"
  | "fees";

/**
 * All metric names, in display order.
 */
export const METRIC_NAMES: readonly MetricName[] = [
  "balance",
  "totalPnl",
  "dailyPnl",
  "sharePrice",
  "valueUsd",
  "perpsVolume",
  "fees",
];

/**
 * Metric values keyed by name. `null` when the source did not provide one.
 */
export type VaultMetrics = {
  readonly [K in MetricName]: number | null;
};

/**
 * A single vault observation.
 */
export interface Snapshot extends VaultMetrics {
  /** Calendar day this snapshot belongs to */
  readonly date: CalendarDate;

  /** Capture instant (ISO 8601) */
  readonly timestamp: string;

  /** Page the metrics were read from */
  readonly source: string;
}

/**
 * The full ordered series of committed snapshots.
 * Strictly increasing by `date`; gaps between days are allowed.
 */
export type History = readonly Snapshot[];
