/**
 * @lpvault/types — Shared domain types for the vault pipeline.
 *
 * Used by every package:
 * - Snapshot and History (collected data)
 * - AnalyticsRecord and AnalyticsSummary (derived data)
 * - ReportArtifact (rendered output)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Missing values are `null`, never coerced to zero
 */

// Snapshot types
export type {
  CalendarDate,
  MetricName,
  VaultMetrics,
  Snapshot,
  History,
} from "./snapshot.js";
export { METRIC_NAMES } from "./snapshot.js";

// Analytics and report types
export type {
  ValueBasis,
  AnalyticsRecord,
  AnalyticsSummary,
  ReportArtifact,
} from "./analytics.js";

// Runtime type guards
export {
  isCalendarDate,
  toCalendarDate,
  isMetricName,
  isSnapshot,
} from "./guards.js";
