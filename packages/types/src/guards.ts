/**
 * Runtime Type Guards
 *
 * Narrowing functions for vault domain types.
 * Used where data crosses a boundary: partitions read from disk,
 * locator files, command-line arguments.
 */

import { METRIC_NAMES } from "./snapshot.js";
import type { CalendarDate, MetricName, Snapshot } from "./snapshot.js";

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const METRIC_SET = new Set<string>(METRIC_NAMES);

// =============================================================================
// Dates
// =============================================================================

/**
 * True for a real `YYYY-MM-DD` day ("2024-02-30" is rejected).
 */
export function isCalendarDate(value: unknown): value is CalendarDate {
  if (typeof value !== "string") return false;
  const match = CALENDAR_DATE.exec(value);
  if (match === null) return false;

  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

/**
 * UTC calendar day of an instant.
 */
export function toCalendarDate(instant: Date): CalendarDate {
  return instant.toISOString().slice(0, 10);
}

// =============================================================================
// Snapshots
// =============================================================================

export function isMetricName(value: unknown): value is MetricName {
  return typeof value === "string" && METRIC_SET.has(value);
}

function isMetricValue(value: unknown): value is number | null {
  return value === null || (typeof value === "number" && Number.isFinite(value));
}

export function isSnapshot(value: unknown): value is Snapshot {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (
    !isCalendarDate(v.date) ||
    typeof v.timestamp !== "string" ||
    typeof v.source !== "string"
  ) {
    return false;
  }
  return METRIC_NAMES.every((name) => isMetricValue(v[name]));
}
