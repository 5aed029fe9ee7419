/**
 * @lpvault/collector — Daily table backfill.
 *
 * The dashboard's paginated daily table reaches back further than our
 * own snapshots. This walks every page of it and turns each row into a
 * Snapshot, so history from before the first collect run can be filled in.
 *
 * Pagination stops when:
 * - the next button is missing or carries the disabled class
 * - the last row's date repeats (the click did not change the page)
 * - maxPages is reached
 */

import type { CalendarDate, MetricName, Snapshot } from "@lpvault/types";
import { METRIC_NAMES } from "@lpvault/types";
import { parseMetricValue } from "./parse.js";
import { datedRows, findColumn } from "./table.js";
import { ExtractionError } from "./types.js";
import type { RenderedPage } from "./types.js";

export interface TableHistoryOptions {
  /** Table selector */
  readonly table: string;

  /** Metric → header text */
  readonly columns: Partial<Record<MetricName, string>>;

  /** Rows missing any of these metrics are skipped */
  readonly criticalMetrics: readonly MetricName[];

  /** "Next page" control */
  readonly nextSelector: string;

  /** Class the next control carries on the last page */
  readonly disabledClass: string;

  /** Upper bound on pages visited */
  readonly maxPages: number;

  /** Pause after each page change. Default: 2000 */
  readonly settleMs?: number;

  /** Capture instant stamped on every row */
  readonly capturedAt: Date;
}

export interface TableHistoryResult {
  /** One snapshot per date, ascending */
  readonly snapshots: readonly Snapshot[];

  /** Rows without a parseable date or critical metric */
  readonly skippedRows: number;

  /** Pages read */
  readonly pages: number;
}

/**
 * Read every page of the daily table.
 *
 * @throws {ExtractionError} TABLE_NOT_FOUND when the first page has no table
 */
export async function extractTableHistory(
  page: RenderedPage,
  options: TableHistoryOptions,
): Promise<TableHistoryResult> {
  const byDate = new Map<CalendarDate, Snapshot>();
  let skippedRows = 0;
  let pages = 0;
  let previousLastDate: CalendarDate | null | undefined;

  while (pages < options.maxPages) {
    const table = await page.table(options.table);
    if (table === undefined) {
      if (pages === 0) {
        throw new ExtractionError(
          "TABLE_NOT_FOUND",
          `Table "${options.table}" not found on ${page.url}`,
        );
      }
      break;
    }
    pages++;

    const columnIndex = new Map<MetricName, number>();
    for (const metric of METRIC_NAMES) {
      const header = options.columns[metric];
      if (header !== undefined) {
        columnIndex.set(metric, findColumn(table.headers, header));
      }
    }

    const rows = datedRows(table);
    for (const { date, cells } of rows) {
      const snapshot = date === null ? null : rowSnapshot(date, cells, columnIndex, page.url, options);
      if (snapshot === null) {
        skippedRows++;
        continue;
      }
      // First occurrence wins
      if (!byDate.has(snapshot.date)) {
        byDate.set(snapshot.date, snapshot);
      }
    }

    const nextClass = await page.attribute(options.nextSelector, "class");
    if (nextClass === undefined || nextClass.split(/\s+/).includes(options.disabledClass)) {
      break;
    }

    const lastDate = rows.length > 0 ? rows[rows.length - 1]?.date : undefined;
    if (previousLastDate !== undefined && lastDate === previousLastDate) {
      break;
    }
    previousLastDate = lastDate;

    if (!(await page.click(options.nextSelector))) {
      break;
    }
    await page.settle(options.settleMs ?? 2000);
  }

  const snapshots = [...byDate.values()].sort((a, b) => (a.date < b.date ? -1 : 1));
  return { snapshots, skippedRows, pages };
}

function rowSnapshot(
  date: CalendarDate,
  cells: readonly string[],
  columnIndex: ReadonlyMap<MetricName, number>,
  source: string,
  options: TableHistoryOptions,
): Snapshot | null {
  const metrics: Record<MetricName, number | null> = {
    balance: null,
    totalPnl: null,
    dailyPnl: null,
    sharePrice: null,
    valueUsd: null,
    perpsVolume: null,
    fees: null,
  };

  for (const [metric, index] of columnIndex) {
    const cell = index >= 0 ? cells[index] : undefined;
    metrics[metric] = cell === undefined ? null : parseMetricValue(cell);
  }

  if (options.criticalMetrics.some((metric) => metrics[metric] === null)) {
    return null;
  }

  return {
    date,
    timestamp: options.capturedAt.toISOString(),
    source,
    ...metrics,
  };
}
