/**
 * @lpvault/cli — `collect` command.
 *
 * Open the dashboard, extract today's snapshot and commit it. With
 * --backfill, the dashboard's daily table is imported as well; days
 * already in the store are never overwritten by backfilled rows.
 *
 * Nothing is written unless extraction succeeds, and all writes happen
 * after the browser has been closed.
 */

import {
  DEFAULT_LOCATOR_SPECS,
  DEFAULT_RETRY_POLICY,
  VaultExtractor,
  createLocators,
  extractTableHistory,
  tableColumns,
  withBrowserSession,
} from "@lpvault/collector";
import type { BrowserDriver, LocatorSpec } from "@lpvault/collector";
import type { SnapshotStore, StoredSnapshot } from "@lpvault/snapshot-store";
import type { CalendarDate, Snapshot } from "@lpvault/types";
import type { AppConfig } from "../config.js";
import { loadLocatorSpecs, parseMetricList } from "../config.js";
import type { Logger } from "../logger.js";

export interface CollectDeps {
  readonly config: AppConfig;
  readonly store: SnapshotStore;
  readonly driver: BrowserDriver;
  readonly logger: Logger;
  readonly clock?: () => Date;
  readonly sleepFn?: (ms: number) => Promise<void>;
}

export interface CollectOptions {
  readonly date?: CalendarDate;
  readonly backfill?: boolean;
}

export interface CollectResult {
  readonly stored: StoredSnapshot;
  /** Dates imported from the daily table */
  readonly backfilled: readonly CalendarDate[];
}

interface Harvest {
  readonly snapshot: Snapshot;
  readonly history: readonly Snapshot[];
}

export async function collect(deps: CollectDeps, options: CollectOptions = {}): Promise<CollectResult> {
  const { config, store, logger } = deps;
  const clock = deps.clock ?? (() => new Date());

  const specs: readonly LocatorSpec[] = config.LOCATORS_FILE !== undefined
    ? loadLocatorSpecs(config.LOCATORS_FILE)
    : DEFAULT_LOCATOR_SPECS;
  const criticalMetrics = parseMetricList(config.CRITICAL_METRICS);

  const extractor = new VaultExtractor({
    locators: createLocators(specs),
    criticalMetrics,
    clock,
    onIssue: (issue) => logger.warn({ metric: issue.metric, code: issue.code, raw: issue.raw }, issue.message),
  });

  logger.info({ url: config.VAULT_URL, backfill: options.backfill === true }, "Collecting vault snapshot");

  const { snapshot, history } = await withBrowserSession(
    deps.driver,
    {
      url: config.VAULT_URL,
      readySelector: config.READY_SELECTOR,
      navigationTimeoutMs: config.NAVIGATION_TIMEOUT_MS,
      settleMs: config.SETTLE_MS,
      ...(config.CONSENT_SELECTOR !== undefined ? { consentSelector: config.CONSENT_SELECTOR } : {}),
      retry: {
        ...DEFAULT_RETRY_POLICY,
        maxAttempts: config.SESSION_MAX_ATTEMPTS,
        baseDelayMs: config.SESSION_RETRY_BASE_MS,
      },
      ...(deps.sleepFn !== undefined ? { sleepFn: deps.sleepFn } : {}),
      onRetry: (failures, err, delayMs) =>
        logger.warn({ attempt: failures, delayMs, err }, "Browser session failed, retrying"),
      onWarning: (message, err) => logger.warn({ err }, message),
    },
    async (page): Promise<Harvest> => {
      const snapshot = await extractor.extract(page, options.date);
      if (options.backfill !== true) {
        return { snapshot, history: [] };
      }

      const table = await extractTableHistory(page, {
        table: config.TABLE_SELECTOR,
        columns: tableColumns(specs, config.TABLE_SELECTOR),
        criticalMetrics,
        nextSelector: config.PAGINATION_NEXT_SELECTOR,
        disabledClass: config.PAGINATION_DISABLED_CLASS,
        maxPages: config.BACKFILL_MAX_PAGES,
        settleMs: config.SETTLE_MS,
        capturedAt: clock(),
      });
      logger.info(
        { rows: table.snapshots.length, skippedRows: table.skippedRows, pages: table.pages },
        "Read daily table",
      );
      return { snapshot, history: table.snapshots };
    },
  );

  const backfilled = backfill(store, history, snapshot.date);
  if (backfilled.length > 0) {
    logger.info({ count: backfilled.length, first: backfilled[0], last: backfilled[backfilled.length - 1] }, "Backfilled history");
  }

  const stored = store.write(snapshot);
  logger.info({ date: stored.date, stateHash: stored.stateHash }, "Snapshot committed");

  return { stored, backfilled };
}

/**
 * Write table rows for days the store does not have yet.
 */
function backfill(store: SnapshotStore, history: readonly Snapshot[], skipDate: CalendarDate): CalendarDate[] {
  const written: CalendarDate[] = [];
  for (const snapshot of history) {
    if (snapshot.date === skipDate || store.has(snapshot.date)) continue;
    store.write(snapshot);
    written.push(snapshot.date);
  }
  return written;
}
