/**
 * @lpvault/collector — Vault Data Extractor.
 *
 * Turns a rendered dashboard page into a Snapshot.
 *
 * Partial-failure policy:
 * - critical metric missing or unparseable → ExtractionError, no snapshot
 * - other metrics missing or unparseable → null, reported through onIssue
 *
 * The critical set is configuration (default: balance).
 *
 * A snapshot read from the daily table is filed under the date of the
 * row it came from, so each table row maps to exactly one partition.
 */

import { METRIC_NAMES, toCalendarDate } from "@lpvault/types";
import type { CalendarDate, MetricName, Snapshot } from "@lpvault/types";
import { parseMetricValue } from "./parse.js";
import { ExtractionError } from "./types.js";
import type { ExtractionErrorCode, MetricLocator, RenderedPage } from "./types.js";

/** Metrics that abort the run when absent, unless configured otherwise */
export const DEFAULT_CRITICAL_METRICS: readonly MetricName[] = ["balance"];

/**
 * A non-critical metric that degraded to null.
 */
export interface ExtractionIssue {
  readonly metric: MetricName;
  readonly code: Exclude<ExtractionErrorCode, "TABLE_NOT_FOUND">;
  readonly message: string;
  readonly raw?: string;
}

export interface VaultExtractorOptions {
  /** Locators, tried in order when several target the same metric */
  readonly locators: readonly MetricLocator[];

  /** Metrics whose absence aborts extraction */
  readonly criticalMetrics?: readonly MetricName[];

  /** Source of the capture instant */
  readonly clock?: () => Date;

  /** Called for every metric that degraded to null */
  readonly onIssue?: (issue: ExtractionIssue) => void;
}

type MetricReading =
  | { readonly ok: true; readonly value: number; readonly locator: MetricLocator }
  | { readonly ok: false; readonly issue: ExtractionIssue };

export class VaultExtractor {
  private readonly _locators: ReadonlyMap<MetricName, readonly MetricLocator[]>;
  private readonly _critical: ReadonlySet<MetricName>;
  private readonly _clock: () => Date;
  private readonly _onIssue: ((issue: ExtractionIssue) => void) | undefined;

  constructor(options: VaultExtractorOptions) {
    const byMetric = new Map<MetricName, MetricLocator[]>();
    for (const locator of options.locators) {
      const list = byMetric.get(locator.metric) ?? [];
      list.push(locator);
      byMetric.set(locator.metric, list);
    }

    this._locators = byMetric;
    this._critical = new Set(options.criticalMetrics ?? DEFAULT_CRITICAL_METRICS);
    this._clock = options.clock ?? (() => new Date());
    this._onIssue = options.onIssue;
  }

  /**
   * Read every metric from the page.
   *
   * @param date - Partition date. Defaults to the latest day the located
   *   values are dated with (a table row's date), else the UTC day of the
   *   capture instant.
   * @throws {ExtractionError} when a critical metric cannot be read
   */
  async extract(page: RenderedPage, date?: CalendarDate): Promise<Snapshot> {
    const capturedAt = this._clock();

    const metrics: Record<MetricName, number | null> = {
      balance: null,
      totalPnl: null,
      dailyPnl: null,
      sharePrice: null,
      valueUsd: null,
      perpsVolume: null,
      fees: null,
    };

    let asOf: CalendarDate | undefined;

    for (const metric of METRIC_NAMES) {
      const reading = await this._readMetric(page, metric);
      if (reading.ok) {
        metrics[metric] = reading.value;
        const day = await reading.locator.asOf?.(page);
        if (day !== undefined && (asOf === undefined || day > asOf)) {
          asOf = day;
        }
        continue;
      }

      if (this._critical.has(metric)) {
        throw new ExtractionError(
          reading.issue.code,
          `Critical metric ${reading.issue.message}`,
          metric,
          reading.issue.raw,
        );
      }
      this._onIssue?.(reading.issue);
    }

    return {
      date: date ?? asOf ?? toCalendarDate(capturedAt),
      timestamp: capturedAt.toISOString(),
      source: page.url,
      ...metrics,
    };
  }

  private async _readMetric(page: RenderedPage, metric: MetricName): Promise<MetricReading> {
    const locators = this._locators.get(metric) ?? [];
    if (locators.length === 0) {
      return {
        ok: false,
        issue: {
          metric,
          code: "SELECTOR_NOT_FOUND",
          message: `"${metric}" has no locator configured`,
        },
      };
    }

    let unparseable: { readonly raw: string; readonly locator: MetricLocator } | undefined;

    for (const locator of locators) {
      const raw = await locator.locate(page);
      if (raw === undefined) {
        continue;
      }

      const value = parseMetricValue(raw);
      if (value !== null) {
        return { ok: true, value, locator };
      }
      unparseable ??= { raw, locator };
    }

    if (unparseable !== undefined) {
      return {
        ok: false,
        issue: {
          metric,
          code: "UNPARSEABLE_VALUE",
          message: `"${metric}" has unparseable value "${unparseable.raw}" at ${unparseable.locator.description}`,
          raw: unparseable.raw,
        },
      };
    }

    return {
      ok: false,
      issue: {
        metric,
        code: "SELECTOR_NOT_FOUND",
        message: `"${metric}" not found (tried ${locators.map((l) => l.description).join(", ")})`,
      },
    };
  }
}
