/**
 * @lpvault/collector — Core types.
 *
 * The extractor never talks to a browser directly. It reads through
 * RenderedPage, a small capability interface that the Playwright adapter
 * implements and tests fake.
 */

import type { CalendarDate, MetricName } from "@lpvault/types";

// =============================================================================
// Rendered Page
// =============================================================================

/**
 * Header and body text of an HTML table.
 */
export interface TableContent {
  readonly headers: readonly string[];
  readonly rows: readonly (readonly string[])[];
}

/**
 * A page that has finished rendering.
 *
 * Every read returns `undefined` when the element is absent, so
 * "not found" stays distinguishable from "found but unparseable".
 */
export interface RenderedPage {
  /** Current page URL */
  readonly url: string;

  /** Trimmed inner text of the first element matching `selector` */
  text(selector: string): Promise<string | undefined>;

  /** Trimmed text of the element right after the one whose text is exactly `label` */
  textAfterLabel(label: string): Promise<string | undefined>;

  /** Headers and rows of the first table matching `selector` */
  table(selector: string): Promise<TableContent | undefined>;

  /** Attribute of the first element matching `selector` */
  attribute(selector: string, name: string): Promise<string | undefined>;

  /** Click the first element matching `selector`; false when absent */
  click(selector: string): Promise<boolean>;

  /** Wait until `selector` is attached; false on timeout */
  waitFor(selector: string, timeoutMs: number): Promise<boolean>;

  /** Give client-side rendering time to catch up */
  settle(ms: number): Promise<void>;
}

// =============================================================================
// Metric Locator
// =============================================================================

/**
 * Finds the raw text of one metric on a rendered page.
 *
 * One strategy per metric; replacing a strategy when the dashboard
 * changes its layout does not affect parsing or storage.
 */
export interface MetricLocator {
  readonly metric: MetricName;

  /** Human-readable description used in errors and logs */
  readonly description: string;

  /** Raw text, or undefined when the element is not on the page */
  locate(page: RenderedPage): Promise<string | undefined>;

  /** Day the located value belongs to, when the page dates it */
  asOf?(page: RenderedPage): Promise<CalendarDate | undefined>;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for browser session operations.
 */
export type SessionErrorCode =
  | "SESSION_START_FAILURE"
  | "NAVIGATION_TIMEOUT"
  | "NAVIGATION_FAILED"
  | "SESSION_NOT_OPEN";

/**
 * Error thrown by the Browser Session Manager.
 */
export class SessionError extends Error {
  constructor(
    public readonly code: SessionErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SessionError";
  }
}

/**
 * Error codes for extraction. "Not found" and "not parseable" are kept
 * apart so selector drift can be told from format drift.
 */
export type ExtractionErrorCode =
  | "SELECTOR_NOT_FOUND"
  | "UNPARSEABLE_VALUE"
  | "TABLE_NOT_FOUND";

/**
 * Error thrown when a critical metric cannot be extracted.
 */
export class ExtractionError extends Error {
  constructor(
    public readonly code: ExtractionErrorCode,
    message: string,
    public readonly metric?: MetricName,
    public readonly raw?: string,
  ) {
    super(message);
    this.name = "ExtractionError";
  }
}
