/**
 * @lpvault/collector
 *
 * Browser session management and vault metric extraction.
 */

// Types
export type {
  TableContent,
  RenderedPage,
  MetricLocator,
  SessionErrorCode,
  ExtractionErrorCode,
} from "./types.js";
export { SessionError, ExtractionError } from "./types.js";

// Parsing
export { parseMetricValue, parseTableDate } from "./parse.js";
export { findColumn, findDateColumn, datedRows, newestRow, newestDatedRow } from "./table.js";
export type { DatedRow } from "./table.js";

// Locators
export type {
  LocatorSpec,
  SelectorLocatorSpec,
  LabelLocatorSpec,
  TableColumnLocatorSpec,
} from "./locators.js";
export {
  DEFAULT_TABLE_SELECTOR,
  DEFAULT_LOCATOR_SPECS,
  SelectorLocator,
  LabelLocator,
  TableColumnLocator,
  createLocators,
  tableColumns,
} from "./locators.js";

// Extraction
export { VaultExtractor, DEFAULT_CRITICAL_METRICS } from "./extractor.js";
export type { VaultExtractorOptions, ExtractionIssue } from "./extractor.js";
export { extractTableHistory } from "./table-history.js";
export type { TableHistoryOptions, TableHistoryResult } from "./table-history.js";

// Session
export { BrowserSession, withBrowserSession } from "./browser-session.js";
export type {
  BrowserDriver,
  DriverBrowser,
  DriverPage,
  SessionOptions,
  ScopedSessionOptions,
} from "./browser-session.js";
export { playwrightDriver } from "./playwright.js";
export type { PlaywrightDriverOptions } from "./playwright.js";

// Retry
export {
  retrySession,
  backoffDelay,
  isTransientSessionError,
  RetryExhaustedError,
  DEFAULT_RETRY_POLICY,
} from "./retry.js";
export type { RetryListener, RetryOptions, RetryPolicy } from "./retry.js";
