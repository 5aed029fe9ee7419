/**
 * @lpvault/collector — Browser Session Manager.
 *
 * Owns one headless browser for the duration of a collection run:
 * launch, navigate and wait for the dashboard to render, hand the page
 * to the caller, and always close, even when the caller throws.
 *
 * Only session start and navigation are retried. Extraction failures
 * are deterministic and are never retried.
 */

import { retrySession } from "./retry.js";
import type { RetryListener, RetryPolicy } from "./retry.js";
import { SessionError } from "./types.js";
import type { RenderedPage } from "./types.js";

// =============================================================================
// Driver Interfaces
// =============================================================================

/**
 * A page that can also navigate.
 */
export interface DriverPage extends RenderedPage {
  /**
   * Load `url` and wait for the DOM.
   *
   * @returns false when `timeoutMs` elapsed first
   */
  goto(url: string, timeoutMs: number): Promise<boolean>;
}

export interface DriverBrowser {
  newPage(): Promise<DriverPage>;
  close(): Promise<void>;
}

/**
 * Launches browsers. The Playwright adapter is the production driver.
 */
export interface BrowserDriver {
  launch(): Promise<DriverBrowser>;
}

// =============================================================================
// Session
// =============================================================================

export interface SessionOptions {
  /** Budget for goto plus the ready wait. Default: 30000 */
  readonly navigationTimeoutMs?: number;

  /** Element whose presence means the dashboard has rendered */
  readonly readySelector: string;

  /** Cookie-consent button, clicked if present */
  readonly consentSelector?: string;

  /** Pause after navigation for client-side rendering. Default: 0 */
  readonly settleMs?: number;

  /** Non-fatal problems: consent click failures, close failures */
  readonly onWarning?: (message: string, err?: unknown) => void;

  /** Time source for the navigation deadline */
  readonly now?: () => number;
}

export class BrowserSession {
  private _browser: DriverBrowser | undefined;
  private _page: DriverPage | undefined;
  private readonly _timeoutMs: number;
  private readonly _now: () => number;

  constructor(
    private readonly _driver: BrowserDriver,
    private readonly _options: SessionOptions,
  ) {
    this._timeoutMs = _options.navigationTimeoutMs ?? 30_000;
    this._now = _options.now ?? Date.now;
  }

  get isOpen(): boolean {
    return this._browser !== undefined;
  }

  /**
   * Launch the browser and open a page.
   *
   * @throws {SessionError} SESSION_START_FAILURE
   */
  async open(): Promise<void> {
    if (this._browser !== undefined) {
      return;
    }

    let browser: DriverBrowser;
    try {
      browser = await this._driver.launch();
    } catch (err: unknown) {
      throw new SessionError(
        "SESSION_START_FAILURE",
        `Browser failed to launch: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    this._browser = browser;

    try {
      this._page = await browser.newPage();
    } catch (err: unknown) {
      await this.close();
      throw new SessionError(
        "SESSION_START_FAILURE",
        `Browser failed to open a page: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  /**
   * Navigate to `url` and wait until the dashboard has rendered.
   *
   * One deadline covers both the page load and the ready wait.
   *
   * @throws {SessionError} NAVIGATION_TIMEOUT, NAVIGATION_FAILED, SESSION_NOT_OPEN
   */
  async navigate(url: string): Promise<RenderedPage> {
    const page = this._page;
    if (page === undefined) {
      throw new SessionError("SESSION_NOT_OPEN", "navigate() called before open()");
    }

    const deadline = this._now() + this._timeoutMs;

    let loaded: boolean;
    try {
      loaded = await page.goto(url, this._timeoutMs);
    } catch (err: unknown) {
      throw new SessionError(
        "NAVIGATION_FAILED",
        `Navigation to ${url} failed: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    if (!loaded) {
      throw new SessionError(
        "NAVIGATION_TIMEOUT",
        `${url} did not load within ${this._timeoutMs}ms`,
      );
    }

    const remaining = Math.max(0, deadline - this._now());
    if (!(await page.waitFor(this._options.readySelector, remaining))) {
      throw new SessionError(
        "NAVIGATION_TIMEOUT",
        `"${this._options.readySelector}" did not appear within ${this._timeoutMs}ms of loading ${url}`,
      );
    }

    await this._dismissConsent(page);

    if (this._options.settleMs !== undefined && this._options.settleMs > 0) {
      await page.settle(this._options.settleMs);
    }

    return page;
  }

  /**
   * Close the browser. Safe to call more than once; close errors are
   * reported as warnings and never thrown.
   */
  async close(): Promise<void> {
    const browser = this._browser;
    this._browser = undefined;
    this._page = undefined;
    if (browser === undefined) {
      return;
    }

    try {
      await browser.close();
    } catch (err: unknown) {
      this._options.onWarning?.(`Browser close failed: ${errorMessage(err)}`, err);
    }
  }

  private async _dismissConsent(page: DriverPage): Promise<void> {
    const selector = this._options.consentSelector;
    if (selector === undefined) {
      return;
    }

    try {
      await page.click(selector);
    } catch (err: unknown) {
      this._options.onWarning?.(`Consent dismissal failed: ${errorMessage(err)}`, err);
    }
  }
}

// =============================================================================
// Scoped Session
// =============================================================================

export interface ScopedSessionOptions extends SessionOptions {
  readonly url: string;
  readonly retry?: RetryPolicy;
  readonly sleepFn?: (ms: number) => Promise<void>;
  readonly onRetry?: RetryListener;
}

/**
 * Open a session, navigate to `options.url`, run `fn` on the rendered
 * page, and close the browser on every path.
 *
 * Each attempt gets a fresh browser. `fn` runs once.
 *
 * @throws {RetryExhaustedError} when every open/navigate attempt failed transiently
 */
export async function withBrowserSession<T>(
  driver: BrowserDriver,
  options: ScopedSessionOptions,
  fn: (page: RenderedPage) => Promise<T>,
): Promise<T> {
  const session = new BrowserSession(driver, options);

  try {
    const page = await retrySession(
      async () => {
        try {
          await session.open();
          return await session.navigate(options.url);
        } catch (err: unknown) {
          await session.close();
          throw err;
        }
      },
      {
        ...(options.retry !== undefined ? { policy: options.retry } : {}),
        ...(options.sleepFn !== undefined ? { sleep: options.sleepFn } : {}),
        ...(options.onRetry !== undefined ? { onRetry: options.onRetry } : {}),
      },
    );

    return await fn(page);
  } finally {
    await session.close();
  }
}

// ─── Internal ────────────────────────────────────────────────────────────

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
