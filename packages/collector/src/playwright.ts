/**
 * @lpvault/collector — Playwright driver.
 *
 * Production BrowserDriver on playwright-core. playwright-core ships no
 * browser binaries: point `executablePath` at an installed Chromium, or
 * leave it unset to use one Playwright has already installed.
 */

import { chromium, errors } from "playwright-core";
import type { Browser, Locator, Page } from "playwright-core";
import type { BrowserDriver, DriverBrowser, DriverPage } from "./browser-session.js";
import type { TableContent } from "./types.js";

export interface PlaywrightDriverOptions {
  readonly executablePath?: string;
  readonly headless?: boolean;

  /** Timeout for single reads and clicks. Default: 5000 */
  readonly actionTimeoutMs?: number;
}

export function playwrightDriver(options: PlaywrightDriverOptions = {}): BrowserDriver {
  const actionTimeoutMs = options.actionTimeoutMs ?? 5_000;

  return {
    async launch(): Promise<DriverBrowser> {
      const browser = await chromium.launch({
        headless: options.headless ?? true,
        ...(options.executablePath !== undefined ? { executablePath: options.executablePath } : {}),
      });
      return new PlaywrightBrowser(browser, actionTimeoutMs);
    },
  };
}

class PlaywrightBrowser implements DriverBrowser {
  constructor(
    private readonly _browser: Browser,
    private readonly _actionTimeoutMs: number,
  ) {}

  async newPage(): Promise<DriverPage> {
    const page = await this._browser.newPage();
    return new PlaywrightPage(page, this._actionTimeoutMs);
  }

  close(): Promise<void> {
    return this._browser.close();
  }
}

class PlaywrightPage implements DriverPage {
  constructor(
    private readonly _page: Page,
    private readonly _actionTimeoutMs: number,
  ) {}

  get url(): string {
    return this._page.url();
  }

  async goto(url: string, timeoutMs: number): Promise<boolean> {
    try {
      await this._page.goto(url, { timeout: timeoutMs, waitUntil: "domcontentloaded" });
      return true;
    } catch (err: unknown) {
      if (err instanceof errors.TimeoutError) {
        return false;
      }
      throw err;
    }
  }

  async waitFor(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      // Playwright reads 0 as "no timeout"
      await this._page.waitForSelector(selector, { state: "attached", timeout: Math.max(1, timeoutMs) });
      return true;
    } catch (err: unknown) {
      if (err instanceof errors.TimeoutError) {
        return false;
      }
      throw err;
    }
  }

  text(selector: string): Promise<string | undefined> {
    return this._innerText(this._page.locator(selector).first());
  }

  textAfterLabel(label: string): Promise<string | undefined> {
    const value = this._page
      .getByText(label, { exact: true })
      .first()
      .locator("xpath=following-sibling::*[1]");
    return this._innerText(value);
  }

  async table(selector: string): Promise<TableContent | undefined> {
    const table = this._page.locator(selector).first();
    if ((await table.count()) === 0) {
      return undefined;
    }

    let headers = await table.locator("thead th").allInnerTexts();
    if (headers.length === 0) {
      headers = await table.locator("tr").first().locator("th").allInnerTexts();
    }

    const rows: string[][] = [];
    for (const row of await table.locator("tbody tr").all()) {
      const cells = await row.locator("td").allInnerTexts();
      if (cells.length > 0) {
        rows.push(cells.map((c) => c.trim()));
      }
    }

    return { headers: headers.map((h) => h.trim()), rows };
  }

  async attribute(selector: string, name: string): Promise<string | undefined> {
    const element = this._page.locator(selector).first();
    if ((await element.count()) === 0) {
      return undefined;
    }
    return (await element.getAttribute(name, { timeout: this._actionTimeoutMs })) ?? undefined;
  }

  async click(selector: string): Promise<boolean> {
    const element = this._page.locator(selector).first();
    if ((await element.count()) === 0) {
      return false;
    }

    try {
      await element.click({ timeout: this._actionTimeoutMs });
      return true;
    } catch (err: unknown) {
      if (err instanceof errors.TimeoutError) {
        return false;
      }
      throw err;
    }
  }

  settle(ms: number): Promise<void> {
    return this._page.waitForTimeout(ms);
  }

  private async _innerText(locator: Locator): Promise<string | undefined> {
    if ((await locator.count()) === 0) {
      return undefined;
    }
    return (await locator.innerText({ timeout: this._actionTimeoutMs })).trim();
  }
}
