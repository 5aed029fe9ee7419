/**
 * Test helpers for @lpvault/cli: a scripted dashboard, a fake browser
 * driver and a log capture.
 */

import type { BrowserDriver, DriverBrowser, DriverPage, TableContent } from "@lpvault/collector";
import type { Snapshot } from "@lpvault/types";
import type { AppConfig } from "../src/config.js";
import { loadConfig } from "../src/config.js";
import { createLogger } from "../src/logger.js";
import type { Logger } from "../src/logger.js";

export const VAULT_URL = "https://vault.example/profile/1";
export const NEXT = "#__next ul div.oxfun-pagination-next";

export interface Dashboard {
  readonly labels: Record<string, string>;
  readonly table: TableContent | undefined;
  /** Rendered when false: goto times out */
  readonly loads?: boolean;
}

export function dashboard(rows: readonly (readonly string[])[], labels: Record<string, string> = {}): Dashboard {
  return {
    labels: { "Total PNL": "5,000 OX", "Share Price": "1.0500", ...labels },
    table: {
      headers: ["Date", "PNL (OX)", "OX Balance", "OX Value (USD)", "OX Perps Volume", "Fees"],
      rows,
    },
  };
}

class ScriptedPage implements DriverPage {
  url = "about:blank";

  constructor(private readonly _dashboard: Dashboard) {}

  async goto(url: string): Promise<boolean> {
    if (this._dashboard.loads === false) return false;
    this.url = url;
    return true;
  }

  async waitFor(): Promise<boolean> {
    return this._dashboard.table !== undefined;
  }

  async text(): Promise<string | undefined> {
    return undefined;
  }

  async textAfterLabel(label: string): Promise<string | undefined> {
    return this._dashboard.labels[label];
  }

  async table(): Promise<TableContent | undefined> {
    return this._dashboard.table;
  }

  async attribute(selector: string, name: string): Promise<string | undefined> {
    // Single page: the next button is always disabled
    return selector === NEXT && name === "class"
      ? "oxfun-pagination-next oxfun-pagination-disabled"
      : undefined;
  }

  async click(): Promise<boolean> {
    return false;
  }

  async settle(): Promise<void> {}
}

export class FakeDriver implements BrowserDriver {
  launches = 0;
  closes = 0;

  constructor(private readonly _dashboard: Dashboard) {}

  async launch(): Promise<DriverBrowser> {
    this.launches++;
    const page = new ScriptedPage(this._dashboard);
    return {
      newPage: async () => page,
      close: async () => {
        this.closes++;
      },
    };
  }
}

export interface LogLine {
  readonly level: number;
  readonly msg: string;
  readonly [key: string]: unknown;
}

/**
 * A debug-level logger whose JSON lines are collected in `lines`.
 */
export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = createLogger({ LOG_LEVEL: "debug", NODE_ENV: "test" }, {
    write(msg: string) {
      lines.push(JSON.parse(msg) as LogLine);
    },
  });
  return { logger, lines };
}

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    VAULT_URL,
    VAULT_NAME: "Test Vault",
    NODE_ENV: "test",
    LOG_LEVEL: "silent",
    SETTLE_MS: "0",
    SESSION_RETRY_BASE_MS: "0",
    ...overrides,
  });
}

export const noopSleep = async (_ms: number): Promise<void> => {};

export function snapshotFor(date: string, overrides: Partial<Snapshot> = {}): Snapshot {
  return {
    date,
    timestamp: `${date}T09:00:00.000Z`,
    source: VAULT_URL,
    balance: 1_000_000,
    totalPnl: 5_000,
    dailyPnl: 100,
    sharePrice: 1.05,
    valueUsd: 20_000,
    perpsVolume: 500_000,
    fees: 10,
    ...overrides,
  };
}
