/**
 * Tests for paginated table backfill.
 */

import { describe, it, expect } from "vitest";
import { extractTableHistory } from "../src/table-history.js";
import type { TableHistoryOptions } from "../src/table-history.js";
import { DEFAULT_LOCATOR_SPECS, DEFAULT_TABLE_SELECTOR, tableColumns } from "../src/locators.js";
import { ExtractionError } from "../src/types.js";
import type { TableContent } from "../src/types.js";
import { FakePage, vaultTable } from "./fake-page.js";

const NEXT = "#__next ul div.oxfun-pagination-next";
const DISABLED = "oxfun-pagination-disabled";
const CAPTURED_AT = new Date("2024-05-07T08:00:00.000Z");

function row(date: string, pnl: string, balance: string): string[] {
  return [date, pnl, balance, "20,000", "500,000", "12"];
}

/** A dashboard whose next button walks through `pages` */
function paginated(pages: readonly TableContent[]): FakePage {
  const page = new FakePage();
  page.url = "https://vault.test/profile/1";
  let index = 0;

  const render = () => {
    const table = pages[index];
    const last = index === pages.length - 1;
    page.content = {
      ...(table !== undefined ? { tables: { [DEFAULT_TABLE_SELECTOR]: table } } : {}),
      attributes: { [NEXT]: { class: last ? `oxfun-pagination-next ${DISABLED}` : "oxfun-pagination-next" } },
    };
  };
  render();

  page.onClick = (selector) => {
    if (selector !== NEXT || index >= pages.length - 1) return false;
    index++;
    render();
    return true;
  };
  return page;
}

function options(overrides: Partial<TableHistoryOptions> = {}): TableHistoryOptions {
  return {
    table: DEFAULT_TABLE_SELECTOR,
    columns: tableColumns(DEFAULT_LOCATOR_SPECS, DEFAULT_TABLE_SELECTOR),
    criticalMetrics: ["balance"],
    nextSelector: NEXT,
    disabledClass: DISABLED,
    maxPages: 100,
    settleMs: 0,
    capturedAt: CAPTURED_AT,
    ...overrides,
  };
}

const threePages = [
  vaultTable([row("2024-05-06", "60", "1,060"), row("2024-05-05", "50", "1,000")]),
  vaultTable([row("2024-05-04", "-40", "950"), row("2024-05-03", "30", "990")]),
  vaultTable([row("2024-05-02", "20", "960"), row("2024-05-01", "10", "940")]),
];

describe("extractTableHistory", () => {
  it("walks every page and returns snapshots oldest first", async () => {
    const page = paginated(threePages);

    const result = await extractTableHistory(page, options());

    expect(result.pages).toBe(3);
    expect(result.skippedRows).toBe(0);
    expect(result.snapshots.map((s) => s.date)).toEqual([
      "2024-05-01",
      "2024-05-02",
      "2024-05-03",
      "2024-05-04",
      "2024-05-05",
      "2024-05-06",
    ]);
    expect(result.snapshots[0]).toEqual({
      date: "2024-05-01",
      timestamp: "2024-05-07T08:00:00.000Z",
      source: "https://vault.test/profile/1",
      balance: 940,
      totalPnl: null,
      dailyPnl: 10,
      sharePrice: null,
      valueUsd: 20_000,
      perpsVolume: 500_000,
      fees: 12,
    });
    expect(page.clicks).toEqual([NEXT, NEXT]);
  });

  it("stops at maxPages", async () => {
    const result = await extractTableHistory(paginated(threePages), options({ maxPages: 2 }));

    expect(result.pages).toBe(2);
    expect(result.snapshots).toHaveLength(4);
  });

  it("stops when a click leaves the page unchanged", async () => {
    const page = paginated(threePages.slice(0, 1));
    page.content = { ...page.content, attributes: { [NEXT]: { class: "oxfun-pagination-next" } } };
    page.onClick = () => true;

    const result = await extractTableHistory(page, options());

    expect(result.pages).toBe(2);
    expect(result.snapshots.map((s) => s.date)).toEqual(["2024-05-05", "2024-05-06"]);
  });

  it("stops when the next button cannot be clicked", async () => {
    const page = paginated(threePages);
    page.onClick = () => false;

    const result = await extractTableHistory(page, options());

    expect(result.pages).toBe(1);
    expect(result.snapshots).toHaveLength(2);
  });

  it("skips rows without a date or critical metric", async () => {
    const page = paginated([
      vaultTable([row("2024-05-02", "20", "960"), row("Total", "30", "1,900"), row("2024-05-01", "10", "-")]),
    ]);

    const result = await extractTableHistory(page, options());

    expect(result.skippedRows).toBe(2);
    expect(result.snapshots.map((s) => s.date)).toEqual(["2024-05-02"]);
  });

  it("keeps the first row seen for a repeated date", async () => {
    const page = paginated([
      vaultTable([row("2024-05-02", "20", "100")]),
      vaultTable([row("2024-05-02", "20", "200"), row("2024-05-01", "10", "90")]),
    ]);

    const result = await extractTableHistory(page, options());

    expect(result.snapshots.map((s) => [s.date, s.balance])).toEqual([
      ["2024-05-01", 90],
      ["2024-05-02", 100],
    ]);
  });

  it("fails with TABLE_NOT_FOUND when the first page has no table", async () => {
    const err = await extractTableHistory(new FakePage(), options()).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ExtractionError);
    expect(err).toMatchObject({ code: "TABLE_NOT_FOUND" });
  });
});
