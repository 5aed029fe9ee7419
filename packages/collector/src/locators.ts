/**
 * @lpvault/collector — Metric locator strategies.
 *
 * Locators are described declaratively (LocatorSpec) so a layout change
 * on the dashboard is a configuration change:
 *
 * - selector      text of a CSS selector
 * - label         text of the element after an exact label ("Share Price")
 * - table-column  cell of the newest row under a matching header; the
 *                 row's date is the day the value belongs to
 */

import type { CalendarDate, MetricName } from "@lpvault/types";
import { findColumn, newestRow, newestDatedRow } from "./table.js";
import type { MetricLocator, RenderedPage } from "./types.js";

// =============================================================================
// Specs
// =============================================================================

export interface SelectorLocatorSpec {
  readonly metric: MetricName;
  readonly strategy: "selector";
  readonly selector: string;
}

export interface LabelLocatorSpec {
  readonly metric: MetricName;
  readonly strategy: "label";
  readonly label: string;
}

export interface TableColumnLocatorSpec {
  readonly metric: MetricName;
  readonly strategy: "table-column";
  readonly table: string;
  readonly header: string;
}

export type LocatorSpec = SelectorLocatorSpec | LabelLocatorSpec | TableColumnLocatorSpec;

/** Daily performance table on the vault profile page */
export const DEFAULT_TABLE_SELECTOR = "#__next table";

/**
 * Locators for the vault profile page as currently laid out.
 */
export const DEFAULT_LOCATOR_SPECS: readonly LocatorSpec[] = [
  { metric: "balance", strategy: "table-column", table: DEFAULT_TABLE_SELECTOR, header: "OX Balance" },
  { metric: "dailyPnl", strategy: "table-column", table: DEFAULT_TABLE_SELECTOR, header: "PNL (OX)" },
  { metric: "valueUsd", strategy: "table-column", table: DEFAULT_TABLE_SELECTOR, header: "OX Value (USD)" },
  { metric: "perpsVolume", strategy: "table-column", table: DEFAULT_TABLE_SELECTOR, header: "OX Perps Volume" },
  { metric: "fees", strategy: "table-column", table: DEFAULT_TABLE_SELECTOR, header: "Fees" },
  { metric: "totalPnl", strategy: "label", label: "Total PNL" },
  { metric: "sharePrice", strategy: "label", label: "Share Price" },
];

// =============================================================================
// Strategies
// =============================================================================

export class SelectorLocator implements MetricLocator {
  readonly description: string;

  constructor(
    readonly metric: MetricName,
    private readonly _selector: string,
  ) {
    this.description = `selector "${_selector}"`;
  }

  locate(page: RenderedPage): Promise<string | undefined> {
    return page.text(this._selector);
  }
}

export class LabelLocator implements MetricLocator {
  readonly description: string;

  constructor(
    readonly metric: MetricName,
    private readonly _label: string,
  ) {
    this.description = `label "${_label}"`;
  }

  locate(page: RenderedPage): Promise<string | undefined> {
    return page.textAfterLabel(this._label);
  }
}

export class TableColumnLocator implements MetricLocator {
  readonly description: string;

  constructor(
    readonly metric: MetricName,
    private readonly _table: string,
    private readonly _header: string,
  ) {
    this.description = `column "${_header}" of "${_table}"`;
  }

  async locate(page: RenderedPage): Promise<string | undefined> {
    const table = await page.table(this._table);
    if (table === undefined) {
      return undefined;
    }

    const column = findColumn(table.headers, this._header);
    if (column < 0) {
      return undefined;
    }

    return newestRow(table)?.[column];
  }

  async asOf(page: RenderedPage): Promise<CalendarDate | undefined> {
    const table = await page.table(this._table);
    const date = table !== undefined ? newestDatedRow(table)?.date : undefined;
    return date ?? undefined;
  }
}

/**
 * Build locators from specs, preserving order (earlier specs for the
 * same metric are tried first).
 */
export function createLocators(specs: readonly LocatorSpec[]): MetricLocator[] {
  return specs.map((spec) => {
    switch (spec.strategy) {
      case "selector":
        return new SelectorLocator(spec.metric, spec.selector);
      case "label":
        return new LabelLocator(spec.metric, spec.label);
      case "table-column":
        return new TableColumnLocator(spec.metric, spec.table, spec.header);
    }
  });
}

/**
 * Metric → header map of the table-column specs that read `table`.
 */
export function tableColumns(
  specs: readonly LocatorSpec[],
  table: string,
): Partial<Record<MetricName, string>> {
  const columns: Partial<Record<MetricName, string>> = {};
  for (const spec of specs) {
    if (spec.strategy === "table-column" && spec.table === table && columns[spec.metric] === undefined) {
      columns[spec.metric] = spec.header;
    }
  }
  return columns;
}
