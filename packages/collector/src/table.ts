/**
 * @lpvault/collector — Table helpers.
 *
 * The dashboard lists one row per day. Columns are found by header text,
 * not position, so reordered columns do not shift values.
 */

import type { CalendarDate } from "@lpvault/types";
import { parseTableDate } from "./parse.js";
import type { TableContent } from "./types.js";

/**
 * Index of the column whose header matches `fragment` (case-insensitive).
 * An exact match wins over a partial one.
 *
 * @returns The column index, or -1
 */
export function findColumn(headers: readonly string[], fragment: string): number {
  const wanted = fragment.trim().toLowerCase();
  const normalised = headers.map((h) => h.trim().toLowerCase());

  const exact = normalised.indexOf(wanted);
  if (exact >= 0) {
    return exact;
  }
  return normalised.findIndex((h) => h.includes(wanted));
}

/**
 * Index of the date column: the first header mentioning "date", else 0.
 */
export function findDateColumn(headers: readonly string[]): number {
  const index = headers.findIndex((h) => h.toLowerCase().includes("date"));
  return index >= 0 ? index : 0;
}

/**
 * A table row together with its parsed date.
 */
export interface DatedRow {
  readonly date: CalendarDate | null;
  readonly cells: readonly string[];
}

/**
 * Rows with their date column parsed.
 */
export function datedRows(table: TableContent): DatedRow[] {
  const dateColumn = findDateColumn(table.headers);
  return table.rows.map((cells) => ({
    date: parseTableDate(cells[dateColumn] ?? ""),
    cells,
  }));
}

/**
 * The dated row with the most recent date.
 */
export function newestDatedRow(table: TableContent): DatedRow | undefined {
  let newest: DatedRow | undefined;
  for (const row of datedRows(table)) {
    if (row.date !== null && (newest === undefined || newest.date === null || row.date > newest.date)) {
      newest = row;
    }
  }
  return newest;
}

/**
 * The row with the most recent date; the first row when no date parses.
 */
export function newestRow(table: TableContent): readonly string[] | undefined {
  return newestDatedRow(table)?.cells ?? table.rows[0];
}
