/**
 * @lpvault/snapshot-store — History Loader.
 *
 * Rebuilds the full ordered History from committed partitions.
 *
 * A partition that cannot be read is skipped, reported through `onSkip`,
 * and listed in the result. One bad day never blocks the rest.
 */

import type { CalendarDate, History, Snapshot } from "@lpvault/types";
import { StoreError } from "./types.js";
import type { SnapshotStore, StoreErrorCode } from "./types.js";

/**
 * A partition left out of the loaded History.
 */
export interface SkippedPartition {
  readonly date: CalendarDate;
  readonly code: StoreErrorCode | "UNKNOWN";
  readonly message: string;
}

export interface HistoryLoadResult {
  /** Snapshots in strictly ascending date order */
  readonly history: History;

  /** Partitions that could not be read */
  readonly skipped: readonly SkippedPartition[];
}

export interface HistoryLoaderOptions {
  /** Called once per skipped partition */
  readonly onSkip?: (skipped: SkippedPartition) => void;
}

export class HistoryLoader {
  private readonly _store: SnapshotStore;
  private readonly _onSkip: ((skipped: SkippedPartition) => void) | undefined;

  constructor(store: SnapshotStore, options: HistoryLoaderOptions = {}) {
    this._store = store;
    this._onSkip = options.onSkip;
  }

  load(): HistoryLoadResult {
    // Ordering and uniqueness are enforced here, not assumed from the store
    const dates = [...new Set(this._store.listDates())].sort();

    const history: Snapshot[] = [];
    const skipped: SkippedPartition[] = [];

    for (const date of dates) {
      try {
        history.push(this._store.read(date).snapshot);
      } catch (err: unknown) {
        const entry: SkippedPartition = {
          date,
          code: err instanceof StoreError ? err.code : "UNKNOWN",
          message: err instanceof Error ? err.message : String(err),
        };
        skipped.push(entry);
        this._onSkip?.(entry);
      }
    }

    return { history, skipped };
  }
}
