/**
 * @lpvault/snapshot-store — In-memory snapshot store.
 *
 * Same contract as FileSnapshotStore, backed by Maps.
 * Suitable for tests and dry runs.
 */

import { isCalendarDate } from "@lpvault/types";
import type { CalendarDate, Snapshot } from "@lpvault/types";
import { computeSnapshotHash } from "./hash.js";
import { StoreError, assertArtifactName } from "./types.js";
import type { ArtifactSink, SnapshotStore, StoredSnapshot } from "./types.js";

export class InMemorySnapshotStore implements SnapshotStore, ArtifactSink {
  /** date → committed snapshot */
  private readonly _partitions = new Map<CalendarDate, StoredSnapshot>();

  /** "date/fileName" → content */
  private readonly _artifacts = new Map<string, string>();

  write(snapshot: Snapshot): StoredSnapshot {
    this._validateDate(snapshot.date);

    const stored: StoredSnapshot = {
      date: snapshot.date,
      snapshot,
      committedAt: new Date().toISOString(),
      stateHash: computeSnapshotHash(snapshot),
    };
    this._partitions.set(snapshot.date, stored);
    return stored;
  }

  read(date: CalendarDate): StoredSnapshot {
    this._validateDate(date);
    const stored = this._partitions.get(date);
    if (stored === undefined) {
      throw new StoreError("NOT_FOUND", `No snapshot committed for ${date}`, date);
    }
    return stored;
  }

  listDates(): readonly CalendarDate[] {
    return [...this._partitions.keys()].sort();
  }

  has(date: CalendarDate): boolean {
    return this._partitions.has(date);
  }

  writeArtifact(date: CalendarDate, fileName: string, content: string): string {
    this._validateDate(date);
    assertArtifactName(date, fileName);
    const key = `${date}/${fileName}`;
    this._artifacts.set(key, content);
    return key;
  }

  /**
   * Content of an artifact written with writeArtifact.
   */
  artifact(date: CalendarDate, fileName: string): string | undefined {
    return this._artifacts.get(`${date}/${fileName}`);
  }

  private _validateDate(date: CalendarDate): void {
    if (!isCalendarDate(date)) {
      throw new StoreError("INVALID_DATE", `Invalid calendar date: "${date}"`);
    }
  }
}
