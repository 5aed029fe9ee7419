/**
 * @lpvault/snapshot-store — File-based snapshot store.
 *
 * Layout:
 *   <baseDir>/<YYYY-MM-DD>/snapshot.json
 *   <baseDir>/<YYYY-MM-DD>/<artifact files>
 *
 * Crash safety:
 * - Every file is written to a uniquely named temporary file in the
 *   partition, fsynced, then renamed over the target
 * - rename(2) within a directory is atomic, so readers see either the
 *   previous commit or the new one
 * - A partition only counts as committed once snapshot.json exists
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  readdirSync,
  renameSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { randomUUID } from "node:crypto";
import { isCalendarDate, isSnapshot } from "@lpvault/types";
import type { CalendarDate, Snapshot } from "@lpvault/types";
import { computeSnapshotHash, verifySnapshotIntegrity } from "./hash.js";
import { SNAPSHOT_FILE, StoreError, assertArtifactName } from "./types.js";
import type { ArtifactSink, SnapshotStore, StoredSnapshot } from "./types.js";

/**
 * File-based snapshot store, one directory per calendar day.
 */
export class FileSnapshotStore implements SnapshotStore, ArtifactSink {
  private readonly _baseDir: string;

  /**
   * The base directory is created on first write, not here, so an
   * unwritable location surfaces as a StoreError from `write`.
   */
  constructor(baseDir: string) {
    this._baseDir = baseDir;
  }

  write(snapshot: Snapshot): StoredSnapshot {
    this._validateDate(snapshot.date);

    const stored: StoredSnapshot = {
      date: snapshot.date,
      snapshot,
      committedAt: new Date().toISOString(),
      stateHash: computeSnapshotHash(snapshot),
    };

    this._atomicWrite(
      snapshot.date,
      SNAPSHOT_FILE,
      JSON.stringify(stored, null, 2) + "\n",
    );
    return stored;
  }

  read(date: CalendarDate): StoredSnapshot {
    this._validateDate(date);

    const filePath = join(this.partitionDir(date), SNAPSHOT_FILE);
    if (!existsSync(filePath)) {
      throw new StoreError("NOT_FOUND", `No snapshot committed for ${date}`, date);
    }

    let content: string;
    try {
      content = readFileSync(filePath, "utf-8");
    } catch (err: unknown) {
      throw new StoreError(
        "READ_FAILED",
        `Cannot read ${filePath}: ${errorMessage(err)}`,
        date,
        { cause: err },
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err: unknown) {
      throw new StoreError(
        "CORRUPT_PARTITION",
        `Snapshot for ${date} is not valid JSON`,
        date,
        { cause: err },
      );
    }

    if (!isStoredSnapshot(parsed)) {
      throw new StoreError(
        "CORRUPT_PARTITION",
        `Snapshot for ${date} does not have the expected shape`,
        date,
      );
    }

    if (parsed.date !== date || parsed.snapshot.date !== date) {
      throw new StoreError(
        "CORRUPT_PARTITION",
        `Partition ${date} holds a snapshot dated ${parsed.snapshot.date}`,
        date,
      );
    }

    if (!verifySnapshotIntegrity(parsed)) {
      throw new StoreError(
        "INTEGRITY_MISMATCH",
        `Snapshot for ${date} does not match its stateHash`,
        date,
      );
    }

    return parsed;
  }

  listDates(): readonly CalendarDate[] {
    if (!existsSync(this._baseDir)) {
      return [];
    }

    const dates: CalendarDate[] = [];
    for (const entry of readdirSync(this._baseDir, { withFileTypes: true })) {
      if (
        entry.isDirectory() &&
        isCalendarDate(entry.name) &&
        existsSync(join(this._baseDir, entry.name, SNAPSHOT_FILE))
      ) {
        dates.push(entry.name);
      }
    }

    // YYYY-MM-DD sorts chronologically as a string
    return dates.sort();
  }

  has(date: CalendarDate): boolean {
    if (!isCalendarDate(date)) {
      return false;
    }
    return existsSync(join(this.partitionDir(date), SNAPSHOT_FILE));
  }

  writeArtifact(date: CalendarDate, fileName: string, content: string): string {
    this._validateDate(date);
    assertArtifactName(date, fileName);
    return this._atomicWrite(date, fileName, content);
  }

  /** Directory holding one date's files */
  partitionDir(date: CalendarDate): string {
    return join(this._baseDir, date);
  }

  /** Get the base directory for this store */
  get baseDir(): string {
    return this._baseDir;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateDate(date: CalendarDate): void {
    if (!isCalendarDate(date)) {
      throw new StoreError("INVALID_DATE", `Invalid calendar date: "${date}"`);
    }
  }

  private _atomicWrite(date: CalendarDate, fileName: string, content: string): string {
    const dir = this.partitionDir(date);
    const target = join(dir, fileName);
    const temp = join(dir, `.${fileName}.${randomUUID()}.tmp`);

    try {
      mkdirSync(dir, { recursive: true });
      const fd = openSync(temp, "w");
      try {
        writeFileSync(fd, content, "utf-8");
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }
      renameSync(temp, target);
    } catch (err: unknown) {
      rmSync(temp, { force: true });
      throw new StoreError(
        "WRITE_FAILED",
        `Cannot write ${target}: ${errorMessage(err)}`,
        date,
        { cause: err },
      );
    }

    return target;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isStoredSnapshot(value: unknown): value is StoredSnapshot {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.date === "string" &&
    typeof v.committedAt === "string" &&
    typeof v.stateHash === "string" &&
    isSnapshot(v.snapshot)
  );
}
