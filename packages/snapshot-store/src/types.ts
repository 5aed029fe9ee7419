/**
 * @lpvault/snapshot-store — Core types.
 *
 * Design principles:
 * - One partition per calendar day, holding at most one committed snapshot
 * - Writing the same date again replaces the earlier commit
 * - Readers never observe a half-written partition
 * - Every stored snapshot carries a stateHash for integrity verification
 */

import type { CalendarDate, Snapshot } from "@lpvault/types";

// =============================================================================
// Stored Snapshot
// =============================================================================

/**
 * A snapshot as committed to its partition.
 */
export interface StoredSnapshot {
  /** Partition key (always equal to snapshot.date) */
  readonly date: CalendarDate;

  /** The observation */
  readonly snapshot: Snapshot;

  /** When this commit happened (store-level, not capture time) */
  readonly committedAt: string;

  /** SHA-256 of the canonical snapshot JSON */
  readonly stateHash: string;
}

// =============================================================================
// Store
// =============================================================================

/**
 * Date-partitioned snapshot repository.
 */
export interface SnapshotStore {
  /**
   * Commit a snapshot to the partition for `snapshot.date`.
   *
   * Overwrites any earlier commit for the same date.
   *
   * @throws {StoreError} WRITE_FAILED if the partition cannot be written
   */
  write(snapshot: Snapshot): StoredSnapshot;

  /**
   * Read the committed snapshot for a date.
   *
   * @throws {StoreError} NOT_FOUND, READ_FAILED, CORRUPT_PARTITION or INTEGRITY_MISMATCH
   */
  read(date: CalendarDate): StoredSnapshot;

  /**
   * Dates with a committed snapshot, ascending.
   */
  listDates(): readonly CalendarDate[];

  /**
   * Check whether a date has a committed snapshot.
   */
  has(date: CalendarDate): boolean;
}

/**
 * Destination for per-date output files (reports).
 */
export interface ArtifactSink {
  /**
   * Atomically write a file into the partition for `date`.
   *
   * @returns Where the artifact now lives
   */
  writeArtifact(date: CalendarDate, fileName: string, content: string): string;
}

/** File holding a partition's committed snapshot */
export const SNAPSHOT_FILE = "snapshot.json";

const ARTIFACT_NAME = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

/**
 * Reject artifact names that leave the partition or replace its snapshot.
 *
 * @throws {StoreError} INVALID_ARTIFACT_NAME
 */
export function assertArtifactName(date: CalendarDate, fileName: string): void {
  if (!ARTIFACT_NAME.test(fileName) || fileName === SNAPSHOT_FILE) {
    throw new StoreError(
      "INVALID_ARTIFACT_NAME",
      `Invalid artifact file name: "${fileName}"`,
      date,
    );
  }
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for SnapshotStore operations.
 */
export type StoreErrorCode =
  | "WRITE_FAILED"
  | "READ_FAILED"
  | "NOT_FOUND"
  | "CORRUPT_PARTITION"
  | "INTEGRITY_MISMATCH"
  | "INVALID_DATE"
  | "INVALID_ARTIFACT_NAME";

/**
 * Error thrown by SnapshotStore operations.
 */
export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    public readonly date?: CalendarDate,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StoreError";
  }
}
