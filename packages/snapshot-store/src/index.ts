/**
 * @lpvault/snapshot-store — Date-partitioned snapshot persistence.
 *
 * Provides:
 * - SnapshotStore interface (one committed snapshot per calendar day)
 * - FileSnapshotStore with atomic write-then-rename commits
 * - InMemorySnapshotStore for tests and dry runs
 * - HistoryLoader to rebuild the ordered History, skipping bad partitions
 * - Snapshot integrity hashing
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredSnapshot,
  SnapshotStore,
  ArtifactSink,
  StoreErrorCode,
} from "./types.js";
export { StoreError, SNAPSHOT_FILE, assertArtifactName } from "./types.js";

// Hashing
export { computeSnapshotHash, verifySnapshotIntegrity } from "./hash.js";

// Implementations
export { FileSnapshotStore } from "./file-store.js";
export { InMemorySnapshotStore } from "./in-memory-store.js";

// History
export { HistoryLoader } from "./history-loader.js";
export type {
  SkippedPartition,
  HistoryLoadResult,
  HistoryLoaderOptions,
} from "./history-loader.js";
