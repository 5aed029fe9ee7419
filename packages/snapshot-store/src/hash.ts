/**
 * @lpvault/snapshot-store — Snapshot hashing.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { Snapshot } from "@lpvault/types";
import type { StoredSnapshot } from "./types.js";

/**
 * Compute a SHA-256 hash of the canonical JSON representation of a snapshot.
 */
export function computeSnapshotHash(snapshot: Snapshot): string {
  const canonical = canonicalize(snapshot);
  return createHash("sha256").update(canonical).digest("hex");
}

/**
 * Verify that a stored snapshot's stateHash matches its content.
 *
 * @returns true if the hash is valid, false if tampered or missing
 */
export function verifySnapshotIntegrity(stored: StoredSnapshot): boolean {
  if (stored.stateHash === "") {
    return false;
  }
  return stored.stateHash === computeSnapshotHash(stored.snapshot);
}
