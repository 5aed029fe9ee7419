/**
 * Tests for InMemorySnapshotStore and FileSnapshotStore.
 *
 * Verifies:
 * - Write and read snapshots
 * - Same-day overwrite (idempotent re-runs)
 * - Ascending listDates regardless of write order
 * - Date validation
 * - File persistence across store instances
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { FileSnapshotStore } from "../src/file-store.js";
import { InMemorySnapshotStore } from "../src/in-memory-store.js";
import { SNAPSHOT_FILE, StoreError } from "../src/types.js";
import type { ArtifactSink, SnapshotStore } from "../src/types.js";
import { makeSnapshot } from "./fixtures.js";

// =============================================================================
// Shared test suite that runs against both implementations
// =============================================================================

function runSharedTests(createStore: () => SnapshotStore & ArtifactSink) {
  describe("artifacts", () => {
    it("rejects names that escape the partition or replace the snapshot", () => {
      const store = createStore();

      for (const name of ["../report.html", "nested/report.html", ".hidden", SNAPSHOT_FILE]) {
        expect(() => store.writeArtifact("2024-05-01", name, "")).toThrow(
          expect.objectContaining({ code: "INVALID_ARTIFACT_NAME", date: "2024-05-01" }),
        );
      }
      expect(store.has("2024-05-01")).toBe(false);
    });
  });

  describe("write and read", () => {
    it("writes and reads a snapshot", () => {
      const store = createStore();
      const snapshot = makeSnapshot("2024-05-01");
      store.write(snapshot);

      const stored = store.read("2024-05-01");

      expect(stored.date).toBe("2024-05-01");
      expect(stored.snapshot).toEqual(snapshot);
      expect(stored.stateHash).toMatch(/^[0-9a-f]{64}$/);
      expect(stored.committedAt).toBeTruthy();
    });

    it("throws NOT_FOUND for a date without a commit", () => {
      const store = createStore();

      expect(() => store.read("2024-05-01")).toThrow(StoreError);
      try {
        store.read("2024-05-01");
      } catch (err) {
        expect((err as StoreError).code).toBe("NOT_FOUND");
      }
    });

    it("rejects invalid dates", () => {
      const store = createStore();

      expect(() => store.write(makeSnapshot("2024-02-30"))).toThrow(
        "Invalid calendar date",
      );
      expect(() => store.read("05/01/2024")).toThrow("Invalid calendar date");
    });
  });

  describe("same-day overwrite", () => {
    it("keeps exactly one partition equal to the second write", () => {
      const store = createStore();
      store.write(makeSnapshot("2024-05-01", { balance: 100 }));
      store.write(makeSnapshot("2024-05-01", { balance: 200 }));

      expect(store.listDates()).toEqual(["2024-05-01"]);
      expect(store.read("2024-05-01").snapshot.balance).toBe(200);
    });
  });

  describe("listDates", () => {
    it("returns an empty list for an empty store", () => {
      expect(createStore().listDates()).toEqual([]);
    });

    it("lists dates ascending regardless of write order", () => {
      const store = createStore();
      store.write(makeSnapshot("2024-05-03"));
      store.write(makeSnapshot("2023-12-31"));
      store.write(makeSnapshot("2024-05-01"));

      expect(store.listDates()).toEqual(["2023-12-31", "2024-05-01", "2024-05-03"]);
    });
  });

  describe("has", () => {
    it("reports committed dates only", () => {
      const store = createStore();
      store.write(makeSnapshot("2024-05-01"));

      expect(store.has("2024-05-01")).toBe(true);
      expect(store.has("2024-05-02")).toBe(false);
    });
  });
}

// =============================================================================
// Run shared tests against both implementations
// =============================================================================

describe("InMemorySnapshotStore", () => {
  runSharedTests(() => new InMemorySnapshotStore());

  it("keeps artifacts per date", () => {
    const store = new InMemorySnapshotStore();
    store.writeArtifact("2024-05-01", "report.html", "<html></html>");

    expect(store.artifact("2024-05-01", "report.html")).toBe("<html></html>");
    expect(store.artifact("2024-05-02", "report.html")).toBeUndefined();
  });
});

describe("FileSnapshotStore", () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), "lpvault-store-"));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  runSharedTests(() => new FileSnapshotStore(join(testDir, "history")));

  it("persists across store instances", () => {
    const baseDir = join(testDir, "history");
    new FileSnapshotStore(baseDir).write(makeSnapshot("2024-05-01", { fees: 12 }));

    const reopened = new FileSnapshotStore(baseDir);

    expect(reopened.listDates()).toEqual(["2024-05-01"]);
    expect(reopened.read("2024-05-01").snapshot.fees).toBe(12);
  });
});
