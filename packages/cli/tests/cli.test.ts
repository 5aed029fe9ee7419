/**
 * Tests for command dispatch and exit codes.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { InMemorySnapshotStore, StoreError } from "@lpvault/snapshot-store";
import { run } from "../src/cli.js";
import type { RunEnvironment } from "../src/cli.js";
import { createLogger } from "../src/logger.js";
import { FakeDriver, VAULT_URL, dashboard, noopSleep, snapshotFor } from "./helpers.js";
import type { Dashboard } from "./helpers.js";

const rows = [["2024-05-04", "120", "1,000,120", "21,000", "800,000", "15"]];

let store: InMemorySnapshotStore;
let output: string[];

beforeEach(() => {
  store = new InMemorySnapshotStore();
  output = [];
});

function environment(page: Dashboard = dashboard(rows), env: Record<string, string> = {}): RunEnvironment {
  return {
    env: { VAULT_URL, VAULT_NAME: "Test Vault", NODE_ENV: "test", SETTLE_MS: "0", SESSION_RETRY_BASE_MS: "0", ...env },
    createDriver: () => new FakeDriver(page),
    createStore: () => store,
    createLogger: (config) => createLogger({ ...config, LOG_LEVEL: "silent" }),
    clock: () => new Date("2024-05-04T09:00:00.000Z"),
    sleepFn: noopSleep,
    write: (line) => output.push(line),
  };
}

describe("run", () => {
  it("exits 0 and reports a committed snapshot", async () => {
    const code = await run(["collect"], environment());

    expect(code).toBe(0);
    expect(output).toHaveLength(1);
    expect(output[0]).toContain("✓ Snapshot for 2024-05-04 committed");
    expect(store.has("2024-05-04")).toBe(true);
  });

  it("exits 0 and reports the written report", async () => {
    store.write(snapshotFor("2024-05-02"));
    store.write(snapshotFor("2024-05-03"));

    const code = await run(["analyze"], environment());

    expect(code).toBe(0);
    expect(output[0]).toContain("✓ Report for 2024-05-04 written to");
    expect(store.artifact("2024-05-04", "report.html")).toContain("<h1>Test Vault</h1>");
  });

  it("exits 64 on a bad command line", async () => {
    const code = await run(["collect", "--verbose"], environment());

    expect(code).toBe(64);
    expect(output[0]).toContain("✗ config failed [INVALID_ARGUMENTS]");
  });

  it("exits 64 on invalid configuration", async () => {
    const code = await run(["collect"], environment(undefined, { NAVIGATION_TIMEOUT_MS: "-1" }));

    expect(code).toBe(64);
    expect(output[0]).toContain("[INVALID_CONFIG]");
  });

  it("exits 65 when a critical metric cannot be read", async () => {
    const page = dashboard([["2024-05-04", "120", "Loading...", "21,000", "800,000", "15"]]);

    const code = await run(["collect"], environment(page));

    expect(code).toBe(65);
    expect(output[0]).toContain("✗ extraction failed [UNPARSEABLE_VALUE]");
    expect(store.listDates()).toEqual([]);
  });

  it("exits 69 when the page never loads", async () => {
    const code = await run(["collect"], environment({ ...dashboard(rows), loads: false }));

    expect(code).toBe(69);
    expect(output[0]).toContain("✗ session failed [NAVIGATION_TIMEOUT]");
  });

  it("exits 74 when the snapshot cannot be stored", async () => {
    vi.spyOn(store, "write").mockImplementation(() => {
      throw new StoreError("WRITE_FAILED", "disk full", "2024-05-04");
    });

    const code = await run(["collect"], environment());

    expect(code).toBe(74);
    expect(output[0]).toContain("✗ storage failed [WRITE_FAILED]: disk full");
  });
});
