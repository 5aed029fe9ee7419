/**
 * Snapshot fixtures shared by the store tests.
 */

import type { Snapshot } from "@lpvault/types";

export function makeSnapshot(date: string, overrides: Partial<Snapshot> = {}): Snapshot {
  return {
    date,
    timestamp: `${date}T00:05:00.000Z`,
    source: "https://vault.example/profile/1",
    balance: 1000000,
    totalPnl: 5000,
    dailyPnl: 250,
    sharePrice: 1.05,
    valueUsd: 20000,
    perpsVolume: 750000,
    fees: 40,
    ...overrides,
  };
}

/**
 * `count` consecutive days starting at `start`.
 */
export function consecutiveDates(start: string, count: number): string[] {
  const first = new Date(`${start}T00:00:00.000Z`).getTime();
  const dayMs = 24 * 60 * 60 * 1000;
  return Array.from({ length: count }, (_, i) =>
    new Date(first + i * dayMs).toISOString().slice(0, 10),
  );
}
