/**
 * History fixtures for analytics tests.
 */

import type { History, Snapshot, VaultMetrics } from "@lpvault/types";

const DAY_MS = 24 * 60 * 60 * 1000;

export function snap(date: string, metrics: Partial<VaultMetrics> = {}): Snapshot {
  return {
    date,
    timestamp: `${date}T00:05:00.000Z`,
    source: "https://vault.example/profile/1",
    balance: null,
    totalPnl: null,
    dailyPnl: null,
    sharePrice: null,
    valueUsd: null,
    perpsVolume: null,
    fees: null,
    ...metrics,
  };
}

/** Consecutive days from 2024-05-01, one snapshot per metrics entry */
export function series(metrics: readonly Partial<VaultMetrics>[]): History {
  const start = Date.parse("2024-05-01T00:00:00.000Z");
  return metrics.map((m, i) => snap(new Date(start + i * DAY_MS).toISOString().slice(0, 10), m));
}

/** Balance-only history */
export function balances(values: readonly (number | null)[]): History {
  return series(values.map((balance) => ({ balance })));
}
