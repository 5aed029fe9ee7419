/**
 * Tests for the Analytics Engine.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { compute } from "../src/compute.js";
import { balances, series } from "./fixtures.js";

describe("compute", () => {
  it("returns no records for an empty history", () => {
    expect(compute([])).toEqual([]);
  });

  it("returns one record with no period return for a single snapshot", () => {
    const [record, ...rest] = compute(series([{ balance: 1.2, dailyPnl: 15 }]));

    expect(rest).toHaveLength(0);
    expect(record).toEqual({
      date: "2024-05-01",
      value: 1.2,
      periodReturn: null,
      cumulativeReturn: 0,
      periodPnl: 15,
      cumulativePnl: 15,
      drawdown: 0,
      rollingMeanReturn: null,
      rollingVolatility: null,
    });
  });

  describe("returns", () => {
    const records = compute(balances([100, 110, 99]));

    it("computes period returns against the previous snapshot", () => {
      expect(records[0]?.periodReturn).toBeNull();
      expect(records[1]?.periodReturn).toBeCloseTo(0.1, 12);
      expect(records[2]?.periodReturn).toBeCloseTo(-0.1, 12);
    });

    it("compounds cumulative return from the first observation", () => {
      expect(records[0]?.cumulativeReturn).toBe(0);
      expect(records[1]?.cumulativeReturn).toBeCloseTo(0.1, 12);
      expect(records[2]?.cumulativeReturn).toBeCloseTo(-0.01, 12);
    });

    it("measures drawdown from the running peak", () => {
      expect(records[0]?.drawdown).toBe(0);
      expect(records[1]?.drawdown).toBe(0);
      expect(records[2]?.drawdown).toBeCloseTo(0.1, 12);
    });
  });

  it("returns null for a zero denominator and bases on the first non-zero value", () => {
    const records = compute(balances([0, 5, 10]));

    expect(records.map((r) => r.periodReturn)).toEqual([null, null, 1]);
    expect(records.map((r) => r.cumulativeReturn)).toEqual([null, 0, 1]);
    expect(records.map((r) => r.drawdown)).toEqual([null, 0, 0]);
  });

  it("does not bridge a missing value with a period return", () => {
    const records = compute(balances([100, null, 120]));

    expect(records.map((r) => r.periodReturn)).toEqual([null, null, null]);
    expect(records[1]?.cumulativeReturn).toBeNull();
    expect(records[1]?.drawdown).toBeNull();
    expect(records[2]?.cumulativeReturn).toBeCloseTo(0.2, 12);
  });

  it("uses balance as the basis by default", () => {
    const history = series([
      { sharePrice: 1, balance: 200 },
      { sharePrice: 1, balance: 250 },
    ]);

    const records = compute(history);

    expect(records.map((r) => r.value)).toEqual([200, 250]);
    expect(records[1]?.periodReturn).toBe(0.25);
  });

  it("uses share price as the basis when asked", () => {
    const history = series([
      { sharePrice: 1, balance: 200 },
      { sharePrice: 1.25, balance: 200 },
    ]);

    const records = compute(history, { basis: "sharePrice" });

    expect(records.map((r) => r.value)).toEqual([1, 1.25]);
    expect(records[1]?.periodReturn).toBe(0.25);
  });

  it("computes returns on table-only history", () => {
    const records = compute(series([
      { balance: 1_000_020, dailyPnl: 20 },
      { balance: 1_000_000, dailyPnl: -20 },
      { balance: 1_000_120, dailyPnl: 120 },
    ]));

    expect(records.map((r) => r.periodReturn === null)).toEqual([true, false, false]);
    expect(records[2]?.periodReturn).toBeCloseTo(120 / 1_000_000, 12);
    expect(records[2]?.cumulativeReturn).toBeCloseTo(100 / 1_000_020, 12);
    expect(records[1]?.drawdown).toBeCloseTo(20 / 1_000_020, 12);
  });

  describe("PnL", () => {
    it("prefers the daily figure and falls back to the change in total PnL", () => {
      const records = compute(series([
        { dailyPnl: 10, totalPnl: 30 },
        { totalPnl: 50 },
        { dailyPnl: -5, totalPnl: 50 },
      ]));

      expect(records.map((r) => r.periodPnl)).toEqual([10, 20, -5]);
      expect(records.map((r) => r.cumulativePnl)).toEqual([10, 30, 25]);
    });

    it("starts from zero when the first day has no daily figure", () => {
      const records = compute(series([{ totalPnl: 100 }, { totalPnl: 130 }]));

      expect(records.map((r) => r.periodPnl)).toEqual([null, 30]);
      expect(records.map((r) => r.cumulativePnl)).toEqual([0, 30]);
    });

    it("leaves an unknown day blank and keeps summing after it", () => {
      const records = compute(series([
        { dailyPnl: 10 },
        {},
        { dailyPnl: 5 },
        { dailyPnl: 5 },
      ]));

      expect(records.map((r) => r.periodPnl)).toEqual([10, null, 5, 5]);
      expect(records.map((r) => r.cumulativePnl)).toEqual([10, null, 15, 20]);
    });
  });

  describe("rolling statistics", () => {
    it("needs a full window of defined returns", () => {
      const records = compute(balances([100, 110, 99, 108.9]), { window: 3 });

      expect(records.slice(0, 3).map((r) => r.rollingMeanReturn)).toEqual([null, null, null]);
      expect(records[3]?.rollingMeanReturn).toBeCloseTo(0.1 / 3, 10);
      expect(records[3]?.rollingVolatility).toBeCloseTo(0.11547, 5);
    });

    it("is null while a missing return is inside the window", () => {
      const records = compute(balances([100, 110, null, 110, 121, 133.1]), { window: 2 });

      expect(records.map((r) => r.rollingMeanReturn === null)).toEqual([true, true, true, true, true, false]);
    });

    it("rejects a window shorter than two", () => {
      expect(() => compute(balances([1, 2]), { window: 1 })).toThrow(RangeError);
      expect(() => compute(balances([1, 2]), { window: 2.5 })).toThrow(RangeError);
    });
  });
});

// =============================================================================
// Properties
// =============================================================================

const arbPrices = fc.array(fc.double({ min: 0.5, max: 2, noNaN: true }), { minLength: 1, maxLength: 40 });

describe("compute properties", () => {
  it("is deterministic", () => {
    fc.assert(
      fc.property(arbPrices, (values) => {
        const history = balances(values);
        expect(compute(history)).toEqual(compute(history));
      }),
    );
  });

  it("cumulative return equals the compounded period returns", () => {
    fc.assert(
      fc.property(arbPrices, (values) => {
        const records = compute(balances(values));
        let growth = 1;
        for (const record of records.slice(1)) {
          growth *= 1 + (record.periodReturn ?? Number.NaN);
        }
        const last = records[records.length - 1];
        expect(last?.cumulativeReturn).toBeCloseTo(growth - 1, 9);
      }),
    );
  });

  it("drawdown stays within [0, 1)", () => {
    fc.assert(
      fc.property(arbPrices, (values) => {
        for (const record of compute(balances(values))) {
          expect(record.drawdown).toBeGreaterThanOrEqual(0);
          expect(record.drawdown).toBeLessThan(1);
        }
      }),
    );
  });
});
