import { describe, it, expect } from "vitest";
import {
  buildTimeseries,
  computeAnalytics,
  computeHourlyBreakdown,
  drawdownSeries,
  histogram,
  DURATION_BUCKETS,
  PROFIT_BUCKETS,
} from "../src/services/analytics";
import type { Trade } from "../src/types/trade";
import { makeTrade } from "./helpers";

// deliberately out of chronological order
const scenario = (): Trade[] => [
  makeTrade({ id: 4, symbol: "GBPUSD", openTime: "2025-02-03T10:00:00", profitUsd: -50, duration: 600 }),
  makeTrade({ id: 1, openTime: "2025-01-06T09:00:00", profitUsd: 100, duration: 20 }),
  makeTrade({ id: 5, openTime: "2025-02-04T09:15:00", profitUsd: 0, duration: 2000 }),
  makeTrade({ id: 3, symbol: "GBPUSD", openTime: "2025-01-07T09:30:00", profitUsd: 200, duration: 130 }),
  makeTrade({ id: 2, openTime: "2025-01-06T14:00:00", profitUsd: -50, duration: 45 }),
];

const series = (profits: number[]): Trade[] =>
  profits.map((profitUsd, i) =>
    makeTrade({ id: i + 1, openTime: `2025-03-01T${String(i).padStart(2, "0")}:00:00`, profitUsd })
  );

describe("computeAnalytics", () => {
  const a = computeAnalytics(scenario());

  it("counts outcomes", () => {
    expect(a.totalTrades).toBe(5);
    expect(a.winningTrades).toBe(2);
    expect(a.losingTrades).toBe(2);
    expect(a.breakEven).toBe(1);
    expect(a.winRate).toBe(40);
  });

  it("computes profit ratios", () => {
    expect(a.totalProfit).toBe(200);
    expect(a.averageProfit).toBe(40);
    expect(a.profitFactor).toBe(3);
    expect(a.payoffRatio).toBe(3);
    expect(a.totalProfitPct).toBeCloseTo(0.1, 10);
  });

  it("walks the equity curve in open-time order", () => {
    expect(a.equityDates).toEqual([
      "2025-01-06T09:00:00",
      "2025-01-06T14:00:00",
      "2025-01-07T09:30:00",
      "2025-02-03T10:00:00",
      "2025-02-04T09:15:00",
    ]);
    expect(a.equityCurve).toEqual([100, 50, 250, 200, 200]);
    expect(a.drawdownCurve).toEqual([0, -50, 0, -50, -50]);
    expect(a.maxDrawdown).toBe(-50);
    expect(a.maxDrawdownPct).toBe(-20);
    expect(a.currentDrawdown).toBe(-50);
  });

  it("tracks streaks and the latest trade sign", () => {
    expect(a.longestWinStreak).toBe(1);
    expect(a.longestLossStreak).toBe(1);
    expect(a.currentStreak).toBe(0);
  });

  it("finds the best and worst day and the best hour", () => {
    expect(a.bestDay).toBe("2025-01-07");
    expect(a.bestDayProfit).toBe(200);
    expect(a.worstDay).toBe("2025-02-03");
    expect(a.worstDayProfit).toBe(-50);
    expect(a.bestHour).toBe(9);
    expect(a.bestHourProfit).toBe(100);
  });

  it("breaks results down per symbol", () => {
    expect(Object.keys(a.symbolStats)).toEqual(["EURUSD", "GBPUSD"]);
    expect(a.symbolStats.EURUSD.trades).toBe(3);
    expect(a.symbolStats.EURUSD.profit).toBe(50);
    expect(a.symbolStats.EURUSD.winRate).toBeCloseTo(33.333, 2);
    expect(a.symbolStats.GBPUSD).toEqual({ trades: 2, profit: 150, winRate: 50, avgProfit: 75 });
  });

  it("fills the histograms", () => {
    expect(a.profitDistribution).toEqual({
      "-inf..-1000": 0,
      "-1000..-500": 0,
      "-500..-100": 0,
      "-100..0": 3,
      "0..100": 1,
      "100..500": 1,
      "500..1000": 0,
      "1000..inf": 0,
    });
    expect(a.durationDistribution).toEqual({
      "0-30": 1,
      "30-60": 1,
      "60-120": 0,
      "120-240": 1,
      "240-480": 0,
      "480-1440": 1,
      "1440+": 1,
    });
  });

  it("builds daily and monthly stats", () => {
    expect(a.dailyStats.map((d) => [d.date, d.trades, d.profit])).toEqual([
      ["2025-01-06", 2, 50],
      ["2025-01-07", 1, 200],
      ["2025-02-03", 1, -50],
      ["2025-02-04", 1, 0],
    ]);
    expect(a.dailyStats[0]).toEqual({ date: "2025-01-06", trades: 2, profit: 50, winRate: 50, maxLoss: -50 });

    expect(a.monthlyStats).toHaveLength(2);
    expect(a.monthlyStats[0]).toMatchObject({ month: "2025-01", trades: 3, profit: 250, bestDay: "2025-01-07", worstDay: "2025-01-06" });
    expect(a.monthlyStats[1]).toEqual({
      month: "2025-02",
      trades: 2,
      profit: -50,
      winRate: 0,
      bestDay: "2025-02-04",
      worstDay: "2025-02-03",
    });
  });

  it("reports the covered period", () => {
    expect(a.periodStart).toBe("2025-01-06T09:00:00");
    expect(a.periodEnd).toBe("2025-02-04T09:15:00");
    expect(a.totalDays).toBe(29);
  });

  it("returns zeros for an empty history", () => {
    const empty = computeAnalytics([]);
    expect(empty).toMatchObject({
      totalTrades: 0,
      winRate: 0,
      profitFactor: 0,
      payoffRatio: 0,
      maxDrawdown: 0,
      maxDrawdownPct: 0,
      currentStreak: 0,
      bestDay: "",
      bestHour: 0,
      totalProfitPct: 0,
      periodStart: "",
      totalDays: 0,
    });
    expect(empty.equityCurve).toEqual([]);
    expect(empty.symbolStats).toEqual({});
    expect(Object.values(empty.profitDistribution).every((n) => n === 0)).toBe(true);
  });

  it("uses a unit average loss when nothing lost", () => {
    const r = computeAnalytics(series([50, 150]));
    expect(r.profitFactor).toBe(0);
    expect(r.payoffRatio).toBe(100);
    expect(r.maxDrawdownPct).toBe(0);
  });

  it("leaves drawdown percent at 0 when equity never went positive", () => {
    const r = computeAnalytics(series([-10, -20]));
    expect(r.drawdownCurve).toEqual([0, -20]);
    expect(r.maxDrawdown).toBe(-20);
    expect(r.maxDrawdownPct).toBe(0);
  });

  it("classifies streak runs by their total", () => {
    const r = computeAnalytics(series([10, 20, -5, -5, -5, 30, 0, 0, 40]));
    expect(r.longestWinStreak).toBe(2);
    expect(r.longestLossStreak).toBe(3);
    expect(r.currentStreak).toBe(1);
  });

  it("orders same-time trades by id", () => {
    const r = computeAnalytics([
      makeTrade({ id: 8, openTime: "2025-03-01T10:00:00", profitUsd: -5 }),
      makeTrade({ id: 7, openTime: "2025-03-01T10:00:00", profitUsd: 10 }),
    ]);
    expect(r.equityCurve).toEqual([10, 5]);
  });

  it("resolves best-day ties to the earliest day", () => {
    const r = computeAnalytics([
      makeTrade({ id: 1, openTime: "2025-03-02T10:00:00", profitUsd: 100 }),
      makeTrade({ id: 2, openTime: "2025-03-01T10:00:00", profitUsd: 100 }),
    ]);
    expect(r.bestDay).toBe("2025-03-01");
    expect(r.worstDay).toBe("2025-03-01");
  });

  it("is pure", () => {
    const input = scenario();
    const before = input.map((t) => t.id);
    expect(computeAnalytics(input)).toEqual(computeAnalytics(input));
    expect(input.map((t) => t.id)).toEqual(before);
  });
});

describe("histogram", () => {
  it("closes buckets on the right and the first one on both sides", () => {
    expect(histogram([-1000, -999.99, 0, 0.01, 1000, 1000.01], PROFIT_BUCKETS)).toMatchObject({
      "-inf..-1000": 1,
      "-1000..-500": 1,
      "-100..0": 1,
      "0..100": 1,
      "500..1000": 1,
      "1000..inf": 1,
    });
    expect(histogram([0, 30, 31, -1], DURATION_BUCKETS)).toMatchObject({ "0-30": 2, "30-60": 1 });
  });
});

describe("drawdownSeries", () => {
  it("measures each point against the running peak", () => {
    expect(drawdownSeries([5, -10, 20, -3])).toEqual({
      equity: [5, -5, 15, 12],
      runningMax: [5, 5, 15, 15],
      drawdown: [0, -10, 0, -3],
    });
  });
});

describe("computeHourlyBreakdown", () => {
  it("returns all 24 hours with rounded totals", () => {
    const h = computeHourlyBreakdown([
      ...scenario(),
      makeTrade({ id: 6, openTime: "2025-02-05T23:10:00", profitUsd: 10 }),
      makeTrade({ id: 7, openTime: "2025-02-06T23:40:00", profitUsd: 0 }),
      makeTrade({ id: 8, openTime: "2025-02-07T23:05:00", profitUsd: 0 }),
    ]);
    expect(Object.keys(h.data)).toHaveLength(24);
    expect(h.data["9"]).toEqual({ total: 300, average: 100, count: 3 });
    expect(h.data["14"]).toEqual({ total: -50, average: -50, count: 1 });
    expect(h.data["23"]).toEqual({ total: 10, average: 3.33, count: 3 });
    expect(h.data["0"]).toEqual({ total: 0, average: 0, count: 0 });
    expect(h.bestHour).toBe(9);
  });
});

describe("buildTimeseries", () => {
  const a = computeAnalytics(scenario());

  it("returns the per-trade equity curve", () => {
    const ts = buildTimeseries(a, "equity", "day");
    expect(ts.values).toEqual([100, 50, 250, 200, 200]);
    expect(ts.dates).toHaveLength(5);
  });

  it("groups profit by day or month", () => {
    expect(buildTimeseries(a, "daily_profit", "day")).toEqual({
      metric: "daily_profit",
      groupBy: "day",
      dates: ["2025-01-06", "2025-01-07", "2025-02-03", "2025-02-04"],
      values: [50, 200, -50, 0],
    });
    expect(buildTimeseries(a, "cumulative_profit", "day").values).toEqual([50, 250, 200, 200]);
    expect(buildTimeseries(a, "daily_profit", "month")).toMatchObject({ dates: ["2025-01", "2025-02"], values: [250, -50] });
    expect(buildTimeseries(a, "cumulative_profit", "month").values).toEqual([250, 200]);
  });

  it("groups profit by week under the week's Monday", () => {
    expect(buildTimeseries(a, "daily_profit", "week")).toEqual({
      metric: "daily_profit",
      groupBy: "week",
      dates: ["2025-01-06", "2025-02-03"],
      values: [250, -50],
    });
    expect(buildTimeseries(a, "cumulative_profit", "week").values).toEqual([250, 200]);
  });
});
