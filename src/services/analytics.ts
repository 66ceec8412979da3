// src/services/analytics.ts
import type { Trade } from "../types/trade";
import type {
  Analytics,
  DailyStats,
  HourlyBreakdown,
  HourlyBucket,
  MonthlyStats,
  SymbolStats,
  Timeseries,
  TimeseriesGroupBy,
  TimeseriesMetric,
} from "../types/analytics";
import { r2 } from "../utils/numbers";
import { dayOf, hourOf, monthOf, weekOf, wholeDaysBetween } from "../utils/time";

/* =========================
   Fixed histogram buckets
========================= */
interface Bucket {
  label: string;
  lo: number;
  hi: number;
  /** bucket also takes values equal to `lo` */
  closedLow?: boolean;
}

// right-closed (lo, hi]
export const PROFIT_BUCKETS: readonly Bucket[] = [
  { label: "-inf..-1000", lo: -Infinity, hi: -1000, closedLow: true },
  { label: "-1000..-500", lo: -1000, hi: -500 },
  { label: "-500..-100", lo: -500, hi: -100 },
  { label: "-100..0", lo: -100, hi: 0 },
  { label: "0..100", lo: 0, hi: 100 },
  { label: "100..500", lo: 100, hi: 500 },
  { label: "500..1000", lo: 500, hi: 1000 },
  { label: "1000..inf", lo: 1000, hi: Infinity },
];

// minutes
export const DURATION_BUCKETS: readonly Bucket[] = [
  { label: "0-30", lo: 0, hi: 30, closedLow: true },
  { label: "30-60", lo: 30, hi: 60 },
  { label: "60-120", lo: 60, hi: 120 },
  { label: "120-240", lo: 120, hi: 240 },
  { label: "240-480", lo: 240, hi: 480 },
  { label: "480-1440", lo: 480, hi: 1440 },
  { label: "1440+", lo: 1440, hi: Infinity },
];

/** Reference notional per lot for total_profit_pct. */
export const PROFIT_PCT_BASELINE_MULTIPLIER = 100_000;

export function histogram(values: number[], buckets: readonly Bucket[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const b of buckets) counts[b.label] = 0;
  for (const v of values) {
    const hit = buckets.find((b) => (v > b.lo || (b.closedLow === true && v === b.lo)) && v <= b.hi);
    if (hit) counts[hit.label]++;
  }
  return counts;
}

/* =========================
   Helpers
========================= */
const sum = (xs: number[]) => xs.reduce((s, x) => s + x, 0);
const mean = (xs: number[]) => (xs.length ? sum(xs) / xs.length : 0);
const winRateOf = (ts: Trade[]) => (ts.length ? (ts.filter((t) => t.profitUsd > 0).length / ts.length) * 100 : 0);
const signOf = (n: number) => (n > 0 ? 1 : n < 0 ? -1 : 0);

/** open_time ascending, id breaks ties */
export function chronological(trades: readonly Trade[]): Trade[] {
  return [...trades].sort((a, b) => {
    if (a.openTime < b.openTime) return -1;
    if (a.openTime > b.openTime) return 1;
    return a.id - b.id;
  });
}

function groupBy(trades: Trade[], key: (t: Trade) => string): Map<string, Trade[]> {
  const groups = new Map<string, Trade[]>();
  for (const t of trades) {
    const k = key(t);
    const g = groups.get(k);
    if (g) g.push(t);
    else groups.set(k, [t]);
  }
  return groups;
}

/** First key holding the max (or min) value; ties resolve to the earliest key. */
function extremeEntry(
  entries: Iterable<[string, number]>,
  pick: "max" | "min"
): { key: string; value: number } | null {
  let best: { key: string; value: number } | null = null;
  for (const [key, value] of entries) {
    if (!best || (pick === "max" ? value > best.value : value < best.value)) best = { key, value };
  }
  return best;
}

function dailyTotals(trades: Trade[]): Map<string, number> {
  const out = new Map<string, number>();
  for (const t of trades) {
    const d = dayOf(t.openTime);
    out.set(d, (out.get(d) ?? 0) + t.profitUsd);
  }
  return out;
}

/* =========================
   Drawdown & streaks
========================= */
export interface DrawdownSeries {
  equity: number[];
  runningMax: number[];
  drawdown: number[];
}

export function drawdownSeries(profits: number[]): DrawdownSeries {
  const equity: number[] = [];
  const runningMax: number[] = [];
  const drawdown: number[] = [];
  let cum = 0;
  let peak = -Infinity;
  for (const p of profits) {
    cum += p;
    peak = Math.max(peak, cum);
    equity.push(cum);
    runningMax.push(peak);
    drawdown.push(cum - peak);
  }
  return { equity, runningMax, drawdown };
}

export interface StreakRun {
  sign: number;
  length: number;
  total: number;
}

/** Maximal runs of equal profit sign, in order. */
export function streakRuns(profits: number[]): StreakRun[] {
  const runs: StreakRun[] = [];
  for (const p of profits) {
    const sign = signOf(p);
    const last = runs[runs.length - 1];
    if (last && last.sign === sign) {
      last.length++;
      last.total += p;
    } else {
      runs.push({ sign, length: 1, total: p });
    }
  }
  return runs;
}

/* =========================
   Breakdowns
========================= */
function buildSymbolStats(trades: Trade[]): Record<string, SymbolStats> {
  const bySymbol = groupBy(trades, (t) => t.symbol);
  return Object.fromEntries(
    [...bySymbol].map(([symbol, group]) => {
      const profits = group.map((t) => t.profitUsd);
      return [symbol, { trades: group.length, profit: sum(profits), winRate: winRateOf(group), avgProfit: mean(profits) }];
    })
  );
}

function buildDailyStats(trades: Trade[]): DailyStats[] {
  return [...groupBy(trades, (t) => dayOf(t.openTime))].map(([date, group]) => {
    const profits = group.map((t) => t.profitUsd);
    return {
      date,
      trades: group.length,
      profit: sum(profits),
      winRate: winRateOf(group),
      maxLoss: Math.min(...profits),
    };
  });
}

function buildMonthlyStats(trades: Trade[]): MonthlyStats[] {
  return [...groupBy(trades, (t) => monthOf(t.openTime))].map(([month, group]) => {
    const days = dailyTotals(group);
    return {
      month,
      trades: group.length,
      profit: sum(group.map((t) => t.profitUsd)),
      winRate: winRateOf(group),
      bestDay: extremeEntry(days, "max")?.key ?? "",
      worstDay: extremeEntry(days, "min")?.key ?? "",
    };
  });
}

function hourlyMeans(trades: Trade[]): [string, number][] {
  return [...groupBy(trades, (t) => String(hourOf(t.openTime)))]
    .sort(([a], [b]) => Number(a) - Number(b))
    .map(([hour, group]) => [hour, mean(group.map((t) => t.profitUsd))]);
}

/* =========================
   Main computation
========================= */

/**
 * Build the full report for one trade history. Pure: the input is not
 * touched and every ratio falls back to 0 when its denominator is empty.
 */
export function computeAnalytics(input: readonly Trade[]): Analytics {
  const trades = chronological(input);
  const profits = trades.map((t) => t.profitUsd);

  const wins = profits.filter((p) => p > 0);
  const losses = profits.filter((p) => p < 0);

  const totalTrades = trades.length;
  const totalProfit = sum(profits);

  const gains = sum(wins);
  const grossLoss = Math.abs(sum(losses));
  // no losses -> 0, not Infinity
  const profitFactor = grossLoss > 0 ? gains / grossLoss : 0;

  // avg loss floors at 1 currency unit when there are no losing trades
  const avgWin = mean(wins);
  const avgLoss = losses.length ? Math.abs(mean(losses)) : 1;
  const payoffRatio = avgLoss > 0 ? avgWin / avgLoss : 0;

  const { equity, runningMax, drawdown } = drawdownSeries(profits);
  const maxDrawdown = drawdown.reduce((m, d) => Math.min(m, d), 0);
  const peak = runningMax.length ? runningMax[runningMax.length - 1] : 0;
  const maxDrawdownPct = peak > 0 ? (maxDrawdown / peak) * 100 : 0;

  const runs = streakRuns(profits);
  const longestWinStreak = runs.filter((r) => r.total > 0).reduce((m, r) => Math.max(m, r.length), 0);
  const longestLossStreak = runs.filter((r) => r.total < 0).reduce((m, r) => Math.max(m, r.length), 0);

  const days = dailyTotals(trades);
  const bestDay = extremeEntry(days, "max");
  const worstDay = extremeEntry(days, "min");
  const bestHour = extremeEntry(hourlyMeans(trades), "max");

  const first = trades[0];
  const last = trades[totalTrades - 1];
  const baseline = first ? Math.abs(first.openPrice * first.volume * PROFIT_PCT_BASELINE_MULTIPLIER) : 0;

  return {
    totalTrades,
    winningTrades: wins.length,
    losingTrades: losses.length,
    breakEven: totalTrades - wins.length - losses.length,

    totalProfit,
    totalProfitPct: baseline > 0 ? (totalProfit / baseline) * 100 : 0,
    averageProfit: mean(profits),

    winRate: totalTrades ? (wins.length / totalTrades) * 100 : 0,
    profitFactor,
    payoffRatio,

    maxDrawdown,
    maxDrawdownPct,
    currentDrawdown: drawdown.length ? drawdown[drawdown.length - 1] : 0,
    drawdownCurve: drawdown,

    longestWinStreak,
    longestLossStreak,
    currentStreak: last ? signOf(last.profitUsd) : 0,

    symbolStats: buildSymbolStats(trades),

    bestDay: bestDay?.key ?? "",
    bestDayProfit: bestDay?.value ?? 0,
    worstDay: worstDay?.key ?? "",
    worstDayProfit: worstDay?.value ?? 0,

    bestHour: bestHour ? Number(bestHour.key) : 0,
    bestHourProfit: bestHour?.value ?? 0,

    equityCurve: equity,
    equityDates: trades.map((t) => t.openTime),

    profitDistribution: histogram(profits, PROFIT_BUCKETS),
    durationDistribution: histogram(
      trades.map((t) => t.duration),
      DURATION_BUCKETS
    ),

    dailyStats: buildDailyStats(trades),
    monthlyStats: buildMonthlyStats(trades),

    periodStart: first?.openTime ?? "",
    periodEnd: last?.openTime ?? "",
    totalDays: first && last ? wholeDaysBetween(first.openTime, last.openTime) : 0,
  };
}

/** Profit per hour of day (0-23) across all dates, for heatmaps. */
export function computeHourlyBreakdown(trades: readonly Trade[]): HourlyBreakdown {
  const byHour = groupBy([...trades], (t) => String(hourOf(t.openTime)));
  const data: Record<string, HourlyBucket> = {};
  for (let hour = 0; hour < 24; hour++) {
    const group = byHour.get(String(hour)) ?? [];
    const profits = group.map((t) => t.profitUsd);
    data[String(hour)] = { total: r2(sum(profits)), average: r2(mean(profits)), count: group.length };
  }
  const best = extremeEntry(hourlyMeans([...trades]), "max");
  return { data, bestHour: best ? Number(best.key) : 0 };
}

function profitSeries(analytics: Analytics, groupBy: TimeseriesGroupBy): { key: string; profit: number }[] {
  if (groupBy === "month") return analytics.monthlyStats.map((m) => ({ key: m.month, profit: m.profit }));
  const daily = analytics.dailyStats.map((d) => ({ key: d.date, profit: d.profit }));
  if (groupBy === "day") return daily;

  const weeks = new Map<string, number>();
  for (const d of daily) {
    const week = weekOf(d.key);
    weeks.set(week, (weeks.get(week) ?? 0) + d.profit);
  }
  return [...weeks].map(([key, profit]) => ({ key, profit }));
}

export function buildTimeseries(
  analytics: Analytics,
  metric: TimeseriesMetric,
  groupBy: TimeseriesGroupBy
): Timeseries {
  if (metric === "equity") {
    return { metric, groupBy, dates: analytics.equityDates, values: analytics.equityCurve };
  }

  const series = profitSeries(analytics, groupBy);

  let running = 0;
  const values = series.map((s) => (metric === "cumulative_profit" ? (running += s.profit) : s.profit));
  return { metric, groupBy, dates: series.map((s) => s.key), values };
}
