// src/types/analytics.ts

export interface SymbolStats {
  trades: number;
  profit: number;
  winRate: number;
  avgProfit: number;
}

export interface DailyStats {
  date: string; // YYYY-MM-DD
  trades: number;
  profit: number;
  winRate: number;
  maxLoss: number; // worst single trade of the day
}

export interface MonthlyStats {
  month: string; // YYYY-MM
  trades: number;
  profit: number;
  winRate: number;
  bestDay: string;
  worstDay: string;
}

export interface Analytics {
  // counts
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  breakEven: number;

  // P&L
  totalProfit: number;
  totalProfitPct: number;
  averageProfit: number;

  // ratios
  winRate: number;
  profitFactor: number;
  payoffRatio: number;

  // drawdown
  maxDrawdown: number;
  maxDrawdownPct: number;
  currentDrawdown: number;
  drawdownCurve: number[];

  // streaks
  longestWinStreak: number;
  longestLossStreak: number;
  /** sign of the most recent trade: 1, -1 or 0 */
  currentStreak: number;

  symbolStats: Record<string, SymbolStats>;

  bestDay: string;
  bestDayProfit: number;
  worstDay: string;
  worstDayProfit: number;

  bestHour: number;
  bestHourProfit: number;

  equityCurve: number[];
  equityDates: string[];

  profitDistribution: Record<string, number>;
  durationDistribution: Record<string, number>;

  dailyStats: DailyStats[];
  monthlyStats: MonthlyStats[];

  periodStart: string;
  periodEnd: string;
  totalDays: number;
}

export interface HourlyBucket {
  total: number;
  average: number;
  count: number;
}

export interface HourlyBreakdown {
  data: Record<string, HourlyBucket>;
  bestHour: number;
}

export type TimeseriesMetric = "equity" | "daily_profit" | "cumulative_profit";
/** day and week series are keyed by date (weeks by their Monday), month series by YYYY-MM */
export type TimeseriesGroupBy = "day" | "week" | "month";

export interface Timeseries {
  metric: TimeseriesMetric;
  groupBy: TimeseriesGroupBy;
  dates: string[];
  values: number[];
}
