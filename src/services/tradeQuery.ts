// src/services/tradeQuery.ts
import type { NaiveTimestamp, Trade, TradeStatus } from "../types/trade";

export const TRADE_STATUSES: readonly TradeStatus[] = ["WINNER", "LOSER", "BREAK_EVEN"];

export const isTradeStatus = (v: string): v is TradeStatus => TRADE_STATUSES.some((s) => s === v);

export interface TradeFilter {
  symbol?: string;
  status?: TradeStatus;
  /** inclusive bounds on open time */
  dateFrom?: NaiveTimestamp;
  dateTo?: NaiveTimestamp;
  minProfit?: number;
  maxProfit?: number;
}

export function filterTrades(trades: readonly Trade[], filter: TradeFilter): Trade[] {
  return trades.filter((t) => {
    if (filter.symbol !== undefined && t.symbol !== filter.symbol) return false;
    if (filter.status !== undefined && t.status !== filter.status) return false;
    if (filter.dateFrom !== undefined && t.openTime < filter.dateFrom) return false;
    if (filter.dateTo !== undefined && t.openTime > filter.dateTo) return false;
    if (filter.minProfit !== undefined && t.profitUsd < filter.minProfit) return false;
    if (filter.maxProfit !== undefined && t.profitUsd > filter.maxProfit) return false;
    return true;
  });
}

export function paginate<T>(items: readonly T[], offset = 0, limit?: number): T[] {
  const start = Math.max(0, offset);
  return limit === undefined ? items.slice(start) : items.slice(start, start + limit);
}
