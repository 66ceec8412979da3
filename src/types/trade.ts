// src/types/trade.ts

export type OrderType = "BUY" | "SELL";
export type TradeStatus = "WINNER" | "LOSER" | "BREAK_EVEN";

/** Wall-clock timestamp `YYYY-MM-DDTHH:mm:ss`, no offset. Sorts lexically. */
export type NaiveTimestamp = string;

/** One closed position. Never mutated after the normalizer builds it. */
export interface Trade {
  readonly id: number;
  readonly openTime: NaiveTimestamp;
  readonly closeTime: NaiveTimestamp | null;
  readonly symbol: string;
  readonly orderType: OrderType;
  readonly volume: number;
  readonly openPrice: number;
  readonly closePrice: number;
  readonly profitUsd: number;
  readonly profitPct: number;
  /** minutes between open and close, 0 when either side is unknown */
  readonly duration: number;
  readonly commission: number | null;
  readonly swap: number | null;
  readonly spread: number | null;
  readonly comment: string | null;
  readonly status: TradeStatus;
}

export type CanonicalField =
  | "open_time"
  | "close_time"
  | "symbol"
  | "order_type"
  | "volume"
  | "open_price"
  | "close_price"
  | "profit_usd"
  | "commission"
  | "swap"
  | "spread"
  | "comment";

export const REQUIRED_FIELDS = [
  "open_time",
  "close_time",
  "symbol",
  "order_type",
  "volume",
  "open_price",
  "close_price",
  "profit_usd",
] as const satisfies readonly CanonicalField[];

export type RequiredField = (typeof REQUIRED_FIELDS)[number];

export type RawCell = string | number | boolean | Date | null;
export type RawRow = RawCell[];

export interface SkippedRow {
  row: number;
  reason: string;
}

export interface ParsedTradeFile {
  trades: Trade[];
  headerRowIndex: number;
  columns: Partial<Record<CanonicalField, number>>;
  skippedRows: SkippedRow[];
  ignoredRows: number;
}

export interface NormalizeOptions {
  headerScanRows?: number;
  contractMultiplier?: number;
}
