import { describe, it, expect } from "vitest";
import { filterTrades, isTradeStatus, paginate } from "../src/services/tradeQuery";
import { makeTrade } from "./helpers";

const trades = [
  makeTrade({ id: 1, openTime: "2025-01-06T09:00:00", profitUsd: 100 }),
  makeTrade({ id: 2, openTime: "2025-01-06T23:59:59", profitUsd: -50, symbol: "GBPUSD" }),
  makeTrade({ id: 3, openTime: "2025-01-07T00:00:00", profitUsd: 0 }),
  makeTrade({ id: 4, openTime: "2025-01-08T12:00:00", profitUsd: 250, symbol: "GBPUSD" }),
];

const ids = (ts: { id: number }[]) => ts.map((t) => t.id);

describe("filterTrades", () => {
  it("returns everything without criteria", () => {
    expect(ids(filterTrades(trades, {}))).toEqual([1, 2, 3, 4]);
  });

  it("matches symbol and status exactly", () => {
    expect(ids(filterTrades(trades, { symbol: "GBPUSD" }))).toEqual([2, 4]);
    expect(ids(filterTrades(trades, { status: "BREAK_EVEN" }))).toEqual([3]);
    expect(ids(filterTrades(trades, { symbol: "GBPUSD", status: "WINNER" }))).toEqual([4]);
  });

  it("treats date and profit bounds as inclusive", () => {
    expect(ids(filterTrades(trades, { dateFrom: "2025-01-06T23:59:59", dateTo: "2025-01-07T00:00:00" }))).toEqual([2, 3]);
    expect(ids(filterTrades(trades, { minProfit: 0, maxProfit: 100 }))).toEqual([1, 3]);
  });
});

describe("paginate", () => {
  it("slices by offset and limit", () => {
    expect(paginate([1, 2, 3, 4, 5], 1, 2)).toEqual([2, 3]);
    expect(paginate([1, 2, 3], 2)).toEqual([3]);
    expect(paginate([1, 2, 3], 5, 2)).toEqual([]);
    expect(paginate([1, 2, 3], -4, 1)).toEqual([1]);
  });
});

describe("isTradeStatus", () => {
  it("accepts only known statuses", () => {
    expect(isTradeStatus("LOSER")).toBe(true);
    expect(isTradeStatus("loser")).toBe(false);
  });
});
