import type { Trade } from "../src/types/trade";
import { statusOf } from "../src/services/tradeParser";

let nextId = 1;

export function makeTrade(overrides: Partial<Trade> & Pick<Trade, "openTime" | "profitUsd">): Trade {
  const profitUsd = overrides.profitUsd;
  return {
    id: nextId++,
    closeTime: null,
    symbol: "EURUSD",
    orderType: "BUY",
    volume: 1,
    openPrice: 2,
    closePrice: 2,
    profitPct: 0,
    duration: 0,
    commission: null,
    swap: null,
    spread: null,
    comment: null,
    status: statusOf(profitUsd),
    ...overrides,
  };
}

/** Reads a key off an unknown JSON body. */
export function field(body: unknown, key: string): unknown {
  return typeof body === "object" && body !== null ? Reflect.get(body, key) : undefined;
}
