// src/services/tradeParser.ts
import aliasTable from "../data/columnAliases.json";
import { readRawTable } from "./tableReader";
import { ParseError, RowCoercionError } from "../utils/errors";
import { parseNumber, parseOptionalNumber } from "../utils/numbers";
import { minutesBetween, parseTimestamp } from "../utils/time";
import {
  REQUIRED_FIELDS,
  type CanonicalField,
  type RequiredField,
  type NormalizeOptions,
  type ParsedTradeFile,
  type RawCell,
  type RawRow,
  type SkippedRow,
  type Trade,
  type TradeStatus,
} from "../types/trade";

export const DEFAULT_HEADER_SCAN_ROWS = 30;
export const DEFAULT_CONTRACT_MULTIPLIER = 100;

/* =========================
   Alias table
========================= */
type AliasTarget = CanonicalField | CanonicalField[];

const CANONICAL_FIELDS: readonly CanonicalField[] = [
  ...REQUIRED_FIELDS,
  "commission",
  "swap",
  "spread",
  "comment",
];

const isCanonicalField = (v: string): v is CanonicalField => CANONICAL_FIELDS.some((f) => f === v);

function buildAliasMap(aliases: Record<string, string | string[]>): Map<string, AliasTarget> {
  const map = new Map<string, AliasTarget>();
  for (const [alias, target] of Object.entries(aliases)) {
    const fields = (Array.isArray(target) ? target : [target]).filter(isCanonicalField);
    if (!fields.length) throw new Error(`[trade.parser] alias "${alias}" maps to no known field`);
    map.set(headerKey(alias), Array.isArray(target) ? fields : fields[0]);
  }
  return map;
}

/** lowercase, no accents, single spaces */
export function headerKey(cell: RawCell | undefined): string {
  if (cell === null || cell === undefined) return "";
  return String(cell)
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/\s+/g, " ")
    .replace(/[:.]+$/, "")
    .trim();
}

const ALIASES = buildAliasMap(aliasTable.aliases);
const TIME_MARKERS = new Set(aliasTable.headerMarkers.time);
const SYMBOL_MARKERS = new Set(aliasTable.headerMarkers.symbol);

/* =========================
   Header detection & column mapping
========================= */
const cellWords = (cell: RawCell | undefined) => headerKey(cell).split(/[^a-z]+/).filter(Boolean);

function looksLikeHeader(row: RawRow): boolean {
  const words = row.flatMap((c) => cellWords(c));
  return words.some((w) => TIME_MARKERS.has(w)) && words.some((w) => SYMBOL_MARKERS.has(w));
}

/** Index of the first row carrying both a time and a symbol marker; 0 when none does. */
export function detectHeaderRow(rows: RawRow[], scanLimit = DEFAULT_HEADER_SCAN_ROWS): number {
  const limit = Math.min(scanLimit, rows.length);
  for (let i = 0; i < limit; i++) {
    if (looksLikeHeader(rows[i])) return i;
  }
  return 0;
}

/**
 * Map header cells onto canonical fields. A repeated name ("Time", "Price")
 * fills its fields in order: first occurrence is the open side, second the close side.
 */
export function resolveColumns(header: RawRow): {
  columns: Partial<Record<CanonicalField, number>>;
  found: string[];
} {
  const columns: Partial<Record<CanonicalField, number>> = {};
  const found: string[] = [];

  header.forEach((cell, idx) => {
    const key = headerKey(cell);
    if (!key) return;
    found.push(String(cell).trim());

    const target = ALIASES.get(key);
    if (!target) return;
    const candidates = Array.isArray(target) ? target : [target];
    const field = candidates.find((f) => columns[f] === undefined);
    if (field) columns[field] = idx;
  });

  return { columns, found };
}

type ResolvedColumns = Record<RequiredField, number> & Partial<Record<CanonicalField, number>>;

function requireColumns(columns: Partial<Record<CanonicalField, number>>, found: string[]): ResolvedColumns {
  const missing = REQUIRED_FIELDS.filter((f) => columns[f] === undefined);
  if (missing.length) {
    throw new ParseError(`Missing required columns: ${missing.join(", ")}`, { missing, found });
  }

  const at = (f: RequiredField): number => {
    const idx = columns[f];
    if (idx === undefined) throw new ParseError(`Missing required column: ${f}`, { missing: [f], found });
    return idx;
  };

  return {
    ...columns,
    open_time: at("open_time"),
    close_time: at("close_time"),
    symbol: at("symbol"),
    order_type: at("order_type"),
    volume: at("volume"),
    open_price: at("open_price"),
    close_price: at("close_price"),
    profit_usd: at("profit_usd"),
  };
}

/* =========================
   Row coercion
========================= */
function cellText(cell: RawCell | undefined): string {
  if (cell === null || cell === undefined) return "";
  if (cell instanceof Date) return cell.toISOString();
  return String(cell).trim();
}

const cellAt = (row: RawRow, idx: number | undefined): RawCell | undefined =>
  idx === undefined ? undefined : row[idx];

export function statusOf(profitUsd: number): TradeStatus {
  if (profitUsd > 0) return "WINNER";
  if (profitUsd < 0) return "LOSER";
  return "BREAK_EVEN";
}

/** Return on notional exposure, 0 whenever the notional is zero or not a number. */
export function computeProfitPct(profitUsd: number, openPrice: number, volume: number, contractMultiplier: number): number {
  const notional = Math.abs(openPrice * volume * contractMultiplier);
  if (!Number.isFinite(notional) || notional === 0) return 0;
  const pct = (profitUsd / notional) * 100;
  return Number.isFinite(pct) ? pct : 0;
}

/** A lone label in the first cell ("Orders", "Deals") opens the next report section. */
function isSectionTitle(row: RawRow): boolean {
  return cellText(row[0]) !== "" && row.slice(1).every((c) => cellText(c) === "");
}

function buildTrade(row: RawRow, cols: ResolvedColumns, id: number, contractMultiplier: number): Trade {
  const symbol = cellText(row[cols.symbol]);
  const orderType = cellText(row[cols.order_type]).toUpperCase() === "BUY" ? "BUY" : "SELL";

  const openTime = parseTimestamp(row[cols.open_time]);
  if (!openTime) throw new RowCoercionError(`open time is not a timestamp: "${cellText(row[cols.open_time])}"`);
  const closeTime = parseTimestamp(row[cols.close_time]);

  const volume = parseNumber(row[cols.volume], "volume");
  const openPrice = parseNumber(row[cols.open_price], "open price");
  const closePrice = parseNumber(row[cols.close_price], "close price");
  const profitUsd = parseNumber(row[cols.profit_usd], "profit");

  const comment = cellText(cellAt(row, cols.comment));

  return {
    id,
    openTime,
    closeTime,
    symbol,
    orderType,
    volume,
    openPrice,
    closePrice,
    profitUsd,
    profitPct: computeProfitPct(profitUsd, openPrice, volume, contractMultiplier),
    duration: minutesBetween(openTime, closeTime),
    commission: parseOptionalNumber(cellAt(row, cols.commission)),
    swap: parseOptionalNumber(cellAt(row, cols.swap)),
    spread: parseOptionalNumber(cellAt(row, cols.spread)),
    comment: comment || null,
    status: statusOf(profitUsd),
  };
}

/* =========================
   Public API
========================= */

/** Turn already-read rows into trades. */
export function normalizeRows(rows: RawRow[], options: NormalizeOptions = {}): ParsedTradeFile {
  const scanLimit = options.headerScanRows ?? DEFAULT_HEADER_SCAN_ROWS;
  const contractMultiplier = options.contractMultiplier ?? DEFAULT_CONTRACT_MULTIPLIER;

  if (!rows.length) throw new ParseError("File contains no rows");

  const headerRowIndex = detectHeaderRow(rows, scanLimit);
  const { columns, found } = resolveColumns(rows[headerRowIndex]);
  const cols = requireColumns(columns, found);

  const trades: Trade[] = [];
  const skippedRows: SkippedRow[] = [];
  let ignoredRows = 0;

  for (let r = headerRowIndex + 1; r < rows.length; r++) {
    const row = rows[r];

    if (trades.length > 0 && isSectionTitle(row)) {
      ignoredRows += rows.length - r;
      break;
    }

    const symbol = cellText(row[cols.symbol]);
    const orderType = cellText(row[cols.order_type]).toUpperCase();
    if (!symbol || (orderType !== "BUY" && orderType !== "SELL")) {
      ignoredRows++;
      continue;
    }

    try {
      trades.push(buildTrade(row, cols, trades.length + 1, contractMultiplier));
    } catch (err) {
      if (!(err instanceof RowCoercionError)) throw err;
      skippedRows.push({ row: r, reason: err.message });
      console.warn(`[trade.parser] skipped row ${r}: ${err.message}`);
    }
  }

  return { trades, headerRowIndex, columns: cols, skippedRows, ignoredRows };
}

export async function parseTradeFile(
  buffer: Buffer,
  filename: string,
  options: NormalizeOptions = {}
): Promise<ParsedTradeFile> {
  const rows = await readRawTable(buffer, filename);
  const parsed = normalizeRows(rows, options);
  console.log(
    `✅ [trade.parser] ${parsed.trades.length} trades from ${filename} ` +
      `(header row ${parsed.headerRowIndex}, ${parsed.ignoredRows} non-trade rows, ${parsed.skippedRows.length} skipped)`
  );
  return parsed;
}

export async function normalizeTrades(buffer: Buffer, filename: string, options: NormalizeOptions = {}): Promise<Trade[]> {
  return (await parseTradeFile(buffer, filename, options)).trades;
}
