// src/controllers/analytics.controller.ts
import type { Request, RequestHandler } from "express";
import type { AppConfig } from "../config/env";
import { buildTimeseries, computeAnalytics, computeHourlyBreakdown } from "../services/analytics";
import type { TradeReport, TradeReportStore } from "../services/reportStore";
import { parseTradeFile } from "../services/tradeParser";
import { filterTrades, isTradeStatus, paginate, type TradeFilter } from "../services/tradeQuery";
import type { TimeseriesGroupBy, TimeseriesMetric } from "../types/analytics";
import type { TradeStatus } from "../types/trade";
import { HttpError } from "../utils/errors";
import { parseTimestamp } from "../utils/time";

const PUBLIC_OWNER = "public";

const TIMESERIES_METRICS: readonly TimeseriesMetric[] = ["equity", "daily_profit", "cumulative_profit"];
const TIMESERIES_GROUPS: readonly TimeseriesGroupBy[] = ["day", "week", "month"];

/* =========================
   Query helpers
========================= */
function queryString(req: Request, name: string): string | undefined {
  const v = req.query[name];
  return typeof v === "string" && v.trim() !== "" ? v.trim() : undefined;
}

function queryNumber(req: Request, name: string): number | undefined {
  const raw = queryString(req, name);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new HttpError(400, `${name} must be a number`);
  return n;
}

function queryCount(req: Request, name: string): number | undefined {
  const n = queryNumber(req, name);
  if (n !== undefined && (!Number.isInteger(n) || n < 0)) {
    throw new HttpError(400, `${name} must be a non-negative integer`);
  }
  return n;
}

function queryStatus(req: Request): TradeStatus | undefined {
  const raw = queryString(req, "status");
  if (raw === undefined) return undefined;
  const status = raw.toUpperCase();
  if (!isTradeStatus(status)) throw new HttpError(400, "status must be WINNER, LOSER or BREAK_EVEN");
  return status;
}

/** A bare date as upper bound covers the whole day. */
function queryTimestamp(req: Request, name: string, endOfDay = false): string | undefined {
  const raw = queryString(req, name);
  if (raw === undefined) return undefined;
  const ts = parseTimestamp(raw);
  if (!ts) throw new HttpError(400, `${name} must be a date (YYYY-MM-DD) or timestamp`);
  return endOfDay && /^\d{4}[.\-/]\d{1,2}[.\-/]\d{1,2}$/.test(raw) ? `${ts.slice(0, 10)}T23:59:59` : ts;
}

function oneOf<T extends string>(value: string | undefined, allowed: readonly T[], name: string, fallback: T): T {
  if (value === undefined) return fallback;
  const hit = allowed.find((a) => a === value);
  if (!hit) throw new HttpError(400, `${name} must be one of ${allowed.join(", ")}`);
  return hit;
}

/* =========================
   Controller
========================= */
export interface AnalyticsControllerDeps {
  config: AppConfig;
  reports: TradeReportStore;
}

export function createAnalyticsController({ config, reports }: AnalyticsControllerDeps) {
  const ownerOf = (req: Request) => req.user?.id ?? PUBLIC_OWNER;

  const latestReport = async (req: Request): Promise<TradeReport> => {
    const report = await reports.latest(ownerOf(req));
    if (!report) throw new HttpError(404, "No trade history found. Please upload a file first.");
    return report;
  };

  /** POST /api/analytics/upload-trades  multipart field: file */
  const uploadTrades: RequestHandler = async (req, res, next) => {
    try {
      if (!req.file) {
        res.status(400).json({ message: "No file uploaded" });
        return;
      }

      const { originalname, buffer } = req.file;
      const parsed = await parseTradeFile(buffer, originalname, {
        headerScanRows: config.headerScanRows,
        contractMultiplier: config.contractMultiplier,
      });

      if (!parsed.trades.length) {
        res.status(400).json({
          message: "No valid trades found in file",
          skippedRows: parsed.skippedRows,
          ignoredRows: parsed.ignoredRows,
        });
        return;
      }
      if (parsed.trades.length > config.maxTradesPerUpload) {
        res.status(413).json({
          message: `Too many trades in one file (${parsed.trades.length}). The limit is ${config.maxTradesPerUpload}.`,
        });
        return;
      }

      await reports.save({
        ownerId: ownerOf(req),
        filename: originalname,
        uploadedAt: new Date(),
        trades: parsed.trades,
        skippedRows: parsed.skippedRows.length,
        ignoredRows: parsed.ignoredRows,
      });

      res.status(201).json({
        success: true,
        filename: originalname,
        tradesCount: parsed.trades.length,
        skippedRows: parsed.skippedRows.length,
        ignoredRows: parsed.ignoredRows,
        message: `${parsed.trades.length} trades loaded`,
      });
    } catch (err) {
      next(err);
    }
  };

  /** GET /api/analytics/trades?symbol&status&limit&offset */
  const listTrades: RequestHandler = async (req, res, next) => {
    try {
      const report = await latestReport(req);
      const trades = filterTrades(report.trades, {
        symbol: queryString(req, "symbol"),
        status: queryStatus(req),
      });
      res.json(paginate(trades, queryCount(req, "offset") ?? 0, queryCount(req, "limit")));
    } catch (err) {
      next(err);
    }
  };

  /** GET /api/analytics/summary */
  const summary: RequestHandler = async (req, res, next) => {
    try {
      const report = await latestReport(req);
      res.json(computeAnalytics(report.trades));
    } catch (err) {
      next(err);
    }
  };

  /** GET /api/analytics/filter?symbol&status&dateFrom&dateTo&minProfit&maxProfit */
  const filter: RequestHandler = async (req, res, next) => {
    try {
      const criteria: TradeFilter = {
        symbol: queryString(req, "symbol"),
        status: queryStatus(req),
        dateFrom: queryTimestamp(req, "dateFrom"),
        dateTo: queryTimestamp(req, "dateTo", true),
        minProfit: queryNumber(req, "minProfit"),
        maxProfit: queryNumber(req, "maxProfit"),
      };
      const report = await latestReport(req);
      const trades = filterTrades(report.trades, criteria);
      res.json({ filtersApplied: criteria, resultsCount: trades.length, trades });
    } catch (err) {
      next(err);
    }
  };

  /** GET /api/analytics/timeseries?metric=equity|daily_profit|cumulative_profit&groupBy=day|week|month */
  const timeseries: RequestHandler = async (req, res, next) => {
    try {
      const metric = oneOf(queryString(req, "metric"), TIMESERIES_METRICS, "metric", "equity");
      const groupBy = oneOf(queryString(req, "groupBy"), TIMESERIES_GROUPS, "groupBy", "day");
      const report = await latestReport(req);
      res.json(buildTimeseries(computeAnalytics(report.trades), metric, groupBy));
    } catch (err) {
      next(err);
    }
  };

  /** GET /api/analytics/by-symbol */
  const bySymbol: RequestHandler = async (req, res, next) => {
    try {
      const { symbolStats } = computeAnalytics((await latestReport(req)).trades);
      res.json({ symbols: symbolStats, totalSymbols: Object.keys(symbolStats).length });
    } catch (err) {
      next(err);
    }
  };

  /** GET /api/analytics/hourly-heatmap */
  const hourlyHeatmap: RequestHandler = async (req, res, next) => {
    try {
      res.json(computeHourlyBreakdown((await latestReport(req)).trades));
    } catch (err) {
      next(err);
    }
  };

  const dailyStats: RequestHandler = async (req, res, next) => {
    try {
      res.json({ dailyStats: computeAnalytics((await latestReport(req)).trades).dailyStats });
    } catch (err) {
      next(err);
    }
  };

  const monthlyStats: RequestHandler = async (req, res, next) => {
    try {
      res.json({ monthlyStats: computeAnalytics((await latestReport(req)).trades).monthlyStats });
    } catch (err) {
      next(err);
    }
  };

  return { uploadTrades, listTrades, summary, filter, timeseries, bySymbol, hourlyHeatmap, dailyStats, monthlyStats };
}
