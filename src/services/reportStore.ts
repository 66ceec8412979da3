// src/services/reportStore.ts
import type { Collection, Db } from "mongodb";
import type { Trade } from "../types/trade";

export interface TradeReport {
  ownerId: string;
  filename: string;
  uploadedAt: Date;
  trades: Trade[];
  skippedRows: number;
  ignoredRows: number;
}

/** Where normalized uploads live between the upload call and later queries. */
export interface TradeReportStore {
  save(report: TradeReport): Promise<void>;
  latest(ownerId: string): Promise<TradeReport | null>;
}

export class MongoTradeReportStore implements TradeReportStore {
  private readonly reports: Collection<TradeReport>;

  constructor(db: Db) {
    this.reports = db.collection<TradeReport>("trade_reports");
  }

  async ensureIndexes(): Promise<void> {
    await this.reports.createIndex({ ownerId: 1, uploadedAt: -1 });
  }

  async save(report: TradeReport): Promise<void> {
    await this.reports.insertOne({ ...report });
  }

  async latest(ownerId: string): Promise<TradeReport | null> {
    const doc = await this.reports.findOne({ ownerId }, { sort: { uploadedAt: -1 } });
    if (!doc) return null;
    return {
      ownerId: doc.ownerId,
      filename: doc.filename,
      uploadedAt: doc.uploadedAt,
      trades: doc.trades,
      skippedRows: doc.skippedRows,
      ignoredRows: doc.ignoredRows,
    };
  }
}

export class InMemoryTradeReportStore implements TradeReportStore {
  private readonly byOwner = new Map<string, TradeReport[]>();

  async save(report: TradeReport): Promise<void> {
    const list = this.byOwner.get(report.ownerId) ?? [];
    list.push(report);
    this.byOwner.set(report.ownerId, list);
  }

  async latest(ownerId: string): Promise<TradeReport | null> {
    const list = this.byOwner.get(ownerId) ?? [];
    return list.reduce<TradeReport | null>(
      (newest, r) => (!newest || r.uploadedAt >= newest.uploadedAt ? r : newest),
      null
    );
  }
}
