// src/config/env.ts
import { DEFAULT_CONTRACT_MULTIPLIER, DEFAULT_HEADER_SCAN_ROWS } from "../services/tradeParser";

export type StorageKind = "mongo" | "memory";

export interface AppConfig {
  nodeEnv: string;
  port: number;
  clientUrl: string;
  storage: StorageKind;
  mongoUri?: string;
  mongoDbName?: string;
  jwtSecret: string;
  jwtExpiresInSeconds: number;
  /** skip authentication; every request acts as the "public" owner */
  publicMode: boolean;
  maxUploadMb: number;
  /** one report is stored as one document, which must stay under the 16 MB BSON limit */
  maxTradesPerUpload: number;
  headerScanRows: number;
  contractMultiplier: number;
}

function numberFrom(raw: string | undefined, fallback: number, name: string): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) throw new Error(`❌ ${name} must be a positive number, got "${raw}"`);
  return n;
}

/** Read settings from the environment. Call dotenv.config() first. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const jwtSecret = env.JWT_SECRET;
  if (!jwtSecret) throw new Error("❌ JWT_SECRET is not defined in .env");

  const storage: StorageKind = env.STORAGE === "memory" ? "memory" : "mongo";
  if (storage === "mongo" && (!env.MONGO_URI || !env.MONGO_DB_NAME)) {
    throw new Error("❌ Missing MongoDB URI or DB Name in .env (or set STORAGE=memory)");
  }

  return {
    nodeEnv: env.NODE_ENV || "development",
    port: numberFrom(env.PORT, 8000, "PORT"),
    clientUrl: env.CLIENT_URL || "http://localhost:5173",
    storage,
    mongoUri: env.MONGO_URI,
    mongoDbName: env.MONGO_DB_NAME,
    jwtSecret,
    jwtExpiresInSeconds: numberFrom(env.JWT_EXPIRES_IN_DAYS, 7, "JWT_EXPIRES_IN_DAYS") * 24 * 60 * 60,
    publicMode: env.PUBLIC_MODE === "true",
    maxUploadMb: numberFrom(env.MAX_UPLOAD_MB, 10, "MAX_UPLOAD_MB"),
    maxTradesPerUpload: numberFrom(env.MAX_TRADES_PER_UPLOAD, 20_000, "MAX_TRADES_PER_UPLOAD"),
    headerScanRows: numberFrom(env.HEADER_SCAN_ROWS, DEFAULT_HEADER_SCAN_ROWS, "HEADER_SCAN_ROWS"),
    contractMultiplier: numberFrom(env.CONTRACT_MULTIPLIER, DEFAULT_CONTRACT_MULTIPLIER, "CONTRACT_MULTIPLIER"),
  };
}

export const isProduction = (config: AppConfig) => config.nodeEnv === "production";
