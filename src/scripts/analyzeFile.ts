// src/scripts/analyzeFile.ts
import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { computeAnalytics } from "../services/analytics";
import { DEFAULT_CONTRACT_MULTIPLIER, DEFAULT_HEADER_SCAN_ROWS, parseTradeFile } from "../services/tradeParser";
import { ParseError } from "../utils/errors";

dotenv.config();

const arg = (name: string) => process.argv.find((a) => a.startsWith(`--${name}=`))?.split("=")[1];

const file = arg("file");
if (!file) {
  console.error("Usage: tsx src/scripts/analyzeFile.ts --file=ReportHistory.xlsx [--scan-rows=30] [--multiplier=100]");
  process.exit(1);
}

(async (file: string) => {
  const buffer = fs.readFileSync(file);
  const parsed = await parseTradeFile(buffer, path.basename(file), {
    headerScanRows: Number(arg("scan-rows") ?? DEFAULT_HEADER_SCAN_ROWS),
    contractMultiplier: Number(arg("multiplier") ?? DEFAULT_CONTRACT_MULTIPLIER),
  });
  for (const s of parsed.skippedRows) console.warn(`⚠️ row ${s.row}: ${s.reason}`);
  console.log(JSON.stringify(computeAnalytics(parsed.trades), null, 2));
})(file).catch((err: unknown) => {
  if (err instanceof ParseError) {
    console.error(`❌ ${err.message}`);
    if (err.found.length) console.error(`   columns found: ${err.found.join(", ")}`);
  } else {
    console.error("❌", err);
  }
  process.exit(1);
});
