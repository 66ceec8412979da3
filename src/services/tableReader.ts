// src/services/tableReader.ts
import path from "path";
import { Readable } from "stream";
import csvParser from "csv-parser";
import { Workbook, type CellValue } from "exceljs";
import { ParseError } from "../utils/errors";
import type { RawCell, RawRow } from "../types/trade";

export type TableFormat = "delimited" | "spreadsheet";

const FORMAT_BY_EXTENSION: Record<string, TableFormat> = {
  ".csv": "delimited",
  ".tsv": "delimited",
  ".txt": "delimited",
  ".xlsx": "spreadsheet",
};

export function detectTableFormat(filename: string): TableFormat {
  const ext = path.extname(filename).toLowerCase();
  const format = FORMAT_BY_EXTENSION[ext];
  if (!format) {
    throw new ParseError(
      `Unsupported file extension "${ext || filename}". Expected one of ${Object.keys(FORMAT_BY_EXTENSION).join(", ")}`
    );
  }
  return format;
}

/* =========================
   Delimited text
========================= */

/** Terminal "Save as report" writes UTF-16LE with a BOM; everything else is UTF-8. */
export function decodeText(buffer: Buffer): string {
  if (buffer.length >= 2 && buffer[0] === 0xff && buffer[1] === 0xfe) {
    return buffer.subarray(2).toString("utf16le");
  }
  const text = buffer.toString("utf-8");
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

export function sniffSeparator(text: string): string {
  const sample = text
    .split(/\r?\n/)
    .filter((l) => l.trim() !== "")
    .slice(0, 10)
    .join("\n");

  let best = ",";
  let bestCount = 0;
  for (const sep of [",", ";", "\t"]) {
    const count = sample.split(sep).length - 1;
    if (count > bestCount) {
      best = sep;
      bestCount = count;
    }
  }
  return best;
}

function toCell(value: string | undefined): RawCell {
  if (value === undefined) return null;
  const v = value.trim();
  return v === "" ? null : v;
}

function readDelimited(buffer: Buffer): Promise<RawRow[]> {
  const text = decodeText(buffer);
  const separator = sniffSeparator(text);

  return new Promise((resolve, reject) => {
    const rows: RawRow[] = [];
    Readable.from([text])
      .pipe(csvParser({ headers: false, separator }))
      .on("data", (row: Record<string, string>) => {
        // headers:false keys each cell by its column index
        const width = Object.keys(row).reduce((max, k) => Math.max(max, Number(k) + 1), 0);
        const cells: RawRow = [];
        for (let i = 0; i < width; i++) cells.push(toCell(row[String(i)]));
        rows.push(cells);
      })
      .on("end", () => resolve(rows))
      .on("error", (err: Error) => reject(new ParseError(`Could not read delimited file: ${err.message}`)));
  });
}

/* =========================
   Spreadsheet
========================= */

function spreadsheetCell(value: CellValue): RawCell {
  if (value === null || value === undefined) return null;
  if (typeof value === "string") return toCell(value);
  if (typeof value === "number" || typeof value === "boolean" || value instanceof Date) return value;
  if ("richText" in value) return toCell(value.richText.map((run) => run.text).join(""));
  if ("hyperlink" in value) return typeof value.text === "string" ? toCell(value.text) : null;
  if ("result" in value) return value.result === undefined ? null : spreadsheetCell(value.result);
  // error cells (#N/A, #DIV/0!)
  return null;
}

async function readSpreadsheet(buffer: Buffer): Promise<RawRow[]> {
  const workbook = new Workbook();
  try {
    await workbook.xlsx.read(Readable.from([buffer]));
  } catch (err) {
    throw new ParseError(`Could not read spreadsheet: ${err instanceof Error ? err.message : String(err)}`);
  }

  const sheet = workbook.worksheets[0];
  if (!sheet) throw new ParseError("Spreadsheet has no sheets");

  // numbers stay numbers (Excel serials included); date-formatted cells arrive as Date
  const width = sheet.columnCount;
  const rows: RawRow[] = [];
  for (let r = 1; r <= sheet.rowCount; r++) {
    const row = sheet.getRow(r);
    const cells: RawRow = [];
    for (let c = 1; c <= width; c++) cells.push(spreadsheetCell(row.getCell(c).value));
    rows.push(cells);
  }
  return rows;
}

/** Read an uploaded file into rows of cells, picking the reader by extension. */
export async function readRawTable(buffer: Buffer, filename: string): Promise<RawRow[]> {
  const format = detectTableFormat(filename);
  return format === "spreadsheet" ? readSpreadsheet(buffer) : readDelimited(buffer);
}
