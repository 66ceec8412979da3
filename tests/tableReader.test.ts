import { describe, it, expect, vi, beforeEach } from "vitest";
import { Workbook } from "exceljs";
import { decodeText, detectTableFormat, readRawTable, sniffSeparator } from "../src/services/tableReader";
import { parseTradeFile } from "../src/services/tradeParser";
import { ParseError } from "../src/utils/errors";

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

async function xlsxBuffer(rows: (string | number | null)[][]): Promise<Buffer> {
  const wb = new Workbook();
  const sheet = wb.addWorksheet("Report");
  for (const row of rows) sheet.addRow(row);
  return Buffer.from(await wb.xlsx.writeBuffer());
}

describe("detectTableFormat", () => {
  it("picks the reader from the extension", () => {
    expect(detectTableFormat("history.CSV")).toBe("delimited");
    expect(detectTableFormat("history.tsv")).toBe("delimited");
    expect(detectTableFormat("ReportHistory-1000001.xlsx")).toBe("spreadsheet");
  });

  it("rejects anything else", async () => {
    await expect(readRawTable(Buffer.from("%PDF"), "report.pdf")).rejects.toThrow(
      'Unsupported file extension ".pdf". Expected one of .csv, .tsv, .txt, .xlsx'
    );
    expect(() => detectTableFormat("report")).toThrow(ParseError);
    expect(() => detectTableFormat("legacy.xls")).toThrow('Unsupported file extension ".xls"');
  });
});

describe("decodeText", () => {
  it("decodes UTF-16LE with a byte order mark", () => {
    const buf = Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from("Time,Symbol\n", "utf16le")]);
    expect(decodeText(buf)).toBe("Time,Symbol\n");
  });

  it("drops a UTF-8 byte order mark", () => {
    expect(decodeText(Buffer.from("\ufeffTime;Symbol", "utf-8"))).toBe("Time;Symbol");
  });
});

describe("sniffSeparator", () => {
  it("prefers the most frequent candidate", () => {
    expect(sniffSeparator("a;b;c\n1,5;2,5;3")).toBe(";");
    expect(sniffSeparator("a\tb\tc\n1\t2\t3")).toBe("\t");
    expect(sniffSeparator("single column")).toBe(",");
  });
});

describe("readRawTable", () => {
  it("reads semicolon files with decimal commas", async () => {
    const csv = [
      "Time;Symbol;Type;Volume;Price;Time;Price;Profit",
      "2025.01.15 09:30:00;EURUSD;buy;1,5;1,1;2025.01.15 10:00:00;1,2;15,5",
    ].join("\n");

    const rows = await readRawTable(Buffer.from(csv), "deals.csv");
    expect(rows).toEqual([
      ["Time", "Symbol", "Type", "Volume", "Price", "Time", "Price", "Profit"],
      ["2025.01.15 09:30:00", "EURUSD", "buy", "1,5", "1,1", "2025.01.15 10:00:00", "1,2", "15,5"],
    ]);

    const parsed = await parseTradeFile(Buffer.from(csv), "deals.csv");
    expect(parsed.trades[0]).toMatchObject({ volume: 1.5, openPrice: 1.1, closePrice: 1.2, profitUsd: 15.5 });
  });

  it("keeps quoted thousands separators inside one cell", async () => {
    const csv = 'Symbol,Profit\nEURUSD,"1,234.50"\n';
    const rows = await readRawTable(Buffer.from(csv), "deals.csv");
    expect(rows[1]).toEqual(["EURUSD", "1,234.50"]);
  });

  it("rejects a file that is not a workbook", async () => {
    await expect(readRawTable(Buffer.from("not a zip"), "ReportHistory.xlsx")).rejects.toThrow(ParseError);
  });

  it("reads a spreadsheet with a report preamble", async () => {
    const buffer = await xlsxBuffer([
      ["Trade History Report"],
      ["Name:", "Test Account"],
      ["Account:", "1000001"],
      ["Time", "Symbol", "Type", "Volume", "Price", "Time", "Price", "Profit"],
      [45672.395833333336, "EURUSD", "buy", 1, 1.085, "2025.01.15 10:45:00", 1.087, 200],
    ]);

    const rows = await readRawTable(buffer, "ReportHistory.xlsx");
    expect(rows[0]).toEqual(["Trade History Report", null, null, null, null, null, null, null]);
    expect(rows[3]).toEqual(["Time", "Symbol", "Type", "Volume", "Price", "Time", "Price", "Profit"]);

    const parsed = await parseTradeFile(buffer, "ReportHistory.xlsx");
    expect(parsed.headerRowIndex).toBe(3);
    expect(parsed.trades).toHaveLength(1);
    expect(parsed.trades[0]).toMatchObject({
      openTime: "2025-01-15T09:30:00",
      closeTime: "2025-01-15T10:45:00",
      duration: 75,
      profitUsd: 200,
    });
  });
});
