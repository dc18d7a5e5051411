import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import * as XLSX from "xlsx";
import type { PageContent, PriceDocument } from "../../core/domain/entities/price-document.entity.js";

/** A workbook read as one page per sheet. */
export class SpreadsheetDocument implements PriceDocument {
  readonly kind = "spreadsheet" as const;

  constructor(
    readonly path: string,
    readonly name: string,
    private readonly workbook: XLSX.WorkBook,
  ) {}

  static async open(path: string): Promise<SpreadsheetDocument> {
    const workbook = XLSX.read(await readFile(path), { type: "buffer" });
    return new SpreadsheetDocument(path, basename(path), workbook);
  }

  static fromRows(name: string, sheets: Record<string, unknown[][]>): SpreadsheetDocument {
    const workbook = XLSX.utils.book_new();
    for (const [sheetName, rows] of Object.entries(sheets)) {
      XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), sheetName);
    }
    return new SpreadsheetDocument(name, name, workbook);
  }

  get pageCount(): number {
    return this.workbook.SheetNames.length;
  }

  async readPage(page: number): Promise<PageContent> {
    const sheetName = this.workbook.SheetNames[page - 1];
    const sheet = sheetName ? this.workbook.Sheets[sheetName] : undefined;
    if (!sheet) return { rows: [] };
    // Formatted text for display and header matching, raw values for numbers.
    const text = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      defval: "",
      raw: false,
      blankrows: true,
    });
    const raw = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      defval: null,
      raw: true,
      blankrows: true,
    });
    return {
      rows: text.map((row) => row.map((cell) => (cell == null ? "" : String(cell).trim()))),
      values: text.map((row, r) =>
        row.map((_cell, c) => {
          const value = raw[r]?.[c];
          return typeof value === "number" && Number.isFinite(value) ? value : null;
        }),
      ),
    };
  }

  async close(): Promise<void> {}
}
