import { extname } from "node:path";
import type { PriceDocument } from "../../core/domain/entities/price-document.entity.js";
import { PipelineError } from "../../core/domain/errors.js";
import { PdfDocument } from "./pdf-document.reader.js";
import { SpreadsheetDocument } from "./spreadsheet-document.reader.js";

const SPREADSHEET_EXTENSIONS = new Set([".xlsx", ".xls", ".csv"]);

export function isSupportedDocument(path: string): boolean {
  const ext = extname(path).toLowerCase();
  return ext === ".pdf" || SPREADSHEET_EXTENSIONS.has(ext);
}

export type DocumentLoader = (path: string) => Promise<PriceDocument>;

export const loadDocument: DocumentLoader = async (path) => {
  const ext = extname(path).toLowerCase();
  if (ext === ".pdf") return PdfDocument.open(path);
  if (SPREADSHEET_EXTENSIONS.has(ext)) return SpreadsheetDocument.open(path);
  throw new PipelineError("UNSUPPORTED_DOCUMENT", `Unsupported document type "${ext}" for ${path}`);
};
