/**
 * Row shapes flowing through the pipeline: raw strategy output and the
 * canonical record persisted to the master dataset.
 */

export type CanonicalField =
  | "materialCode"
  | "shortCode"
  | "description"
  | "price"
  | "currency"
  | "brand"
  | "sourceFile"
  | "page"
  | "recordCode"
  | "mainHeading"
  | "subHeading"
  | "subHeading2"
  | "imagePath";

export const CANONICAL_FIELDS: readonly CanonicalField[] = [
  "materialCode",
  "shortCode",
  "description",
  "price",
  "currency",
  "brand",
  "sourceFile",
  "page",
  "recordCode",
  "mainHeading",
  "subHeading",
  "subHeading2",
  "imagePath",
];

/** One candidate row as a strategy saw it: header text -> cell text. */
export interface RawRow {
  cells: Record<string, string>;
  page: number;
  sourceFile: string;
  /** Headings in force where the row sat on the page, from brand heading rules. */
  headings?: RowHeadings;
  /** Cells that held a typed number (spreadsheet value, JSON number), by header. */
  numbers?: Record<string, number>;
}

export interface RowHeadings {
  main?: string;
  sub?: string;
  sub2?: string;
}

export type IngestMode = "append" | "update";

export type PriceStyle = "eu" | "en";

export interface CanonicalRecord {
  materialCode: string;
  shortCode: string;
  description: string;
  /** Price text as printed, original decimal separator kept. */
  price: string;
  priceValue: number | null;
  currency: string;
  brand: string;
  /** Source label from the brand profile, or the document file name. */
  sourceFile: string;
  /** File name of the ingested document; keys debug artifacts and merges. */
  documentFile: string;
  page: number;
  recordCode: string;
  mainHeading: string;
  subHeading: string;
  subHeading2?: string;
  imagePath: string;
  year: number;
  month: number;
  batchId: string;
  /** Raw headers of the source row that matched no canonical field. */
  unresolvedHeaders: string[];
}

/** (brand, year, month): the scope of one update-mode replacement. */
export interface Triple {
  brand: string;
  year: number;
  month: number;
}

export function tripleKey(t: Triple): string {
  return `${t.brand}\0${t.year}\0${String(t.month).padStart(2, "0")}`;
}

export function tripleOf(record: CanonicalRecord): Triple {
  return { brand: record.brand, year: record.year, month: record.month };
}

export function distinctTriples(records: CanonicalRecord[]): Triple[] {
  const seen = new Map<string, Triple>();
  for (const r of records) {
    const t = tripleOf(r);
    const key = tripleKey(t);
    if (!seen.has(key)) seen.set(key, t);
  }
  return [...seen.values()];
}
