export type DocumentKind = "pdf" | "spreadsheet";

/**
 * One page of a document laid out as rows of cells. PDF text lines are split
 * into cells at wide horizontal gaps; a spreadsheet page is one sheet.
 */
export interface PageContent {
  rows: string[][];
  /** Typed cell values aligned with `rows`; null where the cell is not a number. */
  values?: (number | null)[][];
}

export interface PriceDocument {
  /** File name with extension, e.g. "BrandX_2025_Mart.pdf". */
  name: string;
  path: string;
  kind: DocumentKind;
  pageCount: number;
  readPage(page: number): Promise<PageContent>;
  close(): Promise<void>;
}
