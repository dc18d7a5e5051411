import type { CanonicalRecord } from "./price-record.entity.js";

export type StrategyKind = "direct-text" | "ocr-model" | "vision-model";

export type AttemptOutcome = "rows" | "empty" | "error";

export interface PageAttempt {
  strategy: StrategyKind;
  outcome: AttemptOutcome;
  rows: number;
  note?: string;
}

export type PageStatus = "succeeded" | "exhausted" | "failed";

export interface PageSummary {
  page: number;
  status: PageStatus;
  /** Strategy that produced the rows, when any did. */
  strategy?: StrategyKind;
  rawRows: number;
  rows: number;
  attempts: PageAttempt[];
  note?: string;
}

/**
 * `partial`: a permanent remote failure or the deadline stopped the document
 * after earlier pages had produced rows; those rows are kept.
 */
export type DocumentStatus = "succeeded" | "partial" | "exhausted" | "failed";

export interface DocumentResult {
  sourceFile: string;
  brand: string;
  status: DocumentStatus;
  records: CanonicalRecord[];
  rawRowCount: number;
  pages: PageSummary[];
  errorMessage?: string;
  /** Model name and truncated prompt/response for zero-row documents. */
  diagnostic?: string;
}

export interface DocumentSummary {
  sourceFile: string;
  brand: string;
  status: DocumentStatus;
  rows: number;
  pages: PageSummary[];
  merged: boolean;
  errorMessage?: string;
  diagnostic?: string;
}

export interface BatchSummary {
  batchId: string;
  mode: "append" | "update";
  startedAt: string;
  finishedAt: string;
  documents: DocumentSummary[];
  totals: {
    documents: number;
    succeeded: number;
    partial: number;
    exhausted: number;
    failed: number;
    rows: number;
  };
}
