import type { BatchSummary } from "../entities/extraction-result.entity.js";

export interface IReportGenerationService {
  /** Persists the summary and returns where it was written. */
  generate(summary: BatchSummary): Promise<string>;
}
