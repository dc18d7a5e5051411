import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { BatchSummary, DocumentSummary } from "../../core/domain/entities/extraction-result.entity.js";
import type { IReportGenerationService } from "../../core/domain/services/report-generation.service.js";

function formatDocument(doc: DocumentSummary): string[] {
  const head = `  [${doc.status}] ${doc.sourceFile} (${doc.brand}): ${doc.rows} row(s)${doc.merged ? ", merged" : ""}`;
  const lines = [head];
  if (doc.errorMessage) lines.push(`      error: ${doc.errorMessage}`);
  for (const page of doc.pages) {
    const note = page.note ? `: ${page.note}` : "";
    lines.push(`      p${page.page} ${page.strategy ?? "-"} ${page.status} ${page.rows} row(s)${note}`);
  }
  if (doc.diagnostic && doc.status === "exhausted") lines.push(`      diagnostic: ${doc.diagnostic}`);
  return lines;
}

/** Plain-text batch summary for the terminal. */
export function formatBatchSummary(summary: BatchSummary): string {
  const t = summary.totals;
  return [
    `Batch ${summary.batchId} (${summary.mode}) ${summary.startedAt} -> ${summary.finishedAt}`,
    ...summary.documents.flatMap(formatDocument),
    `Totals: ${t.documents} document(s): ${t.succeeded} succeeded, ${t.partial} partial, ${t.exhausted} empty, ${t.failed} failed; ${t.rows} row(s) merged`,
  ].join("\n");
}

/** Writes `<dir>/<batchId>.json`. */
export class JsonReportGenerationService implements IReportGenerationService {
  constructor(private readonly outputDir: string) {}

  async generate(summary: BatchSummary): Promise<string> {
    mkdirSync(this.outputDir, { recursive: true });
    const path = join(this.outputDir, `${summary.batchId}.json`);
    writeFileSync(path, JSON.stringify(summary, null, 2) + "\n", "utf-8");
    return path;
  }
}
