import { basename } from "node:path";
import PQueue from "p-queue";
import type {
  BatchSummary,
  DocumentResult,
  DocumentSummary,
} from "../domain/entities/extraction-result.entity.js";
import type { PriceDocument } from "../domain/entities/price-document.entity.js";
import type { IngestMode, PriceStyle } from "../domain/entities/price-record.entity.js";
import { errorMessage } from "../domain/errors.js";
import type { BrandProfileResolver } from "../domain/services/brand-profile.service.js";
import type { ILogger } from "../domain/services/logger.service.js";
import type { DebugArtifact, IDebugArtifactStore } from "../domain/repositories/debug-artifact.repository.js";
import {
  type IArtifactMirror,
  remoteDebugPath,
} from "../domain/services/artifact-mirror.service.js";
import { type Period, type PeriodResolver, periodOfDate } from "../domain/services/period-resolver.service.js";
import type { ExtractDocumentUseCase } from "./extract-document.use-case.js";
import type { MergeMasterDatasetUseCase } from "./merge-master-dataset.use-case.js";

export interface IngestPriceListsRequest {
  files: string[];
  batchId: string;
  mode: IngestMode;
  style: PriceStyle;
  /** Documents processed at once. */
  batchSize: number;
  /** Whole-batch deadline; 0 or absent means none. */
  deadlineMs?: number;
  /** Period used when a file name carries none; defaults to the ingestion date. */
  period?: Period;
  onProgress?: (done: number, total: number) => void;
}

export class IngestPriceListsUseCase {
  constructor(
    private openDocument: (path: string) => Promise<PriceDocument>,
    private profiles: BrandProfileResolver,
    private periods: PeriodResolver,
    private extractor: ExtractDocumentUseCase,
    private merger: MergeMasterDatasetUseCase,
    private logger: ILogger,
    private artifacts?: { store: IDebugArtifactStore; mirror: IArtifactMirror },
  ) {}

  async execute(request: IngestPriceListsRequest): Promise<BatchSummary> {
    const { batchId } = request;
    const startedAt = new Date();
    this.logger.init(batchId);
    this.logger.log({
      event: "batch.start",
      level: "info",
      runId: batchId,
      message: `${request.files.length} document(s), mode ${request.mode}`,
    });

    const signal =
      request.deadlineMs && request.deadlineMs > 0
        ? AbortSignal.timeout(request.deadlineMs)
        : undefined;
    const fallbackPeriod = request.period ?? periodOfDate(startedAt);
    const results = new Map<string, DocumentSummary>();
    const queue = new PQueue({ concurrency: Math.max(1, request.batchSize) });
    let done = 0;

    for (const file of request.files) {
      void queue.add(async () => {
        const summary = await this.ingestOne(file, request, fallbackPeriod, signal);
        results.set(file, summary);
        done += 1;
        request.onProgress?.(done, request.files.length);
      });
    }
    await queue.onIdle();

    const documents = request.files.flatMap((f) => {
      const s = results.get(f);
      return s ? [s] : [];
    });
    const summary: BatchSummary = {
      batchId,
      mode: request.mode,
      startedAt: startedAt.toISOString(),
      finishedAt: new Date().toISOString(),
      documents,
      totals: {
        documents: documents.length,
        succeeded: documents.filter((d) => d.status === "succeeded").length,
        partial: documents.filter((d) => d.status === "partial").length,
        exhausted: documents.filter((d) => d.status === "exhausted").length,
        failed: documents.filter((d) => d.status === "failed").length,
        rows: documents.reduce((n, d) => n + (d.merged ? d.rows : 0), 0),
      },
    };
    this.logger.log({
      event: "batch.done",
      level: "info",
      runId: batchId,
      message: `${summary.totals.succeeded} succeeded, ${summary.totals.partial} partial, ${summary.totals.exhausted} empty, ${summary.totals.failed} failed, ${summary.totals.rows} row(s) merged`,
      totals: summary.totals,
    });
    this.logger.close();
    return summary;
  }

  private async ingestOne(
    file: string,
    request: IngestPriceListsRequest,
    fallbackPeriod: Period,
    signal: AbortSignal | undefined,
  ): Promise<DocumentSummary> {
    const name = basename(file);
    const { profile } = this.profiles.resolve(name);
    const failed = (message: string, pages: DocumentSummary["pages"] = []): DocumentSummary => ({
      sourceFile: name,
      brand: profile.brandName,
      status: "failed",
      rows: 0,
      pages,
      merged: false,
      errorMessage: message,
    });

    if (signal?.aborted) return failed("Batch deadline reached before the document started");

    let document: PriceDocument;
    try {
      document = await this.openDocument(file);
    } catch (e) {
      this.logger.log({
        event: "document.done",
        level: "error",
        runId: request.batchId,
        sourceFile: name,
        status: "failed",
        message: errorMessage(e),
      });
      return failed(errorMessage(e));
    }

    let result: DocumentResult;
    try {
      result = await this.extractor.execute({
        document,
        profile,
        period: this.periods.resolve(name, fallbackPeriod),
        batchId: request.batchId,
        runId: request.batchId,
        style: request.style,
        signal,
      });
    } catch (e) {
      return failed(errorMessage(e));
    } finally {
      await document.close();
    }
    await this.mirrorArtifacts(name, request.batchId);

    const summary: DocumentSummary = {
      sourceFile: result.sourceFile,
      brand: result.brand,
      status: result.status,
      rows: result.records.length,
      pages: result.pages,
      merged: false,
      errorMessage: result.errorMessage,
      diagnostic: result.diagnostic,
    };
    // Partial documents merge the pages they finished.
    if (result.status !== "succeeded" && result.status !== "partial") return summary;

    try {
      await this.merger.execute({
        records: result.records,
        mode: request.mode,
        runId: request.batchId,
      });
      summary.merged = true;
    } catch (e) {
      return { ...failed(`Merge failed: ${errorMessage(e)}`, result.pages), rows: result.records.length };
    }
    return summary;
  }

  private async mirrorArtifacts(sourceFile: string, runId: string): Promise<void> {
    if (!this.artifacts) return;
    const { store, mirror } = this.artifacts;
    const skipped = (message: string) =>
      this.logger.log({ event: "mirror.skipped", level: "warn", runId, sourceFile, message });

    let artifacts: DebugArtifact[];
    try {
      artifacts = await store.listArtifacts(sourceFile);
    } catch (e) {
      skipped(`${mirror.name} upload skipped, cannot list debug artifacts: ${errorMessage(e)}`);
      return;
    }
    for (const artifact of artifacts) {
      try {
        await mirror.uploadFile(artifact.localPath, remoteDebugPath(artifact.key));
      } catch (e) {
        skipped(`${mirror.name} upload ${artifact.key} failed: ${errorMessage(e)}`);
      }
    }
  }
}
