import PQueue from "p-queue";
import type { BrandProfile } from "../domain/entities/brand-profile.entity.js";
import type {
  DocumentResult,
  DocumentStatus,
  PageAttempt,
  PageSummary,
} from "../domain/entities/extraction-result.entity.js";
import type { PriceDocument } from "../domain/entities/price-document.entity.js";
import type { PriceStyle, RawRow } from "../domain/entities/price-record.entity.js";
import type { IDebugArtifactStore } from "../domain/repositories/debug-artifact.repository.js";
import {
  ExtractionEmptyError,
  PipelineError,
  RemoteCallError,
  RemoteTimeoutError,
  errorMessage,
} from "../domain/errors.js";
import type {
  ExtractionContext,
  IExtractionStrategy,
  ModelExchange,
} from "../domain/services/extraction-strategy.service.js";
import type { ILogger, LogLevel } from "../domain/services/logger.service.js";
import type { IPageRenderer } from "../domain/services/page-renderer.service.js";
import type { Period } from "../domain/services/period-resolver.service.js";
import type { RecordNormalizer } from "../domain/services/record-normalizer.service.js";
import type { RetryController } from "../domain/services/retry-controller.service.js";

export interface ExtractDocumentRequest {
  document: PriceDocument;
  profile: BrandProfile;
  period: Period;
  batchId: string;
  runId: string;
  style: PriceStyle;
  signal?: AbortSignal;
}

export interface ExtractDocumentOptions {
  pageWorkers: number;
  renderer?: IPageRenderer;
  debug?: IDebugArtifactStore;
  maxExcerptLength?: number;
}

interface PageOutcome {
  summary: PageSummary;
  rows: RawRow[];
  exchange?: ModelExchange;
  fatal?: RemoteCallError;
}

const DONE_LEVEL: Record<DocumentStatus, LogLevel> = {
  succeeded: "info",
  partial: "warn",
  exhausted: "warn",
  failed: "error",
};

function excerpt(text: string, max: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max)}…` : flat;
}

/** Permanent remote failures and deadlines stop the remaining pages of a document. */
function isFatal(e: unknown): e is RemoteCallError {
  return e instanceof RemoteCallError && e.classification !== "transient";
}

/**
 * Drives the strategies over every page of one document: fixed order per
 * page, first strategy with rows wins, pages run on a bounded pool and are put
 * back in page order before normalization.
 */
export class ExtractDocumentUseCase {
  constructor(
    private strategies: IExtractionStrategy[],
    private normalizer: RecordNormalizer,
    private retry: RetryController,
    private logger: ILogger,
    private options: ExtractDocumentOptions,
  ) {}

  async execute(request: ExtractDocumentRequest): Promise<DocumentResult> {
    const { document, profile, runId } = request;
    const applicable = this.strategies.filter((s) => s.supports(document));
    this.logger.log({
      event: "document.start",
      level: "info",
      runId,
      sourceFile: document.name,
      brand: profile.brandName,
      message: `${document.pageCount} page(s), strategies: ${applicable.map((s) => s.kind).join(", ")}`,
    });

    const outcomes: PageOutcome[] = [];
    const stop: { fatal?: RemoteCallError } = {};
    const queue = new PQueue({
      concurrency: Math.max(1, Math.min(this.options.pageWorkers, document.pageCount)),
    });

    for (let page = 1; page <= document.pageCount; page++) {
      void queue.add(async () => {
        if (stop.fatal) return;
        const outcome = await this.extractPage(applicable, request, page);
        outcomes.push(outcome);
        if (outcome.fatal && !stop.fatal) {
          stop.fatal = outcome.fatal;
          queue.clear();
        }
      });
    }
    await queue.onIdle();

    outcomes.sort((a, b) => a.summary.page - b.summary.page);
    const rawRows = outcomes.flatMap((o) => o.rows);
    const pages = outcomes.map((o) => o.summary);

    const { records } = this.normalizer.normalizeAll(rawRows, {
      profile,
      documentFile: document.name,
      year: request.period.year,
      month: request.period.month,
      batchId: request.batchId,
      style: request.style,
    });
    for (const summary of pages) {
      summary.rows = records.filter((r) => r.page === summary.page).length;
    }

    const { fatal } = stop;
    if (fatal) {
      const reached = new Set(pages.map((p) => p.page));
      for (let page = 1; page <= document.pageCount; page++) {
        if (reached.has(page)) continue;
        pages.push({
          page,
          status: "failed",
          rawRows: 0,
          rows: 0,
          attempts: [],
          note: "Not attempted: the document was stopped",
        });
      }
      pages.sort((a, b) => a.page - b.page);
      return this.finish(request, {
        sourceFile: document.name,
        brand: profile.brandName,
        status: records.length > 0 ? "partial" : "failed",
        records,
        rawRowCount: rawRows.length,
        pages,
        errorMessage: `${fatal.name}: ${fatal.message}`,
      });
    }

    const lastExchange = outcomes.map((o) => o.exchange).filter((e): e is ModelExchange => e !== undefined).pop();
    return this.finish(request, {
      sourceFile: document.name,
      brand: profile.brandName,
      status: records.length > 0 ? "succeeded" : "exhausted",
      records,
      rawRowCount: rawRows.length,
      pages,
      diagnostic: records.length > 0 ? undefined : this.diagnostic(lastExchange),
    });
  }

  private async extractPage(
    strategies: IExtractionStrategy[],
    request: ExtractDocumentRequest,
    page: number,
  ): Promise<PageOutcome> {
    const { document, signal, runId } = request;
    const attempts: PageAttempt[] = [];
    let exchange: ModelExchange | undefined;
    let image: Promise<Buffer> | undefined;

    const ctx: ExtractionContext = {
      profile: request.profile,
      retry: this.retry,
      logger: this.logger,
      signal,
      pageImage: () => {
        image ??= this.renderPage(request, page);
        return image;
      },
      saveModelResponse: async (strategy, reply) => {
        const { debug } = this.options;
        if (!debug) return;
        await this.saveDebug(request, page, () => debug.saveModelResponse(document.name, page, strategy, reply));
      },
      onModelExchange: (e) => {
        exchange = e;
      },
    };

    for (const strategy of strategies) {
      try {
        if (signal?.aborted) {
          throw new RemoteTimeoutError(`Deadline reached before page ${page}`);
        }
        const rows = await strategy.extract(document, page, ctx);
        attempts.push({
          strategy: strategy.kind,
          outcome: rows.length > 0 ? "rows" : "empty",
          rows: rows.length,
        });
        this.logAttempt(runId, document.name, page, attempts);
        if (rows.length > 0) {
          return {
            summary: { page, status: "succeeded", strategy: strategy.kind, rawRows: rows.length, rows: 0, attempts },
            rows,
            exchange,
          };
        }
      } catch (e) {
        const note = errorMessage(e);
        attempts.push({
          strategy: strategy.kind,
          outcome: e instanceof ExtractionEmptyError ? "empty" : "error",
          rows: 0,
          note,
        });
        this.logAttempt(runId, document.name, page, attempts);
        if (isFatal(e)) {
          return {
            summary: { page, status: "failed", rawRows: 0, rows: 0, attempts, note },
            rows: [],
            exchange,
            fatal: e,
          };
        }
      }
    }

    const note = this.diagnostic(exchange);
    this.logger.log({
      event: "page.empty",
      level: "warn",
      runId,
      sourceFile: document.name,
      page,
      message: note,
      attempts,
    });
    return {
      summary: { page, status: "exhausted", rawRows: 0, rows: 0, attempts, note },
      rows: [],
      exchange,
    };
  }

  private async renderPage(request: ExtractDocumentRequest, page: number): Promise<Buffer> {
    const { renderer, debug } = this.options;
    if (!renderer) {
      throw new PipelineError("NO_RENDERER", "No page renderer configured");
    }
    const { document } = request;
    const image = await renderer.render(document, page);
    if (debug) {
      await this.saveDebug(request, page, () => debug.savePageImage(document.name, page, image));
    }
    return image;
  }

  /** Failed writes are logged; the page keeps its rows. */
  private async saveDebug(
    request: ExtractDocumentRequest,
    page: number,
    write: () => Promise<string>,
  ): Promise<void> {
    try {
      await write();
    } catch (e) {
      this.logger.log({
        event: "debug.write_failed",
        level: "warn",
        runId: request.runId,
        sourceFile: request.document.name,
        page,
        message: errorMessage(e),
      });
    }
  }

  private diagnostic(exchange: ModelExchange | undefined): string {
    if (!exchange) return "No rows from any strategy; no model call was made";
    const max = this.options.maxExcerptLength ?? 400;
    return (
      `No rows from any strategy; last model ${exchange.model} (${exchange.strategy}). ` +
      `Prompt: "${excerpt(exchange.prompt, max)}" Response: "${excerpt(exchange.response, max)}"`
    );
  }

  private logAttempt(runId: string, sourceFile: string, page: number, attempts: PageAttempt[]): void {
    const last = attempts[attempts.length - 1];
    if (!last) return;
    this.logger.log({
      event: "page.attempt",
      level: last.outcome === "error" ? "warn" : "debug",
      runId,
      sourceFile,
      page,
      strategy: last.strategy,
      outcome: last.outcome,
      rows: last.rows,
      message: last.note,
    });
  }

  private finish(request: ExtractDocumentRequest, result: DocumentResult): DocumentResult {
    this.logger.log({
      event: "document.done",
      level: DONE_LEVEL[result.status],
      runId: request.runId,
      sourceFile: result.sourceFile,
      brand: result.brand,
      status: result.status,
      rows: result.records.length,
      message: result.errorMessage ?? result.diagnostic,
    });
    return result;
  }
}
