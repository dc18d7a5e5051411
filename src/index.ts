#!/usr/bin/env node
/**
 * Price-list ingestion CLI.
 * Commands: ingest | export | search
 */

import { program } from "commander";
import { statSync } from "node:fs";
import { join } from "node:path";
import type { Config } from "./core/domain/entities/config.entity.js";
import type { IngestMode, PriceStyle } from "./core/domain/entities/price-record.entity.js";
import { errorMessage } from "./core/domain/errors.js";
import type { IArtifactMirror } from "./core/domain/services/artifact-mirror.service.js";
import { BrandProfileResolver } from "./core/domain/services/brand-profile.service.js";
import type { IExtractionStrategy } from "./core/domain/services/extraction-strategy.service.js";
import { HeaderSynonymResolver } from "./core/domain/services/header-synonym.service.js";
import type { ILogger, LogLevel } from "./core/domain/services/logger.service.js";
import type { IVisionBackend } from "./core/domain/services/model-client.service.js";
import { PeriodResolver, parsePeriod } from "./core/domain/services/period-resolver.service.js";
import { PromptBuilder } from "./core/domain/services/prompt-builder.service.js";
import { RecordNormalizer } from "./core/domain/services/record-normalizer.service.js";
import { RetryController } from "./core/domain/services/retry-controller.service.js";
import { ExtractDocumentUseCase } from "./core/use-cases/extract-document.use-case.js";
import { IngestPriceListsUseCase } from "./core/use-cases/ingest-price-lists.use-case.js";
import { MergeMasterDatasetUseCase } from "./core/use-cases/merge-master-dataset.use-case.js";
import { SqliteMasterDatasetRepository } from "./infrastructure/database/sqlite-master-dataset.repository.js";
import { isSupportedDocument, loadDocument } from "./infrastructure/documents/document-loader.js";
import { ConfigService } from "./infrastructure/services/config.service.js";
import { DirectTextStrategy } from "./infrastructure/strategies/direct-text.strategy.js";
import { OcrModelStrategy } from "./infrastructure/strategies/ocr-model.strategy.js";
import { VisionModelStrategy } from "./infrastructure/strategies/vision-model.strategy.js";
import { ExtractionServiceClient } from "./infrastructure/services/extraction-service.client.js";
import { GithubArtifactMirror } from "./infrastructure/services/github-artifact-mirror.service.js";
import { CompositeLogger, ConsoleLogger, JsonLogger } from "./infrastructure/services/json-logger.service.js";
import { OpenAITextModelClient, OpenAIVisionBackend } from "./infrastructure/services/openai-model.service.js";
import { Pdf2PicPageRenderer } from "./infrastructure/services/pdf2pic-renderer.service.js";
import {
  JsonReportGenerationService,
  formatBatchSummary,
} from "./infrastructure/services/report-generation.service.js";
import { S3ArtifactMirror } from "./infrastructure/services/s3-artifact-mirror.service.js";
import { TesseractOcrEngine } from "./infrastructure/services/tesseract-ocr.service.js";
import { FileDebugArtifactStore } from "./infrastructure/storage/file-debug-artifact.repository.js";
import { SpreadsheetMirrorService } from "./infrastructure/storage/spreadsheet-mirror.service.js";
import {
  loadMonthNames,
  loadPromptTemplates,
  loadSynonymTable,
  resolveDataPath,
} from "./infrastructure/utils/config.utils.js";
import { batchId } from "./infrastructure/utils/id.utils.js";
import { listFilesRecursive } from "./infrastructure/utils/storage.utils.js";

process.on("SIGTERM", () => process.exit(143));

// ─── Shared helpers ───────────────────────────────────────────────────────────

function loadConfig(): Config {
  const path: unknown = program.opts().config;
  return new ConfigService(typeof path === "string" ? path : undefined).getConfig();
}

function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n) || n < 1) {
    throw new Error(`Expected a positive integer, got "${value}"`);
  }
  return n;
}

function parseMode(value: string): IngestMode {
  if (value === "append" || value === "update") return value;
  throw new Error(`--mode must be append or update, got "${value}"`);
}

function parseStyle(value: string): PriceStyle {
  if (value === "eu" || value === "en") return value;
  throw new Error(`--style must be eu or en, got "${value}"`);
}

/** Directories expand to the supported documents inside them. */
function expandInputs(inputs: string[]): string[] {
  const files: string[] = [];
  for (const input of inputs) {
    const path = resolveDataPath(input);
    if (statSync(path, { throwIfNoEntry: false })?.isDirectory()) {
      for (const rel of listFilesRecursive(path)) {
        if (isSupportedDocument(rel)) files.push(join(path, rel));
      }
    } else {
      files.push(path);
    }
  }
  return files;
}

function createMirror(config: Config): { mirror?: IArtifactMirror; datasetPath: string } {
  const { mirror } = config;
  const datasetPath = mirror.github?.datasetPath ?? "data/master.xlsx";
  if (mirror.provider === "s3" && mirror.s3) {
    return { mirror: new S3ArtifactMirror(mirror.s3), datasetPath };
  }
  if (mirror.provider === "github" && mirror.github) {
    const token = process.env.GITHUB_TOKEN;
    if (!token) throw new Error("mirror.provider is github but GITHUB_TOKEN is not set");
    return {
      mirror: new GithubArtifactMirror({ ...mirror.github, token }),
      datasetPath,
    };
  }
  return { datasetPath };
}

function createVisionBackend(config: Config, apiKey: string): IVisionBackend {
  if (config.vision.backend === "service") {
    if (!config.service.baseUrl) {
      throw new Error("vision.backend is service but service.baseUrl is empty");
    }
    return new ExtractionServiceClient({
      baseUrl: config.service.baseUrl,
      timeoutMs: config.service.timeoutMs,
      token: process.env.EXTRACTION_SERVICE_TOKEN || undefined,
    });
  }
  return new OpenAIVisionBackend({
    apiKey,
    model: config.model.visionModel,
    timeoutMs: config.model.timeoutMs,
  });
}

function createLogger(config: Config, level: LogLevel): ILogger {
  return new CompositeLogger([
    new JsonLogger(resolveDataPath(config.logging.dir), config.logging.eventLog),
    new ConsoleLogger(level),
  ]);
}

// ─── Program ──────────────────────────────────────────────────────────────────

program
  .name("price-ingest")
  .description("Ingest supplier price lists into the master dataset")
  .option("-c, --config <path>", "Config file path");

program
  .command("ingest")
  .description("Extract, normalize and merge price-list documents")
  .argument("<files...>", "PDF or spreadsheet files, or folders holding them")
  .option("--mode <mode>", "append | update", parseMode)
  .option("--style <style>", "Price style: eu (1.234,56) | en (1,234.56)", parseStyle)
  .option("--batch-size <n>", "Documents processed at once", parsePositiveInt)
  .option("--workers <n>", "Pages processed at once per document", parsePositiveInt)
  .option("--deadline <ms>", "Whole-batch deadline in milliseconds", parsePositiveInt)
  .option("--period <YYYY-MM>", "Period for files whose name carries none")
  .option("--no-debug", "Do not save page images and model responses")
  .option("--verbose", "Print debug events")
  .action(
    async (
      inputs: string[],
      opts: {
        mode?: IngestMode;
        style?: PriceStyle;
        batchSize?: number;
        workers?: number;
        deadline?: number;
        period?: string;
        debug: boolean;
        verbose?: boolean;
      },
    ) => {
      let cleanup: Array<() => Promise<void>> = [];
      try {
        const config = loadConfig();
        const files = expandInputs(inputs);
        if (files.length === 0) {
          console.error("No price-list documents found.");
          process.exitCode = 1;
          return;
        }
        const period = opts.period ? parsePeriod(opts.period) : undefined;
        const apiKey = process.env.OPENAI_API_KEY ?? "";
        const logger = createLogger(config, opts.verbose ? "debug" : "info");
        const runId = batchId();
        logger.init(runId);
        logger.log({
          event: "config.loaded",
          level: "debug",
          runId,
          message: `${config.brands.length} brand profile(s), vision backend ${config.vision.backend}`,
        });

        const resolver = new HeaderSynonymResolver(loadSynonymTable(config.synonymsPath));
        const prompts = new PromptBuilder(loadPromptTemplates(config.promptsDir));
        const retry = new RetryController({ ...config.retry, logger });
        const ocr = new TesseractOcrEngine({
          languages: config.ocr.languages,
          langPath: config.ocr.langPath ? resolveDataPath(config.ocr.langPath) : undefined,
        });
        cleanup.push(() => ocr.terminate());

        const strategies: IExtractionStrategy[] = [new DirectTextStrategy(resolver)];
        if (apiKey || config.vision.backend === "service") {
          if (apiKey) {
            const textModel = new OpenAITextModelClient({
              apiKey,
              model: config.model.textModel,
              timeoutMs: config.model.timeoutMs,
            });
            strategies.push(new OcrModelStrategy(ocr, textModel, prompts));
          }
          strategies.push(new VisionModelStrategy(createVisionBackend(config, apiKey), prompts));
        } else {
          console.warn("OPENAI_API_KEY is not set: only direct text extraction will run.");
        }

        const storage = config.storage;
        const debug =
          opts.debug && storage.saveDebugArtifacts
            ? new FileDebugArtifactStore(resolveDataPath(storage.debugDir))
            : undefined;
        const repository = new SqliteMasterDatasetRepository(resolveDataPath(storage.databasePath));
        await repository.initialize();
        cleanup.push(() => repository.close());
        const exporter = new SpreadsheetMirrorService(repository, resolveDataPath(storage.spreadsheetPath));
        const { mirror, datasetPath } = createMirror(config);

        const merger = new MergeMasterDatasetUseCase(repository, logger, {
          debugStore: debug,
          mirror,
          exporter,
          mirrorDatasetPath: datasetPath,
        });
        const extractor = new ExtractDocumentUseCase(
          strategies,
          new RecordNormalizer(resolver),
          retry,
          logger,
          {
            pageWorkers: opts.workers ?? config.run.pageWorkers,
            renderer: new Pdf2PicPageRenderer({ dpi: config.model.dpi }),
            debug,
            maxExcerptLength: config.logging.maxExcerptLength,
          },
        );
        const ingest = new IngestPriceListsUseCase(
          loadDocument,
          new BrandProfileResolver(config.brands, config.defaultBrand),
          new PeriodResolver(loadMonthNames(config.monthNamesPath)),
          extractor,
          merger,
          logger,
          debug && mirror ? { store: debug, mirror } : undefined,
        );

        const summary = await ingest.execute({
          files,
          batchId: runId,
          mode: opts.mode ?? config.run.mode,
          style: opts.style ?? config.run.priceStyle,
          batchSize: opts.batchSize ?? config.run.batchSize,
          deadlineMs: opts.deadline ?? config.run.deadlineMs,
          period,
          onProgress: (done, total) => console.error(`Progress: ${done}/${total}`),
        });

        console.log(formatBatchSummary(summary));
        const reportPath = await new JsonReportGenerationService(
          resolveDataPath(storage.summaryDir),
        ).generate(summary);
        console.log(`Summary written to ${reportPath}`);
        if (summary.totals.failed > 0 || summary.totals.partial > 0) process.exitCode = 1;
      } catch (e) {
        console.error("Ingest failed:", errorMessage(e));
        process.exitCode = 1;
      } finally {
        for (const fn of cleanup.reverse()) {
          await fn().catch((e: unknown) => console.error("Cleanup failed:", errorMessage(e)));
        }
        cleanup = [];
      }
    },
  );

program
  .command("export")
  .description("Regenerate the spreadsheet mirror from the master database")
  .option("-o, --output <path>", "Spreadsheet path (default: storage.spreadsheetPath)")
  .action(async (opts: { output?: string }) => {
    const config = loadConfig();
    const repository = new SqliteMasterDatasetRepository(
      resolveDataPath(config.storage.databasePath),
    );
    try {
      await repository.initialize();
      const path = await new SpreadsheetMirrorService(
        repository,
        resolveDataPath(opts.output ?? config.storage.spreadsheetPath),
      ).export();
      console.log(`Exported ${await repository.count()} record(s) to ${path}`);
    } catch (e) {
      console.error("Export failed:", errorMessage(e));
      process.exitCode = 1;
    } finally {
      await repository.close();
    }
  });

program
  .command("search")
  .description("List master records whose code or description contains a term")
  .argument("<term>", "Search term")
  .option("-l, --limit <n>", "Maximum rows", parsePositiveInt, 50)
  .option("--json", "Print records as JSON")
  .action(async (term: string, opts: { limit: number; json?: boolean }) => {
    const config = loadConfig();
    const repository = new SqliteMasterDatasetRepository(
      resolveDataPath(config.storage.databasePath),
    );
    try {
      await repository.initialize();
      const records = await repository.search(term, opts.limit);
      if (opts.json) {
        console.log(JSON.stringify(records, null, 2));
        return;
      }
      if (records.length === 0) {
        console.log(`No records match "${term}".`);
        return;
      }
      for (const r of records) {
        const period = `${r.year}-${String(r.month).padStart(2, "0")}`;
        console.log(
          `${r.brand}\t${period}\t${r.materialCode}\t${r.price} ${r.currency}\t${r.description}`,
        );
      }
    } catch (e) {
      console.error("Search failed:", errorMessage(e));
      process.exitCode = 1;
    } finally {
      await repository.close();
    }
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error(errorMessage(e));
  process.exit(1);
});
