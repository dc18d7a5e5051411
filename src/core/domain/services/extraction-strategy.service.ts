import type { BrandProfile } from "../entities/brand-profile.entity.js";
import type { StrategyKind } from "../entities/extraction-result.entity.js";
import type { PriceDocument } from "../entities/price-document.entity.js";
import type { RawRow } from "../entities/price-record.entity.js";
import type { ILogger } from "./logger.service.js";
import type { RetryController } from "./retry-controller.service.js";

/** Prompt and reply of the last model call made for a page. */
export interface ModelExchange {
  strategy: StrategyKind;
  model: string;
  prompt: string;
  response: string;
}

export interface ExtractionContext {
  profile: BrandProfile;
  retry: RetryController;
  logger: ILogger;
  signal?: AbortSignal;
  /** Keeps a raw model reply as a debug artifact; write failures are logged, never thrown. */
  saveModelResponse(strategy: StrategyKind, reply: string): Promise<void>;
  /** Rasterized page, rendered once and shared by the image strategies. */
  pageImage(): Promise<Buffer>;
  onModelExchange(exchange: ModelExchange): void;
}

/**
 * One way of turning a page into raw rows. An empty array, or an
 * `ExtractionEmptyError`, hands the page to the next strategy.
 */
export interface IExtractionStrategy {
  readonly kind: StrategyKind;
  supports(document: PriceDocument): boolean;
  extract(document: PriceDocument, page: number, ctx: ExtractionContext): Promise<RawRow[]>;
}
