import type { PriceDocument } from "../../core/domain/entities/price-document.entity.js";
import type { RawRow } from "../../core/domain/entities/price-record.entity.js";
import { ExtractionEmptyError } from "../../core/domain/errors.js";
import type {
  ExtractionContext,
  IExtractionStrategy,
} from "../../core/domain/services/extraction-strategy.service.js";
import type { ITextModelClient } from "../../core/domain/services/model-client.service.js";
import { rowsFromModelReply } from "../../core/domain/services/model-response.service.js";
import type { IOcrEngine } from "../../core/domain/services/ocr.service.js";
import type { PromptBuilder } from "../../core/domain/services/prompt-builder.service.js";

/** Rasterize -> OCR -> text model. */
export class OcrModelStrategy implements IExtractionStrategy {
  readonly kind = "ocr-model" as const;

  constructor(
    private readonly ocr: IOcrEngine,
    private readonly model: ITextModelClient,
    private readonly prompts: PromptBuilder,
  ) {}

  supports(document: PriceDocument): boolean {
    return document.kind === "pdf";
  }

  async extract(document: PriceDocument, page: number, ctx: ExtractionContext): Promise<RawRow[]> {
    const image = await ctx.pageImage();
    const text = (await this.ocr.recognize(image)).trim();
    if (!text) throw new ExtractionEmptyError("OCR found no text on the page");

    const prompt = this.prompts.build(ctx.profile, "ocr");
    const reply = await ctx.retry.run(
      () => this.model.complete(prompt, text, { signal: ctx.signal }),
      { operation: "model.text", signal: ctx.signal, sourceFile: document.name, page },
    );
    ctx.onModelExchange({ strategy: this.kind, model: this.model.modelName, prompt, response: reply });
    await ctx.saveModelResponse(this.kind, reply);
    return rowsFromModelReply(reply, document.name, page);
  }
}
