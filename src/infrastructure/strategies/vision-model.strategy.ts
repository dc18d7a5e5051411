import type { PriceDocument } from "../../core/domain/entities/price-document.entity.js";
import type { RawRow } from "../../core/domain/entities/price-record.entity.js";
import type {
  ExtractionContext,
  IExtractionStrategy,
} from "../../core/domain/services/extraction-strategy.service.js";
import type { IVisionBackend } from "../../core/domain/services/model-client.service.js";
import { rowsFromModelReply } from "../../core/domain/services/model-response.service.js";
import type { PromptBuilder } from "../../core/domain/services/prompt-builder.service.js";

/** Page image straight to a vision backend asked for `{"products": [...]}`. */
export class VisionModelStrategy implements IExtractionStrategy {
  readonly kind = "vision-model" as const;

  constructor(
    private readonly backend: IVisionBackend,
    private readonly prompts: PromptBuilder,
  ) {}

  supports(document: PriceDocument): boolean {
    return document.kind === "pdf";
  }

  async extract(document: PriceDocument, page: number, ctx: ExtractionContext): Promise<RawRow[]> {
    const image = await ctx.pageImage();
    const prompt = this.prompts.build(ctx.profile, "vision");
    const reply = await ctx.retry.run(
      () => this.backend.extractFromImage(prompt, image, { signal: ctx.signal }),
      { operation: "model.vision", signal: ctx.signal, sourceFile: document.name, page },
    );
    ctx.onModelExchange({ strategy: this.kind, model: this.backend.modelName, prompt, response: reply });
    await ctx.saveModelResponse(this.kind, reply);
    return rowsFromModelReply(reply, document.name, page);
  }
}
