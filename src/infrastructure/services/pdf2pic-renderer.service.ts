import pdf2pic from "pdf2pic";
import type { PriceDocument } from "../../core/domain/entities/price-document.entity.js";
import type { IPageRenderer } from "../../core/domain/services/page-renderer.service.js";
import { PipelineError } from "../../core/domain/errors.js";

export interface RendererOptions {
  dpi: number;
  width?: number;
  height?: number;
}

/** Rasterizes PDF pages through GraphicsMagick/Ghostscript via pdf2pic. */
export class Pdf2PicPageRenderer implements IPageRenderer {
  constructor(private options: RendererOptions) {}

  async render(document: PriceDocument, page: number): Promise<Buffer> {
    if (document.kind !== "pdf") {
      throw new PipelineError("RENDER", `${document.name} is not a PDF`);
    }
    const convert = pdf2pic.fromPath(document.path, {
      density: this.options.dpi,
      format: "png",
      width: this.options.width ?? 2480,
      height: this.options.height ?? 3508,
      preserveAspectRatio: true,
    });
    const result = await convert(page, { responseType: "buffer" });
    if (!result.buffer || result.buffer.length === 0) {
      throw new PipelineError("RENDER", `No image for page ${page} of ${document.name}`);
    }
    return result.buffer;
  }
}
