import type { PriceDocument } from "../entities/price-document.entity.js";

export interface IPageRenderer {
  /** PNG bytes of one page. */
  render(document: PriceDocument, page: number): Promise<Buffer>;
}
