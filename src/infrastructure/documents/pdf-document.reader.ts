import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { PDFDocumentProxy } from "pdfjs-dist";
import type { PageContent, PriceDocument } from "../../core/domain/entities/price-document.entity.js";

export interface PositionedText {
  text: string;
  x: number;
  y: number;
  width: number;
}

/** Vertical distance within which two text runs share a line. */
const LINE_TOLERANCE = 2;
/** Horizontal gap that starts a new cell. */
const CELL_GAP = 12;

/**
 * Groups positioned text runs into lines (top to bottom) and splits each
 * line into cells at wide horizontal gaps.
 */
export function layoutTextItems(items: PositionedText[]): string[][] {
  const lines: PositionedText[][] = [];
  const sorted = items
    .filter((i) => i.text.trim() !== "")
    .sort((a, b) => b.y - a.y || a.x - b.x);

  for (const item of sorted) {
    const line = lines[lines.length - 1];
    const anchor = line?.[0];
    if (line && anchor && Math.abs(anchor.y - item.y) <= LINE_TOLERANCE) line.push(item);
    else lines.push([item]);
  }

  return lines.map((line) => {
    const cells: string[] = [];
    let current = "";
    let end = Number.NEGATIVE_INFINITY;
    for (const item of line.sort((a, b) => a.x - b.x)) {
      const gap = item.x - end;
      if (current && gap > CELL_GAP) {
        cells.push(current.trim());
        current = item.text;
      } else {
        current += current && gap > 1 ? ` ${item.text}` : item.text;
      }
      end = item.x + item.width;
    }
    if (current.trim()) cells.push(current.trim());
    return cells;
  });
}

export class PdfDocument implements PriceDocument {
  readonly kind = "pdf" as const;

  private constructor(
    readonly path: string,
    readonly name: string,
    private readonly pdf: PDFDocumentProxy,
  ) {}

  static async open(path: string): Promise<PdfDocument> {
    const data = new Uint8Array(await readFile(path));
    const pdf = await getDocument({
      data,
      isEvalSupported: false,
      useSystemFonts: true,
      verbosity: 0,
    }).promise;
    return new PdfDocument(path, basename(path), pdf);
  }

  get pageCount(): number {
    return this.pdf.numPages;
  }

  async readPage(page: number): Promise<PageContent> {
    const proxy = await this.pdf.getPage(page);
    const content = await proxy.getTextContent();
    const items: PositionedText[] = [];
    for (const item of content.items) {
      if (!("str" in item)) continue;
      items.push({
        text: item.str,
        x: Number(item.transform[4]),
        y: Number(item.transform[5]),
        width: item.width,
      });
    }
    return { rows: layoutTextItems(items) };
  }

  async close(): Promise<void> {
    await this.pdf.destroy();
  }
}
