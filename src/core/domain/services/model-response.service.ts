import { z } from "zod";
import type { RawRow } from "../entities/price-record.entity.js";
import { ExtractionEmptyError } from "../errors.js";

const CellValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const Field = CellValue.optional();

/** Output fields the prompts ask for; other keys are kept as extra cells. */
const ProductSchema = z
  .object({
    Malzeme_Kodu: Field,
    Kisa_Kod: Field,
    Açıklama: Field,
    Fiyat: Field,
    Para_Birimi: Field,
    Marka: Field,
    Kaynak_Dosya: Field,
    Sayfa: Field,
    Record_Code: Field,
    Ana_Baslik: Field,
    Alt_Baslik: Field,
    Alt_Baslik2: Field,
    Image_Path: Field,
  })
  .catchall(CellValue);

export const PRODUCT_FIELDS: readonly string[] = Object.keys(ProductSchema.shape);

type ProductItem = z.infer<typeof ProductSchema>;

export const ModelResponseSchema = z.union([
  z.object({ products: z.array(ProductSchema) }).passthrough(),
  z.array(ProductSchema),
]);

const FENCE = /```(?:json)?\s*([\s\S]*?)\s*```/i;

/**
 * Strips Markdown fences and returns the first JSON object or array in the
 * text. Text without any bracket is returned trimmed.
 */
export function cleanModelText(text: string): string {
  if (!text) return "";
  const fenced = FENCE.exec(text);
  const body = fenced?.[1] ?? text;

  const obj = body.indexOf("{");
  const arr = body.indexOf("[");
  if (obj === -1 && arr === -1) return body.trim();
  const start = obj === -1 || (arr !== -1 && arr < obj) ? arr : obj;

  const end = matchingBracket(body, start);
  return end === -1 ? body.slice(start).trim() : body.slice(start, end + 1);
}

function matchingBracket(text: string, start: number): number {
  let depth = 0;
  let quote: string | null = null;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === "\\") i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"') quote = ch;
    else if (ch === "{" || ch === "[") depth++;
    else if (ch === "}" || ch === "]") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** JSON.parse, then a single-quote repair; null when neither yields an object or array. */
export function safeJsonParse(text: string): unknown {
  if (!text) return null;
  for (const candidate of [text, text.replace(/'/g, '"')]) {
    try {
      const value: unknown = JSON.parse(candidate);
      if (value !== null && typeof value === "object") return value;
    } catch {
      continue;
    }
  }
  return null;
}

function readProducts(text: string): ProductItem[] | null {
  const parsed = ModelResponseSchema.safeParse(safeJsonParse(cleanModelText(text)));
  if (!parsed.success) return null;
  return Array.isArray(parsed.data) ? parsed.data : parsed.data.products;
}

function cellsOf(item: ProductItem): Record<string, string> {
  const cells: Record<string, string> = {};
  for (const [key, value] of Object.entries(item)) {
    if (value === undefined) continue;
    cells[key] = value === null ? "" : String(value).trim();
  }
  return cells;
}

/**
 * Products of a model reply as header -> cell text, or null when the reply
 * is not a readable `{"products": [...]}` object or bare array.
 */
export function parseModelProducts(text: string): Record<string, string>[] | null {
  return readProducts(text)?.map(cellsOf) ?? null;
}

/**
 * Raw rows of a model reply; an unreadable reply counts as an empty page.
 * JSON numbers are carried as typed values so prices are not re-read as text.
 */
export function rowsFromModelReply(text: string, sourceFile: string, page: number): RawRow[] {
  const products = readProducts(text);
  if (!products) {
    throw new ExtractionEmptyError("Model reply is not a readable products list");
  }
  return products.map((item) => {
    const row: RawRow = { cells: cellsOf(item), page, sourceFile };
    const numbers: Record<string, number> = {};
    for (const [key, value] of Object.entries(item)) {
      if (typeof value === "number" && Number.isFinite(value)) numbers[key] = value;
    }
    if (Object.keys(numbers).length > 0) row.numbers = numbers;
    return row;
  });
}
