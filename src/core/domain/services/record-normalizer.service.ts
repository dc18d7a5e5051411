import type { BrandProfile } from "../entities/brand-profile.entity.js";
import type {
  CanonicalField,
  CanonicalRecord,
  PriceStyle,
  RawRow,
} from "../entities/price-record.entity.js";
import { NormalizationError } from "../errors.js";
import type { HeaderSynonymResolver } from "./header-synonym.service.js";
import {
  detectCurrency,
  normalizeCode,
  normalizeCurrency,
  normalizePrice,
  splitCodeAndDescription,
} from "./price-normalizer.service.js";

export interface NormalizationContext {
  profile: BrandProfile;
  documentFile: string;
  year: number;
  month: number;
  batchId: string;
  style: PriceStyle;
}

export interface NormalizationOutcome {
  records: CanonicalRecord[];
  /** Rows dropped for an empty material code. */
  discarded: number;
  /** Rows kept with a blank price value because the price text was unreadable. */
  unreadablePrices: number;
}

/**
 * Raw rows -> canonical records. Provenance (brand, source, page, record
 * code) comes from the profile and the orchestrator, never from cells.
 */
export class RecordNormalizer {
  constructor(private readonly resolver: HeaderSynonymResolver) {}

  normalizeAll(rows: RawRow[], ctx: NormalizationContext): NormalizationOutcome {
    const records: CanonicalRecord[] = [];
    let unreadablePrices = 0;
    for (const row of rows) {
      const result = this.normalize(row, ctx);
      if (!result) continue;
      if (result.price && result.priceValue === null) unreadablePrices++;
      records.push(result);
    }
    return { records, discarded: rows.length - records.length, unreadablePrices };
  }

  normalize(row: RawRow, ctx: NormalizationContext): CanonicalRecord | null {
    const { fields, unresolved } = this.resolver.resolveHeaders(Object.keys(row.cells));
    const values: Partial<Record<CanonicalField, string>> = {};
    const headerOf: Partial<Record<CanonicalField, string>> = {};
    for (const [header, field] of fields) {
      values[field] = (row.cells[header] ?? "").trim();
      headerOf[field] = header;
    }

    let code = values.materialCode ?? "";
    let description = values.description ?? "";
    if (!normalizeCode(code)) {
      const split = splitCodeAndDescription(description);
      if (split.code) {
        code = split.code;
        description = split.description;
      }
    }
    const materialCode = normalizeCode(code);
    if (!materialCode) return null;

    const price = values.price ?? "";
    const typedPrice = headerOf.price === undefined ? undefined : row.numbers?.[headerOf.price];
    const { profile } = ctx;

    const record: CanonicalRecord = {
      materialCode,
      shortCode: normalizeCode(values.shortCode ?? ""),
      description,
      price,
      priceValue: typedPrice ?? readPrice(price, ctx.style),
      currency:
        normalizeCurrency(values.currency) ??
        normalizeCurrency(detectCurrency(price)) ??
        normalizeCurrency(profile.defaultCurrency) ??
        profile.defaultCurrency,
      brand: profile.brandName,
      sourceFile: profile.sourceLabel ?? ctx.documentFile,
      documentFile: ctx.documentFile,
      page: row.page,
      recordCode: profile.recordCode,
      mainHeading: values.mainHeading || row.headings?.main || "",
      subHeading: values.subHeading || row.headings?.sub || "",
      imagePath: values.imagePath ?? "",
      year: ctx.year,
      month: ctx.month,
      batchId: ctx.batchId,
      unresolvedHeaders: unresolved.filter((h) => (row.cells[h] ?? "").trim() !== ""),
    };
    const sub2 = values.subHeading2 || row.headings?.sub2;
    if (sub2) record.subHeading2 = sub2;
    return record;
  }
}

function readPrice(text: string, style: PriceStyle): number | null {
  if (!text) return null;
  try {
    return normalizePrice(text, style);
  } catch (e) {
    if (e instanceof NormalizationError) return null;
    throw e;
  }
}
