import type { BrandProfile } from "../../src/core/domain/entities/brand-profile.entity.js";
import type { PageContent, PriceDocument } from "../../src/core/domain/entities/price-document.entity.js";
import type { CanonicalRecord } from "../../src/core/domain/entities/price-record.entity.js";
import type { SynonymTable } from "../../src/core/domain/services/header-synonym.service.js";

export const SYNONYMS: SynonymTable = {
  materialCode: ["Malzeme_Kodu", "ürün kodu", "kod", "code"],
  shortCode: ["Kisa_Kod", "kısa kod"],
  description: ["Açıklama", "description"],
  price: ["Fiyat", "price", "liste fiyatı"],
  currency: ["Para_Birimi", "para birimi"],
  brand: ["Marka"],
  mainHeading: ["Ana_Baslik"],
  subHeading: ["Alt_Baslik"],
};

export const MONTHS: Record<string, string[]> = {
  "1": ["ocak", "january"],
  "3": ["mart", "march"],
  "11": ["kasım", "kasim", "november"],
};

export function makeProfile(overrides: Partial<BrandProfile> = {}): BrandProfile {
  return {
    key: "brandx",
    brandName: "BrandX",
    match: ["brandx"],
    recordCode: "BRX",
    defaultCurrency: "EUR",
    headingRules: {},
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<CanonicalRecord> = {}): CanonicalRecord {
  return {
    materialCode: "BX-100",
    shortCode: "",
    description: "Ball valve",
    price: "10,00",
    priceValue: 10,
    currency: "€",
    brand: "BrandX",
    sourceFile: "BrandX_2025-03.pdf",
    documentFile: "BrandX_2025-03.pdf",
    page: 1,
    recordCode: "BRX",
    mainHeading: "",
    subHeading: "",
    imagePath: "",
    year: 2025,
    month: 3,
    batchId: "batch_a",
    unresolvedHeaders: [],
    ...overrides,
  };
}

/** In-memory document: one string[][] table per page. */
export function makeDocument(
  name: string,
  pages: string[][][],
  kind: PriceDocument["kind"] = "pdf",
): PriceDocument & { closed: number } {
  return {
    name,
    path: `/tmp/${name}`,
    kind,
    pageCount: pages.length,
    closed: 0,
    async readPage(page: number): Promise<PageContent> {
      return { rows: pages[page - 1] ?? [] };
    },
    async close() {
      this.closed++;
    },
  };
}
