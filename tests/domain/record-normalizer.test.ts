import { describe, expect, it } from "vitest";
import type { RawRow } from "../../src/core/domain/entities/price-record.entity.js";
import { HeaderSynonymResolver } from "../../src/core/domain/services/header-synonym.service.js";
import {
  type NormalizationContext,
  RecordNormalizer,
} from "../../src/core/domain/services/record-normalizer.service.js";
import { SYNONYMS, makeProfile } from "../helpers/fixtures.js";

const normalizer = new RecordNormalizer(new HeaderSynonymResolver(SYNONYMS));

function context(overrides: Partial<NormalizationContext> = {}): NormalizationContext {
  return {
    profile: makeProfile(),
    documentFile: "BrandX_2025-03.pdf",
    year: 2025,
    month: 3,
    batchId: "b1",
    style: "eu",
    ...overrides,
  };
}

function row(cells: Record<string, string>, extra: Partial<RawRow> = {}): RawRow {
  return { cells, page: 2, sourceFile: "BrandX_2025-03.pdf", ...extra };
}

describe("RecordNormalizer", () => {
  it("maps cells and stamps provenance from the profile", () => {
    const record = normalizer.normalize(
      row(
        { Kod: "BX 100", Açıklama: "Ball valve", Fiyat: "1.234,50", Stok: "5", Boş: "" },
        { headings: { main: "VALVES", sub: "Series A" } },
      ),
      context(),
    );
    expect(record).toEqual({
      materialCode: "BX 100",
      shortCode: "",
      description: "Ball valve",
      price: "1.234,50",
      priceValue: 1234.5,
      currency: "€",
      brand: "BrandX",
      sourceFile: "BrandX_2025-03.pdf",
      documentFile: "BrandX_2025-03.pdf",
      page: 2,
      recordCode: "BRX",
      mainHeading: "VALVES",
      subHeading: "Series A",
      imagePath: "",
      year: 2025,
      month: 3,
      batchId: "b1",
      unresolvedHeaders: ["Stok"],
    });
  });

  it("keeps single interior spaces in codes", () => {
    const record = normalizer.normalize(row({ Kod: " 3MAS  80MA2 ", Fiyat: "1,00" }), context());
    expect(record?.materialCode).toBe("3MAS 80MA2");
  });

  it("takes a typed price value as is", () => {
    const record = normalizer.normalize(
      row({ Kod: "A-1", Fiyat: "1,234.50" }, { numbers: { Fiyat: 1234.5 } }),
      context(),
    );
    expect(record?.price).toBe("1,234.50");
    expect(record?.priceValue).toBe(1234.5);
  });

  it("splits the code out of the description and keeps unreadable prices blank", () => {
    const record = normalizer.normalize(
      row({ Açıklama: "(XV200) Gate valve", Fiyat: "abc TL" }),
      context(),
    );
    expect(record?.materialCode).toBe("XV200");
    expect(record?.description).toBe("Gate valve");
    expect(record?.price).toBe("abc TL");
    expect(record?.priceValue).toBeNull();
    expect(record?.currency).toBe("₺");
  });

  it("prefers the currency cell and the cell headings", () => {
    const record = normalizer.normalize(
      row(
        { Kod: "A100", Para_Birimi: "USD", Fiyat: "5", Ana_Baslik: "Cell head" },
        { headings: { main: "Row head", sub2: "Inner" } },
      ),
      context(),
    );
    expect(record?.currency).toBe("$");
    expect(record?.mainHeading).toBe("Cell head");
    expect(record?.subHeading2).toBe("Inner");
  });

  it("writes the profile source label", () => {
    const record = normalizer.normalize(
      row({ Kod: "A100", Fiyat: "5" }),
      context({ profile: makeProfile({ sourceLabel: "Acme Price List" }), documentFile: "acme_1.pdf" }),
    );
    expect(record?.sourceFile).toBe("Acme Price List");
    expect(record?.documentFile).toBe("acme_1.pdf");
  });

  it("counts discarded rows and unreadable prices", () => {
    const outcome = normalizer.normalizeAll(
      [
        row({ Kod: "A100", Fiyat: "5" }),
        row({ Kod: "A200", Fiyat: "n/a" }),
        row({ Açıklama: "Only text", Fiyat: "5" }),
        row({ Kod: "A300", Fiyat: "" }),
      ],
      context(),
    );
    expect(outcome.records.map((r) => r.materialCode)).toEqual(["A100", "A200", "A300"]);
    expect(outcome.discarded).toBe(1);
    expect(outcome.unreadablePrices).toBe(1);
  });
});
