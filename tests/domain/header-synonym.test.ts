import { describe, expect, it } from "vitest";
import { PipelineError } from "../../src/core/domain/errors.js";
import {
  HeaderSynonymResolver,
  latestYearHeader,
  normalizeHeader,
} from "../../src/core/domain/services/header-synonym.service.js";
import { SYNONYMS } from "../helpers/fixtures.js";

describe("normalizeHeader", () => {
  it("folds Turkish letters, marks, underscores and trailing colons", () => {
    expect(normalizeHeader("Ürün  Kodu:")).toBe("urun kodu");
    expect(normalizeHeader("AÇIKLAMA")).toBe("aciklama");
    expect(normalizeHeader("Kısa_Kod")).toBe("kisa kod");
  });
});

describe("HeaderSynonymResolver", () => {
  const resolver = new HeaderSynonymResolver(SYNONYMS);

  it("resolves exact and folded variants", () => {
    expect(resolver.resolve("Malzeme_Kodu")).toBe("materialCode");
    expect(resolver.resolve("ÜRÜN KODU")).toBe("materialCode");
    expect(resolver.resolve("Liste Fiyatı:")).toBe("price");
    expect(resolver.resolve("Stock")).toBeNull();
  });

  it("rejects a variant claimed by two fields", () => {
    const build = () => new HeaderSynonymResolver({ materialCode: ["Kod"], shortCode: ["kod"] });
    expect(build).toThrow(PipelineError);
    expect(build).toThrow('Header variant "kod" maps to both materialCode and shortCode');
  });

  it("lets the first header claim a field", () => {
    const result = resolver.resolveHeaders(["Kod", "Ürün Kodu", "Fiyat"]);
    expect([...result.fields]).toEqual([
      ["Kod", "materialCode"],
      ["Fiyat", "price"],
    ]);
    expect(result.unresolved).toEqual(["Ürün Kodu"]);
    expect(result.priceFromYearColumn).toBeUndefined();
  });

  it("takes the latest year column as price when none is named", () => {
    const result = resolver.resolveHeaders(["Kod", "Açıklama", "2024 Liste", "2025 Liste", "Not"]);
    expect(result.fields.get("2025 Liste")).toBe("price");
    expect(result.unresolved).toEqual(["2024 Liste", "Not"]);
    expect(result.priceFromYearColumn).toBe("2025 Liste");
  });

  it("scores header rows by distinct fields", () => {
    expect(resolver.scoreHeaderRow(["Kod", "Açıklama", "Fiyat", ""])).toBe(3);
    expect(resolver.scoreHeaderRow(["Kod", "code"])).toBe(1);
    expect(resolver.scoreHeaderRow(["K100", "Vana", "12,50"])).toBe(0);
  });
});

describe("latestYearHeader", () => {
  it("ignores digits that are not a year", () => {
    expect(latestYearHeader(["Fiyat 12345", "2023"])).toBe("2023");
    expect(latestYearHeader(["Adet"])).toBeNull();
  });
});
