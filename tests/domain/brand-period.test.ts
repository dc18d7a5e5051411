import { describe, expect, it } from "vitest";
import { PipelineError } from "../../src/core/domain/errors.js";
import {
  BrandProfileResolver,
  detectBrand,
} from "../../src/core/domain/services/brand-profile.service.js";
import {
  PeriodResolver,
  parsePeriod,
  periodOfDate,
} from "../../src/core/domain/services/period-resolver.service.js";
import { MONTHS, makeProfile } from "../helpers/fixtures.js";

describe("detectBrand", () => {
  it("takes the leading capitalised tokens", () => {
    expect(detectBrand("Acme Tools 2025 Mart.pdf")).toBe("Acme Tools");
    expect(detectBrand("BrandX_2025_Mart.pdf")).toBe("BrandX");
    expect(detectBrand("folder/VALF-SAN fiyat listesi.xlsx")).toBe("VALF SAN");
  });

  it("treats non-ASCII capitals as capitalised", () => {
    expect(detectBrand("Acme Çelik Ürün 2025.pdf")).toBe("Acme Çelik Ürün");
    expect(detectBrand("Özkan vana listesi.pdf")).toBe("Özkan");
  });

  it("needs an extension and a letter", () => {
    expect(detectBrand("BrandX")).toBeNull();
    expect(detectBrand("2025_03.pdf")).toBeNull();
  });
});

describe("BrandProfileResolver", () => {
  const resolver = new BrandProfileResolver(
    [makeProfile(), makeProfile({ key: "acme", brandName: "Acme Valves", match: ["ACME"] })],
    { key: "default", recordCode: "GEN", defaultCurrency: "TRY", headingRules: {} },
  );

  it("matches profiles by case-insensitive substring", () => {
    expect(resolver.resolve("2025-03 brandx liste.pdf").profile.key).toBe("brandx");
    const acme = resolver.resolve("acme_mart.pdf");
    expect(acme.matched).toBe(true);
    expect(acme.profile.brandName).toBe("Acme Valves");
  });

  it("falls back to the default profile with the detected brand", () => {
    const { profile, matched } = resolver.resolve("Zeta Pumps 2025.pdf");
    expect(matched).toBe(false);
    expect(profile).toEqual({
      key: "default",
      brandName: "Zeta Pumps",
      match: [],
      recordCode: "GEN",
      defaultCurrency: "TRY",
      headingRules: {},
      promptHint: undefined,
    });
    expect(resolver.resolve("2025.pdf").profile.brandName).toBe("Unknown");
  });
});

describe("PeriodResolver", () => {
  const periods = new PeriodResolver(MONTHS);
  const fallback = { year: 2024, month: 6 };

  it("reads YYYY-MM first", () => {
    expect(periods.resolve("BrandX_2025-03.pdf", fallback)).toEqual({
      year: 2025,
      month: 3,
      source: "filename",
    });
    expect(periods.resolve("list 2025_11 v2.pdf", fallback)).toEqual({
      year: 2025,
      month: 11,
      source: "filename",
    });
  });

  it("reads a year with a Turkish or English month name", () => {
    expect(periods.resolve("BrandX_MART_2025.pdf", fallback)).toEqual({
      year: 2025,
      month: 3,
      source: "filename",
    });
    expect(periods.resolve("Acme Kasım 2025.xlsx", fallback)).toMatchObject({ year: 2025, month: 11 });
    expect(periods.resolve("Acme January 2026.pdf", fallback)).toMatchObject({ year: 2026, month: 1 });
  });

  it("falls back for missing parts", () => {
    expect(periods.resolve("Acme 2025.pdf", fallback)).toEqual({
      year: 2025,
      month: 6,
      source: "year-only",
    });
    expect(periods.resolve("Acme.pdf", fallback)).toEqual({ year: 2024, month: 6, source: "fallback" });
  });
});

describe("parsePeriod", () => {
  it("parses YYYY-MM", () => {
    expect(parsePeriod("2025-03")).toEqual({ year: 2025, month: 3 });
    expect(periodOfDate(new Date(2025, 10, 5))).toEqual({ year: 2025, month: 11 });
  });

  it("rejects other shapes", () => {
    expect(() => parsePeriod("2025-13")).toThrow(PipelineError);
    expect(() => parsePeriod("March 2025")).toThrow('Expected YYYY-MM, got "March 2025"');
  });
});
