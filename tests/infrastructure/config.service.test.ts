import { describe, expect, it } from "vitest";
import { PipelineError } from "../../src/core/domain/errors.js";
import { HeaderSynonymResolver } from "../../src/core/domain/services/header-synonym.service.js";
import {
  ConfigService,
  applyEnvOverrides,
  parseConfig,
  substituteEnv,
} from "../../src/infrastructure/services/config.service.js";
import {
  loadMonthNames,
  loadPromptTemplates,
  loadSynonymTable,
} from "../../src/infrastructure/utils/config.utils.js";

const storage = { databasePath: "db.sqlite", spreadsheetPath: "master.xlsx", debugDir: "debug" };

describe("substituteEnv", () => {
  it("replaces whole-string placeholders and keeps unknown ones", () => {
    expect(substituteEnv({ a: "${X}", b: ["${Y}"], c: "lit ${X}", d: 3 }, { X: "1" })).toEqual({
      a: "1",
      b: ["${Y}"],
      c: "lit ${X}",
      d: 3,
    });
  });
});

describe("parseConfig", () => {
  it("fills defaults", () => {
    const config = parseConfig({ storage }, "test.yaml", {});
    expect(config.run).toEqual({ batchSize: 2, pageWorkers: 5, deadlineMs: 0, mode: "update", priceStyle: "eu" });
    expect(config.retry).toEqual({ maxRetries: 3, baseDelayMs: 1000, maxWaitMs: 30000 });
    expect(config.vision.backend).toBe("openai");
    expect(config.mirror.provider).toBe("none");
    expect(config.defaultBrand).toEqual({ key: "default", recordCode: "", defaultCurrency: "TRY", headingRules: {} });
  });

  it("applies environment overrides", () => {
    const config = parseConfig({ storage, run: { priceStyle: "eu" } }, "test.yaml", {
      PRICE_STYLE: " EN ",
      INGEST_MODE: "append",
      OPENAI_MODEL: "gpt-test",
      MAX_RETRIES: "5",
    });
    expect(config.run.priceStyle).toBe("en");
    expect(config.run.mode).toBe("append");
    expect(config.model.textModel).toBe("gpt-test");
    expect(config.retry.maxRetries).toBe(5);
  });

  it("leaves non-object documents alone", () => {
    expect(applyEnvOverrides("text", { PRICE_STYLE: "en" })).toBe("text");
  });

  it("lists every problem", () => {
    const parse = () => parseConfig({ run: { mode: "replace" } }, "test.yaml", {});
    expect(parse).toThrow(PipelineError);
    expect(parse).toThrow("Invalid configuration in test.yaml:\n  - run.mode: ");
    expect(parse).toThrow("\n  - storage: Required");
  });

  it("rejects heading rules that do not compile", () => {
    const parse = () =>
      parseConfig({ storage, defaultBrand: { headingRules: { main: ["^SERIES$", "(unclosed"] } } }, "test.yaml", {});
    expect(parse).toThrow(
      "\n  - defaultBrand.headingRules.main.1: not a valid regular expression: (unclosed",
    );
  });
});

describe("shipped configuration", () => {
  it("loads config/config.yaml", () => {
    const service = new ConfigService("config/config.yaml");
    const config = service.getConfig();
    expect(service.getRunConfig()).toBe(config.run);
    expect(service.getRetryConfig()).toBe(config.retry);
    expect(service.getStorageConfig()).toBe(config.storage);
    expect(service.getLoggingConfig()).toBe(config.logging);
    expect(config.brands.map((b) => b.key)).toEqual(["brandx", "acme"]);
    expect(config.brands[1]?.sourceLabel).toBe("Acme Price List");
    expect(config.defaultBrand.recordCode).toBe("GEN");
  });

  it("reports a missing file", () => {
    expect(() => new ConfigService("config/nope.yaml")).toThrow("Cannot read config file config/nope.yaml");
  });

  it("loads the data files", () => {
    const resolver = new HeaderSynonymResolver(loadSynonymTable("config/header-synonyms.json"));
    expect(resolver.resolve("Malzeme_Kodu")).toBe("materialCode");
    expect(resolver.resolve("BİRİM FİYAT")).toBe("price");
    expect(loadMonthNames("config/month-names.json")["3"]).toContain("mart");
    expect(loadPromptTemplates("config/prompts").returnStatement).toContain('"products"');
  });

  it("rejects unknown fields in the synonym file", () => {
    expect(() => loadSynonymTable("config/month-names.json")).toThrow(
      'config/month-names.json: unknown canonical field "1"',
    );
  });
});
