import { z } from "zod";

/**
 * Configuration schema. `config/config.yaml` is validated against this after
 * `${VAR}` substitution and environment overrides.
 */

function compiles(pattern: string): boolean {
  try {
    new RegExp(pattern, "u");
    return true;
  } catch {
    return false;
  }
}

const PatternSchema = z
  .string()
  .refine(compiles, (pattern) => ({ message: `not a valid regular expression: ${pattern}` }));

const HeadingRulesSchema = z.object({
  main: z.array(PatternSchema).optional(),
  sub: z.array(PatternSchema).optional(),
  sub2: z.array(PatternSchema).optional(),
});

export const BrandProfileSchema = z.object({
  key: z.string().min(1, "brand key is required"),
  brandName: z.string().min(1, "brandName is required"),
  match: z.array(z.string().min(1)).min(1, "at least one match pattern"),
  sourceLabel: z.string().optional(),
  recordCode: z.string().default(""),
  defaultCurrency: z.string().default("TRY"),
  headingRules: HeadingRulesSchema.default({}),
  promptHint: z.string().optional(),
});

export const DefaultBrandSchema = z.object({
  key: z.string().default("default"),
  recordCode: z.string().default(""),
  defaultCurrency: z.string().default("TRY"),
  headingRules: HeadingRulesSchema.default({}),
  promptHint: z.string().optional(),
});

export const RunConfigSchema = z.object({
  batchSize: z.number().int().min(1).default(2),
  pageWorkers: z.number().int().min(1).max(16).default(5),
  deadlineMs: z.number().int().min(0).default(0),
  mode: z.enum(["append", "update"]).default("update"),
  priceStyle: z.enum(["eu", "en"]).default("eu"),
});

export const RetryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).default(3),
  baseDelayMs: z.number().int().min(0).default(1000),
  maxWaitMs: z.number().int().min(0).default(30000),
});

export const ConfigSchema = z.object({
  run: RunConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  model: z
    .object({
      textModel: z.string().default("gpt-4o-mini"),
      visionModel: z.string().default("gpt-4o"),
      timeoutMs: z.number().int().min(1).default(120000),
      dpi: z.number().int().min(72).default(300),
    })
    .default({}),
  vision: z
    .object({ backend: z.enum(["openai", "service"]).default("openai") })
    .default({}),
  service: z
    .object({
      baseUrl: z.string().default(""),
      timeoutMs: z.number().int().min(1).default(180000),
    })
    .default({}),
  ocr: z
    .object({
      languages: z.array(z.string()).min(1).default(["tur", "eng"]),
      langPath: z.string().optional(),
    })
    .default({}),
  storage: z.object({
    databasePath: z.string().min(1, "storage.databasePath is required"),
    spreadsheetPath: z.string().min(1, "storage.spreadsheetPath is required"),
    debugDir: z.string().min(1, "storage.debugDir is required"),
    saveDebugArtifacts: z.boolean().default(true),
    summaryDir: z.string().default("./output/summaries"),
  }),
  mirror: z
    .object({
      provider: z.enum(["none", "s3", "github"]).default("none"),
      s3: z
        .object({
          bucket: z.string(),
          region: z.string(),
          prefix: z.string().default(""),
        })
        .optional(),
      github: z
        .object({
          owner: z.string(),
          repo: z.string(),
          branch: z.string().default("main"),
          datasetPath: z.string().default("data/master.xlsx"),
        })
        .optional(),
    })
    .default({}),
  logging: z
    .object({
      dir: z.string().default("./output/logs"),
      eventLog: z.string().default("ingest-events"),
      maxExcerptLength: z.number().int().min(0).default(400),
    })
    .default({}),
  synonymsPath: z.string().default("./config/header-synonyms.json"),
  monthNamesPath: z.string().default("./config/month-names.json"),
  promptsDir: z.string().default("./config/prompts"),
  brands: z.array(BrandProfileSchema).default([]),
  defaultBrand: DefaultBrandSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type RunConfig = Config["run"];
export type RetryConfig = Config["retry"];
export type StorageConfig = Config["storage"];
export type MirrorConfig = Config["mirror"];
export type LoggingConfig = Config["logging"];
