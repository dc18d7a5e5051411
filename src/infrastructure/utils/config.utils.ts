import { readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { z } from "zod";
import { CANONICAL_FIELDS, type CanonicalField } from "../../core/domain/entities/price-record.entity.js";
import type { SynonymTable } from "../../core/domain/services/header-synonym.service.js";
import type { MonthNameTable } from "../../core/domain/services/period-resolver.service.js";
import type { PromptTemplates } from "../../core/domain/services/prompt-builder.service.js";
import { PipelineError } from "../../core/domain/errors.js";

/** Config paths are relative to the working directory. */
export function resolveDataPath(path: string): string {
  return resolve(process.cwd(), path);
}

function readJson(path: string): unknown {
  try {
    return JSON.parse(readFileSync(resolveDataPath(path), "utf-8"));
  } catch (e) {
    throw new PipelineError("DATA_FILE", `Cannot read ${path}`, { cause: e });
  }
}

const SynonymFileSchema = z.record(z.string(), z.array(z.string()));

function isCanonicalField(key: string): key is CanonicalField {
  return CANONICAL_FIELDS.some((f) => f === key);
}

export function loadSynonymTable(path: string): SynonymTable {
  const parsed = SynonymFileSchema.safeParse(readJson(path));
  if (!parsed.success) {
    throw new PipelineError("DATA_FILE", `${path}: expected field -> list of header variants`);
  }
  const table: SynonymTable = {};
  for (const [key, variants] of Object.entries(parsed.data)) {
    if (!isCanonicalField(key)) {
      throw new PipelineError("DATA_FILE", `${path}: unknown canonical field "${key}"`);
    }
    table[key] = variants;
  }
  return table;
}

const MonthFileSchema = z.record(z.string().regex(/^(?:[1-9]|1[0-2])$/), z.array(z.string()));

export function loadMonthNames(path: string): MonthNameTable {
  const parsed = MonthFileSchema.safeParse(readJson(path));
  if (!parsed.success) {
    throw new PipelineError("DATA_FILE", `${path}: expected month number -> list of names`);
  }
  return parsed.data;
}

export function loadPromptTemplates(dir: string): PromptTemplates {
  const read = (name: string) => {
    try {
      return readFileSync(join(resolveDataPath(dir), name), "utf-8");
    } catch (e) {
      throw new PipelineError("DATA_FILE", `Cannot read prompt ${name} in ${dir}`, { cause: e });
    }
  };
  return { base: read("base.md"), returnStatement: read("return.md") };
}
