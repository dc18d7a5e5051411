import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { config as loadEnv } from "dotenv";
import type { IConfigService } from "../../core/domain/services/config.service.js";
import { type Config, ConfigSchema } from "../../core/domain/entities/config.entity.js";
import { PipelineError } from "../../core/domain/errors.js";

/** Replaces whole-string `${VAR}` values with the environment's, leaving unknown ones as written. */
export function substituteEnv(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === "string" && value.startsWith("${") && value.endsWith("}")) {
    const key = value.slice(2, -1);
    return env[key] || value;
  }
  if (Array.isArray(value)) return value.map((v) => substituteEnv(v, env));
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = substituteEnv(v, env);
    return out;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function section(root: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = root[key];
  if (isRecord(existing)) return existing;
  const created: Record<string, unknown> = {};
  root[key] = created;
  return created;
}

/** Environment variables that override file values. */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (!isRecord(raw)) return raw;
  if (env.PRICE_STYLE) section(raw, "run").priceStyle = env.PRICE_STYLE.trim().toLowerCase();
  if (env.INGEST_MODE) section(raw, "run").mode = env.INGEST_MODE.trim().toLowerCase();
  if (env.OPENAI_MODEL) section(raw, "model").textModel = env.OPENAI_MODEL.trim();
  if (env.OPENAI_VISION_MODEL) section(raw, "model").visionModel = env.OPENAI_VISION_MODEL.trim();
  if (env.MAX_RETRIES) section(raw, "retry").maxRetries = Number(env.MAX_RETRIES);
  return raw;
}

export function parseConfig(raw: unknown, sourcePath: string, env: NodeJS.ProcessEnv = process.env): Config {
  const result = ConfigSchema.safeParse(applyEnvOverrides(substituteEnv(raw, env), env));
  if (!result.success) {
    const problems = result.error.issues.map(
      (i) => `  - ${i.path.join(".") || "(root)"}: ${i.message}`,
    );
    throw new PipelineError(
      "CONFIG_INVALID",
      `Invalid configuration in ${sourcePath}:\n${problems.join("\n")}`,
    );
  }
  return result.data;
}

export class ConfigService implements IConfigService {
  private config: Config;
  readonly configPath: string;

  constructor(configPath?: string) {
    loadEnv();
    this.configPath =
      configPath || process.env.CONFIG_PATH || resolve(process.cwd(), "config", "config.yaml");
    this.config = this.loadConfig(this.configPath);
  }

  private loadConfig(path: string): Config {
    let text: string;
    try {
      text = readFileSync(path, "utf-8");
    } catch (e) {
      throw new PipelineError("CONFIG_MISSING", `Cannot read config file ${path}`, { cause: e });
    }
    return parseConfig(yaml.load(text), path);
  }

  getConfig(): Config {
    return this.config;
  }
  getRunConfig(): Config["run"] {
    return this.config.run;
  }
  getRetryConfig(): Config["retry"] {
    return this.config.retry;
  }
  getStorageConfig(): Config["storage"] {
    return this.config.storage;
  }
  getLoggingConfig(): Config["logging"] {
    return this.config.logging;
  }
}
