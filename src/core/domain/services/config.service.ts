import type { Config } from "../entities/config.entity.js";

export interface IConfigService {
  getConfig(): Config;
  getRunConfig(): Config["run"];
  getRetryConfig(): Config["retry"];
  getStorageConfig(): Config["storage"];
  getLoggingConfig(): Config["logging"];
}
