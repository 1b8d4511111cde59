import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { config as loadEnv } from "dotenv";
import { IConfigService } from "../../core/domain/services/IConfigService.js";
import { Config } from "../../core/domain/entities/config.entity.js";
import { ConfigError } from "../../core/domain/errors.js";
import { ConfigSchema } from "../../adapters/validation.js";

function substituteEnv(value: unknown): unknown {
  if (typeof value === "string" && value.startsWith("${") && value.endsWith("}")) {
    const key = value.slice(2, -1);
    return process.env[key] ?? value;
  }
  if (Array.isArray(value)) return value.map(substituteEnv);
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = substituteEnv(v);
    return out;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Sets `section.key` when the section exists and the env var is non-empty. */
function overrideFromEnv(
  raw: Record<string, unknown>,
  section: string,
  key: string,
  envName: string,
): void {
  const value = process.env[envName]?.trim();
  const target = raw[section];
  if (value && isRecord(target)) target[key] = value;
}

export class ConfigService implements IConfigService {
  private config: Config;

  /**
   * Loads `.env` (or `envPath`) first, so CONFIG_PATH may come from it.
   * Path order: `configPath`, CONFIG_PATH, `./config/config.yaml`.
   */
  constructor(configPath?: string, envPath?: string) {
    loadEnv(envPath ? { path: envPath } : undefined);
    const resolvedPath =
      configPath ||
      process.env.CONFIG_PATH ||
      resolve(process.cwd(), "config", "config.yaml");
    this.config = this.loadConfig(resolvedPath);
  }

  private loadConfig(path: string): Config {
    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new ConfigError(`Failed to load config from ${path}. ${msg}`, {
        cause: e,
      });
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(raw);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new ConfigError(`Invalid YAML in ${path}. ${msg}`, { cause: e });
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config at ${path} must be a YAML object.`);
    }

    const withEnv = substituteEnv(parsed);
    if (!isRecord(withEnv)) {
      throw new ConfigError(`Config at ${path} must be a YAML object.`);
    }
    overrideFromEnv(withEnv, "logging", "dir", "LOG_ANALYZER_LOG_DIR");
    overrideFromEnv(
      withEnv,
      "analysis",
      "recentWindowMinutes",
      "LOG_ANALYZER_WINDOW_MINUTES",
    );

    const result = ConfigSchema.safeParse(withEnv);
    if (!result.success) {
      const invalid = result.error.issues.map(
        (i) => `${i.path.join(".")} (${i.message})`,
      );
      throw new ConfigError(
        `Invalid config at ${path}. Missing or invalid: ${invalid.join(", ")}.`,
        { cause: result.error },
      );
    }
    return result.data;
  }

  getConfig(): Config {
    return this.config;
  }
  getLoggingConfig(): Config["logging"] {
    return this.config.logging;
  }
  getAnalysisConfig(): Config["analysis"] {
    return this.config.analysis;
  }
  getExportConfig(): Config["export"] {
    return this.config.export;
  }
  getDemoConfig(): Config["demo"] {
    return this.config.demo;
  }
}
