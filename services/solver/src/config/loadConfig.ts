import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";

import { appLogger } from "../observability/logger.js";
import { resolveEnv, resolveEnvBoolean, resolveEnvNumber } from "../utils/env.js";
import { AppConfigSchema, formatConfigIssues, type AppConfig } from "./schema.js";

type RawRecord = Record<string, unknown>;

export class ConfigurationError extends Error {
  constructor(message: string, readonly source?: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

type CachedConfig = {
  path: string;
  mtimeMs: number | undefined;
  config: AppConfig;
};

let cache: CachedConfig | undefined;

export function invalidateConfigCache(): void {
  cache = undefined;
}

function asRecord(value: unknown): RawRecord | undefined {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return undefined;
}

function resolveConfigPath(): string {
  return resolveEnv("APP_CONFIG") ?? path.join(process.cwd(), "config", "app.yaml");
}

function readMtime(cfgPath: string): number | undefined {
  try {
    return fs.statSync(cfgPath).mtimeMs;
  } catch {
    return undefined;
  }
}

function readConfigFile(cfgPath: string, mtimeMs: number | undefined): RawRecord {
  if (mtimeMs === undefined) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(cfgPath, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`failed to read configuration file: ${reason}`, cfgPath);
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  const doc = asRecord(parsed);
  if (!doc) {
    throw new ConfigurationError("configuration file must contain a mapping", cfgPath);
  }
  return doc;
}

function dropUndefined(record: RawRecord): RawRecord {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}

function readEnvOverrides(): RawRecord {
  return {
    sandbox: dropUndefined({
      image: resolveEnv("SANDBOX_IMAGE"),
      setupCommand: resolveEnv("SANDBOX_SETUP_COMMAND"),
      timeoutSeconds: resolveEnvNumber("SANDBOX_TIMEOUT_SECONDS"),
      stagingRoot: resolveEnv("SANDBOX_STAGING_ROOT"),
      network: resolveEnv("SANDBOX_NETWORK"),
      reclaimOnStartup: resolveEnvBoolean("SANDBOX_RECLAIM_ON_STARTUP"),
      dockerSocket: resolveEnv("DOCKER_SOCKET"),
    }),
    llm: dropUndefined({
      baseUrl: resolveEnv("OPENAI_BASE_URL"),
      apiKey: resolveEnv("OPENAI_API_KEY"),
      model: resolveEnv("OPENAI_MODEL"),
    }),
    server: dropUndefined({
      host: resolveEnv("HOST"),
      port: resolveEnvNumber("PORT"),
      historySessions: resolveEnvNumber("SERVER_HISTORY_SESSIONS"),
    }),
  };
}

export function mergeRecords(base: RawRecord, override: RawRecord): RawRecord {
  const merged: RawRecord = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = asRecord(merged[key]);
    const incoming = asRecord(value);
    if (existing && incoming) {
      merged[key] = mergeRecords(existing, incoming);
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

export function parseConfig(raw: unknown, source = "inline"): AppConfig {
  const result = AppConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigurationError(
      `invalid configuration: ${formatConfigIssues(result.error.issues)}`,
      source,
    );
  }
  return result.data;
}

export function loadConfig(): AppConfig {
  const cfgPath = resolveConfigPath();
  const mtimeMs = readMtime(cfgPath);
  if (cache && cache.path === cfgPath && cache.mtimeMs === mtimeMs) {
    return cache.config;
  }

  let envOverrides: RawRecord;
  try {
    envOverrides = readEnvOverrides();
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error), "environment");
  }

  const fileCfg = readConfigFile(cfgPath, mtimeMs);
  const config = parseConfig(mergeRecords(fileCfg, envOverrides), cfgPath);

  appLogger.debug(
    {
      configPath: mtimeMs === undefined ? undefined : cfgPath,
      image: config.sandbox.image,
      timeoutSeconds: config.sandbox.timeoutSeconds,
      model: config.llm.model,
    },
    "configuration loaded",
  );

  cache = { path: cfgPath, mtimeMs, config };
  return config;
}
