import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../core/errors";
import { validateDate } from "./dates";
import { AppConfig, ConfigOverrides, OutputPaths } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  domain: "",
  canonicalHost: "",
  equivalentHosts: [],
  fromDate: "1996-01-01",
  toDate: new Date().toISOString().slice(0, 10),
  modernCutoffDate: "",
  outputRoot: "output/mirror",
  maxSelections: 0,
  requestIntervalMs: 2_000,
  maxRetries: 3,
  retryBaseDelayMs: 2_000,
  retryMaxDelayMs: 30_000,
  requestTimeoutMs: 30_000,
  discoveryPageSize: 5_000,
  discoveryMaxPageRetries: 3,
  cdxEndpoint: "https://web.archive.org/cdx/search/cdx",
  replayBaseUrl: "https://web.archive.org/web",
  userAgent: "archive-mirror/0.1 (+archive-friendly; sequential)",
  ignoreHttpsErrors: false,
  preserveQuery: false,
  onlyMissingFrom: undefined,
};

const STRING_FIELDS = [
  "domain",
  "canonicalHost",
  "fromDate",
  "toDate",
  "modernCutoffDate",
  "outputRoot",
  "cdxEndpoint",
  "replayBaseUrl",
  "userAgent",
  "onlyMissingFrom",
] as const;

const NUMBER_FIELDS = [
  "maxSelections",
  "requestIntervalMs",
  "maxRetries",
  "retryBaseDelayMs",
  "retryMaxDelayMs",
  "requestTimeoutMs",
  "discoveryPageSize",
  "discoveryMaxPageRetries",
] as const;

const BOOLEAN_FIELDS = ["ignoreHttpsErrors", "preserveQuery"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseOverrides(raw: unknown, source: string): ConfigOverrides {
  if (!isRecord(raw)) {
    throw new ConfigError(`Config file must hold a JSON object: ${source}`);
  }

  const overrides: ConfigOverrides = {};
  for (const field of STRING_FIELDS) {
    const value = raw[field];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== "string") {
      throw new ConfigError(`${field} must be a string in ${source}`);
    }
    overrides[field] = value;
  }
  for (const field of NUMBER_FIELDS) {
    const value = raw[field];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new ConfigError(`${field} must be a number in ${source}`);
    }
    overrides[field] = value;
  }
  for (const field of BOOLEAN_FIELDS) {
    const value = raw[field];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== "boolean") {
      throw new ConfigError(`${field} must be a boolean in ${source}`);
    }
    overrides[field] = value;
  }

  const hosts = raw.equivalentHosts;
  if (hosts !== undefined) {
    if (!Array.isArray(hosts) || !hosts.every((host): host is string => typeof host === "string")) {
      throw new ConfigError(`equivalentHosts must be an array of strings in ${source}`);
    }
    overrides.equivalentHosts = hosts;
  }

  return overrides;
}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath} (${error instanceof Error ? error.message : String(error)})`);
  }
  return parseOverrides(parsed, absolutePath);
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function applyEnv(merged: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
  return {
    ...merged,
    domain: env.DOMAIN ?? merged.domain,
    canonicalHost: env.CANONICAL_HOST ?? merged.canonicalHost,
    equivalentHosts: toList(env.EQUIVALENT_HOSTS, merged.equivalentHosts),
    fromDate: env.FROM_DATE ?? merged.fromDate,
    toDate: env.TO_DATE ?? merged.toDate,
    modernCutoffDate: env.MODERN_CUTOFF_DATE ?? merged.modernCutoffDate,
    outputRoot: env.OUTPUT_ROOT ?? merged.outputRoot,
    maxSelections: toInt(env.MAX_SELECTIONS, merged.maxSelections),
    requestIntervalMs: toInt(env.REQUEST_INTERVAL_MS, merged.requestIntervalMs),
    maxRetries: toInt(env.MAX_RETRIES, merged.maxRetries),
    retryBaseDelayMs: toInt(env.RETRY_BASE_DELAY_MS, merged.retryBaseDelayMs),
    retryMaxDelayMs: toInt(env.RETRY_MAX_DELAY_MS, merged.retryMaxDelayMs),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    discoveryPageSize: toInt(env.DISCOVERY_PAGE_SIZE, merged.discoveryPageSize),
    discoveryMaxPageRetries: toInt(env.DISCOVERY_MAX_PAGE_RETRIES, merged.discoveryMaxPageRetries),
    cdxEndpoint: env.CDX_ENDPOINT ?? merged.cdxEndpoint,
    replayBaseUrl: env.REPLAY_BASE_URL ?? merged.replayBaseUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    preserveQuery: toBool(env.PRESERVE_QUERY, merged.preserveQuery),
    onlyMissingFrom: env.ONLY_MISSING_FROM ?? merged.onlyMissingFrom,
  };
}

/**
 * Fills derived defaults and rejects values the pipeline cannot run with.
 * CLI overrides are applied before this runs.
 */
export function finalizeConfig(config: AppConfig): AppConfig {
  const domain = config.domain.trim().toLowerCase();
  if (!domain) {
    throw new ConfigError("domain is required (--domain, DOMAIN or the config file)");
  }

  const canonicalHost = (config.canonicalHost.trim() || domain).toLowerCase();
  const equivalentHosts =
    config.equivalentHosts.length > 0
      ? config.equivalentHosts.map((host) => host.trim().toLowerCase()).filter((host) => host.length > 0)
      : defaultEquivalentHosts(canonicalHost);

  validateDate(config.fromDate, "fromDate");
  validateDate(config.toDate, "toDate");
  if (config.fromDate > config.toDate) {
    throw new ConfigError(`fromDate ${config.fromDate} is after toDate ${config.toDate}`);
  }
  if (config.modernCutoffDate) {
    validateDate(config.modernCutoffDate, "modernCutoffDate");
  }

  for (const field of NUMBER_FIELDS) {
    if (config[field] < 0) {
      throw new ConfigError(`${field} must not be negative`);
    }
  }
  if (config.discoveryPageSize < 1) {
    throw new ConfigError("discoveryPageSize must be at least 1");
  }

  return {
    ...config,
    domain,
    canonicalHost,
    equivalentHosts: [...new Set(equivalentHosts)].sort(),
  };
}

export function defaultEquivalentHosts(canonicalHost: string): string[] {
  const bare = canonicalHost.startsWith("www.") ? canonicalHost.slice(4) : canonicalHost;
  return [bare, `www.${bare}`];
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
  };

  return applyEnv(merged, env);
}

export function getOutputPaths(config: AppConfig): OutputPaths {
  const root = path.resolve(config.outputRoot);
  return {
    siteDir: path.join(root, "site"),
    stateDir: path.join(root, "state"),
    reportsDir: path.join(root, "reports"),
  };
}

export { DEFAULT_CONFIG };
