import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../core/errors";
import { LogLevel } from "../observability/types";
import { AppConfig, ConfigOverrides, StoreType } from "./types";

type Env = Record<string, string | undefined>;

type FieldType = "string" | "number" | "boolean";

export interface LoadConfigOptions {
  /** `false` for commands that never open the store, such as `list`. */
  requireStore?: boolean;
}

const DEFAULT_CONFIG: AppConfig = {
  feedBaseUrl: "https://export.arxiv.org/api/query",
  searchQuery: "",
  maxResults: 100,
  contactEmail: "",
  store: {
    type: "s3",
    container: "",
    prefix: "",
  },
  connectTimeoutMs: 5_000,
  readTimeoutMs: 120_000,
  maxTransferAttempts: 2,
  retryBackoffStepMs: 2_000,
  ignoreHttpsErrors: false,
  logLevel: "info",
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const FILE_FIELD_TYPES: Record<string, FieldType> = {
  feedBaseUrl: "string",
  searchQuery: "string",
  maxResults: "number",
  contactEmail: "string",
  connectTimeoutMs: "number",
  readTimeoutMs: "number",
  maxTransferAttempts: "number",
  retryBackoffStepMs: "number",
  ignoreHttpsErrors: "boolean",
  logLevel: "string",
};

const FILE_STORE_FIELD_TYPES: Record<string, FieldType> = {
  type: "string",
  container: "string",
  prefix: "string",
  region: "string",
};

function checkFieldTypes(values: object, expected: Record<string, FieldType>, scope: string): string[] {
  const problems: string[] = [];
  for (const [field, value] of Object.entries(values)) {
    const type = expected[field];
    if (type !== undefined && typeof value !== type) {
      problems.push(`${scope}${field} must be a ${type}`);
    }
  }
  return problems;
}

function isPlainObject(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value);
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
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`, { cause: error });
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file must contain a JSON object: ${absolutePath}`);
  }

  const problems = checkFieldTypes(parsed, FILE_FIELD_TYPES, "");
  const store = "store" in parsed ? parsed.store : undefined;
  if (store !== undefined) {
    if (isPlainObject(store)) {
      problems.push(...checkFieldTypes(store, FILE_STORE_FIELD_TYPES, "store."));
    } else {
      problems.push("store must be an object");
    }
  }
  if (problems.length > 0) {
    throw new ConfigError(`Config file ${absolutePath} has invalid fields: ${problems.join("; ")}`);
  }
  return parsed as ConfigOverrides;
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

function toLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

function toStoreType(value: string | undefined, fallback: StoreType): StoreType {
  const normalized = value?.trim().toLowerCase();
  return normalized === "s3" || normalized === "local" ? normalized : fallback;
}

function validate(config: AppConfig, options: LoadConfigOptions): void {
  const problems: string[] = [];
  if (!config.searchQuery.trim()) {
    problems.push("searchQuery is required (ARXIV_SEARCH)");
  }
  if (!config.contactEmail.trim()) {
    problems.push("contactEmail is required (ARXIV_EMAIL)");
  }
  if (options.requireStore !== false && !config.store.container.trim()) {
    problems.push("store.container is required (S3_BUCKET or STORE_CONTAINER)");
  }
  if (!Number.isInteger(config.maxResults) || config.maxResults < 1) {
    problems.push(`maxResults must be a positive integer, got ${config.maxResults}`);
  }
  if (!LOG_LEVELS.includes(config.logLevel)) {
    problems.push(`logLevel must be one of ${LOG_LEVELS.join(", ")}, got ${config.logLevel}`);
  }
  if (config.store.type !== "s3" && config.store.type !== "local") {
    problems.push(`store.type must be s3 or local, got ${String(config.store.type)}`);
  }
  if (!Number.isInteger(config.maxTransferAttempts) || config.maxTransferAttempts < 1) {
    problems.push(`maxTransferAttempts must be a positive integer, got ${config.maxTransferAttempts}`);
  }
  if (problems.length > 0) {
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }
}

/**
 * Builds the run configuration from defaults, an optional JSON file and the
 * environment (highest precedence). The result is frozen and validated.
 */
export function loadConfig(
  configPath?: string,
  env: Env = process.env,
  overrides: ConfigOverrides = {},
  options: LoadConfigOptions = {},
): Readonly<AppConfig> {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    store: {
      ...DEFAULT_CONFIG.store,
      ...(fileConfig.store ?? {}),
    },
  };

  const fromEnv: AppConfig = {
    ...merged,
    feedBaseUrl: env.ARXIV_API_URL ?? merged.feedBaseUrl,
    searchQuery: env.ARXIV_SEARCH ?? merged.searchQuery,
    maxResults: toInt(env.ARXIV_MAX_RESULTS, merged.maxResults),
    contactEmail: env.ARXIV_EMAIL ?? merged.contactEmail,
    connectTimeoutMs: toInt(env.CONNECT_TIMEOUT_MS, merged.connectTimeoutMs),
    readTimeoutMs: toInt(env.READ_TIMEOUT_MS, merged.readTimeoutMs),
    maxTransferAttempts: toInt(env.MAX_TRANSFER_ATTEMPTS, merged.maxTransferAttempts),
    retryBackoffStepMs: toInt(env.RETRY_BACKOFF_STEP_MS, merged.retryBackoffStepMs),
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    logLevel: toLogLevel(env.LOG_LEVEL, merged.logLevel),
    store: {
      type: toStoreType(env.STORE_TYPE, merged.store.type),
      container: env.STORE_CONTAINER ?? env.S3_BUCKET ?? merged.store.container,
      prefix: env.STORE_PREFIX ?? env.S3_PREFIX ?? merged.store.prefix,
      region: env.AWS_REGION ?? merged.store.region,
    },
  };

  const config: AppConfig = {
    ...fromEnv,
    ...overrides,
    store: {
      ...fromEnv.store,
      ...(overrides.store ?? {}),
    },
  };

  validate(config, options);
  return Object.freeze({ ...config, store: Object.freeze({ ...config.store }) });
}

export function buildUserAgent(config: Pick<AppConfig, "contactEmail">): string {
  return `arxiv-pdf-sync/1.0 (${config.contactEmail})`;
}

export { DEFAULT_CONFIG };
