import { LogLevel } from "../observability/types";

export type StoreType = "s3" | "local";

export interface StoreConfig {
  type: StoreType;
  /** Bucket name for `s3`, directory for `local`. */
  container: string;
  prefix: string;
  region?: string;
}

export interface AppConfig {
  feedBaseUrl: string;
  searchQuery: string;
  maxResults: number;
  contactEmail: string;
  store: StoreConfig;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  maxTransferAttempts: number;
  retryBackoffStepMs: number;
  ignoreHttpsErrors: boolean;
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "store">> & {
  store?: Partial<StoreConfig>;
};
