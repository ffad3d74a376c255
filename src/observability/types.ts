export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  paperId?: string;
  key?: string;
  url?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "entries_discovered"
  | "entries_missing_link"
  | "pdfs_synced"
  | "pdfs_skipped"
  | "pdfs_failed"
  | "transfer_retries";

export type MetricTimerName = "feed_fetch_ms" | "transfer_ms";
