/** One `<entry>` of the search feed. `pdfUrl` is absent when no PDF link was listed. */
export interface FeedEntry {
  paperId: string;
  pdfUrl?: string;
}

export interface ResolvedEntry {
  paperId: string;
  pdfUrl: string;
}

export type EntrySyncStatus = "synced" | "skipped";

export interface EntrySyncResult {
  paperId: string;
  key: string;
  status: EntrySyncStatus;
  attempts: number;
}

export interface EntryFailure {
  paperId: string;
  key: string;
  error: string;
}

export interface SyncCounts {
  synced: number;
  skipped: number;
  failed: number;
}

export interface RunOutcome extends SyncCounts {
  failures: EntryFailure[];
}
