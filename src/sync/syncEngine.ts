import { describeError, StoreQueryError, TransferError } from "../core/errors";
import { discardBody, HttpGet, HttpResponse, isSuccessStatus } from "../core/fetch";
import { RetryPolicy, withRetry } from "../core/retry";
import { Logger, MetricsRegistry } from "../observability";
import { buildObjectKey, ObjectStore } from "../store";
import { EntrySyncResult, ResolvedEntry } from "../types";

export interface SyncEngineDeps {
  store: ObjectStore;
  http: HttpGet;
  logger: Logger;
  metrics: MetricsRegistry;
  keyPrefix: string;
  retryPolicy: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
}

const PDF_CONTENT_TYPE = "application/pdf";

export function isPdfContentType(contentType: string): boolean {
  return contentType.toLowerCase().includes("pdf");
}

async function checkExists(store: ObjectStore, key: string): Promise<boolean> {
  try {
    return await store.exists(key);
  } catch (error) {
    if (error instanceof StoreQueryError) {
      throw error;
    }
    throw new StoreQueryError(key, { cause: error });
  }
}

async function transferOnce(entry: ResolvedEntry, key: string, attempt: number, deps: SyncEngineDeps): Promise<void> {
  const { paperId, pdfUrl } = entry;

  let response: HttpResponse;
  try {
    response = await deps.http(pdfUrl, { accept: "application/pdf,*/*" });
  } catch (error) {
    throw new TransferError(paperId, attempt, `Request failed: ${describeError(error)}`, { cause: error });
  }

  if (!isSuccessStatus(response.status)) {
    discardBody(response);
    throw new TransferError(paperId, attempt, `HTTP ${response.status}`);
  }

  // arXiv answers some PDF URLs with an HTML interstitial and status 200.
  if (!isPdfContentType(response.contentType)) {
    discardBody(response);
    throw new TransferError(paperId, attempt, `Non-PDF content type '${response.contentType}'`);
  }

  try {
    await deps.store.put(key, response.body, PDF_CONTENT_TYPE);
  } catch (error) {
    discardBody(response);
    throw new TransferError(paperId, attempt, `Store write failed: ${describeError(error)}`, { cause: error });
  }

  deps.logger.debug("sync_entry_transfer_ok", {
    paperId,
    key,
    attempt,
    url: response.url,
    contentLength: response.contentLength,
  });
}

/**
 * Copies one paper into the store unless its key already exists. Rejects with
 * StoreQueryError when the existence check fails, or with the last TransferError
 * once the retry policy is exhausted.
 */
export async function syncEntry(entry: ResolvedEntry, deps: SyncEngineDeps): Promise<EntrySyncResult> {
  const { logger, metrics } = deps;
  const key = buildObjectKey(deps.keyPrefix, entry.paperId);

  if (await checkExists(deps.store, key)) {
    logger.debug("sync_entry_skipped", { paperId: entry.paperId, key });
    return { paperId: entry.paperId, key, status: "skipped", attempts: 0 };
  }

  let attempts = 0;
  await withRetry(
    deps.retryPolicy,
    async (attempt) => {
      attempts = attempt;
      const stopTimer = metrics.startTimer("transfer_ms");
      try {
        await transferOnce(entry, key, attempt, deps);
      } finally {
        stopTimer();
      }
    },
    {
      sleep: deps.sleep,
      onAttemptFailed: (error, attempt, willRetry) => {
        if (willRetry) {
          metrics.incrementCounter("transfer_retries", 1);
        }
        logger.warn("sync_entry_attempt_failed", {
          paperId: entry.paperId,
          key,
          url: entry.pdfUrl,
          attempt,
          willRetry,
          error: describeError(error),
        });
      },
    },
  );

  logger.info("sync_entry_uploaded", { paperId: entry.paperId, key, attempt: attempts });
  return { paperId: entry.paperId, key, status: "synced", attempts };
}
