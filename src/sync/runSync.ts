import { AppConfig } from "../config";
import { describeError } from "../core/errors";
import { HttpGet } from "../core/fetch";
import { linearBackoff } from "../core/retry";
import { FeedDocument, fetchFeed, resolveEntries } from "../feed";
import { Logger, MetricsRegistry } from "../observability";
import { buildObjectKey, ObjectStore } from "../store";
import { RunOutcome } from "../types";
import { syncEntry } from "./syncEngine";

export interface SyncDependencies {
  config: Readonly<AppConfig>;
  store: ObjectStore;
  http: HttpGet;
  logger: Logger;
  metrics: MetricsRegistry;
  sleep?: (ms: number) => Promise<void>;
}

/** Above this the feed provider starts refusing or truncating result pages. */
export const FEED_RESULT_CAP_SOFT_LIMIT = 300;

/**
 * One pass: fetch the feed, then sync entries one at a time in feed order.
 * Rejects only when the feed itself is unavailable; entry failures are counted.
 */
export async function runSync(deps: SyncDependencies): Promise<RunOutcome> {
  const { config, store, http, logger, metrics } = deps;
  const outcome: RunOutcome = { synced: 0, skipped: 0, failed: 0, failures: [] };

  if (config.maxResults > FEED_RESULT_CAP_SOFT_LIMIT) {
    logger.warn("feed_result_cap_high", { maxResults: config.maxResults, softLimit: FEED_RESULT_CAP_SOFT_LIMIT });
  }

  logger.info("sync_start", {
    store: store.describe(),
    prefix: config.store.prefix,
    maxResults: config.maxResults,
  });

  let feed: FeedDocument;
  try {
    feed = await fetchFeed({ config, http, logger, metrics });
  } catch (error) {
    logger.error("sync_feed_unavailable", { error: describeError(error) });
    throw error;
  }

  const engineDeps = {
    store,
    http,
    logger,
    metrics,
    keyPrefix: config.store.prefix,
    retryPolicy: linearBackoff(config.maxTransferAttempts, config.retryBackoffStepMs),
    sleep: deps.sleep,
  };

  for (const entry of resolveEntries(feed, logger, metrics)) {
    try {
      const result = await syncEntry(entry, engineDeps);
      if (result.status === "synced") {
        outcome.synced += 1;
        metrics.incrementCounter("pdfs_synced", 1);
      } else {
        outcome.skipped += 1;
        metrics.incrementCounter("pdfs_skipped", 1);
      }
    } catch (error) {
      const key = buildObjectKey(config.store.prefix, entry.paperId);
      const message = describeError(error);
      outcome.failed += 1;
      outcome.failures.push({ paperId: entry.paperId, key, error: message });
      metrics.incrementCounter("pdfs_failed", 1);
      logger.error("sync_entry_give_up", { paperId: entry.paperId, key, error: message });
    }
  }

  logger.info("sync_complete", {
    synced: outcome.synced,
    skipped: outcome.skipped,
    failed: outcome.failed,
  });
  return outcome;
}
