import { text } from "node:stream/consumers";
import { AppConfig } from "../config";
import { describeError, FeedUnavailableError } from "../core/errors";
import { discardBody, HttpGet, HttpResponse, isSuccessStatus } from "../core/fetch";
import { Logger, MetricsRegistry } from "../observability";
import { FeedDocument, parseAtomFeed } from "./atomParser";

export interface FeedFetchDeps {
  config: Pick<AppConfig, "feedBaseUrl" | "searchQuery" | "maxResults">;
  http: HttpGet;
  logger: Logger;
  metrics: MetricsRegistry;
}

export function buildFeedUrl(config: Pick<AppConfig, "feedBaseUrl" | "searchQuery" | "maxResults">): string {
  const params = new URLSearchParams({
    search_query: config.searchQuery,
    sortBy: "submittedDate",
    sortOrder: "descending",
    max_results: String(config.maxResults),
  });
  return `${config.feedBaseUrl}?${params.toString()}`;
}

/** One request, no retry: without the feed there is nothing to sync. */
export async function fetchFeed(deps: FeedFetchDeps): Promise<FeedDocument> {
  const { http, logger, metrics } = deps;
  const url = buildFeedUrl(deps.config);
  logger.info("feed_fetch_start", { url });
  const stopTimer = metrics.startTimer("feed_fetch_ms");

  let response: HttpResponse;
  try {
    response = await http(url, { accept: "application/atom+xml" });
  } catch (error) {
    stopTimer();
    throw new FeedUnavailableError(`Feed request failed: ${describeError(error)}`, { cause: error });
  }

  if (!isSuccessStatus(response.status)) {
    stopTimer();
    discardBody(response);
    throw new FeedUnavailableError(`HTTP ${response.status} while fetching feed`, { statusCode: response.status });
  }

  let xml: string;
  try {
    xml = await text(response.body);
  } catch (error) {
    stopTimer();
    throw new FeedUnavailableError(`Feed body could not be read: ${describeError(error)}`, {
      cause: error,
      statusCode: response.status,
    });
  }

  let feed: FeedDocument;
  try {
    feed = parseAtomFeed(xml, url);
  } catch (error) {
    stopTimer();
    throw error;
  }
  const durationMs = stopTimer();
  logger.info("feed_fetch_complete", { url, durationMs, bytes: Buffer.byteLength(xml) });
  return feed;
}
