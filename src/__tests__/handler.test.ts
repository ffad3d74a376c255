import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigError, FeedUnavailableError } from "../core/errors";
import { createHandler } from "../handler";
import { InMemoryObjectStore } from "../store";
import { FEED_BASE_URL, feedResponse, paper, response, stubHttp } from "./fixtures";

const ENV = {
  ARXIV_API_URL: FEED_BASE_URL,
  ARXIV_SEARCH: "cat:cs.LG",
  ARXIV_EMAIL: "test@example.com",
  S3_BUCKET: "test-bucket",
  S3_PREFIX: "arxiv/",
  MAX_TRANSFER_ATTEMPTS: "1",
  LOG_LEVEL: "error",
};

describe("createHandler", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns only the three counts", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const store = new InMemoryObjectStore();
    store.seed("arxiv/2505.00002v1.pdf", "%PDF-1.4 existing");
    const http = stubHttp(
      () => feedResponse([paper("2505.00001v1"), paper("2505.00002v1"), paper("2505.00003v1")]),
      (url) => (url.endsWith("2505.00003v1") ? response(200, "text/html", "<html></html>") : response(200, "application/pdf", "%PDF-1.4 new")),
    );

    const counts = await createHandler({ env: ENV, store, http })();

    expect(counts).toStrictEqual({ synced: 1, skipped: 1, failed: 1 });
    expect(store.keys().sort()).toEqual(["arxiv/2505.00001v1.pdf", "arxiv/2505.00002v1.pdf"]);
  });

  it("rejects on incomplete configuration without any request", async () => {
    const http = stubHttp(() => feedResponse([]));

    await expect(createHandler({ env: { ARXIV_SEARCH: "cat:cs.LG" }, store: new InMemoryObjectStore(), http })()).rejects.toBeInstanceOf(
      ConfigError,
    );
    expect(http).not.toHaveBeenCalled();
  });

  it("rejects and logs when the feed is unavailable", async () => {
    const lines: string[] = [];
    vi.spyOn(console, "error").mockImplementation((line: string) => {
      lines.push(line);
    });
    const store = new InMemoryObjectStore();
    const http = stubHttp(() => response(500, "text/plain", "internal error"));

    await expect(createHandler({ env: ENV, store, http })()).rejects.toBeInstanceOf(FeedUnavailableError);
    expect(lines.map((line) => JSON.parse(line).msg)).toEqual(["sync_feed_unavailable", "handler_failed"]);
    expect(store.keys()).toEqual([]);
  });
});
