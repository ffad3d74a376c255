import { afterEach, describe, expect, it, vi } from "vitest";
import { FeedUnavailableError } from "../core/errors";
import { Logger, MetricsRegistry } from "../observability";
import { InMemoryObjectStore } from "../store";
import { runSync, SyncDependencies } from "../sync";
import { EntryFixture, feedResponse, paper, pdfResponse, quietLogger, recordingSleep, response, stubHttp, testConfig } from "./fixtures";

function syncDeps(store: InMemoryObjectStore, http: SyncDependencies["http"], prefix = "arxiv/2025-05-11/"): SyncDependencies {
  return {
    config: testConfig({ store: { prefix } }),
    store,
    http,
    logger: quietLogger(),
    metrics: new MetricsRegistry(),
    sleep: recordingSleep(),
  };
}

function papers(count: number): EntryFixture[] {
  return Array.from({ length: count }, (_, index) => paper(`2505.${String(index + 1).padStart(5, "0")}v1`));
}

describe("runSync", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("stores every new paper under its canonical key", async () => {
    const store = new InMemoryObjectStore();
    const http = stubHttp(() => feedResponse([paper("2505.05471v1"), paper("2505.05472v2")]));

    const outcome = await runSync(syncDeps(store, http));

    expect(outcome).toEqual({ synced: 2, skipped: 0, failed: 0, failures: [] });
    expect(store.keys()).toEqual(["arxiv/2025-05-11/2505.05471v1.pdf", "arxiv/2025-05-11/2505.05472v2.pdf"]);
  });

  it("is a no-op on a second run over the same feed and store", async () => {
    const store = new InMemoryObjectStore();
    const entries = [paper("2505.00001v1"), { id: "http://arxiv.org/abs/2505.00002v1" }, paper("2505.00003v1")];
    const http = stubHttp(() => feedResponse(entries));

    const first = await runSync(syncDeps(store, http));
    const fetchesAfterFirstRun = http.mock.calls.length;
    const second = await runSync(syncDeps(store, http));

    expect(first).toMatchObject({ synced: 2, skipped: 0, failed: 0 });
    expect(second).toMatchObject({ synced: 0, skipped: 2, failed: 0 });
    // The second run only requests the feed.
    expect(http.mock.calls.length - fetchesAfterFirstRun).toBe(1);
  });

  it("drops entries without a pdf link without counting them", async () => {
    const lines: string[] = [];
    vi.spyOn(console, "log").mockImplementation((line: string) => {
      lines.push(line);
    });
    const store = new InMemoryObjectStore();
    const http = stubHttp(() => feedResponse([{ id: "http://arxiv.org/abs/2505.09999v1" }, paper("2505.00001v1")]));

    const logger = new Logger({ component: "sync", runId: "run_test", level: "warn" });

    const outcome = await runSync({ ...syncDeps(store, http), logger });

    expect(outcome).toEqual({ synced: 1, skipped: 0, failed: 0, failures: [] });
    expect(http).toHaveBeenCalledTimes(2);
    expect(lines.map((line) => JSON.parse(line))).toEqual([
      expect.objectContaining({ level: "warn", msg: "entry_missing_pdf_link", paperId: "2505.09999v1" }),
    ]);
  });

  it("keeps going after an entry exhausts its retries", async () => {
    const store = new InMemoryObjectStore();
    const entries = papers(10);
    const badUrl = "http://arxiv.org/pdf/2505.00003v1";
    const http = stubHttp(
      () => feedResponse(entries),
      (url) => (url === badUrl ? response(200, "text/html", "<html>interstitial</html>") : pdfResponse()),
    );

    const outcome = await runSync(syncDeps(store, http, ""));

    expect(outcome.synced).toBe(9);
    expect(outcome.skipped).toBe(0);
    expect(outcome.failed).toBe(1);
    expect(outcome.failures).toEqual([
      { paperId: "2505.00003v1", key: "2505.00003v1.pdf", error: "Non-PDF content type 'text/html'" },
    ]);
    expect(store.keys()).toHaveLength(9);
    expect(store.keys()).not.toContain("2505.00003v1.pdf");
    expect(http.mock.calls.filter(([url]) => url === badUrl)).toHaveLength(2);
  });

  it("records an existence-check failure as a failed entry", async () => {
    const store = new InMemoryObjectStore();
    vi.spyOn(store, "exists").mockRejectedValueOnce(new Error("ServiceUnavailable"));
    const http = stubHttp(() => feedResponse([paper("2505.00001v1"), paper("2505.00002v1")]));

    const outcome = await runSync(syncDeps(store, http, ""));

    expect(outcome).toMatchObject({ synced: 1, skipped: 0, failed: 1 });
    expect(outcome.failures[0]).toEqual({
      paperId: "2505.00001v1",
      key: "2505.00001v1.pdf",
      error: "Existence check failed for 2505.00001v1.pdf: ServiceUnavailable",
    });
    expect(http.mock.calls.map(([url]) => url)).not.toContain("http://arxiv.org/pdf/2505.00001v1");
  });

  it("aborts before any entry when the feed answers 500", async () => {
    const store = new InMemoryObjectStore();
    const exists = vi.spyOn(store, "exists");
    const http = stubHttp(() => response(500, "text/plain", "server error"));

    await expect(runSync(syncDeps(store, http))).rejects.toBeInstanceOf(FeedUnavailableError);
    expect(http).toHaveBeenCalledTimes(1);
    expect(exists).not.toHaveBeenCalled();
  });

  it("counts outcomes in metrics", async () => {
    const store = new InMemoryObjectStore();
    store.seed("2505.00001v1.pdf", "%PDF-1.4");
    const http = stubHttp(() => feedResponse([paper("2505.00001v1"), paper("2505.00002v1")]));
    const deps = syncDeps(store, http, "");

    await runSync(deps);

    expect(deps.metrics.getCounters()).toMatchObject({
      entries_discovered: 2,
      pdfs_synced: 1,
      pdfs_skipped: 1,
      pdfs_failed: 0,
    });
  });
});
