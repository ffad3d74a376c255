import { Readable } from "node:stream";
import { vi } from "vitest";
import { AppConfig, DEFAULT_CONFIG } from "../config";
import { HttpGet, HttpResponse } from "../core/fetch";
import { Logger } from "../observability";

export const FEED_BASE_URL = "https://feed.test/api/query";

export function testConfig(overrides: Partial<Omit<AppConfig, "store">> & { store?: Partial<AppConfig["store"]> } = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    feedBaseUrl: FEED_BASE_URL,
    searchQuery: "cat:cs.LG",
    contactEmail: "test@example.com",
    ...overrides,
    store: {
      type: "s3",
      container: "test-bucket",
      prefix: "",
      ...(overrides.store ?? {}),
    },
  };
}

export function quietLogger(): Logger {
  return new Logger({ component: "test", runId: "run_test", level: "error" });
}

export interface EntryFixture {
  id: string;
  pdfUrl?: string;
}

export function atomEntry(entry: EntryFixture): string {
  const links = [`<link href="${entry.id}" rel="alternate" type="text/html"/>`];
  if (entry.pdfUrl) {
    links.push(`<link title="pdf" href="${entry.pdfUrl}" rel="related" type="application/pdf"/>`);
  }
  return `
  <entry>
    <id>${entry.id}</id>
    <title>Paper ${entry.id}</title>
    ${links.join("\n    ")}
    <arxiv:primary_category term="cs.LG" scheme="http://arxiv.org/schemas/atom"/>
  </entry>`;
}

export function atomFeed(entries: EntryFixture[]): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom" xmlns:arxiv="http://arxiv.org/schemas/atom">
  <title type="html">ArXiv Query</title>
  <id>http://arxiv.org/api/test</id>
  ${entries.map(atomEntry).join("\n")}
</feed>`;
}

/** `http://arxiv.org/abs/<id>` with a matching pdf link. */
export function paper(id: string): EntryFixture {
  return { id: `http://arxiv.org/abs/${id}`, pdfUrl: `http://arxiv.org/pdf/${id}` };
}

export function response(status: number, contentType: string, body: string): HttpResponse {
  return {
    status,
    url: "https://stub.test/",
    contentType,
    body: Readable.from([Buffer.from(body)]),
  };
}

export function pdfResponse(body = "%PDF-1.4 test"): HttpResponse {
  return response(200, "application/pdf", body);
}

export function feedResponse(entries: EntryFixture[]): HttpResponse {
  return response(200, "application/atom+xml; charset=utf-8", atomFeed(entries));
}

/** HTTP stub answering the feed URL with `feed` and every other URL through `pdf`. */
export function stubHttp(feed: () => HttpResponse, pdf: (url: string) => HttpResponse = () => pdfResponse()) {
  return vi.fn<HttpGet>(async (url) => (url.startsWith(FEED_BASE_URL) ? feed() : pdf(url)));
}

export function recordingSleep() {
  return vi.fn(async (_ms: number): Promise<void> => undefined);
}
