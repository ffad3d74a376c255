import { CheerioAPI, load } from "cheerio";
import { XMLValidator } from "fast-xml-parser";
import { FeedUnavailableError } from "../core/errors";
import { Logger, MetricsRegistry } from "../observability";
import { FeedEntry, ResolvedEntry } from "../types";

export const ATOM_NAMESPACE = "http://www.w3.org/2005/Atom";

export interface FeedDocument {
  sourceUrl: string;
  $: CheerioAPI;
}

/** Rejects truncated or mis-nested documents, which the cheerio XML mode would otherwise repair. */
export function parseAtomFeed(xml: string, sourceUrl: string): FeedDocument {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new FeedUnavailableError(`Feed from ${sourceUrl} is not well-formed XML: ${msg} (line ${line}, col ${col})`, {
      cause: validation.err,
    });
  }

  const $ = load(xml, { xml: true });
  const root = $.root().children("feed").first();
  if (root.length === 0) {
    throw new FeedUnavailableError(`Response from ${sourceUrl} is not an Atom feed`);
  }

  const namespace = root.attr("xmlns");
  if (namespace !== undefined && namespace !== ATOM_NAMESPACE) {
    throw new FeedUnavailableError(`Unexpected feed namespace '${namespace}' from ${sourceUrl}`);
  }

  return { sourceUrl, $ };
}

/** Last path segment of the entry id: `http://arxiv.org/abs/2505.05471v1` -> `2505.05471v1`. */
export function paperIdFromEntryId(entryId: string): string {
  const segments = entryId.trim().split("/");
  return segments[segments.length - 1] ?? "";
}

/** All entries in feed order. Pure: can be called any number of times on the same document. */
export function parseFeedEntries(feed: FeedDocument): FeedEntry[] {
  const { $ } = feed;
  const entries: FeedEntry[] = [];

  $.root()
    .children("feed")
    .children("entry")
    .each((_, element) => {
      const entry = $(element);
      const paperId = paperIdFromEntryId(entry.children("id").first().text());

      let pdfUrl: string | undefined;
      entry.children("link").each((__, link) => {
        const href = $(link).attr("href")?.trim();
        if ($(link).attr("title") === "pdf" && href) {
          pdfUrl = href;
          return false;
        }
        return undefined;
      });

      entries.push(pdfUrl ? { paperId, pdfUrl } : { paperId });
    });

  return entries;
}

/**
 * Entries that carry a PDF link. Each call starts a fresh pass over the document;
 * entries without a link (withdrawn papers, for one) are logged and dropped.
 */
export function* resolveEntries(feed: FeedDocument, logger: Logger, metrics?: MetricsRegistry): Generator<ResolvedEntry> {
  for (const entry of parseFeedEntries(feed)) {
    metrics?.incrementCounter("entries_discovered", 1);

    if (!entry.paperId) {
      logger.warn("entry_missing_id", { url: entry.pdfUrl });
      continue;
    }

    if (!entry.pdfUrl) {
      metrics?.incrementCounter("entries_missing_link", 1);
      logger.warn("entry_missing_pdf_link", { paperId: entry.paperId });
      continue;
    }

    yield { paperId: entry.paperId, pdfUrl: entry.pdfUrl };
  }
}
