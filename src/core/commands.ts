import { AppConfig } from "../config";
import { fetchFeed, resolveEntries } from "../feed";
import { Logger, MetricsRegistry } from "../observability";
import { buildObjectKey, createObjectStore, ObjectStore } from "../store";
import { runSync } from "../sync";
import { RunOutcome } from "../types";
import { createHttpGet, HttpGet } from "./fetch";

export interface CommandContext {
  runId: string;
  config: Readonly<AppConfig>;
  /** Built on first use, so commands that never touch the store need no store settings. */
  getStore: () => ObjectStore;
  http: HttpGet;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface CommandOverrides {
  store?: ObjectStore;
  http?: HttpGet;
}

export function createCommandContext(
  config: Readonly<AppConfig>,
  runId: string,
  overrides: CommandOverrides = {},
): CommandContext {
  let store = overrides.store;
  return {
    runId,
    config,
    getStore: () => {
      store ??= createObjectStore(config);
      return store;
    },
    http: overrides.http ?? createHttpGet(config),
    logger: new Logger({ component: "sync", runId, level: config.logLevel }),
    metrics: new MetricsRegistry(),
  };
}

export async function runSyncCommand(ctx: CommandContext): Promise<RunOutcome> {
  return runSync({
    config: ctx.config,
    store: ctx.getStore(),
    http: ctx.http,
    logger: ctx.logger,
    metrics: ctx.metrics,
  });
}

/** Logs what a sync would consider, without touching the store or any PDF. */
export async function runListCommand(ctx: CommandContext): Promise<number> {
  const feed = await fetchFeed({ config: ctx.config, http: ctx.http, logger: ctx.logger, metrics: ctx.metrics });
  let listed = 0;
  for (const entry of resolveEntries(feed, ctx.logger, ctx.metrics)) {
    listed += 1;
    ctx.logger.info("list_entry", {
      paperId: entry.paperId,
      url: entry.pdfUrl,
      key: buildObjectKey(ctx.config.store.prefix, entry.paperId),
    });
  }
  ctx.logger.info("list_complete", { listed });
  return listed;
}
