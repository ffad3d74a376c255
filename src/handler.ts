import { loadConfig } from "./config";
import { CommandOverrides, createCommandContext, runSyncCommand } from "./core/commands";
import { createRunId } from "./observability";
import { SyncCounts } from "./types";

export interface HandlerOverrides extends CommandOverrides {
  env?: Record<string, string | undefined>;
}

/**
 * Builds the entry point for schedulers that invoke an exported function (a
 * cron-triggered serverless function, for one). Configuration comes from the
 * environment only. The returned function rejects on configuration or feed
 * failure; entry failures are in `failed`.
 */
export function createHandler(overrides: HandlerOverrides = {}): () => Promise<SyncCounts> {
  const { env, ...commandOverrides } = overrides;

  return async () => {
    const config = loadConfig(undefined, env ?? process.env);
    const ctx = createCommandContext(config, createRunId(), commandOverrides);
    try {
      const outcome = await runSyncCommand(ctx);
      return { synced: outcome.synced, skipped: outcome.skipped, failed: outcome.failed };
    } catch (error) {
      ctx.logger.error("handler_failed", { error: error instanceof Error ? error.message : String(error) });
      throw error;
    }
  };
}

export const handler = createHandler();
