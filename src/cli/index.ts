import { ConfigOverrides, loadConfig } from "../config";
import { ConfigError } from "../core/errors";
import { createCommandContext, runListCommand, runSyncCommand } from "../core/commands";
import { createRunId } from "../observability";

export type CommandName = "sync" | "list";

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  query?: string;
  maxResults?: number;
  prefix?: string;
  ignoreHttpsErrors: boolean;
}

const HELP_TEXT = `
Usage:
  arxiv-pdf-sync <command> [options]

Commands:
  sync   Copy new PDFs from the search feed into the store
  list   Print the feed entries a sync would consider

Options:
  --config <path>        Optional path to JSON config file
  --query <expr>         Override the search expression (ARXIV_SEARCH)
  --max-results <n>      Override the result cap (ARXIV_MAX_RESULTS)
  --prefix <prefix>      Override the store key prefix
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help             Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "sync" || raw === "list") {
    return raw;
  }
  return undefined;
}

function readOption(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  return index >= 0 ? argv[index + 1] : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const maxResultsRaw = readOption(argv, "--max-results");
  if (maxResultsRaw !== undefined && !/^\d+$/.test(maxResultsRaw)) {
    throw new ConfigError(`--max-results must be a positive integer, got '${maxResultsRaw}'`);
  }

  return {
    command,
    configPath: readOption(argv, "--config"),
    query: readOption(argv, "--query"),
    maxResults: maxResultsRaw === undefined ? undefined : Number.parseInt(maxResultsRaw, 10),
    prefix: readOption(argv, "--prefix"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
  };
}

function toOverrides(parsed: ParsedCliArgs): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (parsed.query !== undefined) {
    overrides.searchQuery = parsed.query;
  }
  if (parsed.maxResults !== undefined) {
    overrides.maxResults = parsed.maxResults;
  }
  if (parsed.prefix !== undefined) {
    overrides.store = { prefix: parsed.prefix };
  }
  if (parsed.ignoreHttpsErrors) {
    overrides.ignoreHttpsErrors = true;
  }
  return overrides;
}

export async function runCli(argv: string[], env: Record<string, string | undefined> = process.env): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = loadConfig(parsed.configPath, env, toOverrides(parsed), { requireStore: parsed.command === "sync" });
  const runId = createRunId();
  const ctx = createCommandContext(config, runId);
  const logger = ctx.logger.child("cli");

  logger.info("command_start", {
    command: parsed.command,
    query: config.searchQuery,
    maxResults: config.maxResults,
    prefix: config.store.prefix,
  });

  try {
    switch (parsed.command) {
      case "sync": {
        const outcome = await runSyncCommand({ ...ctx, logger: ctx.logger.child("sync") });
        logger.info("command_complete", {
          command: parsed.command,
          synced: outcome.synced,
          skipped: outcome.skipped,
          failed: outcome.failed,
        });
        break;
      }
      case "list": {
        const listed = await runListCommand({ ...ctx, logger: ctx.logger.child("list") });
        logger.info("command_complete", { command: parsed.command, listed });
        break;
      }
      default:
        console.error(`Unsupported command: ${String(parsed.command)}`);
        return 1;
    }
    return 0;
  } finally {
    ctx.metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
