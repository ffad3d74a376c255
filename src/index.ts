#!/usr/bin/env node
import { runCli } from "./cli";
import { ConfigError, FeedUnavailableError } from "./core/errors";

async function main(): Promise<void> {
  const exitCode = await runCli(process.argv.slice(2));
  process.exitCode = exitCode;
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError || error instanceof FeedUnavailableError) {
    console.error(`${error.name}: ${error.message}`);
  } else {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`fatal: ${message}`);
  }
  process.exitCode = 1;
});
