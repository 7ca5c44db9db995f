#!/usr/bin/env node

import { Command, Option } from "commander";
import { config as loadEnv } from "dotenv";
import { processCommand } from "./cli/process.js";
import { fetchCommand } from "./cli/fetch.js";
import { backfillCommand } from "./cli/backfill.js";
import { inspectCommand } from "./cli/inspect.js";
import { configShowCommand, configSetCommand } from "./cli/config.js";
import { parseTicketIds, parsePositiveInt } from "./cli/util.js";
import { startMcpServer } from "./mcp/server.js";
import { toErrorMessage } from "./core/errors.js";
import { log } from "./core/log.js";
import { VERSION } from "./version.js";

loadEnv();

const program = new Command();

program
  .name("ticketcluster")
  .description("Cluster resolved support tickets into a deduplicated issue database")
  .version(VERSION);

program
  .command("process")
  .description("Classify tickets and update the issue database")
  .addOption(
    new Option("--pages <n>", "Pages of resolved tickets to fetch (30 tickets each)")
      .argParser(parsePositiveInt)
      .conflicts("ticketIds")
  )
  .addOption(new Option("--ticket-ids <ids>", "Comma-separated ticket IDs to process").argParser(parseTicketIds))
  .option("-o, --output <path>", "Issue DB path (defaults to output/issues_db.json)")
  .option("--safe-output", "If the default DB exists, write to a timestamped copy instead")
  .option("--reprocess", "Re-run classification on tickets already in the DB")
  .option("--refresh", "Re-fetch conversations even if cached")
  .option("--prompt-debug", "Print prompts and model output without writing the DB")
  .option("-m, --model <model>", "LLM model (overrides LLM_MODEL)")
  .option("--non-interactive", "Never prompt; defaults to 5 pages without a ticket selection")
  .option("-v, --verbose", "Enable debug logging")
  .action(async (options) => {
    await processCommand(options);
  });

program
  .command("fetch")
  .description("Cache conversations and list those not linked to any issue")
  .addOption(
    new Option("--pages <n>", "Pages of resolved tickets to fetch")
      .argParser(parsePositiveInt)
      .conflicts("ticketIds")
  )
  .addOption(new Option("--ticket-ids <ids>", "Comma-separated ticket IDs to fetch").argParser(parseTicketIds))
  .option("-o, --output <path>", "Issue DB used for the unlinked report")
  .option("--refresh", "Re-fetch conversations even if cached")
  .option("-v, --verbose", "Enable debug logging")
  .action(async (options) => {
    await fetchCommand(options);
  });

program
  .command("backfill")
  .description("Add missing ignore flags and auto-ignore automated conversations in the cache")
  .action(() => {
    backfillCommand();
  });

program
  .command("inspect")
  .description("List issues in the database")
  .option("-o, --output <path>", "Issue DB path")
  .option("-c, --category <category>", "Filter by category")
  .action((options) => {
    inspectCommand(options);
  });

const configCmd = program.command("config").description("Inspect or change configuration");

configCmd
  .command("show")
  .description("Display the effective configuration")
  .action(() => {
    configShowCommand();
  });

configCmd
  .command("set")
  .description("Update defaults in the .env file")
  .option("-m, --model <model>", "Default LLM model (LLM_MODEL)")
  .option("--batch-size <n>", "Default fetch batch size (BATCH_SIZE)", parsePositiveInt)
  .action((options) => {
    configSetCommand(options);
  });

program
  .command("serve")
  .description("Start a read-only MCP server over the issue database")
  .option("-o, --output <path>", "Issue DB path")
  .action(async (options) => {
    await startMcpServer({ dbPath: options.output });
  });

program.parseAsync().catch((err: unknown) => {
  log.error(toErrorMessage(err));
  process.exit(1);
});
