import { copyFileSync, existsSync, mkdirSync } from "fs";
import { dirname, join, resolve, basename, extname } from "path";
import { readSettings, requireHelpdeskSettings, resolveLlmSettings } from "../core/config.js";
import { ConversationCache } from "../core/cache.js";
import { IssueCatalog } from "../core/catalog.js";
import { HelpdeskClient } from "../core/helpdesk.js";
import { OpenAIClassifier } from "../core/llm.js";
import { processTickets, DEFAULT_PAGES } from "../core/pipeline.js";
import { log, setVerbose } from "../core/log.js";
import { runWizard } from "./wizard.js";
import { timestamp } from "./util.js";

export interface ProcessCommandOptions {
  pages?: number;
  ticketIds?: number[];
  output?: string;
  safeOutput?: boolean;
  reprocess?: boolean;
  refresh?: boolean;
  promptDebug?: boolean;
  model?: string;
  verbose?: boolean;
  nonInteractive?: boolean;
}

/**
 * Classify tickets and update the issue database.
 */
export async function processCommand(options: ProcessCommandOptions): Promise<void> {
  setVerbose(options.verbose ?? false);
  const settings = readSettings();

  let output = options.output ?? settings.defaultDbPath;
  let { pages, ticketIds, reprocess = false, refresh = false } = options;
  let model = options.model ?? settings.model;

  const hasSelection = pages !== undefined || ticketIds !== undefined;
  if (!hasSelection && !options.nonInteractive && process.stdin.isTTY) {
    const answers = await runWizard({ model, output });
    if (!answers) {
      console.log("Aborted.");
      return;
    }
    ({ pages, ticketIds, reprocess, refresh, model } = answers);
  }

  // Everything the run needs is checked before the first ticket is touched.
  const helpdesk = requireHelpdeskSettings(settings);
  const llm = resolveLlmSettings(model);

  if (options.safeOutput && resolve(output) === resolve(settings.defaultDbPath) && existsSync(output)) {
    const copy = join(dirname(output), `${basename(output, extname(output))}_${timestamp()}${extname(output) || ".json"}`);
    mkdirSync(dirname(copy), { recursive: true });
    copyFileSync(output, copy);
    console.log(`[info] Existing DB preserved. Writing to ${copy}`);
    output = copy;
  }

  const catalog = IssueCatalog.load(output);
  const summary = await processTickets(
    {
      pages: pages ?? DEFAULT_PAGES,
      ticketIds,
      reprocess,
      refresh,
      promptDebug: options.promptDebug,
      outputPath: output,
    },
    {
      cache: new ConversationCache(settings.conversationsDir, settings.autoIgnorePhrases),
      catalog,
      source: new HelpdeskClient(helpdesk),
      classifier: new OpenAIClassifier(llm),
      autoIgnorePhrases: settings.autoIgnorePhrases,
    }
  );

  log.info(
    `Processed ${summary.processed}/${summary.total} ticket(s); ` +
      `${summary.skippedLinked} already linked, ${summary.skippedIgnored} ignored.`
  );

  if (options.promptDebug) {
    log.info("Prompt debug mode: no DB written");
    return;
  }

  // A run that linked nothing still leaves the advertised file behind.
  if (!existsSync(output)) {
    catalog.save(output);
    console.log(`[info] Created DB at ${output} (no new tickets)`);
  }
  log.info(`Written consolidated DB to ${output}`);
}
