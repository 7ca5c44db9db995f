import { readSettings, requireHelpdeskSettings } from "../core/config.js";
import { ConversationCache } from "../core/cache.js";
import { IssueCatalog } from "../core/catalog.js";
import { HelpdeskClient } from "../core/helpdesk.js";
import { fetchConversations, DEFAULT_PAGES } from "../core/pipeline.js";
import { setVerbose } from "../core/log.js";

export interface FetchCommandOptions {
  pages?: number;
  ticketIds?: number[];
  output?: string;
  refresh?: boolean;
  verbose?: boolean;
}

/**
 * Populate the conversation cache and report conversations that no issue
 * links yet. Nothing is sent to the classifier.
 */
export async function fetchCommand(options: FetchCommandOptions): Promise<void> {
  setVerbose(options.verbose ?? false);
  const settings = readSettings();
  const helpdesk = requireHelpdeskSettings(settings);

  const catalog = IssueCatalog.load(options.output ?? settings.defaultDbPath);
  const summary = await fetchConversations(
    {
      pages: options.pages ?? DEFAULT_PAGES,
      ticketIds: options.ticketIds,
      refresh: options.refresh,
      batchSize: settings.batchSize,
    },
    {
      cache: new ConversationCache(settings.conversationsDir, settings.autoIgnorePhrases),
      catalog,
      source: new HelpdeskClient(helpdesk),
      autoIgnorePhrases: settings.autoIgnorePhrases,
    }
  );

  console.log(`Tickets:   ${summary.total}`);
  console.log(`  Fetched: ${summary.fetched}`);
  console.log(`  Cached:  ${summary.cached}`);
  console.log(`  Ignored: ${summary.ignored.length}`);
  if (summary.failed.length > 0) {
    console.log(`  Failed:  ${summary.failed.length} (${summary.failed.join(", ")})`);
  }

  if (summary.unlinked.length === 0) {
    console.log("\nEvery fetched conversation is already linked to an issue.");
    return;
  }
  console.log(`\n${summary.unlinked.length} conversation(s) not linked to any issue:`);
  console.log(`  ${summary.unlinked.join(", ")}`);
}
