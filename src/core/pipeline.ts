import { buildConversation } from "./conversation.js";
import { classifyConversation } from "./classifier.js";
import { mergeClassification } from "./merge.js";
import { AUTO_IGNORE_PHRASES } from "./autoignore.js";
import { toErrorMessage } from "./errors.js";
import { log } from "./log.js";
import type { ConversationCache } from "./cache.js";
import type { IssueCatalog } from "./catalog.js";
import type { ChatClassifier } from "./classifier.js";
import type { TicketSource } from "./helpdesk.js";
import type { ConversationRecord } from "../types.js";

export const DEFAULT_PAGES = 5;

export interface TicketSelection {
  /** Pages of resolved tickets to search; ignored when `ticketIds` is set. */
  pages?: number;
  ticketIds?: number[];
}

export interface ProcessOptions extends TicketSelection {
  /** Re-classify tickets already linked to an issue. */
  reprocess?: boolean;
  /** Re-fetch conversations even when cached. */
  refresh?: boolean;
  /** Print prompts and responses; the catalog is not written. */
  promptDebug?: boolean;
  /** Where the catalog is saved after each ticket. Defaults to the catalog's own path. */
  outputPath?: string;
}

export interface ProcessDeps {
  cache: ConversationCache;
  catalog: IssueCatalog;
  source: TicketSource;
  classifier: ChatClassifier;
  autoIgnorePhrases?: readonly string[];
}

export interface ProcessSummary {
  total: number;
  processed: number;
  skippedIgnored: number;
  skippedLinked: number;
}

export async function selectTicketIds(selection: TicketSelection, source: TicketSource): Promise<number[]> {
  if (selection.ticketIds) return selection.ticketIds;
  log.info("Fetching ticket IDs…");
  return source.fetchResolvedTicketIds(selection.pages ?? DEFAULT_PAGES);
}

/**
 * Classify each selected ticket and fold the result into the catalog, one
 * ticket at a time. The catalog is saved after every merged ticket so an
 * interrupted run loses at most the ticket in flight.
 */
export async function processTickets(options: ProcessOptions, deps: ProcessDeps): Promise<ProcessSummary> {
  const { cache, catalog, source, classifier } = deps;
  const phrases = deps.autoIgnorePhrases ?? AUTO_IGNORE_PHRASES;

  const ticketIds = await selectTicketIds(options, source);
  log.info(`${ticketIds.length} tickets to process`);

  const summary: ProcessSummary = {
    total: ticketIds.length,
    processed: 0,
    skippedIgnored: 0,
    skippedLinked: 0,
  };

  for (const [index, ticketId] of ticketIds.entries()) {
    if (cache.isIgnored(ticketId)) {
      log.debug(`Ticket ${ticketId} is marked as ignored, skipping`);
      summary.skippedIgnored++;
      continue;
    }

    if (catalog.hasTicket(ticketId) && !options.reprocess) {
      log.debug(`Ticket ${ticketId} already in DB, skipping`);
      summary.skippedLinked++;
      continue;
    }

    const conversation = await loadOrFetch(ticketId, cache, source, phrases, options.refresh ?? false);
    if (conversation.ignore) {
      log.debug(`Ticket ${ticketId} ends with an automated message, skipping`);
      summary.skippedIgnored++;
      continue;
    }

    const classification = await classifyConversation(classifier, catalog.issues, conversation, {
      debug: options.promptDebug,
    });
    mergeClassification(catalog, classification, ticketId);
    summary.processed++;

    const linked = catalog.findByTicket(ticketId);
    log.info(
      `[${index + 1}/${ticketIds.length}] Ticket ${ticketId} → ${linked?.issue_id ?? "?"} (confidence ${classification.confidence.toFixed(2)})`
    );

    if (!options.promptDebug) {
      catalog.save(options.outputPath);
    }
  }

  return summary;
}

async function loadOrFetch(
  ticketId: number,
  cache: ConversationCache,
  source: TicketSource,
  phrases: readonly string[],
  refresh: boolean
): Promise<ConversationRecord> {
  if (!refresh) {
    const cached = cache.load(ticketId);
    if (cached) return cached;
  }

  return fetchAndStore(ticketId, cache, source, phrases);
}

// ── Cache population without classification ─────────────

export interface FetchOptions extends TicketSelection {
  refresh?: boolean;
  batchSize?: number;
}

export interface FetchDeps {
  cache: ConversationCache;
  catalog: IssueCatalog;
  source: TicketSource;
  autoIgnorePhrases?: readonly string[];
}

export interface FetchSummary {
  total: number;
  fetched: number;
  cached: number;
  failed: number[];
  ignored: number[];
  /** Cached, not ignored and not linked to any issue yet. */
  unlinked: number[];
}

/**
 * Fill the conversation cache for the selected tickets. A ticket that fails
 * to fetch is logged and skipped; the rest of the batch continues.
 */
export async function fetchConversations(options: FetchOptions, deps: FetchDeps): Promise<FetchSummary> {
  const { cache, catalog, source } = deps;
  const phrases = deps.autoIgnorePhrases ?? AUTO_IGNORE_PHRASES;
  const batchSize = Math.max(1, options.batchSize ?? 1);

  const ticketIds = await selectTicketIds(options, source);
  const summary: FetchSummary = {
    total: ticketIds.length,
    fetched: 0,
    cached: 0,
    failed: [],
    ignored: [],
    unlinked: [],
  };

  const batches = Math.ceil(ticketIds.length / batchSize);
  for (let b = 0; b < batches; b++) {
    const batch = ticketIds.slice(b * batchSize, (b + 1) * batchSize);
    log.info(`Fetching conversations: batch ${b + 1}/${batches}`);

    for (const ticketId of batch) {
      let conversation: ConversationRecord;
      try {
        const cached = options.refresh ? null : cache.load(ticketId);
        if (cached) {
          conversation = cached;
          summary.cached++;
        } else {
          conversation = await fetchAndStore(ticketId, cache, source, phrases);
          summary.fetched++;
        }
      } catch (err) {
        log.warn(`Ticket ${ticketId}: skipping: ${toErrorMessage(err)}`);
        summary.failed.push(ticketId);
        continue;
      }

      if (conversation.ignore) {
        summary.ignored.push(ticketId);
      } else if (!catalog.hasTicket(ticketId)) {
        summary.unlinked.push(ticketId);
      }
    }
  }

  return summary;
}

async function fetchAndStore(
  ticketId: number,
  cache: ConversationCache,
  source: TicketSource,
  phrases: readonly string[]
): Promise<ConversationRecord> {
  const previous = cache.load(ticketId);
  const conversation = buildConversation(await source.fetchTicket(ticketId), phrases);
  // A refresh never clears an ignore flag set earlier.
  if (previous?.ignore) conversation.ignore = true;
  cache.save(conversation);
  return conversation;
}
