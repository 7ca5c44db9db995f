import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, rmSync, existsSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { processTickets, fetchConversations } from "../core/pipeline.js";
import { ConversationCache } from "../core/cache.js";
import { IssueCatalog } from "../core/catalog.js";
import { HelpdeskError } from "../core/errors.js";
import type { ChatClassifier } from "../core/classifier.js";
import type { TicketSource } from "../core/helpdesk.js";
import type { Classification, Issue } from "../types.js";

class FakeSource implements TicketSource {
  fetched: number[] = [];
  requestedPages: number[] = [];

  constructor(
    private tickets: Record<number, unknown>,
    private resolved: number[] = []
  ) {}

  async fetchResolvedTicketIds(maxPages: number): Promise<number[]> {
    this.requestedPages.push(maxPages);
    return this.resolved;
  }

  async fetchTicket(ticketId: number): Promise<unknown> {
    this.fetched.push(ticketId);
    const ticket = this.tickets[ticketId];
    if (ticket === undefined) throw new HelpdeskError(`Ticket ${ticketId} not found`, 404);
    return ticket;
  }
}

class ScriptedClassifier implements ChatClassifier {
  userPrompts: string[] = [];

  constructor(private answers: Partial<Classification>[]) {}

  async classify(_system: string, user: string): Promise<string> {
    this.userPrompts.push(user);
    const next = this.answers.shift();
    if (!next) throw new Error("classifier called more often than expected");
    return JSON.stringify(next);
  }
}

function ticket(id: number, reply?: { text: string; incoming: boolean }): unknown {
  return {
    id,
    description_text: "Sensor keeps going offline",
    conversations: reply
      ? [{ body_text: reply.text, incoming: reply.incoming, private: false, created_at: "2024-05-01T12:00:00Z" }]
      : [],
  };
}

const NEW_ISSUE: Partial<Classification> = {
  issue_id: null,
  category: "Connectivity",
  short_description: "Sensor offline",
  keywords: ["offline"],
  root_cause: "Wifi",
  resolution_steps: ["1. Reboot the router"],
  confidence: 0.8,
  notes: "",
};

function makeIssue(overrides: Partial<Issue> = {}): Issue {
  return {
    issue_id: "ISSUE-0001",
    category: "Connectivity",
    short_description: "Sensor offline",
    keywords: ["offline"],
    root_cause: "Wifi",
    resolution_steps: ["1. Reboot the router"],
    confidence: 0.8,
    notes: "",
    tickets: [],
    ...overrides,
  };
}

describe("pipeline", () => {
  let dir: string;
  let dbPath: string;
  let cache: ConversationCache;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ticketcluster-pipeline-"));
    dbPath = join(dir, "output", "issues_db.json");
    cache = new ConversationCache(join(dir, "conversations"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("processTickets", () => {
    it("classifies, merges and saves each ticket", async () => {
      const catalog = IssueCatalog.load(dbPath);
      const source = new FakeSource({ 1: ticket(1), 2: ticket(2) });
      const classifier = new ScriptedClassifier([
        NEW_ISSUE,
        { ...NEW_ISSUE, issue_id: "ISSUE-0001", confidence: 0.95 },
      ]);

      const summary = await processTickets({ ticketIds: [1, 2] }, { cache, catalog, source, classifier });

      assert.deepEqual(summary, { total: 2, processed: 2, skippedIgnored: 0, skippedLinked: 0 });
      assert.deepEqual(catalog.issues, [makeIssue({ confidence: 0.95, tickets: [1, 2] })]);
      assert.deepEqual(IssueCatalog.load(dbPath).issues, catalog.issues);
      assert.deepEqual(source.fetched, [1, 2]);
      assert.deepEqual(cache.listTicketIds(), [1, 2]);
      assert.ok(
        classifier.userPrompts[1].includes("ISSUE-0001: Connectivity / Sensor offline / Wifi | offline | 1\n")
      );
    });

    it("writes to the output path when one is given", async () => {
      const catalog = IssueCatalog.load(dbPath);
      const outputPath = join(dir, "output", "copy.json");
      await processTickets(
        { ticketIds: [1], outputPath },
        { cache, catalog, source: new FakeSource({ 1: ticket(1) }), classifier: new ScriptedClassifier([NEW_ISSUE]) }
      );

      assert.equal(existsSync(dbPath), false);
      assert.equal(IssueCatalog.load(outputPath).size, 1);
    });

    it("selects tickets by pages when no ids are given", async () => {
      const source = new FakeSource({ 4: ticket(4) }, [4]);
      await processTickets(
        { pages: 2 },
        { cache, catalog: IssueCatalog.load(dbPath), source, classifier: new ScriptedClassifier([NEW_ISSUE]) }
      );
      assert.deepEqual(source.requestedPages, [2]);
      assert.deepEqual(source.fetched, [4]);
    });

    it("skips tickets marked as ignored without fetching", async () => {
      cache.save({ ticket_id: 1, messages: [], ignore: true });
      const source = new FakeSource({ 1: ticket(1) });
      const classifier = new ScriptedClassifier([]);

      const summary = await processTickets(
        { ticketIds: [1] },
        { cache, catalog: IssueCatalog.load(dbPath), source, classifier }
      );

      assert.equal(summary.skippedIgnored, 1);
      assert.deepEqual(source.fetched, []);
      assert.deepEqual(classifier.userPrompts, []);
    });

    it("skips a freshly fetched conversation that ends with an automated message", async () => {
      const source = new FakeSource({
        3: ticket(3, { text: "This ticket is closed and merged into #2", incoming: false }),
      });
      const classifier = new ScriptedClassifier([]);

      const summary = await processTickets(
        { ticketIds: [3] },
        { cache, catalog: IssueCatalog.load(dbPath), source, classifier }
      );

      assert.equal(summary.skippedIgnored, 1);
      assert.equal(cache.isIgnored(3), true);
      assert.deepEqual(classifier.userPrompts, []);
    });

    it("skips linked tickets unless reprocessing", async () => {
      const catalog = new IssueCatalog(dbPath, [makeIssue({ tickets: [1] })]);
      cache.save({ ticket_id: 1, messages: [{ speaker: "user", text: "Offline again" }], ignore: false });
      const source = new FakeSource({});

      const skipped = await processTickets(
        { ticketIds: [1] },
        { cache, catalog, source, classifier: new ScriptedClassifier([]) }
      );
      assert.equal(skipped.skippedLinked, 1);

      const reprocessed = await processTickets(
        { ticketIds: [1], reprocess: true },
        { cache, catalog, source, classifier: new ScriptedClassifier([{ ...NEW_ISSUE, notes: "seen twice" }]) }
      );
      assert.equal(reprocessed.processed, 1);
      assert.deepEqual(source.fetched, []);
      assert.equal(catalog.size, 1);
      assert.equal(catalog.issues[0].notes, "seen twice");
    });

    it("re-fetches a cached conversation on refresh", async () => {
      cache.save({ ticket_id: 1, messages: [{ speaker: "user", text: "stale" }], ignore: false });
      const source = new FakeSource({ 1: ticket(1) });

      await processTickets(
        { ticketIds: [1], refresh: true },
        { cache, catalog: IssueCatalog.load(dbPath), source, classifier: new ScriptedClassifier([NEW_ISSUE]) }
      );

      assert.deepEqual(source.fetched, [1]);
      assert.deepEqual(cache.load(1)?.messages, [{ speaker: "user", text: "Sensor keeps going offline" }]);
    });

    it("does not write the catalog in prompt debug mode", async () => {
      const catalog = IssueCatalog.load(dbPath);
      await processTickets(
        { ticketIds: [1], promptDebug: true },
        { cache, catalog, source: new FakeSource({ 1: ticket(1) }), classifier: new ScriptedClassifier([NEW_ISSUE]) }
      );

      assert.equal(catalog.size, 1);
      assert.equal(existsSync(dbPath), false);
    });
  });

  describe("fetchConversations", () => {
    it("fills the cache and reports unlinked, ignored and failed tickets", async () => {
      cache.save({ ticket_id: 1, messages: [{ speaker: "user", text: "cached" }], ignore: false });
      const catalog = new IssueCatalog(dbPath, [makeIssue({ tickets: [2] })]);
      const source = new FakeSource({
        2: ticket(2),
        4: ticket(4, { text: "We wanted to check in since we haven't heard back from you", incoming: false }),
      });

      const summary = await fetchConversations({ ticketIds: [1, 2, 3, 4], batchSize: 2 }, { cache, catalog, source });

      assert.deepEqual(summary, {
        total: 4,
        fetched: 2,
        cached: 1,
        failed: [3],
        ignored: [4],
        unlinked: [1],
      });
      assert.deepEqual(source.fetched, [2, 3, 4]);
      assert.deepEqual(cache.listTicketIds(), [1, 2, 4]);
    });

    it("keeps an earlier ignore flag when refreshing", async () => {
      cache.save({ ticket_id: 5, messages: [], ignore: true });
      const source = new FakeSource({ 5: ticket(5) });

      const summary = await fetchConversations(
        { ticketIds: [5], refresh: true },
        { cache, catalog: IssueCatalog.load(dbPath), source }
      );

      assert.deepEqual(summary.ignored, [5]);
      assert.deepEqual(source.fetched, [5]);
      assert.equal(cache.isIgnored(5), true);
      assert.equal(cache.load(5)?.messages.length, 1);
    });
  });
});
