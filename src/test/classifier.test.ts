import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  buildIssuesSummary,
  buildPrompts,
  parseClassification,
  fallbackClassification,
  classifyConversation,
  type ChatClassifier,
} from "../core/classifier.js";
import { SYSTEM_PROMPT, renderUserPrompt } from "../core/prompts.js";
import type { ConversationRecord, Issue } from "../types.js";

function makeIssue(overrides: Partial<Issue> = {}): Issue {
  return {
    issue_id: "ISSUE-0001",
    category: "Connectivity",
    short_description: "Device drops offline",
    keywords: ["offline", "wifi"],
    root_cause: "Router band steering",
    resolution_steps: ["1. Split the bands"],
    confidence: 0.95,
    notes: "",
    tickets: [3, 4],
    ...overrides,
  };
}

const conversation: ConversationRecord = {
  ticket_id: 55,
  messages: [
    { speaker: "user", text: "My sensor keeps going offline" },
    { speaker: "agent", text: "Please split your 2.4 and 5 GHz networks", private: false },
  ],
  ignore: false,
};

class FakeClassifier implements ChatClassifier {
  calls: { system: string; user: string }[] = [];

  constructor(private response: string) {}

  async classify(system: string, user: string): Promise<string> {
    this.calls.push({ system, user });
    return this.response;
  }
}

describe("classifier", () => {
  describe("buildIssuesSummary", () => {
    it("renders one line per issue", () => {
      const summary = buildIssuesSummary([
        makeIssue(),
        makeIssue({ issue_id: "ISSUE-0001-1", keywords: [], tickets: [9] }),
      ]);
      assert.equal(
        summary,
        "ISSUE-0001: Connectivity / Device drops offline / Router band steering | offline, wifi | 3, 4\n" +
          "ISSUE-0001-1: Connectivity / Device drops offline / Router band steering |  | 9"
      );
    });

    it("marks an empty catalog", () => {
      assert.equal(buildIssuesSummary([]), "<none>");
    });
  });

  describe("renderUserPrompt", () => {
    it("does not expand placeholders that appear in the inserted text", () => {
      const rendered = renderUserPrompt("{conversation}", "CONV");
      assert.ok(rendered.includes("Tickets):\n{conversation}\n"));
      assert.ok(rendered.includes("```json\nCONV\n```"));
    });
  });

  describe("buildPrompts", () => {
    it("embeds the catalog digest and the conversation JSON", () => {
      const prompts = buildPrompts([makeIssue()], conversation);
      assert.equal(prompts.system, SYSTEM_PROMPT.trim());
      assert.ok(
        prompts.user.startsWith(
          "Current issues database summary (ID: Category / Short description / Root cause | Keywords | Tickets):\n" +
            "ISSUE-0001: Connectivity / Device drops offline / Router band steering | offline, wifi | 3, 4\n"
        )
      );
      assert.ok(prompts.user.includes(JSON.stringify(conversation, null, 2)));
      assert.ok(prompts.user.endsWith("Provide your response in JSON format without a code block."));
    });
  });

  describe("parseClassification", () => {
    it("reads a complete record", () => {
      const raw = JSON.stringify({
        issue_id: "ISSUE-0001",
        category: "Connectivity",
        short_description: "Offline sensor",
        keywords: ["offline"],
        root_cause: "Band steering",
        resolution_steps: ["1. Split bands"],
        confidence: 0.93,
        notes: "Common on mesh routers",
      });
      assert.deepEqual(parseClassification(raw), {
        issue_id: "ISSUE-0001",
        category: "Connectivity",
        short_description: "Offline sensor",
        keywords: ["offline"],
        root_cause: "Band steering",
        resolution_steps: ["1. Split bands"],
        confidence: 0.93,
        notes: "Common on mesh routers",
      });
    });

    it("fills missing fields and treats an empty id as new", () => {
      assert.deepEqual(parseClassification('{"issue_id": "", "category": "Other"}'), {
        issue_id: null,
        category: "Other",
        short_description: "",
        keywords: [],
        root_cause: "",
        resolution_steps: [],
        confidence: 0,
        notes: "",
      });
    });

    it("accepts a numeric string confidence and clamps to [0, 1]", () => {
      assert.equal(parseClassification('{"confidence": "0.7"}').confidence, 0.7);
      assert.equal(parseClassification('{"confidence": 1.4}').confidence, 1);
      assert.equal(parseClassification('{"confidence": -2}').confidence, 0);
      assert.equal(parseClassification('{"confidence": "high"}').confidence, 0);
    });

    it("keeps the issue id and confidence when a list field is a string", () => {
      const raw = JSON.stringify({
        issue_id: "ISSUE-0001",
        category: "Connectivity",
        short_description: "Offline sensor",
        keywords: "wifi, offline",
        root_cause: "Band steering",
        resolution_steps: "1. Split bands\n2. Re-pair the sensor",
        confidence: 0.95,
        notes: "",
      });
      assert.deepEqual(parseClassification(raw), {
        issue_id: "ISSUE-0001",
        category: "Connectivity",
        short_description: "Offline sensor",
        keywords: ["wifi", "offline"],
        root_cause: "Band steering",
        resolution_steps: ["1. Split bands", "2. Re-pair the sensor"],
        confidence: 0.95,
        notes: "",
      });
    });

    it("coerces mistyped fields one at a time", () => {
      const result = parseClassification(
        JSON.stringify({ issue_id: 7, category: 42, keywords: ["a", 3, null], notes: ["x"], confidence: 0.92 })
      );
      assert.equal(result.issue_id, "7");
      assert.equal(result.category, "");
      assert.deepEqual(result.keywords, ["a", "3"]);
      assert.equal(result.notes, "");
      assert.equal(result.confidence, 0.92);
    });

    it("falls back on text that is not JSON", () => {
      assert.deepEqual(parseClassification("Sorry, I cannot help"), {
        issue_id: null,
        category: "unknown",
        short_description: "",
        keywords: [],
        root_cause: "",
        resolution_steps: [],
        confidence: 0,
        notes: "Sorry, I cannot help",
      });
    });

    it("falls back on JSON that is not an object", () => {
      assert.deepEqual(parseClassification('["ISSUE-0001"]'), fallbackClassification('["ISSUE-0001"]'));
    });

    it("falls back on an empty response", () => {
      assert.deepEqual(parseClassification(""), fallbackClassification(""));
    });
  });

  describe("classifyConversation", () => {
    it("sends the built prompts and returns the parsed result", async () => {
      const fake = new FakeClassifier('{"issue_id": "ISSUE-0001", "confidence": 0.91}');
      const result = await classifyConversation(fake, [makeIssue()], conversation);

      assert.deepEqual(fake.calls, [buildPrompts([makeIssue()], conversation)]);
      assert.equal(result.issue_id, "ISSUE-0001");
      assert.equal(result.confidence, 0.91);
    });

    it("returns the fallback for unusable output", async () => {
      const result = await classifyConversation(new FakeClassifier("```json\n{}\n```"), [], conversation);
      assert.deepEqual(result, fallbackClassification("```json\n{}\n```"));
    });
  });
});
