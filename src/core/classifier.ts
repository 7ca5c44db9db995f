import { z } from "zod";
import { SYSTEM_PROMPT, renderUserPrompt } from "./prompts.js";
import { log } from "./log.js";
import type { Classification, ConversationRecord, Issue } from "../types.js";

/**
 * Anything that can answer a system + user prompt with raw text.
 */
export interface ChatClassifier {
  classify(systemPrompt: string, userPrompt: string): Promise<string>;
}

export interface Prompts {
  system: string;
  user: string;
}

// Each field is coerced on its own: one mistyped field must not cost the
// issue id and confidence of an otherwise usable answer.
const text = z.string().nullish().transform((v) => v ?? "").catch("");

const classificationSchema = z.object({
  issue_id: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((v) => (v === null || v === undefined || v === "" ? null : String(v)))
    .catch(null),
  category: text,
  short_description: text,
  keywords: z.unknown().transform((v) => toStringList(v, /[,\n]/)),
  root_cause: text,
  resolution_steps: z.unknown().transform((v) => toStringList(v, /\n/)),
  confidence: z.unknown().transform(toConfidence),
  notes: text,
});

// Numbers or numeric strings, clamped to [0, 1]; anything else reads as 0.
function toConfidence(value: unknown): number {
  const n = typeof value === "string" ? Number.parseFloat(value) : value;
  if (typeof n !== "number" || !Number.isFinite(n)) return 0;
  return Math.min(1, Math.max(0, n));
}

// A list given as one string is split on `separator`; numbers become strings.
function toStringList(value: unknown, separator: RegExp): string[] {
  const items: unknown[] = Array.isArray(value)
    ? value
    : typeof value === "string"
      ? value.split(separator)
      : [];
  return items
    .map((item) => (typeof item === "string" ? item.trim() : typeof item === "number" ? String(item) : ""))
    .filter(Boolean);
}

/**
 * Digest of the catalog shown to the classifier, one line per issue.
 */
export function buildIssuesSummary(issues: readonly Issue[]): string {
  const lines = issues.map(
    (issue) =>
      `${issue.issue_id}: ${issue.category} / ${issue.short_description} / ${issue.root_cause}` +
      ` | ${issue.keywords.join(", ")} | ${issue.tickets.join(", ")}`
  );
  return lines.join("\n") || "<none>";
}

export function buildPrompts(issues: readonly Issue[], conversation: ConversationRecord): Prompts {
  return {
    system: SYSTEM_PROMPT.trim(),
    user: renderUserPrompt(buildIssuesSummary(issues), JSON.stringify(conversation, null, 2)).trim(),
  };
}

/**
 * Low-confidence "new issue" record used when the classifier output is not
 * a JSON object. The raw text is kept in `notes`.
 */
export function fallbackClassification(raw: string): Classification {
  return {
    issue_id: null,
    category: "unknown",
    short_description: "",
    keywords: [],
    root_cause: "",
    resolution_steps: [],
    confidence: 0.0,
    notes: raw,
  };
}

function tryParseClassification(raw: string): Classification | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  const result = classificationSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

/**
 * Parse classifier output. Never throws: anything unusable becomes
 * {@link fallbackClassification}.
 */
export function parseClassification(raw: string): Classification {
  return tryParseClassification(raw) ?? fallbackClassification(raw);
}

export interface ClassifyOptions {
  /** Print prompts, the raw response and the parsed record. */
  debug?: boolean;
}

export async function classifyConversation(
  client: ChatClassifier,
  issues: readonly Issue[],
  conversation: ConversationRecord,
  options: ClassifyOptions = {}
): Promise<Classification> {
  const prompts = buildPrompts(issues, conversation);
  if (options.debug) {
    console.log("\n--- SYSTEM MESSAGE ---\n" + prompts.system);
    console.log("\n--- USER MESSAGE ---\n" + prompts.user);
  }

  const raw = await client.classify(prompts.system, prompts.user);
  if (options.debug) {
    console.log("\n--- RAW LLM RESPONSE ---\n" + raw);
  }

  let classification = tryParseClassification(raw);
  if (!classification) {
    log.warn(`Ticket ${conversation.ticket_id}: classifier output is not a JSON object, treating as a new low-confidence issue`);
    classification = fallbackClassification(raw);
  }
  if (options.debug) {
    console.log("\n--- PARSED JSON ---\n" + JSON.stringify(classification, null, 2));
  }

  return classification;
}
