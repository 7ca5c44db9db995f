import { z } from "zod";
import { shouldAutoIgnore, AUTO_IGNORE_PHRASES } from "./autoignore.js";
import type { ConversationMessage, ConversationRecord } from "../types.js";

const HTML_TAG_RE = /<[^>]+>/g;
const CTRL_CHAR_RE = /[\r\v\f]/g;

const rawReplySchema = z.object({
  body_text: z.string().nullish(),
  incoming: z.boolean().nullish(),
  private: z.boolean().nullish(),
  created_at: z.string(),
});

/**
 * Subset of a helpdesk ticket payload (`/tickets/<id>?include=conversations`)
 * that conversation building reads. Other fields pass through untouched.
 */
const rawTicketSchema = z
  .object({
    id: z.number().int(),
    description_text: z.string().nullish(),
    conversations: z.array(rawReplySchema).nullish(),
  })
  .passthrough();


export function cleanText(text: string | null | undefined): string {
  return (text ?? "").replace(HTML_TAG_RE, "").replace(CTRL_CHAR_RE, "").trim();
}

/**
 * Turn a raw helpdesk ticket into a conversation record.
 *
 * The ticket description comes first (as the user), followed by replies in
 * creation order. `incoming` replies are from the user, everything else from
 * an agent. The ignore flag starts out as the auto-ignore verdict.
 */
export function buildConversation(
  payload: unknown,
  phrases: readonly string[] = AUTO_IGNORE_PHRASES
): ConversationRecord {
  const ticket = rawTicketSchema.parse(payload);
  const messages: ConversationMessage[] = [];

  if (ticket.description_text) {
    messages.push({ speaker: "user", text: cleanText(ticket.description_text) });
  }

  // Array.prototype.sort is stable, so replies sharing a timestamp keep source order
  const replies = [...(ticket.conversations ?? [])].sort((a, b) =>
    compareTimestamps(a.created_at, b.created_at)
  );

  for (const reply of replies) {
    messages.push({
      speaker: reply.incoming ? "user" : "agent",
      text: cleanText(reply.body_text),
      private: reply.private ?? false,
    });
  }

  return {
    ticket_id: ticket.id,
    messages,
    ignore: shouldAutoIgnore(messages, phrases),
  };
}

// Unparseable timestamps sort first, so the order stays total.
function compareTimestamps(a: string, b: string): number {
  const aMs = toSortKey(a);
  const bMs = toSortKey(b);
  return aMs === bMs ? 0 : aMs < bMs ? -1 : 1;
}

function toSortKey(timestamp: string): number {
  const ms = Date.parse(timestamp);
  return Number.isFinite(ms) ? ms : Number.NEGATIVE_INFINITY;
}
