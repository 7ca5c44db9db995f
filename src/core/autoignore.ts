import type { ConversationMessage } from "../types.js";

/**
 * Closing messages the helpdesk appends on its own. A conversation that ends
 * with one of these carries nothing worth classifying.
 */
export const AUTO_IGNORE_PHRASES: readonly string[] = [
  "We wanted to check in since we haven't heard back from you",
  "This ticket is closed and merged",
];

// U+2019 right single quote, U+2018 left single quote,
// U+02BC modifier letter apostrophe, U+2032 prime
const APOSTROPHE_VARIANTS = /[’‘ʼ′]/g;

export function normalizeApostrophes(text: string): string {
  return text.replace(APOSTROPHE_VARIANTS, "'");
}

/**
 * True when the last message is from an agent and contains one of the
 * auto-ignore phrases (exact, case-sensitive substring after apostrophe
 * normalization).
 */
export function shouldAutoIgnore(
  messages: readonly ConversationMessage[],
  phrases: readonly string[] = AUTO_IGNORE_PHRASES
): boolean {
  if (messages.length === 0) return false;

  const last = messages[messages.length - 1];
  if (last.speaker !== "agent") return false;

  const text = normalizeApostrophes(last.text);
  return phrases.some((phrase) => text.includes(phrase));
}
