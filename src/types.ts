// ── Conversation types ───────────────────────────────────

export interface ConversationMessage {
  speaker: "user" | "agent";
  text: string;
  private?: boolean;
}

export interface ConversationRecord {
  ticket_id: number;
  messages: ConversationMessage[];
  ignore: boolean;
}

// ── Issue catalog types ──────────────────────────────────

export interface Issue {
  issue_id: string; // "ISSUE-0001" or branch form "ISSUE-0001-2"
  category: string;
  short_description: string;
  keywords: string[];
  root_cause: string;
  resolution_steps: string[];
  confidence: number; // last-seen classifier confidence, 0..1
  notes: string;
  tickets: number[];
}

/**
 * Structured result returned by the classifier for one conversation.
 * `issue_id` is null when the classifier believes the conversation is new.
 */
export interface Classification {
  issue_id: string | null;
  category: string;
  short_description: string;
  keywords: string[];
  root_cause: string;
  resolution_steps: string[];
  confidence: number;
  notes: string;
}
