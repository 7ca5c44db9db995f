import { existsSync, readdirSync, readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { shouldAutoIgnore, AUTO_IGNORE_PHRASES } from "./autoignore.js";
import { ConversationFileError, toErrorMessage } from "./errors.js";
import { writeFileAtomic, toPrettyJson } from "./files.js";
import { log } from "./log.js";
import type { ConversationRecord } from "../types.js";

const messageSchema = z
  .object({
    speaker: z.enum(["user", "agent"]),
    text: z.string(),
    private: z.boolean().optional(),
  })
  .passthrough();

// `ignore` is optional on disk: records written before the flag existed lack it.
const storedRecordSchema = z
  .object({
    ticket_id: z.number().int(),
    messages: z.array(messageSchema),
    ignore: z.boolean().optional(),
  })
  .passthrough();

type StoredRecord = z.infer<typeof storedRecordSchema>;

const RECORD_FILE_RE = /^(\d+)\.json$/;

export interface BackfillIgnoreResult {
  checked: number;
  updated: number;
}

export interface BackfillAutoIgnoreResult {
  checked: number;
  autoIgnored: number;
}

/**
 * One JSON file per ticket under `dir`, named `<ticket_id>.json`.
 * This class is the only writer of those files.
 */
export class ConversationCache {
  readonly dir: string;
  private phrases: readonly string[];

  constructor(dir: string, phrases: readonly string[] = AUTO_IGNORE_PHRASES) {
    this.dir = dir;
    this.phrases = phrases;
  }

  pathFor(ticketId: number): string {
    return join(this.dir, `${ticketId}.json`);
  }

  load(ticketId: number): ConversationRecord | null {
    const path = this.pathFor(ticketId);
    if (!existsSync(path)) return null;
    const stored = this.readStored(path);
    return toRecord(stored);
  }

  save(record: ConversationRecord): string {
    const path = this.pathFor(record.ticket_id);
    writeFileAtomic(path, toPrettyJson(record));
    return path;
  }

  isIgnored(ticketId: number): boolean {
    const record = this.load(ticketId);
    return record?.ignore ?? false;
  }

  listTicketIds(): number[] {
    if (!existsSync(this.dir)) return [];
    const ids: number[] = [];
    for (const file of readdirSync(this.dir)) {
      const match = RECORD_FILE_RE.exec(file);
      if (match) ids.push(Number(match[1]));
    }
    return ids.sort((a, b) => a - b);
  }

  /**
   * Add `ignore: false` to every record that has no flag yet.
   * A second run finds nothing to update.
   */
  backfillIgnoreFlags(): BackfillIgnoreResult {
    let checked = 0;
    let updated = 0;

    for (const path of this.recordPaths()) {
      const stored = this.tryReadStored(path);
      if (!stored) continue;
      checked++;

      if (stored.ignore === undefined) {
        writeFileAtomic(path, toPrettyJson({ ...stored, ignore: false }));
        updated++;
      }
    }

    return { checked, updated };
  }

  /**
   * Flag records whose conversation ends with an automated agent message.
   * Records already ignored are left alone; nothing is ever un-ignored.
   */
  backfillAutoIgnore(): BackfillAutoIgnoreResult {
    let checked = 0;
    let autoIgnored = 0;

    for (const path of this.recordPaths()) {
      const stored = this.tryReadStored(path);
      if (!stored) continue;
      checked++;

      if (stored.ignore === true) continue;

      if (shouldAutoIgnore(stored.messages, this.phrases)) {
        writeFileAtomic(path, toPrettyJson({ ...stored, ignore: true }));
        autoIgnored++;
      }
    }

    return { checked, autoIgnored };
  }

  private recordPaths(): string[] {
    return this.listTicketIds().map((id) => this.pathFor(id));
  }

  private readStored(path: string): StoredRecord {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (err) {
      throw new ConversationFileError(
        `Cannot read conversation file ${path}: ${toErrorMessage(err)}`,
        path,
        err instanceof Error ? err : undefined
      );
    }

    const result = storedRecordSchema.safeParse(raw);
    if (!result.success) {
      throw new ConversationFileError(
        `Invalid conversation file ${path}: ${result.error.issues[0]?.message ?? "unknown shape"}`,
        path
      );
    }
    return result.data;
  }

  // Backfills skip files they cannot read instead of aborting the scan.
  private tryReadStored(path: string): StoredRecord | null {
    try {
      return this.readStored(path);
    } catch (err) {
      log.warn(`Skipping ${path}: ${toErrorMessage(err)}`);
      return null;
    }
  }
}

function toRecord(stored: StoredRecord): ConversationRecord {
  return {
    ticket_id: stored.ticket_id,
    messages: stored.messages.map((m) =>
      m.private === undefined
        ? { speaker: m.speaker, text: m.text }
        : { speaker: m.speaker, text: m.text, private: m.private }
    ),
    ignore: stored.ignore ?? false,
  };
}
