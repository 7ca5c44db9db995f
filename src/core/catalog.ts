import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import { CatalogLoadError, toErrorMessage } from "./errors.js";
import { writeFileAtomic, toPrettyJson } from "./files.js";
import type { Issue } from "../types.js";

// Keys this schema does not know are kept and written back on save.
const issueSchema = z
  .object({
    issue_id: z.string().min(1),
    category: z.string().default(""),
    short_description: z.string().default(""),
    keywords: z.array(z.string()).default([]),
    root_cause: z.string().default(""),
    resolution_steps: z.array(z.string()).default([]),
    confidence: z.number().default(0),
    notes: z.string().default(""),
    tickets: z.array(z.number().int()).default([]),
  })
  .passthrough();

const catalogSchema = z.array(issueSchema);

/**
 * Ordered list of issues, persisted as one JSON array.
 *
 * Array order is meaningful: branches sit right after their parent family,
 * so the list is saved exactly as held in memory.
 */
export class IssueCatalog {
  readonly path: string;
  readonly issues: Issue[];

  constructor(path: string, issues: Issue[] = []) {
    this.path = path;
    this.issues = issues;
  }

  /**
   * Read the catalog at `path`. A missing file is an empty catalog; a file
   * that is not a valid issue list throws instead of being discarded.
   */
  static load(path: string): IssueCatalog {
    if (!existsSync(path)) return new IssueCatalog(path);

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (err) {
      throw new CatalogLoadError(
        `Issue catalog at ${path} is not valid JSON: ${toErrorMessage(err)}`,
        path,
        err instanceof Error ? err : undefined
      );
    }

    const result = catalogSchema.safeParse(raw);
    if (!result.success) {
      const first = result.error.issues[0];
      const where = first ? ` at ${first.path.join(".")}` : "";
      throw new CatalogLoadError(
        `Issue catalog at ${path} is malformed${where}: ${first?.message ?? "unknown shape"}`,
        path
      );
    }

    const conflict = findInvariantViolation(result.data);
    if (conflict) {
      throw new CatalogLoadError(`Issue catalog at ${path} is inconsistent: ${conflict}`, path);
    }

    return new IssueCatalog(path, result.data);
  }

  /**
   * Write the catalog to `path`, or to the path it was loaded from.
   * Writing elsewhere does not change the default target.
   */
  save(path?: string): string {
    const target = path ?? this.path;
    writeFileAtomic(target, toPrettyJson(this.issues));
    return target;
  }

  get size(): number {
    return this.issues.length;
  }

  hasTicket(ticketId: number): boolean {
    return this.issues.some((issue) => issue.tickets.includes(ticketId));
  }

  findByTicket(ticketId: number): Issue | undefined {
    return this.issues.find((issue) => issue.tickets.includes(ticketId));
  }

  findById(issueId: string): Issue | undefined {
    return this.issues.find((issue) => issue.issue_id === issueId);
  }

  append(issue: Issue): void {
    this.issues.push(issue);
  }

  insertAt(index: number, issue: Issue): void {
    this.issues.splice(index, 0, issue);
  }
}

// Issue ids are unique and a ticket belongs to at most one issue.
function findInvariantViolation(issues: readonly Issue[]): string | null {
  const ids = new Set<string>();
  const owners = new Map<number, string>();
  for (const issue of issues) {
    if (ids.has(issue.issue_id)) return `duplicate issue id ${issue.issue_id}`;
    ids.add(issue.issue_id);
    for (const ticket of issue.tickets) {
      const owner = owners.get(ticket);
      if (owner !== undefined) {
        return `ticket ${ticket} is linked to both ${owner} and ${issue.issue_id}`;
      }
      owners.set(ticket, issue.issue_id);
    }
  }
  return null;
}
