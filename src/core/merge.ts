import type { IssueCatalog } from "./catalog.js";
import type { Classification, Issue } from "../types.js";

/**
 * Matches at or above this confidence update the referenced issue directly.
 * Below it, a referenced issue gets a new branch instead.
 */
export const BRANCH_CONFIDENCE_THRESHOLD = 0.9;

export const ROOT_ID_PREFIX = "ISSUE-";

// Only pure root ids count when allocating: "ISSUE-0007" yes, "ISSUE-0007-2" no.
const ROOT_ID_RE = /^ISSUE-(\d+)$/;
const DIGITS_RE = /^\d+$/;

export function formatRootId(n: number): string {
  return `${ROOT_ID_PREFIX}${String(n).padStart(4, "0")}`;
}

/**
 * One past the highest root number in the catalog. The list itself is the
 * only source of truth, so there is no counter to drift.
 */
export function nextRootId(issues: readonly Issue[]): string {
  let max = 0;
  for (const issue of issues) {
    const match = ROOT_ID_RE.exec(issue.issue_id);
    if (match) max = Math.max(max, Number(match[1]));
  }
  return formatRootId(max + 1);
}

/**
 * Next branch id under `parentId`. Only the segment right after the parent
 * prefix is counted, so "P-1-1" counts as branch 1 of P and branches of
 * branches get their own sequence.
 */
export function nextBranchId(issues: readonly Issue[], parentId: string): string {
  const prefix = `${parentId}-`;
  let max = 0;
  for (const issue of issues) {
    if (!issue.issue_id.startsWith(prefix)) continue;
    const segment = issue.issue_id.slice(prefix.length).split("-")[0];
    if (DIGITS_RE.test(segment)) max = Math.max(max, Number(segment));
  }
  return `${prefix}${max + 1}`;
}

/**
 * Position right after the last member of the parent's family (the parent
 * itself or anything already branched from it). End of list when the family
 * is absent.
 */
export function branchInsertIndex(issues: readonly Issue[], parentId: string): number {
  const prefix = `${parentId}-`;
  let last = -1;
  issues.forEach((issue, i) => {
    if (issue.issue_id === parentId || issue.issue_id.startsWith(prefix)) last = i;
  });
  return last === -1 ? issues.length : last + 1;
}

/**
 * Copy the classification's non-empty fields onto `issue`. Empty strings,
 * empty lists and zero confidence are skipped so a partial result never
 * erases what is already known. `issue_id` and `tickets` are never touched.
 */
export function applyNonEmptyFields(issue: Issue, c: Classification): void {
  if (c.category) issue.category = c.category;
  if (c.short_description) issue.short_description = c.short_description;
  if (c.keywords.length > 0) issue.keywords = [...c.keywords];
  if (c.root_cause) issue.root_cause = c.root_cause;
  if (c.resolution_steps.length > 0) issue.resolution_steps = [...c.resolution_steps];
  if (c.confidence) issue.confidence = c.confidence;
  if (c.notes) issue.notes = c.notes;
}

function overwriteFields(issue: Issue, c: Classification): void {
  issue.category = c.category;
  issue.short_description = c.short_description;
  issue.keywords = [...c.keywords];
  issue.root_cause = c.root_cause;
  issue.resolution_steps = [...c.resolution_steps];
  issue.confidence = c.confidence;
  issue.notes = c.notes;
}

function newIssue(issueId: string, c: Classification, ticketId: number): Issue {
  return {
    issue_id: issueId,
    category: c.category,
    short_description: c.short_description,
    keywords: [...c.keywords],
    root_cause: c.root_cause,
    resolution_steps: [...c.resolution_steps],
    confidence: c.confidence,
    notes: c.notes,
    tickets: [ticketId],
  };
}

// A ticket belongs to at most one issue.
function detachTicket(catalog: IssueCatalog, ticketId: number, keep?: Issue): void {
  for (const issue of catalog.issues) {
    if (issue === keep) continue;
    const idx = issue.tickets.indexOf(ticketId);
    if (idx !== -1) issue.tickets.splice(idx, 1);
  }
}

/**
 * Fold one classification into the catalog for `ticketId`.
 *
 * 1. No issue id: update the issue already linking the ticket, else create
 *    a new root issue at the end.
 * 2. Issue id below the branch threshold: update the issue already linking
 *    the ticket, else create a branch of the referenced issue placed after
 *    its family.
 * 3. Issue id at or above the threshold: update that issue and link the
 *    ticket, or create it under the given id when it does not exist.
 *
 * Mutates and returns `catalog`. Re-merging the same input is a no-op.
 */
export function mergeClassification(
  catalog: IssueCatalog,
  classification: Classification,
  ticketId: number
): IssueCatalog {
  const issueId = classification.issue_id;

  if (!issueId || classification.confidence < BRANCH_CONFIDENCE_THRESHOLD) {
    const linked = catalog.findByTicket(ticketId);
    if (linked) {
      applyNonEmptyFields(linked, classification);
      return catalog;
    }

    if (!issueId) {
      catalog.append(newIssue(nextRootId(catalog.issues), classification, ticketId));
      return catalog;
    }

    const branch = newIssue(nextBranchId(catalog.issues, issueId), classification, ticketId);
    catalog.insertAt(branchInsertIndex(catalog.issues, issueId), branch);
    return catalog;
  }

  const existing = catalog.findById(issueId);
  if (existing) {
    overwriteFields(existing, classification);
    detachTicket(catalog, ticketId, existing);
    if (!existing.tickets.includes(ticketId)) existing.tickets.push(ticketId);
    return catalog;
  }

  // Unknown id (stale or invented by the classifier): keep it verbatim.
  detachTicket(catalog, ticketId);
  catalog.append(newIssue(issueId, classification, ticketId));
  return catalog;
}
