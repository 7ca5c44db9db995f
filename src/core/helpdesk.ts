/**
 * Helpdesk REST client (Freshdesk API v2).
 *
 * - Basic auth with the API key as user name and "X" as password
 * - At least `minIntervalMs` between calls (the API allows ~20 req/min)
 * - 429 responses: sleep for Retry-After, then try again outside the backoff count
 * - Connection errors, timeouts and 5xx: exponential backoff, bounded attempts
 */

import { z } from "zod";
import { HelpdeskError, toErrorMessage } from "./errors.js";
import { log } from "./log.js";
import type { HelpdeskSettings } from "./config.js";

export interface TicketSource {
  /** Resolved ticket ids, oldest update first. */
  fetchResolvedTicketIds(maxPages: number): Promise<number[]>;
  /** Full ticket payload including its conversation replies. */
  fetchTicket(ticketId: number): Promise<unknown>;
}

export interface HelpdeskClientOptions extends HelpdeskSettings {
  baseUrl?: string;
  minIntervalMs?: number;
  maxAttempts?: number;
  retryBaseDelayMs?: number;
  maxRateLimitWaits?: number;
  timeoutMs?: number;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export const MIN_INTERVAL_MS = 3_200;
const DEFAULT_RETRY_AFTER_SECONDS = 60;

const searchResponseSchema = z.object({
  results: z
    .array(
      z
        .object({
          id: z.number().int(),
          updated_at: z.string().nullish(),
        })
        .passthrough()
    )
    .default([]),
});

type AttemptResult =
  | { kind: "ok"; data: unknown }
  | { kind: "rate-limited"; retryAfterMs: number }
  | { kind: "failed"; error: HelpdeskError };

export class HelpdeskClient implements TicketSource {
  private readonly baseUrl: string;
  private readonly authHeader: string;
  private readonly searchQuery: string;
  private readonly minIntervalMs: number;
  private readonly maxAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly maxRateLimitWaits: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private lastCallAt = Number.NEGATIVE_INFINITY;

  constructor(options: HelpdeskClientOptions) {
    this.baseUrl = (options.baseUrl ?? `https://${options.domain}.freshdesk.com/api/v2`).replace(/\/$/, "");
    this.authHeader = `Basic ${Buffer.from(`${options.apiKey}:X`).toString("base64")}`;
    this.searchQuery = options.searchQuery;
    this.minIntervalMs = options.minIntervalMs ?? MIN_INTERVAL_MS;
    this.maxAttempts = options.maxAttempts ?? 5;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1_000;
    this.maxRateLimitWaits = options.maxRateLimitWaits ?? 10;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.now = options.now ?? Date.now;
  }

  searchUrl(page: number): string {
    return `${this.baseUrl}/search/tickets?query=${encodeURIComponent(`"${this.searchQuery}"`)}&page=${page}`;
  }

  ticketUrl(ticketId: number): string {
    return `${this.baseUrl}/tickets/${ticketId}?include=conversations`;
  }

  async fetchResolvedTicketIds(maxPages: number): Promise<number[]> {
    const tickets: { updatedAt: number; id: number }[] = [];

    for (let page = 1; page <= maxPages; page++) {
      const data = searchResponseSchema.parse(await this.getJson(this.searchUrl(page)));
      if (data.results.length === 0) break;
      for (const r of data.results) {
        const ts = r.updated_at ? Date.parse(r.updated_at) : Number.NaN;
        // Unparseable timestamps sort first
        tickets.push({ updatedAt: Number.isFinite(ts) ? ts : Number.NEGATIVE_INFINITY, id: r.id });
      }
    }

    tickets.sort((a, b) => (a.updatedAt === b.updatedAt ? 0 : a.updatedAt < b.updatedAt ? -1 : 1));
    return tickets.map((t) => t.id);
  }

  async fetchTicket(ticketId: number): Promise<unknown> {
    return this.getJson(this.ticketUrl(ticketId));
  }

  private async getJson(url: string): Promise<unknown> {
    let failures = 0;
    let rateLimitWaits = 0;

    for (;;) {
      await this.waitForSlot();
      const result = await this.attempt(url);

      if (result.kind === "ok") return result.data;

      if (result.kind === "rate-limited") {
        rateLimitWaits++;
        if (rateLimitWaits > this.maxRateLimitWaits) {
          throw new HelpdeskError(`Still rate limited after ${this.maxRateLimitWaits} waits`, 429, url);
        }
        log.warn(`Hit helpdesk rate limit. Sleeping ${Math.round(result.retryAfterMs / 1000)}s`);
        await this.sleep(result.retryAfterMs);
        continue;
      }

      failures++;
      const { error } = result;
      if (!error.retryable) throw error;
      if (failures >= this.maxAttempts) {
        throw new HelpdeskError(
          `Request failed after ${failures} attempts: ${error.message}`,
          error.statusCode,
          url,
          error
        );
      }

      const delay = this.retryDelay(failures);
      log.debug(`Helpdesk request failed (attempt ${failures}/${this.maxAttempts}), retrying in ${delay}ms: ${error.message}`);
      await this.sleep(delay);
    }
  }

  private async waitForSlot(): Promise<void> {
    const elapsed = this.now() - this.lastCallAt;
    if (elapsed < this.minIntervalMs) {
      const wait = this.minIntervalMs - elapsed;
      log.debug(`Rate limiting: sleeping ${(wait / 1000).toFixed(2)}s`);
      await this.sleep(wait);
    }
  }

  private async attempt(url: string): Promise<AttemptResult> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        headers: { Authorization: this.authHeader, Accept: "application/json" },
        signal: controller.signal,
      });

      if (response.status === 429) {
        return { kind: "rate-limited", retryAfterMs: parseRetryAfter(response.headers.get("Retry-After")) };
      }

      if (!response.ok) {
        const body = await response.text().catch(() => "");
        return {
          kind: "failed",
          error: new HelpdeskError(
            `Helpdesk API returned ${response.status} for ${url}${body ? `: ${body.slice(0, 200)}` : ""}`,
            response.status,
            url
          ),
        };
      }

      return { kind: "ok", data: await response.json() };
    } catch (err) {
      const message =
        err instanceof Error && err.name === "AbortError"
          ? `Request timed out after ${this.timeoutMs}ms`
          : `Request failed: ${toErrorMessage(err)}`;
      return {
        kind: "failed",
        error: new HelpdeskError(message, undefined, url, err instanceof Error ? err : undefined),
      };
    } finally {
      clearTimeout(timeoutId);
      this.lastCallAt = this.now();
    }
  }

  // Exponential backoff: base * 2^(n-1), plus up to one base delay of jitter
  private retryDelay(failures: number): number {
    const exponential = this.retryBaseDelayMs * Math.pow(2, failures - 1);
    return Math.round(exponential + Math.random() * this.retryBaseDelayMs);
  }
}

export function parseRetryAfter(header: string | null): number {
  const seconds = header ? Number.parseInt(header, 10) : Number.NaN;
  return (Number.isFinite(seconds) && seconds >= 0 ? seconds : DEFAULT_RETRY_AFTER_SECONDS) * 1000;
}
