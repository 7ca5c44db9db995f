import { existsSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { AUTO_IGNORE_PHRASES } from "./autoignore.js";
import { ConfigError } from "./errors.js";

// ── LLM provider & model registry ────────────────────────

interface ProviderConfig {
  apiKeyEnvVar: string;
  baseUrl: string;
}

export const LLM_PROVIDERS = {
  openai: {
    apiKeyEnvVar: "OPENAI_API_KEY",
    baseUrl: "https://api.openai.com/v1",
  },
  groq: {
    apiKeyEnvVar: "GROQ_API_KEY",
    baseUrl: "https://api.groq.com/openai/v1",
  },
  gemini: {
    apiKeyEnvVar: "GEMINI_API_KEY",
    baseUrl: "https://generativelanguage.googleapis.com/v1beta/openai/",
  },
} as const satisfies Record<string, ProviderConfig>;

export type LlmProvider = keyof typeof LLM_PROVIDERS;

export interface ModelEntry {
  model: string;
  provider: LlmProvider;
  /** Omitted for models that only accept their default temperature. */
  temperature?: number;
}

export const AVAILABLE_MODELS: readonly ModelEntry[] = [
  { model: "gpt-4.1", provider: "openai", temperature: 0.2 },
  { model: "gpt-5.2", provider: "openai" },
  { model: "moonshotai/kimi-k2-instruct", provider: "groq", temperature: 0.2 },
  { model: "openai/gpt-oss-120b", provider: "groq" },
  { model: "gemini-2.5-flash", provider: "gemini", temperature: 0.2 },
];

export interface LlmSettings {
  provider: LlmProvider;
  model: string;
  apiKey: string;
  baseUrl: string;
  temperature?: number;
}

// ── Environment ──────────────────────────────────────────

export const DEFAULT_SEARCH_QUERY = "type:'Problem' AND (status:4 OR status:5)";
export const DEFAULT_BATCH_SIZE = 3;

const envSchema = z.object({
  HELPDESK_DOMAIN: z.string().optional(),
  HELPDESK_API_KEY: z.string().optional(),
  HELPDESK_SEARCH_QUERY: z.string().default(DEFAULT_SEARCH_QUERY),
  LLM_MODEL: z.string().optional(),
  BATCH_SIZE: z.coerce.number().int().positive().default(DEFAULT_BATCH_SIZE),
  AUTO_IGNORE_PHRASES: z.string().optional(),
  TICKETCLUSTER_HOME: z.string().optional(),
});

export interface Settings {
  helpdeskDomain?: string;
  helpdeskApiKey?: string;
  searchQuery: string;
  model: string;
  batchSize: number;
  autoIgnorePhrases: string[];
  homeDir: string;
  conversationsDir: string;
  defaultDbPath: string;
}

export interface HelpdeskSettings {
  domain: string;
  apiKey: string;
  searchQuery: string;
}

type Env = Record<string, string | undefined>;

/**
 * Resolve settings from the environment (after `.env` has been loaded).
 * Blank values count as unset.
 */
export function readSettings(env: Env = process.env): Settings {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") present[key] = value.trim();
  }

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new ConfigError(
      `Invalid configuration: ${first ? `${first.path.join(".")}: ${first.message}` : "unknown error"}`
    );
  }
  const parsed = result.data;

  const extraPhrases = (parsed.AUTO_IGNORE_PHRASES ?? "")
    .split("|")
    .map((p) => p.trim())
    .filter(Boolean);

  const homeDir = parsed.TICKETCLUSTER_HOME ?? process.cwd();

  return {
    helpdeskDomain: parsed.HELPDESK_DOMAIN,
    helpdeskApiKey: parsed.HELPDESK_API_KEY,
    searchQuery: parsed.HELPDESK_SEARCH_QUERY,
    model: parsed.LLM_MODEL ?? AVAILABLE_MODELS[0].model,
    batchSize: parsed.BATCH_SIZE,
    autoIgnorePhrases: [...AUTO_IGNORE_PHRASES, ...extraPhrases],
    homeDir,
    conversationsDir: join(homeDir, "conversations"),
    defaultDbPath: join(homeDir, "output", "issues_db.json"),
  };
}

export function requireHelpdeskSettings(settings: Settings): HelpdeskSettings {
  const missing: string[] = [];
  if (!settings.helpdeskDomain) missing.push("HELPDESK_DOMAIN");
  if (!settings.helpdeskApiKey) missing.push("HELPDESK_API_KEY");
  if (!settings.helpdeskDomain || !settings.helpdeskApiKey) {
    throw new ConfigError(`Missing required environment variable(s): ${missing.join(", ")}`);
  }
  return {
    domain: settings.helpdeskDomain,
    apiKey: settings.helpdeskApiKey,
    searchQuery: settings.searchQuery,
  };
}

/**
 * Provider, endpoint and API key for `modelName`.
 */
export function resolveLlmSettings(modelName: string, env: Env = process.env): LlmSettings {
  const entry = AVAILABLE_MODELS.find((m) => m.model === modelName);
  if (!entry) {
    const available = AVAILABLE_MODELS.map((m) => m.model).join(", ");
    throw new ConfigError(`Unknown LLM model '${modelName}'. Available: ${available}`);
  }

  const provider = LLM_PROVIDERS[entry.provider];
  const apiKey = env[provider.apiKeyEnvVar]?.trim();
  if (!apiKey) {
    throw new ConfigError(
      `Missing environment variable '${provider.apiKeyEnvVar}' required for provider '${entry.provider}'.`
    );
  }

  return {
    provider: entry.provider,
    model: entry.model,
    apiKey,
    baseUrl: provider.baseUrl,
    temperature: entry.temperature,
  };
}

export function isKnownModel(modelName: string): boolean {
  return AVAILABLE_MODELS.some((m) => m.model === modelName);
}

export function maskSecret(value: string | undefined): string {
  if (!value) return "<missing>";
  return `***${value.slice(-4)}`;
}

const PLAIN_ENV_VALUE_RE = /^[\w.\/:@+-]*$/;

function formatEnvValue(value: string): string {
  if (PLAIN_ENV_VALUE_RE.test(value)) return value;
  if (!value.includes("'") && !value.includes("\n")) return `'${value}'`;
  if (!value.includes('"')) return `"${value.replace(/\n/g, "\\n")}"`;
  throw new ConfigError(`Cannot write a value containing both quote kinds to .env: ${value}`);
}

// Keys are environment variable names (word characters only).
function envKeyRegex(key: string): RegExp {
  return new RegExp(`^\\s*(?:export\\s+)?${key}\\s*=`);
}

/**
 * Set keys in a `.env` file. Only the lines of the given keys are rewritten;
 * every other line, comments included, is kept as written.
 */
export function updateEnvFile(path: string, updates: Record<string, string>): void {
  const lines = existsSync(path) ? readFileSync(path, "utf-8").split("\n") : [];
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();

  for (const [key, value] of Object.entries(updates)) {
    const line = `${key}=${formatEnvValue(value)}`;
    const re = envKeyRegex(key);
    const index = lines.findIndex((l) => re.test(l));
    if (index === -1) lines.push(line);
    else lines[index] = line;
  }

  writeFileSync(path, lines.join("\n") + "\n", "utf-8");
}

export function envFilePath(): string {
  return join(process.cwd(), ".env");
}
