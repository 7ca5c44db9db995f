import {
  readSettings,
  resolveLlmSettings,
  updateEnvFile,
  envFilePath,
  isKnownModel,
  maskSecret,
  LLM_PROVIDERS,
} from "../core/config.js";
import { ConfigError, toErrorMessage } from "../core/errors.js";

/**
 * Display the effective configuration. API keys are masked.
 */
export function configShowCommand(): void {
  const settings = readSettings();

  const rows: [string, string][] = [
    ["HELPDESK_DOMAIN", settings.helpdeskDomain ?? "<missing>"],
    ["HELPDESK_API_KEY", maskSecret(settings.helpdeskApiKey)],
    ["HELPDESK_SEARCH_QUERY", settings.searchQuery],
    ["BATCH_SIZE", String(settings.batchSize)],
    ["LLM_MODEL (effective)", settings.model],
    ["Conversations", settings.conversationsDir],
    ["Issue DB", settings.defaultDbPath],
  ];

  for (const [provider, meta] of Object.entries(LLM_PROVIDERS)) {
    rows.push([`${provider} API key`, maskSecret(process.env[meta.apiKeyEnvVar])]);
  }

  try {
    const llm = resolveLlmSettings(settings.model);
    rows.push(["LLM endpoint", llm.baseUrl]);
  } catch (err) {
    rows.push(["LLM endpoint", `<unavailable: ${toErrorMessage(err)}>`]);
  }

  const width = Math.max(...rows.map(([key]) => key.length));
  console.log("Effective configuration\n");
  for (const [key, value] of rows) {
    console.log(`  ${key.padEnd(width)}  ${value}`);
  }
}

/**
 * Update defaults in the project's .env file.
 */
export function configSetCommand(options: { model?: string; batchSize?: number }): void {
  if (options.model === undefined && options.batchSize === undefined) {
    console.log("Nothing to update. Use --model and/or --batch-size.");
    return;
  }

  const updates: Record<string, string> = {};
  if (options.model !== undefined) {
    if (!isKnownModel(options.model)) {
      throw new ConfigError(`Model '${options.model}' is not in the list of available models.`);
    }
    updates.LLM_MODEL = options.model;
  }
  if (options.batchSize !== undefined) {
    updates.BATCH_SIZE = String(options.batchSize);
  }

  updateEnvFile(envFilePath(), updates);
  console.log(".env updated successfully. Run `ticketcluster config show` to verify.");
}
