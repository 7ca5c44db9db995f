import OpenAI from "openai";
import { log } from "./log.js";
import type { ChatClassifier } from "./classifier.js";
import type { LlmSettings } from "./config.js";

export interface OpenAIClassifierOptions {
  /** SDK-level retries with exponential backoff on 429, 5xx and connection errors. */
  maxRetries?: number;
  timeoutMs?: number;
}

/**
 * Chat-completion classifier for any OpenAI-compatible endpoint
 * (OpenAI, Groq, Gemini's compatibility layer).
 */
export class OpenAIClassifier implements ChatClassifier {
  private client: OpenAI;
  private settings: LlmSettings;

  constructor(settings: LlmSettings, options: OpenAIClassifierOptions = {}) {
    this.settings = settings;
    this.client = new OpenAI({
      apiKey: settings.apiKey,
      baseURL: settings.baseUrl,
      maxRetries: options.maxRetries ?? 5,
      timeout: options.timeoutMs ?? 120_000,
    });
  }

  async classify(systemPrompt: string, userPrompt: string): Promise<string> {
    const { model, provider, temperature } = this.settings;
    log.debug(`LLM request: provider=${provider}, model=${model}, temperature=${temperature ?? "default"}`);

    const response = await this.client.chat.completions.create({
      model,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userPrompt },
      ],
      ...(temperature !== undefined ? { temperature } : {}),
    });

    // An empty answer is left to the parse fallback rather than treated as an error.
    const content = response.choices[0]?.message?.content ?? "";
    log.debug(`LLM raw response (${content.length} chars)`);
    return content.trim();
  }
}
