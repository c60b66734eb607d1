// src/llm/client.ts — HTTP text generator for AI-assisted generation
// One request per call, no retry: callers decide what a failure means.

import { applySubstitutions } from "../substitution.js";
import type { LLMConfig, LLMProvider } from "../types.js";
import { LLMError } from "../types.js";

export interface GenerationContext {
  /** Filled into `{{ name }}` placeholders of the prompt. */
  variables?: Record<string, string>;
  system?: string;
}

export interface TextGenerator {
  generate(prompt: string, context: GenerationContext): Promise<string>;
}

export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  anthropic: "claude-sonnet-4-20250514",
  openai: "gpt-4o-mini",
};

const DEFAULT_BASE_URLS: Record<LLMProvider, string> = {
  anthropic: "https://api.anthropic.com",
  openai: "https://api.openai.com",
};

const REQUEST_TIMEOUT_MS = 120_000;
const TEMPERATURE = 0.7;

/**
 * Create a generator for the configured provider, or null when no API key is set.
 */
export function createTextGenerator(config: LLMConfig): TextGenerator | null {
  if (!config.apiKey) return null;
  return new HttpTextGenerator({ ...config, apiKey: config.apiKey });
}

/**
 * Which provider API keys are present in the environment.
 */
export function checkApiKeys(
  env: NodeJS.ProcessEnv = process.env,
): Record<LLMProvider, boolean> {
  return {
    anthropic: Boolean(env.ANTHROPIC_API_KEY),
    openai: Boolean(env.OPENAI_API_KEY),
  };
}

export class HttpTextGenerator implements TextGenerator {
  constructor(private readonly config: LLMConfig & { apiKey: string }) {}

  async generate(prompt: string, context: GenerationContext = {}): Promise<string> {
    const userPrompt = applySubstitutions(prompt, context.variables ?? {}).text;
    const request =
      this.config.provider === "openai"
        ? this.openAIRequest(userPrompt, context.system)
        : this.anthropicRequest(userPrompt, context.system);

    const data = await this.post(request.url, request.headers, request.body);
    const text =
      this.config.provider === "openai" ? extractOpenAIText(data) : extractAnthropicText(data);
    if (!text) {
      throw new LLMError("LLM response missing content text");
    }
    return text;
  }

  private anthropicRequest(userPrompt: string, system?: string) {
    const base = this.config.baseUrl ?? DEFAULT_BASE_URLS.anthropic;
    return {
      url: `${base}/v1/messages`,
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.config.apiKey,
        "anthropic-version": "2023-06-01",
      },
      body: {
        model: this.config.model,
        max_tokens: this.config.maxOutputTokens,
        ...(system ? { system } : {}),
        messages: [{ role: "user", content: userPrompt }],
        temperature: TEMPERATURE,
      },
    };
  }

  private openAIRequest(userPrompt: string, system?: string) {
    const base = this.config.baseUrl ?? DEFAULT_BASE_URLS.openai;
    const messages = system
      ? [
          { role: "system", content: system },
          { role: "user", content: userPrompt },
        ]
      : [{ role: "user", content: userPrompt }];
    return {
      url: `${base}/v1/chat/completions`,
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.config.apiKey}`,
      },
      body: {
        model: this.config.model,
        max_tokens: this.config.maxOutputTokens,
        messages,
        temperature: TEMPERATURE,
      },
    };
  }

  private async post(
    url: string,
    headers: Record<string, string>,
    body: unknown,
  ): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

    try {
      const response = await fetch(url, {
        method: "POST",
        signal: controller.signal,
        headers,
        body: JSON.stringify(body),
      });

      if (!response.ok) {
        const text = await response.text().catch(() => "");
        // Truncate error body to avoid leaking sensitive data in logs
        throw new LLMError(
          `LLM API returned ${response.status}: ${text.slice(0, 200)}`,
          response.status,
        );
      }

      const data: unknown = await response.json();
      return data;
    } catch (err) {
      if (err instanceof LLMError) throw err;
      if (err instanceof Error && err.name === "AbortError") {
        throw new LLMError(`LLM API request timed out after ${REQUEST_TIMEOUT_MS / 1000}s`);
      }
      throw new LLMError(
        `LLM API request failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    } finally {
      clearTimeout(timer);
    }
  }
}

// ─── Response parsing ────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function extractAnthropicText(data: unknown): string | undefined {
  if (!isRecord(data) || !Array.isArray(data.content)) return undefined;
  const first: unknown = data.content[0];
  return isRecord(first) && typeof first.text === "string" ? first.text : undefined;
}

function extractOpenAIText(data: unknown): string | undefined {
  if (!isRecord(data) || !Array.isArray(data.choices)) return undefined;
  const first: unknown = data.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return undefined;
  return typeof first.message.content === "string" ? first.message.content : undefined;
}
