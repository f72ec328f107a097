/**
 * Gene-Pair Triage - LLM Rationale Client
 *
 * The rationale generator consumes any `RationaleClient`. The default
 * implementation calls an OpenAI-compatible or Anthropic endpoint through
 * the AI SDK. Every failure surfaces as a ServiceError.
 *
 * @module triage/llm
 */

import { generateText, type LanguageModel } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { createAnthropic } from "@ai-sdk/anthropic";

import type { AiSettings } from "../config-schemas";
import { ServiceError, classifyServiceError } from "../error-classification";

// ============================================================================
// CAPABILITY
// ============================================================================

export interface CompletionOptions {
  /** Aborted by the caller when the per-attempt timeout elapses. */
  signal?: AbortSignal;
  system?: string;
}

/**
 * Text-completion capability used for narrative enrichment.
 * Implementations reject with ServiceError on any failure. The answer is
 * checked by the caller, so a client may hand back whatever it received.
 */
export interface RationaleClient {
  complete(prompt: string, maxTokens: number, temperature: number, options?: CompletionOptions): Promise<unknown>;
}

// ============================================================================
// MODEL SELECTION
// ============================================================================

export const API_KEY_ENV_VAR = "TRIAGE_AI_API_KEY";

export interface ModelInfo {
  provider: AiSettings["provider"];
  modelName: string;
  model: LanguageModel;
}

export function buildModelInfo(settings: AiSettings, apiKey: string): ModelInfo {
  const baseURL = settings.baseUrl ?? undefined;
  if (settings.provider === "anthropic") {
    const anthropic = createAnthropic({ apiKey, baseURL });
    return { provider: "anthropic", modelName: settings.model, model: anthropic(settings.model) };
  }
  const openai = createOpenAI({ apiKey, baseURL });
  // Chat completions: the common denominator for OpenAI-compatible endpoints
  return { provider: "openai", modelName: settings.model, model: openai.chat(settings.model) };
}

// ============================================================================
// AI SDK CLIENT
// ============================================================================

export class AiSdkRationaleClient implements RationaleClient {
  private modelInfo: ModelInfo | null = null;

  constructor(
    private readonly settings: AiSettings,
    private readonly apiKey: string | undefined = process.env[API_KEY_ENV_VAR],
  ) {}

  get modelName(): string {
    return this.settings.model;
  }

  private getModel(): ModelInfo {
    if (!this.apiKey) {
      throw new ServiceError(`${API_KEY_ENV_VAR} environment variable is required for live narratives`, "auth");
    }
    if (!this.modelInfo) {
      this.modelInfo = buildModelInfo(this.settings, this.apiKey);
    }
    return this.modelInfo;
  }

  async complete(
    prompt: string,
    maxTokens: number,
    temperature: number,
    options: CompletionOptions = {},
  ): Promise<string> {
    const { model } = this.getModel();

    let text: string;
    try {
      const result = await generateText({
        model,
        system: options.system,
        prompt,
        maxOutputTokens: maxTokens,
        temperature,
        // Retries are owned by the rationale generator
        maxRetries: 0,
        abortSignal: options.signal,
      });
      text = result.text;
    } catch (error) {
      throw classifyServiceError(error);
    }

    if (!text || !text.trim()) {
      throw new ServiceError("Empty response from rationale service", "malformed_response");
    }
    return text.trim();
  }
}

export function createRationaleClient(settings: AiSettings): RationaleClient | undefined {
  return settings.enabled ? new AiSdkRationaleClient(settings) : undefined;
}
