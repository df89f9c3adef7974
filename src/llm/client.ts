// ============================================
// LLM Client — OpenAI API wrapper
// ============================================

import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions.js";

/**
 * The slice of the OpenAI client the brief generator talks to.
 * Tests pass an in-process fake with the same shape.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
    };
  };
}

/**
 * Generation settings. Low temperature keeps briefs consistent.
 */
export const BRIEF_TEMPERATURE = 0.4;
export const BRIEF_MAX_TOKENS = 600;
export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Create the OpenAI client. Retries are disabled: a failed call
 * surfaces to the caller immediately.
 */
export function createOpenAIClient(options: { apiKey: string; timeoutMs?: number }): OpenAI {
  return new OpenAI({
    apiKey: options.apiKey,
    timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    maxRetries: 0,
  });
}

/**
 * Human-readable description of a provider failure.
 */
export function describeProviderError(err: unknown): string {
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return "Request to the model provider timed out";
  }
  if (err instanceof OpenAI.APIConnectionError) {
    return `Could not reach the model provider: ${err.message}`;
  }
  if (err instanceof OpenAI.APIError) {
    return err.status ? `Model provider returned ${err.status}: ${err.message}` : err.message;
  }
  return err instanceof Error ? err.message : String(err);
}
