// ============================================
// Shared test fixtures
// ============================================

import { vi } from "vitest";
import type { ChatCompletionsClient } from "../src/llm/client.js";
import { CampaignBriefError } from "../src/lib/errors.js";

export const SAMPLE_BRIEF = {
  brief:
    "Acme is launching a creator push to put its reusable bottles in front of active commuters. " +
    "Creators will show the bottle in real morning routines. " +
    "Content should feel warm and practical rather than polished. " +
    "Each post points viewers to the spring colour drop.",
  angles: ["Morning commute carry test", "Refill spots around town", "Colour-matching outfit picks"],
  criteria: [
    "Posts lifestyle content at least weekly",
    "Audience mostly aged 18-34 in urban areas",
    "Engagement rate above 3%",
  ],
};

export const SAMPLE_USAGE = {
  prompt_tokens: 200,
  completion_tokens: 150,
  total_tokens: 350,
};

/**
 * Minimal chat completion as the provider returns it.
 */
export function makeCompletion(content: string | null, usage: object | undefined = SAMPLE_USAGE) {
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 1_700_000_000,
    model: "gpt-4o-mini",
    choices: [
      {
        index: 0,
        finish_reason: "stop",
        logprobs: null,
        message: { role: "assistant", content, refusal: null },
      },
    ],
    usage,
  };
}

/**
 * In-process stand-in for the OpenAI chat completions API.
 */
export function makeFakeClient(content: string | null = JSON.stringify(SAMPLE_BRIEF), usage?: object) {
  const create = vi.fn().mockResolvedValue(makeCompletion(content, usage));
  const client: ChatCompletionsClient = { chat: { completions: { create } } };
  return { client, create };
}

/**
 * Await a promise expected to reject with a CampaignBriefError.
 */
export async function captureError(promise: Promise<unknown>): Promise<CampaignBriefError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof CampaignBriefError) return err;
    throw err;
  }
  throw new Error("Expected promise to reject");
}
