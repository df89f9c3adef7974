// ============================================
// Brief Generation — one provider call, strict response contract
// ============================================

import type { ChatCompletion } from "openai/resources/chat/completions.js";
import {
  BRIEF_MAX_TOKENS,
  BRIEF_TEMPERATURE,
  describeProviderError,
  type ChatCompletionsClient,
} from "../llm/client.js";
import { BRIEF_SYSTEM_PROMPT, buildBriefUserPrompt } from "../llm/prompts.js";
import { estimateCostUsd, roundTo, type PricedModel } from "../llm/pricing.js";
import { createRequestLogger, type RequestLogger } from "../lib/logger.js";
import {
  invalidShapeError,
  malformedResponseError,
  serviceError,
} from "../lib/errors.js";
import type { BriefRequest } from "../validation/briefInput.js";
import { ITEMS_PER_LIST, type BriefContent, type BriefResult, type Telemetry, type Triple } from "./types.js";

export interface BriefGeneratorOptions {
  client: ChatCompletionsClient;
  model: PricedModel;
  /** Monotonic clock in ms, for latency; injectable for tests */
  clock?: () => number;
}

const REQUIRED_KEYS = ["brief", "angles", "criteria"] as const;

/**
 * Generates campaign briefs. Every call makes exactly one provider request;
 * nothing is retried, truncated or padded.
 */
export class BriefGenerator {
  private readonly client: ChatCompletionsClient;
  private readonly model: PricedModel;
  private readonly clock: () => number;

  constructor(options: BriefGeneratorOptions) {
    this.client = options.client;
    this.model = options.model;
    this.clock = options.clock ?? (() => performance.now());
  }

  /**
   * Generate a brief for validated input.
   *
   * Fails with SERVICE_ERROR when the provider cannot be reached or rejects
   * the call, MALFORMED_RESPONSE when the reply is not JSON, and
   * INVALID_RESPONSE_SHAPE when the JSON breaks the brief contract.
   */
  async generate(input: BriefRequest, options: { requestId?: string } = {}): Promise<BriefResult> {
    const requestId = options.requestId ?? "internal";
    const log = createRequestLogger(requestId, "llm");

    log.debug("Requesting brief", {
      model: this.model,
      platform: input.platform,
      goal: input.goal,
      tone: input.tone,
    });

    const start = this.clock();
    let response: ChatCompletion;

    try {
      response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: BRIEF_SYSTEM_PROMPT },
          { role: "user", content: buildBriefUserPrompt(input) },
        ],
        response_format: { type: "json_object" },
        temperature: BRIEF_TEMPERATURE,
        max_tokens: BRIEF_MAX_TOKENS,
      });
    } catch (err) {
      log.error("LLM completion failed", { model: this.model, error: err });
      throw serviceError(describeProviderError(err), options.requestId, err);
    }

    const latencyMs = this.clock() - start;

    const content = parseBriefContent(response.choices[0]?.message?.content, options.requestId);
    const telemetry = this.buildTelemetry(response, latencyMs, log);

    log.info("Brief generated", {
      model: this.model,
      latencyMs: telemetry.latency_ms,
      tokensTotal: telemetry.tokens_total,
      estimatedCostUsd: telemetry.estimated_cost_usd,
    });

    return { ...content, telemetry };
  }

  private buildTelemetry(
    response: ChatCompletion,
    latencyMs: number,
    log: RequestLogger
  ): Telemetry {
    const usage = response.usage;
    if (!usage) {
      log.warn("Provider response carried no usage report", { model: this.model });
    }

    const prompt = usage?.prompt_tokens ?? 0;
    const completion = usage?.completion_tokens ?? 0;

    return {
      latency_ms: roundTo(Math.max(0, latencyMs), 2),
      tokens_total: usage?.total_tokens ?? 0,
      tokens_prompt: prompt,
      tokens_completion: completion,
      estimated_cost_usd: estimateCostUsd(this.model, prompt, completion),
    };
  }
}

// ============================================
// Response contract
// ============================================

/**
 * Decode the model's JSON reply and enforce the brief shape.
 */
export function parseBriefContent(raw: string | null | undefined, requestId?: string): BriefContent {
  if (!raw) {
    throw malformedResponseError("Provider returned an empty response", requestId);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw malformedResponseError(`Failed to parse LLM response as JSON: ${reason}`, requestId, err);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw invalidShapeError("Response must be a JSON object", requestId);
  }

  for (const key of REQUIRED_KEYS) {
    if (!(key in parsed)) {
      throw invalidShapeError(`Response is missing required key "${key}"`, requestId, { key });
    }
  }

  const record: Record<string, unknown> = { ...parsed };

  if (typeof record["brief"] !== "string") {
    throw invalidShapeError("Brief must be a string", requestId);
  }

  return {
    brief: record["brief"],
    angles: toTriple("Angles", record["angles"], requestId),
    criteria: toTriple("Criteria", record["criteria"], requestId),
  };
}

function toTriple(label: string, value: unknown, requestId?: string): Triple {
  if (!Array.isArray(value)) {
    throw invalidShapeError(`${label} must be an array of exactly ${ITEMS_PER_LIST} items`, requestId);
  }
  if (value.length !== ITEMS_PER_LIST) {
    throw invalidShapeError(
      `${label} must be an array of exactly ${ITEMS_PER_LIST} items (got ${value.length})`,
      requestId,
      { field: label.toLowerCase(), length: value.length }
    );
  }

  const [first, second, third] = value;
  if (typeof first !== "string" || typeof second !== "string" || typeof third !== "string") {
    throw invalidShapeError(`${label} items must be strings`, requestId);
  }
  return [first, second, third];
}
