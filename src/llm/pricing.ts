// ============================================
// Model pricing — static table, USD per 1M tokens
// ============================================

export const PRICED_MODELS = ["gpt-4o-mini", "gpt-4o", "gpt-4.1-mini", "gpt-4.1-nano", "gpt-4.1"] as const;

export type PricedModel = (typeof PRICED_MODELS)[number];

export interface ModelPrice {
  inputPerMillion: number;
  outputPerMillion: number;
}

export const MODEL_PRICING: Record<PricedModel, ModelPrice> = {
  "gpt-4o-mini": { inputPerMillion: 0.15, outputPerMillion: 0.6 },
  "gpt-4o": { inputPerMillion: 2.5, outputPerMillion: 10 },
  "gpt-4.1-mini": { inputPerMillion: 0.4, outputPerMillion: 1.6 },
  "gpt-4.1-nano": { inputPerMillion: 0.1, outputPerMillion: 0.4 },
  "gpt-4.1": { inputPerMillion: 2, outputPerMillion: 8 },
};

/**
 * Round to a fixed number of decimals.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Estimated USD cost of one completion, rounded to 6 decimals.
 */
export function estimateCostUsd(
  model: PricedModel,
  promptTokens: number,
  completionTokens: number
): number {
  const price = MODEL_PRICING[model];
  const raw = (promptTokens * price.inputPerMillion + completionTokens * price.outputPerMillion) / 1_000_000;
  return roundTo(raw, 6);
}
