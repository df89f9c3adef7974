// ============================================
// Brief Types
// ============================================

/**
 * Post-call measurements for one generation.
 */
export interface Telemetry {
  latency_ms: number;
  tokens_total: number;
  tokens_prompt: number;
  tokens_completion: number;
  estimated_cost_usd: number;
}

/**
 * Exactly three entries; enforced when the provider response is checked.
 */
export type Triple = [string, string, string];

export interface BriefContent {
  brief: string;
  angles: Triple;
  criteria: Triple;
}

export interface BriefResult extends BriefContent {
  telemetry: Telemetry;
}

/** Number of angles and criteria every brief carries */
export const ITEMS_PER_LIST = 3;
