// ============================================
// LLM Prompts — campaign brief generation
// ============================================

import type { BriefRequest } from "../validation/briefInput.js";

/**
 * System prompt: fixes the role, the 3 + 3 item counts and brief length.
 */
export const BRIEF_SYSTEM_PROMPT = `You are an expert marketing strategist specializing in creator campaigns.
Generate concise, actionable campaign briefs. Always return exactly 3 content angles and 3 creator selection criteria.
Keep briefs to 4-6 sentences. Be specific and platform-appropriate.`;

/**
 * User prompt with the validated inputs and the expected JSON shape.
 */
export function buildBriefUserPrompt(input: BriefRequest): string {
  return `Generate a campaign brief for ${input.brand_name}.

Platform: ${input.platform}
Goal: ${input.goal}
Tone: ${input.tone}

Return a JSON object with:
- "brief": A 4-6 sentence campaign brief
- "angles": Array of exactly 3 content angle suggestions
- "criteria": Array of exactly 3 creator selection criteria bullets`;
}
