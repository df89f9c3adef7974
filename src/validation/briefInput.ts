// ============================================
// Brief Input Validation — allowlists, length and blocklist checks
// ============================================

import { z } from "zod";

export const ALLOWED_PLATFORMS = ["Instagram", "TikTok", "UGC"] as const;
export const ALLOWED_GOALS = ["Awareness", "Conversions", "Content Assets"] as const;
export const ALLOWED_TONES = ["Professional", "Friendly", "Playful"] as const;

export type Platform = (typeof ALLOWED_PLATFORMS)[number];
export type Goal = (typeof ALLOWED_GOALS)[number];
export type Tone = (typeof ALLOWED_TONES)[number];

export const BRAND_NAME_MIN_LENGTH = 2;
export const BRAND_NAME_MAX_LENGTH = 100;

/**
 * Raw fields as they arrive, trimmed but not yet checked.
 */
export interface BriefRequestFields {
  brand_name: string;
  platform: string;
  goal: string;
  tone: string;
}

/**
 * Fields that passed validation.
 */
export interface BriefRequest {
  brand_name: string;
  platform: Platform;
  goal: Goal;
  tone: Tone;
}

export type ValidationResult =
  | { valid: true; value: BriefRequest }
  | { valid: false; error: string };

export interface ValidationOptions {
  /** Lower-case terms; a brand name containing any of them is rejected */
  profanityTerms?: readonly string[];
}

// ============================================
// Request body extraction
// ============================================

/** Missing or null → "", strings trimmed, anything else rejected. */
const trimmedField = (field: keyof BriefRequestFields) =>
  z
    .string({ invalid_type_error: `${field} must be a string` })
    .nullish()
    .transform((v) => (v ?? "").trim());

/**
 * Request body schema for POST /api/generate-brief/.
 * Unknown keys are ignored.
 */
export const briefRequestBodySchema = z.object(
  {
    brand_name: trimmedField("brand_name"),
    platform: trimmedField("platform"),
    goal: trimmedField("goal"),
    tone: trimmedField("tone"),
  },
  {
    invalid_type_error: "Request body must be a JSON object",
    required_error: "Request body must be a JSON object",
  }
);

export type BodyParseResult =
  | { ok: true; fields: BriefRequestFields }
  | { ok: false; error: string };

/**
 * Pull the four fields out of an already JSON-decoded body.
 */
export function parseBriefRequestBody(body: unknown): BodyParseResult {
  if (Array.isArray(body)) {
    return { ok: false, error: "Request body must be a JSON object" };
  }

  const result = briefRequestBodySchema.safeParse(body);
  if (!result.success) {
    const first = result.error.issues[0];
    return { ok: false, error: first?.message ?? "Invalid request body" };
  }

  return { ok: true, fields: result.data };
}

// ============================================
// Field validation
// ============================================

function isOneOf<T extends string>(allowed: readonly T[], value: string): value is T {
  return allowed.some((a) => a === value);
}

/**
 * Validate brief inputs. Checks run in a fixed order and the first
 * failure is returned. Allowlist checks are case-sensitive.
 */
export function validateBriefInput(
  fields: BriefRequestFields,
  options: ValidationOptions = {}
): ValidationResult {
  const { profanityTerms = [] } = options;
  const { platform, goal, tone } = fields;

  if (!fields.brand_name || !fields.brand_name.trim()) {
    return { valid: false, error: "Brand name is required" };
  }

  const brandName = fields.brand_name.trim();
  // Count code points, so an emoji is one character
  const brandLength = [...brandName].length;
  if (brandLength < BRAND_NAME_MIN_LENGTH) {
    return { valid: false, error: `Brand name must be at least ${BRAND_NAME_MIN_LENGTH} characters` };
  }
  if (brandLength > BRAND_NAME_MAX_LENGTH) {
    return { valid: false, error: `Brand name must be less than ${BRAND_NAME_MAX_LENGTH} characters` };
  }

  const brandLower = brandName.toLowerCase();
  if (profanityTerms.some((term) => term && brandLower.includes(term.toLowerCase()))) {
    return { valid: false, error: "Brand name contains inappropriate content" };
  }

  if (!isOneOf(ALLOWED_PLATFORMS, platform)) {
    return { valid: false, error: `Platform must be one of: ${ALLOWED_PLATFORMS.join(", ")}` };
  }

  if (!isOneOf(ALLOWED_GOALS, goal)) {
    return { valid: false, error: `Goal must be one of: ${ALLOWED_GOALS.join(", ")}` };
  }

  if (!isOneOf(ALLOWED_TONES, tone)) {
    return { valid: false, error: `Tone must be one of: ${ALLOWED_TONES.join(", ")}` };
  }

  return {
    valid: true,
    value: { brand_name: brandName, platform, goal, tone },
  };
}
