import { z } from "zod";
import { PRICED_MODELS } from "../llm/pricing.js";

// ============================================
// Environment configuration with validation
// Fails fast on startup if config is invalid
// ============================================

const envSchema = z.object({
  // Server
  PORT: z.string().default("3000").transform(Number).pipe(z.number().int().min(0).max(65535)),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  // Read directly by the logger; validated here so a typo fails startup
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),

  // OpenAI
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  OPENAI_MODEL: z.enum(PRICED_MODELS).default("gpt-4o-mini"),
  LLM_TIMEOUT_MS: z.string().default("30000").transform(Number).pipe(z.number().int().positive()),

  // Rate limiting (per client identity)
  RATE_LIMIT_REQUESTS: z
    .string()
    .default("10")
    .transform(Number)
    .pipe(z.number().int().positive("RATE_LIMIT_REQUESTS must be a positive integer")),
  RATE_LIMIT_WINDOW_SECONDS: z
    .string()
    .default("60")
    .transform(Number)
    .pipe(z.number().positive("RATE_LIMIT_WINDOW_SECONDS must be positive")),

  // Brand name blocklist, comma-separated
  PROFANITY_TERMS: z.string().default(""),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate an environment-like record without touching the process.
 */
export function parseEnv(source: Record<string, string | undefined>) {
  return envSchema.safeParse(source);
}

function validateEnv(): Env {
  const result = parseEnv(process.env);

  if (!result.success) {
    console.error("❌ Invalid environment configuration:");
    for (const issue of result.error.issues) {
      console.error(`   ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

/**
 * Parse the blocklist from environment variable.
 */
export function parseTermList(termsStr: string): string[] {
  if (!termsStr) return [];
  return termsStr
    .split(",")
    .map((t) => t.trim().toLowerCase())
    .filter(Boolean);
}

/**
 * Derived config for convenience.
 */
export function buildConfig(env: Env) {
  return {
    port: env.PORT,
    isDev: env.NODE_ENV === "development",
    isProd: env.NODE_ENV === "production",

    openai: {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL,
      timeoutMs: env.LLM_TIMEOUT_MS,
    },

    rateLimit: {
      maxRequests: env.RATE_LIMIT_REQUESTS,
      windowMs: env.RATE_LIMIT_WINDOW_SECONDS * 1000,
    },

    validation: {
      profanityTerms: parseTermList(env.PROFANITY_TERMS),
    },
  } as const;
}

export type AppConfig = ReturnType<typeof buildConfig>;

// Validate on module load
export const env = validateEnv();

export const config: AppConfig = buildConfig(env);
