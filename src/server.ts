import "dotenv/config";
import { config } from "./config/env.js";
import { logger } from "./lib/logger.js";
import { createOpenAIClient } from "./llm/client.js";
import { BriefGenerator } from "./brief/generate.js";
import { SlidingWindowRateLimiter } from "./rateLimit/slidingWindow.js";
import { createApp } from "./app.js";

// ============================================
// Wiring
// ============================================

const limiter = new SlidingWindowRateLimiter({
  maxRequests: config.rateLimit.maxRequests,
  windowMs: config.rateLimit.windowMs,
});
limiter.startEviction();

const generator = new BriefGenerator({
  client: createOpenAIClient({
    apiKey: config.openai.apiKey,
    timeoutMs: config.openai.timeoutMs,
  }),
  model: config.openai.model,
});

const app = createApp({
  generator,
  limiter,
  profanityTerms: config.validation.profanityTerms,
});

// ============================================
// Startup
// ============================================

logger.info("Starting campaign brief API", {
  stage: "startup",
  port: config.port,
  model: config.openai.model,
  rateLimitMax: config.rateLimit.maxRequests,
  rateLimitWindowMs: config.rateLimit.windowMs,
  profanityTermCount: config.validation.profanityTerms.length,
});

const server = app.listen(config.port, () => {
  logger.info("Server listening", { stage: "startup", port: config.port });
});

// ============================================
// Shutdown
// ============================================

function shutdown(signal: NodeJS.Signals): void {
  logger.info("Shutting down", { stage: "shutdown", signal });
  limiter.stop();
  server.close((err) => {
    if (err) {
      logger.error("Server close failed", { stage: "shutdown", error: err });
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);
