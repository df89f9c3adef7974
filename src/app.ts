import express from "express";
import {
  addRequestId,
  createGenerateBriefHandler,
  handleBodyParseError,
  handleUnexpectedError,
  handleHealthCheck,
  jsonBody,
  rejectEmptyBody,
  methodNotAllowed,
  rateLimit,
  type GenerateBriefDeps,
} from "./api/index.js";
import { createLandingRouter } from "./web/landing.js";

// ============================================
// Express application
// ============================================

export const GENERATE_BRIEF_PATH = "/api/generate-brief";

export type AppDeps = GenerateBriefDeps;

/**
 * Build the Express app. All shared state (limiter, generator) is passed
 * in, so tests and the server wire their own instances.
 */
export function createApp(deps: AppDeps): express.Application {
  const app = express();

  app.disable("x-powered-by");

  app.use(createLandingRouter());

  app.get("/healthz", handleHealthCheck);

  // Apply request ID to all API routes
  app.use("/api", addRequestId);

  // Non-strict routing: matches with and without the trailing slash.
  // The rate-limit gate runs before the body is read.
  app.post(
    GENERATE_BRIEF_PATH,
    rateLimit(deps.limiter),
    rejectEmptyBody,
    jsonBody(),
    createGenerateBriefHandler(deps)
  );
  app.all(GENERATE_BRIEF_PATH, methodNotAllowed(["POST"]));

  app.use("/api", handleBodyParseError);
  app.use(handleUnexpectedError);

  return app;
}
