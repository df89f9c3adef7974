// ============================================
// API Handler — /api/generate-brief/ endpoint
// ============================================

import type { Response } from "express";
import { createRequestLogger } from "../lib/logger.js";
import {
  getUserMessage,
  httpStatusFor,
  malformedBodyError,
  validationError,
  wrapError,
  type CampaignBriefError,
} from "../lib/errors.js";
import { parseBriefRequestBody, validateBriefInput } from "../validation/briefInput.js";
import type { BriefGenerator } from "../brief/generate.js";
import type { BriefResult } from "../brief/types.js";
import type { SlidingWindowRateLimiter } from "../rateLimit/slidingWindow.js";
import { getClientIdentity, type ApiErrorBody, type BriefApiRequest } from "./middleware.js";

// ============================================
// Types
// ============================================

export interface GenerateBriefResponse extends BriefResult {
  rate_limit: {
    remaining: number;
  };
}

export interface GenerateBriefDeps {
  generator: Pick<BriefGenerator, "generate">;
  limiter: SlidingWindowRateLimiter;
  profanityTerms: readonly string[];
}

// ============================================
// Handler
// ============================================

/**
 * Build the POST /api/generate-brief/ handler.
 *
 * Runs after the rate-limit gate and JSON body parser. Every outcome,
 * including unexpected failures, ends in a JSON response here.
 */
export function createGenerateBriefHandler(deps: GenerateBriefDeps) {
  return async (req: BriefApiRequest, res: Response): Promise<void> => {
    const requestId = req.requestId ?? "unknown";
    const clientId = req.clientId ?? getClientIdentity(req);
    const log = createRequestLogger(requestId, "api");
    const startTime = Date.now();

    const body = parseBriefRequestBody(req.body);
    if (!body.ok) {
      log.warn("Malformed request body", { reason: body.error });
      sendError(res, malformedBodyError(body.error, requestId));
      return;
    }

    const validation = validateBriefInput(body.fields, { profanityTerms: deps.profanityTerms });
    if (!validation.valid) {
      log.withStage("validation").info("Brief input rejected", { reason: validation.error });
      sendError(res, validationError(validation.error, requestId));
      return;
    }

    log.info("Brief request received", {
      platform: validation.value.platform,
      goal: validation.value.goal,
      tone: validation.value.tone,
      brandNameLength: validation.value.brand_name.length,
    });

    try {
      const result = await deps.generator.generate(validation.value, { requestId });

      const response: GenerateBriefResponse = {
        ...result,
        rate_limit: {
          remaining: deps.limiter.getRemaining(clientId),
        },
      };

      log.info("Brief request completed", {
        latencyMs: Date.now() - startTime,
        tokensTotal: result.telemetry.tokens_total,
      });

      res.status(200).json(response);
    } catch (err) {
      const appError = wrapError(err, requestId);

      log.error("Brief request failed", {
        error: err,
        errorCode: appError.code,
        status: httpStatusFor(appError.code),
      });

      sendError(res, appError);
    }
  };
}

function sendError(res: Response, error: CampaignBriefError): void {
  res.status(httpStatusFor(error.code)).json({ error: getUserMessage(error) } satisfies ApiErrorBody);
}

// ============================================
// Health Check Response
// ============================================

export interface HealthResponse {
  status: "ok";
  timestamp: string;
}

/**
 * Liveness endpoint.
 */
export function handleHealthCheck(_req: BriefApiRequest, res: Response): void {
  const response: HealthResponse = {
    status: "ok",
    timestamp: new Date().toISOString(),
  };

  res.status(200).json(response);
}
