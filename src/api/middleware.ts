// ============================================
// API Middleware — Request IDs, Client Identity, Rate Limiting, Body Parsing
// ============================================

import crypto from "crypto";
import express from "express";
import type { Request, Response, NextFunction, ErrorRequestHandler, RequestHandler } from "express";
import { logger } from "../lib/logger.js";
import { getUserMessage, httpStatusFor, rateLimitError, wrapError } from "../lib/errors.js";
import type { SlidingWindowRateLimiter } from "../rateLimit/slidingWindow.js";

// ============================================
// Types
// ============================================

export interface BriefApiRequest extends Request {
  requestId?: string;
  clientId?: string;
}

export interface ApiErrorBody {
  error: string;
  remaining?: number;
}

/** Maximum accepted JSON body */
export const BODY_LIMIT = "100kb";

const INVALID_JSON_MESSAGE = "Invalid JSON in request body";

// ============================================
// Request ID Middleware
// ============================================

/**
 * Add request ID to all requests for tracing.
 */
export function addRequestId(req: BriefApiRequest, res: Response, next: NextFunction): void {
  const requestId = req.get("x-request-id") || crypto.randomUUID().slice(0, 8);
  req.requestId = requestId;
  res.setHeader("X-Request-Id", requestId);
  next();
}

// ============================================
// Client Identity
// ============================================

/**
 * Identify the caller: first X-Forwarded-For entry, else the socket address.
 */
export function getClientIdentity(req: Request): string {
  const forwardedFor = req.get("x-forwarded-for");
  // An empty first entry (", 10.0.0.1") falls back to the socket address
  const first = forwardedFor?.split(",")[0]?.trim();
  if (first) return first;

  return req.socket.remoteAddress ?? "unknown";
}

// ============================================
// Rate Limiting
// ============================================

/**
 * Rate limiting middleware backed by a sliding-window limiter.
 * Runs before the body is parsed; denied requests are not recorded.
 */
export function rateLimit(limiter: SlidingWindowRateLimiter): RequestHandler {
  return (req: BriefApiRequest, res: Response, next: NextFunction) => {
    const identifier = getClientIdentity(req);
    req.clientId = identifier;

    const allowed = limiter.isAllowed(identifier);
    const remaining = limiter.getRemaining(identifier);
    const resetAt = limiter.getResetAt(identifier);

    res.setHeader("X-RateLimit-Limit", limiter.maxRequests);
    res.setHeader("X-RateLimit-Remaining", remaining);
    res.setHeader("X-RateLimit-Reset", Math.ceil(resetAt / 1000));

    if (!allowed) {
      logger.warn("Rate limit exceeded", {
        stage: "ratelimit",
        requestId: req.requestId,
        identifier,
        limit: limiter.maxRequests,
      });

      res.setHeader("Retry-After", Math.max(1, Math.ceil(limiter.getRetryAfterMs(identifier) / 1000)));
      const body: ApiErrorBody = {
        error: getUserMessage(rateLimitError(identifier, req.requestId)),
        remaining: 0,
      };
      res.status(429).json(body);
      return;
    }

    next();
  };
}

// ============================================
// Body Parsing
// ============================================

/**
 * JSON body parser. Any content type is read as JSON, matching clients
 * that post without a Content-Type header.
 */
export function jsonBody(): RequestHandler {
  return express.json({ limit: BODY_LIMIT, type: () => true });
}

/**
 * An empty body is not valid JSON. The JSON parser would hand on `{}` for it,
 * so reject it before parsing.
 */
export function rejectEmptyBody(req: BriefApiRequest, res: Response, next: NextFunction): void {
  const contentLength = req.get("content-length");
  const chunked = req.get("transfer-encoding") !== undefined;

  if (!chunked && (contentLength === undefined || Number(contentLength) === 0)) {
    logger.warn("Rejected request body", {
      stage: "api",
      requestId: req.requestId,
      reason: "entity.empty",
    });
    res.status(400).json({ error: INVALID_JSON_MESSAGE } satisfies ApiErrorBody);
    return;
  }

  next();
}

interface BodyParserError {
  type: string;
  status?: number;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return typeof err === "object" && err !== null && "type" in err && typeof err.type === "string";
}

/**
 * Turn body-parser failures into JSON errors; pass anything else on.
 */
export const handleBodyParseError: ErrorRequestHandler = (err: unknown, req: BriefApiRequest, res, next) => {
  if (!isBodyParserError(err)) {
    next(err);
    return;
  }

  logger.warn("Rejected request body", {
    stage: "api",
    requestId: req.requestId,
    reason: err.type,
  });

  if (err.type === "entity.too.large") {
    res.status(413).json({ error: "Request body too large" } satisfies ApiErrorBody);
    return;
  }

  if (err.type === "entity.parse.failed") {
    res.status(400).json({ error: INVALID_JSON_MESSAGE } satisfies ApiErrorBody);
    return;
  }

  res.status(err.status ?? 400).json({ error: "Could not read request body" } satisfies ApiErrorBody);
};

/**
 * Last-resort handler: anything that escaped a route becomes a JSON 500.
 */
export const handleUnexpectedError: ErrorRequestHandler = (err: unknown, req: BriefApiRequest, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const appError = wrapError(err, req.requestId);
  logger.error("Unhandled request error", {
    stage: "api",
    requestId: req.requestId,
    error: err,
  });

  res.status(httpStatusFor(appError.code)).json({ error: getUserMessage(appError) } satisfies ApiErrorBody);
};

// ============================================
// Method Guard
// ============================================

/**
 * Respond 405 for methods a route does not support.
 */
export function methodNotAllowed(allowed: string[]): RequestHandler {
  return (_req: Request, res: Response) => {
    res.setHeader("Allow", allowed.join(", "));
    res.status(405).json({ error: "Method not allowed" } satisfies ApiErrorBody);
  };
}
