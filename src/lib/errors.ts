// ============================================
// Standard error types for consistent handling
// ============================================

export type ErrorCode =
  | "RATE_LIMIT_EXCEEDED"
  | "MALFORMED_REQUEST_BODY"
  | "VALIDATION_FAILED"
  // Provider answered, but not with what we asked for
  | "MALFORMED_RESPONSE"
  | "INVALID_RESPONSE_SHAPE"
  // Provider unreachable, timed out or returned non-2xx
  | "SERVICE_ERROR"
  | "UNKNOWN_ERROR";

export interface AppError {
  code: ErrorCode;
  message: string;
  requestId?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class CampaignBriefError extends Error implements AppError {
  code: ErrorCode;
  requestId?: string;
  override cause?: unknown;
  context?: Record<string, unknown>;

  constructor(options: AppError) {
    super(options.message);
    this.name = "CampaignBriefError";
    this.code = options.code;
    this.requestId = options.requestId;
    this.cause = options.cause;
    this.context = options.context;
  }
}

/** Create a rate-limit error */
export function rateLimitError(identifier: string, requestId?: string): CampaignBriefError {
  return new CampaignBriefError({
    code: "RATE_LIMIT_EXCEEDED",
    message: "Rate limit exceeded",
    requestId,
    context: { identifier },
  });
}

/** Create a request body error */
export function malformedBodyError(message: string, requestId?: string): CampaignBriefError {
  return new CampaignBriefError({
    code: "MALFORMED_REQUEST_BODY",
    message,
    requestId,
  });
}

/** Create a request validation error */
export function validationError(message: string, requestId?: string): CampaignBriefError {
  return new CampaignBriefError({
    code: "VALIDATION_FAILED",
    message,
    requestId,
  });
}

/** Provider replied with something that is not JSON */
export function malformedResponseError(
  message: string,
  requestId?: string,
  cause?: unknown
): CampaignBriefError {
  return new CampaignBriefError({
    code: "MALFORMED_RESPONSE",
    message,
    requestId,
    cause,
  });
}

/** Provider replied with JSON that breaks the brief contract */
export function invalidShapeError(
  message: string,
  requestId?: string,
  context?: Record<string, unknown>
): CampaignBriefError {
  return new CampaignBriefError({
    code: "INVALID_RESPONSE_SHAPE",
    message,
    requestId,
    context,
  });
}

/** Create a provider (service) error */
export function serviceError(message: string, requestId?: string, cause?: unknown): CampaignBriefError {
  return new CampaignBriefError({
    code: "SERVICE_ERROR",
    message,
    requestId,
    cause,
  });
}

/** Wrap unknown errors */
export function wrapError(err: unknown, requestId?: string): CampaignBriefError {
  if (err instanceof CampaignBriefError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  return new CampaignBriefError({
    code: "UNKNOWN_ERROR",
    message,
    requestId,
    cause: err,
  });
}

/** HTTP status for each error code */
export function httpStatusFor(code: ErrorCode): number {
  switch (code) {
    case "RATE_LIMIT_EXCEEDED":
      return 429;
    case "MALFORMED_REQUEST_BODY":
    case "VALIDATION_FAILED":
      return 400;
    case "MALFORMED_RESPONSE":
    case "INVALID_RESPONSE_SHAPE":
      return 502;
    case "SERVICE_ERROR":
    case "UNKNOWN_ERROR":
      return 500;
  }
}

/** Client-facing message for an error */
export function getUserMessage(error: AppError): string {
  switch (error.code) {
    case "RATE_LIMIT_EXCEEDED":
      return "Rate limit exceeded. Please try again later.";
    case "MALFORMED_REQUEST_BODY":
    case "VALIDATION_FAILED":
      return error.message;
    case "MALFORMED_RESPONSE":
    case "INVALID_RESPONSE_SHAPE":
      return `Invalid provider response: ${error.message}`;
    case "SERVICE_ERROR":
      return `Service error: ${error.message}`;
    default:
      return `Unexpected error: ${error.message}`;
  }
}
