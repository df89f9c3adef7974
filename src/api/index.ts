// ============================================
// API Module — Public REST API for campaign briefs
// ============================================

export {
  addRequestId,
  getClientIdentity,
  rateLimit,
  jsonBody,
  rejectEmptyBody,
  handleBodyParseError,
  handleUnexpectedError,
  methodNotAllowed,
  BODY_LIMIT,
  type BriefApiRequest,
  type ApiErrorBody,
} from "./middleware.js";

export {
  createGenerateBriefHandler,
  handleHealthCheck,
  type GenerateBriefResponse,
  type GenerateBriefDeps,
  type HealthResponse,
} from "./handler.js";
