// ============================================
// Logger — one JSON object per line
// Fields: timestamp, level, message, then stage/requestId and context
// ============================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Stage =
  | "startup"
  | "shutdown"
  | "api"
  | "ratelimit"
  | "validation"
  | "llm";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

interface LogContext {
  requestId?: string;
  stage?: Stage;
  [key: string]: unknown;
}

type ErrorContext = LogContext & { error?: unknown };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_RANK;
}

/**
 * LOG_LEVEL wins; otherwise debug output is dropped in production.
 */
function minimumLevel(): LogLevel {
  const configured = process.env["LOG_LEVEL"];
  if (isLogLevel(configured)) return configured;
  return process.env["NODE_ENV"] === "production" ? "info" : "debug";
}

/**
 * Flatten an error into log fields. Coded errors keep their code.
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (error === undefined || error === null) return {};
  if (!(error instanceof Error)) return { errorMessage: String(error) };

  const fields: Record<string, unknown> = {
    errorName: error.name,
    errorMessage: error.message,
    errorStack: error.stack,
  };
  if ("code" in error && typeof error.code === "string") {
    fields["errorCode"] = error.code;
  }
  return fields;
}

function write(level: LogLevel, message: string, context: ErrorContext = {}): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[minimumLevel()]) return;

  const { error, ...rest } = context;
  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...rest,
    ...describeError(error),
  });

  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

export const logger = {
  debug: (message: string, context?: LogContext): void => write("debug", message, context),
  info: (message: string, context?: LogContext): void => write("info", message, context),
  warn: (message: string, context?: LogContext): void => write("warn", message, context),
  error: (message: string, context?: ErrorContext): void => write("error", message, context),
};

export interface RequestLogger {
  debug(message: string, context?: Omit<LogContext, "requestId">): void;
  info(message: string, context?: Omit<LogContext, "requestId">): void;
  warn(message: string, context?: Omit<LogContext, "requestId">): void;
  error(message: string, context?: Omit<ErrorContext, "requestId">): void;
  /** Same request, different stage */
  withStage(newStage: Stage): RequestLogger;
}

/** Logger with requestId and stage filled in on every line */
export function createRequestLogger(requestId: string, stage?: Stage): RequestLogger {
  const bound = (context?: Omit<ErrorContext, "requestId">): ErrorContext => ({
    ...context,
    requestId,
    stage,
  });

  return {
    debug: (message, context) => logger.debug(message, bound(context)),
    info: (message, context) => logger.info(message, bound(context)),
    warn: (message, context) => logger.warn(message, bound(context)),
    error: (message, context) => logger.error(message, bound(context)),
    withStage: (newStage) => createRequestLogger(requestId, newStage),
  };
}
