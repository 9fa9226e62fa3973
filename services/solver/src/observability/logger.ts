import pino, {
  type DestinationStream,
  type LoggerOptions,
  stdTimeFunctions,
  type Logger as PinoLogger,
} from "pino";

import { resolveEnv } from "../utils/env.js";
import { getRequestContext } from "./requestContext.js";

export type AppLogger = PinoLogger;

export type NormalizedError = {
  message: string;
  name?: string;
  stack?: string;
  code?: string | number;
  cause?: unknown;
  details?: Record<string, unknown>;
};

export type CreateLoggerOptions = {
  level?: string;
  serviceName?: string;
  bindings?: Record<string, unknown>;
  options?: LoggerOptions;
  destination?: DestinationStream;
};

/** Paths scrubbed from every log line. */
export const REDACTED_PATHS = ["apiKey", "*.apiKey", "llm.apiKey", "headers.authorization"];

// Correlates log lines emitted while serving a request with that request.
function contextMixin(): Record<string, string> {
  const context = getRequestContext();
  if (!context) {
    return {};
  }
  const fields: Record<string, string> = {
    requestId: context.requestId,
    traceId: context.traceId,
  };
  if (context.sessionId) {
    fields.sessionId = context.sessionId;
  }
  return fields;
}

export function createLogger(options: CreateLoggerOptions = {}): AppLogger {
  const loggerOptions: LoggerOptions = {
    level: options.level ?? resolveEnv("LOG_LEVEL", "info"),
    base: { service: options.serviceName ?? resolveEnv("SERVICE_NAME", "solver") },
    timestamp: stdTimeFunctions.isoTime,
    redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
    mixin: contextMixin,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    ...options.options,
  };
  const logger = options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
  const bindings = options.bindings ?? {};
  return Object.keys(bindings).length > 0 ? logger.child(bindings) : logger;
}

export const appLogger: AppLogger = createLogger();
export default appLogger;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

const STRUCTURAL_KEYS = new Set(["message", "name", "stack", "code", "cause"]);

function safeStringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}

/**
 * Flattens anything thrown into a JSON-friendly shape. Own enumerable fields
 * (an execution id, a file name, an HTTP status) land in `details`, and
 * `cause` chains are followed.
 */
export function normalizeError(error: unknown): NormalizedError {
  if (typeof error === "string") {
    return { message: error };
  }
  if (!isRecord(error)) {
    return { message: safeStringify(error) ?? String(error) };
  }

  const rawMessage = error.message;
  const normalized: NormalizedError = {
    message:
      typeof rawMessage === "string" && rawMessage.trim().length > 0
        ? rawMessage
        : safeStringify(error) ?? "Unknown error",
  };
  if (typeof error.name === "string") {
    normalized.name = error.name;
  }
  if (typeof error.stack === "string") {
    normalized.stack = error.stack;
  }
  if (typeof error.code === "string" || typeof error.code === "number") {
    normalized.code = error.code;
  }
  if ("cause" in error && error.cause !== undefined) {
    normalized.cause = isRecord(error.cause) ? normalizeError(error.cause) : error.cause;
  }

  const details: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(error)) {
    if (!STRUCTURAL_KEYS.has(key)) {
      details[key] = value;
    }
  }
  if (Object.keys(details).length > 0) {
    normalized.details = details;
  }
  return normalized;
}
