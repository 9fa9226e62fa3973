import type { Response } from "express";

import { appLogger, normalizeError } from "../observability/logger.js";
import { getRequestContext } from "../observability/requestContext.js";
import { isSandboxError, type SandboxError } from "../sandbox/errors.js";

export type ErrorDetails = Array<{ path: string; message: string }>;

type ErrorBody = {
  code: string;
  message: string;
  details?: unknown;
};

export type ErrorEnvelope = {
  success: false;
  error: string;
  code: string;
  details?: unknown;
  requestId?: string;
  traceId?: string;
};

function enrich(body: ErrorBody): ErrorEnvelope {
  const envelope: ErrorEnvelope = { success: false, error: body.message, code: body.code };
  if (body.details !== undefined) {
    envelope.details = body.details;
  }
  const context = getRequestContext();
  if (context) {
    envelope.requestId = context.requestId;
    envelope.traceId = context.traceId;
  }
  return envelope;
}

export function respondWithError(res: Response, status: number, body: ErrorBody): void {
  res.status(status).json(enrich(body));
}

/** The first issue's message becomes the envelope's `error`. */
export function respondWithValidationError(res: Response, details: ErrorDetails): void {
  respondWithError(res, 400, {
    code: "invalid_request",
    message: details[0]?.message ?? "Request validation failed",
    details,
  });
}

type ExpressBodyError = Error & {
  status?: number;
  statusCode?: number;
  type?: string;
  limit?: number;
};

function isBodyParserError(error: unknown): error is ExpressBodyError {
  return error instanceof Error && ("type" in error || "status" in error || "statusCode" in error);
}

function isPayloadTooLargeError(error: unknown): error is ExpressBodyError {
  if (!isBodyParserError(error)) {
    return false;
  }
  const status = error.status ?? error.statusCode;
  return status === 413 || error.type === "entity.too.large";
}

function isMalformedJsonError(error: unknown): error is ExpressBodyError {
  return isBodyParserError(error) && error.type === "entity.parse.failed";
}

// execute() returns timeouts and non-zero exits in its result; those rows only keep the table total.
const SANDBOX_STATUS: Record<SandboxError["code"], number> = {
  staging_failed: 400,
  provisioning_failed: 503,
  execution_timeout: 504,
  execution_failed: 500,
  reclamation_failed: 500,
};

export function respondWithSandboxError(res: Response, error: SandboxError): void {
  respondWithError(res, SANDBOX_STATUS[error.code], { code: error.code, message: error.message });
}

export function respondWithUnexpectedError(res: Response, error: unknown): void {
  if (isPayloadTooLargeError(error)) {
    respondWithError(res, 413, {
      code: "payload_too_large",
      message: "Request body exceeds the configured limit",
      details: Number.isFinite(error.limit) ? { limit: error.limit } : undefined,
    });
    return;
  }
  if (isMalformedJsonError(error)) {
    respondWithError(res, 400, { code: "invalid_json", message: "Request body is not valid JSON" });
    return;
  }
  if (isSandboxError(error)) {
    respondWithSandboxError(res, error);
    return;
  }

  const context = getRequestContext();
  appLogger.error(
    {
      err: normalizeError(error),
      requestId: context?.requestId ?? res.locals.requestId,
      traceId: context?.traceId ?? res.locals.traceId,
    },
    "Unexpected request error",
  );
  respondWithError(res, 500, {
    code: "internal_error",
    message: error instanceof Error ? error.message : "unexpected error",
  });
}
