import { randomUUID } from "node:crypto";

import type { Request, Response } from "express";

import { generateSessionId } from "../history/SessionHistory.js";
import {
  getRequestContext,
  setSessionInContext,
  updateContextIdentifiers,
} from "../observability/requestContext.js";
import { SessionIdSchema } from "./validation.js";

export const SESSION_HEADER = "x-session-id";

export function getRequestIds(res: Response): { requestId: string; traceId: string } {
  const context = getRequestContext();
  const requestId = context?.requestId ?? String(res.locals.requestId ?? randomUUID());
  const traceId = context?.traceId ?? String(res.locals.traceId ?? randomUUID());
  updateContextIdentifiers({ requestId, traceId });
  return { requestId, traceId };
}

/**
 * Session id from the `x-session-id` header when it is well formed,
 * otherwise a freshly issued one. Echoed back on the response.
 */
export function resolveSessionId(req: Request, res: Response): string {
  const parsed = SessionIdSchema.safeParse(req.header(SESSION_HEADER) ?? "");
  const sessionId = parsed.success ? parsed.data : generateSessionId();
  res.setHeader(SESSION_HEADER, sessionId);
  setSessionInContext(sessionId);
  return sessionId;
}
