import { z } from "zod";

import { logger } from "./logger.js";

export interface ServiceConfig {
  baseUrl: string;
  timeoutMs: number;
  sessionId?: string;
}

export type ServiceResponse<T> = {
  body: T;
  sessionId?: string;
  requestId?: string;
};

const DEFAULT_SERVICE_URL = "http://localhost:5001";
const DEFAULT_TIMEOUT_MS = 120_000;
const SESSION_HEADER = "x-session-id";

function parseServiceUrl(rawBaseUrl: string): string {
  const errorMessage = "Invalid service URL. Set MATHSOLVER_URL to a valid HTTP(S) URL.";
  let parsed: URL;
  try {
    parsed = new URL(rawBaseUrl);
  } catch {
    throw new Error(errorMessage);
  }
  if (!parsed.hostname) {
    throw new Error(errorMessage);
  }
  if (parsed.username || parsed.password) {
    throw new Error("Invalid service URL. Credentials in URLs are not supported.");
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error("Invalid service URL. The URL must use http or https.");
  }
  return parsed.toString().replace(/\/$/, "");
}

function resolveTimeout(rawTimeout?: string): number {
  if (!rawTimeout) return DEFAULT_TIMEOUT_MS;
  const parsed = Number.parseInt(rawTimeout, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(
      `Invalid service timeout: ${rawTimeout}. Provide a positive integer number of milliseconds.`,
    );
  }
  return parsed;
}

export function resolveServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const sessionId = env.MATHSOLVER_SESSION_ID?.trim();
  return {
    baseUrl: parseServiceUrl(env.MATHSOLVER_URL ?? DEFAULT_SERVICE_URL),
    timeoutMs: resolveTimeout(env.MATHSOLVER_TIMEOUT_MS),
    sessionId: sessionId ? sessionId : undefined,
  };
}

function assertRelativePath(pathname: string): string {
  const trimmed = pathname.trim();
  if (!trimmed) {
    throw new Error("Service request path is required.");
  }
  if (/^[a-zA-Z][a-zA-Z\d+\-.]*:/.test(trimmed) || trimmed.startsWith("//")) {
    throw new Error("Service request path must be relative.");
  }
  return trimmed;
}

export function joinUrl(baseUrl: string, pathname: string): string {
  const normalizedBase = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
  const relativePath = assertRelativePath(pathname);
  const normalizedPath = relativePath.startsWith("/") ? relativePath.slice(1) : relativePath;
  return new URL(normalizedPath, normalizedBase).toString();
}

const ErrorEnvelopeSchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
});

export async function readErrorMessage(response: Response): Promise<string | undefined> {
  const contentType = response.headers.get("content-type") ?? "";
  const bodyText = await response.text();
  if (!bodyText) {
    return undefined;
  }
  if (contentType.includes("application/json")) {
    let json: unknown;
    try {
      json = JSON.parse(bodyText);
    } catch {
      return bodyText.trim() || undefined;
    }
    if (typeof json === "string") return json;
    const envelope = ErrorEnvelopeSchema.safeParse(json);
    if (envelope.success) {
      const message = envelope.data.error?.trim() || envelope.data.message?.trim();
      if (message) return message;
    }
  }
  return bodyText.trim() || undefined;
}

export class ServiceHttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly requestId?: string,
  ) {
    super(message);
    this.name = "ServiceHttpError";
  }
}

async function handleError(response: Response): Promise<never> {
  const requestId = response.headers.get("x-request-id") ?? undefined;
  const message = await readErrorMessage(response);
  const withRequestId = (text: string): string => (requestId ? `${text} (request id ${requestId})` : text);

  if (response.status >= 300 && response.status < 400) {
    throw new ServiceHttpError(withRequestId("Service responded with a redirect, which is not followed."), response.status, requestId);
  }
  switch (response.status) {
    case 400:
      throw new ServiceHttpError(withRequestId(message ?? "Service rejected the request."), response.status, requestId);
    case 404:
      throw new ServiceHttpError(
        withRequestId(message ?? "Service endpoint not found. Verify MATHSOLVER_URL."),
        response.status,
        requestId,
      );
    case 503:
      throw new ServiceHttpError(
        withRequestId(message ? `Sandbox unavailable: ${message}` : "Sandbox unavailable. Is the container runtime running?"),
        response.status,
        requestId,
      );
    default: {
      const statusText = response.statusText || `HTTP ${response.status}`;
      const detail = message ? `: ${message}` : ".";
      throw new ServiceHttpError(withRequestId(`Service request failed - ${statusText}${detail}`), response.status, requestId);
    }
  }
}

function buildHeaders(config: ServiceConfig): Record<string, string> {
  const headers: Record<string, string> = { "content-type": "application/json" };
  if (config.sessionId) {
    headers[SESSION_HEADER] = config.sessionId;
  }
  return headers;
}

interface RequestOptions<T> {
  pathname: string;
  config: ServiceConfig;
  init: RequestInit;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

async function requestJson<T>({ pathname, config, init, schema }: RequestOptions<T>): Promise<ServiceResponse<T>> {
  const url = joinUrl(config.baseUrl, pathname);
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), config.timeoutMs);

  try {
    const response = await fetch(url, {
      ...init,
      redirect: "manual",
      headers: buildHeaders(config),
      signal: controller.signal,
    });
    if (!response.ok) {
      return await handleError(response);
    }
    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Service returned an unexpected response: ${parsed.error.issues[0]?.message ?? "invalid body"}`);
    }
    return {
      body: parsed.data,
      sessionId: response.headers.get(SESSION_HEADER) ?? undefined,
      requestId: response.headers.get("x-request-id") ?? undefined,
    };
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      throw new Error(
        `Service request timed out after ${config.timeoutMs}ms. Adjust MATHSOLVER_TIMEOUT_MS if needed.`,
      );
    }
    if (error instanceof ServiceHttpError) {
      throw error;
    }
    if (error instanceof Error) {
      if (error.message.startsWith("Service returned")) {
        throw error;
      }
      throw new Error(`Service request failed: ${error.message}`);
    }
    logger.error({ err: error }, "Service request failed with unknown error");
    throw new Error("Service request failed due to an unknown error");
  } finally {
    clearTimeout(timeout);
  }
}

export async function postJson<T>(
  pathname: string,
  body: unknown,
  config: ServiceConfig,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<ServiceResponse<T>> {
  return requestJson({ pathname, config, schema, init: { method: "POST", body: JSON.stringify(body) } });
}

export async function getJson<T>(pathname: string, config: ServiceConfig, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<ServiceResponse<T>> {
  return requestJson({ pathname, config, schema, init: { method: "GET" } });
}
