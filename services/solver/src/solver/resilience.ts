import { setTimeout as delay } from "node:timers/promises";

import { GenerationError } from "./errors.js";

export async function callWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: { attempts?: number; delayMs?: number } = {},
): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 2);
  const baseDelay = options.delayMs ?? 200;
  let lastError: GenerationError | undefined;
  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const generationError =
        error instanceof GenerationError
          ? error
          : new GenerationError("code generation request failed", { cause: error });
      lastError = generationError;
      if (!generationError.retryable || attempt === attempts - 1) {
        throw generationError;
      }
      await delay(baseDelay * (attempt + 1));
    }
  }
  throw lastError ?? new GenerationError("code generation request failed");
}

/**
 * Runs `operation` with an abort signal that fires after `timeoutMs`. A late
 * rejection from the abandoned operation is absorbed.
 */
export async function withGenerationTimeout<T>(
  operation: (context: { signal: AbortSignal }) => Promise<T>,
  options: { timeoutMs: number; action: string },
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(
        new GenerationError(`${options.action} timed out after ${options.timeoutMs}ms`, {
          status: 504,
          code: "timeout",
          retryable: true,
        }),
      );
    }, options.timeoutMs);
  });
  const running = operation({ signal: controller.signal });
  void running.catch(() => undefined);
  try {
    return await Promise.race([running, timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

type ErrorShape = { status?: unknown; code?: unknown; message?: unknown };

function readShape(error: unknown): ErrorShape {
  if (typeof error !== "object" || error === null) {
    return {};
  }
  return {
    status: "status" in error ? error.status : undefined,
    code: "code" in error ? error.code : undefined,
    message: "message" in error ? error.message : undefined,
  };
}

/** Maps a client failure to a GenerationError; 408, 429 and 5xx are retryable. */
export function toGenerationError(error: unknown, defaultMessage: string): GenerationError {
  if (error instanceof GenerationError) {
    return error;
  }
  const shape = readShape(error);
  const status = typeof shape.status === "number" ? shape.status : undefined;
  const retryable = status === 429 || status === 408 || (typeof status === "number" && status >= 500);
  return new GenerationError(typeof shape.message === "string" ? shape.message : defaultMessage, {
    status: status ?? 502,
    code: typeof shape.code === "string" ? shape.code : undefined,
    retryable,
    cause: error,
  });
}
