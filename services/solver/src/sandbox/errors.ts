export type SandboxErrorCode =
  | "staging_failed"
  | "provisioning_failed"
  | "execution_timeout"
  | "execution_failed"
  | "reclamation_failed";

export class SandboxError extends Error {
  readonly code: SandboxErrorCode;
  readonly cause?: unknown;

  constructor(code: SandboxErrorCode, message: string, options: { cause?: unknown } = {}) {
    super(message);
    this.name = "SandboxError";
    this.code = code;
    this.cause = options.cause;
  }
}

/** A file name escapes the staging root, repeats, or could not be written. */
export class StagingError extends SandboxError {
  readonly fileName?: string;

  constructor(message: string, options: { fileName?: string; cause?: unknown } = {}) {
    super("staging_failed", message, options);
    this.name = "StagingError";
    this.fileName = options.fileName;
  }
}

/** The runtime could not create or start a context. */
export class ProvisioningError extends SandboxError {
  readonly image: string;

  constructor(message: string, options: { image: string; cause?: unknown }) {
    super("provisioning_failed", message, options);
    this.name = "ProvisioningError";
    this.image = options.image;
  }
}

export class TimeoutError extends SandboxError {
  readonly timeoutSeconds: number;

  constructor(timeoutSeconds: number) {
    super(
      "execution_timeout",
      `execution exceeded the ${timeoutSeconds}s timeout; output may be incomplete`,
    );
    this.name = "TimeoutError";
    this.timeoutSeconds = timeoutSeconds;
  }
}

/** The executed program exited non-zero. Not a system fault. */
export class ExecutionError extends SandboxError {
  readonly exitCode: number;

  constructor(exitCode: number) {
    super("execution_failed", `program exited with code ${exitCode}`);
    this.name = "ExecutionError";
    this.exitCode = exitCode;
  }
}

export class ReclamationError extends SandboxError {
  readonly contextId: string;

  constructor(contextId: string, options: { cause?: unknown } = {}) {
    const reason = options.cause instanceof Error ? options.cause.message : String(options.cause ?? "unknown error");
    super("reclamation_failed", `failed to remove sandbox ${contextId}: ${reason}`, options);
    this.name = "ReclamationError";
    this.contextId = contextId;
  }
}

export function isSandboxError(error: unknown): error is SandboxError {
  return error instanceof SandboxError;
}
