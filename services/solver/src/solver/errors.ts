export class GenerationError extends Error {
  readonly status: number;
  readonly code?: string;
  readonly retryable: boolean;
  readonly cause?: unknown;

  constructor(
    message: string,
    options: { status?: number; code?: string; retryable?: boolean; cause?: unknown } = {},
  ) {
    super(message);
    this.name = "GenerationError";
    this.status = options.status ?? 502;
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    this.cause = options.cause;
  }
}
