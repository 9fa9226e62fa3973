/**
 * Shapes shared by the sandbox staging, composition and lifecycle code.
 */

/** How a staged file takes part in the run: data only, fed to the interpreter, or run by the shell. */
export type ExecutionMode = "none" | "interpreted" | "shell";

export interface StagedFile {
  /** Relative path inside the staging directory. */
  name: string;
  /** UTF-8 source text. */
  content: string;
  executionMode: ExecutionMode;
}

export interface ExecutionRequest {
  /** Files in execution order. */
  files: readonly StagedFile[];
  /** Overrides the manager's configured timeout. Fractions of a second are allowed. */
  timeoutSeconds?: number;
  /** Overrides the manager's configured base image. */
  image?: string;
}

export type ExecutionStatus = "skipped" | "succeeded" | "failed" | "timed_out";

export interface ExecutionResult {
  readonly combinedOutput: string;
  readonly failureReason?: string;
  readonly status: ExecutionStatus;
  readonly exitCode?: number;
  readonly timedOut: boolean;
  readonly durationMs: number;
  readonly executionId: string;
  readonly contextId?: string;
}

export type LifecycleState = "created" | "staged" | "running" | "collected" | "destroyed";

export interface LifecycleTransition {
  executionId: string;
  from?: LifecycleState;
  to: LifecycleState;
  contextId?: string;
}

/**
 * Everything the runtime needs to create one isolated context.
 */
export interface SandboxSpec {
  image: string;
  command: string[];
  workdir: string;
  /** Host directory bound read-write at `workdir`. */
  bindSource: string;
  labels: Record<string, string>;
  env: Record<string, string>;
  network: "none" | "bridge";
  user?: string;
  limits: {
    memoryBytes: number;
    cpuQuota: number;
    pidsLimit: number;
  };
}

export interface SandboxHandle {
  id: string;
}

export interface SandboxExit {
  exitCode: number;
}

export interface SandboxSummary {
  id: string;
  image: string;
  state: string;
  labels: Record<string, string>;
}

/**
 * Narrow view of the container runtime. The lifecycle manager is written
 * against this interface only.
 */
export interface SandboxRuntime {
  create(spec: SandboxSpec): Promise<SandboxHandle>;
  start(id: string): Promise<void>;
  /** Resolves when the context's main process exits. */
  wait(id: string): Promise<SandboxExit>;
  /** Returns stdout and stderr interleaved in the order they were written. */
  collectOutput(id: string): Promise<string>;
  /** Forced removal; a context that is already gone is not an error. */
  remove(id: string): Promise<void>;
  /** Every context, running or stopped, created from `image`. */
  listByImage(image: string): Promise<SandboxSummary[]>;
}
