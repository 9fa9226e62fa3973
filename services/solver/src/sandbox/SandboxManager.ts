import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";

import { type SandboxConfig, TimeoutSecondsSchema } from "../config/schema.js";
import type { AppLogger } from "../observability/logger.js";
import { normalizeError } from "../observability/logger.js";
import {
  type ExecutionOutcomeLabel,
  recordExecution,
  recordTeardownFailure,
  trackContextProvisioned,
  trackContextReleased,
} from "../observability/metrics.js";
import { composeCommand, hasRunnableFiles, toContainerCommand } from "./CommandComposer.js";
import { ExecutionError, ProvisioningError, ReclamationError, StagingError, TimeoutError } from "./errors.js";
import { allocateStagingDirectory, validateFileNames, writeStagedFiles } from "./FileStaging.js";
import { reclaimAll, type ReclamationReport } from "./reclaim.js";
import { raceTimeout, type Resource, withResource } from "./scope.js";
import type {
  ExecutionRequest,
  ExecutionResult,
  LifecycleState,
  LifecycleTransition,
  SandboxHandle,
  SandboxRuntime,
  SandboxSpec,
  SandboxSummary,
} from "./types.js";

export interface SandboxManagerOptions {
  runtime: SandboxRuntime;
  config: SandboxConfig;
  logger: AppLogger;
  /** Distinguishes this manager's contexts from other processes'. Random by default. */
  instanceId?: string;
}

const SANDBOX_ENV: Record<string, string> = {
  PYTHONUNBUFFERED: "1",
  PYTHONDONTWRITEBYTECODE: "1",
};

type Execution = {
  id: string;
  image: string;
  timeoutSeconds: number;
  command: string;
  state?: LifecycleState;
  contextId?: string;
};

/**
 * Runs untrusted files in a fresh sandbox context per call and always tears
 * it down. Emits `transition` with a {@link LifecycleTransition} on every
 * state change and `completed` with the {@link ExecutionResult}.
 */
export class SandboxManager extends EventEmitter {
  readonly instanceId: string;
  private readonly runtime: SandboxRuntime;
  private readonly config: SandboxConfig;
  private readonly logger: AppLogger;

  constructor(options: SandboxManagerOptions) {
    super();
    this.runtime = options.runtime;
    this.config = options.config;
    this.instanceId = options.instanceId ?? randomUUID();
    this.logger = options.logger.child({ component: "SandboxManager", instanceId: this.instanceId });
  }

  /** Label keys and values stamped on every context this manager creates. */
  markerLabels(executionId?: string): Record<string, string> {
    const prefix = this.config.label;
    const labels: Record<string, string> = {
      [prefix]: "1",
      [`${prefix}.manager`]: this.instanceId,
    };
    if (executionId) {
      labels[`${prefix}.execution`] = executionId;
    }
    return labels;
  }

  async execute(request: ExecutionRequest): Promise<ExecutionResult> {
    const startedAt = Date.now();
    const execution: Execution = {
      id: randomUUID(),
      image: request.image ?? this.config.image,
      timeoutSeconds: request.timeoutSeconds ?? this.config.timeoutSeconds,
      command: "",
    };
    const log = this.logger.child({ executionId: execution.id });

    try {
      validateTimeout(request.timeoutSeconds);
      validateFileNames(request.files);
    } catch (error) {
      this.finish("staging_failed", startedAt);
      throw error;
    }

    if (!hasRunnableFiles(request.files)) {
      log.debug({ files: request.files.length }, "no runnable files; skipping sandbox");
      const result: ExecutionResult = {
        combinedOutput: "",
        status: "skipped",
        timedOut: false,
        durationMs: Date.now() - startedAt,
        executionId: execution.id,
      };
      this.finish("skipped", startedAt);
      this.emit("completed", result);
      return result;
    }

    execution.command = composeCommand(request.files, {
      setupCommand: this.config.setupCommand,
      interpreter: this.config.interpreter,
      shell: this.config.shell,
    });
    log.info({ image: execution.image, timeoutSeconds: execution.timeoutSeconds }, "sandbox execution started");
    try {
      const result = await withResource(
        () => allocateStagingDirectory(this.config.stagingRoot),
        async (staging) => {
          this.transition(execution, "created");
          await writeStagedFiles(staging.path, request.files);
          this.transition(execution, "staged");
          return withResource(
            () => this.provision(execution, staging.path),
            (handle) => this.run(execution, handle, startedAt, log),
            (error) => {
              recordTeardownFailure("context");
              const failure = new ReclamationError(execution.contextId ?? "unknown", { cause: error });
              log.warn({ contextId: execution.contextId, err: normalizeError(failure) }, "failed to remove sandbox context");
            },
          );
        },
        (error) => {
          recordTeardownFailure("staging");
          log.warn({ err: normalizeError(error) }, "failed to remove staging directory");
        },
      );
      this.transition(execution, "destroyed");
      this.finish(result.status, startedAt);
      log.info({ status: result.status, exitCode: result.exitCode, durationMs: result.durationMs }, "sandbox execution finished");
      this.emit("completed", result);
      return result;
    } catch (error) {
      if (execution.state !== undefined) {
        this.transition(execution, "destroyed");
      }
      this.finish(outcomeForError(error), startedAt);
      log.error({ err: normalizeError(error) }, "sandbox execution failed");
      throw error;
    }
  }

  /** Removes every context created from `image`, whichever process made it. */
  reclaimAll(image: string = this.config.image): Promise<ReclamationReport> {
    return reclaimAll(this.runtime, image, this.logger);
  }

  /** Contexts from `image` that carry this manager's marker label. */
  async listOwnContexts(image: string = this.config.image): Promise<SandboxSummary[]> {
    const key = `${this.config.label}.manager`;
    const contexts = await this.runtime.listByImage(image);
    return contexts.filter((context) => context.labels[key] === this.instanceId);
  }

  private buildSpec(execution: Execution, bindSource: string): SandboxSpec {
    return {
      image: execution.image,
      command: toContainerCommand(execution.command),
      workdir: this.config.workdir,
      bindSource,
      labels: this.markerLabels(execution.id),
      env: SANDBOX_ENV,
      network: this.config.network,
      user: this.config.user,
      limits: this.config.limits,
    };
  }

  private async provision(execution: Execution, bindSource: string): Promise<Resource<SandboxHandle>> {
    let handle: SandboxHandle;
    try {
      handle = await this.runtime.create(this.buildSpec(execution, bindSource));
    } catch (error) {
      throw new ProvisioningError(`failed to create sandbox from ${execution.image}`, {
        image: execution.image,
        cause: error,
      });
    }
    execution.contextId = handle.id;
    trackContextProvisioned();
    return {
      value: handle,
      release: async () => {
        await this.runtime.remove(handle.id);
        trackContextReleased();
      },
    };
  }

  private async run(
    execution: Execution,
    handle: SandboxHandle,
    startedAt: number,
    log: AppLogger,
  ): Promise<ExecutionResult> {
    try {
      await this.runtime.start(handle.id);
    } catch (error) {
      throw new ProvisioningError(`failed to start sandbox ${handle.id}`, { image: execution.image, cause: error });
    }
    this.transition(execution, "running");

    const waiting = this.runtime.wait(handle.id);
    const outcome = await raceTimeout(waiting, execution.timeoutSeconds * 1000);

    if (outcome.kind === "timeout") {
      void waiting.catch((error: unknown) => {
        log.debug({ err: normalizeError(error) }, "wait ended after timeout");
      });
      const timeout = new TimeoutError(execution.timeoutSeconds);
      let partial = "";
      try {
        partial = await this.runtime.collectOutput(handle.id);
      } catch (error) {
        log.warn({ contextId: handle.id, err: normalizeError(error) }, "failed to collect output after timeout");
      }
      this.transition(execution, "collected");
      log.warn({ contextId: handle.id, timeoutSeconds: execution.timeoutSeconds }, "sandbox execution timed out");
      return {
        combinedOutput: partial,
        failureReason: timeout.message,
        status: "timed_out",
        timedOut: true,
        durationMs: Date.now() - startedAt,
        executionId: execution.id,
        contextId: handle.id,
      };
    }

    const { exitCode } = outcome.value;
    const combinedOutput = await this.runtime.collectOutput(handle.id);
    this.transition(execution, "collected");
    const failure = exitCode === 0 ? undefined : new ExecutionError(exitCode);
    return {
      combinedOutput,
      failureReason: failure?.message,
      status: failure ? "failed" : "succeeded",
      exitCode,
      timedOut: false,
      durationMs: Date.now() - startedAt,
      executionId: execution.id,
      contextId: handle.id,
    };
  }

  private transition(execution: Execution, to: LifecycleState): void {
    const event: LifecycleTransition = {
      executionId: execution.id,
      from: execution.state,
      to,
      contextId: execution.contextId,
    };
    execution.state = to;
    this.logger.debug(event, "sandbox transition");
    this.emit("transition", event);
  }

  private finish(outcome: ExecutionOutcomeLabel, startedAt: number): void {
    recordExecution(outcome, Date.now() - startedAt);
  }
}

function validateTimeout(timeoutSeconds: number | undefined): void {
  if (timeoutSeconds === undefined) {
    return;
  }
  if (!TimeoutSecondsSchema.safeParse(timeoutSeconds).success) {
    throw new StagingError(
      `timeoutSeconds must be a positive number of at most 600, received ${timeoutSeconds}`,
    );
  }
}

function outcomeForError(error: unknown): ExecutionOutcomeLabel {
  if (error instanceof StagingError) {
    return "staging_failed";
  }
  if (error instanceof ProvisioningError) {
    return "provisioning_failed";
  }
  return "error";
}
