import { Counter, Gauge, Histogram, register } from "prom-client";

export const SANDBOX_EXECUTIONS_NAME = "solver_sandbox_executions_total";
export const SANDBOX_EXECUTION_SECONDS_NAME = "solver_sandbox_execution_seconds";
export const SANDBOX_LIVE_NAME = "solver_sandbox_live_contexts";
export const SANDBOX_TEARDOWN_FAILURES_NAME = "solver_sandbox_teardown_failures_total";
export const SANDBOX_RECLAIMED_NAME = "solver_sandbox_reclaimed_total";

export type ExecutionOutcomeLabel =
  | "skipped"
  | "succeeded"
  | "failed"
  | "timed_out"
  | "staging_failed"
  | "provisioning_failed"
  | "error";

const executionsTotal = new Counter({
  name: SANDBOX_EXECUTIONS_NAME,
  help: "Sandbox executions by outcome",
  labelNames: ["outcome"] as const,
});

const executionSeconds = new Histogram({
  name: SANDBOX_EXECUTION_SECONDS_NAME,
  help: "Wall time of sandbox executions from staging to teardown",
  labelNames: ["outcome"] as const,
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120],
});

const liveContexts = new Gauge({
  name: SANDBOX_LIVE_NAME,
  help: "Sandbox contexts currently provisioned by this process",
});

const teardownFailures = new Counter({
  name: SANDBOX_TEARDOWN_FAILURES_NAME,
  help: "Failures while removing sandbox contexts or staging directories",
  labelNames: ["resource"] as const,
});

const reclaimedTotal = new Counter({
  name: SANDBOX_RECLAIMED_NAME,
  help: "Sandbox contexts removed by reclamation sweeps",
  labelNames: ["result"] as const,
});

export function recordExecution(outcome: ExecutionOutcomeLabel, durationMs: number): void {
  executionsTotal.labels(outcome).inc();
  executionSeconds.labels(outcome).observe(Math.max(0, durationMs) / 1000);
}

export function trackContextProvisioned(): void {
  liveContexts.inc();
}

export function trackContextReleased(): void {
  liveContexts.dec();
}

export function recordTeardownFailure(resource: "context" | "staging"): void {
  teardownFailures.labels(resource).inc();
}

export function recordReclaimed(result: "removed" | "failed", count = 1): void {
  if (count <= 0) {
    return;
  }
  reclaimedTotal.labels(result).inc(count);
}

export async function getMetricsSnapshot(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}

export function resetMetrics(): void {
  register.resetMetrics();
}
