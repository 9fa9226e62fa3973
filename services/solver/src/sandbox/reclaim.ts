import type { AppLogger } from "../observability/logger.js";
import { normalizeError } from "../observability/logger.js";
import { recordReclaimed } from "../observability/metrics.js";
import { ReclamationError } from "./errors.js";
import type { SandboxRuntime } from "./types.js";

export interface ReclamationReport {
  image: string;
  removed: string[];
  failures: ReclamationError[];
}

/**
 * Force-removes every context created from `image`, running or stopped,
 * including those left behind by earlier processes. One failed removal is
 * recorded and the sweep moves on.
 */
export async function reclaimAll(
  runtime: SandboxRuntime,
  image: string,
  logger: AppLogger,
): Promise<ReclamationReport> {
  const contexts = await runtime.listByImage(image);
  const report: ReclamationReport = { image, removed: [], failures: [] };
  if (contexts.length === 0) {
    logger.debug({ image }, "no sandbox contexts to reclaim");
    return report;
  }

  for (const context of contexts) {
    try {
      await runtime.remove(context.id);
      report.removed.push(context.id);
    } catch (error) {
      const failure = new ReclamationError(context.id, { cause: error });
      report.failures.push(failure);
      logger.warn({ contextId: context.id, image, err: normalizeError(error) }, "failed to reclaim sandbox context");
    }
  }

  if (report.removed.length > 0) {
    recordReclaimed("removed", report.removed.length);
  }
  if (report.failures.length > 0) {
    recordReclaimed("failed", report.failures.length);
  }
  logger.info(
    { image, removed: report.removed.length, failed: report.failures.length },
    "sandbox reclamation finished",
  );
  return report;
}
