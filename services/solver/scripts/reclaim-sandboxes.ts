import { parseArgs } from "node:util";

import { loadConfig } from "../src/config.js";
import { appLogger, normalizeError } from "../src/observability/logger.js";
import { DockerRuntime } from "../src/sandbox/DockerRuntime.js";
import { reclaimAll } from "../src/sandbox/reclaim.js";

/**
 * Force-removes every sandbox context created from the configured base image
 * (or `--image`). Exits 1 when any context could not be removed.
 */
async function main(): Promise<number> {
  const { values } = parseArgs({
    options: { image: { type: "string", short: "i" } },
    allowPositionals: false,
  });
  const config = loadConfig();
  const image = values.image ?? config.sandbox.image;
  const logger = appLogger.child({ component: "reclaim-sandboxes" });
  const runtime = new DockerRuntime({ logger, socketPath: config.sandbox.dockerSocket });

  const report = await reclaimAll(runtime, image, logger);
  for (const id of report.removed) {
    process.stdout.write(`removed ${id}\n`);
  }
  for (const failure of report.failures) {
    process.stderr.write(`${failure.message}\n`);
  }
  process.stdout.write(`${report.removed.length} removed, ${report.failures.length} failed (${image})\n`);
  return report.failures.length === 0 ? 0 : 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    appLogger.error({ err: normalizeError(error) }, "sandbox reclamation failed");
    process.exitCode = 1;
  });
