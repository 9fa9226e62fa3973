import http from "node:http";

import { loadConfig, type AppConfig } from "./config.js";
import { SessionHistory } from "./history/SessionHistory.js";
import { appLogger, normalizeError } from "./observability/logger.js";
import { DockerRuntime } from "./sandbox/DockerRuntime.js";
import { SandboxManager } from "./sandbox/SandboxManager.js";
import type { SandboxRuntime } from "./sandbox/types.js";
import { createServer } from "./server/app.js";
import type { CodeGenerator } from "./solver/CodeGenerator.js";
import { MathSolver } from "./solver/MathSolver.js";
import { OpenAICodeGenerator } from "./solver/OpenAICodeGenerator.js";

export type BootstrapOptions = {
  config?: AppConfig;
  runtime?: SandboxRuntime;
  generator?: CodeGenerator;
};

export type RunningSolver = {
  server: http.Server;
  manager: SandboxManager;
  close(): Promise<void>;
};

/**
 * Wires configuration, sandbox runtime, code generator and HTTP app
 * together and starts listening.
 */
export async function bootstrapSolver(options: BootstrapOptions = {}): Promise<RunningSolver> {
  const config = options.config ?? loadConfig();
  const runtime =
    options.runtime ??
    new DockerRuntime({
      logger: appLogger,
      socketPath: config.sandbox.dockerSocket,
      pullMissingImages: config.sandbox.pullMissingImages,
    });
  const manager = new SandboxManager({ runtime, config: config.sandbox, logger: appLogger });

  if (config.sandbox.reclaimOnStartup) {
    const report = await manager.reclaimAll();
    if (report.failures.length > 0) {
      appLogger.warn(
        { image: report.image, failed: report.failures.map((failure) => failure.contextId) },
        "startup reclamation left contexts behind",
      );
    }
  }

  const generator = options.generator ?? new OpenAICodeGenerator({ config: config.llm, logger: appLogger });
  const solver = new MathSolver({ generator, executor: manager, logger: appLogger });
  const history = new SessionHistory(config.server.historyLimit, config.server.historySessions);
  const app = createServer({ config, solver, history });
  const server = http.createServer(app);

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.server.port, config.server.host, () => {
      server.off("error", reject);
      resolve();
    });
  });
  const address = server.address();
  appLogger.info(
    {
      host: config.server.host,
      port: typeof address === "object" && address ? address.port : config.server.port,
      image: config.sandbox.image,
      instanceId: manager.instanceId,
    },
    "solver listening",
  );

  return {
    server,
    manager,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

function registerShutdown(running: RunningSolver): void {
  let closing = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (closing) {
      return;
    }
    closing = true;
    appLogger.info({ signal }, "shutting down");
    running.close().then(
      () => process.exit(0),
      (error: unknown) => {
        appLogger.error({ err: normalizeError(error) }, "shutdown failed");
        process.exit(1);
      },
    );
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

if (process.env.NODE_ENV !== "test") {
  bootstrapSolver()
    .then(registerShutdown)
    .catch((error: unknown) => {
      appLogger.error({ err: normalizeError(error) }, "solver startup failed");
      process.exit(1);
    });
}
