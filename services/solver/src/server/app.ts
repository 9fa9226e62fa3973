import { randomUUID } from "node:crypto";

import cors, { type CorsOptions } from "cors";
import express, { type Express, type NextFunction, type Request, type Response } from "express";

import type { AppConfig } from "../config.js";
import { type ProblemSolver, SolveController } from "../controllers/SolveController.js";
import type { SessionHistory } from "../history/SessionHistory.js";
import { respondWithError, respondWithUnexpectedError } from "../http/errors.js";
import { getRequestIds } from "../http/helpers.js";
import { type AppLogger, appLogger, normalizeError } from "../observability/logger.js";
import { getMetricsContentType, getMetricsSnapshot } from "../observability/metrics.js";
import { type RequestContext, runWithContext } from "../observability/requestContext.js";

export type ServerDependencies = {
  config: AppConfig;
  solver: ProblemSolver;
  history: SessionHistory;
  logger?: AppLogger;
};

function corsOptions(origins: string[]): CorsOptions {
  if (origins.includes("*")) {
    return { origin: true, exposedHeaders: ["x-session-id", "x-request-id", "x-trace-id"] };
  }
  return { origin: origins, exposedHeaders: ["x-session-id", "x-request-id", "x-trace-id"] };
}

export function createServer(deps: ServerDependencies): Express {
  const { config } = deps;
  const logger = deps.logger ?? appLogger;
  const app = express();
  const solveController = new SolveController(deps.solver, deps.history, logger);

  app.disable("x-powered-by");

  app.use((req: Request, res: Response, next: NextFunction) => {
    const headerRequestId = req.header("x-request-id")?.trim();
    const headerTraceId = req.header("x-trace-id")?.trim();
    const requestId = headerRequestId && headerRequestId.length > 0 ? headerRequestId : randomUUID();
    const traceId = headerTraceId && headerTraceId.length > 0 ? headerTraceId : randomUUID();
    res.locals.requestId = requestId;
    res.locals.traceId = traceId;
    res.setHeader("x-request-id", requestId);
    res.setHeader("x-trace-id", traceId);
    const context: RequestContext = { requestId, traceId };
    runWithContext(context, () => next());
  });

  app.use(cors(corsOptions(config.server.corsOrigins)));
  app.use(express.json({ limit: config.server.jsonLimitBytes }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on("finish", () => {
      const { requestId, traceId } = getRequestIds(res);
      logger.info(
        {
          event: "http.request",
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          durationMs: Date.now() - start,
          requestId,
          traceId,
        },
        "handled http request",
      );
    });
    next();
  });

  app.get("/healthz", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/metrics", async (_req, res) => {
    try {
      const snapshot = await getMetricsSnapshot();
      res.setHeader("Content-Type", getMetricsContentType());
      res.send(snapshot);
    } catch (error) {
      logger.error({ err: normalizeError(error) }, "failed to collect metrics");
      respondWithUnexpectedError(res, error);
    }
  });

  app.post("/solve", (req, res) => solveController.solve(req, res));
  app.get("/history", (req, res) => solveController.getHistory(req, res));
  app.post("/reset", (req, res) => solveController.reset(req, res));

  app.use((_req: Request, res: Response) => {
    respondWithError(res, 404, { code: "not_found", message: "Route not found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    respondWithUnexpectedError(res, err);
  });

  return app;
}
