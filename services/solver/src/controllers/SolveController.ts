import type { Request, Response } from "express";

import type { HistoryEntry, SessionHistory } from "../history/SessionHistory.js";
import { respondWithUnexpectedError, respondWithValidationError } from "../http/errors.js";
import { getRequestIds, resolveSessionId } from "../http/helpers.js";
import { formatValidationIssues, SolveRequestSchema } from "../http/validation.js";
import type { AppLogger } from "../observability/logger.js";
import type { SolveOutcome } from "../solver/MathSolver.js";

export interface ProblemSolver {
  solve(problem: string): Promise<SolveOutcome>;
}

export class SolveController {
  private readonly logger: AppLogger;

  constructor(
    private readonly solver: ProblemSolver,
    private readonly history: SessionHistory,
    logger: AppLogger,
  ) {
    this.logger = logger.child({ component: "SolveController" });
  }

  async solve(req: Request, res: Response): Promise<void> {
    const sessionId = resolveSessionId(req, res);
    const parsed = SolveRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      respondWithValidationError(res, formatValidationIssues(parsed.error.issues));
      return;
    }

    const { problem } = parsed.data;
    try {
      const outcome = await this.solver.solve(problem);
      const entry: HistoryEntry = {
        problem,
        solution: outcome.solution,
        code: outcome.code,
        output: outcome.output,
        failureReason: outcome.failureReason,
        timestamp: new Date().toISOString(),
      };
      this.history.append(sessionId, entry);
      const { requestId } = getRequestIds(res);
      this.logger.info({ sessionId, requestId, failed: outcome.failureReason !== undefined }, "solve request handled");
      res.json({
        success: true,
        solution: outcome.solution,
        code: outcome.code,
        output: outcome.output,
        failureReason: outcome.failureReason,
        model: outcome.model,
        sessionId,
      });
    } catch (error) {
      respondWithUnexpectedError(res, error);
    }
  }

  getHistory(req: Request, res: Response): void {
    const sessionId = resolveSessionId(req, res);
    res.json({ success: true, sessionId, history: this.history.list(sessionId) });
  }

  reset(req: Request, res: Response): void {
    const sessionId = resolveSessionId(req, res);
    const cleared = this.history.reset(sessionId);
    this.logger.info({ sessionId, cleared }, "session history cleared");
    res.json({ success: true, sessionId, cleared });
  }
}
