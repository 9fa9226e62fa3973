import type { AppLogger } from "../observability/logger.js";
import { normalizeError } from "../observability/logger.js";
import type { ExecutionRequest, ExecutionResult } from "../sandbox/types.js";
import { errorMessage } from "../utils/errorUtils.js";
import { buildErrorMarkerProgram, type CodeGenerator } from "./CodeGenerator.js";

export const SOLUTION_FILE = "solution.py";

export interface SandboxExecutor {
  execute(request: ExecutionRequest): Promise<ExecutionResult>;
}

export interface SolveOutcome {
  code: string;
  output: string;
  solution: string;
  failureReason?: string;
  model?: string;
  explanation?: string;
  generationFailed: boolean;
}

export type MathSolverOptions = {
  generator: CodeGenerator;
  executor: SandboxExecutor;
  logger: AppLogger;
};

export function lastNonEmptyLine(output: string): string {
  const lines = output.split(/\r?\n/u).map((line) => line.trim());
  for (let index = lines.length - 1; index >= 0; index--) {
    const line = lines[index];
    if (line) {
      return line;
    }
  }
  return "";
}

/**
 * Problem in, answer out: generate a program, run it in a sandbox, read the
 * answer off the last line it printed.
 */
export class MathSolver {
  private readonly logger: AppLogger;

  constructor(private readonly options: MathSolverOptions) {
    this.logger = options.logger.child({ component: "MathSolver" });
  }

  async solve(problem: string): Promise<SolveOutcome> {
    let code: string;
    let model: string | undefined;
    let explanation: string | undefined;
    let generationFailed = false;
    try {
      const generated = await this.options.generator.generate(problem);
      code = generated.code;
      model = generated.model;
      explanation = generated.explanation;
    } catch (error) {
      this.logger.warn({ err: normalizeError(error) }, "code generation failed; running error marker");
      code = buildErrorMarkerProgram(errorMessage(error));
      generationFailed = true;
    }

    const result = await this.options.executor.execute({
      files: [{ name: SOLUTION_FILE, content: code, executionMode: "interpreted" }],
    });

    const solution = result.failureReason ?? lastNonEmptyLine(result.combinedOutput);
    this.logger.info(
      { status: result.status, generationFailed, durationMs: result.durationMs },
      "solve finished",
    );
    return {
      code,
      output: result.combinedOutput,
      solution,
      failureReason: result.failureReason,
      model,
      explanation,
      generationFailed,
    };
  }
}
