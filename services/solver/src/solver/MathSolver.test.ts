import { describe, expect, it, vi } from "vitest";

import type { ExecutionRequest, ExecutionResult } from "../sandbox/types.js";
import { silentLogger } from "../test/utils.js";
import type { CodeGenerator } from "./CodeGenerator.js";
import { GenerationError } from "./errors.js";
import { lastNonEmptyLine, MathSolver } from "./MathSolver.js";

function result(overrides: Partial<ExecutionResult>): ExecutionResult {
  return {
    combinedOutput: "",
    status: "succeeded",
    exitCode: 0,
    timedOut: false,
    durationMs: 5,
    executionId: "exec-1",
    contextId: "ctx-1",
    ...overrides,
  };
}

function createSolver(generate: CodeGenerator["generate"], execution: ExecutionResult) {
  const execute = vi.fn(async (_request: ExecutionRequest) => execution);
  const solver = new MathSolver({ generator: { generate }, executor: { execute }, logger: silentLogger() });
  return { solver, execute };
}

describe("lastNonEmptyLine", () => {
  it("skips trailing blank lines", () => {
    expect(lastNonEmptyLine("step 1\n  42  \n\n")).toBe("42");
    expect(lastNonEmptyLine("a\r\nb\r\n")).toBe("b");
    expect(lastNonEmptyLine("\n\n")).toBe("");
  });
});

describe("MathSolver", () => {
  it("runs the generated program and reads the answer from the last line", async () => {
    const { solver, execute } = createSolver(
      async () => ({ code: "print('x = 4')\nprint(4)", model: "test-model" }),
      result({ combinedOutput: "x = 4\n4\n" }),
    );

    const outcome = await solver.solve("Solve 2x = 8");

    expect(execute).toHaveBeenCalledWith({
      files: [{ name: "solution.py", content: "print('x = 4')\nprint(4)", executionMode: "interpreted" }],
    });
    expect(outcome).toEqual({
      code: "print('x = 4')\nprint(4)",
      output: "x = 4\n4\n",
      solution: "4",
      failureReason: undefined,
      model: "test-model",
      explanation: undefined,
      generationFailed: false,
    });
  });

  it("uses the failure reason as the solution when the program fails", async () => {
    const { solver } = createSolver(
      async () => ({ code: "1/0", model: "test-model" }),
      result({
        combinedOutput: "ZeroDivisionError: division by zero\n",
        status: "failed",
        exitCode: 1,
        failureReason: "program exited with code 1",
      }),
    );

    const outcome = await solver.solve("divide by zero");

    expect(outcome.solution).toBe("program exited with code 1");
    expect(outcome.output).toBe("ZeroDivisionError: division by zero\n");
  });

  it("degrades a generation failure into the error-marker program", async () => {
    const { solver, execute } = createSolver(
      async () => {
        throw new GenerationError("model returned an empty response");
      },
      result({ status: "failed", exitCode: 1, failureReason: "program exited with code 1" }),
    );

    const outcome = await solver.solve("anything");

    const request = execute.mock.calls[0]?.[0];
    expect(request?.files).toHaveLength(1);
    expect(request?.files[0]?.executionMode).toBe("interpreted");
    expect(request?.files[0]?.content).toContain("ERROR: code generation failed: model returned an empty response");
    expect(outcome.generationFailed).toBe(true);
    expect(outcome.model).toBeUndefined();
  });
});
