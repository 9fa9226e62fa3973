import { z } from "zod";

import { postJson, resolveServiceConfig, type ServiceConfig } from "../gateway.js";
import { printBlock, printLine } from "../output.js";

export const SolveResponseSchema = z.object({
  success: z.literal(true),
  solution: z.string(),
  code: z.string(),
  output: z.string(),
  failureReason: z.string().optional(),
  model: z.string().optional(),
  sessionId: z.string(),
});
export type SolveResponse = z.infer<typeof SolveResponseSchema>;

export async function runSolve(problem: string, config: ServiceConfig = resolveServiceConfig()): Promise<SolveResponse> {
  const trimmed = problem.trim();
  if (!trimmed) {
    throw new Error("A problem is required, e.g. mathsolver solve \"What is 17 * 23?\"");
  }
  const { body } = await postJson("solve", { problem: trimmed }, config, SolveResponseSchema);

  printLine("Solution:", body.solution);
  if (body.failureReason) {
    printLine("Failure:", body.failureReason);
  }
  printBlock("Code", body.code);
  printBlock("Output", body.output);
  if (body.model) {
    printLine("Model:", body.model);
  }
  if (body.sessionId !== config.sessionId) {
    printLine(`Session: ${body.sessionId} (export MATHSOLVER_SESSION_ID=${body.sessionId} to keep history)`);
  }
  return body;
}
