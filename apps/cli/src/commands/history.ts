import { z } from "zod";

import { getJson, postJson, resolveServiceConfig, type ServiceConfig } from "../gateway.js";
import { printLine } from "../output.js";

const HistoryResponseSchema = z.object({
  success: z.literal(true),
  sessionId: z.string(),
  history: z.array(
    z.object({
      problem: z.string(),
      solution: z.string(),
      failureReason: z.string().optional(),
      timestamp: z.string(),
    }),
  ),
});

const ResetResponseSchema = z.object({
  success: z.literal(true),
  sessionId: z.string(),
  cleared: z.number().int().nonnegative(),
});

function requireSession(config: ServiceConfig): void {
  if (!config.sessionId) {
    throw new Error("No session selected. Set MATHSOLVER_SESSION_ID to the id printed by `mathsolver solve`.");
  }
}

export async function runHistory(config: ServiceConfig = resolveServiceConfig()): Promise<number> {
  requireSession(config);
  const { body } = await getJson("history", config, HistoryResponseSchema);
  if (body.history.length === 0) {
    printLine(`No problems solved in ${body.sessionId} yet.`);
    return 0;
  }
  body.history.forEach((entry, index) => {
    printLine(`${index + 1}. [${entry.timestamp}] ${entry.problem}`);
    printLine(`   -> ${entry.solution}`);
  });
  return body.history.length;
}

export async function runReset(config: ServiceConfig = resolveServiceConfig()): Promise<number> {
  requireSession(config);
  const { body } = await postJson("reset", {}, config, ResetResponseSchema);
  printLine(`Cleared ${body.cleared} ${body.cleared === 1 ? "entry" : "entries"} from ${body.sessionId}.`);
  return body.cleared;
}
