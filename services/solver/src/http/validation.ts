import { z } from "zod";

import { SESSION_ID_PATTERN } from "../history/SessionHistory.js";

export const MAX_PROBLEM_LENGTH = 4000;
const NO_PROBLEM = "No problem provided";

export const SolveRequestSchema = z.object({
  problem: z
    .string({ required_error: NO_PROBLEM, invalid_type_error: "problem must be a string" })
    .trim()
    .min(1, { message: NO_PROBLEM })
    .max(MAX_PROBLEM_LENGTH, { message: `problem must not exceed ${MAX_PROBLEM_LENGTH} characters` }),
});
export type SolveRequestPayload = z.infer<typeof SolveRequestSchema>;

export const SessionIdSchema = z.string().trim().regex(SESSION_ID_PATTERN, { message: "session id is invalid" });

export function formatValidationIssues(issues: z.ZodIssue[]): Array<{ path: string; message: string }> {
  return issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
