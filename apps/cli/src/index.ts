#!/usr/bin/env node
import { runHistory, runReset } from "./commands/history.js";
import { runSolve } from "./commands/solve.js";
import { logger } from "./logger.js";
import { printErrorLine, printLine } from "./output.js";

function usage() {
  printLine(
    `mathsolver CLI
Usage:
  mathsolver solve <problem...>   Solve a math problem in a sandbox
  mathsolver history              List problems solved in this session
  mathsolver reset                Clear this session's history

Environment:
  MATHSOLVER_URL          Service URL (default http://localhost:5001)
  MATHSOLVER_TIMEOUT_MS   Request timeout in milliseconds (default 120000)
  MATHSOLVER_SESSION_ID   Session to attach to
`,
  );
}

async function main() {
  const [cmd, ...rest] = process.argv.slice(2);
  if (cmd === "solve") {
    if (rest.length === 0) return usage();
    await runSolve(rest.join(" "));
    return;
  }
  if (cmd === "history") {
    await runHistory();
    return;
  }
  if (cmd === "reset") {
    await runReset();
    return;
  }
  usage();
}

main().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  logger.error({ err }, "command failed");
  printErrorLine("Error:", err.message);
  process.exit(1);
});
