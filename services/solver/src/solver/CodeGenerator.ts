export interface GeneratedCode {
  code: string;
  explanation?: string;
  model: string;
}

export interface CodeGenerator {
  generate(problem: string): Promise<GeneratedCode>;
}

const FENCED_BLOCK = /```[^\n`]*\n([\s\S]*?)```/u;

/**
 * Takes the first fenced block as the program and whatever surrounds it as
 * the explanation. Unfenced replies are taken whole as the program.
 */
export function extractProgram(reply: string): { code: string; explanation?: string } {
  const match = FENCED_BLOCK.exec(reply);
  if (!match) {
    return { code: reply.trim() };
  }
  const code = (match[1] ?? "").trim();
  const explanation = (reply.slice(0, match.index) + reply.slice(match.index + match[0].length)).trim();
  return explanation.length > 0 ? { code, explanation } : { code };
}

export const ERROR_MARKER_PREFIX = "ERROR: code generation failed";

/** A program that reports `reason` on stderr and exits non-zero. */
export function buildErrorMarkerProgram(reason: string): string {
  const marker = JSON.stringify(`${ERROR_MARKER_PREFIX}: ${reason}`);
  return ["import sys", `sys.stderr.write(${marker} + "\\n")`, "sys.exit(1)", ""].join("\n");
}
