import type { StagedFile } from "./types.js";

export interface CommandOptions {
  setupCommand?: string;
  interpreter: string;
  shell: string;
}

const SAFE_ARG = /^[A-Za-z0-9._/-]+$/u;

export function quoteShellArg(value: string): string {
  if (SAFE_ARG.test(value)) {
    return value;
  }
  return `'${value.replace(/'/gu, `'\\''`)}'`;
}

export function hasRunnableFiles(files: readonly StagedFile[]): boolean {
  return files.some((file) => file.executionMode !== "none");
}

// A leading dash would be read as an interpreter option.
function fileArg(name: string): string {
  return quoteShellArg(name.startsWith("-") ? `./${name}` : name);
}

/**
 * One shell line: the silenced setup step, then every runnable file in
 * order, each gated on the previous with `&&`. Empty when nothing runs.
 */
export function composeCommand(files: readonly StagedFile[], options: CommandOptions): string {
  const steps: string[] = [];
  for (const file of files) {
    if (file.executionMode === "interpreted") {
      steps.push(`${options.interpreter} ${fileArg(file.name)}`);
    } else if (file.executionMode === "shell") {
      steps.push(`${options.shell} ${fileArg(file.name)}`);
    }
  }
  if (steps.length === 0) {
    return "";
  }
  const setup = options.setupCommand?.trim();
  if (setup) {
    steps.unshift(`(${setup}) > /dev/null 2>&1`);
  }
  return steps.join(" && ");
}

/** The argument vector the context's main process is started with. */
export function toContainerCommand(command: string): string[] {
  return ["bash", "-c", command];
}
