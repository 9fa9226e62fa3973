import { readFileSync } from "node:fs";

function readFileValue(path: string): string | undefined {
  try {
    const content = readFileSync(path, "utf-8").trim();
    return content.length > 0 ? content : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Reads `name` from the environment, preferring the contents of the file named by
 * `<name>_FILE` so secrets can be mounted instead of exported.
 */
export function resolveEnv(
  name: string,
  fallback?: string,
): string | undefined {
  const filePath = process.env[`${name}_FILE`];
  if (filePath) {
    const fromFile = readFileValue(filePath);
    if (fromFile !== undefined) {
      return fromFile;
    }
  }
  const direct = process.env[name];
  if (direct !== undefined && direct !== "") {
    return direct;
  }
  return fallback;
}

export function resolveEnvNumber(name: string): number | undefined {
  const raw = resolveEnv(name);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw.trim());
  if (!Number.isFinite(parsed)) {
    throw new Error(`${name} must be a number, received "${raw}"`);
  }
  return parsed;
}

export function resolveEnvBoolean(name: string): boolean | undefined {
  const raw = resolveEnv(name)?.trim().toLowerCase();
  if (raw === undefined) {
    return undefined;
  }
  if (["1", "true", "yes", "on"].includes(raw)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(raw)) {
    return false;
  }
  throw new Error(`${name} must be a boolean, received "${raw}"`);
}
