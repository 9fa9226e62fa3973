import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { StagingError } from "./errors.js";
import type { Resource } from "./scope.js";
import type { StagedFile } from "./types.js";

const STAGING_PREFIX = "sandbox-";

/**
 * Rejects names that are empty, absolute, carry NUL bytes or `..`
 * segments, or that repeat an earlier name. Runs before anything touches
 * the filesystem.
 */
export function validateFileNames(files: readonly StagedFile[]): void {
  const seen = new Set<string>();
  for (const file of files) {
    const name = file.name;
    if (name.trim().length === 0) {
      throw new StagingError("file name must not be empty", { fileName: name });
    }
    if (name.includes("\0")) {
      throw new StagingError("file name must not contain NUL bytes", { fileName: name });
    }
    if (path.posix.isAbsolute(name) || path.win32.isAbsolute(name)) {
      throw new StagingError(`file name must be relative: ${name}`, { fileName: name });
    }
    const segments = name.split(/[\\/]+/u);
    if (segments.includes("..")) {
      throw new StagingError(`file name escapes the staging directory: ${name}`, { fileName: name });
    }
    const normalized = path.posix.normalize(name.replace(/\\/gu, "/"));
    if (seen.has(normalized)) {
      throw new StagingError(`duplicate file name: ${name}`, { fileName: name });
    }
    seen.add(normalized);
  }
}

function resolveInside(root: string, name: string): string {
  const target = path.resolve(root, name);
  const relative = path.relative(root, target);
  if (relative.length === 0 || relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new StagingError(`file name escapes the staging directory: ${name}`, { fileName: name });
  }
  return target;
}

export interface StagingDirectory {
  path: string;
}

/**
 * Allocates a fresh staging directory under `parent` (the OS temp dir by
 * default). Releasing removes it with everything in it.
 */
export async function allocateStagingDirectory(parent?: string): Promise<Resource<StagingDirectory>> {
  const root = parent ?? os.tmpdir();
  let dir: string;
  try {
    await mkdir(root, { recursive: true });
    dir = await mkdtemp(path.join(root, STAGING_PREFIX));
  } catch (error) {
    throw new StagingError(`failed to create staging directory under ${root}`, { cause: error });
  }
  return {
    value: { path: dir },
    release: () => rm(dir, { recursive: true, force: true }),
  };
}

export async function writeStagedFiles(dir: string, files: readonly StagedFile[]): Promise<void> {
  validateFileNames(files);
  for (const file of files) {
    const target = resolveInside(dir, file.name);
    try {
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, file.content, { encoding: "utf-8" });
    } catch (error) {
      throw new StagingError(`failed to write ${file.name}`, { fileName: file.name, cause: error });
    }
  }
}
