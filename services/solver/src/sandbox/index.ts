export * from "./types.js";
export * from "./errors.js";
export { composeCommand, hasRunnableFiles, quoteShellArg, toContainerCommand } from "./CommandComposer.js";
export type { CommandOptions } from "./CommandComposer.js";
export { allocateStagingDirectory, validateFileNames, writeStagedFiles } from "./FileStaging.js";
export { withResource, raceTimeout } from "./scope.js";
export type { Resource, RaceOutcome } from "./scope.js";
export { DockerRuntime, demuxLogBuffer } from "./DockerRuntime.js";
export type { DockerApi, DockerContainerApi, DockerRuntimeOptions } from "./DockerRuntime.js";
export { SandboxManager } from "./SandboxManager.js";
export type { SandboxManagerOptions } from "./SandboxManager.js";
export { reclaimAll } from "./reclaim.js";
export type { ReclamationReport } from "./reclaim.js";
