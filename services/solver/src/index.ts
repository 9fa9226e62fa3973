export * from "./sandbox/index.js";
export { loadConfig, invalidateConfigCache, parseConfig, ConfigurationError } from "./config.js";
export type { AppConfig, SandboxConfig, LlmConfig, ServerConfig, SandboxLimits } from "./config.js";
export { createLogger, normalizeError, appLogger } from "./observability/logger.js";
export type { AppLogger } from "./observability/logger.js";
export { MathSolver, lastNonEmptyLine, SOLUTION_FILE } from "./solver/MathSolver.js";
export type { SolveOutcome, SandboxExecutor, MathSolverOptions } from "./solver/MathSolver.js";
export { OpenAICodeGenerator } from "./solver/OpenAICodeGenerator.js";
export type { OpenAIClient, OpenAICodeGeneratorOptions } from "./solver/OpenAICodeGenerator.js";
export { extractProgram, buildErrorMarkerProgram } from "./solver/CodeGenerator.js";
export type { CodeGenerator, GeneratedCode } from "./solver/CodeGenerator.js";
export { GenerationError } from "./solver/errors.js";
export { SessionHistory, generateSessionId } from "./history/SessionHistory.js";
export type { HistoryEntry } from "./history/SessionHistory.js";
export { createServer } from "./server/app.js";
export type { ServerDependencies } from "./server/app.js";
