/**
 * Configuration schema definitions using Zod.
 *
 * `loadConfig` merges the YAML file and environment overrides into a raw
 * document and validates it here, so every default lives in one place.
 */

import { z } from "zod";

// ============================================================================
// Sandbox
// ============================================================================

export const DEFAULT_SANDBOX_IMAGE = "python:3.10-slim";
export const DEFAULT_SANDBOX_WORKDIR = "/workspace";
export const DEFAULT_SANDBOX_LABEL = "mathsolver.sandbox";

const LabelKeySchema = z
  .string()
  .trim()
  .regex(/^[a-z0-9][a-z0-9._-]{0,127}$/u, {
    message: "label must be a lowercase docker label key",
  });

export const SandboxLimitsSchema = z.object({
  memoryBytes: z.number().int().min(16 * 1024 * 1024).default(512 * 1024 * 1024),
  cpuQuota: z.number().positive().max(64).default(1),
  pidsLimit: z.number().int().min(1).max(4096).default(128),
});
export type SandboxLimits = z.infer<typeof SandboxLimitsSchema>;

/** Seconds a program may run; also checked on per-request overrides. */
export const TimeoutSecondsSchema = z.number().positive().max(600);

export const SandboxConfigSchema = z.object({
  image: z.string().trim().min(1, { message: "sandbox image is required" }).default(DEFAULT_SANDBOX_IMAGE),
  setupCommand: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value && value.length > 0 ? value : undefined)),
  timeoutSeconds: TimeoutSecondsSchema.default(30),
  workdir: z.string().trim().startsWith("/", { message: "workdir must be absolute" }).default(DEFAULT_SANDBOX_WORKDIR),
  interpreter: z.string().trim().min(1).default("python"),
  shell: z.string().trim().min(1).default("bash"),
  stagingRoot: z.string().trim().min(1).optional(),
  network: z.enum(["none", "bridge"]).default("none"),
  user: z.string().trim().min(1).optional(),
  label: LabelKeySchema.default(DEFAULT_SANDBOX_LABEL),
  limits: SandboxLimitsSchema.default({}),
  pullMissingImages: z.boolean().default(true),
  reclaimOnStartup: z.boolean().default(false),
  dockerSocket: z.string().trim().min(1).optional(),
});
export type SandboxConfig = z.infer<typeof SandboxConfigSchema>;

// ============================================================================
// Language model
// ============================================================================

export const LlmConfigSchema = z.object({
  baseUrl: z.string().trim().url({ message: "llm baseUrl must be a valid URL" }).default("http://localhost:11434/v1"),
  apiKey: z.string().min(1).default("ollama"),
  model: z.string().trim().min(1).default("llama3.1"),
  temperature: z.number().min(0).max(2).default(0),
  timeoutMs: z.number().int().min(1000).max(600_000).default(120_000),
  retryAttempts: z.number().int().min(1).max(5).default(2),
});
export type LlmConfig = z.infer<typeof LlmConfigSchema>;

// ============================================================================
// HTTP server
// ============================================================================

export const ServerConfigSchema = z.object({
  host: z.string().trim().min(1).default("0.0.0.0"),
  port: z.number().int().min(0).max(65535).default(5001),
  jsonLimitBytes: z.number().int().min(1024).max(10 * 1024 * 1024).default(64 * 1024),
  corsOrigins: z.array(z.string()).default(["*"]),
  historyLimit: z.number().int().min(1).max(1000).default(50),
  historySessions: z.number().int().min(1).max(100_000).default(1000),
});
export type ServerConfig = z.infer<typeof ServerConfigSchema>;

// ============================================================================
// Root
// ============================================================================

export const AppConfigSchema = z.object({
  sandbox: SandboxConfigSchema.default({}),
  llm: LlmConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
});
export type AppConfig = z.infer<typeof AppConfigSchema>;

export function formatConfigIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
