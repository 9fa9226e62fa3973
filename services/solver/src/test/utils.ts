import pino from "pino";

import { type SandboxConfig, SandboxConfigSchema } from "../config/schema.js";
import type { AppLogger } from "../observability/logger.js";

export function silentLogger(): AppLogger {
  return pino({ level: "silent" });
}

export function buildSandboxConfig(overrides: Partial<SandboxConfig> = {}): SandboxConfig {
  return SandboxConfigSchema.parse({ pullMissingImages: false, ...overrides });
}
