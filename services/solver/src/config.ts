export { loadConfig, invalidateConfigCache, parseConfig, ConfigurationError } from "./config/loadConfig.js";
export type { AppConfig, SandboxConfig, LlmConfig, ServerConfig, SandboxLimits } from "./config/schema.js";
