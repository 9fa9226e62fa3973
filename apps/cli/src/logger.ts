import pino, { stdTimeFunctions, type Logger as PinoLogger } from "pino";

export type CliLogger = PinoLogger;

function envValue(...names: string[]): string | undefined {
  for (const name of names) {
    const value = process.env[name]?.trim();
    if (value) {
      return value;
    }
  }
  return undefined;
}

export function createLogger(bindings: Record<string, unknown> = {}): CliLogger {
  // stdout carries command output; logs go to stderr.
  const logger = pino(
    {
      level: envValue("MATHSOLVER_LOG_LEVEL", "LOG_LEVEL") ?? "warn",
      base: { service: envValue("MATHSOLVER_SERVICE_NAME", "SERVICE_NAME") ?? "mathsolver-cli" },
      timestamp: stdTimeFunctions.isoTime,
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
    },
    pino.destination(2),
  );
  return Object.keys(bindings).length > 0 ? logger.child(bindings) : logger;
}

export const logger: CliLogger = createLogger({ subsystem: "cli" });
