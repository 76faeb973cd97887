import pino, { stdTimeFunctions, type Logger as PinoLogger, type LoggerOptions } from "pino";

export type CliLogger = PinoLogger;

function resolveLevel(): string {
  const envLevel = process.env.ACL_SYNC_LOG_LEVEL ?? process.env.LOG_LEVEL;
  if (typeof envLevel === "string" && envLevel.trim().length > 0) {
    return envLevel.trim();
  }
  return "warn";
}

function resolveServiceName(): string {
  const envName = process.env.SERVICE_NAME;
  if (typeof envName === "string" && envName.trim().length > 0) {
    return envName.trim();
  }
  return "acl-sync-cli";
}

function buildLoggerOptions(): LoggerOptions {
  return {
    level: resolveLevel(),
    base: { service: resolveServiceName() },
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      }
    }
  };
}

/** Logs go to stderr so stdout carries only the rendered report. */
export function createCliLogger(level?: string): CliLogger {
  const options = buildLoggerOptions();
  if (level) {
    options.level = level;
  }
  return pino(options, pino.destination(2)).child({ subsystem: "cli" });
}

export const logger: CliLogger = createCliLogger();
