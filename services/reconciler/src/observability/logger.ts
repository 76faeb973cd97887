import pino, { type LoggerOptions, stdTimeFunctions, type Logger as PinoLogger } from "pino";

export type LoggerBindings = Record<string, unknown>;

export type AppLogger = PinoLogger;

export type NormalizedError = {
  message: string;
  name?: string;
  stack?: string;
  code?: string | number;
  cause?: unknown;
  details?: Record<string, unknown>;
};

function resolveLevel(): string {
  const envLevel = process.env.LOG_LEVEL?.trim();
  return envLevel && envLevel.length > 0 ? envLevel : "info";
}

function resolveServiceName(): string {
  const envName = process.env.SERVICE_NAME?.trim();
  return envName && envName.length > 0 ? envName : "acl-sync";
}

function buildLoggerOptions(): LoggerOptions {
  return {
    level: resolveLevel(),
    base: { service: resolveServiceName() },
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
}

export function createLogger(bindings: LoggerBindings = {}): AppLogger {
  const logger = pino(buildLoggerOptions());
  return Object.keys(bindings).length > 0 ? logger.child(bindings) : logger;
}

export const appLogger: AppLogger = createLogger({ subsystem: "reconciler" });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function extractCode(error: unknown): string | number | undefined {
  if (isRecord(error)) {
    const candidate = error.code;
    if (typeof candidate === "string" || typeof candidate === "number") {
      return candidate;
    }
  }
  return undefined;
}

function extractDetails(error: unknown): Record<string, unknown> | undefined {
  if (!isRecord(error)) {
    return undefined;
  }
  const details: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(error)) {
    if (key === "message" || key === "name" || key === "stack" || key === "code" || key === "cause") {
      continue;
    }
    details[key] = value;
  }
  return Object.keys(details).length > 0 ? details : undefined;
}

export function normalizeError(error: unknown): NormalizedError {
  if (error instanceof Error) {
    const normalized: NormalizedError = {
      message: error.message,
      name: error.name,
    };
    if (error.stack) {
      normalized.stack = error.stack;
    }
    const code = extractCode(error);
    if (code !== undefined) {
      normalized.code = code;
    }
    const cause = readCause(error);
    if (cause !== undefined) {
      normalized.cause = cause instanceof Error ? normalizeError(cause) : cause;
    }
    const details = extractDetails(error);
    if (details) {
      normalized.details = details;
    }
    return normalized;
  }

  if (typeof error === "string") {
    return { message: error };
  }

  if (isRecord(error)) {
    const message = typeof error.message === "string" && error.message.trim().length > 0
      ? error.message
      : safeStringify(error) ?? "Unknown error";
    const normalized: NormalizedError = { message };
    if (typeof error.name === "string") {
      normalized.name = error.name;
    }
    const code = extractCode(error);
    if (code !== undefined) {
      normalized.code = code;
    }
    return normalized;
  }

  return { message: safeStringify(error) ?? String(error) };
}

function safeStringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}

function readCause(value: Error): unknown {
  return "cause" in value ? value.cause : undefined;
}
