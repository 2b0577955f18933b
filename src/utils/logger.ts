/**
 * Pino logger setup for structured logging.
 *
 * Everything goes to stderr: stdout is reserved for scrape-only JSON and
 * articles written with `-o -`.
 */

import pino from "pino";

const isDevelopment = process.env["NODE_ENV"] === "development";
const logLevel = process.env["LOG_LEVEL"] || (isDevelopment ? "debug" : "info");

/**
 * Copy enumerable properties of an error that are not already serialized.
 */
function extractExtraProps(error: Error, serialized: Record<string, unknown>): void {
  const seen = new WeakSet<object>();
  for (const [key, value] of Object.entries(error)) {
    if (key in serialized) continue;
    if (value && typeof value === "object") {
      if (seen.has(value)) continue;
      seen.add(value);
    }
    serialized[key] = value;
  }
}

/**
 * Serialize error objects for logging.
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { value: String(error) };
  }

  const serialized: Record<string, unknown> = { name: error.name, message: error.message };
  if (error.stack) serialized["stack"] = error.stack;

  if ("statusCode" in error) serialized["statusCode"] = error.statusCode;
  if ("sourceName" in error) serialized["sourceName"] = error.sourceName;
  if ("originalError" in error && error.originalError) {
    serialized["originalError"] = serializeError(error.originalError);
  }

  extractExtraProps(error, serialized);
  return serialized;
}

const loggerConfig: pino.LoggerOptions = {
  level: logLevel,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  serializers: {
    error: serializeError,
    err: serializeError,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

// pino-pretty is loaded by pino itself when given as a transport target
if (isDevelopment) {
  loggerConfig.transport = {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "HH:MM:ss.l",
      ignore: "pid,hostname",
      destination: 2,
    },
  };
}

/**
 * Main logger instance.
 */
export const logger: pino.Logger = isDevelopment
  ? pino(loggerConfig)
  : pino(loggerConfig, pino.destination(2));

/**
 * Create a child logger with additional context.
 *
 * @param context - Additional context to include in all log messages
 */
export function createLogger(context: Record<string, unknown>): pino.Logger {
  return logger.child(context);
}

export type Logger = pino.Logger;
