/**
 * Custom error classes.
 *
 * Every run-level error carries the process exit code the CLI should use.
 */

export class ServiceError extends Error {
  constructor(
    message: string,
    public exitCode: number = 1,
  ) {
    super(message);
    this.name = "ServiceError";
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends ServiceError {
  constructor(
    message: string,
    public issues?: Array<{ path: string; message: string }>,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export class AggregationError extends ServiceError {
  constructor(
    message: string,
    public sourceName?: string,
  ) {
    super(message);
    this.name = "AggregationError";
  }
}

/**
 * Raised when the whole run produced no entries at all.
 */
export class NoEntriesError extends AggregationError {
  constructor(
    message: string,
    public failedSources: string[] = [],
  ) {
    super(message);
    this.name = "NoEntriesError";
  }
}

/**
 * Model or webhook transport failure.
 */
export class AnalyzerError extends ServiceError {
  constructor(
    message: string,
    public statusCode?: number,
    public originalError?: Error,
  ) {
    super(message);
    this.name = "AnalyzerError";
  }
}
