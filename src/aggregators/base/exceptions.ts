/**
 * Aggregator-specific exceptions.
 *
 * Both are recovered per source by the aggregation service.
 */

import { AggregationError } from "../../errors";

export class ContentFetchError extends AggregationError {
  constructor(
    message: string,
    sourceName?: string,
    public statusCode?: number,
    public originalError?: Error,
  ) {
    super(message, sourceName);
    this.name = "ContentFetchError";
  }
}

export class ParseError extends AggregationError {
  constructor(
    message: string,
    sourceName?: string,
    public originalError?: Error,
  ) {
    super(message, sourceName);
    this.name = "ParseError";
  }
}
