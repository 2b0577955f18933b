/**
 * Base aggregator class.
 *
 * One aggregator instance handles one configured source per run. All
 * aggregators must extend this class.
 */

import { createLogger, logger, type Logger } from "../../utils/logger";

import type { FetchSettings, RawEntry, SourceConfig, SourceKind } from "./types";

export const DEFAULT_FETCH_SETTINGS: FetchSettings = {
  timeout: 15000,
  userAgent: "BIP-Digest/1.0 (Node.js)",
};

export abstract class BaseAggregator<TSourceData = unknown> {
  protected source: SourceConfig | null = null;
  protected settings: FetchSettings = DEFAULT_FETCH_SETTINGS;
  protected logger: Logger = logger;

  // Required metadata - must be implemented by subclasses
  abstract readonly id: SourceKind;
  abstract readonly name: string;
  abstract readonly description: string;

  readonly defaultMaxEntries: number = 10;

  /**
   * Initialize aggregator with a source and its fetch settings.
   * A per-source timeout overrides the global one.
   */
  initialize(source: SourceConfig, settings: FetchSettings = DEFAULT_FETCH_SETTINGS): void {
    this.source = source;
    this.settings = {
      ...settings,
      timeout: source.timeout ?? settings.timeout,
    };
    this.logger = createLogger({ aggregator: this.id, source: source.name });
  }

  get maxEntries(): number {
    return this.source?.maxEntries ?? this.defaultMaxEntries;
  }

  /**
   * Main aggregation method - Template Method Pattern.
   * Errors propagate; the aggregation service decides how to recover.
   */
  async aggregate(): Promise<RawEntry[]> {
    const aggregateStart = Date.now();
    this.logger.debug(
      { step: "aggregate", subStep: "start", maxEntries: this.maxEntries },
      "Starting aggregation",
    );

    try {
      const source = this.validate();
      const sourceData = await this.fetchSourceData(source);
      let entries = await this.parseToRawEntries(sourceData, source);
      entries = this.filterEntries(entries);

      this.logger.info(
        {
          step: "aggregate",
          subStep: "complete",
          entryCount: entries.length,
          totalElapsed: Date.now() - aggregateStart,
        },
        "Aggregation complete",
      );
      return entries;
    } catch (error) {
      this.logger.debug(
        {
          step: "aggregate",
          subStep: "error",
          error,
          totalElapsed: Date.now() - aggregateStart,
        },
        "Aggregation failed",
      );
      throw error;
    }
  }

  // ============================================================================
  // Template Method Steps - Override as needed
  // ============================================================================

  /**
   * Validate the source configuration.
   * Override to require the URLs a kind needs.
   */
  protected validate(): SourceConfig {
    if (!this.source) {
      throw new Error("Source not initialized");
    }
    return this.source;
  }

  /**
   * Fetch source data (feed or page).
   */
  protected abstract fetchSourceData(source: SourceConfig): Promise<TSourceData>;

  /**
   * Turn fetched data into entries.
   */
  protected abstract parseToRawEntries(
    sourceData: TSourceData,
    source: SourceConfig,
  ): Promise<RawEntry[]>;

  /**
   * Drop entries without title or URL and apply the entry limit.
   */
  protected filterEntries(entries: RawEntry[]): RawEntry[] {
    const usable = entries.filter((entry) => {
      const keep = entry.title.trim().length > 0 && entry.url.trim().length > 0;
      if (!keep) {
        this.logger.debug(
          { step: "filterEntries", title: entry.title, url: entry.url },
          "Dropping entry without title or URL",
        );
      }
      return keep;
    });

    if (usable.length > this.maxEntries) {
      this.logger.debug(
        { step: "filterEntries", entryCount: usable.length, limitedTo: this.maxEntries },
        "Limiting entries",
      );
      return usable.slice(0, this.maxEntries);
    }
    return usable;
  }
}
