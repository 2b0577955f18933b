/**
 * Aggregation service.
 *
 * Runs every configured source one after another, merges the results,
 * deduplicates by URL and orders the combined list.
 */

import { DEFAULT_FETCH_SETTINGS, type BaseAggregator } from "../aggregators/base/aggregator";
import type {
  Entry,
  FetchSettings,
  SourceConfig,
  SourceKind,
} from "../aggregators/base/types";
import { getAggregatorForSource, getSourceKind } from "../aggregators/registry";
import { NoEntriesError } from "../errors";
import { createLogger } from "../utils/logger";

const logger = createLogger({ component: "aggregation" });

export interface SourceOutcome {
  source: string;
  kind: SourceKind;
  entryCount: number;
  error?: string;
}

export interface AggregationResult {
  entries: Entry[];
  outcomes: SourceOutcome[];
}

export interface AggregationOptions {
  settings?: FetchSettings;
  /** Replaces the registry lookup, e.g. to inject stub aggregators. */
  createAggregator?: (source: SourceConfig) => BaseAggregator;
}

/**
 * Keep the first entry seen for every URL.
 */
export function deduplicateEntries<T extends { url: string }>(entries: T[]): T[] {
  const seen = new Set<string>();
  return entries.filter((entry) => {
    if (seen.has(entry.url)) return false;
    seen.add(entry.url);
    return true;
  });
}

/**
 * Newest first; undated entries go last and keep their incoming order.
 */
export function sortEntries<T extends { published: Date | null }>(entries: T[]): T[] {
  return entries
    .map((entry, index) => ({ entry, index }))
    .sort((a, b) => {
      const aTime = a.entry.published?.getTime() ?? null;
      const bTime = b.entry.published?.getTime() ?? null;
      if (aTime === null && bTime === null) return a.index - b.index;
      if (aTime === null) return 1;
      if (bTime === null) return -1;
      return bTime - aTime || a.index - b.index;
    })
    .map(({ entry }) => entry);
}

/**
 * Scrape all sources in configuration order.
 *
 * A failing source is logged and contributes nothing. Only a run without
 * any entry raises NoEntriesError.
 */
export async function aggregateSources(
  sources: SourceConfig[],
  options: AggregationOptions = {},
): Promise<AggregationResult> {
  const settings = options.settings ?? DEFAULT_FETCH_SETTINGS;
  const createAggregator = options.createAggregator ?? getAggregatorForSource;
  const startTime = Date.now();

  const collected: Entry[] = [];
  const outcomes: SourceOutcome[] = [];

  for (const source of sources) {
    const kind = getSourceKind(source);
    const aggregator = createAggregator(source);
    aggregator.initialize(source, settings);

    try {
      const rawEntries = await aggregator.aggregate();
      for (const entry of rawEntries) {
        collected.push({ ...entry, sourceName: source.name });
      }
      outcomes.push({ source: source.name, kind, entryCount: rawEntries.length });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ source: source.name, kind, error }, `Source failed, skipping: ${message}`);
      outcomes.push({ source: source.name, kind, entryCount: 0, error: message });
    }
  }

  const entries = sortEntries(deduplicateEntries(collected));
  const failedSources = outcomes.filter((o) => o.error !== undefined).map((o) => o.source);

  logger.info(
    {
      sourceCount: sources.length,
      failedSources,
      collected: collected.length,
      entryCount: entries.length,
      elapsed: Date.now() - startTime,
    },
    "Aggregation finished",
  );

  if (entries.length === 0) {
    const message =
      failedSources.length === sources.length
        ? `All ${sources.length} sources failed`
        : "No source produced any entries";
    throw new NoEntriesError(message, failedSources);
  }

  return { entries, outcomes };
}
