/**
 * Aggregator registry.
 *
 * Maps a configured source to the aggregator that handles its kind.
 */

import { BaseAggregator } from "./base/aggregator";
import type { AggregatorMetadata, SourceConfig, SourceKind } from "./base/types";
import { ChangeRegistryAggregator } from "./change_registry";
import { HtmlListAggregator } from "./html_list";
import { RssAggregator } from "./rss";

const aggregatorClasses = new Map<SourceKind, new () => BaseAggregator>([
  ["rss", RssAggregator],
  ["change_registry", ChangeRegistryAggregator],
  ["html_list", HtmlListAggregator],
]);

/**
 * Decide how a source is read. A feed always wins over the list page.
 */
export function getSourceKind(source: SourceConfig): SourceKind {
  if (source.rssUrl) return "rss";
  if (source.changeRegistry) return "change_registry";
  return "html_list";
}

/**
 * Get aggregator metadata.
 */
export function getAggregatorMetadata(id: SourceKind): AggregatorMetadata | null {
  const AggregatorClass = aggregatorClasses.get(id);
  if (!AggregatorClass) return null;

  const instance = new AggregatorClass();
  return {
    id: instance.id,
    name: instance.name,
    description: instance.description,
    defaultMaxEntries: instance.defaultMaxEntries,
  };
}

export function getAllAggregators(): AggregatorMetadata[] {
  const aggregators: AggregatorMetadata[] = [];
  for (const id of aggregatorClasses.keys()) {
    const metadata = getAggregatorMetadata(id);
    if (metadata) aggregators.push(metadata);
  }
  return aggregators;
}

/**
 * Create a fresh aggregator instance for a source.
 */
export function getAggregatorForSource(source: SourceConfig): BaseAggregator {
  const kind = getSourceKind(source);
  const AggregatorClass = aggregatorClasses.get(kind) ?? HtmlListAggregator;
  return new AggregatorClass();
}
