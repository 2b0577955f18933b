/**
 * Base types for the aggregator system.
 */

/**
 * An entry as produced by extraction, before the source name is attached.
 */
export interface RawEntry {
  title: string;
  url: string;
  summary: string;
  content: string;
  published: Date | null;
}

/**
 * One normalized registry item of the aggregated list.
 */
export interface Entry extends Readonly<RawEntry> {
  readonly sourceName: string;
}

export type SourceKind = "rss" | "change_registry" | "html_list";

/**
 * One configured BIP source, with defaults already applied.
 */
export interface SourceConfig {
  name: string;
  listUrl?: string;
  rssUrl?: string;
  changeRegistry: boolean;
  maxEntries?: number;
  /** Request timeout in milliseconds. */
  timeout?: number;
  /** Explicit matcher order, overriding the kind's defaults. */
  matchers?: string[];
}

export interface FetchSettings {
  timeout: number;
  userAgent: string;
}

export interface AggregatorMetadata {
  id: SourceKind;
  name: string;
  description: string;
  defaultMaxEntries: number;
}
