/**
 * RSS/Atom aggregator.
 *
 * Used for every source with an `rssUrl`; the list page is never scraped
 * for such sources.
 */

import { AggregationError } from "../errors";

import { BaseAggregator } from "./base/aggregator";
import { fetchFeed, type FeedItem, type FeedOutput } from "./base/fetch";
import type { RawEntry, SourceConfig } from "./base/types";
import { resolveUrl } from "./base/utils/links";
import { normalizeTitle } from "./base/utils/titles";

const MAX_SUMMARY_LENGTH = 500;

function parseItemDate(item: FeedItem): Date | null {
  for (const value of [item.isoDate, item.pubDate]) {
    if (!value) continue;
    const date = new Date(value);
    if (!Number.isNaN(date.getTime())) return date;
  }
  return null;
}

export class RssAggregator extends BaseAggregator<FeedOutput> {
  override readonly id = "rss" as const;
  override readonly name: string = "RSS/Atom feed";
  override readonly description: string =
    "Reads entries from the source's RSS or Atom feed.";

  protected override validate(): SourceConfig {
    const source = super.validate();
    if (!source.rssUrl) {
      throw new AggregationError("Source has no rssUrl", source.name);
    }
    return source;
  }

  protected override async fetchSourceData(source: SourceConfig): Promise<FeedOutput> {
    return fetchFeed(source.rssUrl ?? "", this.settings, source.name);
  }

  protected override async parseToRawEntries(
    feed: FeedOutput,
    source: SourceConfig,
  ): Promise<RawEntry[]> {
    const feedUrl = source.rssUrl ?? "";
    // The channel link may itself be relative to the feed
    const base = resolveUrl(feedUrl, feed.link) ?? feedUrl;

    const entries = feed.items.map((item): RawEntry => {
      const summary = (item.contentSnippet ?? item.summary ?? "").trim();
      return {
        title: normalizeTitle(item.title ?? ""),
        url: resolveUrl(base, item.link) ?? "",
        summary: summary.slice(0, MAX_SUMMARY_LENGTH),
        content: item["content:encoded"] || item.content || summary,
        published: parseItemDate(item),
      };
    });

    this.logger.debug(
      { step: "parseToRawEntries", itemCount: feed.items.length },
      "Parsed feed items",
    );
    return entries;
  }
}
