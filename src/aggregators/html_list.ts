/**
 * HTML list aggregator.
 *
 * Scrapes the source's list page with a sequence of matchers; the first
 * matcher that finds entries wins.
 */

import * as cheerio from "cheerio";

import { AggregationError } from "../errors";

import { BaseAggregator } from "./base/aggregator";
import { fetchPage } from "./base/fetch";
import type { RawEntry, SourceConfig, SourceKind } from "./base/types";
import { EntryCollector, getMatcherById, HTML_LIST_MATCHERS } from "./matchers";

export class HtmlListAggregator extends BaseAggregator<string> {
  override readonly id: SourceKind = "html_list";
  override readonly name: string = "HTML list";
  override readonly description: string =
    "Scrapes announcement and news list pages.";

  /** Matchers tried when the source does not name its own. */
  readonly defaultMatchers: readonly string[] = HTML_LIST_MATCHERS;

  protected override validate(): SourceConfig {
    const source = super.validate();
    if (!source.listUrl) {
      throw new AggregationError("Source has no listUrl", source.name);
    }
    return source;
  }

  protected override async fetchSourceData(source: SourceConfig): Promise<string> {
    return fetchPage(source.listUrl ?? "", this.settings, source.name);
  }

  protected override async parseToRawEntries(
    html: string,
    source: SourceConfig,
  ): Promise<RawEntry[]> {
    const $ = cheerio.load(html);
    const pageUrl = source.listUrl ?? "";
    const matcherIds = source.matchers?.length ? source.matchers : this.defaultMatchers;

    for (const matcherId of matcherIds) {
      const matcher = getMatcherById(matcherId);
      if (!matcher) continue;

      const collector = new EntryCollector(pageUrl, this.maxEntries);
      matcher.match($, collector);

      this.logger.debug(
        { step: "parseToRawEntries", matcher: matcher.id, entryCount: collector.entries.length },
        "Matcher finished",
      );

      if (collector.entries.length > 0) {
        return collector.entries;
      }
    }

    this.logger.info(
      { step: "parseToRawEntries", matchers: matcherIds },
      "No matcher found entries on the page",
    );
    return [];
  }
}
