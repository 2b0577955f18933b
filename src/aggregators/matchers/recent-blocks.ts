/**
 * "Recently added" blocks: Drupal views rows, nodes and article cards
 * carrying a heading link and a date line.
 */

import type { Cheerio, CheerioAPI } from "cheerio";
import type { AnyNode } from "domhandler";

import { parseDateText } from "../base/utils/dates";
import { normalizeTitle } from "../base/utils/titles";

import type { EntryCollector, EntryMatcher } from "./types";

const BLOCK_SELECTOR = [
  ".view-content .views-row",
  ".node",
  ".aktualnosc",
  "[class*='last-added']",
  "article",
  ".item",
].join(", ");

const DATE_SELECTOR = "time, .date, [class*='date'], [class*='data']";

const MAX_SUMMARY_LENGTH = 500;

function findBlockDate($: CheerioAPI, $block: Cheerio<AnyNode>): Date | null {
  for (const el of $block.find(DATE_SELECTOR).toArray()) {
    const $el = $(el);
    const date = parseDateText($el.attr("datetime") ?? "") ?? parseDateText($el.text());
    if (date) return date;
  }

  // Anything but the links themselves, so dates inside titles are ignored
  const $copy = $block.clone();
  $copy.find("a").remove();
  return parseDateText($copy.text());
}

function findBlockSummary($: CheerioAPI, $block: Cheerio<AnyNode>, title: string): string {
  for (const p of $block.find("p").toArray()) {
    const $p = $(p);
    if ($p.find("a").length > 0) continue;
    const text = normalizeTitle($p.text());
    if (text && text !== title) {
      return text.slice(0, MAX_SUMMARY_LENGTH);
    }
  }
  return "";
}

export const recentBlocksMatcher: EntryMatcher = {
  id: "recent-blocks",
  description: "Repeated content blocks with a link and a date line",

  match($: CheerioAPI, collector: EntryCollector): void {
    for (const block of $(BLOCK_SELECTOR).toArray()) {
      if (collector.isFull) return;

      const $block = $(block);
      const $link = $block.find("a[href]").first();
      if ($link.length === 0) continue;

      const url = collector.resolve($link.attr("href"));
      if (!url || collector.hasSeen(url)) continue;

      const label = $link.text();
      collector.add(url, label, 5, {
        published: findBlockDate($, $block),
        summary: findBlockSummary($, $block, normalizeTitle(label)),
      });
    }
  },
};
