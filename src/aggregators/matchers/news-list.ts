/**
 * Generic announcement lists found on BIP "ogłoszenia" and news pages.
 */

import type { CheerioAPI } from "cheerio";

import { parseDateText } from "../base/utils/dates";

import type { EntryCollector, EntryMatcher } from "./types";

/** Tried in order; earlier selectors are more specific. */
const ITEM_SELECTORS = [
  "article",
  ".news-item",
  ".ogloszenie",
  ".aktualnosc",
  ".komunikat",
  "[class*='news']",
  "[class*='ogloszen']",
  ".list-item",
  "li a",
];

export const newsListMatcher: EntryMatcher = {
  id: "news-list",
  description: "Announcement and news list items",

  match($: CheerioAPI, collector: EntryCollector): void {
    for (const selector of ITEM_SELECTORS) {
      for (const item of $(selector).toArray()) {
        if (collector.isFull) return;

        const $item = $(item);
        const $link = $item.is("a") ? $item : $item.find("a[href]").first();
        if ($link.length === 0) continue;

        const url = collector.resolve($link.attr("href"));
        if (!url || collector.hasSeen(url)) continue;

        let published: Date | null = null;
        if (!$item.is("a")) {
          const $copy = $item.clone();
          $copy.find("a").remove();
          published = parseDateText($copy.text());
        }

        collector.add(url, $link.text(), 3, { published });
      }
    }
  },
};
