/**
 * Last resort: every sufficiently long link in the main content area,
 * e.g. a BIP home page listing the newest documents.
 */

import type { CheerioAPI } from "cheerio";

import type { EntryCollector, EntryMatcher } from "./types";

const CONTENT_ROOTS = ["main", "article", "#content", "body"];

export const contentLinksMatcher: EntryMatcher = {
  id: "content-links",
  description: "Links with descriptive labels inside the main content area",

  match($: CheerioAPI, collector: EntryCollector): void {
    const rootSelector = CONTENT_ROOTS.find((selector) => $(selector).length > 0);
    if (!rootSelector) return;

    for (const link of $(rootSelector).first().find("a[href]").toArray()) {
      if (collector.isFull) return;

      const $link = $(link);
      const url = collector.resolve($link.attr("href"));
      // Links back to the registry itself are paging and filtering controls
      if (!url || url.toLowerCase().includes("rejestr-zmian")) continue;

      collector.add(url, $link.text(), 10);
    }
  },
};
