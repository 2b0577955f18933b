/**
 * Change registry rendered as a table
 * ("Zmieniono | Tytuł | Użytkownik | Informacja" and similar layouts).
 */

import type { CheerioAPI } from "cheerio";

import { parseDateCell } from "../base/utils/dates";

import type { EntryCollector, EntryMatcher } from "./types";

export const registryTableMatcher: EntryMatcher = {
  id: "registry-table",
  description: "Table rows with a document link and a date cell",

  match($: CheerioAPI, collector: EntryCollector): void {
    for (const row of $("table tr").toArray()) {
      if (collector.isFull) return;

      const $row = $(row);
      const $link = $row.find("a[href]").first();
      const linkEl = $link.get(0);
      if (!linkEl) continue;

      const url = collector.resolve($link.attr("href"));
      if (!url || collector.hasSeen(url)) continue;

      // The first non-link cell holding a date is the change date
      let published: Date | null = null;
      for (const cell of $row.children("td, th").toArray()) {
        const $cell = $(cell);
        if ($cell.find("a").toArray().includes(linkEl)) continue;
        published = parseDateCell($cell.text());
        if (published) break;
      }

      collector.add(url, $link.text(), 5, { published });
    }
  },
};
