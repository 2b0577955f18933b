/**
 * Matcher types.
 *
 * A matcher recognizes one listing layout and feeds every fragment it finds
 * into an EntryCollector. Matchers never share state.
 */

import type { CheerioAPI } from "cheerio";

import { resolveUrl } from "../base/utils/links";
import { acceptTitle } from "../base/utils/titles";
import type { RawEntry } from "../base/types";

export interface EntryMatcher {
  readonly id: string;
  readonly description: string;
  match($: CheerioAPI, collector: EntryCollector): void;
}

export interface CandidateExtras {
  summary?: string;
  content?: string;
  published?: Date | null;
}

/**
 * Accumulates entries of one page: resolves links, drops unusable titles,
 * skips URLs already seen on the page and stops at the entry limit.
 */
export class EntryCollector {
  readonly entries: RawEntry[] = [];
  private readonly seen = new Set<string>();

  constructor(
    readonly pageUrl: string,
    readonly maxEntries: number,
  ) {}

  get isFull(): boolean {
    return this.entries.length >= this.maxEntries;
  }

  /**
   * Resolve an href found on the page.
   */
  resolve(href: string | undefined): string | null {
    return resolveUrl(this.pageUrl, href);
  }

  hasSeen(url: string): boolean {
    return this.seen.has(url);
  }

  /**
   * Add a fragment.
   * @returns true when the fragment became an entry
   */
  add(
    url: string | null,
    label: string,
    minTitleLength: number,
    extras: CandidateExtras = {},
  ): boolean {
    if (!url || this.isFull || this.seen.has(url)) {
      return false;
    }

    const title = acceptTitle(label, minTitleLength);
    if (!title) {
      return false;
    }

    this.seen.add(url);
    this.entries.push({
      title,
      url,
      summary: extras.summary ?? "",
      content: extras.content ?? "",
      published: extras.published ?? null,
    });
    return true;
  }
}
