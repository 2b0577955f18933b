/**
 * Matcher registry.
 *
 * Supporting a new listing layout means writing one EntryMatcher and
 * adding it here; sources pick it up through their `matchers` option.
 */

import { logger } from "../../utils/logger";

import { contentLinksMatcher } from "./content-links";
import { newsListMatcher } from "./news-list";
import { recentBlocksMatcher } from "./recent-blocks";
import { registryTableMatcher } from "./registry-table";
import type { EntryMatcher } from "./types";

export { EntryCollector } from "./types";
export type { EntryMatcher, CandidateExtras } from "./types";

const matchers = new Map<string, EntryMatcher>(
  [registryTableMatcher, recentBlocksMatcher, contentLinksMatcher, newsListMatcher].map(
    (matcher) => [matcher.id, matcher],
  ),
);

export const CHANGE_REGISTRY_MATCHERS: readonly string[] = [
  registryTableMatcher.id,
  recentBlocksMatcher.id,
  contentLinksMatcher.id,
];

export const HTML_LIST_MATCHERS: readonly string[] = [newsListMatcher.id];

export function getMatcherIds(): string[] {
  return [...matchers.keys()];
}

/**
 * Get matcher by ID.
 */
export function getMatcherById(id: string): EntryMatcher | null {
  const matcher = matchers.get(id);
  if (!matcher) {
    logger.warn({ matcherId: id }, "Matcher not found");
    return null;
  }
  return matcher;
}
