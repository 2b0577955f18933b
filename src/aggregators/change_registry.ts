/**
 * Change registry aggregator.
 *
 * Specialized list aggregator for "rejestr zmian" pages: registry tables
 * first, then "recently added" blocks, then any descriptive content link.
 */

import type { SourceKind } from "./base/types";
import { HtmlListAggregator } from "./html_list";
import { CHANGE_REGISTRY_MATCHERS } from "./matchers";

export class ChangeRegistryAggregator extends HtmlListAggregator {
  override readonly id: SourceKind = "change_registry";
  override readonly name: string = "Change registry";
  override readonly description: string =
    "Scrapes BIP change registry pages listing recently modified documents.";
  override readonly defaultMaxEntries: number = 25;
  override readonly defaultMatchers: readonly string[] = CHANGE_REGISTRY_MATCHERS;
}
