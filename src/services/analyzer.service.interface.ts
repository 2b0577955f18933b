/**
 * Analyzer interface.
 *
 * The pipeline only talks to this interface, so the local model and the
 * remote webhook are interchangeable.
 */

import type { Entry } from "../aggregators/base/types";

export interface EntryAnalyzer {
  readonly name: string;

  /**
   * Select the entries that matter to residents.
   */
  filter(entries: readonly Entry[], instruction?: string): Promise<Entry[]>;

  /**
   * Write the article for the selected entries.
   */
  draft(entries: readonly Entry[], instruction?: string): Promise<string>;
}

export interface DigestResult {
  selected: Entry[];
  /** null when no entry was selected. */
  article: string | null;
}
