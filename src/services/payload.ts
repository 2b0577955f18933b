/**
 * JSON payload handed to the analyzer boundary and written in scrape-only mode.
 */

import type { Entry } from "../aggregators/base/types";

export const DEFAULT_INSTRUCTION =
  "Na podstawie powyższych wpisów z BIP przygotuj artykuł " +
  "nadający się do publikacji na WordPressie (tytuł, lead, treść).";

export interface EntryPayload {
  title: string;
  url: string;
  summary: string;
  content: string;
  published: string | null;
  source_name: string;
}

export interface AgentPayload {
  entries: EntryPayload[];
  instruction: string;
}

export function toEntryPayload(entry: Entry): EntryPayload {
  return {
    title: entry.title,
    url: entry.url,
    summary: entry.summary,
    content: entry.content,
    published: entry.published ? entry.published.toISOString() : null,
    source_name: entry.sourceName,
  };
}

export function buildPayload(entries: readonly Entry[], instruction?: string): AgentPayload {
  return {
    entries: entries.map(toEntryPayload),
    instruction: instruction || DEFAULT_INSTRUCTION,
  };
}

export function serializePayload(payload: AgentPayload): string {
  return JSON.stringify(payload, null, 2);
}
