/**
 * Title cleanup for scraped links.
 */

/** Link labels that belong to page navigation, not to registry entries. */
const NAVIGATION_LABELS = new Set([
  "następna",
  "następne",
  "poprzednia",
  "poprzednie",
  "pierwsza",
  "ostatnia",
  "dalej",
  "wstecz",
  "więcej",
  "czytaj więcej",
  "zobacz więcej",
  "pokaż więcej",
  "rozwiń",
  "zwiń",
  "drukuj",
  "powrót",
  "do góry",
  "strona główna",
  "next",
  "previous",
  "prev",
  "first",
  "last",
  "more",
]);

const NAVIGATION_SYMBOLS = /^[\s«»‹›<>|.…\-–—]+$/;
const PAGE_NUMBER = /^(?:strona\s+)?\d{1,4}$/i;

/**
 * Collapse whitespace (including non-breaking spaces) in link text.
 */
export function normalizeTitle(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Check if a link label is pagination or other navigation boilerplate.
 */
export function isNavigationTitle(title: string): boolean {
  const normalized = normalizeTitle(title).toLowerCase();
  if (!normalized) return true;
  if (NAVIGATION_SYMBOLS.test(normalized)) return true;
  if (PAGE_NUMBER.test(normalized)) return true;

  const withoutArrows = normalized.replace(/[«»‹›<>]/g, "").trim();
  return NAVIGATION_LABELS.has(withoutArrows);
}

/**
 * Clean a title and decide whether it is usable.
 *
 * @returns The cleaned title, or null when it is too short or navigation
 */
export function acceptTitle(text: string, minLength: number): string | null {
  const title = normalizeTitle(text);
  if (title.length < minLength || isNavigationTitle(title)) {
    return null;
  }
  return title;
}
