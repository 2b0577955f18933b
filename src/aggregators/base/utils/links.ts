/**
 * Link resolution for scraped listings.
 */

const IGNORED_SCHEMES = ["javascript:", "mailto:", "tel:", "data:"];

/**
 * Resolve a scraped href against the page it was found on.
 *
 * @returns Absolute http(s) URL without fragment, or null when the link
 *   does not point to a document (empty, fragment-only, javascript:, mailto:…)
 */
export function resolveUrl(base: string, href: string | undefined): string | null {
  const trimmed = href?.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const lower = trimmed.toLowerCase();
  if (IGNORED_SCHEMES.some((scheme) => lower.startsWith(scheme))) {
    return null;
  }

  let resolved: URL;
  try {
    resolved = new URL(trimmed, base);
  } catch {
    return null;
  }

  if (resolved.protocol !== "http:" && resolved.protocol !== "https:") {
    return null;
  }

  resolved.hash = "";
  return resolved.href;
}
