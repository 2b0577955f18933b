/**
 * Date parsing for registry listings.
 *
 * BIP sites print dates in several layouts ("śr., 11/02/2026 - 14:42",
 * "10 lut 2026, 12:34", "2026-02-10 08:15"). Patterns are tried in order
 * and the first one that yields a valid calendar date wins. All dates are
 * interpreted in local time.
 */

interface DateParts {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
}

interface DatePattern {
  name: string;
  regex: RegExp;
  toParts(match: RegExpMatchArray): DateParts | null;
}

/** Month stems; any inflection ("lut", "luty", "lutego") starts with one. */
const POLISH_MONTH_STEMS: ReadonlyArray<readonly [string, number]> = [
  ["sty", 1],
  ["lut", 2],
  ["mar", 3],
  ["kwi", 4],
  ["maj", 5],
  ["cze", 6],
  ["lip", 7],
  ["sie", 8],
  ["wrz", 9],
  ["paź", 10],
  ["paz", 10],
  ["lis", 11],
  ["gru", 12],
];

/** Longest texts still treated as a date cell of a registry table. */
export const MAX_DATE_CELL_LENGTH = 60;

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : parseInt(value, 10);
}

function polishMonth(word: string): number | null {
  const lower = word.toLowerCase();
  const found = POLISH_MONTH_STEMS.find(([stem]) => lower.startsWith(stem));
  return found ? found[1] : null;
}

export const DATE_PATTERNS: readonly DatePattern[] = [
  {
    name: "iso",
    regex: /\b(\d{4})-(\d{2})-(\d{2})(?:[T\s]+(\d{1,2}):(\d{2}))?/,
    toParts: (m) => ({
      year: Number(m[1]),
      month: Number(m[2]),
      day: Number(m[3]),
      hour: toNumber(m[4]),
      minute: toNumber(m[5]),
    }),
  },
  {
    name: "numeric",
    regex: /\b(\d{1,2})[./-](\d{1,2})[./-](\d{4})(?:\D{1,5}?(\d{1,2}):(\d{2}))?/,
    toParts: (m) => ({
      year: Number(m[3]),
      month: Number(m[2]),
      day: Number(m[1]),
      hour: toNumber(m[4]),
      minute: toNumber(m[5]),
    }),
  },
  {
    name: "polish-month",
    regex:
      /\b(\d{1,2})\.?\s+((?:sty|lut|mar|kwi|maj|cze|lip|sie|wrz|paź|paz|lis|gru)[a-ząćęłńóśźż]*)\.?\s+(\d{4})(?:\s*,?\s*(?:godz\.?\s*)?(\d{1,2}):(\d{2}))?/iu,
    toParts: (m) => {
      const month = polishMonth(m[2]);
      if (month === null) return null;
      return {
        year: Number(m[3]),
        month,
        day: Number(m[1]),
        hour: toNumber(m[4]),
        minute: toNumber(m[5]),
      };
    },
  },
];

function buildDate(parts: DateParts): Date | null {
  const { year, month, day, hour = 0, minute = 0 } = parts;
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  if (hour > 23 || minute > 59) return null;

  const date = new Date(year, month - 1, day, hour, minute);
  // Rejects overflowing days such as 31.02
  if (date.getMonth() !== month - 1 || date.getDate() !== day) return null;
  return date;
}

/**
 * Find the first date in a text.
 */
export function parseDateText(text: string): Date | null {
  const normalized = text.replace(/\s+/g, " ").trim();
  if (!normalized) return null;

  for (const pattern of DATE_PATTERNS) {
    const match = normalized.match(pattern.regex);
    if (!match) continue;
    const parts = pattern.toParts(match);
    const date = parts ? buildDate(parts) : null;
    if (date) return date;
  }
  return null;
}

/**
 * Parse a table cell that may hold only a date. Long cells are body text.
 */
export function parseDateCell(text: string): Date | null {
  const trimmed = text.trim();
  if (!trimmed || trimmed.length > MAX_DATE_CELL_LENGTH) return null;
  return parseDateText(trimmed);
}
