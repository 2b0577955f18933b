/**
 * Fetch utilities for aggregators.
 */

import axios, { type AxiosResponse } from "axios";
import Parser from "rss-parser";

import { describeHttpError, getHttpStatus } from "../../utils/http-errors";
import { logger } from "../../utils/logger";

import { ContentFetchError, ParseError } from "./exceptions";
import type { FetchSettings } from "./types";

export type FeedItem = Parser.Item & {
  "content:encoded"?: string;
  summary?: string;
};

export type FeedOutput = Parser.Output<FeedItem>;

const META_CHARSET_PATTERN =
  /<meta[^>]+charset\s*=\s*["']?\s*([\w-]+)/i;
const XML_ENCODING_PATTERN = /^(?:\u00ef\u00bb\u00bf)?\s*<\?xml[^>]+encoding\s*=\s*["']([\w-]+)["']/i;

/**
 * Find the declared charset of an HTML or XML response.
 * The Content-Type header wins over an `<?xml encoding>` or `<meta>`
 * declaration.
 */
export function detectCharset(
  contentType: string | undefined,
  body: Uint8Array,
): string {
  const fromHeader = contentType?.match(/charset\s*=\s*["']?([\w-]+)/i);
  if (fromHeader) {
    return fromHeader[1].toLowerCase();
  }

  const head = Buffer.from(body.subarray(0, 2048)).toString("latin1");
  const fromXml = head.match(XML_ENCODING_PATTERN);
  if (fromXml) {
    return fromXml[1].toLowerCase();
  }

  const fromMeta = head.match(META_CHARSET_PATTERN);
  if (fromMeta) {
    return fromMeta[1].toLowerCase();
  }

  return "utf-8";
}

/**
 * Decode a response body, falling back to UTF-8 for unknown charsets.
 */
export function decodeHtml(body: Uint8Array, charset: string): string {
  try {
    return new TextDecoder(charset).decode(body);
  } catch (error) {
    logger.warn({ charset, error }, "Unsupported charset, decoding as UTF-8");
    return new TextDecoder("utf-8").decode(body);
  }
}

function decodeResponse(response: AxiosResponse<ArrayBuffer>): { text: string; charset: string } {
  const body = new Uint8Array(response.data);
  const contentType = response.headers["content-type"];
  const charset = detectCharset(
    typeof contentType === "string" ? contentType : undefined,
    body,
  );
  return { text: decodeHtml(body, charset), charset };
}

function toFetchError(
  url: string,
  error: unknown,
  settings: FetchSettings,
  sourceName?: string,
): ContentFetchError {
  const reason = describeHttpError(error, settings.timeout);
  return new ContentFetchError(
    `Failed to fetch ${url}: ${reason}`,
    sourceName,
    getHttpStatus(error) ?? undefined,
    error instanceof Error ? error : undefined,
  );
}

/**
 * Fetch and parse an RSS or Atom feed.
 *
 * Network and status failures raise ContentFetchError, unparseable
 * documents raise ParseError.
 */
export async function fetchFeed(
  feedUrl: string,
  settings: FetchSettings,
  sourceName?: string,
): Promise<FeedOutput> {
  const startTime = Date.now();
  logger.debug(
    { feedUrl, timeout: settings.timeout, step: "fetchFeed", subStep: "start" },
    "Fetching feed",
  );

  let body: string;
  try {
    const response = await axios.get<ArrayBuffer>(feedUrl, {
      timeout: settings.timeout,
      headers: { "User-Agent": settings.userAgent },
      responseType: "arraybuffer",
    });
    body = decodeResponse(response).text;
  } catch (error) {
    throw toFetchError(feedUrl, error, settings, sourceName);
  }

  // parseString avoids rss-parser's own HTTP client
  const parser = new Parser<Record<string, unknown>, FeedItem>({
    customFields: { item: ["summary"] },
  });

  let feed: FeedOutput;
  try {
    feed = await parser.parseString(body);
  } catch (error) {
    throw new ParseError(
      `Malformed feed at ${feedUrl}: ${error instanceof Error ? error.message : String(error)}`,
      sourceName,
      error instanceof Error ? error : undefined,
    );
  }

  logger.debug(
    {
      feedUrl,
      itemCount: feed.items.length,
      elapsed: Date.now() - startTime,
      step: "fetchFeed",
      subStep: "complete",
    },
    "Feed fetched and parsed",
  );

  return feed;
}

/**
 * Fetch an HTML page and decode it with its declared charset.
 */
export async function fetchPage(
  url: string,
  settings: FetchSettings,
  sourceName?: string,
): Promise<string> {
  const startTime = Date.now();
  logger.debug(
    { url, timeout: settings.timeout, step: "fetchPage", subStep: "start" },
    "Fetching page",
  );

  try {
    const response = await axios.get<ArrayBuffer>(url, {
      timeout: settings.timeout,
      headers: { "User-Agent": settings.userAgent },
      responseType: "arraybuffer",
    });

    const { text: html, charset } = decodeResponse(response);

    logger.debug(
      {
        url,
        charset,
        length: html.length,
        elapsed: Date.now() - startTime,
        step: "fetchPage",
        subStep: "complete",
      },
      "Page fetched",
    );

    return html;
  } catch (error) {
    throw toFetchError(url, error, settings, sourceName);
  }
}
