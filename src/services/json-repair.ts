/**
 * JSON repair utilities for model answers.
 * Handles Markdown code fences, prose around the JSON and arrays cut off
 * by the token limit.
 */

import { logger } from "../utils/logger";

const CODE_FENCE = /```(?:json|html)?\s*([\s\S]*?)```/i;

/**
 * Remove a surrounding Markdown code fence, if any.
 */
export function stripCodeFence(content: string): string {
  const fenced = content.match(CODE_FENCE);
  return (fenced ? fenced[1] : content).trim();
}

/**
 * Cut a JSON array out of a model answer and close it if it was truncated.
 *
 * @returns The repaired array text, or null when the answer has no array
 */
export function repairJsonArray(content: string): string | null {
  const text = stripCodeFence(content);
  const start = text.indexOf("[");
  if (start === -1) {
    return null;
  }

  const end = text.lastIndexOf("]");
  if (end > start) {
    return removeTrailingCommas(text.substring(start, end + 1));
  }

  // Truncated: keep complete elements only
  let body = text.substring(start + 1);
  const lastComma = body.lastIndexOf(",");
  body = lastComma === -1 ? "" : body.substring(0, lastComma);
  const repaired = `[${body}]`;

  logger.debug({ original: text.length, repaired: repaired.length }, "Closed truncated JSON array");
  return removeTrailingCommas(repaired);
}

function removeTrailingCommas(json: string): string {
  return json.replace(/,\s*([\]}])/g, "$1");
}

/**
 * Parse a JSON array out of a model answer.
 *
 * @returns The parsed array, or null when no array could be recovered
 */
export function parseJsonArray(content: string): unknown[] | null {
  const repaired = repairJsonArray(content);
  if (repaired === null) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(repaired);
    return Array.isArray(parsed) ? parsed : null;
  } catch (error) {
    logger.debug({ error, repaired }, "Repaired JSON array still invalid");
    return null;
  }
}
