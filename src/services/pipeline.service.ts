/**
 * Digest pipeline: filter the aggregated entries, then draft the article.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { format } from "date-fns";

import type { Entry } from "../aggregators/base/types";
import { createLogger } from "../utils/logger";

import type { DigestResult, EntryAnalyzer } from "./analyzer.service.interface";
import { buildPayload, serializePayload } from "./payload";

const logger = createLogger({ component: "pipeline" });

/**
 * Run an analyzer over the aggregated entries.
 *
 * An empty selection is a normal outcome: no article is drafted.
 */
export async function runDigest(
  entries: readonly Entry[],
  analyzer: EntryAnalyzer,
  instruction?: string,
): Promise<DigestResult> {
  logger.info(
    { analyzer: analyzer.name, entryCount: entries.length, step: "filter", subStep: "start" },
    "Filtering entries",
  );
  const selected = await analyzer.filter(entries, instruction);

  if (selected.length === 0) {
    logger.info({ analyzer: analyzer.name }, "No relevant entries, skipping article");
    return { selected, article: null };
  }

  logger.info(
    { analyzer: analyzer.name, selected: selected.length, step: "draft", subStep: "start" },
    "Drafting article",
  );
  const article = await analyzer.draft(selected, instruction);
  return { selected, article };
}

export function snapshotFileName(now: Date = new Date()): string {
  return `bip_entries_${format(now, "yyyyMMdd_HHmmss")}.json`;
}

/**
 * Write the payload JSON for the given entries.
 */
export async function writePayloadFile(
  path: string,
  entries: readonly Entry[],
  instruction?: string,
): Promise<void> {
  await writeFile(path, `${serializePayload(buildPayload(entries, instruction))}\n`, "utf-8");
}

/**
 * Write a timestamped payload snapshot into a directory.
 *
 * Failures are logged, never thrown.
 *
 * @returns The snapshot path, or null when it could not be written
 */
export async function writeSnapshot(
  dir: string,
  entries: readonly Entry[],
  instruction?: string,
  now: Date = new Date(),
): Promise<string | null> {
  const path = join(dir, snapshotFileName(now));
  try {
    await mkdir(dir, { recursive: true });
    await writePayloadFile(path, entries, instruction);
    logger.info({ path, entryCount: entries.length }, "Snapshot written");
    return path;
  } catch (error) {
    logger.warn({ path, error }, "Could not write snapshot");
    return null;
  }
}
