/**
 * Entry analyzer backed by a local Ollama model.
 *
 * Filtering runs in batches so that long registries fit into the model's
 * context window; the article is drafted in a single request. With an
 * extractor model configured the two steps use different models.
 */

import { format } from "date-fns";

import type { Entry } from "../aggregators/base/types";
import type { OllamaConfig } from "../config";
import { AnalyzerError } from "../errors";
import { createLogger } from "../utils/logger";

import type { EntryAnalyzer } from "./analyzer.service.interface";
import { parseJsonArray, stripCodeFence } from "./json-repair";
import { OllamaClient } from "./ollama.service";
import {
  ARTICLE_SYSTEM_PROMPT,
  FILTER_SYSTEM_PROMPT,
  buildArticlePrompt,
  buildFilterPrompt,
} from "./prompts";

const logger = createLogger({ component: "ollama-analyzer" });

const MAX_TITLE_LENGTH = 120;
const MAX_SUMMARY_LENGTH = 300;

// Keys models use when they answer with objects instead of bare numbers
const NUMBER_KEYS = new Set(["numer", "nr", "id", "index"]);

export function chunkEntries<T>(entries: readonly T[], chunkSize: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < entries.length; i += chunkSize) {
    chunks.push(entries.slice(i, i + chunkSize));
  }
  return chunks;
}

/**
 * Render entries as the numbered list the prompts refer to.
 */
export function entriesToText(entries: readonly Entry[]): string {
  const lines: string[] = [];
  entries.forEach((entry, index) => {
    const title =
      entry.title.length > MAX_TITLE_LENGTH
        ? `${entry.title.slice(0, MAX_TITLE_LENGTH)}...`
        : entry.title;
    lines.push(`${index + 1}. [${title}]`);
    lines.push(`   Źródło: ${entry.sourceName}`);
    lines.push(`   URL: ${entry.url}`);
    if (entry.published) {
      lines.push(`   Data: ${format(entry.published, "yyyy-MM-dd")}`);
    }
    const summary = entry.summary.replace(/\s+/g, " ").trim();
    if (summary) {
      lines.push(`   Opis: ${summary.slice(0, MAX_SUMMARY_LENGTH)}`);
    }
    lines.push("");
  });
  return lines.join("\n");
}

function toItemNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^\s*\d+\s*$/.test(value)) return parseInt(value, 10);
  if (value && typeof value === "object" && !Array.isArray(value)) {
    for (const [key, nested] of Object.entries(value)) {
      if (!NUMBER_KEYS.has(key)) continue;
      const number = toItemNumber(nested);
      if (number !== null) return number;
    }
  }
  return null;
}

/**
 * Read the item numbers a model selected.
 *
 * Accepts a JSON array (possibly fenced or truncated) or a bare list of
 * numbers. Numbers outside 1..count are ignored.
 *
 * @returns Selected 1-based numbers in ascending order, or null when the
 *   answer cannot be understood
 */
export function parseSelection(answer: string, count: number): number[] | null {
  let candidates: unknown[] | null = parseJsonArray(answer);
  if (candidates === null) {
    const bare = stripCodeFence(answer);
    if (!/^[\d\s,;]+$/.test(bare)) return null;
    candidates = bare.match(/\d+/g) ?? [];
  }

  const picked = new Set<number>();
  for (const candidate of candidates) {
    const number = toItemNumber(candidate);
    if (number !== null && number >= 1 && number <= count) {
      picked.add(number);
    }
  }
  return [...picked].sort((a, b) => a - b);
}

export class OllamaAnalyzer implements EntryAnalyzer {
  readonly name = "ollama";
  private readonly client: OllamaClient;

  constructor(
    private readonly config: OllamaConfig,
    client?: OllamaClient,
  ) {
    this.client = client ?? new OllamaClient(config);
  }

  get filterModel(): string {
    return this.config.extractorModel ?? this.config.model;
  }

  get writerModel(): string {
    return this.config.model;
  }

  async filter(entries: readonly Entry[], instruction?: string): Promise<Entry[]> {
    if (entries.length === 0) return [];

    const batches = chunkEntries(entries, this.config.chunkSize);
    const selected: Entry[] = [];
    let failedBatches = 0;

    logger.info(
      { model: this.filterModel, batchCount: batches.length, chunkSize: this.config.chunkSize },
      "Filtering entries",
    );

    for (const [index, batch] of batches.entries()) {
      const batchNumber = index + 1;
      try {
        const answer = await this.client.generate(
          this.filterModel,
          buildFilterPrompt(entriesToText(batch), instruction),
          FILTER_SYSTEM_PROMPT,
        );
        const picks = parseSelection(answer, batch.length);
        if (picks === null) {
          failedBatches++;
          logger.warn({ batch: batchNumber, answer: answer.slice(0, 200) }, "Unreadable filter answer");
          continue;
        }
        for (const pick of picks) {
          selected.push(batch[pick - 1]);
        }
        logger.debug({ batch: batchNumber, picks }, "Batch filtered");
      } catch (error) {
        if (!(error instanceof AnalyzerError)) throw error;
        failedBatches++;
        logger.warn({ batch: batchNumber, error }, "Filter batch failed");
      }
    }

    if (failedBatches === batches.length) {
      throw new AnalyzerError(`All ${batches.length} filter batches failed`);
    }

    logger.info(
      { selected: selected.length, total: entries.length, failedBatches },
      "Filtering complete",
    );
    return selected;
  }

  async draft(entries: readonly Entry[], instruction?: string): Promise<string> {
    logger.info({ model: this.writerModel, entryCount: entries.length }, "Drafting article");

    const answer = await this.client.generate(
      this.writerModel,
      buildArticlePrompt(entriesToText(entries), instruction),
      ARTICLE_SYSTEM_PROMPT,
    );
    const article = stripCodeFence(answer);
    if (!article) {
      throw new AnalyzerError("Model returned an empty article");
    }
    return article;
  }
}
