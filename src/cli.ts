/**
 * Command line interface.
 *
 * Usage:
 *   bip-digest                       # scrape, send to the agent webhook (or save bip_output.json)
 *   bip-digest --scrape-only         # scrape, print the payload JSON on stdout
 *   bip-digest -o payload.json       # scrape, save the payload
 *   bip-digest --ollama -o art.html  # scrape, filter and draft with the local model
 */

import { writeFile } from "node:fs/promises";
import { parseArgs } from "node:util";

import type { Entry, FetchSettings } from "./aggregators/base/types";
import { loadConfig, type AppConfig } from "./config";
import { AnalyzerError, ConfigError, ServiceError } from "./errors";
import { aggregateSources } from "./services/aggregation.service";
import type { EntryAnalyzer } from "./services/analyzer.service.interface";
import { OllamaAnalyzer } from "./services/ollama-analyzer.service";
import { buildPayload, serializePayload } from "./services/payload";
import { runDigest, writePayloadFile, writeSnapshot } from "./services/pipeline.service";
import { WebhookAgent } from "./services/webhook.service";
import { createLogger } from "./utils/logger";

const logger = createLogger({ component: "cli" });

export const DEFAULT_PAYLOAD_FILE = "bip_output.json";
export const DEFAULT_ARTICLE_FILE = "artykul.html";

export const USAGE = `Usage: bip-digest [options]

Options:
  -c, --config <path>        configuration file (default: config.json or $BIP_CONFIG)
      --scrape-only          print the payload JSON to stdout, no model call
      --ollama               scrape, filter and draft the article with the local model
  -o, --output <path>        article file with --ollama, payload file otherwise ("-" = stdout)
  -i, --instruction <text>   extra instruction for the analyzer
      --model-extractor <m>  model used for filtering
      --model-writer <m>     model used for drafting
  -h, --help                 show this help
`;

export interface CliOptions {
  config?: string;
  scrapeOnly: boolean;
  ollama: boolean;
  output?: string;
  instruction?: string;
  modelExtractor?: string;
  modelWriter?: string;
  help: boolean;
}

export interface CliDependencies {
  loadConfig: (path?: string) => AppConfig;
  aggregate: typeof aggregateSources;
  createOllamaAnalyzer: (config: AppConfig["ollama"]) => EntryAnalyzer;
  createWebhookAgent: (config: AppConfig["agent"]) => EntryAnalyzer;
  writeSnapshot: typeof writeSnapshot;
  writePayloadFile: typeof writePayloadFile;
  writeStdout: (text: string) => void;
}

const defaultDependencies: CliDependencies = {
  loadConfig: (path) => loadConfig(path),
  aggregate: aggregateSources,
  createOllamaAnalyzer: (config) => new OllamaAnalyzer(config),
  createWebhookAgent: (config) => new WebhookAgent(config),
  writeSnapshot,
  writePayloadFile,
  writeStdout: (text) => {
    process.stdout.write(text);
  },
};

export function parseCliArgs(argv: string[]): CliOptions {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        config: { type: "string", short: "c" },
        "scrape-only": { type: "boolean", default: false },
        ollama: { type: "boolean", default: false },
        output: { type: "string", short: "o" },
        instruction: { type: "string", short: "i" },
        "model-extractor": { type: "string" },
        "model-writer": { type: "string" },
        help: { type: "boolean", short: "h", default: false },
      },
      strict: true,
      allowPositionals: false,
    });

    return {
      config: values.config,
      scrapeOnly: values["scrape-only"] ?? false,
      ollama: values.ollama ?? false,
      output: values.output,
      instruction: values.instruction,
      modelExtractor: values["model-extractor"],
      modelWriter: values["model-writer"],
      help: values.help ?? false,
    };
  } catch (error) {
    throw new ConfigError(
      `Invalid arguments: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

async function writeText(
  path: string,
  text: string,
  deps: CliDependencies,
): Promise<void> {
  if (path === "-") {
    deps.writeStdout(text.endsWith("\n") ? text : `${text}\n`);
    return;
  }
  await writeFile(path, text, "utf-8");
}

/**
 * Filter and draft, keeping the scraped entries on disk when the analyzer fails.
 */
async function digestWithFallback(
  entries: Entry[],
  analyzer: EntryAnalyzer,
  options: CliOptions,
  config: AppConfig,
  snapshotPath: string | null,
  deps: CliDependencies,
): Promise<string | null> {
  try {
    const result = await runDigest(entries, analyzer, options.instruction);
    return result.article;
  } catch (error) {
    if (error instanceof AnalyzerError && snapshotPath === null) {
      const fallback = await deps.writeSnapshot(
        config.output.snapshotDir ?? ".",
        entries,
        options.instruction,
      );
      if (fallback) {
        logger.warn({ path: fallback }, "Analyzer failed, scraped entries saved");
      }
    }
    throw error;
  }
}

/**
 * Run one scrape and hand the result to the selected output.
 */
export async function runCli(
  options: CliOptions,
  overrides: Partial<CliDependencies> = {},
): Promise<void> {
  const deps: CliDependencies = { ...defaultDependencies, ...overrides };
  const config = deps.loadConfig(options.config);

  const settings: FetchSettings = {
    timeout: config.scraper.requestTimeout,
    userAgent: config.scraper.userAgent,
  };
  const { entries } = await deps.aggregate(config.sources, { settings });
  logger.info({ entryCount: entries.length }, `Collected ${entries.length} entries`);

  const snapshotPath = config.output.snapshotDir
    ? await deps.writeSnapshot(config.output.snapshotDir, entries, options.instruction)
    : null;

  if (options.scrapeOnly) {
    deps.writeStdout(`${serializePayload(buildPayload(entries, options.instruction))}\n`);
    return;
  }

  if (options.ollama) {
    const ollamaConfig = {
      ...config.ollama,
      model: options.modelWriter ?? config.ollama.model,
      extractorModel: options.modelExtractor ?? config.ollama.extractorModel,
    };
    const analyzer = deps.createOllamaAnalyzer(ollamaConfig);
    const article = await digestWithFallback(entries, analyzer, options, config, snapshotPath, deps);
    if (article === null) {
      logger.info("No relevant entries, no article written");
      return;
    }

    const outputPath = options.output ?? DEFAULT_ARTICLE_FILE;
    await writeText(outputPath, article, deps);
    if (outputPath !== "-") {
      logger.info({ path: outputPath }, "Article written");
    }
    return;
  }

  if (options.output) {
    if (options.output === "-") {
      deps.writeStdout(`${serializePayload(buildPayload(entries, options.instruction))}\n`);
    } else {
      await deps.writePayloadFile(options.output, entries, options.instruction);
      logger.info({ path: options.output }, "Payload written");
    }
    return;
  }

  if (!config.agent.webhookUrl.trim()) {
    logger.warn(`No agent.webhookUrl configured, saving payload to ${DEFAULT_PAYLOAD_FILE}`);
    await deps.writePayloadFile(DEFAULT_PAYLOAD_FILE, entries, options.instruction);
    return;
  }

  const agent = deps.createWebhookAgent(config.agent);
  const reply = await digestWithFallback(entries, agent, options, config, snapshotPath, deps);
  if (reply) {
    deps.writeStdout(reply.endsWith("\n") ? reply : `${reply}\n`);
  }
}

/**
 * Entry point.
 *
 * @returns The process exit code
 */
export async function main(
  argv: string[],
  overrides: Partial<CliDependencies> = {},
): Promise<number> {
  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      (overrides.writeStdout ?? defaultDependencies.writeStdout)(USAGE);
      return 0;
    }
    await runCli(options, overrides);
    return 0;
  } catch (error) {
    if (error instanceof ServiceError) {
      logger.error({ error }, error.message);
      return error.exitCode;
    }
    logger.error({ error }, "Unexpected error");
    return 1;
  }
}
