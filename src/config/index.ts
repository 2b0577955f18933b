/**
 * Configuration loading.
 *
 * Reads the JSON configuration file, applies environment overrides and
 * validates everything with Zod.
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import { z } from "zod";

import { ConfigError } from "../errors";
import { getMatcherIds } from "../aggregators/matchers";

export const DEFAULT_CONFIG_PATH = "config.json";

const urlSchema = z.string().url();

export const sourceSchema = z
  .object({
    name: z.string().min(1),
    listUrl: urlSchema.optional(),
    rssUrl: urlSchema.optional(),
    changeRegistry: z.boolean().default(false),
    maxEntries: z.number().int().positive().optional(),
    timeout: z.number().int().positive().optional(),
    matchers: z.array(z.string()).optional(),
  })
  .refine((source) => Boolean(source.listUrl || source.rssUrl), {
    message: "Source needs a listUrl or an rssUrl",
  })
  .refine(
    (source) => (source.matchers ?? []).every((id) => getMatcherIds().includes(id)),
    { message: "Unknown matcher", path: ["matchers"] },
  );

export const configSchema = z.object({
  sources: z.array(sourceSchema).min(1),
  scraper: z
    .object({
      requestTimeout: z.number().int().positive().default(15000),
      userAgent: z.string().min(1).default("BIP-Digest/1.0 (Node.js)"),
    })
    .default({}),
  ollama: z
    .object({
      baseUrl: urlSchema.default("http://localhost:11434"),
      model: z.string().min(1).default("SpeakLeash/bielik-11b-v2.3-instruct:Q4_K_M"),
      extractorModel: z.string().min(1).optional(),
      timeout: z.number().int().positive().default(300000),
      chunkSize: z.number().int().positive().default(5),
      numCtx: z.number().int().positive().default(16384),
    })
    .default({}),
  agent: z
    .object({
      webhookUrl: z.string().default(""),
      timeout: z.number().int().positive().default(30000),
    })
    .default({}),
  output: z
    .object({
      snapshotDir: z.string().optional(),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof configSchema>;
export type OllamaConfig = AppConfig["ollama"];
export type AgentConfig = AppConfig["agent"];

/**
 * Apply environment variable overrides to raw configuration.
 */
function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return raw;
  }

  const result: Record<string, unknown> = { ...raw };
  const ollamaUrl = env["OLLAMA_BASE_URL"];
  if (ollamaUrl) {
    const ollama = result["ollama"];
    result["ollama"] = { ...(ollama && typeof ollama === "object" ? ollama : {}), baseUrl: ollamaUrl };
  }
  const webhookUrl = env["AGENT_WEBHOOK_URL"];
  if (webhookUrl) {
    const agent = result["agent"];
    result["agent"] = { ...(agent && typeof agent === "object" ? agent : {}), webhookUrl };
  }
  return result;
}

/**
 * Validate parsed configuration data.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = configSchema.safeParse(applyEnvOverrides(raw, env));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid configuration: ${issues.map((i) => `${i.path || "(root)"}: ${i.message}`).join("; ")}`,
      issues,
    );
  }
  return result.data;
}

/**
 * Load configuration from a JSON file.
 */
export function loadConfig(
  configPath: string = process.env["BIP_CONFIG"] || DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const path = resolve(configPath);
  if (!existsSync(path)) {
    throw new ConfigError(
      `Configuration file not found: ${path}. Copy config.example.json to config.json.`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(
      `Cannot parse ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return parseConfig(raw, env);
}
