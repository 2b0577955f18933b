/**
 * Test source script.
 *
 * Scrapes one configured source and prints what its aggregator extracted,
 * to help with debugging matchers.
 *
 * Usage:
 *   npm run test:source <source name>
 *
 * Example:
 *   npm run test:source "UM Przykładowo - rejestr zmian"
 */

import "dotenv/config";

import { pathToFileURL } from "node:url";

import { format } from "date-fns";

import type { RawEntry, SourceConfig } from "../aggregators/base/types";
import { getAggregatorForSource, getSourceKind } from "../aggregators/registry";
import { loadConfig } from "../config";

interface SourceTestResult {
  source: string;
  kind: string;
  success: boolean;
  entries: RawEntry[];
  error?: string;
  processingTime: number;
}

/**
 * Run the aggregator of a single source.
 */
export async function testSource(
  source: SourceConfig,
  settings: { timeout: number; userAgent: string },
): Promise<SourceTestResult> {
  const startTime = Date.now();
  const aggregator = getAggregatorForSource(source);
  aggregator.initialize(source, settings);

  try {
    const entries = await aggregator.aggregate();
    return {
      source: source.name,
      kind: getSourceKind(source),
      success: entries.length > 0,
      entries,
      error: entries.length === 0 ? "No entries extracted" : undefined,
      processingTime: Date.now() - startTime,
    };
  } catch (error) {
    return {
      source: source.name,
      kind: getSourceKind(source),
      success: false,
      entries: [],
      error: error instanceof Error ? error.message : String(error),
      processingTime: Date.now() - startTime,
    };
  }
}

/**
 * Format a test result for display.
 */
export function formatResult(result: SourceTestResult): string {
  const lines: string[] = [];
  lines.push("=".repeat(80));
  lines.push(`Source: ${result.source} (${result.kind})`);
  lines.push(`  Status: ${result.success ? "✓ SUCCESS" : "✗ FAILED"}`);
  if (result.error) {
    lines.push(`  Error: ${result.error}`);
  }
  lines.push(`  Entries: ${result.entries.length}`);
  lines.push(`  Processing Time: ${result.processingTime}ms`);
  lines.push("=".repeat(80));

  result.entries.forEach((entry, index) => {
    const date = entry.published ? format(entry.published, "yyyy-MM-dd HH:mm") : "(no date)";
    lines.push(`${index + 1}. ${entry.title}`);
    lines.push(`   ${entry.url}`);
    lines.push(`   ${date}`);
  });
  lines.push("");

  return lines.join("\n");
}

async function main(): Promise<number> {
  const name = process.argv[2];
  if (!name) {
    console.error("Usage: npm run test:source <source name>");
    return 1;
  }

  const config = loadConfig();
  const source = config.sources.find((s) => s.name === name);
  if (!source) {
    console.error(`Unknown source "${name}". Configured sources:`);
    for (const s of config.sources) {
      console.error(`  - ${s.name}`);
    }
    return 1;
  }

  const result = await testSource(source, {
    timeout: config.scraper.requestTimeout,
    userAgent: config.scraper.userAgent,
  });
  console.log(formatResult(result));
  return result.success ? 0 : 1;
}

// Run if executed directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main()
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      console.error("Fatal error:", error);
      process.exitCode = 1;
    });
}
