/**
 * Tests for configuration loading and validation.
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { ConfigError } from "../../errors";
import { loadConfig, parseConfig } from "../index";

// Mock logger
vi.mock("../../utils/logger", () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
  createLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

const minimal = {
  sources: [{ name: "UM Przykładowo", listUrl: "https://bip.example.pl/rejestr-zmian" }],
};

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error("Expected a ConfigError");
}

describe("parseConfig", () => {
  it("should apply defaults", () => {
    const config = parseConfig(minimal, {});

    expect(config.sources[0]).toEqual({
      name: "UM Przykładowo",
      listUrl: "https://bip.example.pl/rejestr-zmian",
      changeRegistry: false,
    });
    expect(config.scraper).toEqual({
      requestTimeout: 15000,
      userAgent: "BIP-Digest/1.0 (Node.js)",
    });
    expect(config.ollama).toEqual({
      baseUrl: "http://localhost:11434",
      model: "SpeakLeash/bielik-11b-v2.3-instruct:Q4_K_M",
      timeout: 300000,
      chunkSize: 5,
      numCtx: 16384,
    });
    expect(config.agent).toEqual({ webhookUrl: "", timeout: 30000 });
    expect(config.output).toEqual({});
  });

  it("should let the environment override service URLs", () => {
    const config = parseConfig(
      { ...minimal, ollama: { model: "bielik" }, agent: { webhookUrl: "https://a.example.pl/1" } },
      {
        OLLAMA_BASE_URL: "http://gpu.example.pl:11434",
        AGENT_WEBHOOK_URL: "https://agent.example.pl/hook",
      },
    );

    expect(config.ollama.baseUrl).toBe("http://gpu.example.pl:11434");
    expect(config.ollama.model).toBe("bielik");
    expect(config.agent.webhookUrl).toBe("https://agent.example.pl/hook");
  });

  it("should require a url on every source", () => {
    const error = configError(() => parseConfig({ sources: [{ name: "Bez adresu" }] }, {}));

    expect(error.issues).toEqual([
      { path: "sources.0", message: "Source needs a listUrl or an rssUrl" },
    ]);
    expect(error.message).toBe(
      "Invalid configuration: sources.0: Source needs a listUrl or an rssUrl",
    );
  });

  it("should reject unknown matchers", () => {
    const error = configError(() =>
      parseConfig({ sources: [{ ...minimal.sources[0], matchers: ["magic"] }] }, {}),
    );

    expect(error.issues).toEqual([{ path: "sources.0.matchers", message: "Unknown matcher" }]);
  });

  it("should require at least one source", () => {
    const error = configError(() => parseConfig({ sources: [] }, {}));
    expect(error.issues?.[0]?.path).toBe("sources");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "bip-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should load a JSON file", () => {
    const path = join(dir, "config.json");
    writeFileSync(path, JSON.stringify(minimal));

    expect(loadConfig(path, {}).sources).toHaveLength(1);
  });

  it("should explain how to create a missing file", () => {
    expect(() => loadConfig(join(dir, "config.json"), {})).toThrow(
      "Copy config.example.json to config.json.",
    );
  });

  it("should reject invalid JSON", () => {
    const path = join(dir, "config.json");
    writeFileSync(path, "{ sources: ");

    expect(() => loadConfig(path, {})).toThrow(ConfigError);
  });
});
