/**
 * Tests for the Ollama client and the analyzer built on it.
 */

import axios from "axios";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { makeEntry } from "../../../tests/utils/fixtures";
import { axiosResponse, httpError, networkError } from "../../../tests/utils/http";
import { parseDateText } from "../../aggregators/base/utils/dates";
import type { OllamaConfig } from "../../config";
import { AnalyzerError } from "../../errors";
import {
  OllamaAnalyzer,
  chunkEntries,
  entriesToText,
  parseSelection,
} from "../ollama-analyzer.service";
import { OllamaClient } from "../ollama.service";
import { ARTICLE_SYSTEM_PROMPT, FILTER_SYSTEM_PROMPT } from "../prompts";

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

const config: OllamaConfig = {
  baseUrl: "http://localhost:11434/",
  model: "writer-model",
  extractorModel: "extractor-model",
  timeout: 1000,
  chunkSize: 5,
  numCtx: 4096,
};

function entries(count: number) {
  return Array.from({ length: count }, (_, i) =>
    makeEntry({ title: `Wpis ${i + 1}`, url: `https://bip.example.pl/wpis-${i + 1}` }),
  );
}

describe("OllamaClient", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should call /api/generate and return the trimmed answer", async () => {
    const postSpy = vi
      .spyOn(axios, "post")
      .mockResolvedValue(axiosResponse({ response: "  [1, 2]\n" }));
    const client = new OllamaClient(config);

    await expect(client.generate("bielik", "Pytanie", "System")).resolves.toBe("[1, 2]");
    expect(postSpy).toHaveBeenCalledWith(
      "http://localhost:11434/api/generate",
      {
        model: "bielik",
        prompt: "Pytanie",
        stream: false,
        options: { num_ctx: 4096 },
        system: "System",
      },
      { timeout: 1000 },
    );
  });

  it("should retry with /api/chat when generate answers 404", async () => {
    const postSpy = vi
      .spyOn(axios, "post")
      .mockRejectedValueOnce(httpError(404, { error: "404 page not found" }))
      .mockResolvedValueOnce(axiosResponse({ message: { role: "assistant", content: "Odpowiedź" } }));
    const client = new OllamaClient(config);

    await expect(client.generate("bielik", "Pytanie", "System")).resolves.toBe("Odpowiedź");
    expect(postSpy).toHaveBeenCalledTimes(2);
    expect(postSpy.mock.calls[1][0]).toBe("http://localhost:11434/api/chat");
    expect(postSpy.mock.calls[1][1]).toEqual({
      model: "bielik",
      messages: [
        { role: "system", content: "System" },
        { role: "user", content: "Pytanie" },
      ],
      stream: false,
      options: { num_ctx: 4096 },
    });
  });

  it("should raise AnalyzerError with the server error for other statuses", async () => {
    vi.spyOn(axios, "post").mockRejectedValue(httpError(500, { error: "model crashed" }));
    const client = new OllamaClient(config);

    const error = await client.generate("bielik", "Pytanie").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AnalyzerError);
    expect(error).toMatchObject({
      message: "Ollama request to http://localhost:11434 failed: HTTP 500 (model crashed)",
      statusCode: 500,
    });
  });

  it("should raise AnalyzerError when the server is unreachable", async () => {
    vi.spyOn(axios, "post").mockRejectedValue(networkError());
    const client = new OllamaClient(config);

    await expect(client.generate("bielik", "Pytanie")).rejects.toThrow(
      "Ollama request to http://localhost:11434 failed: ECONNREFUSED: connect ECONNREFUSED 127.0.0.1:443",
    );
  });

  it("should reject malformed responses", async () => {
    vi.spyOn(axios, "post").mockResolvedValue(axiosResponse({ response: 42 }));
    const client = new OllamaClient(config);

    await expect(client.generate("bielik", "Pytanie")).rejects.toThrow(
      "Malformed response from /api/generate",
    );
  });
});

describe("entriesToText", () => {
  it("should number entries and truncate long titles", () => {
    const text = entriesToText([
      makeEntry({
        title: "A".repeat(130),
        url: "https://bip.example.pl/1",
        summary: "Krótki\n opis",
        published: new Date("2025-02-03T10:00:00.000Z"),
        sourceName: "Gmina",
      }),
      makeEntry({ title: "Drugi wpis", url: "https://bip.example.pl/2", sourceName: "Powiat" }),
    ]);

    expect(text.split("\n")).toEqual([
      `1. [${"A".repeat(120)}...]`,
      "   Źródło: Gmina",
      "   URL: https://bip.example.pl/1",
      "   Data: 2025-02-03",
      "   Opis: Krótki opis",
      "",
      "2. [Drugi wpis]",
      "   Źródło: Powiat",
      "   URL: https://bip.example.pl/2",
      "",
    ]);
  });

  it("should print registry dates as the local calendar day", () => {
    const text = entriesToText([
      makeEntry({ published: parseDateText("11.02.2026"), summary: "" }),
    ]);

    expect(text.split("\n")[3]).toBe("   Data: 2026-02-11");
  });
});

describe("chunkEntries", () => {
  it("should split into batches of the given size", () => {
    expect(chunkEntries([1, 2, 3, 4, 5, 6, 7], 3)).toEqual([[1, 2, 3], [4, 5, 6], [7]]);
    expect(chunkEntries([], 3)).toEqual([]);
  });
});

describe("parseSelection", () => {
  it("should read JSON arrays of numbers", () => {
    expect(parseSelection("[2, 4]", 5)).toEqual([2, 4]);
    expect(parseSelection("[]", 5)).toEqual([]);
  });

  it("should ignore duplicates and numbers out of range", () => {
    expect(parseSelection("```json\n[3, 1, 3, 9, 0]\n```", 4)).toEqual([1, 3]);
  });

  it("should accept numeric strings and numbered objects", () => {
    expect(parseSelection('[{"numer": 2, "powod": "inwestycja"}, "4"]', 5)).toEqual([2, 4]);
  });

  it("should accept a bare list of numbers", () => {
    expect(parseSelection("1, 3", 5)).toEqual([1, 3]);
  });

  it("should return null for prose", () => {
    expect(parseSelection("Żaden wpis nie jest istotny.", 5)).toBeNull();
  });
});

describe("OllamaAnalyzer", () => {
  let client: OllamaClient;

  beforeEach(() => {
    client = new OllamaClient(config);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should filter in batches with the extractor model", async () => {
    const generate = vi
      .spyOn(client, "generate")
      .mockResolvedValueOnce("[2, 5]")
      .mockResolvedValueOnce("[1]");
    const analyzer = new OllamaAnalyzer(config, client);
    const input = entries(7);

    const selected = await analyzer.filter(input, "Tylko inwestycje");

    expect(selected.map((e) => e.title)).toEqual(["Wpis 2", "Wpis 5", "Wpis 6"]);
    expect(generate).toHaveBeenCalledTimes(2);
    expect(generate.mock.calls[0][0]).toBe("extractor-model");
    expect(generate.mock.calls[0][1]).toContain("5. [Wpis 5]");
    expect(generate.mock.calls[0][1]).toContain("Dodatkowe wskazówki: Tylko inwestycje");
    expect(generate.mock.calls[0][2]).toBe(FILTER_SYSTEM_PROMPT);
    expect(generate.mock.calls[1][1]).toContain("1. [Wpis 6]");
  });

  it("should use the writer model for filtering without an extractor model", async () => {
    const generate = vi.spyOn(client, "generate").mockResolvedValue("[1]");
    const analyzer = new OllamaAnalyzer({ ...config, extractorModel: undefined }, client);

    await analyzer.filter(entries(1));

    expect(generate.mock.calls[0][0]).toBe("writer-model");
  });

  it("should skip a batch with an unreadable answer", async () => {
    vi.spyOn(client, "generate")
      .mockResolvedValueOnce("Nie potrafię ocenić tych wpisów.")
      .mockResolvedValueOnce("[2]");
    const analyzer = new OllamaAnalyzer(config, client);

    const selected = await analyzer.filter(entries(7));

    expect(selected.map((e) => e.title)).toEqual(["Wpis 7"]);
  });

  it("should fail when every batch fails", async () => {
    vi.spyOn(client, "generate").mockRejectedValue(new AnalyzerError("connection refused"));
    const analyzer = new OllamaAnalyzer(config, client);

    await expect(analyzer.filter(entries(7))).rejects.toThrow("All 2 filter batches failed");
  });

  it("should return no entries when the model selects none", async () => {
    vi.spyOn(client, "generate").mockResolvedValue("[]");
    const analyzer = new OllamaAnalyzer(config, client);

    await expect(analyzer.filter(entries(3))).resolves.toEqual([]);
  });

  it("should draft the article with the writer model", async () => {
    const generate = vi
      .spyOn(client, "generate")
      .mockResolvedValue("```html\n<h2>Co nowego w gminie</h2>\n<p>Treść</p>\n```");
    const analyzer = new OllamaAnalyzer(config, client);

    const article = await analyzer.draft(entries(2), "Pisz krótko");

    expect(article).toBe("<h2>Co nowego w gminie</h2>\n<p>Treść</p>");
    expect(generate.mock.calls[0][0]).toBe("writer-model");
    expect(generate.mock.calls[0][1]).toContain("Dodatkowe wskazówki: Pisz krótko");
    expect(generate.mock.calls[0][2]).toBe(ARTICLE_SYSTEM_PROMPT);
  });

  it("should reject an empty article", async () => {
    vi.spyOn(client, "generate").mockResolvedValue("   ");
    const analyzer = new OllamaAnalyzer(config, client);

    await expect(analyzer.draft(entries(1))).rejects.toBeInstanceOf(AnalyzerError);
  });
});
