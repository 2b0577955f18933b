/**
 * Ollama client.
 *
 * Calls /api/generate and falls back to /api/chat when the server (or a
 * proxy in front of it) answers 404 for the generate endpoint.
 */

import axios from "axios";
import { z } from "zod";

import { AnalyzerError } from "../errors";
import { describeHttpError, getHttpStatus } from "../utils/http-errors";
import { createLogger } from "../utils/logger";

const logger = createLogger({ component: "ollama" });

export interface OllamaClientConfig {
  baseUrl: string;
  timeout: number;
  numCtx: number;
}

const generateResponseSchema = z.object({
  response: z.string().default(""),
});

const chatResponseSchema = z.object({
  message: z.object({ content: z.string().default("") }).default({}),
});

const errorBodySchema = z.object({ error: z.string() });

interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export class OllamaClient {
  private readonly root: string;

  constructor(private readonly config: OllamaClientConfig) {
    this.root = config.baseUrl.replace(/\/+$/, "");
  }

  /**
   * Run one prompt to completion and return the model's text.
   */
  async generate(model: string, prompt: string, system?: string): Promise<string> {
    const startTime = Date.now();
    try {
      const text = await this.callGenerate(model, prompt, system);
      logger.debug(
        { model, endpoint: "generate", elapsed: Date.now() - startTime, length: text.length },
        "Model answered",
      );
      return text;
    } catch (error) {
      if (getHttpStatus(error) !== 404) {
        throw this.toAnalyzerError(error);
      }
      logger.warn(
        { model, serverError: this.extractServerError(error) },
        "/api/generate returned 404, trying /api/chat",
      );
    }

    try {
      const text = await this.callChat(model, prompt, system);
      logger.debug(
        { model, endpoint: "chat", elapsed: Date.now() - startTime, length: text.length },
        "Model answered",
      );
      return text;
    } catch (error) {
      throw this.toAnalyzerError(error);
    }
  }

  private async callGenerate(model: string, prompt: string, system?: string): Promise<string> {
    const response = await axios.post<unknown>(
      `${this.root}/api/generate`,
      {
        model,
        prompt,
        stream: false,
        options: { num_ctx: this.config.numCtx },
        ...(system ? { system } : {}),
      },
      { timeout: this.config.timeout },
    );
    const parsed = generateResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new AnalyzerError("Malformed response from /api/generate");
    }
    return parsed.data.response.trim();
  }

  private async callChat(model: string, prompt: string, system?: string): Promise<string> {
    const messages: ChatMessage[] = [];
    if (system) messages.push({ role: "system", content: system });
    messages.push({ role: "user", content: prompt });

    const response = await axios.post<unknown>(
      `${this.root}/api/chat`,
      {
        model,
        messages,
        stream: false,
        options: { num_ctx: this.config.numCtx },
      },
      { timeout: this.config.timeout },
    );
    const parsed = chatResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new AnalyzerError("Malformed response from /api/chat");
    }
    return parsed.data.message.content.trim();
  }

  private extractServerError(error: unknown): string | undefined {
    if (!axios.isAxiosError(error)) return undefined;
    const parsed = errorBodySchema.safeParse(error.response?.data);
    return parsed.success ? parsed.data.error : undefined;
  }

  private toAnalyzerError(error: unknown): AnalyzerError {
    if (error instanceof AnalyzerError) return error;

    const status = getHttpStatus(error) ?? undefined;
    const serverError = this.extractServerError(error);
    const reason = describeHttpError(error, this.config.timeout);
    return new AnalyzerError(
      `Ollama request to ${this.root} failed: ${reason}${serverError ? ` (${serverError})` : ""}`,
      status,
      error instanceof Error ? error : undefined,
    );
  }
}
