/**
 * Remote agent reached through a webhook.
 *
 * The agent filters and writes in one go, so filter() passes entries
 * through and draft() posts the whole payload.
 */

import axios from "axios";

import type { Entry } from "../aggregators/base/types";
import type { AgentConfig } from "../config";
import { AnalyzerError, ConfigError } from "../errors";
import { describeHttpError, getHttpStatus } from "../utils/http-errors";
import { createLogger } from "../utils/logger";

import type { EntryAnalyzer } from "./analyzer.service.interface";
import { buildPayload } from "./payload";

const logger = createLogger({ component: "webhook" });

const MAX_ERROR_BODY_LENGTH = 500;

function responseBodyText(error: unknown): string {
  if (!axios.isAxiosError(error) || error.response === undefined) return "";
  const data: unknown = error.response.data;
  if (data === undefined || data === null) return "";
  const text = typeof data === "string" ? data : JSON.stringify(data);
  return text.slice(0, MAX_ERROR_BODY_LENGTH);
}

export class WebhookAgent implements EntryAnalyzer {
  readonly name = "webhook";
  private readonly webhookUrl: string;

  constructor(private readonly config: AgentConfig) {
    this.webhookUrl = config.webhookUrl.trim();
    if (!this.webhookUrl) {
      throw new ConfigError("agent.webhookUrl is not configured");
    }
  }

  async filter(entries: readonly Entry[]): Promise<Entry[]> {
    return [...entries];
  }

  async draft(entries: readonly Entry[], instruction?: string): Promise<string> {
    const payload = buildPayload(entries, instruction);
    logger.info({ webhookUrl: this.webhookUrl, entryCount: entries.length }, "Sending entries to agent");

    try {
      const response = await axios.post<unknown>(this.webhookUrl, payload, {
        timeout: this.config.timeout,
        headers: { "Content-Type": "application/json; charset=utf-8" },
        responseType: "text",
      });
      logger.info({ status: response.status }, "Agent accepted entries");

      const data = response.data;
      if (typeof data === "string") return data;
      return data === undefined || data === null ? "" : JSON.stringify(data);
    } catch (error) {
      const body = responseBodyText(error);
      throw new AnalyzerError(
        `Webhook ${this.webhookUrl} failed: ${describeHttpError(error, this.config.timeout)}${body ? `: ${body}` : ""}`,
        getHttpStatus(error) ?? undefined,
        error instanceof Error ? error : undefined,
      );
    }
  }
}
