import type { Logger } from "pino";
import { LookupError } from "../../domain/errors";
import {
  CardDocumentSchema,
  type CardDataClient,
  type CardDocument,
  type FetchLike,
  type ScryfallConfig,
} from "./types";

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Build the card path. The language segment is only present when a language
 * was given.
 */
export function buildCardPath(setCode: string, collectorNumber: string, lang?: string): string {
  const segments = [setCode, collectorNumber, ...(lang ? [lang] : [])].map((segment) =>
    encodeURIComponent(segment),
  );
  return `/cards/${segments.join("/")}`;
}

export class ScryfallClient implements CardDataClient {
  private readonly logger: Logger;

  constructor(
    private readonly config: ScryfallConfig,
    logger: Logger,
    private readonly fetchImpl: FetchLike = fetch,
    private readonly sleep: (ms: number) => Promise<void> = defaultSleep,
  ) {
    this.logger = logger.child({ service: "ScryfallClient" });
  }

  async getCard(setCode: string, collectorNumber: string, lang?: string): Promise<CardDocument> {
    const path = buildCardPath(setCode, collectorNumber, lang);
    const payload = await this.get(path);

    const parsed = CardDocumentSchema.safeParse(payload);
    if (!parsed.success) {
      throw new LookupError(`Scryfall returned an unexpected card document for ${path}`, "invalid_response");
    }
    return parsed.data;
  }

  private async get(path: string): Promise<unknown> {
    const url = `${this.config.baseUrl.replace(/\/+$/, "")}${path}`;
    const attempts = Math.max(1, this.config.maxRetries);

    for (let attempt = 1; ; attempt += 1) {
      const response = await this.request(url);

      if (response.ok) {
        try {
          return await response.json();
        } catch (error) {
          throw new LookupError(
            `Scryfall returned malformed JSON for ${path}: ${error instanceof Error ? error.message : String(error)}`,
            "invalid_response",
            response.status,
          );
        }
      }

      if (response.status === 404) {
        throw new LookupError(`Card not found: ${path}`, "not_found", 404);
      }

      if (RETRYABLE_STATUSES.has(response.status) && attempt < attempts) {
        const delayMs = this.config.backoffMs * attempt;
        this.logger.warn({ status: response.status, path, attempt, delayMs }, "Scryfall request will be retried");
        await this.sleep(delayMs);
        continue;
      }

      throw new LookupError(
        `Scryfall returned ${response.status}: ${response.statusText}`,
        "http",
        response.status,
      );
    }
  }

  private async request(url: string): Promise<Response> {
    this.logger.debug({ url }, "Calling Scryfall API");

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      return await this.fetchImpl(url, {
        method: "GET",
        headers: {
          Accept: "application/json",
          "User-Agent": this.config.userAgent,
        },
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new LookupError(`Scryfall timeout after ${this.config.timeoutMs}ms`, "timeout");
      }
      throw new LookupError(
        `Scryfall request failed: ${error instanceof Error ? error.message : String(error)}`,
        "network",
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
