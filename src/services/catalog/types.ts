// Scryfall card API types (GET /cards/:code/:number(/:lang))

import { z } from "zod";

const priceValue = z.string().nullable().optional();

export const ScryfallPricesSchema = z
  .object({
    usd: priceValue,
    usd_foil: priceValue,
    usd_etched: priceValue,
  })
  .passthrough();

/**
 * Subset of the Scryfall card object we rely on. Unknown keys are kept so
 * callers can log the document as returned.
 */
export const CardDocumentSchema = z
  .object({
    id: z.string().optional(),
    name: z.string(),
    set: z.string().optional(),
    collector_number: z.string().optional(),
    lang: z.string().optional(),
    color_identity: z.array(z.string()).default([]),
    prices: ScryfallPricesSchema.default({}),
  })
  .passthrough();

export type CardDocument = z.infer<typeof CardDocumentSchema>;

export type PriceField = "usd" | "usd_foil" | "usd_etched";

export const PRICE_FIELDS: readonly PriceField[] = ["usd", "usd_foil", "usd_etched"];

export interface CardDataClient {
  /**
   * Fetch one printing. Throws LookupError when the card is missing or the
   * API cannot be reached.
   */
  getCard(setCode: string, collectorNumber: string, lang?: string): Promise<CardDocument>;
}

export interface ScryfallConfig {
  baseUrl: string;
  timeoutMs: number;
  /** Attempts per request, including the first */
  maxRetries: number;
  backoffMs: number;
  userAgent: string;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;
