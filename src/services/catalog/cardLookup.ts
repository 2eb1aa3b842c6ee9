/**
 * Card lookup + price-variant selection.
 *
 * Price policy:
 *   normal → prices.usd, foil → prices.usd_foil, etched → prices.usd_etched.
 *   A foil/etched request whose variant has no price falls back to prices.usd
 *   (logged as a warning). If usd is missing too, the price is null and the
 *   copy is still stored.
 */

import type { Logger } from "pino";
import { LookupError } from "../../domain/errors";
import type { FoilKind } from "../../domain/inventory";
import type { NormalizedRow } from "../importer/types";
import type { CardDataClient, CardDocument, PriceField } from "./types";

const PRICE_FIELD_BY_FOIL: Record<FoilKind, PriceField> = {
  normal: "usd",
  foil: "usd_foil",
  etched: "usd_etched",
};

export interface PriceSelection {
  price: number | null;
  /** Field the price was read from (the requested one unless a fallback happened) */
  field: PriceField;
  requested: FoilKind;
  fallback: boolean;
}

export type LookupOutcome =
  | { ok: true; card: CardDocument; price: PriceSelection; fetchedAt: string }
  | { ok: false; error: LookupError };

/** Price string → number; null, blank and non-numeric values are unavailable. */
export function parsePrice(value: string | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  if (!trimmed || trimmed === "null") return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export function readPriceField(card: CardDocument, field: PriceField): number | null {
  return parsePrice(card.prices[field]);
}

export function selectPrice(card: CardDocument, foilKind: FoilKind): PriceSelection {
  const field = PRICE_FIELD_BY_FOIL[foilKind];
  const price = readPriceField(card, field);

  if (price !== null || field === "usd") {
    return { price, field, requested: foilKind, fallback: false };
  }

  const normalPrice = readPriceField(card, "usd");
  if (normalPrice === null) {
    return { price: null, field, requested: foilKind, fallback: false };
  }
  return { price: normalPrice, field: "usd", requested: foilKind, fallback: true };
}

export class CardLookup {
  private readonly logger: Logger;

  constructor(
    private readonly client: CardDataClient,
    logger: Logger,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.logger = logger.child({ service: "CardLookup" });
  }

  /**
   * One API call per invocation; results are never cached, so a repeated row
   * is fetched again.
   */
  async lookup(row: NormalizedRow): Promise<LookupOutcome> {
    const context = {
      line: row.line,
      setCode: row.setCode,
      collectorNumber: row.collectorNumber,
      lang: row.lang ?? null,
    };

    let card: CardDocument;
    try {
      card = await this.client.getCard(row.setCode, row.collectorNumber, row.lang);
    } catch (error) {
      const lookupError =
        error instanceof LookupError
          ? error
          : new LookupError(error instanceof Error ? error.message : String(error), "network");
      this.logger.warn({ ...context, kind: lookupError.kind, err: lookupError }, "Card lookup failed");
      return { ok: false, error: lookupError };
    }

    const fetchedAt = this.clock().toISOString();
    const price = selectPrice(card, row.foilKind);

    if (price.fallback) {
      this.logger.warn(
        { ...context, requested: row.foilKind, fallbackPrice: price.price },
        `No ${PRICE_FIELD_BY_FOIL[row.foilKind]} price; using usd`,
      );
    } else if (price.price === null) {
      this.logger.debug({ ...context, field: price.field }, "No price available");
    }

    return { ok: true, card, price, fetchedAt };
  }
}
