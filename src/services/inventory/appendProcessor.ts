import type { Logger } from "pino";
import { joinColorIdentity, type CardCopyDraft, type Location } from "../../domain/inventory";
import type { RowOutcome, RowRef } from "../../domain/report";
import type { InventoryRepository } from "../../repositories/inventoryRepository";
import type { CardLookup } from "../catalog/cardLookup";
import type { NormalizedRow } from "../importer/types";

export const toRowRef = (row: NormalizedRow): RowRef => ({
  line: row.line,
  setCode: row.setCode,
  collectorNumber: row.collectorNumber,
  lang: row.lang,
});

/**
 * Quantity expansion: one lookup per CSV row, then `quantity` identical
 * copies. Appending the same CSV twice stores the copies twice.
 */
export class AppendProcessor {
  private readonly logger: Logger;

  constructor(
    private readonly lookup: CardLookup,
    private readonly inventoryRepo: InventoryRepository,
    logger: Logger,
  ) {
    this.logger = logger.child({ service: "AppendProcessor" });
  }

  async process(row: NormalizedRow, location: Location): Promise<RowOutcome> {
    const ref = toRowRef(row);
    const result = await this.lookup.lookup(row);

    if (!result.ok) {
      return {
        status: "failed",
        row: ref,
        reason: "lookup_failed",
        message: result.error.message,
      };
    }

    const draft: CardCopyDraft = {
      set_code: row.setCode,
      collector_number: row.collectorNumber,
      lang: row.lang ?? "",
      name: result.card.name,
      color_identity: joinColorIdentity(result.card.color_identity),
      price_usd: result.price.price,
      location,
      fetched_at: result.fetchedAt,
    };

    const insertedIds = this.inventoryRepo.insertCopies(draft, row.quantity);

    this.logger.info(
      {
        line: row.line,
        setCode: row.setCode,
        collectorNumber: row.collectorNumber,
        lang: row.lang ?? null,
        name: draft.name,
        price: draft.price_usd,
        ids: insertedIds,
      },
      `Inserted ${insertedIds.length} ${insertedIds.length === 1 ? "copy" : "copies"}`,
    );

    return {
      status: "success",
      row: ref,
      requested: row.quantity,
      insertedIds,
      deletedIds: [],
      shortfall: 0,
      priceFallback: result.price.fallback,
    };
  }
}
