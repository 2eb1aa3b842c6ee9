import type { Logger } from "pino";
import type { RowOutcome } from "../../domain/report";
import type { InventoryRepository } from "../../repositories/inventoryRepository";
import type { NormalizedRow } from "../importer/types";
import { toRowRef } from "./appendProcessor";

/**
 * Deletes up to `quantity` matching copies per row, lowest id (oldest) first.
 * Each row sees the store as left by the rows before it.
 */
export class RemoveProcessor {
  private readonly logger: Logger;

  constructor(
    private readonly inventoryRepo: InventoryRepository,
    logger: Logger,
  ) {
    this.logger = logger.child({ service: "RemoveProcessor" });
  }

  async process(row: NormalizedRow): Promise<RowOutcome> {
    const { matched, deletedIds } = this.inventoryRepo.removeOldest(
      { setCode: row.setCode, collectorNumber: row.collectorNumber, lang: row.lang },
      row.quantity,
    );
    const shortfall = row.quantity - deletedIds.length;
    const context = {
      line: row.line,
      setCode: row.setCode,
      collectorNumber: row.collectorNumber,
      lang: row.lang ?? null,
      requested: row.quantity,
      matched,
    };

    if (deletedIds.length === 0) {
      this.logger.warn(context, "No matching copies to remove");
    } else if (shortfall > 0) {
      this.logger.warn({ ...context, ids: deletedIds, shortfall }, "Removed fewer copies than requested");
    } else {
      this.logger.info({ ...context, ids: deletedIds }, `Removed ${deletedIds.length} ${deletedIds.length === 1 ? "copy" : "copies"}`);
    }

    return {
      status: "success",
      row: toRowRef(row),
      requested: row.quantity,
      insertedIds: [],
      deletedIds,
      shortfall,
      priceFallback: false,
    };
  }
}
