/**
 * Price refresh for stored copies.
 *
 * Re-fetches every copy, compares the stored price with the current one
 * against a threshold (null counts as 0) and records copies that crossed it:
 *   old >= threshold, new < threshold → downgraded, moved to bulk
 *   old <  threshold, new >= threshold → upgraded, stays in bulk for review
 * Copies that did not cross keep their stored price and location.
 */

import fs from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import { LookupError } from "../../domain/errors";
import { DEFAULT_LOCATION, type CardCopy } from "../../domain/inventory";
import type { InventoryRepository, PriceLocationUpdate } from "../../repositories/inventoryRepository";
import { readPriceField } from "../catalog/cardLookup";
import type { CardDataClient, CardDocument, PriceField } from "../catalog/types";
import type { RateLimiter } from "./rateLimiter";

export const DEFAULT_PRICE_THRESHOLD = 5;
export const DEFAULT_CHUNK_SIZE = 200;
export const DEFAULT_MIN_INTERVAL_MS = 80;

export const PRICE_CHANGE_HEADER = [
  "id",
  "set_code",
  "collector_number",
  "lang",
  "old_price",
  "new_price",
  "old_location",
  "new_location",
] as const;

export type PriceDirection = "downgraded" | "upgraded";

export interface PriceChange {
  id: number;
  set_code: string;
  collector_number: string;
  lang: string;
  old_price: number | null;
  new_price: number | null;
  old_location: string;
  new_location: string;
}

export interface RefreshOptions {
  priceField?: PriceField;
  threshold?: number;
  chunkSize?: number;
  dryRun?: boolean;
}

export interface RefreshResult {
  checked: number;
  failed: number;
  applied: number;
  downgraded: PriceChange[];
  upgraded: PriceChange[];
}

/** Direction of a threshold crossing, or null when the price stayed on one side. */
export function classifyPriceChange(
  oldPrice: number | null,
  newPrice: number | null,
  threshold: number = DEFAULT_PRICE_THRESHOLD,
): PriceDirection | null {
  const before = oldPrice ?? 0;
  const after = newPrice ?? 0;
  if (before >= threshold && after < threshold) return "downgraded";
  if (before < threshold && after >= threshold) return "upgraded";
  return null;
}

export class PriceRefresher {
  private readonly logger: Logger;

  constructor(
    private readonly client: CardDataClient,
    private readonly inventoryRepo: InventoryRepository,
    logger: Logger,
    private readonly limiter: RateLimiter,
  ) {
    this.logger = logger.child({ service: "PriceRefresher" });
  }

  async refresh(options: RefreshOptions = {}): Promise<RefreshResult> {
    const priceField = options.priceField ?? "usd";
    const threshold = options.threshold ?? DEFAULT_PRICE_THRESHOLD;
    const chunkSize = Math.max(1, options.chunkSize ?? DEFAULT_CHUNK_SIZE);
    const dryRun = options.dryRun ?? false;

    const copies = this.inventoryRepo.listAll();
    this.logger.info({ copies: copies.length, priceField, threshold, dryRun }, "Checking stored prices");

    const result: RefreshResult = { checked: 0, failed: 0, applied: 0, downgraded: [], upgraded: [] };
    let pending: PriceLocationUpdate[] = [];

    const flush = (): void => {
      if (pending.length === 0) return;
      if (!dryRun) {
        result.applied += this.inventoryRepo.updatePriceAndLocation(pending);
        this.logger.info({ rows: pending.length }, "Applied price update batch");
      }
      pending = [];
    };

    for (const copy of copies) {
      await this.limiter.wait();

      const card = await this.fetchCard(copy);
      if (!card) {
        result.failed += 1;
        continue;
      }
      result.checked += 1;

      const newPrice = readPriceField(card, priceField);
      const direction = classifyPriceChange(copy.price_usd, newPrice, threshold);
      if (!direction) continue;

      const change: PriceChange = {
        id: copy.id,
        set_code: copy.set_code,
        collector_number: copy.collector_number,
        lang: copy.lang,
        old_price: copy.price_usd,
        new_price: newPrice,
        old_location: copy.location,
        new_location: DEFAULT_LOCATION,
      };
      result[direction].push(change);
      pending.push({ id: copy.id, price_usd: newPrice, location: change.new_location });

      if (pending.length >= chunkSize) flush();
    }
    flush();

    this.logger.info(
      {
        checked: result.checked,
        failed: result.failed,
        downgraded: result.downgraded.length,
        upgraded: result.upgraded.length,
        applied: result.applied,
        dryRun,
      },
      dryRun ? "Price check finished (dry run, no changes applied)" : "Price check finished",
    );
    return result;
  }

  private async fetchCard(copy: CardCopy): Promise<CardDocument | null> {
    try {
      return await this.client.getCard(copy.set_code, copy.collector_number, copy.lang || undefined);
    } catch (error) {
      if (!(error instanceof LookupError)) throw error;
      this.logger.warn(
        { id: copy.id, setCode: copy.set_code, collectorNumber: copy.collector_number, lang: copy.lang, kind: error.kind },
        `Price lookup failed: ${error.message}`,
      );
      return null;
    }
  }
}

const escapeCsvField = (value: string | number | null): string => {
  if (value === null) return "";
  const str = String(value);
  if (str.includes(",") || str.includes('"') || str.includes("\n") || str.includes("\r")) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
};

export function renderPriceChangeCsv(changes: readonly PriceChange[]): string {
  const lines = [
    PRICE_CHANGE_HEADER.join(","),
    ...changes.map((change) => PRICE_CHANGE_HEADER.map((column) => escapeCsvField(change[column])).join(",")),
  ];
  return `${lines.join("\n")}\n`;
}

/** `YYYYMMDD_HHMMSS` in UTC. */
export function reportTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export interface PriceReportPaths {
  downgraded: string;
  upgraded: string;
}

/** Write both reports; an empty report still gets its header line. */
export function writePriceChangeReports(
  outDir: string,
  result: Pick<RefreshResult, "downgraded" | "upgraded">,
  at: Date,
): PriceReportPaths {
  fs.mkdirSync(outDir, { recursive: true });
  const stamp = reportTimestamp(at);
  const paths: PriceReportPaths = {
    downgraded: path.join(outDir, `downgraded_${stamp}.csv`),
    upgraded: path.join(outDir, `upgraded_${stamp}.csv`),
  };
  fs.writeFileSync(paths.downgraded, renderPriceChangeCsv(result.downgraded), "utf8");
  fs.writeFileSync(paths.upgraded, renderPriceChangeCsv(result.upgraded), "utf8");
  return paths;
}
