#!/usr/bin/env tsx
/**
 * Re-price every stored copy and report copies whose price crossed the
 * threshold.
 *
 * Usage:
 *   npm run update-prices -- --db cards.db
 *   npm run update-prices -- --price-field usd_foil --min-interval 100 --chunk-size 200
 *   npm run update-prices -- --dry-run --csv-out-dir reports
 *
 * Writes downgraded_<ts>.csv and upgraded_<ts>.csv (UTC timestamp) to the
 * output directory, header-only when nothing crossed.
 */

import { parseArgs } from "node:util";
import { closeContext, createContext } from "../src/app/context";
import { loadRuntimeConfig } from "../src/config";
import { PRICE_FIELDS, type PriceField } from "../src/services/catalog/types";
import {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_MIN_INTERVAL_MS,
  DEFAULT_PRICE_THRESHOLD,
  PriceRefresher,
  writePriceChangeReports,
} from "../src/services/pricing/priceRefresher";
import { RateLimiter } from "../src/services/pricing/rateLimiter";

const isPriceField = (value: string): value is PriceField => PRICE_FIELDS.some((field) => field === value);

const positiveNumber = (raw: string, flag: string): number => {
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${flag} must be a non-negative number, got "${raw}"`);
  }
  return value;
};

async function main() {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      db: { type: "string" },
      "price-field": { type: "string", default: "usd" },
      "min-interval": { type: "string", default: String(DEFAULT_MIN_INTERVAL_MS) },
      "chunk-size": { type: "string", default: String(DEFAULT_CHUNK_SIZE) },
      threshold: { type: "string", default: String(DEFAULT_PRICE_THRESHOLD) },
      "dry-run": { type: "boolean", default: false },
      "csv-out-dir": { type: "string" },
    },
  });

  const priceField = values["price-field"] ?? "usd";
  if (!isPriceField(priceField)) {
    throw new Error(`--price-field must be one of ${PRICE_FIELDS.join(", ")}`);
  }
  const minIntervalMs = positiveNumber(values["min-interval"] ?? String(DEFAULT_MIN_INTERVAL_MS), "--min-interval");
  const chunkSize = Math.max(1, Math.floor(positiveNumber(values["chunk-size"] ?? String(DEFAULT_CHUNK_SIZE), "--chunk-size")));
  const threshold = positiveNumber(values.threshold ?? String(DEFAULT_PRICE_THRESHOLD), "--threshold");
  const dryRun = values["dry-run"] === true;
  const outDir = values["csv-out-dir"] ?? process.cwd();

  const baseConfig = loadRuntimeConfig();
  const ctx = createContext({ ...baseConfig, sqlitePath: values.db ?? baseConfig.sqlitePath });
  try {
    const refresher = new PriceRefresher(ctx.cardClient, ctx.inventoryRepo, ctx.logger, new RateLimiter(minIntervalMs));
    const result = await refresher.refresh({ priceField, threshold, chunkSize, dryRun });
    const paths = writePriceChangeReports(outDir, result, new Date());

    ctx.logger.info({ rows: result.downgraded.length, path: paths.downgraded }, "Wrote downgraded report");
    ctx.logger.info({ rows: result.upgraded.length, path: paths.upgraded }, "Wrote upgraded report");
    if (dryRun) {
      ctx.logger.info("Dry-run mode: no DB changes were applied");
    }
  } finally {
    closeContext(ctx);
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
