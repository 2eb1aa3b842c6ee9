/**
 * AppContext: composition root.
 *
 * Opens the store, applies migrations and wires the services that the CLI and
 * the maintenance scripts share. The store handle lives exactly as long as the
 * context; `withContext` closes it in a finally.
 */

import pino, { type Logger } from "pino";
import type { Database } from "better-sqlite3";

import type { RuntimeConfig } from "../config";
import { openDatabase } from "../db/connection";
import { runMigrations } from "../db/migrate";
import { InventoryRepository } from "../repositories/inventoryRepository";
import { CardLookup } from "../services/catalog/cardLookup";
import { ScryfallClient } from "../services/catalog/scryfallClient";
import type { CardDataClient } from "../services/catalog/types";
import { AppendProcessor } from "../services/inventory/appendProcessor";
import { RemoveProcessor } from "../services/inventory/removeProcessor";
import { ReconciliationRunner } from "../services/reconciliation/reconciliationRunner";
import { DriveClient, serviceAccountTokenProvider } from "../services/source/driveClient";
import { SourceSelector } from "../services/source/sourceSelector";
import type { StorageClient } from "../services/source/types";

// -----------------------------------------------------------------------------
// AppContext interface
// -----------------------------------------------------------------------------

export interface AppContext {
  config: RuntimeConfig;
  logger: Logger;
  db: Database;
  inventoryRepo: InventoryRepository;
  cardClient: CardDataClient;
  storage?: StorageClient;
  runner: ReconciliationRunner;
}

/** Collaborators tests (or scripts) may supply instead of the real ones. */
export interface ContextOverrides {
  logger?: Logger;
  cardClient?: CardDataClient;
  storage?: StorageClient;
  clock?: () => Date;
}

// Logs go to stderr so stdout stays clean for reports and --json output.
export function createLogger(level: RuntimeConfig["logLevel"]): Logger {
  return pino({ level }, pino.destination(2));
}

export function createStorage(config: RuntimeConfig, logger: Logger): StorageClient | undefined {
  if (!config.drive.credentialsPath) return undefined;
  return new DriveClient(serviceAccountTokenProvider(config.drive.credentialsPath), logger, {
    timeoutMs: config.drive.timeoutMs,
  });
}

export function createContext(config: RuntimeConfig, overrides: ContextOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const db = openDatabase(config.sqlitePath);

  try {
    const migrations = runMigrations(db, logger);
    if (migrations.applied.length > 0) {
      logger.info({ applied: migrations.applied, sqlitePath: config.sqlitePath }, "Applied database migrations");
    }
  } catch (error) {
    db.close();
    throw error;
  }

  const inventoryRepo = new InventoryRepository(db);
  const cardClient = overrides.cardClient ?? new ScryfallClient(config.scryfall, logger);
  const storage = overrides.storage ?? createStorage(config, logger);
  const clock = overrides.clock ?? (() => new Date());

  const runner = new ReconciliationRunner({
    sourceSelector: new SourceSelector(logger, storage),
    appendProcessor: new AppendProcessor(new CardLookup(cardClient, logger, clock), inventoryRepo, logger),
    removeProcessor: new RemoveProcessor(inventoryRepo, logger),
    logger,
    clock,
  });

  return { config, logger, db, inventoryRepo, cardClient, storage, runner };
}

export function closeContext(ctx: AppContext): void {
  if (ctx.db.open) {
    ctx.db.close();
  }
}

export async function withContext<T>(
  config: RuntimeConfig,
  fn: (ctx: AppContext) => Promise<T>,
  overrides: ContextOverrides = {},
): Promise<T> {
  const ctx = createContext(config, overrides);
  try {
    return await fn(ctx);
  } finally {
    closeContext(ctx);
  }
}
