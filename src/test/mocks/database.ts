import type Database from "better-sqlite3";
import { IN_MEMORY, openDatabase } from "../../db/connection";
import { runMigrations } from "../../db/migrate";
import { silentLogger } from "./logger";

/** Fresh in-memory store with every migration applied. */
export function createTestDatabase(): Database.Database {
  const db = openDatabase(IN_MEMORY);
  runMigrations(db, silentLogger());
  return db;
}
