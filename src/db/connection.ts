import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";

export const IN_MEMORY = ":memory:";

const ensureDir = (filePath: string) => {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

export const openDatabase = (sqlitePath: string): Database.Database => {
  if (sqlitePath === IN_MEMORY) {
    return new Database(IN_MEMORY);
  }

  const absolutePath = path.resolve(process.cwd(), sqlitePath);
  ensureDir(absolutePath);
  const db = new Database(absolutePath);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");
  db.pragma("synchronous = NORMAL");

  return db;
};
