import Database from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";
import type { Logger } from "pino";
import { migrateLedgerDb } from "./migrate.js";

export type LedgerDb = Database.Database;

function ensureDirExists(dirPath: string) {
  if (!fs.existsSync(dirPath)) fs.mkdirSync(dirPath, { recursive: true });
}

/** Open (creating if needed) a ledger database and bring its schema up to date. */
export function openLedgerDb(filePath: string, log: Logger): LedgerDb {
  const inMemory = filePath === ":memory:";
  if (!inMemory) ensureDirExists(path.dirname(path.resolve(filePath)));
  const db = new Database(inMemory ? filePath : path.resolve(filePath), { fileMustExist: false });
  if (!inMemory) db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  migrateLedgerDb(db, log);
  log.debug({ path: filePath }, "ledger_db_open");
  return db;
}
