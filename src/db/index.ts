import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";
import { initInstanceRecordsSchema } from "../instances/schema.js";
import * as schema from "./schema/index.js";

/** The schema type shared across all db instances. */
export type Schema = typeof schema;

export type DrizzleDb = BetterSQLite3Database<Schema>;

export interface LedgerDatabase {
  sqlite: Database.Database;
  db: DrizzleDb;
}

/** Wrap an open better-sqlite3 handle. Tests pass an in-memory one. */
export function createDb(sqlite: Database.Database): DrizzleDb {
  return drizzle(sqlite, { schema });
}

/**
 * Open (creating if needed) the ledger database at `path` and make sure the
 * tables exist.
 *
 * - journal_mode = WAL: a `wait` in one terminal does not block `list` in another
 * - busy_timeout = 5000: wait for write locks instead of failing with SQLITE_BUSY
 */
export function openDatabase(path: string): LedgerDatabase {
  if (path !== ":memory:") mkdirSync(dirname(path), { recursive: true });
  const sqlite = new Database(path);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("busy_timeout = 5000");
  initInstanceRecordsSchema(sqlite);
  return { sqlite, db: createDb(sqlite) };
}

export { schema };
