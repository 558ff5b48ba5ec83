import type Database from "better-sqlite3";

/** Initialize the instance_records table and indexes. */
export function initInstanceRecordsSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS instance_records (
      id TEXT PRIMARY KEY,
      name TEXT,
      region TEXT NOT NULL,
      instance_type TEXT NOT NULL,
      filesystem_name TEXT,
      status TEXT NOT NULL,
      ip TEXT,
      attempts INTEGER NOT NULL DEFAULT 0,
      last_error TEXT,
      launched_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      terminated_at INTEGER
    )
  `);

  db.exec("CREATE INDEX IF NOT EXISTS idx_instance_records_launched ON instance_records (launched_at)");
  db.exec("CREATE INDEX IF NOT EXISTS idx_instance_records_status ON instance_records (status)");
}
