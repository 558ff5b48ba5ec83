import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { INSTANCE_STATUSES } from "../../launch/types.js";

/**
 * Local ledger of instances launched from this machine.
 * Timestamps are epoch seconds.
 */
export const instanceRecords = sqliteTable(
  "instance_records",
  {
    id: text("id").primaryKey(),
    name: text("name"),
    region: text("region").notNull(),
    instanceType: text("instance_type").notNull(),
    filesystemName: text("filesystem_name"),
    status: text("status", { enum: INSTANCE_STATUSES }).notNull(),
    ip: text("ip"),
    /** Remote launch calls it took to create the instance. */
    attempts: integer("attempts").notNull().default(0),
    lastError: text("last_error"),
    launchedAt: integer("launched_at").notNull(),
    updatedAt: integer("updated_at").notNull(),
    terminatedAt: integer("terminated_at"),
  },
  (table) => ({
    launchedAtIdx: index("idx_instance_records_launched").on(table.launchedAt),
    statusIdx: index("idx_instance_records_status").on(table.status),
  }),
);
