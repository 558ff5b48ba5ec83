import { and, desc, eq, inArray, isNull, ne, sql } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { instanceRecords } from "../db/schema/index.js";
import type { InstanceStatus } from "../launch/types.js";
import type {
  IInstanceRecordRepository,
  InstanceRecord,
  ListInstanceRecordsOptions,
  NewInstanceRecord,
} from "./instance-record-repository.js";

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 500;

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

type InstanceRecordRow = typeof instanceRecords.$inferSelect;

// Newest launch first; rowid breaks ties within the same second.
const newestFirst = [desc(instanceRecords.launchedAt), desc(sql`rowid`)] as const;

export class DrizzleInstanceRecordRepository implements IInstanceRecordRepository {
  constructor(private readonly db: DrizzleDb) {}

  async insert(record: NewInstanceRecord): Promise<InstanceRecord> {
    const now = nowSeconds();
    const row: InstanceRecordRow = {
      ...record,
      lastError: null,
      launchedAt: now,
      updatedAt: now,
      terminatedAt: record.status === "terminated" ? now : null,
    };
    await this.db.insert(instanceRecords).values(row);
    return this.toRecord(row);
  }

  async getById(id: string): Promise<InstanceRecord | null> {
    const rows = await this.db.select().from(instanceRecords).where(eq(instanceRecords.id, id));
    const row = rows[0];
    return row ? this.toRecord(row) : null;
  }

  async latest(statuses?: readonly InstanceStatus[]): Promise<InstanceRecord | null> {
    if (statuses && statuses.length === 0) return null;
    const rows = await this.db
      .select()
      .from(instanceRecords)
      .where(statuses ? inArray(instanceRecords.status, [...statuses]) : undefined)
      .orderBy(...newestFirst)
      .limit(1);
    const row = rows[0];
    return row ? this.toRecord(row) : null;
  }

  async list(options: ListInstanceRecordsOptions = {}): Promise<InstanceRecord[]> {
    const limit = Math.min(Math.max(1, options.limit ?? DEFAULT_LIMIT), MAX_LIMIT);
    const rows = await this.db
      .select()
      .from(instanceRecords)
      .where(options.includeTerminated ? undefined : ne(instanceRecords.status, "terminated"))
      .orderBy(...newestFirst)
      .limit(limit);
    return rows.map((row) => this.toRecord(row));
  }

  async updateReady(id: string, ip: string): Promise<void> {
    await this.db
      .update(instanceRecords)
      .set({ status: "active", ip, lastError: null, updatedAt: nowSeconds() })
      .where(eq(instanceRecords.id, id));
  }

  async updateStatus(id: string, status: InstanceStatus, ip?: string | null): Promise<void> {
    const now = nowSeconds();
    await this.db
      .update(instanceRecords)
      .set({
        status,
        ...(ip === undefined ? {} : { ip }),
        updatedAt: now,
        ...(status === "terminated" ? { terminatedAt: now } : {}),
      })
      .where(eq(instanceRecords.id, id));
  }

  async setError(id: string, message: string): Promise<void> {
    await this.db
      .update(instanceRecords)
      .set({ lastError: message, updatedAt: nowSeconds() })
      .where(eq(instanceRecords.id, id));
  }

  async markTerminated(ids: readonly string[]): Promise<number> {
    if (ids.length === 0) return 0;
    const now = nowSeconds();
    const result = await this.db
      .update(instanceRecords)
      .set({ status: "terminated", updatedAt: now, terminatedAt: now })
      .where(and(inArray(instanceRecords.id, [...ids]), isNull(instanceRecords.terminatedAt)));
    return result.changes;
  }

  private toRecord(row: InstanceRecordRow): InstanceRecord {
    return {
      id: row.id,
      name: row.name,
      region: row.region,
      instanceType: row.instanceType,
      filesystemName: row.filesystemName,
      status: row.status,
      ip: row.ip,
      attempts: row.attempts,
      lastError: row.lastError,
      launchedAt: row.launchedAt,
      updatedAt: row.updatedAt,
      terminatedAt: row.terminatedAt,
    };
  }
}
