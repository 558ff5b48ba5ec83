import type { InstanceStatus } from "../launch/types.js";

export interface InstanceRecord {
  id: string;
  name: string | null;
  region: string;
  instanceType: string;
  filesystemName: string | null;
  status: InstanceStatus;
  ip: string | null;
  attempts: number;
  lastError: string | null;
  /** Epoch seconds. */
  launchedAt: number;
  updatedAt: number;
  terminatedAt: number | null;
}

export interface NewInstanceRecord {
  id: string;
  name: string | null;
  region: string;
  instanceType: string;
  filesystemName: string | null;
  status: InstanceStatus;
  ip: string | null;
  attempts: number;
}

export interface ListInstanceRecordsOptions {
  /** Default 20. */
  limit?: number;
  includeTerminated?: boolean;
}

/** Statuses of instances that may still be running. */
export const LIVE_STATUSES: readonly InstanceStatus[] = ["booting", "active", "unhealthy", "unknown"];

export interface IInstanceRecordRepository {
  insert(record: NewInstanceRecord): Promise<InstanceRecord>;
  getById(id: string): Promise<InstanceRecord | null>;
  /** Most recently launched record, optionally restricted to the given statuses. */
  latest(statuses?: readonly InstanceStatus[]): Promise<InstanceRecord | null>;
  /** Newest first. */
  list(options?: ListInstanceRecordsOptions): Promise<InstanceRecord[]>;
  updateReady(id: string, ip: string): Promise<void>;
  updateStatus(id: string, status: InstanceStatus, ip?: string | null): Promise<void>;
  setError(id: string, message: string): Promise<void>;
  /** Returns how many records changed. */
  markTerminated(ids: readonly string[]): Promise<number>;
}
