// src/modules/records/record.types.ts
// Purpose: Persisted record shape, audit metadata and actor context.

import type { RecordStatus } from "./record.constants";

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue =
  | JsonPrimitive
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type ChangeLog = {
  createdAt: string;
  createdBy: string;
  updatedAt: string | null;
  updatedBy: string | null;
  deletedAt: string | null;
  deletedBy: string | null;
};

/**
 * Structured blob kept next to every record. `changeLog` is system-managed;
 * other keys are resource-specific.
 */
export type RecordDetail = JsonObject & {
  changeLog: ChangeLog;
};

/** 1 = mirror is stale, null = in sync. */
export type SyncFlag = 1 | null;

export type StoredRecord = {
  id: number;
  status: RecordStatus;
  lockVersion: number;
  detail: RecordDetail;
  syncFlag: SyncFlag;
  /** Resource-specific columns (e.g. `name`). */
  attributes: Record<string, JsonValue>;
};

/** Insert payload; the store assigns `id`. */
export type NewRecord = Omit<StoredRecord, "id">;

export type RecordChanges = {
  status?: RecordStatus;
  detail?: RecordDetail;
  attributes?: Record<string, JsonValue>;
};

export type Actor = {
  name: string;
  roles: readonly string[];
};

export type ActorContext = Actor & {
  isPrivileged: boolean;
};
