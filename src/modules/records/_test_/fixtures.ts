// src/modules/records/_test_/fixtures.ts
// Shared actors, clock and record builders for record tests.

import { RecordStatus } from "../record.constants";
import type { ActorContext, ChangeLog, StoredRecord } from "../record.types";

export const FIXED_NOW = new Date("2025-04-24T10:10:50.123Z");
export const FIXED_STAMP = "2025-04-24T10:10:50Z";
export const fixedClock = () => FIXED_NOW;

export const admin: ActorContext = {
  name: "root",
  roles: ["superadmin"],
  isPrivileged: true,
};

export const staff: ActorContext = {
  name: "alice",
  roles: ["staff"],
  isPrivileged: false,
};

export const seededChangeLog: ChangeLog = {
  createdAt: "2025-01-15T08:00:00Z",
  createdBy: "seeder",
  updatedAt: null,
  updatedBy: null,
  deletedAt: null,
  deletedBy: null,
};

export function exampleRecord(overrides: Partial<StoredRecord> & { name?: string } = {}): StoredRecord {
  const { name, ...rest } = overrides;
  return {
    id: 1,
    status: RecordStatus.DRAFT,
    lockVersion: 1,
    detail: { changeLog: { ...seededChangeLog } },
    syncFlag: null,
    attributes: { name: name ?? "Item A" },
    ...rest,
  };
}
