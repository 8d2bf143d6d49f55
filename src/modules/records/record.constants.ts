// src/modules/records/record.constants.ts
// Purpose: Closed status enumeration, scenario names and status groupings shared by every record resource.

export const RecordStatus = {
  INACTIVE: 0,
  ACTIVE: 1,
  DRAFT: 2,
  COMPLETED: 3,
  DELETED: 4,
  MAINTENANCE: 5,
  APPROVED: 6,
  REJECTED: 7,
} as const;

export type RecordStatus = (typeof RecordStatus)[keyof typeof RecordStatus];

export type RecordStatusName = keyof typeof RecordStatus;

export const RECORD_STATUS_VALUES: readonly RecordStatus[] =
  Object.values(RecordStatus);

export const RECORD_STATUS_LABELS: Record<RecordStatus, string> = {
  [RecordStatus.INACTIVE]: "Inactive",
  [RecordStatus.ACTIVE]: "Active",
  [RecordStatus.DRAFT]: "Draft",
  [RecordStatus.COMPLETED]: "Completed",
  [RecordStatus.DELETED]: "Deleted",
  [RecordStatus.MAINTENANCE]: "Maintenance",
  [RecordStatus.APPROVED]: "Approved",
  [RecordStatus.REJECTED]: "Rejected",
};

export function isRecordStatus(value: unknown): value is RecordStatus {
  return (
    typeof value === "number" &&
    RECORD_STATUS_VALUES.some((status) => status === value)
  );
}

export function statusFromName(name: string): RecordStatus | undefined {
  const key = name.trim().toUpperCase();
  for (const [statusName, value] of Object.entries(RecordStatus)) {
    if (statusName === key) return value;
  }
  return undefined;
}

////////////////////////////////////////////////////////////////
// Scenarios
////////////////////////////////////////////////////////////////

export const Scenario = {
  CREATE: "create",
  UPDATE: "update",
  DELETE: "delete",
} as const;

export type Scenario = (typeof Scenario)[keyof typeof Scenario];

////////////////////////////////////////////////////////////////
// Status groupings
////////////////////////////////////////////////////////////////

/** Statuses only a privileged actor may request. */
export const RESTRICTED_STATUSES: readonly RecordStatus[] = [
  RecordStatus.DELETED,
  RecordStatus.COMPLETED,
];

/** Target statuses that trip the dependency guard on a referenced record. */
export const DISALLOWED_UPDATE_STATUSES: readonly RecordStatus[] = [
  RecordStatus.COMPLETED,
  RecordStatus.DELETED,
  RecordStatus.REJECTED,
];

export const DEFAULT_CREATE_STATUS: RecordStatus = RecordStatus.DRAFT;

export const INITIAL_LOCK_VERSION = 1;

export const SYSTEM_ACTOR_NAME = "system";
