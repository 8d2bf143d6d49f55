// src/modules/records/changeLog.tracker.ts
// Decides whether and which audit fields to stamp. Timestamp and actor come from the caller.

import { RecordStatus } from "./record.constants";
import type { ChangeLog } from "./record.types";

export type MutationSummary = {
  previousStatus: RecordStatus;
  status: RecordStatus;
  /** Persisted fields whose value differs from the stored one. */
  changedFields: readonly string[];
};

export function onCreate(actor: string, timestamp: string): ChangeLog {
  return {
    createdAt: timestamp,
    createdBy: actor,
    updatedAt: null,
    updatedBy: null,
    deletedAt: null,
    deletedBy: null,
  };
}

export function onMutate(
  existing: ChangeLog,
  change: MutationSummary,
  actor: string,
  timestamp: string,
): ChangeLog {
  const enteredDeleted =
    change.status === RecordStatus.DELETED &&
    change.previousStatus !== RecordStatus.DELETED;

  if (enteredDeleted) {
    return { ...existing, deletedAt: timestamp, deletedBy: actor };
  }

  if (change.changedFields.length > 0) {
    return { ...existing, updatedAt: timestamp, updatedBy: actor };
  }

  return existing;
}

/** UTC ISO-8601 without fractional seconds, e.g. `2025-04-24T10:10:50Z`. */
export function formatUtcTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}
