// src/modules/records/status.policy.ts
// Purpose: Status transition law for records. Pure predicates; callers raise the typed errors.

import { z } from "zod";
import {
  RecordStatus,
  RECORD_STATUS_VALUES,
  statusFromName,
} from "./record.constants";

/**
 * Successor table. A status without an entry is an unknown source:
 * nothing may leave it (except the privileged Deleted revival).
 */
export type StatusTransitionTable = Partial<
  Record<RecordStatus, readonly RecordStatus[]>
>;

export type StatusPolicyConfig = {
  transitions: StatusTransitionTable;
  /** Destinations a privileged actor may revive a Deleted record into. */
  revivalTargets: readonly RecordStatus[];
};

export const DEFAULT_STATUS_TRANSITIONS: StatusTransitionTable = {
  [RecordStatus.DRAFT]: [
    RecordStatus.INACTIVE,
    RecordStatus.ACTIVE,
    RecordStatus.DELETED,
    RecordStatus.MAINTENANCE,
  ],

  [RecordStatus.ACTIVE]: [
    RecordStatus.COMPLETED,
    RecordStatus.APPROVED,
    RecordStatus.REJECTED,
  ],

  [RecordStatus.INACTIVE]: [
    RecordStatus.ACTIVE,
    RecordStatus.DRAFT,
    RecordStatus.DELETED,
  ],

  [RecordStatus.MAINTENANCE]: [
    RecordStatus.INACTIVE,
    RecordStatus.ACTIVE,
    RecordStatus.DRAFT,
    RecordStatus.DELETED,
  ],

  [RecordStatus.APPROVED]: [
    RecordStatus.COMPLETED,
    RecordStatus.APPROVED,
    RecordStatus.REJECTED,
  ],

  // Completed, Deleted and Rejected have no successors.
};

export const DEFAULT_STATUS_POLICY: StatusPolicyConfig = {
  transitions: DEFAULT_STATUS_TRANSITIONS,
  revivalTargets: RECORD_STATUS_VALUES.filter(
    (status) => status !== RecordStatus.DELETED,
  ),
};

////////////////////////////////////////////////////////////////
// Evaluation
////////////////////////////////////////////////////////////////

export type TransitionDenialReason =
  | "DELETED_REQUIRES_PRIVILEGE"
  | "UNKNOWN_SOURCE_STATUS"
  | "NOT_IN_SUCCESSOR_SET";

export type TransitionVerdict =
  | { allowed: true }
  | { allowed: false; reason: TransitionDenialReason };

export function evaluateTransition(
  policy: StatusPolicyConfig,
  current: RecordStatus,
  next: RecordStatus,
  isPrivileged: boolean,
): TransitionVerdict {
  if (current === next) {
    return { allowed: true };
  }

  if (current === RecordStatus.DELETED) {
    if (isPrivileged && policy.revivalTargets.includes(next)) {
      return { allowed: true };
    }
    return isPrivileged
      ? { allowed: false, reason: "NOT_IN_SUCCESSOR_SET" }
      : { allowed: false, reason: "DELETED_REQUIRES_PRIVILEGE" };
  }

  const successors = policy.transitions[current];

  if (!successors) {
    return { allowed: false, reason: "UNKNOWN_SOURCE_STATUS" };
  }

  return successors.includes(next)
    ? { allowed: true }
    : { allowed: false, reason: "NOT_IN_SUCCESSOR_SET" };
}

export function canTransition(
  policy: StatusPolicyConfig,
  current: RecordStatus,
  next: RecordStatus,
  isPrivileged: boolean,
): boolean {
  return evaluateTransition(policy, current, next, isPrivileged).allowed;
}

////////////////////////////////////////////////////////////////
// Configuration loading
////////////////////////////////////////////////////////////////

const StatusNameSchema = z
  .string()
  .transform((value, ctx) => {
    const status = statusFromName(value);
    if (status === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown status "${value}"`,
      });
      return z.NEVER;
    }
    return status;
  });

const StatusPolicyFileSchema = z
  .object({
    transitions: z.record(z.array(StatusNameSchema)),
    revivalTargets: z.array(StatusNameSchema).optional(),
  })
  .strict();

/**
 * Validates a status policy document (status names, e.g. `"DRAFT"`) and
 * converts it to the numeric form. Throws on any unknown status.
 */
export function parseStatusPolicy(raw: unknown): StatusPolicyConfig {
  const parsed = StatusPolicyFileSchema.parse(raw);
  const transitions: StatusTransitionTable = {};

  for (const [sourceName, targets] of Object.entries(parsed.transitions)) {
    const source = statusFromName(sourceName);
    if (source === undefined) {
      throw new Error(`Unknown source status "${sourceName}" in status policy`);
    }
    transitions[source] = Array.from(new Set(targets));
  }

  const revivalTargets =
    parsed.revivalTargets ?? DEFAULT_STATUS_POLICY.revivalTargets;

  if (revivalTargets.includes(RecordStatus.DELETED)) {
    throw new Error("Status policy revivalTargets cannot contain DELETED");
  }

  return { transitions, revivalTargets };
}
