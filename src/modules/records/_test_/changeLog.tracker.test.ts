// src/modules/records/_test_/changeLog.tracker.test.ts

import { describe, expect, it } from "vitest";
import { formatUtcTimestamp, onCreate, onMutate, type MutationSummary } from "../changeLog.tracker";
import { RecordStatus } from "../record.constants";
import { checkVersion } from "../optimisticLock.guard";
import { seededChangeLog } from "./fixtures";

const STAMP = "2025-04-24T10:10:50Z";

describe("changeLog tracker", () => {
  it("stamps creation only", () => {
    expect(onCreate("alice", STAMP)).toEqual({
      createdAt: STAMP,
      createdBy: "alice",
      updatedAt: null,
      updatedBy: null,
      deletedAt: null,
      deletedBy: null,
    });
  });

  it("stamps an update when fields changed", () => {
    const next = onMutate(
      seededChangeLog,
      { previousStatus: RecordStatus.DRAFT, status: RecordStatus.ACTIVE, changedFields: ["status"] },
      "bob",
      STAMP,
    );

    expect(next).toEqual({ ...seededChangeLog, updatedAt: STAMP, updatedBy: "bob" });
  });

  it("stamps deletion instead of update when entering Deleted", () => {
    const next = onMutate(
      seededChangeLog,
      { previousStatus: RecordStatus.DRAFT, status: RecordStatus.DELETED, changedFields: ["status"] },
      "root",
      STAMP,
    );

    expect(next).toEqual({ ...seededChangeLog, deletedAt: STAMP, deletedBy: "root" });
  });

  it("leaves the log untouched when nothing changed", () => {
    const next = onMutate(
      seededChangeLog,
      { previousStatus: RecordStatus.DRAFT, status: RecordStatus.DRAFT, changedFields: [] },
      "bob",
      STAMP,
    );

    expect(next).toBe(seededChangeLog);
  });

  it("does not restamp on a repeated call without changes", () => {
    const noChange: MutationSummary = { previousStatus: RecordStatus.ACTIVE, status: RecordStatus.ACTIVE, changedFields: [] };
    const stamped = { ...seededChangeLog, updatedAt: STAMP, updatedBy: "bob" };

    const first = onMutate(stamped, noChange, "carol", "2025-05-01T00:00:00Z");
    const second = onMutate(first, noChange, "carol", "2025-05-02T00:00:00Z");

    expect(second).toEqual(stamped);
  });

  it("formats UTC timestamps without fractional seconds", () => {
    expect(formatUtcTimestamp(new Date("2025-04-24T10:10:50.999Z"))).toBe(STAMP);
  });
});

describe("checkVersion", () => {
  it("passes a matching version", () => {
    expect(checkVersion(3, 3)).toEqual({ ok: true });
  });

  it("reports a stale version as a conflict", () => {
    expect(checkVersion(3, 2)).toEqual({ ok: false, reason: "VERSION_CONFLICT" });
    expect(checkVersion(3, 4)).toEqual({ ok: false, reason: "VERSION_CONFLICT" });
  });

  it("requires a version", () => {
    expect(checkVersion(1, undefined)).toEqual({ ok: false, reason: "VERSION_REQUIRED" });
    expect(checkVersion(1, null)).toEqual({ ok: false, reason: "VERSION_REQUIRED" });
  });
});
