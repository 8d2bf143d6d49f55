// src/modules/records/record.mapper.ts
// Purpose: Converts between StoredRecord and its outward JSON shape; narrows untyped storage rows.

import { z } from "zod";
import { isRecordStatus, type RecordStatus } from "./record.constants";
import type {
  ChangeLog,
  JsonObject,
  JsonValue,
  RecordDetail,
  StoredRecord,
} from "./record.types";

const ChangeLogSchema = z.object({
  createdAt: z.string(),
  createdBy: z.string(),
  updatedAt: z.string().nullable().default(null),
  updatedBy: z.string().nullable().default(null),
  deletedAt: z.string().nullable().default(null),
  deletedBy: z.string().nullable().default(null),
});

export function isJsonObject(value: unknown): value is JsonObject {
  return (
    value !== null &&
    typeof value === "object" &&
    !Array.isArray(value) &&
    Object.values(value).every(isJsonValue)
  );
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;

  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      return Array.isArray(value)
        ? value.every(isJsonValue)
        : isJsonObject(value);
    default:
      return false;
  }
}

/** Storage drivers hand back Dates and bigint strings; everything else must already be JSON. */
export function toJsonValue(value: unknown): JsonValue {
  if (value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "bigint") return Number(value);
  if (isJsonValue(value)) return value;

  throw new Error(`Value is not JSON-representable: ${String(value)}`);
}

export function parseDetail(value: unknown): RecordDetail {
  const raw: unknown = typeof value === "string" ? JSON.parse(value) : value;

  if (!isJsonObject(raw)) {
    throw new Error("Record detail is not a JSON object");
  }

  const { changeLog: rawChangeLog, ...rest } = raw;
  const changeLog: ChangeLog = ChangeLogSchema.parse(rawChangeLog);

  return { ...rest, changeLog };
}

export function toInteger(value: unknown, label: string): number {
  const n = typeof value === "string" ? Number(value) : value;
  if (typeof n !== "number" || !Number.isInteger(n)) {
    throw new Error(`${label} is not an integer: ${String(value)}`);
  }
  return n;
}

export function toStatus(value: unknown): RecordStatus {
  const n = toInteger(value, "status");
  if (!isRecordStatus(n)) {
    throw new Error(`Unknown record status: ${n}`);
  }
  return n;
}

/**
 * Outward representation: core columns plus resource attributes.
 * The sync flag is internal and never leaves the service.
 */
export function serializeRecord(record: StoredRecord): JsonObject {
  return {
    id: record.id,
    ...record.attributes,
    status: record.status,
    lockVersion: record.lockVersion,
    detail: record.detail,
  };
}
