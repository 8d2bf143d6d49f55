// src/modules/records/_test_/memoryRecordStore.ts
// In-process RecordStore / RecordMirror stand-ins. Predicates are evaluated against plain rows.

import { isDeepStrictEqual } from "node:util";
import type { Document } from "mongodb";
import type { FieldRef, FilterPredicate } from "../filters/filter.types";
import { column } from "../filters/filter.types";
import { escapeRegex } from "../filters/mongo.renderer";
import type { ResourceDefinition } from "../record.definition";
import { LockConflictError } from "../record.errors";
import { serializeRecord } from "../record.mapper";
import type {
  FindQuery,
  MirrorFindOptions,
  MirrorUpsertOutcome,
  RecordMirror,
  RecordStore,
} from "../record.store";
import type {
  JsonObject,
  JsonValue,
  NewRecord,
  RecordChanges,
  StoredRecord,
  SyncFlag,
} from "../record.types";

type Row = Record<string, JsonValue>;

function readField(row: Row, field: FieldRef): JsonValue | undefined {
  if (field.kind === "column") return row[field.name];

  let current: JsonValue | undefined = row[field.column];
  for (const segment of field.path) {
    if (current === null || current === undefined || typeof current !== "object" || Array.isArray(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

function order(a: string | number | boolean, b: string | number | boolean): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function jsonContains(container: JsonValue | undefined, value: JsonValue): boolean {
  if (container === undefined) return false;

  if (Array.isArray(container)) {
    return Array.isArray(value)
      ? value.every((item) => container.some((c) => jsonContains(c, item)))
      : container.some((c) => jsonContains(c, value));
  }

  if (
    container !== null && typeof container === "object" &&
    value !== null && typeof value === "object" && !Array.isArray(value)
  ) {
    return Object.entries(value).every(([key, nested]) => jsonContains(container[key], nested));
  }

  return isDeepStrictEqual(container, value);
}

export function matches(row: Row, predicate: FilterPredicate): boolean {
  switch (predicate.op) {
    case "eq":
    case "ne":
    case "gt":
    case "gte":
    case "lt":
    case "lte": {
      const raw = readField(row, predicate.field);
      if (raw === undefined || raw === null) return false;

      let left: string | number | boolean = typeof raw === "object" ? JSON.stringify(raw) : raw;
      let right: string | number | boolean = predicate.value;

      if (predicate.asDate) {
        left = String(left).slice(0, 10);
        right = String(right).slice(0, 10);
      } else if (predicate.field.kind === "json") {
        left = String(left);
        right = String(right);
      }

      const cmp = order(left, right);
      switch (predicate.op) {
        case "eq": return left === right;
        case "ne": return left !== right;
        case "gt": return cmp > 0;
        case "gte": return cmp >= 0;
        case "lt": return cmp < 0;
        default: return cmp <= 0;
      }
    }

    case "like": {
      const value = readField(row, predicate.field);
      if (value === undefined || value === null) return false;
      return new RegExp(predicate.tokens.map(escapeRegex).join(".*"), "i").test(String(value));
    }

    case "iexact": {
      const value = readField(row, predicate.field);
      if (value === undefined || value === null) return false;
      return String(value).toLowerCase() === predicate.value.toLowerCase();
    }

    case "in": {
      const value = readField(row, predicate.field);
      return typeof value === "number" && predicate.values.includes(value);
    }

    case "contains":
      return jsonContains(row[predicate.column], predicate.value);

    case "and":
      return predicate.predicates.every((p) => matches(row, p));

    case "or":
      return predicate.predicates.some((p) => matches(row, p));
  }
}

function toRow(record: StoredRecord): Row {
  return { ...serializeRecord(record), syncFlag: record.syncFlag };
}

export class MemoryRecordStore implements RecordStore {
  private readonly records = new Map<string, StoredRecord[]>();
  private readonly plainRows = new Map<string, Row[]>();
  private nextId = 1;

  /** Set to make the next write of that kind reject. */
  failNext: { insert?: Error; save?: Error; setSyncFlag?: Error } = {};

  readonly countCalls: { table: string; where: FilterPredicate | null }[] = [];

  private table(name: string): StoredRecord[] {
    let rows = this.records.get(name);
    if (!rows) {
      rows = [];
      this.records.set(name, rows);
    }
    return rows;
  }

  /** Rows of a table that is not a record resource (e.g. a referencing table). */
  seedRow(table: string, row: Row): void {
    const rows = this.plainRows.get(table) ?? [];
    rows.push(row);
    this.plainRows.set(table, rows);
  }

  seed(resource: ResourceDefinition, record: StoredRecord): StoredRecord {
    this.table(resource.table).push(structuredClone(record));
    this.nextId = Math.max(this.nextId, record.id + 1);
    return record;
  }

  get(resource: ResourceDefinition, id: number): StoredRecord | undefined {
    const found = this.table(resource.table).find((record) => record.id === id);
    return found ? structuredClone(found) : undefined;
  }

  async findById(resource: ResourceDefinition, id: number): Promise<StoredRecord | null> {
    return this.get(resource, id) ?? null;
  }

  async find(resource: ResourceDefinition, query: FindQuery): Promise<StoredRecord[]> {
    const { where, sort } = query;
    const field = column(sort.field);
    const sign = sort.direction === "asc" ? 1 : -1;

    return this.table(resource.table)
      .filter((record) => where === null || matches(toRow(record), where))
      .sort((a, b) => {
        const left = readField(toRow(a), field);
        const right = readField(toRow(b), field);
        if (left === null || left === undefined || typeof left === "object") return 1;
        if (right === null || right === undefined || typeof right === "object") return -1;
        return sign * order(left, right);
      })
      .slice(query.offset, query.offset + query.limit)
      .map((record) => structuredClone(record));
  }

  async count(table: string, where: FilterPredicate | null): Promise<number> {
    this.countCalls.push({ table, where });

    const rows: Row[] = this.records.has(table)
      ? this.table(table).map(toRow)
      : this.plainRows.get(table) ?? [];

    return rows.filter((row) => where === null || matches(row, where)).length;
  }

  async insert(resource: ResourceDefinition, record: NewRecord): Promise<StoredRecord> {
    const failure = this.failNext.insert;
    if (failure) {
      this.failNext.insert = undefined;
      throw failure;
    }

    const stored: StoredRecord = { ...structuredClone(record), id: this.nextId++ };
    this.table(resource.table).push(stored);
    return structuredClone(stored);
  }

  async save(
    resource: ResourceDefinition,
    id: number,
    expectedVersion: number,
    changes: RecordChanges,
  ): Promise<StoredRecord> {
    const failure = this.failNext.save;
    if (failure) {
      this.failNext.save = undefined;
      throw failure;
    }

    const stored = this.table(resource.table).find((record) => record.id === id);
    if (!stored || stored.lockVersion !== expectedVersion) {
      throw new LockConflictError(id);
    }

    if (changes.status !== undefined) stored.status = changes.status;
    if (changes.detail !== undefined) stored.detail = structuredClone(changes.detail);
    if (changes.attributes) {
      stored.attributes = { ...stored.attributes, ...structuredClone(changes.attributes) };
    }
    stored.lockVersion += 1;

    return structuredClone(stored);
  }

  async setSyncFlag(
    resource: ResourceDefinition,
    id: number,
    flag: SyncFlag,
    expectedVersion: number,
  ): Promise<boolean> {
    const failure = this.failNext.setSyncFlag;
    if (failure) {
      this.failNext.setSyncFlag = undefined;
      throw failure;
    }

    const stored = this.table(resource.table).find((record) => record.id === id);
    if (!stored || stored.lockVersion !== expectedVersion) return false;

    stored.syncFlag = flag;
    return true;
  }

  async findUnsynced(resource: ResourceDefinition, limit: number): Promise<StoredRecord[]> {
    return this.table(resource.table)
      .filter((record) => record.syncFlag === 1)
      .sort((a, b) => a.id - b.id)
      .slice(0, limit)
      .map((record) => structuredClone(record));
  }
}

////////////////////////////////////////////////////////////////
// Mirror
////////////////////////////////////////////////////////////////

function isDocument(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function valueAt(document: Document, path: string): unknown {
  let current: unknown = document;
  for (const segment of path.split(".")) {
    if (!isDocument(current)) return undefined;
    current = current[segment];
  }
  return current;
}

function compareSameType(left: unknown, right: unknown): number | null {
  if (typeof left === "number" && typeof right === "number") return left - right;
  if (typeof left === "string" && typeof right === "string") {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  return null;
}

function equalsValue(value: unknown, expected: unknown): boolean {
  if (isDeepStrictEqual(value, expected)) return true;
  return Array.isArray(value) && value.some((item) => isDeepStrictEqual(item, expected));
}

function isOperatorObject(condition: unknown): condition is Record<string, unknown> {
  return isDocument(condition) && Object.keys(condition).some((key) => key.startsWith("$"));
}

function matchesCondition(value: unknown, condition: unknown): boolean {
  if (!isOperatorObject(condition)) return equalsValue(value, condition);
  const regexFlags = typeof condition.$options === "string" ? condition.$options : "";

  return Object.entries(condition).every(([operator, operand]) => {
    switch (operator) {
      case "$ne":
        return !equalsValue(value, operand);
      case "$in":
        return Array.isArray(operand) && operand.some((item) => equalsValue(value, item));
      case "$all":
        return Array.isArray(operand) && operand.every((item) => equalsValue(value, item));
      case "$exists":
        return (value !== undefined) === Boolean(operand);
      case "$regex":
        return typeof value === "string" && typeof operand === "string" && new RegExp(operand, regexFlags).test(value);
      case "$options":
        return true;
      case "$gt":
      case "$gte":
      case "$lt":
      case "$lte": {
        const cmp = compareSameType(value, operand);
        if (cmp === null) return false;
        if (operator === "$gt") return cmp > 0;
        if (operator === "$gte") return cmp >= 0;
        if (operator === "$lt") return cmp < 0;
        return cmp <= 0;
      }
      default:
        throw new Error(`Unsupported filter operator ${operator}`);
    }
  });
}

/** Evaluates the subset of the MongoDB query language the filter renderer emits. */
export function matchesDocument(document: Document, filter: Document): boolean {
  return Object.entries(filter).every(([key, condition]: [string, unknown]) => {
    if (key === "$and") {
      return Array.isArray(condition) && condition.every((part) => isDocument(part) && matchesDocument(document, part));
    }
    if (key === "$or") {
      return Array.isArray(condition) && condition.some((part) => isDocument(part) && matchesDocument(document, part));
    }
    return matchesCondition(valueAt(document, key), condition);
  });
}

/**
 * Mirror stand-in. Upserts keep the newest lock version per unique key;
 * reads evaluate the rendered filter against the stored documents and
 * record the filter they were asked with.
 */
export class FakeRecordMirror implements RecordMirror {
  readonly documents = new Map<string, JsonObject[]>();
  readonly finds: { collection: string; filter: Document; options: MirrorFindOptions }[] = [];
  failUpserts: Error | null = null;

  /** Runs once, at the start of the next upsert, before anything is written. */
  beforeNextUpsert: (() => Promise<void>) | null = null;

  seed(collection: string, document: JsonObject): void {
    const docs = this.documents.get(collection) ?? [];
    docs.push(structuredClone(document));
    this.documents.set(collection, docs);
  }

  async upsert(
    collection: string,
    document: JsonObject,
    uniqueKeys: readonly string[],
  ): Promise<MirrorUpsertOutcome> {
    const hook = this.beforeNextUpsert;
    if (hook) {
      this.beforeNextUpsert = null;
      await hook();
    }

    if (this.failUpserts) throw this.failUpserts;

    const docs = this.documents.get(collection) ?? [];
    const index = docs.findIndex((doc) => uniqueKeys.every((key) => isDeepStrictEqual(doc[key], document[key])));
    const existing = index >= 0 ? docs[index] : undefined;

    if (existing) {
      const held = existing.lockVersion;
      const incoming = document.lockVersion;
      if (typeof held === "number" && typeof incoming === "number" && held > incoming) {
        return "stale";
      }
      docs[index] = structuredClone(document);
    } else {
      docs.push(structuredClone(document));
    }
    this.documents.set(collection, docs);
    return "written";
  }

  async count(collection: string, filter: Document): Promise<number> {
    return this.select(collection, filter).length;
  }

  async find(collection: string, filter: Document, options: MirrorFindOptions): Promise<Document[]> {
    this.finds.push({ collection, filter, options });

    const [sortField, direction]: [string, 1 | -1] = Object.entries(options.sort)[0] ?? ["id", -1];
    return this.select(collection, filter)
      .sort((a, b) => direction * (compareSameType(a[sortField], b[sortField]) ?? 0))
      .slice(options.skip, options.skip + options.limit);
  }

  private select(collection: string, filter: Document): JsonObject[] {
    return (this.documents.get(collection) ?? [])
      .filter((doc) => matchesDocument(doc, filter))
      .map((doc) => structuredClone(doc));
  }
}
