// src/modules/records/pg.record.store.ts
// Purpose: RecordStore over PostgreSQL. The lock-version increment is a compare-and-swap in the UPDATE's WHERE clause.

import type { FilterPredicate } from "./filters/filter.types";
import {
  quoteIdentifier,
  renderSqlPredicate,
  toSnakeCase,
} from "./filters/sql.renderer";
import type { ResourceDefinition } from "./record.definition";
import { LockConflictError } from "./record.errors";
import {
  parseDetail,
  toInteger,
  toJsonValue,
  toStatus,
} from "./record.mapper";
import type { FindQuery, RecordStore } from "./record.store";
import type {
  JsonValue,
  NewRecord,
  RecordChanges,
  StoredRecord,
  SyncFlag,
} from "./record.types";

export type SqlRow = Record<string, unknown>;

export type SqlResult = {
  rows: SqlRow[];
  rowCount: number | null;
};

/** The part of a pg Pool / PoolClient the store needs. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

/** jsonb columns take serialized JSON; scalars pass through. */
function toSqlValue(value: JsonValue): unknown {
  return value !== null && typeof value === "object" ? JSON.stringify(value) : value;
}

export class PgRecordStore implements RecordStore {
  constructor(private readonly db: SqlClient) {}

  ////////////////////////////////////////////////////////////////
  // Reads
  ////////////////////////////////////////////////////////////////

  async findById(resource: ResourceDefinition, id: number): Promise<StoredRecord | null> {
    const result = await this.db.query(
      `SELECT * FROM ${quoteIdentifier(resource.table)} WHERE "id" = $1 LIMIT 1`,
      [id],
    );

    const [row] = result.rows;
    return row ? this.toRecord(resource, row) : null;
  }

  async find(resource: ResourceDefinition, query: FindQuery): Promise<StoredRecord[]> {
    const where = this.where(query.where);
    const next = where.values.length + 1;
    const direction = query.sort.direction === "asc" ? "ASC" : "DESC";

    const result = await this.db.query(
      `SELECT * FROM ${quoteIdentifier(resource.table)}${where.text}` +
        ` ORDER BY ${quoteIdentifier(toSnakeCase(query.sort.field))} ${direction}` +
        ` LIMIT $${next} OFFSET $${next + 1}`,
      [...where.values, query.limit, query.offset],
    );

    return result.rows.map((row) => this.toRecord(resource, row));
  }

  async count(table: string, predicate: FilterPredicate | null): Promise<number> {
    const where = this.where(predicate);
    const result = await this.db.query(
      `SELECT COUNT(*)::int AS "count" FROM ${quoteIdentifier(table)}${where.text}`,
      where.values,
    );

    const [row] = result.rows;
    return row ? toInteger(row.count, "count") : 0;
  }

  async findUnsynced(resource: ResourceDefinition, limit: number): Promise<StoredRecord[]> {
    const result = await this.db.query(
      `SELECT * FROM ${quoteIdentifier(resource.table)} WHERE "sync_flag" = 1 ORDER BY "id" ASC LIMIT $1`,
      [limit],
    );

    return result.rows.map((row) => this.toRecord(resource, row));
  }

  ////////////////////////////////////////////////////////////////
  // Writes
  ////////////////////////////////////////////////////////////////

  async insert(resource: ResourceDefinition, record: NewRecord): Promise<StoredRecord> {
    const columns: string[] = [];
    const placeholders: string[] = [];
    const values: unknown[] = [];

    const add = (columnName: string, value: unknown, cast = "") => {
      values.push(value);
      columns.push(quoteIdentifier(columnName));
      placeholders.push(`$${values.length}${cast}`);
    };

    for (const [name, value] of Object.entries(record.attributes)) {
      add(toSnakeCase(name), toSqlValue(value));
    }
    add("status", record.status);
    add("lock_version", record.lockVersion);
    add("detail", JSON.stringify(record.detail), "::jsonb");
    add("sync_flag", record.syncFlag);

    const result = await this.db.query(
      `INSERT INTO ${quoteIdentifier(resource.table)} (${columns.join(", ")})` +
        ` VALUES (${placeholders.join(", ")}) RETURNING *`,
      values,
    );

    const [row] = result.rows;
    if (!row) {
      throw new Error(`Insert into ${resource.table} returned no row`);
    }
    return this.toRecord(resource, row);
  }

  async save(
    resource: ResourceDefinition,
    id: number,
    expectedVersion: number,
    changes: RecordChanges,
  ): Promise<StoredRecord> {
    const assignments: string[] = [];
    const values: unknown[] = [];

    const set = (columnName: string, value: unknown, cast = "") => {
      values.push(value);
      assignments.push(`${quoteIdentifier(columnName)} = $${values.length}${cast}`);
    };

    for (const [name, value] of Object.entries(changes.attributes ?? {})) {
      set(toSnakeCase(name), toSqlValue(value));
    }
    if (changes.status !== undefined) set("status", changes.status);
    if (changes.detail !== undefined) set("detail", JSON.stringify(changes.detail), "::jsonb");

    assignments.push(`"lock_version" = "lock_version" + 1`);
    values.push(id, expectedVersion);

    const result = await this.db.query(
      `UPDATE ${quoteIdentifier(resource.table)} SET ${assignments.join(", ")}` +
        ` WHERE "id" = $${values.length - 1} AND "lock_version" = $${values.length}` +
        ` RETURNING *`,
      values,
    );

    const [row] = result.rows;
    if (!row) {
      // Another writer moved the version between read and write.
      throw new LockConflictError(id);
    }
    return this.toRecord(resource, row);
  }

  async setSyncFlag(
    resource: ResourceDefinition,
    id: number,
    flag: SyncFlag,
    expectedVersion: number,
  ): Promise<boolean> {
    const result = await this.db.query(
      `UPDATE ${quoteIdentifier(resource.table)} SET "sync_flag" = $1` +
        ` WHERE "id" = $2 AND "lock_version" = $3`,
      [flag, id, expectedVersion],
    );
    return (result.rowCount ?? 0) > 0;
  }

  ////////////////////////////////////////////////////////////////
  // Mapping
  ////////////////////////////////////////////////////////////////

  private where(predicate: FilterPredicate | null): { text: string; values: unknown[] } {
    if (!predicate) return { text: "", values: [] };

    const fragment = renderSqlPredicate(predicate);
    return { text: ` WHERE ${fragment.text}`, values: fragment.values };
  }

  private toRecord(resource: ResourceDefinition, row: SqlRow): StoredRecord {
    const attributes: Record<string, JsonValue> = {};
    for (const name of Object.keys(resource.fields)) {
      attributes[name] = toJsonValue(row[toSnakeCase(name)]);
    }

    return {
      id: toInteger(row.id, "id"),
      status: toStatus(row.status),
      lockVersion: toInteger(row.lock_version, "lock_version"),
      detail: parseDetail(row.detail),
      syncFlag: row.sync_flag === null || row.sync_flag === undefined ? null : 1,
      attributes,
    };
  }
}
