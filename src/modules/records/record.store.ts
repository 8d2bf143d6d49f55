// src/modules/records/record.store.ts
// Purpose: Storage seams for the lifecycle: the authoritative relational store and the optional document mirror.

import type { Document } from "mongodb";
import type { FilterPredicate } from "./filters/filter.types";
import type { ResourceDefinition } from "./record.definition";
import type {
  JsonObject,
  NewRecord,
  RecordChanges,
  StoredRecord,
  SyncFlag,
} from "./record.types";
import type { SortSpec } from "./pagination";

export type FindQuery = {
  where: FilterPredicate | null;
  sort: SortSpec;
  limit: number;
  offset: number;
};

export interface RecordStore {
  findById(resource: ResourceDefinition, id: number): Promise<StoredRecord | null>;

  find(resource: ResourceDefinition, query: FindQuery): Promise<StoredRecord[]>;

  /** Counts rows of any table; used for search totals and dependency lookups. */
  count(table: string, where: FilterPredicate | null): Promise<number>;

  insert(resource: ResourceDefinition, record: NewRecord): Promise<StoredRecord>;

  /**
   * Writes `changes` and increments the lock version only if the stored
   * version still equals `expectedVersion`; otherwise throws LockConflictError.
   */
  save(
    resource: ResourceDefinition,
    id: number,
    expectedVersion: number,
    changes: RecordChanges,
  ): Promise<StoredRecord>;

  /**
   * Writes the flag only while the row is still at `expectedVersion`, so a
   * stale writer never marks a newer row as in sync. Resolves to whether the
   * row was updated. Does not touch the lock version.
   */
  setSyncFlag(
    resource: ResourceDefinition,
    id: number,
    flag: SyncFlag,
    expectedVersion: number,
  ): Promise<boolean>;

  findUnsynced(resource: ResourceDefinition, limit: number): Promise<StoredRecord[]>;
}

export type MirrorFindOptions = {
  sort: Record<string, 1 | -1>;
  limit: number;
  skip: number;
};

/** `stale`: the mirror already holds a newer lock version, nothing was written. */
export type MirrorUpsertOutcome = "written" | "stale";

export interface RecordMirror {
  /** Replaces the document only when its stored `lockVersion` is not newer than the incoming one. */
  upsert(
    collection: string,
    document: JsonObject,
    uniqueKeys: readonly string[],
  ): Promise<MirrorUpsertOutcome>;

  count(collection: string, filter: Document): Promise<number>;

  find(collection: string, filter: Document, options: MirrorFindOptions): Promise<Document[]>;
}
