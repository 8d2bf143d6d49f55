// src/modules/records/mongo.record.mirror.ts
// Purpose: RecordMirror over a MongoDB database. Documents are upserted by the resource's unique keys.

import { MongoServerError, type Db, type Document } from "mongodb";
import type { MirrorFindOptions, MirrorUpsertOutcome, RecordMirror } from "./record.store";
import type { JsonObject } from "./record.types";

const DUPLICATE_KEY = 11000;

export class MongoRecordMirror implements RecordMirror {
  private readonly indexed = new Set<string>();

  constructor(private readonly db: Db) {}

  /**
   * The version guard sits in the upsert filter. When a newer document
   * holds the unique keys the filter misses, the insert half of the upsert
   * hits the unique index, and that collision is reported as `stale`.
   */
  async upsert(
    collection: string,
    document: JsonObject,
    uniqueKeys: readonly string[],
  ): Promise<MirrorUpsertOutcome> {
    await this.ensureUniqueIndex(collection, uniqueKeys);

    const criteria: Document = {};
    for (const key of uniqueKeys) {
      criteria[key] = document[key] ?? null;
    }

    const version = document.lockVersion;
    if (typeof version === "number") {
      criteria.$or = [
        { lockVersion: { $lte: version } },
        { lockVersion: { $exists: false } },
      ];
    }

    try {
      await this.db
        .collection(collection)
        .updateOne(criteria, { $set: document }, { upsert: true });
      return "written";
    } catch (err) {
      if (err instanceof MongoServerError && err.code === DUPLICATE_KEY) {
        return "stale";
      }
      throw err;
    }
  }

  private async ensureUniqueIndex(
    collection: string,
    uniqueKeys: readonly string[],
  ): Promise<void> {
    if (this.indexed.has(collection)) return;

    const keys: Record<string, 1> = {};
    for (const key of uniqueKeys) keys[key] = 1;

    await this.db.collection(collection).createIndex(keys, { unique: true });
    this.indexed.add(collection);
  }

  count(collection: string, filter: Document): Promise<number> {
    return this.db.collection(collection).countDocuments(filter);
  }

  find(
    collection: string,
    filter: Document,
    options: MirrorFindOptions,
  ): Promise<Document[]> {
    return this.db
      .collection(collection)
      .find(filter, {
        projection: { _id: 0 },
        sort: options.sort,
        skip: options.skip,
        limit: options.limit,
      })
      .toArray();
  }
}
