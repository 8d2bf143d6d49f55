// src/modules/records/_test_/record.search.test.ts

import { beforeEach, describe, expect, it } from "vitest";
import { exampleResource } from "@/modules/example/example.resource";
import { renderMongoFilter } from "../filters/mongo.renderer";
import { renderSqlPredicate } from "../filters/sql.renderer";
import { RecordStatus } from "../record.constants";
import type { ResourceDefinition } from "../record.definition";
import { BadRequestError, ValidationFailedError } from "../record.errors";
import { serializeRecord } from "../record.mapper";
import { RecordSearch } from "../record.search";
import { FakeRecordMirror, MemoryRecordStore } from "./memoryRecordStore";
import { exampleRecord, seededChangeLog } from "./fixtures";

function ids(rows: readonly { [key: string]: unknown }[]): unknown[] {
  return rows.map((row) => row.id);
}

const byIdList: ResourceDefinition = {
  ...exampleResource,
  search: { id: "multi", name: "like", status: "status" },
};

const byExactName: ResourceDefinition = {
  ...exampleResource,
  search: { ...exampleResource.search, name: "equals" },
};

describe("RecordSearch", () => {
  let store: MemoryRecordStore;
  let search: RecordSearch;

  beforeEach(() => {
    store = new MemoryRecordStore();
    store.seed(exampleResource, exampleRecord({ id: 1, name: "John Doe" }));
    store.seed(exampleResource, exampleRecord({
      id: 2,
      name: "John Middle Doe",
      status: RecordStatus.ACTIVE,
      detail: { changeLog: { ...seededChangeLog, createdBy: "alice" } },
    }));
    store.seed(exampleResource, exampleRecord({ id: 3, name: "Jane Roe", status: RecordStatus.DELETED }));
    store.seed(exampleResource, exampleRecord({ id: 4, name: "Johnny" }));

    search = new RecordSearch(exampleResource, { store, defaultPageSize: 10 });
  });

  ////////////////////////////////////////////////////////////////
  // Primary store
  ////////////////////////////////////////////////////////////////

  it("matches whitespace-separated tokens in order", async () => {
    const result = await search.search({ name: "john doe" });

    expect(ids(result.data)).toEqual([2, 1]);
    expect(result.pagination).toEqual({ page: 1, pageSize: 2, totalCount: 2, display: 2 });
    expect(result.message).toBe("Success.");
  });

  it("hides deleted records unless Deleted is requested", async () => {
    const visible = await search.search({});
    const deleted = await search.search({ status: RecordStatus.DELETED });

    expect(ids(visible.data)).toEqual([4, 2, 1]);
    expect(ids(deleted.data)).toEqual([3]);
  });

  it("sorts and pages", async () => {
    const result = await search.search({ sortBy: "name", sortDir: "asc", pageSize: 2, page: 2 });

    expect(ids(result.data)).toEqual([4]);
    expect(result.pagination).toEqual({ page: 2, pageSize: 2, totalCount: 3, display: 1 });
  });

  it("returns an empty page past the end", async () => {
    const result = await search.search({ page: "5" });

    expect(result.data).toEqual([]);
    expect(result.pagination).toEqual({ page: 5, pageSize: 3, totalCount: 3, display: 0 });
  });

  it("filters on change-log actors case-insensitively", async () => {
    const result = await search.search({ createdBy: "ALICE" });

    expect(ids(result.data)).toEqual([2]);
  });

  it("filters on change-log dates", async () => {
    const hit = await search.search({ createdAt: "2025-01-01,2025-01-31" });
    const miss = await search.search({ createdAt: "2025-02-01" });

    expect(hit.pagination.totalCount).toBe(3);
    expect(miss.pagination.totalCount).toBe(0);
  });

  it("returns serialized rows", async () => {
    const result = await search.search({ id: 1 });

    expect(result.data).toEqual([
      {
        id: 1,
        name: "John Doe",
        status: RecordStatus.DRAFT,
        lockVersion: 1,
        detail: { changeLog: seededChangeLog },
      },
    ]);
  });

  ////////////////////////////////////////////////////////////////
  // Typed parameters
  ////////////////////////////////////////////////////////////////

  it("passes an integer id to both backends as a number", () => {
    const { where } = search.parse({ id: "7" });
    if (!where) throw new Error("expected a predicate");

    expect(renderMongoFilter(where)).toEqual({ $and: [{ id: 7 }, { status: { $ne: 4 } }] });
    expect(renderSqlPredicate(where)).toEqual({
      text: '("id" = $1 AND "status" <> $2)',
      values: [7, 4],
    });
  });

  it("rejects a non-integer id instead of sending it to storage", async () => {
    await expect(search.search({ id: "abc" })).rejects.toMatchObject({
      errors: [{ field: "id", message: "id is invalid." }],
    });
  });

  it("runs declared fields through their schema", async () => {
    search = new RecordSearch(byExactName, { store, defaultPageSize: 10 });

    const result = await search.search({ name: "  Johnny " });

    expect(ids(result.data)).toEqual([4]);
  });

  it("matches an id list", async () => {
    search = new RecordSearch(byIdList, { store, defaultPageSize: 10 });

    const result = await search.search({ id: "1, 2" });

    expect(ids(result.data)).toEqual([2, 1]);
  });

  it("rejects an id list with non-integer items", async () => {
    search = new RecordSearch(byIdList, { store, defaultPageSize: 10 });

    await expect(search.search({ id: "abc" })).rejects.toMatchObject({
      errors: [{ field: "id", message: "id is invalid." }],
    });
    await expect(search.search({ id: "1,x" })).rejects.toBeInstanceOf(ValidationFailedError);
    await expect(search.search({ id: [1, 2.5] })).rejects.toBeInstanceOf(ValidationFailedError);
  });

  ////////////////////////////////////////////////////////////////
  // Parameter validation
  ////////////////////////////////////////////////////////////////

  it("collects parameter errors", async () => {
    const attempt = search.search({ color: "red", page: 0, sortBy: "detail" });

    await expect(attempt).rejects.toBeInstanceOf(ValidationFailedError);
    await expect(attempt).rejects.toMatchObject({
      errors: [
        { field: "color", message: "Field color is not a valid request parameter." },
        { field: "page", message: "Page must be greater than 0." },
        {
          field: "sortBy",
          message: "Sort By must be one of the following values: id, name, status.",
        },
      ],
    });
  });

  it("rejects a non-integer page", async () => {
    await expect(search.search({ page: "abc" })).rejects.toMatchObject({
      errors: [{ field: "page", message: "Page must be an integer." }],
    });
  });

  it("rejects malformed dates", async () => {
    await expect(search.search({ createdAt: "2025-13" })).rejects.toMatchObject({
      errors: [{ field: "createdAt", message: "createdAt is invalid." }],
    });
  });

  it("rejects a non-object body", () => {
    expect(() => search.parse(["name"])).toThrow(BadRequestError);
  });

  ////////////////////////////////////////////////////////////////
  // Mirror
  ////////////////////////////////////////////////////////////////

  it("requires a configured mirror", async () => {
    await expect(search.search({}, "mirror")).rejects.toBeInstanceOf(BadRequestError);
  });

  it("queries the mirror collection and strips internal keys", async () => {
    const mirror = new FakeRecordMirror();
    mirror.seed("example", { _id: "665f1c", id: 1, name: "John Doe", status: 2, lockVersion: 1, detail: {}, syncFlag: null });
    mirror.seed("example", { _id: "665f1d", id: 3, name: "John Doe", status: 4, lockVersion: 2, detail: {}, syncFlag: null });
    search = new RecordSearch(exampleResource, { store, mirror, defaultPageSize: 10 });

    const result = await search.search({ name: "john doe" }, "mirror");

    expect(result.data).toEqual([{ id: 1, name: "John Doe", status: 2, lockVersion: 1, detail: {} }]);
    expect(mirror.finds).toEqual([
      {
        collection: "example",
        filter: {
          $and: [
            { name: { $regex: "john.*doe", $options: "i" } },
            { status: { $ne: 4 } },
          ],
        },
        options: { sort: { id: -1 }, limit: 1, skip: 0 },
      },
    ]);
  });

  ////////////////////////////////////////////////////////////////
  // Backend agreement
  ////////////////////////////////////////////////////////////////

  describe("primary and mirror select the same rows", () => {
    let mirror: FakeRecordMirror;

    beforeEach(() => {
      mirror = new FakeRecordMirror();
      for (const id of [1, 2, 3, 4]) {
        const record = store.get(exampleResource, id);
        if (record) mirror.seed("example", serializeRecord(record));
      }
    });

    async function bothBackends(resource: ResourceDefinition, params: Record<string, unknown>) {
      const target = new RecordSearch(resource, { store, mirror, defaultPageSize: 10 });
      const primary = await target.search(params);
      const mirrored = await target.search(params, "mirror");
      return { primary: ids(primary.data), mirror: ids(mirrored.data) };
    }

    it.each([
      { label: "an id sent as text", params: { id: "2" }, expected: [2] },
      { label: "ordered name tokens", params: { name: "john doe" }, expected: [2, 1] },
      { label: "a status", params: { status: String(RecordStatus.ACTIVE) }, expected: [2] },
      { label: "a creation date", params: { createdAt: "2025-01-15" }, expected: [4, 2, 1] },
      { label: "a creation date range", params: { createdAt: "2025-01-01,2025-01-15" }, expected: [4, 2, 1] },
      { label: "a later date range", params: { createdAt: "2025-01-16,2025-02-01" }, expected: [] },
      { label: "a creator", params: { createdBy: "ALICE" }, expected: [2] },
    ])("for $label", async ({ params, expected }) => {
      await expect(bothBackends(exampleResource, params)).resolves.toEqual({
        primary: expected,
        mirror: expected,
      });
    });

    it("for an id list", async () => {
      await expect(bothBackends(byIdList, { id: "1,3,4" })).resolves.toEqual({
        primary: [4, 1],
        mirror: [4, 1],
      });
    });
  });
});
