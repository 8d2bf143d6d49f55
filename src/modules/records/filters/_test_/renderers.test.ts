// src/modules/records/filters/_test_/renderers.test.ts
// Both renderers over the same predicate trees.

import { describe, expect, it } from "vitest";
import { column, jsonPath, type FilterPredicate } from "../filter.types";
import { RecordFilterBuilder } from "../recordFilter.builder";
import { escapeRegex, renderMongoFilter } from "../mongo.renderer";
import {
  escapeLike,
  quoteIdentifier,
  renderSqlPredicate,
  toSnakeCase,
} from "../sql.renderer";

const createdAt = jsonPath("detail", ["changeLog", "createdAt"]);

function nameAndVisible(): FilterPredicate {
  const predicate = new RecordFilterBuilder()
    .like("name", "john doe")
    .status("status", null)
    .build();
  if (!predicate) throw new Error("expected a predicate");
  return predicate;
}

describe("renderSqlPredicate", () => {
  it("renders ordered tokens as one ILIKE pattern", () => {
    expect(renderSqlPredicate(nameAndVisible())).toEqual({
      text: '("name" ILIKE $1 AND "status" <> $2)',
      values: ["%john%doe%", 4],
    });
  });

  it("snake-cases columns and honours the start index", () => {
    expect(
      renderSqlPredicate({ op: "eq", field: column("lockVersion"), value: 2 }, { startIndex: 3 }),
    ).toEqual({ text: '"lock_version" = $3', values: [2] });
  });

  it("compares JSON paths as text", () => {
    expect(
      renderSqlPredicate({ op: "eq", field: jsonPath("detail", ["count"]), value: 5 }),
    ).toEqual({ text: `"detail" #>> '{count}' = $1`, values: ["5"] });
  });

  it("casts date comparisons", () => {
    expect(
      renderSqlPredicate({ op: "gte", field: createdAt, value: "2025-01-01", asDate: true }),
    ).toEqual({
      text: `("detail" #>> '{changeLog,createdAt}')::date >= $1::date`,
      values: ["2025-01-01"],
    });
  });

  it("renders exact strings, lists and containment", () => {
    expect(renderSqlPredicate({ op: "iexact", field: column("code"), value: "a_b" })).toEqual({
      text: '"code" ILIKE $1',
      values: ["a\\_b"],
    });
    expect(renderSqlPredicate({ op: "in", field: column("status"), values: [1, 2] })).toEqual({
      text: '"status" = ANY($1)',
      values: [[1, 2]],
    });
    expect(renderSqlPredicate({ op: "contains", column: "tags", value: 1 })).toEqual({
      text: '"tags" @> $1::jsonb',
      values: ["1"],
    });
  });

  it("renders empty groups as constants", () => {
    expect(renderSqlPredicate({ op: "and", predicates: [] }).text).toBe("TRUE");
    expect(renderSqlPredicate({ op: "or", predicates: [] }).text).toBe("FALSE");
  });

  it("refuses unsafe identifiers", () => {
    expect(() => quoteIdentifier('na"me')).toThrow("Unsafe SQL identifier");
    expect(() =>
      renderSqlPredicate({ op: "eq", field: jsonPath("detail", ["a'b"]), value: 1 }),
    ).toThrow("Unsafe JSON path segment");
  });

  it("escapes LIKE metacharacters", () => {
    expect(escapeLike("50%_off\\")).toBe("50\\%\\_off\\\\");
    expect(toSnakeCase("lockVersion")).toBe("lock_version");
  });
});

describe("renderMongoFilter", () => {
  it("renders ordered tokens as a case-insensitive regex", () => {
    const filter = renderMongoFilter(nameAndVisible());

    expect(filter).toEqual({
      $and: [
        { name: { $regex: "john.*doe", $options: "i" } },
        { status: { $ne: 4 } },
      ],
    });
    expect(new RegExp("john.*doe", "i").test("John Middle Doe")).toBe(true);
  });

  it("matches everything for a null predicate", () => {
    expect(renderMongoFilter(null)).toEqual({});
  });

  it("extends the upper date bound to the end of the day", () => {
    const predicate = new RecordFilterBuilder()
      .dateRange(createdAt, "2025-01-01,2025-01-31")
      .build();

    expect(renderMongoFilter(predicate)).toEqual({
      $and: [
        { "detail.changeLog.createdAt": { $gte: "2025-01-01" } },
        { "detail.changeLog.createdAt": { $lte: "2025-01-31T23:59:59Z" } },
      ],
    });
  });

  it("matches a single date by prefix", () => {
    expect(
      renderMongoFilter({ op: "eq", field: createdAt, value: "2025-01-15", asDate: true }),
    ).toEqual({ "detail.changeLog.createdAt": { $regex: "^2025-01-15" } });
  });

  it("anchors exact strings and escapes regex metacharacters", () => {
    expect(renderMongoFilter({ op: "iexact", field: column("code"), value: "a.b" })).toEqual({
      code: { $regex: "^a\\.b$", $options: "i" },
    });
    expect(escapeRegex("(x)")).toBe("\\(x\\)");
  });

  it("flattens containment into dotted clauses", () => {
    expect(
      renderMongoFilter({ op: "contains", column: "detail", value: { roles: ["x"], level: 2 } }),
    ).toEqual({
      $and: [{ "detail.roles": { $all: ["x"] } }, { "detail.level": 2 }],
    });
    expect(renderMongoFilter({ op: "in", field: column("status"), values: [1, 2] })).toEqual({
      status: { $in: [1, 2] },
    });
  });
});
