// src/modules/records/filters/filter.types.ts
// Purpose: Backend-neutral predicate representation. Rendered independently for PostgreSQL and MongoDB.

import type { JsonValue } from "../record.types";

/**
 * A plain column, or a path inside a JSON column
 * (`{ column: "detail", path: ["changeLog", "createdAt"] }`).
 */
export type FieldRef =
  | { kind: "column"; name: string }
  | { kind: "json"; column: string; path: readonly string[] };

export type ComparisonOperator = "eq" | "ne" | "gte" | "lte" | "lt" | "gt";

export type FilterPredicate =
  | {
      op: ComparisonOperator;
      field: FieldRef;
      value: string | number | boolean;
      /** Compare the date part of a timestamp value. */
      asDate?: boolean;
    }
  | {
      /** Case-insensitive substring match; tokens appear in order with anything between. */
      op: "like";
      field: FieldRef;
      tokens: readonly string[];
    }
  | {
      /** Case-insensitive, anchored at both ends. */
      op: "iexact";
      field: FieldRef;
      value: string;
    }
  | {
      op: "in";
      field: FieldRef;
      values: readonly number[];
    }
  | {
      /** JSON containment (`@>` / array membership). */
      op: "contains";
      column: string;
      value: JsonValue;
    }
  | { op: "and"; predicates: readonly FilterPredicate[] }
  | { op: "or"; predicates: readonly FilterPredicate[] };

export function column(name: string): FieldRef {
  return { kind: "column", name };
}

export function jsonPath(columnName: string, path: readonly string[]): FieldRef {
  return { kind: "json", column: columnName, path };
}

/** Dotted form used by document stores (`detail.changeLog.createdAt`). */
export function fieldPath(field: FieldRef): string {
  return field.kind === "column"
    ? field.name
    : [field.column, ...field.path].join(".");
}
