// src/modules/records/filters/recordFilter.builder.ts
// Purpose: Accumulates sparse caller filters into one predicate tree. Null/absent input is "no opinion".

import { RecordStatus } from "../record.constants";
import type { JsonValue } from "../record.types";
import {
  column,
  jsonPath,
  type FieldRef,
  type FilterPredicate,
} from "./filter.types";

type Scalar = string | number | boolean;

function toFieldRef(field: string | FieldRef): FieldRef {
  return typeof field === "string" ? column(field) : field;
}

function isPresent<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}

function parseCsvInteger(item: string): number {
  const trimmed = item.trim();
  return /^-?\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
}

export class RecordFilterBuilder {
  private readonly predicates: FilterPredicate[] = [];

  equals(field: string | FieldRef, value: Scalar | null | undefined): this {
    if (!isPresent(value)) return this;

    this.predicates.push({ op: "eq", field: toFieldRef(field), value });
    return this;
  }

  /**
   * Whitespace separates tokens: "john doe" matches anything containing
   * "john" followed later by "doe", case-insensitively.
   */
  like(field: string | FieldRef, value: string | null | undefined): this {
    if (!isPresent(value)) return this;

    const tokens = value.split(/\s+/).filter((token) => token.length > 0);
    if (tokens.length === 0) return this;

    this.predicates.push({ op: "like", field: toFieldRef(field), tokens });
    return this;
  }

  exactString(field: string | FieldRef, value: string | null | undefined): this {
    if (!isPresent(value)) return this;

    this.predicates.push({ op: "iexact", field: toFieldRef(field), value });
    return this;
  }

  /** Accepts "1,2,3" or a numeric list; non-integer items are dropped. */
  multiValue(
    field: string | FieldRef,
    csv: string | readonly number[] | null | undefined,
  ): this {
    if (!isPresent(csv)) return this;

    const items: readonly (string | number)[] =
      typeof csv === "string" ? csv.split(",") : csv;

    const values = items
      .map((item) => (typeof item === "string" ? parseCsvInteger(item) : item))
      .filter((item) => Number.isInteger(item));

    if (values.length === 0) return this;

    this.predicates.push({ op: "in", field: toFieldRef(field), values });
    return this;
  }

  /**
   * Deleted rows are always excluded unless Deleted itself is requested.
   */
  status(field: string | FieldRef, value: number | null | undefined): this {
    const ref = toFieldRef(field);

    if (!isPresent(value)) {
      this.predicates.push({ op: "ne", field: ref, value: RecordStatus.DELETED });
      return this;
    }

    this.predicates.push({ op: "eq", field: ref, value });
    return this;
  }

  /**
   * "2025-01-01,2025-01-31" is an inclusive range on the date part;
   * a single value is an exact date.
   */
  dateRange(field: string | FieldRef, combined: string | null | undefined): this {
    if (!isPresent(combined) || combined.trim() === "") return this;

    const ref = toFieldRef(field);

    if (combined.includes(",")) {
      const [start, end] = combined.split(",").map((part) => part.trim());
      if (start) {
        this.predicates.push({ op: "gte", field: ref, value: start, asDate: true });
      }
      if (end) {
        this.predicates.push({ op: "lte", field: ref, value: end, asDate: true });
      }
      return this;
    }

    this.predicates.push({
      op: "eq",
      field: ref,
      value: combined.trim(),
      asDate: true,
    });
    return this;
  }

  jsonEquals(
    columnName: string,
    path: readonly string[],
    value: Scalar | null | undefined,
  ): this {
    return this.equals(jsonPath(columnName, path), value);
  }

  jsonContains(columnName: string, value: JsonValue | undefined): this {
    if (value === undefined) return this;

    this.predicates.push({ op: "contains", column: columnName, value });
    return this;
  }

  /**
   * Predicates added inside `group` are OR-ed together; the group itself is
   * AND-ed with everything else.
   */
  or(group: (builder: RecordFilterBuilder) => void): this {
    const inner = new RecordFilterBuilder();
    group(inner);

    const members = inner.predicates;
    if (members.length === 1) {
      this.predicates.push(members[0]);
    } else if (members.length > 1) {
      this.predicates.push({ op: "or", predicates: members });
    }
    return this;
  }

  isEmpty(): boolean {
    return this.predicates.length === 0;
  }

  /** `null` means match-all. */
  build(): FilterPredicate | null {
    if (this.predicates.length === 0) return null;
    if (this.predicates.length === 1) return this.predicates[0];
    return { op: "and", predicates: [...this.predicates] };
  }
}

////////////////////////////////////////////////////////////////
// Change-log audit filters
////////////////////////////////////////////////////////////////

export const CHANGE_LOG_DATE_FIELDS = [
  "createdAt",
  "updatedAt",
  "deletedAt",
] as const;

export const CHANGE_LOG_ACTOR_FIELDS = [
  "createdBy",
  "updatedBy",
  "deletedBy",
] as const;

export type ChangeLogFilterField =
  | (typeof CHANGE_LOG_DATE_FIELDS)[number]
  | (typeof CHANGE_LOG_ACTOR_FIELDS)[number];

export type ChangeLogFilterValues = Partial<
  Record<ChangeLogFilterField, string | null>
>;

export function changeLogField(name: ChangeLogFilterField): FieldRef {
  return jsonPath("detail", ["changeLog", name]);
}

export function applyChangeLogFilters(
  builder: RecordFilterBuilder,
  values: ChangeLogFilterValues,
): RecordFilterBuilder {
  for (const name of CHANGE_LOG_DATE_FIELDS) {
    builder.dateRange(changeLogField(name), values[name]);
  }

  for (const name of CHANGE_LOG_ACTOR_FIELDS) {
    builder.exactString(changeLogField(name), values[name] || null);
  }

  return builder;
}
