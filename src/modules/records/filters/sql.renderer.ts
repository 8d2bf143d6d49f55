// src/modules/records/filters/sql.renderer.ts
// Purpose: Renders a FilterPredicate as a parameterised PostgreSQL WHERE fragment.

import type { FieldRef, FilterPredicate } from "./filter.types";

export type SqlFragment = {
  text: string;
  values: unknown[];
};

export type SqlRenderOptions = {
  /** First placeholder index ($1 by default). */
  startIndex?: number;
  /** Maps a logical field name to its column name. */
  columnName?: (field: string) => string;
};

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function quoteIdentifier(name: string): string {
  if (!IDENTIFIER_RE.test(name)) {
    throw new Error(`Unsafe SQL identifier: ${name}`);
  }
  return `"${name}"`;
}

export function toSnakeCase(name: string): string {
  return name.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toLowerCase();
}

/** Escapes LIKE metacharacters; backslash is PostgreSQL's default escape. */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export function likePattern(tokens: readonly string[]): string {
  return `%${tokens.map(escapeLike).join("%")}%`;
}

export function renderSqlPredicate(
  predicate: FilterPredicate,
  options: SqlRenderOptions = {},
): SqlFragment {
  const resolve = options.columnName ?? toSnakeCase;
  const values: unknown[] = [];
  let index = options.startIndex ?? 1;

  const param = (value: unknown): string => {
    values.push(value);
    return `$${index++}`;
  };

  const fieldSql = (field: FieldRef): string => {
    if (field.kind === "column") {
      return quoteIdentifier(resolve(field.name));
    }

    for (const segment of field.path) {
      if (!IDENTIFIER_RE.test(segment)) {
        throw new Error(`Unsafe JSON path segment: ${segment}`);
      }
    }

    return `${quoteIdentifier(resolve(field.column))} #>> '{${field.path.join(",")}}'`;
  };

  const render = (node: FilterPredicate): string => {
    switch (node.op) {
      case "eq":
      case "ne":
      case "gt":
      case "gte":
      case "lt":
      case "lte": {
        const operator = COMPARISON_SQL[node.op];
        const expr = fieldSql(node.field);

        if (node.asDate) {
          return `(${expr})::date ${operator} ${param(node.value)}::date`;
        }

        // `#>>` yields text
        const value =
          node.field.kind === "json" ? String(node.value) : node.value;
        return `${expr} ${operator} ${param(value)}`;
      }

      case "like":
        return `${fieldSql(node.field)} ILIKE ${param(likePattern(node.tokens))}`;

      case "iexact":
        return `${fieldSql(node.field)} ILIKE ${param(escapeLike(node.value))}`;

      case "in":
        return `${fieldSql(node.field)} = ANY(${param([...node.values])})`;

      case "contains":
        return `${quoteIdentifier(resolve(node.column))} @> ${param(JSON.stringify(node.value))}::jsonb`;

      case "and":
      case "or": {
        if (node.predicates.length === 0) {
          return node.op === "and" ? "TRUE" : "FALSE";
        }
        const joiner = node.op === "and" ? " AND " : " OR ";
        return `(${node.predicates.map(render).join(joiner)})`;
      }

      default: {
        const _exhaustive: never = node;
        throw new Error(`Unsupported predicate: ${JSON.stringify(_exhaustive)}`);
      }
    }
  };

  return { text: render(predicate), values };
}

const COMPARISON_SQL = {
  eq: "=",
  ne: "<>",
  gt: ">",
  gte: ">=",
  lt: "<",
  lte: "<=",
} as const;
