// src/modules/records/filters/mongo.renderer.ts
// Purpose: Renders a FilterPredicate as a MongoDB filter document for the mirror collection.

import type { Document } from "mongodb";
import type { JsonValue } from "../record.types";
import { fieldPath, type FilterPredicate } from "./filter.types";

export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function likeRegex(tokens: readonly string[]): string {
  return tokens.map(escapeRegex).join(".*");
}

/** Last instant of a `YYYY-MM-DD` day in the stored timestamp format. */
function endOfDay(date: string): string {
  return `${date}T23:59:59Z`;
}

function flattenContainment(
  prefix: string,
  value: JsonValue,
  into: Document[],
): void {
  if (value !== null && typeof value === "object" && !Array.isArray(value)) {
    for (const [key, nested] of Object.entries(value)) {
      flattenContainment(`${prefix}.${key}`, nested, into);
    }
    return;
  }

  if (Array.isArray(value)) {
    into.push({ [prefix]: { $all: value } });
    return;
  }

  into.push({ [prefix]: value });
}

export function renderMongoFilter(predicate: FilterPredicate | null): Document {
  if (predicate === null) return {};

  switch (predicate.op) {
    case "eq": {
      const path = fieldPath(predicate.field);
      if (predicate.asDate) {
        return {
          [path]: { $regex: `^${escapeRegex(String(predicate.value))}` },
        };
      }
      return { [path]: predicate.value };
    }

    case "ne":
      return { [fieldPath(predicate.field)]: { $ne: predicate.value } };

    case "gte":
    case "lt":
      return {
        [fieldPath(predicate.field)]: { [`$${predicate.op}`]: predicate.value },
      };

    case "lte":
    case "gt": {
      const value =
        predicate.asDate && typeof predicate.value === "string"
          ? endOfDay(predicate.value)
          : predicate.value;
      return { [fieldPath(predicate.field)]: { [`$${predicate.op}`]: value } };
    }

    case "like":
      return {
        [fieldPath(predicate.field)]: {
          $regex: likeRegex(predicate.tokens),
          $options: "i",
        },
      };

    case "iexact":
      return {
        [fieldPath(predicate.field)]: {
          $regex: `^${escapeRegex(predicate.value)}$`,
          $options: "i",
        },
      };

    case "in":
      return { [fieldPath(predicate.field)]: { $in: [...predicate.values] } };

    case "contains": {
      const clauses: Document[] = [];
      flattenContainment(predicate.column, predicate.value, clauses);
      return clauses.length === 1 ? clauses[0] : { $and: clauses };
    }

    case "and":
      return { $and: predicate.predicates.map(renderMongoFilter) };

    case "or":
      return { $or: predicate.predicates.map(renderMongoFilter) };

    default: {
      const _exhaustive: never = predicate;
      throw new Error(`Unsupported predicate: ${JSON.stringify(_exhaustive)}`);
    }
  }
}
