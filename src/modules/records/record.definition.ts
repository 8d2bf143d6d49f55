// src/modules/records/record.definition.ts
// Purpose: Declarative description of a record resource: fields, per-scenario field sets, search surface, dependencies.

import type { z } from "zod";
import { Scenario } from "./record.constants";
import type { JsonValue } from "./record.types";

/** Columns every record carries; managed by the lifecycle, not declared per resource. */
export const CORE_FIELDS = ["id", "status", "lockVersion", "detail"] as const;

export type CoreField = (typeof CORE_FIELDS)[number];

export type FieldDefinition = {
  label: string;
  schema: z.ZodType<JsonValue>;
};

export type ScenarioFieldSet = {
  permitted: readonly string[];
  required: readonly string[];
};

export type SearchFilterKind =
  | "equals"
  | "like"
  | "exact"
  | "multi"
  | "status"
  /** `like`, OR-ed with the other `orLike` parameters. */
  | "orLike";

export type DependencyRule = {
  /** Table holding the reference. */
  table: string;
  /** Columns on `table` that may reference this record's id. */
  columns: readonly string[];
  /** `jsonContains` for array/JSON columns holding ids. */
  match?: "equals" | "jsonContains";
};

export type MirrorBinding = {
  collection: string;
  uniqueKeys: readonly string[];
};

export type ResourceDefinition = {
  /** Route segment, e.g. `example`. */
  name: string;
  table: string;
  label: string;
  fields: Record<string, FieldDefinition>;
  scenarios: Record<Scenario, ScenarioFieldSet>;
  /** Keys accepted inside `detail` (besides the managed `changeLog`). Omit to accept any key. */
  detailFields?: readonly string[];
  search: Record<string, SearchFilterKind>;
  sortable: readonly string[];
  /** Fields that may not change while another table references this record. */
  guardedFields?: readonly string[];
  dependencies?: readonly DependencyRule[];
  mirror?: MirrorBinding;
};

const CORE_LABELS: Record<CoreField, string> = {
  id: "ID",
  status: "Status",
  lockVersion: "Lock Version",
  detail: "Detail",
};

export function isCoreField(name: string): name is CoreField {
  return (CORE_FIELDS as readonly string[]).includes(name);
}

export function fieldLabel(resource: ResourceDefinition, name: string): string {
  if (isCoreField(name)) return CORE_LABELS[name];
  return resource.fields[name]?.label ?? name;
}

/**
 * Checks a definition for referential completeness once, at load time.
 * `id` and `lockVersion` are always required on update/delete and never
 * permitted on create, whatever the declaration says.
 */
export function defineResource(resource: ResourceDefinition): ResourceDefinition {
  const known = new Set<string>([...CORE_FIELDS, ...Object.keys(resource.fields)]);

  for (const scenario of Object.values(Scenario)) {
    const set = resource.scenarios[scenario];

    for (const name of [...set.permitted, ...set.required]) {
      if (!known.has(name)) {
        throw new Error(
          `Resource "${resource.name}" scenario "${scenario}" names unknown field "${name}"`,
        );
      }
    }

    for (const name of set.required) {
      if (!set.permitted.includes(name)) {
        throw new Error(
          `Resource "${resource.name}" scenario "${scenario}" requires "${name}" but does not permit it`,
        );
      }
    }
  }

  if (resource.scenarios.create.permitted.some((name) => name === "id" || name === "lockVersion")) {
    throw new Error(`Resource "${resource.name}" may not permit id or lockVersion on create`);
  }

  for (const scenario of [Scenario.UPDATE, Scenario.DELETE]) {
    for (const name of ["id", "lockVersion"]) {
      if (!resource.scenarios[scenario].required.includes(name)) {
        throw new Error(
          `Resource "${resource.name}" scenario "${scenario}" must require "${name}"`,
        );
      }
    }
  }

  for (const name of [...Object.keys(resource.search), ...resource.sortable, ...(resource.guardedFields ?? [])]) {
    if (!known.has(name)) {
      throw new Error(`Resource "${resource.name}" references unknown field "${name}"`);
    }
  }

  return resource;
}
