// src/modules/records/dependency.guard.ts
// Purpose: Blocks changes to guarded fields of a record that another table still references.

import type { FieldError } from "@/lib/errors/domain-error";
import { translate } from "@/lib/i18n/translate";
import { DISALLOWED_UPDATE_STATUSES, type RecordStatus } from "./record.constants";
import { fieldLabel, type DependencyRule, type ResourceDefinition } from "./record.definition";
import type { FilterPredicate } from "./filters/filter.types";
import { column } from "./filters/filter.types";
import type { RecordStore } from "./record.store";

export type GuardInput = {
  id: number;
  /** Status the record will have after the write. */
  nextStatus: RecordStatus;
  /** Fields whose value differs from the stored one. */
  changedFields: readonly string[];
};

/**
 * Guarded fields that this write touches. `status` counts whenever the
 * resulting status is one that retires the record, changed or not.
 */
export function touchedGuardedFields(
  resource: ResourceDefinition,
  input: GuardInput,
): string[] {
  return (resource.guardedFields ?? []).filter(
    (field) =>
      input.changedFields.includes(field) ||
      (field === "status" && DISALLOWED_UPDATE_STATUSES.includes(input.nextStatus)),
  );
}

function referencePredicate(rule: DependencyRule, columnName: string, id: number): FilterPredicate {
  return rule.match === "jsonContains"
    ? { op: "contains", column: columnName, value: id }
    : { op: "eq", field: column(columnName), value: id };
}

/**
 * Returns one error per touched guarded field, naming the first referencing
 * table.column found. Empty when the write may proceed.
 */
export async function findBlockingReferences(
  store: RecordStore,
  resource: ResourceDefinition,
  input: GuardInput,
): Promise<FieldError[]> {
  const touched = touchedGuardedFields(resource, input);
  if (touched.length === 0) return [];

  for (const rule of resource.dependencies ?? []) {
    for (const columnName of rule.columns) {
      const references = await store.count(
        rule.table,
        referencePredicate(rule, columnName, input.id),
      );

      if (references > 0) {
        return touched.map((field) => ({
          field,
          message: translate("updatePermission", {
            label: fieldLabel(resource, field),
            tableName: resource.table,
            referencedBy: `${rule.table}.${columnName}`,
          }),
        }));
      }
    }
  }

  return [];
}
