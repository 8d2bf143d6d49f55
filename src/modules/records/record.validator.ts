// src/modules/records/record.validator.ts
// Purpose: Request shape checks (field set, id, lock version, status, detail keys) and per-field value validation.

import { z } from "zod";
import type { FieldError } from "@/lib/errors/domain-error";
import { translate } from "@/lib/i18n/translate";
import {
  isRecordStatus,
  RECORD_STATUS_VALUES,
  Scenario,
  type RecordStatus,
} from "./record.constants";
import {
  fieldLabel,
  isCoreField,
  type ResourceDefinition,
} from "./record.definition";
import { ValidationFailedError } from "./record.errors";
import { isJsonObject } from "./record.mapper";
import type { JsonObject, JsonValue } from "./record.types";

export type ParsedMutation = {
  id?: number;
  lockVersion?: number;
  status?: RecordStatus;
  /** Caller-supplied detail keys; the managed `changeLog` is stripped. */
  detail?: JsonObject;
  /** Submitted resource attributes, not yet value-validated. */
  attributes: Record<string, unknown>;
};

export function isBlank(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    (typeof value === "string" && value.trim() === "")
  );
}

/** Accepts integers and their decimal string form. */
export function parseInteger(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
    return Number(value.trim());
  }
  return null;
}

export function parsePositiveInteger(value: unknown): number | null {
  const n = parseInteger(value);
  return n !== null && n > 0 ? n : null;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

////////////////////////////////////////////////////////////////
// Shape
////////////////////////////////////////////////////////////////

/**
 * Everything that can be decided without loading the stored record.
 * Errors are collected, not fail-fast; field order follows the request
 * surface: unknown fields, id, status, lock version, detail, required.
 */
export function validateShape(
  resource: ResourceDefinition,
  scenario: Scenario,
  params: Record<string, unknown>,
): ParsedMutation {
  const { permitted, required } = resource.scenarios[scenario];
  const errors: FieldError[] = [];
  const label = (name: string) => fieldLabel(resource, name);
  const parsed: ParsedMutation = { attributes: {} };

  for (const name of Object.keys(params)) {
    if (!permitted.includes(name)) {
      errors.push({ field: name, message: translate("invalidField", { label: name }) });
    }
  }

  if (scenario !== Scenario.CREATE && !isBlank(params.id)) {
    const id = parsePositiveInteger(params.id);
    if (id === null) {
      errors.push({ field: "id", message: translate("integerNoZero", { label: label("id") }) });
    } else {
      parsed.id = id;
    }
  }

  if (permitted.includes("status") && !isBlank(params.status)) {
    const status = parseInteger(params.status);
    if (status !== null && isRecordStatus(status)) {
      parsed.status = status;
    } else {
      errors.push({
        field: "status",
        message: translate("valueNotInList", {
          label: label("status"),
          value: RECORD_STATUS_VALUES.join(", "),
        }),
      });
    }
  }

  if (scenario !== Scenario.CREATE && !isBlank(params.lockVersion)) {
    const version = parsePositiveInteger(params.lockVersion);
    if (version === null) {
      errors.push({
        field: "lockVersion",
        message: translate("integerNoZero", { label: label("lockVersion") }),
      });
    } else {
      parsed.lockVersion = version;
    }
  }

  if (permitted.includes("detail") && params.detail !== undefined && params.detail !== null) {
    const detail = validateDetail(resource, params.detail, errors);
    if (detail) parsed.detail = detail;
  }

  for (const name of required) {
    if (isBlank(params[name])) {
      errors.push({ field: name, message: translate("required", { label: label(name) }) });
    }
  }

  for (const name of permitted) {
    if (!isCoreField(name) && params[name] !== undefined) {
      parsed.attributes[name] = params[name];
    }
  }

  if (errors.length > 0) {
    throw new ValidationFailedError(errors);
  }

  return parsed;
}

function validateDetail(
  resource: ResourceDefinition,
  value: unknown,
  errors: FieldError[],
): JsonObject | null {
  const label = fieldLabel(resource, "detail");

  if (!isJsonObject(value)) {
    errors.push({ field: "detail", message: translate("object", { label }) });
    return null;
  }

  const { changeLog: _managed, ...supplied } = value;
  const allowed = resource.detailFields;

  if (allowed) {
    for (const key of Object.keys(supplied)) {
      if (!allowed.includes(key)) {
        errors.push({
          field: "detail",
          message: translate("extraField", {
            label,
            field: key,
            value: allowed.join(", "),
          }),
        });
      }
    }
  }

  return supplied;
}

////////////////////////////////////////////////////////////////
// Values
////////////////////////////////////////////////////////////////

function issueMessage(issue: z.ZodIssue, label: string): string {
  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      if (issue.received === "undefined" || issue.received === "null") {
        return translate("required", { label });
      }
      if (issue.expected === "string") return translate("string", { label });
      if (issue.expected === "number" || issue.expected === "integer") {
        return translate("integer", { label });
      }
      if (issue.expected === "object") return translate("object", { label });
      return translate("invalidValue", { label });

    case z.ZodIssueCode.too_big:
      if (issue.type === "string") {
        return translate("stringTooLong", { label, max: Number(issue.maximum) });
      }
      return translate("invalidValue", { label });

    case z.ZodIssueCode.too_small:
      if (issue.type === "string" && Number(issue.minimum) === 1) {
        return translate("required", { label });
      }
      return translate("invalidValue", { label });

    case z.ZodIssueCode.invalid_enum_value:
      return translate("valueNotInList", {
        label,
        value: issue.options.join(", "),
      });

    default:
      return translate("invalidValue", { label });
  }
}

/**
 * Runs each submitted attribute through its declared schema. Returns the
 * parsed values (schemas may trim or coerce).
 */
export function validateValues(
  resource: ResourceDefinition,
  attributes: Record<string, unknown>,
): Record<string, JsonValue> {
  const errors: FieldError[] = [];
  const values: Record<string, JsonValue> = {};

  for (const [name, field] of Object.entries(resource.fields)) {
    if (!(name in attributes)) continue;

    const result = field.schema.safeParse(attributes[name]);
    if (result.success) {
      values[name] = result.data;
      continue;
    }

    const [first] = result.error.issues;
    errors.push({
      field: name,
      message: first ? issueMessage(first, field.label) : translate("invalidValue", { label: field.label }),
    });
  }

  if (errors.length > 0) {
    throw new ValidationFailedError(errors);
  }

  return values;
}
