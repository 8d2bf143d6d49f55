// src/modules/records/record.errors.ts
// Canonical error surface for record resources. Messages are translated at the point of detection.

import { DomainError, type FieldError } from "@/lib/errors/domain-error";
import { translate } from "@/lib/i18n/translate";
import type { Scenario } from "./record.constants";

export class ValidationFailedError extends DomainError {
  constructor(errors: readonly FieldError[], message?: string) {
    super(
      message ?? translate("validationFailed"),
      422,
      "VALIDATION_FAILED",
      errors,
    );
    this.name = "ValidationFailedError";
  }
}

export class InvalidStatusTransitionError extends DomainError {
  constructor(
    public readonly from: number,
    public readonly to: number,
    detail: string,
  ) {
    super(translate("invalidStatusTransition"), 422, "INVALID_STATUS_TRANSITION", [
      { field: "status", message: detail },
    ]);
    this.name = "InvalidStatusTransitionError";
  }
}

export class LockConflictError extends DomainError {
  constructor(public readonly recordId: number) {
    super(translate("lockVersionOutdated"), 409, "LOCK_CONFLICT");
    this.name = "LockConflictError";
  }
}

export class NoEffectiveChangeError extends DomainError {
  constructor(public readonly scenario: Scenario) {
    const deleting = scenario === "delete";
    super(
      translate(deleting ? "noRecordDeleted" : "noRecordUpdated"),
      400,
      deleting ? "NO_RECORD_DELETED" : "NO_RECORD_UPDATED",
    );
    this.name = "NoEffectiveChangeError";
  }
}

export class DependencyBlockedError extends DomainError {
  constructor(errors: readonly FieldError[]) {
    super(translate("validationFailed"), 422, "UPDATE_PERMISSION_DENIED", errors);
    this.name = "DependencyBlockedError";
  }
}

export class PermissionDeniedError extends DomainError {
  constructor(message?: string) {
    super(message ?? translate("superadminOnly"), 403, "PERMISSION_DENIED");
    this.name = "PermissionDeniedError";
  }
}

export class RecordNotFoundError extends DomainError {
  constructor(public readonly recordId?: number) {
    super(translate("dataNotFound"), 404, "DATA_NOT_FOUND");
    this.name = "RecordNotFoundError";
  }
}

const STORAGE_FAILURE = {
  create: { key: "createRecordFailed", code: "CREATE_RECORD_FAILED" },
  update: { key: "updateRecordFailed", code: "UPDATE_RECORD_FAILED" },
  delete: { key: "deleteRecordFailed", code: "DELETE_RECORD_FAILED" },
} as const;

export class StorageFailureError extends DomainError {
  constructor(
    public readonly scenario: Scenario,
    options?: { cause?: unknown },
  ) {
    const failure = STORAGE_FAILURE[scenario];
    super(translate(failure.key), 500, failure.code);
    this.name = "StorageFailureError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class UnauthorizedError extends DomainError {
  constructor() {
    super(translate("unauthorizedAccess"), 401, "UNAUTHORIZED");
    this.name = "UnauthorizedError";
  }
}

export class BadRequestError extends DomainError {
  constructor(message?: string) {
    super(message ?? translate("badRequest"), 400, "BAD_REQUEST");
    this.name = "BadRequestError";
  }
}
