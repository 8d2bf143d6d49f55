// src/modules/records/response.envelope.ts
// Purpose: Uniform success / paginated / error response shapes. Serialization is left to the HTTP adapter.

import { DomainError, type FieldError } from "@/lib/errors/domain-error";
import { translate, type MessageKey } from "@/lib/i18n/translate";
import type { Scenario } from "./record.constants";
import type { PageSpec } from "./pagination";

export type SuccessEnvelope<T> = {
  code: number;
  success: true;
  message: string;
  data: T;
};

export type PaginationMeta = {
  page: number;
  pageSize: number;
  totalCount: number;
  display: number;
};

export type PaginatedEnvelope<T> = {
  code: number;
  success: true;
  message: string;
  pagination: PaginationMeta;
  data: T[];
};

export type ErrorEnvelope = {
  code: number;
  success: false;
  message: string;
  errors: FieldError[];
  traceForDev?: { exception: string; trace?: string };
};

const SCENARIO_SUCCESS: Record<Scenario, MessageKey> = {
  create: "createRecordSuccess",
  update: "updateRecordSuccess",
  delete: "deleteRecordSuccess",
};

export function success<T>(data: T, message?: string): SuccessEnvelope<T> {
  return {
    code: 200,
    success: true,
    message: message ?? translate("success"),
    data,
  };
}

export function scenarioSuccess<T>(
  scenario: Scenario,
  data: T,
): SuccessEnvelope<T> {
  return success(data, translate(SCENARIO_SUCCESS[scenario]));
}

export function paginated<T>(
  rows: T[],
  page: PageSpec,
  message?: string,
): PaginatedEnvelope<T> {
  return {
    code: 200,
    success: true,
    message: message ?? translate("success"),
    pagination: {
      page: page.page,
      pageSize: page.pageSize,
      totalCount: page.totalCount,
      display: rows.length,
    },
    data: rows,
  };
}

export function errorEnvelope(
  code: number,
  message: string,
  errors: readonly FieldError[] = [],
): ErrorEnvelope {
  return {
    code,
    success: false,
    message,
    errors: [...errors],
  };
}

export function fromDomainError(err: DomainError): ErrorEnvelope {
  return errorEnvelope(err.status, err.message, err.errors);
}

/**
 * Anything that is not a DomainError is an unexpected failure. The trace is
 * attached only when `includeTrace` is set (non-production).
 */
export function fromUnknownError(
  err: unknown,
  includeTrace: boolean,
): ErrorEnvelope {
  if (err instanceof DomainError) {
    return fromDomainError(err);
  }

  const envelope = errorEnvelope(500, translate("exceptionOccured"));

  if (includeTrace && err instanceof Error) {
    envelope.traceForDev = { exception: err.name, trace: err.stack };
  }

  return envelope;
}
