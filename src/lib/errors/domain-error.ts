// src/lib/errors/domain-error.ts

export type FieldError = {
  field: string;
  message: string;
};

export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code: string,
    public readonly errors: readonly FieldError[] = [],
  ) {
    super(message);
  }
}
