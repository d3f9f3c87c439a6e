import type { DomainErrorCode, LoadErrorCode } from "@shelter/shared";

/**
 * Dataset could not be loaded. Fatal for the run: no partial record set is ever returned.
 */
export class LoadError extends Error {
  readonly code: LoadErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: LoadErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "LoadError";
    this.code = code;
    this.details = details;
  }
}

/**
 * Invalid numeric input to the estimator. Callers can recover by resubmitting corrected values.
 */
export class DomainError extends Error {
  readonly code: DomainErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: DomainErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "DomainError";
    this.code = code;
    this.details = details;
  }
}

export function isLoadError(err: unknown): err is LoadError {
  return err instanceof LoadError;
}

export function isDomainError(err: unknown): err is DomainError {
  return err instanceof DomainError;
}
