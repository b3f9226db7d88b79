/**
 * Error Types
 *
 * Errors raised by the engine and its collaborators. Each carries a stable
 * code that the API maps to an HTTP status, plus optional field-level details.
 */

import type { ZodError } from 'zod';

export const ErrorCode = {
  CONFIGURATION: 'ConfigurationError',
  INVALID_ARGUMENT: 'InvalidArgument',
  VALIDATION: 'ValidationError',
  CATALOG: 'CatalogError',
  NOT_FOUND: 'NotFound',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Field-level error detail
 */
export interface FieldErrorDetail {
  field: string;
  message: string;
  code: string;
}

/**
 * Formats Zod issues into field-level error details
 */
export function formatValidationErrors(error: ZodError): FieldErrorDetail[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}

export class ServiceMatchError extends Error {
  readonly code: ErrorCode;
  readonly details: FieldErrorDetail[];

  constructor(code: ErrorCode, message: string, details: FieldErrorDetail[] = []) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/**
 * Invalid engine configuration: weights, thresholds, topN or strategy name
 */
export class ConfigurationError extends ServiceMatchError {
  constructor(message: string, details: FieldErrorDetail[] = []) {
    super(ErrorCode.CONFIGURATION, message, details);
  }
}

/**
 * Caller passed an argument outside its contract (e.g. topN <= 0)
 */
export class InvalidArgumentError extends ServiceMatchError {
  constructor(message: string, details: FieldErrorDetail[] = []) {
    super(ErrorCode.INVALID_ARGUMENT, message, details);
  }
}

export class PreferenceValidationError extends ServiceMatchError {
  constructor(message: string, details: FieldErrorDetail[] = []) {
    super(ErrorCode.VALIDATION, message, details);
  }
}

/**
 * A catalog violates its invariants (duplicate ids, malformed records)
 */
export class CatalogValidationError extends ServiceMatchError {
  constructor(message: string, details: FieldErrorDetail[] = []) {
    super(ErrorCode.CATALOG, message, details);
  }
}

export class NotFoundError extends ServiceMatchError {
  constructor(message: string) {
    super(ErrorCode.NOT_FOUND, message);
  }
}

export function isServiceMatchError(error: unknown): error is ServiceMatchError {
  return error instanceof ServiceMatchError;
}
