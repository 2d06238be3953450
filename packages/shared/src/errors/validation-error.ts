/**
 * Validation error class
 * @module @rbac-sync/shared/errors/validation-error
 */

import { RbacSyncError, ErrorCode, type ErrorMeta } from './base-error.js';

/**
 * Validation error detail
 */
export interface ValidationErrorDetail {
  /** Field that failed validation (JSON path style, e.g. spec.bindings[0].name) */
  field: string;
  /** Error message */
  message: string;
  /** Machine-readable rule that failed */
  code: string;
}

/**
 * Validation error for input validation failures
 */
export class ValidationError extends RbacSyncError {
  /** Validation error details */
  public readonly details: ValidationErrorDetail[];

  constructor(
    message: string,
    details: ValidationErrorDetail[] = [],
    meta: ErrorMeta = {},
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
  ) {
    super(message, code, meta);
    this.name = 'ValidationError';
    this.details = details;
  }

  /**
   * Create for a required field
   */
  static required(field: string): ValidationError {
    return new ValidationError(
      `Missing required field: ${field}`,
      [{ field, message: 'This field is required', code: 'REQUIRED' }],
      { field },
      ErrorCode.MISSING_REQUIRED_FIELD,
    );
  }

  /**
   * Create for an invalid format
   */
  static invalidFormat(field: string, expected: string): ValidationError {
    return new ValidationError(
      `Invalid format for field: ${field}`,
      [{ field, message: `Expected ${expected}`, code: 'INVALID_FORMAT' }],
      { field },
      ErrorCode.INVALID_FORMAT,
    );
  }

  /**
   * Create from multiple field errors
   */
  static multiple(errors: ValidationErrorDetail[]): ValidationError {
    const fieldNames = errors.map(e => e.field).join(', ');
    return new ValidationError(`Validation failed for fields: ${fieldNames}`, errors);
  }

  /**
   * Check if a specific field has an error
   */
  hasFieldError(field: string): boolean {
    return this.details.some(d => d.field === field);
  }

  /**
   * Convert to JSON for API responses
   */
  override toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        details: this.details,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
      },
    };
  }
}

/**
 * Check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Validation result type
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationErrorDetail[];
  /** Non-fatal findings, surfaced as admission warnings */
  warnings: string[];
}
