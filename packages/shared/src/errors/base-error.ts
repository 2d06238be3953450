/**
 * Base error class with error codes
 * @module @rbac-sync/shared/errors/base-error
 */

/**
 * Error codes for categorization
 */
export enum ErrorCode {
  // General errors (1xxx)
  UNKNOWN = 1000,

  // Validation errors (2xxx)
  VALIDATION_FAILED = 2000,
  INVALID_INPUT = 2001,
  MISSING_REQUIRED_FIELD = 2002,
  INVALID_FORMAT = 2003,
  INVALID_SELECTOR = 2006,
  INVALID_OBJECT_TYPE = 2007,

  // Authorization errors (4xxx)
  FORBIDDEN = 4000,

  // Resource errors (5xxx)
  NOT_FOUND = 5000,
  ALREADY_EXISTS = 5001,
  CONFLICT = 5002,
  RATE_LIMITED = 5005,

  // Cluster API errors (10xxx)
  API_UNAVAILABLE = 10000,
}

/**
 * Error metadata for additional context
 */
export interface ErrorMeta {
  /** Resource kind involved */
  resourceType?: string;
  /** Resource name involved */
  resourceId?: string;
  /** Namespace of the resource, when namespaced */
  namespace?: string;
  /** Field that caused the error */
  field?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Base error class for all rbac-sync errors
 */
export class RbacSyncError extends Error {
  /** Error code for categorization */
  public readonly code: ErrorCode;
  /** HTTP status code equivalent */
  public readonly statusCode: number;
  /** Error metadata */
  public readonly meta: ErrorMeta;
  /** Timestamp when error occurred */
  public readonly timestamp: Date;
  /** Original error if this wraps another */
  public override readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    meta: ErrorMeta = {},
    cause?: Error,
  ) {
    super(message);
    this.name = 'RbacSyncError';
    this.code = code;
    this.meta = meta;
    this.timestamp = new Date();
    this.cause = cause;
    this.statusCode = RbacSyncError.statusCodeFor(code);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Map error code to HTTP status code
   */
  private static statusCodeFor(code: ErrorCode): number {
    switch (code) {
      case ErrorCode.NOT_FOUND:
        return 404;
      case ErrorCode.ALREADY_EXISTS:
      case ErrorCode.CONFLICT:
        return 409;
      case ErrorCode.FORBIDDEN:
        return 403;
      case ErrorCode.RATE_LIMITED:
        return 429;
      case ErrorCode.API_UNAVAILABLE:
        return 503;
      default:
        break;
    }

    const codeCategory = Math.floor(code / 1000);
    if (codeCategory === 2) {
      return 400;
    }
    return 500;
  }

  /**
   * Convert to JSON for API responses
   */
  toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
      },
    };
  }
}

/**
 * Check if an error is an RbacSyncError
 */
export function isRbacSyncError(error: unknown): error is RbacSyncError {
  return error instanceof RbacSyncError;
}

/**
 * Normalize anything thrown into an Error for logging
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
