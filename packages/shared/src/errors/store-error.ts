/**
 * Cluster object store errors
 * @module @rbac-sync/shared/errors/store-error
 */

import { RbacSyncError, ErrorCode, type ErrorMeta } from './base-error.js';

/**
 * Why a store call failed, in API-server terms
 */
export type StoreErrorReason =
  | 'NotFound'
  | 'AlreadyExists'
  | 'Conflict'
  | 'Invalid'
  | 'Forbidden'
  | 'TooManyRequests'
  | 'Unavailable'
  | 'Unknown';

const REASON_CODES: Record<StoreErrorReason, ErrorCode> = {
  NotFound: ErrorCode.NOT_FOUND,
  AlreadyExists: ErrorCode.ALREADY_EXISTS,
  Conflict: ErrorCode.CONFLICT,
  Invalid: ErrorCode.INVALID_INPUT,
  Forbidden: ErrorCode.FORBIDDEN,
  TooManyRequests: ErrorCode.RATE_LIMITED,
  Unavailable: ErrorCode.API_UNAVAILABLE,
  Unknown: ErrorCode.UNKNOWN,
};

/**
 * Error returned by a ClusterStore operation
 */
export class StoreError extends RbacSyncError {
  public readonly reason: StoreErrorReason;

  constructor(reason: StoreErrorReason, message: string, meta: ErrorMeta = {}, cause?: Error) {
    super(message, REASON_CODES[reason], meta, cause);
    this.name = 'StoreError';
    this.reason = reason;
  }

  static notFound(resourceType: string, resourceId: string, namespace?: string): StoreError {
    return new StoreError('NotFound', `${resourceType} "${qualified(resourceId, namespace)}" not found`, {
      resourceType,
      resourceId,
      namespace,
    });
  }

  static alreadyExists(resourceType: string, resourceId: string, namespace?: string): StoreError {
    return new StoreError('AlreadyExists', `${resourceType} "${qualified(resourceId, namespace)}" already exists`, {
      resourceType,
      resourceId,
      namespace,
    });
  }

  static conflict(resourceType: string, resourceId: string, namespace?: string): StoreError {
    return new StoreError(
      'Conflict',
      `operation cannot be fulfilled on ${resourceType} "${qualified(resourceId, namespace)}": the object has been modified`,
      { resourceType, resourceId, namespace },
    );
  }

  /**
   * Map an HTTP status code returned by the API server
   */
  static fromStatus(
    statusCode: number | undefined,
    message: string,
    meta: ErrorMeta = {},
    cause?: Error,
    statusReason?: string,
  ): StoreError {
    return new StoreError(reasonForStatus(statusCode, statusReason), message, meta, cause);
  }
}

function qualified(name: string, namespace?: string): string {
  return namespace ? `${namespace}/${name}` : name;
}

/**
 * Classify an HTTP status. A 409 is AlreadyExists or Conflict depending on the
 * Status reason the API server sent along.
 */
export function reasonForStatus(statusCode: number | undefined, statusReason?: string): StoreErrorReason {
  switch (statusCode) {
    case 404:
    case 410:
      return 'NotFound';
    case 409:
      return statusReason === 'AlreadyExists' ? 'AlreadyExists' : 'Conflict';
    case 400:
    case 422:
      return 'Invalid';
    case 401:
    case 403:
      return 'Forbidden';
    case 429:
      return 'TooManyRequests';
    default:
      if (statusCode !== undefined && statusCode >= 500) {
        return 'Unavailable';
      }
      return 'Unknown';
  }
}

export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError;
}

export function isNotFoundError(error: unknown): boolean {
  return isStoreError(error) && error.reason === 'NotFound';
}

export function isAlreadyExistsError(error: unknown): boolean {
  return isStoreError(error) && error.reason === 'AlreadyExists';
}

export function isConflictError(error: unknown): boolean {
  return isStoreError(error) && error.reason === 'Conflict';
}
