/**
 * Wrong-object-type errors
 * @module @rbac-sync/shared/errors/object-type-error
 */

import { RbacSyncError, ErrorCode, type ErrorMeta } from './base-error.js';

/**
 * An object of an unexpected shape reached a handler. This points at a wiring
 * defect, so it is never retried.
 */
export class ObjectTypeError extends RbacSyncError {
  constructor(expected: string, received: string, meta: ErrorMeta = {}) {
    super(`expected ${expected} but got ${received}`, ErrorCode.INVALID_OBJECT_TYPE, {
      ...meta,
      expected,
      received,
    });
    this.name = 'ObjectTypeError';
  }
}

export function isObjectTypeError(error: unknown): error is ObjectTypeError {
  return error instanceof ObjectTypeError;
}

/**
 * Describe a value for error messages
 */
export function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (typeof value === 'object') {
    return 'kind' in value && typeof value.kind === 'string' ? `object of kind ${value.kind}` : 'object';
  }
  return typeof value;
}
