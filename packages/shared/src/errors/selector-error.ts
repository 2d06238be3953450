/**
 * Label selector errors
 * @module @rbac-sync/shared/errors/selector-error
 */

import { RbacSyncError, ErrorCode, type ErrorMeta } from './base-error.js';

/**
 * Raised when a namespace selector cannot be turned into label requirements
 */
export class SelectorError extends RbacSyncError {
  constructor(message: string, meta: ErrorMeta = {}, cause?: Error) {
    super(message, ErrorCode.INVALID_SELECTOR, meta, cause);
    this.name = 'SelectorError';
  }

  static invalidKey(key: string): SelectorError {
    return new SelectorError(`invalid label key "${key}"`, { key });
  }

  static invalidValue(key: string, value: string): SelectorError {
    return new SelectorError(`invalid label value "${value}" for key "${key}"`, { key, value });
  }

  static invalidOperator(key: string, operator: string): SelectorError {
    return new SelectorError(`"${operator}" is not a valid label selector operator (key "${key}")`, {
      key,
      operator,
    });
  }
}

/**
 * Check if an error is a SelectorError
 */
export function isSelectorError(error: unknown): error is SelectorError {
  return error instanceof SelectorError;
}
