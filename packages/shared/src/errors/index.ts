/**
 * Error classes for rbac-sync
 * @module @rbac-sync/shared/errors
 */

export {
  RbacSyncError,
  ErrorCode,
  isRbacSyncError,
  toError,
} from './base-error.js';

export type { ErrorMeta } from './base-error.js';

export {
  ValidationError,
  isValidationError,
} from './validation-error.js';

export type {
  ValidationErrorDetail,
  ValidationResult,
} from './validation-error.js';

export { SelectorError, isSelectorError } from './selector-error.js';

export {
  StoreError,
  isStoreError,
  isNotFoundError,
  isAlreadyExistsError,
  isConflictError,
  reasonForStatus,
} from './store-error.js';

export type { StoreErrorReason } from './store-error.js';

export { ObjectTypeError, isObjectTypeError, describeValue } from './object-type-error.js';
