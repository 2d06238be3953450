/**
 * Validation module
 * @module @rbac-sync/shared/validation
 */

export { isRecord, decodeObjectMeta, parseRbacRule } from './decode.js';

export {
  DEFAULT_FALLBACK_NAMESPACE,
  applyRbacRuleDefaults,
  validateNamespaceName,
  validateRbacRule,
} from './rbac-rule-validation.js';

export type { AdmissionOperation, RbacRuleValidationOptions } from './rbac-rule-validation.js';
