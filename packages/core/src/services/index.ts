/**
 * Core services
 * @module @rbac-sync/core/services
 */

export { NamespaceResolver, type NamespaceResolverOptions } from './namespace-resolver.js';
export { BindingExpander, type BindingExpansion, type ExpansionContext } from './binding-expander.js';
export {
  RbacRuleReconciler,
  DEFAULT_RETRY_DELAY_MS,
  type ReconcileResult,
  type RbacRuleReconcilerOptions,
} from './rbac-rule-reconciler.js';
export { ownerLabels, ownerSelector, ruleOwnerReference, controllingRuleName } from './ownership.js';
export {
  READY_CONDITION,
  setReadyCondition,
  getReadyCondition,
  statusChanged,
  type ReadyReason,
  type ReadyState,
} from './rule-status.js';
export { ruleKeyForEvent } from './event-mapping.js';
