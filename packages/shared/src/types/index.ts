/**
 * Shared types for rbac-sync
 * @module @rbac-sync/shared/types
 */

// Labels and selectors
export type {
  Labels,
  LabelSelector,
  LabelSelectorOperator,
  LabelSelectorMatchExpression,
} from './labels.js';

export {
  matchesExpression,
  matchesSelector,
  isEmptySelector,
  createSelector,
  isValidLabelKey,
  isValidLabelValue,
  assertValidSelector,
  formatLabelSelector,
} from './labels.js';

// Kubernetes object shapes
export type {
  OwnerReference,
  ObjectMeta,
  SubjectKind,
  RbacSubject,
  RoleRefKind,
  RoleRef,
  NamespaceObject,
  ServiceAccountObject,
  RoleBindingObject,
  ClusterRoleBindingObject,
  ManagedObjectMap,
  ManagedKind,
  ManagedObject,
  ObjectKey,
} from './kubernetes.js';

export {
  RBAC_API_GROUP,
  RBAC_API_VERSION,
  MANAGED_KINDS,
  isNamespacedKind,
  formatObjectKey,
} from './kubernetes.js';

// RBACRule resource
export type {
  NamespaceSelection,
  UserSubject,
  GroupSubject,
  ServiceAccountSubject,
  Subject,
  RoleBindingSpec,
  ClusterRoleBindingSpec,
  Binding,
  RBACRuleSpec,
  RBACRulePhase,
  ConditionStatus,
  Condition,
  RBACRuleStatus,
  RBACRule,
} from './rbac-rule.js';

export {
  RBACRULE_GROUP,
  RBACRULE_VERSION,
  RBACRULE_API_VERSION,
  RBACRULE_KIND,
  RBACRULE_PLURAL,
  RBACRULE_FINALIZER,
  RBACRULE_OWNER_LABEL,
  parseRuleTime,
  hasNamespaceSelection,
} from './rbac-rule.js';
