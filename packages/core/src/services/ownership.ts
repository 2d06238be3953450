/**
 * Ownership of generated objects
 * @module @rbac-sync/core/services/ownership
 *
 * Generated objects point back at their RBACRule twice: a controller owner
 * reference (garbage collection and event mapping) and the ownership label
 * (the cleanup sweep and pruning list by it).
 */

import {
  RBACRULE_API_VERSION,
  RBACRULE_KIND,
  RBACRULE_OWNER_LABEL,
  ValidationError,
  createSelector,
  ownerLabelValue,
  type LabelSelector,
  type Labels,
  type ObjectMeta,
  type OwnerReference,
  type RBACRule,
} from '@rbac-sync/shared';

/**
 * Labels stamped on every ServiceAccount, RoleBinding and ClusterRoleBinding of a rule
 */
export function ownerLabels(ruleName: string): Labels {
  return { [RBACRULE_OWNER_LABEL]: ownerLabelValue(ruleName) };
}

/**
 * Selector matching every labelled object of a rule
 */
export function ownerSelector(ruleName: string): LabelSelector {
  return createSelector(ownerLabels(ruleName));
}

/**
 * Controller owner reference to a stored rule
 */
export function ruleOwnerReference(rule: RBACRule): OwnerReference {
  const uid = rule.metadata.uid;
  if (!uid) {
    throw ValidationError.required('metadata.uid');
  }
  return {
    apiVersion: RBACRULE_API_VERSION,
    kind: RBACRULE_KIND,
    name: rule.metadata.name,
    uid,
    controller: true,
    blockOwnerDeletion: true,
  };
}

/**
 * Name of the RBACRule that controls an object, if any
 */
export function controllingRuleName(metadata: ObjectMeta): string | undefined {
  const owner = metadata.ownerReferences?.find(
    (ref) => ref.controller === true && ref.kind === RBACRULE_KIND && ref.apiVersion === RBACRULE_API_VERSION,
  );
  return owner?.name;
}
