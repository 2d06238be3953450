/**
 * RBACRule custom resource types
 * @module @rbac-sync/shared/types/rbac-rule
 */

import { isEmptySelector, type LabelSelector } from './labels.js';
import type { ObjectMeta } from './kubernetes.js';

/** API group served by the RBACRule CRD */
export const RBACRULE_GROUP = 'rbac-sync.io';

/** Served version */
export const RBACRULE_VERSION = 'v1alpha1';

export const RBACRULE_API_VERSION = `${RBACRULE_GROUP}/${RBACRULE_VERSION}` as const;

export const RBACRULE_KIND = 'RBACRule';

export const RBACRULE_PLURAL = 'rbacrules';

/** Finalizer that holds deletion until owned objects are swept */
export const RBACRULE_FINALIZER = `${RBACRULE_GROUP}/cleanup`;

/** Label that ties a generated object back to its RBACRule */
export const RBACRULE_OWNER_LABEL = `${RBACRULE_GROUP}/rbacrule`;

/**
 * How a subject or role binding picks namespaces
 */
export interface NamespaceSelection {
  /** Explicit namespace names */
  namespaces?: string[];
  /** Label selector evaluated against existing namespaces */
  namespaceSelector?: LabelSelector;
  /**
   * Accepted by the schema but never evaluated.
   * @deprecated use namespaces or namespaceSelector
   */
  namespaceMatchExpression?: string;
}

export interface UserSubject {
  kind: 'User';
  name: string;
}

export interface GroupSubject {
  kind: 'Group';
  name: string;
}

export interface ServiceAccountSubject extends NamespaceSelection {
  kind: 'ServiceAccount';
  name: string;
}

/**
 * Subject to be granted the binding's roles
 */
export type Subject = UserSubject | GroupSubject | ServiceAccountSubject;

/**
 * Namespace-local binding of a Role and/or a ClusterRole.
 * Setting both yields two RoleBindings per namespace.
 */
export interface RoleBindingSpec extends NamespaceSelection {
  role?: string;
  clusterRole?: string;
}

export interface ClusterRoleBindingSpec {
  clusterRole: string;
}

/**
 * One named group of subjects and role references
 */
export interface Binding {
  name: string;
  subjects: Subject[];
  roleBindings?: RoleBindingSpec[];
  clusterRoleBindings?: ClusterRoleBindingSpec[];
}

export interface RBACRuleSpec {
  bindings: Binding[];
  /** RFC 3339 instant before which nothing is applied */
  startTime?: string;
  /** RFC 3339 instant after which the rule deletes itself */
  endTime?: string;
}

/**
 * Lifecycle phase reported in status
 */
export type RBACRulePhase = 'Pending' | 'Active' | 'Terminating';

export type ConditionStatus = 'True' | 'False' | 'Unknown';

export interface Condition {
  type: string;
  status: ConditionStatus;
  reason: string;
  message: string;
  lastTransitionTime: string;
  observedGeneration?: number;
}

export interface RBACRuleStatus {
  phase?: RBACRulePhase;
  conditions?: Condition[];
  /** Owned RoleBindings as `namespace/name` */
  roleBindings?: string[];
  /** Owned ClusterRoleBindings by name */
  clusterRoleBindings?: string[];
  lastReconcileTime?: string;
}

export interface RBACRule {
  apiVersion: typeof RBACRULE_API_VERSION;
  kind: typeof RBACRULE_KIND;
  metadata: ObjectMeta;
  spec: RBACRuleSpec;
  status?: RBACRuleStatus;
}

/**
 * Parse an optional RFC 3339 field; empty strings count as unset
 */
export function parseRuleTime(value: string | undefined): Date | null {
  if (value === undefined || value === '') {
    return null;
  }
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Whether a selection names any namespace source the resolver evaluates
 */
export function hasNamespaceSelection(selection: NamespaceSelection): boolean {
  const explicit = selection.namespaces?.length ?? 0;
  return explicit > 0 || !isEmptySelector(selection.namespaceSelector);
}
