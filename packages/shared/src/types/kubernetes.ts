/**
 * Shapes of the Kubernetes objects rbac-sync reads and generates
 * @module @rbac-sync/shared/types/kubernetes
 */

import type { Labels } from './labels.js';

/** API group of the RBAC objects */
export const RBAC_API_GROUP = 'rbac.authorization.k8s.io';

/** apiVersion of RoleBinding and ClusterRoleBinding */
export const RBAC_API_VERSION = `${RBAC_API_GROUP}/v1` as const;

/**
 * Backward link from a generated object to the object that owns it
 */
export interface OwnerReference {
  apiVersion: string;
  kind: string;
  name: string;
  uid: string;
  controller?: boolean;
  blockOwnerDeletion?: boolean;
}

/**
 * Object metadata (the subset rbac-sync reads or writes)
 */
export interface ObjectMeta {
  name: string;
  /** Absent for cluster-scoped objects */
  namespace?: string;
  uid?: string;
  /** Optimistic concurrency token, set by the store */
  resourceVersion?: string;
  /** Monotonic spec generation, set by the store */
  generation?: number;
  labels?: Labels;
  annotations?: Record<string, string>;
  ownerReferences?: OwnerReference[];
  finalizers?: string[];
  creationTimestamp?: string;
  /** Set once deletion has been requested and finalizers are pending */
  deletionTimestamp?: string;
}

/**
 * Kinds of subject an RBAC binding can grant
 */
export type SubjectKind = 'User' | 'Group' | 'ServiceAccount';

/**
 * Subject entry of a RoleBinding/ClusterRoleBinding
 */
export interface RbacSubject {
  kind: SubjectKind;
  name: string;
  /** RBAC_API_GROUP for User/Group, empty for ServiceAccount */
  apiGroup: string;
  /** Only for ServiceAccount subjects */
  namespace?: string;
}

/**
 * Kinds a binding's roleRef can point at
 */
export type RoleRefKind = 'Role' | 'ClusterRole';

export interface RoleRef {
  apiGroup: typeof RBAC_API_GROUP;
  kind: RoleRefKind;
  name: string;
}

export interface NamespaceObject {
  apiVersion: 'v1';
  kind: 'Namespace';
  metadata: ObjectMeta;
}

export interface ServiceAccountObject {
  apiVersion: 'v1';
  kind: 'ServiceAccount';
  metadata: ObjectMeta & { namespace: string };
}

export interface RoleBindingObject {
  apiVersion: typeof RBAC_API_VERSION;
  kind: 'RoleBinding';
  metadata: ObjectMeta & { namespace: string };
  subjects: RbacSubject[];
  roleRef: RoleRef;
}

export interface ClusterRoleBindingObject {
  apiVersion: typeof RBAC_API_VERSION;
  kind: 'ClusterRoleBinding';
  metadata: ObjectMeta;
  subjects: RbacSubject[];
  roleRef: RoleRef;
}

/**
 * Object kinds the controller creates on behalf of an RBACRule
 */
export interface ManagedObjectMap {
  Namespace: NamespaceObject;
  ServiceAccount: ServiceAccountObject;
  RoleBinding: RoleBindingObject;
  ClusterRoleBinding: ClusterRoleBindingObject;
}

export type ManagedKind = keyof ManagedObjectMap;

export type ManagedObject = ManagedObjectMap[ManagedKind];

export const MANAGED_KINDS: readonly ManagedKind[] = [
  'Namespace',
  'ServiceAccount',
  'RoleBinding',
  'ClusterRoleBinding',
];

/**
 * Whether objects of a kind live inside a namespace
 */
export function isNamespacedKind(kind: ManagedKind): boolean {
  return kind === 'ServiceAccount' || kind === 'RoleBinding';
}

/**
 * Address of an object in the store
 */
export interface ObjectKey {
  name: string;
  namespace?: string;
}

/**
 * Render a key as `namespace/name`, or `name` for cluster-scoped objects.
 * This is also the identifier format kept in RBACRule status.
 */
export function formatObjectKey(key: ObjectKey): string {
  return key.namespace ? `${key.namespace}/${key.name}` : key.name;
}
