/**
 * Cluster object store contract
 * @module @rbac-sync/core/stores/cluster-store
 *
 * The reconciler only needs key-addressed CRUD, label-selected listing and
 * optimistic concurrency from the cluster. Every method rejects with a
 * StoreError whose reason classifies the failure (NotFound, AlreadyExists,
 * Conflict, ...).
 */

import type {
  LabelSelector,
  ManagedKind,
  ManagedObjectMap,
  ObjectKey,
  RBACRule,
} from '@rbac-sync/shared';

/**
 * Options for list calls
 */
export interface ListOptions {
  /** Only return objects whose labels match; an empty selector matches all */
  labelSelector?: LabelSelector;
}

/**
 * CRUD access to RBACRules and the objects generated for them
 */
export interface ClusterStore {
  /** Read an RBACRule by name */
  getRule(name: string): Promise<RBACRule>;
  /**
   * Replace metadata and spec of an RBACRule. A set resourceVersion must match
   * the stored one or the call fails with a Conflict.
   */
  updateRule(rule: RBACRule): Promise<RBACRule>;
  /** Replace the status subresource of an RBACRule */
  updateRuleStatus(rule: RBACRule): Promise<RBACRule>;
  /** Request deletion of an RBACRule (finalizers may hold it) */
  deleteRule(name: string): Promise<void>;

  get<K extends ManagedKind>(kind: K, key: ObjectKey): Promise<ManagedObjectMap[K]>;
  list<K extends ManagedKind>(kind: K, options?: ListOptions): Promise<ManagedObjectMap[K][]>;
  create<K extends ManagedKind>(kind: K, object: ManagedObjectMap[K]): Promise<ManagedObjectMap[K]>;
  /** Replace an object; same resourceVersion rule as updateRule */
  update<K extends ManagedKind>(kind: K, object: ManagedObjectMap[K]): Promise<ManagedObjectMap[K]>;
  delete(kind: ManagedKind, key: ObjectKey): Promise<void>;
}

/**
 * The part of the store the namespace resolver reads
 */
export type NamespaceLister = Pick<ClusterStore, 'list'>;
