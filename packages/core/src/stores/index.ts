/**
 * Cluster stores
 * @module @rbac-sync/core/stores
 */

export type { ClusterStore, ListOptions, NamespaceLister } from './cluster-store.js';
export type {
  ChangeEvent,
  ChangeEventType,
  ChangeHandler,
  ChangeSource,
  WatchedKind,
} from './change-source.js';
export {
  InMemoryClusterStore,
  createInMemoryClusterStore,
  type StoreFault,
  type StoreOperation,
} from './memory-cluster-store.js';
