/**
 * Change notifications
 * @module @rbac-sync/core/stores/change-source
 */

import type { ManagedKind, ObjectMeta, RBACRULE_KIND } from '@rbac-sync/shared';

export type ChangeEventType = 'added' | 'modified' | 'deleted';

/**
 * Kinds whose changes can trigger a reconcile
 */
export type WatchedKind = ManagedKind | typeof RBACRULE_KIND;

/**
 * A change to one object, reduced to what is needed to find its RBACRule
 */
export interface ChangeEvent {
  type: ChangeEventType;
  kind: WatchedKind;
  metadata: ObjectMeta;
}

export type ChangeHandler = (event: ChangeEvent) => void;

/**
 * Something that reports object changes (an informer set, or the in-memory store)
 */
export interface ChangeSource {
  /** Begin delivering events; resolves once the initial listing is delivered */
  start(): Promise<void>;
  stop(): void;
  /** Subscribe; returns the unsubscribe function */
  onEvent(handler: ChangeHandler): () => void;
}
