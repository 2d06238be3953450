/**
 * In-memory cluster store
 * @module @rbac-sync/core/stores/memory-cluster-store
 *
 * Behaves like the API server for the calls the controller makes:
 * resourceVersion-based optimistic concurrency, no-op updates that keep the
 * version, finalizer-held deletion for RBACRules, label-selected lists and
 * change events. Faults can be injected per operation for failure testing.
 */

import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import { isDeepStrictEqual } from 'node:util';
import {
  MANAGED_KINDS,
  RBACRULE_KIND,
  StoreError,
  formatObjectKey,
  matchesSelector,
  type ManagedKind,
  type ManagedObjectMap,
  type ObjectKey,
  type ObjectMeta,
  type RBACRule,
} from '@rbac-sync/shared';
import type { ClusterStore, ListOptions } from './cluster-store.js';
import type { ChangeEvent, ChangeEventType, ChangeHandler, ChangeSource, WatchedKind } from './change-source.js';

/**
 * Store operations a fault can be attached to
 */
export type StoreOperation =
  | 'getRule'
  | 'updateRule'
  | 'updateRuleStatus'
  | 'deleteRule'
  | 'get'
  | 'list'
  | 'create'
  | 'update'
  | 'delete';

/**
 * A failure to raise on matching calls
 */
export interface StoreFault {
  operation: StoreOperation;
  /** Restrict to one object kind */
  kind?: WatchedKind;
  /** Restrict to one object name */
  name?: string;
  /** Number of calls to fail (default: 1) */
  times?: number;
  /** Error to raise (default: an Unavailable StoreError) */
  error?: Error;
}

type Buckets = { [K in ManagedKind]: Map<string, ManagedObjectMap[K]> };

const CHANGE_EVENT = 'change';

/**
 * Metadata without the fields owned by the store rather than by the writer
 */
function writableMetadata(meta: ObjectMeta): ObjectMeta {
  const {
    resourceVersion: _rv,
    uid: _uid,
    creationTimestamp: _ct,
    generation: _gen,
    deletionTimestamp: _dt,
    ...rest
  } = meta;
  return rest;
}

interface ServerFields {
  uid?: string;
  resourceVersion?: string;
  creationTimestamp?: string;
}

/**
 * Overwrite the store-owned fields of a metadata object in place
 */
function stampMetadata(meta: ObjectMeta, fields: ServerFields): void {
  delete meta.generation;
  delete meta.deletionTimestamp;
  for (const field of ['uid', 'resourceVersion', 'creationTimestamp'] as const) {
    const value = fields[field];
    if (value === undefined) {
      delete meta[field];
    } else {
      meta[field] = value;
    }
  }
}

/**
 * In-memory ClusterStore and ChangeSource
 */
export class InMemoryClusterStore implements ClusterStore, ChangeSource {
  private readonly rules = new Map<string, RBACRule>();
  private readonly buckets: Buckets = {
    Namespace: new Map(),
    ServiceAccount: new Map(),
    RoleBinding: new Map(),
    ClusterRoleBinding: new Map(),
  };
  private readonly events = new EventEmitter();
  private readonly faults: Array<StoreFault & { remaining: number }> = [];
  private version = 0;

  // ==========================================================================
  // ChangeSource
  // ==========================================================================

  /**
   * Replay everything stored as `added`, like an informer's initial list.
   * Later events are emitted synchronously from the write paths.
   */
  async start(): Promise<void> {
    for (const rule of this.rules.values()) {
      this.emit('added', RBACRULE_KIND, rule.metadata);
    }
    for (const kind of MANAGED_KINDS) {
      for (const object of this.buckets[kind].values()) {
        this.emit('added', kind, object.metadata);
      }
    }
  }

  stop(): void {
    this.events.removeAllListeners(CHANGE_EVENT);
  }

  onEvent(handler: ChangeHandler): () => void {
    this.events.on(CHANGE_EVENT, handler);
    return () => {
      this.events.off(CHANGE_EVENT, handler);
    };
  }

  // ==========================================================================
  // Fault injection
  // ==========================================================================

  /**
   * Make matching calls fail
   */
  injectFault(fault: StoreFault): void {
    this.faults.push({ ...fault, remaining: fault.times ?? 1 });
  }

  clearFaults(): void {
    this.faults.length = 0;
  }

  private checkFault(operation: StoreOperation, kind: WatchedKind, name?: string): void {
    const fault = this.faults.find(
      (f) =>
        f.remaining > 0 &&
        f.operation === operation &&
        (f.kind === undefined || f.kind === kind) &&
        (f.name === undefined || f.name === name),
    );
    if (!fault) {
      return;
    }
    fault.remaining -= 1;
    throw fault.error ?? new StoreError('Unavailable', `injected ${operation} failure for ${kind}`, {
      resourceType: kind,
      resourceId: name,
    });
  }

  // ==========================================================================
  // RBACRules
  // ==========================================================================

  /**
   * Create an RBACRule (what `kubectl apply` would do after admission)
   */
  async createRule(rule: RBACRule): Promise<RBACRule> {
    const name = rule.metadata.name;
    if (this.rules.has(name)) {
      throw StoreError.alreadyExists(RBACRULE_KIND, name);
    }
    const stored: RBACRule = structuredClone({
      ...rule,
      metadata: {
        ...writableMetadata(rule.metadata),
        uid: randomUUID(),
        resourceVersion: this.nextVersion(),
        generation: 1,
        creationTimestamp: new Date().toISOString(),
      },
    });
    this.rules.set(name, stored);
    this.emit('added', RBACRULE_KIND, stored.metadata);
    return structuredClone(stored);
  }

  async getRule(name: string): Promise<RBACRule> {
    this.checkFault('getRule', RBACRULE_KIND, name);
    const rule = this.rules.get(name);
    if (!rule) {
      throw StoreError.notFound(RBACRULE_KIND, name);
    }
    return structuredClone(rule);
  }

  async updateRule(rule: RBACRule): Promise<RBACRule> {
    this.checkFault('updateRule', RBACRULE_KIND, rule.metadata.name);
    const current = this.currentRule(rule);

    const specChanged = !isDeepStrictEqual(current.spec, rule.spec);
    const metaChanged = !isDeepStrictEqual(writableMetadata(current.metadata), writableMetadata(rule.metadata));
    if (!specChanged && !metaChanged) {
      return structuredClone(current);
    }

    const next: RBACRule = structuredClone({
      ...rule,
      metadata: {
        ...writableMetadata(rule.metadata),
        uid: current.metadata.uid,
        creationTimestamp: current.metadata.creationTimestamp,
        deletionTimestamp: current.metadata.deletionTimestamp,
        generation: (current.metadata.generation ?? 1) + (specChanged ? 1 : 0),
        resourceVersion: this.nextVersion(),
      },
      status: current.status,
    });
    if (next.metadata.deletionTimestamp === undefined) {
      delete next.metadata.deletionTimestamp;
    }
    if (next.status === undefined) {
      delete next.status;
    }

    if (next.metadata.deletionTimestamp && (next.metadata.finalizers ?? []).length === 0) {
      this.rules.delete(next.metadata.name);
      this.emit('deleted', RBACRULE_KIND, next.metadata);
      return structuredClone(next);
    }

    this.rules.set(next.metadata.name, next);
    this.emit('modified', RBACRULE_KIND, next.metadata);
    return structuredClone(next);
  }

  async updateRuleStatus(rule: RBACRule): Promise<RBACRule> {
    this.checkFault('updateRuleStatus', RBACRULE_KIND, rule.metadata.name);
    const current = this.currentRule(rule);
    if (isDeepStrictEqual(current.status, rule.status)) {
      return structuredClone(current);
    }

    const next: RBACRule = structuredClone({
      ...current,
      metadata: { ...current.metadata, resourceVersion: this.nextVersion() },
      status: rule.status,
    });
    this.rules.set(next.metadata.name, next);
    this.emit('modified', RBACRULE_KIND, next.metadata);
    return structuredClone(next);
  }

  async deleteRule(name: string): Promise<void> {
    this.checkFault('deleteRule', RBACRULE_KIND, name);
    const current = this.rules.get(name);
    if (!current) {
      throw StoreError.notFound(RBACRULE_KIND, name);
    }
    if ((current.metadata.finalizers ?? []).length === 0) {
      this.rules.delete(name);
      this.emit('deleted', RBACRULE_KIND, current.metadata);
      return;
    }
    if (current.metadata.deletionTimestamp) {
      return;
    }
    const next = structuredClone(current);
    next.metadata.deletionTimestamp = new Date().toISOString();
    next.metadata.resourceVersion = this.nextVersion();
    this.rules.set(name, next);
    this.emit('modified', RBACRULE_KIND, next.metadata);
  }

  /**
   * Whether a rule is still stored (including while terminating)
   */
  hasRule(name: string): boolean {
    return this.rules.has(name);
  }

  private currentRule(rule: RBACRule): RBACRule {
    const name = rule.metadata.name;
    const current = this.rules.get(name);
    if (!current) {
      throw StoreError.notFound(RBACRULE_KIND, name);
    }
    const expected = rule.metadata.resourceVersion;
    if (expected !== undefined && expected !== current.metadata.resourceVersion) {
      throw StoreError.conflict(RBACRULE_KIND, name);
    }
    return current;
  }

  // ==========================================================================
  // Managed objects
  // ==========================================================================

  async get<K extends ManagedKind>(kind: K, key: ObjectKey): Promise<ManagedObjectMap[K]> {
    this.checkFault('get', kind, key.name);
    const object = this.buckets[kind].get(formatObjectKey(key));
    if (!object) {
      throw StoreError.notFound(kind, key.name, key.namespace);
    }
    return structuredClone(object);
  }

  async list<K extends ManagedKind>(kind: K, options: ListOptions = {}): Promise<ManagedObjectMap[K][]> {
    this.checkFault('list', kind);
    const selector = options.labelSelector;
    return [...this.buckets[kind].entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([, object]) => object)
      .filter((object) => !selector || matchesSelector(object.metadata.labels ?? {}, selector))
      .map((object) => structuredClone(object));
  }

  async create<K extends ManagedKind>(kind: K, object: ManagedObjectMap[K]): Promise<ManagedObjectMap[K]> {
    const key = this.keyOf(object);
    this.checkFault('create', kind, key.name);
    const bucket = this.buckets[kind];
    const id = formatObjectKey(key);
    if (bucket.has(id)) {
      throw StoreError.alreadyExists(kind, key.name, key.namespace);
    }
    const stored = structuredClone(object);
    stampMetadata(stored.metadata, {
      uid: randomUUID(),
      resourceVersion: this.nextVersion(),
      creationTimestamp: new Date().toISOString(),
    });
    bucket.set(id, stored);
    this.emit('added', kind, stored.metadata);
    return structuredClone(stored);
  }

  async update<K extends ManagedKind>(kind: K, object: ManagedObjectMap[K]): Promise<ManagedObjectMap[K]> {
    const key = this.keyOf(object);
    this.checkFault('update', kind, key.name);
    const bucket = this.buckets[kind];
    const id = formatObjectKey(key);
    const current = bucket.get(id);
    if (!current) {
      throw StoreError.notFound(kind, key.name, key.namespace);
    }
    const expected = object.metadata.resourceVersion;
    if (expected !== undefined && expected !== current.metadata.resourceVersion) {
      throw StoreError.conflict(kind, key.name, key.namespace);
    }

    const incoming = structuredClone(object);
    stampMetadata(incoming.metadata, {
      uid: current.metadata.uid,
      creationTimestamp: current.metadata.creationTimestamp,
      resourceVersion: current.metadata.resourceVersion,
    });
    if (isDeepStrictEqual(incoming, current)) {
      return structuredClone(current);
    }

    incoming.metadata.resourceVersion = this.nextVersion();
    bucket.set(id, incoming);
    this.emit('modified', kind, incoming.metadata);
    return structuredClone(incoming);
  }

  async delete(kind: ManagedKind, key: ObjectKey): Promise<void> {
    this.checkFault('delete', kind, key.name);
    const bucket = this.buckets[kind];
    const id = formatObjectKey(key);
    const current = bucket.get(id);
    if (!current) {
      throw StoreError.notFound(kind, key.name, key.namespace);
    }
    bucket.delete(id);
    this.emit('deleted', kind, current.metadata);
  }

  /**
   * Synchronous snapshot of one kind, for assertions
   */
  snapshot<K extends ManagedKind>(kind: K): ManagedObjectMap[K][] {
    return [...this.buckets[kind].values()].map((object) => structuredClone(object));
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private keyOf(object: ManagedObjectMap[ManagedKind]): ObjectKey {
    return { name: object.metadata.name, namespace: object.metadata.namespace };
  }

  private nextVersion(): string {
    this.version += 1;
    return String(this.version);
  }

  private emit(type: ChangeEventType, kind: WatchedKind, metadata: ObjectMeta): void {
    const event: ChangeEvent = { type, kind, metadata: structuredClone(metadata) };
    this.events.emit(CHANGE_EVENT, event);
  }
}

/**
 * Create an empty in-memory store
 */
export function createInMemoryClusterStore(): InMemoryClusterStore {
  return new InMemoryClusterStore();
}
