/**
 * Unit tests for the in-memory cluster store
 * @module @rbac-sync/core/tests/unit/memory-cluster-store
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  RBACRULE_API_VERSION,
  RBACRULE_KIND,
  StoreError,
  isConflictError,
  isNotFoundError,
  type RBACRule,
  type ServiceAccountObject,
} from '@rbac-sync/shared';
import { InMemoryClusterStore, type ChangeEvent } from '../../src';

function serviceAccount(name: string, namespace: string, labels: Record<string, string> = {}): ServiceAccountObject {
  return { apiVersion: 'v1', kind: 'ServiceAccount', metadata: { name, namespace, labels } };
}

function rule(name: string, finalizers?: string[]): RBACRule {
  return {
    apiVersion: RBACRULE_API_VERSION,
    kind: RBACRULE_KIND,
    metadata: { name, ...(finalizers ? { finalizers } : {}) },
    spec: { bindings: [] },
  };
}

describe('InMemoryClusterStore', () => {
  let store: InMemoryClusterStore;

  beforeEach(() => {
    store = new InMemoryClusterStore();
  });

  describe('managed objects', () => {
    it('should assign uid, resourceVersion and creationTimestamp on create', async () => {
      const created = await store.create('ServiceAccount', serviceAccount('bot', 'apps'));

      expect(created.metadata.uid).toMatch(/^[0-9a-f-]{36}$/);
      expect(created.metadata.resourceVersion).toBe('1');
      expect(created.metadata.creationTimestamp).toBeDefined();
    });

    it('should reject duplicate creates with AlreadyExists', async () => {
      await store.create('ServiceAccount', serviceAccount('bot', 'apps'));

      await expect(store.create('ServiceAccount', serviceAccount('bot', 'apps'))).rejects.toMatchObject({
        reason: 'AlreadyExists',
      });
      await expect(store.create('ServiceAccount', serviceAccount('bot', 'other'))).resolves.toBeDefined();
    });

    it('should report missing objects as NotFound', async () => {
      const error = await store.get('RoleBinding', { name: 'nope', namespace: 'apps' }).catch((e: unknown) => e);
      expect(isNotFoundError(error)).toBe(true);
      await expect(store.delete('RoleBinding', { name: 'nope', namespace: 'apps' })).rejects.toBeInstanceOf(StoreError);
    });

    it('should reject updates carrying a stale resourceVersion', async () => {
      const created = await store.create('ServiceAccount', serviceAccount('bot', 'apps'));
      await store.update('ServiceAccount', { ...created, metadata: { ...created.metadata, labels: { a: '1' } } });

      const error = await store
        .update('ServiceAccount', { ...created, metadata: { ...created.metadata, labels: { a: '2' } } })
        .catch((e: unknown) => e);
      expect(isConflictError(error)).toBe(true);
    });

    it('should keep the resourceVersion when an update changes nothing', async () => {
      const created = await store.create('ServiceAccount', serviceAccount('bot', 'apps', { a: '1' }));

      const updated = await store.update('ServiceAccount', serviceAccount('bot', 'apps', { a: '1' }));

      expect(updated.metadata.resourceVersion).toBe(created.metadata.resourceVersion);
    });

    it('should list by label selector in key order', async () => {
      await store.create('ServiceAccount', serviceAccount('b', 'apps', { owner: 'x' }));
      await store.create('ServiceAccount', serviceAccount('a', 'apps', { owner: 'x' }));
      await store.create('ServiceAccount', serviceAccount('c', 'apps', { owner: 'y' }));

      const owned = await store.list('ServiceAccount', { labelSelector: { matchLabels: { owner: 'x' } } });

      expect(owned.map((sa) => sa.metadata.name)).toEqual(['a', 'b']);
      expect(await store.list('ServiceAccount')).toHaveLength(3);
    });

    it('should return copies that do not alias stored state', async () => {
      const created = await store.create('ServiceAccount', serviceAccount('bot', 'apps', { a: '1' }));
      created.metadata.labels = { a: 'changed' };

      const read = await store.get('ServiceAccount', { name: 'bot', namespace: 'apps' });
      expect(read.metadata.labels).toEqual({ a: '1' });
    });
  });

  describe('rules', () => {
    it('should bump generation only when the spec changes', async () => {
      const created = await store.createRule(rule('r1'));
      expect(created.metadata.generation).toBe(1);

      const labelled = await store.updateRule({ ...created, metadata: { ...created.metadata, labels: { a: '1' } } });
      expect(labelled.metadata.generation).toBe(1);

      const respecced = await store.updateRule({ ...labelled, spec: { bindings: [], endTime: '2030-01-01T00:00:00Z' } });
      expect(respecced.metadata.generation).toBe(2);
    });

    it('should ignore status on the main resource and metadata on the status subresource', async () => {
      const created = await store.createRule(rule('r1'));

      const viaMain = await store.updateRule({ ...created, status: { phase: 'Active' } });
      expect(viaMain.status).toBeUndefined();

      const viaStatus = await store.updateRuleStatus({
        ...viaMain,
        metadata: { ...viaMain.metadata, labels: { a: '1' } },
        status: { phase: 'Active' },
      });
      expect(viaStatus.status).toEqual({ phase: 'Active' });
      expect(viaStatus.metadata.labels).toBeUndefined();
    });

    it('should delete a rule without finalizers immediately', async () => {
      await store.createRule(rule('r1'));
      await store.deleteRule('r1');
      expect(store.hasRule('r1')).toBe(false);
    });

    it('should hold a rule with finalizers until the last one is removed', async () => {
      await store.createRule(rule('r1', ['example.com/hold']));
      await store.deleteRule('r1');

      const terminating = await store.getRule('r1');
      expect(terminating.metadata.deletionTimestamp).toBeDefined();

      await store.updateRule({ ...terminating, metadata: { ...terminating.metadata, finalizers: [] } });
      expect(store.hasRule('r1')).toBe(false);
    });
  });

  describe('change events', () => {
    it('should emit events for writes and skip no-op updates', async () => {
      const events: ChangeEvent[] = [];
      const unsubscribe = store.onEvent((event) => events.push(event));

      await store.create('ServiceAccount', serviceAccount('bot', 'apps'));
      await store.update('ServiceAccount', serviceAccount('bot', 'apps'));
      await store.delete('ServiceAccount', { name: 'bot', namespace: 'apps' });
      unsubscribe();
      await store.create('ServiceAccount', serviceAccount('late', 'apps'));

      expect(events.map((e) => `${e.type}:${e.kind}:${e.metadata.name}`)).toEqual([
        'added:ServiceAccount:bot',
        'deleted:ServiceAccount:bot',
      ]);
    });
  });

  describe('fault injection', () => {
    it('should fail matching calls the requested number of times', async () => {
      const handler = vi.fn();
      store.injectFault({ operation: 'create', kind: 'ServiceAccount', times: 2 });

      await store.create('ServiceAccount', serviceAccount('a', 'apps')).catch(handler);
      await store.create('ServiceAccount', serviceAccount('a', 'apps')).catch(handler);
      await store.create('ServiceAccount', serviceAccount('a', 'apps'));

      expect(handler).toHaveBeenCalledTimes(2);
      expect(handler.mock.calls[0]?.[0]).toMatchObject({ reason: 'Unavailable' });
    });

    it('should only fail calls for the named object', async () => {
      store.injectFault({ operation: 'create', name: 'target' });

      await expect(store.create('ServiceAccount', serviceAccount('other', 'apps'))).resolves.toBeDefined();
      await expect(store.create('ServiceAccount', serviceAccount('target', 'apps'))).rejects.toThrow(
        'injected create failure for ServiceAccount',
      );
    });
  });
});
