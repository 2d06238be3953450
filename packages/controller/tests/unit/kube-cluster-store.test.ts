/**
 * Unit tests for the Kubernetes-backed ClusterStore
 * @module @rbac-sync/controller/tests/unit/kube-cluster-store
 */

import { IncomingMessage } from 'node:http';
import { Socket } from 'node:net';
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { HttpError } from '@kubernetes/client-node';
import {
  ObjectTypeError,
  RBAC_API_GROUP,
  RBAC_API_VERSION,
  RBACRULE_API_VERSION,
  RBACRULE_FINALIZER,
  RBACRULE_OWNER_LABEL,
  StoreError,
  type RBACRule,
} from '@rbac-sync/shared';
import {
  KubeClusterStore,
  fromKubeMeta,
  fromKubeRoleBinding,
  toStoreError,
  type KubeApis,
} from '../../src/kubernetes/kube-cluster-store';

// ============================================================================
// Test Helpers
// ============================================================================

function httpError(statusCode: number, body: unknown): HttpError {
  return new HttpError(new IncomingMessage(new Socket()), body, statusCode);
}

function createFakeApis() {
  const core = {
    readNamespace: vi.fn(),
    listNamespace: vi.fn(),
    createNamespace: vi.fn(),
    replaceNamespace: vi.fn(),
    deleteNamespace: vi.fn(),
    readNamespacedServiceAccount: vi.fn(),
    listServiceAccountForAllNamespaces: vi.fn(),
    createNamespacedServiceAccount: vi.fn(),
    replaceNamespacedServiceAccount: vi.fn(),
    deleteNamespacedServiceAccount: vi.fn(),
  };
  const rbac = {
    readNamespacedRoleBinding: vi.fn(),
    listRoleBindingForAllNamespaces: vi.fn(),
    createNamespacedRoleBinding: vi.fn(),
    replaceNamespacedRoleBinding: vi.fn(),
    deleteNamespacedRoleBinding: vi.fn(),
    readClusterRoleBinding: vi.fn(),
    listClusterRoleBinding: vi.fn(),
    createClusterRoleBinding: vi.fn(),
    replaceClusterRoleBinding: vi.fn(),
    deleteClusterRoleBinding: vi.fn(),
  };
  const custom = {
    getClusterCustomObject: vi.fn(),
    replaceClusterCustomObject: vi.fn(),
    replaceClusterCustomObjectStatus: vi.fn(),
    deleteClusterCustomObject: vi.fn(),
  };
  const apis: KubeApis = { core, rbac, custom };
  return { apis, core, rbac, custom };
}

const ROLE_BINDING = {
  apiVersion: RBAC_API_VERSION,
  kind: 'RoleBinding',
  metadata: { name: 'team-access-dev-role-edit-1a2b3c4d', namespace: 'apps', resourceVersion: '12' },
  subjects: [
    { kind: 'ServiceAccount', name: 'deployer', namespace: 'apps' },
    { kind: 'User', name: 'alice', apiGroup: RBAC_API_GROUP },
  ],
  roleRef: { apiGroup: RBAC_API_GROUP, kind: 'Role', name: 'edit' },
};

describe('toStoreError', () => {
  it('should classify a 409 AlreadyExists by its Status reason', () => {
    const error = toStoreError(
      httpError(409, { reason: 'AlreadyExists', message: 'serviceaccounts "deployer" already exists' }),
      'create ServiceAccount',
    );

    expect(error.reason).toBe('AlreadyExists');
    expect(error.message).toBe('serviceaccounts "deployer" already exists');
  });

  it('should classify a plain 409 as a conflict', () => {
    expect(toStoreError(httpError(409, { reason: 'Conflict' }), 'update RoleBinding').reason).toBe('Conflict');
  });

  it('should fall back to a generic message without a Status body', () => {
    const error = toStoreError(httpError(404, 'not json'), 'get ServiceAccount');

    expect(error.reason).toBe('NotFound');
    expect(error.message).toBe('get ServiceAccount failed with HTTP 404');
  });

  it('should report transport failures as unavailable', () => {
    const error = toStoreError(new Error('socket hang up'), 'list RoleBinding');

    expect(error.reason).toBe('Unavailable');
    expect(error.message).toBe('list RoleBinding failed: socket hang up');
  });

  it('should pass StoreErrors through', () => {
    const original = new StoreError('Conflict', 'stale');
    expect(toStoreError(original, 'update Namespace')).toBe(original);
  });
});

describe('object conversion', () => {
  it('should turn timestamps into RFC 3339 strings', () => {
    expect(
      fromKubeMeta(
        {
          name: 'apps',
          uid: 'uid-1',
          creationTimestamp: new Date('2026-03-01T12:00:00.000Z'),
          labels: { team: 'a' },
        },
        'Namespace',
      ),
    ).toEqual({
      name: 'apps',
      uid: 'uid-1',
      creationTimestamp: '2026-03-01T12:00:00.000Z',
      labels: { team: 'a' },
    });
  });

  it('should reject metadata without a name', () => {
    expect(() => fromKubeMeta({}, 'Namespace')).toThrow(ObjectTypeError);
  });

  it('should convert a RoleBinding and default subject API groups', () => {
    expect(fromKubeRoleBinding(ROLE_BINDING)).toEqual({
      apiVersion: RBAC_API_VERSION,
      kind: 'RoleBinding',
      metadata: { name: 'team-access-dev-role-edit-1a2b3c4d', namespace: 'apps', resourceVersion: '12' },
      subjects: [
        { kind: 'ServiceAccount', name: 'deployer', namespace: 'apps', apiGroup: '' },
        { kind: 'User', name: 'alice', apiGroup: RBAC_API_GROUP },
      ],
      roleRef: { apiGroup: RBAC_API_GROUP, kind: 'Role', name: 'edit' },
    });
  });

  it('should drop subjects of unknown kinds', () => {
    const converted = fromKubeRoleBinding({
      ...ROLE_BINDING,
      subjects: [{ kind: 'Robot', name: 'r2' }],
    });

    expect(converted.subjects).toEqual([]);
  });

  it('should reject a RoleBinding without a namespace', () => {
    expect(() => fromKubeRoleBinding({ ...ROLE_BINDING, metadata: { name: 'x' } })).toThrow(ObjectTypeError);
  });

  it('should reject a roleRef of another kind', () => {
    expect(() =>
      fromKubeRoleBinding({ ...ROLE_BINDING, roleRef: { apiGroup: 'example.io', kind: 'Widget', name: 'w' } }),
    ).toThrow('expected roleRef of kind Role or ClusterRole but got Widget in apps/team-access-dev-role-edit-1a2b3c4d');
  });
});

describe('KubeClusterStore', () => {
  let fake: ReturnType<typeof createFakeApis>;
  let store: KubeClusterStore;

  beforeEach(() => {
    fake = createFakeApis();
    store = new KubeClusterStore(fake.apis);
  });

  it('should read a namespaced object', async () => {
    fake.rbac.readNamespacedRoleBinding.mockResolvedValue({ response: {}, body: ROLE_BINDING });

    const rb = await store.get('RoleBinding', { name: ROLE_BINDING.metadata.name, namespace: 'apps' });

    expect(fake.rbac.readNamespacedRoleBinding).toHaveBeenCalledWith(ROLE_BINDING.metadata.name, 'apps');
    expect(rb.roleRef.name).toBe('edit');
  });

  it('should list with the label selector in its string form', async () => {
    fake.rbac.listRoleBindingForAllNamespaces.mockResolvedValue({ response: {}, body: { items: [ROLE_BINDING] } });

    const items = await store.list('RoleBinding', {
      labelSelector: { matchLabels: { [RBACRULE_OWNER_LABEL]: 'team-access' } },
    });

    expect(fake.rbac.listRoleBindingForAllNamespaces).toHaveBeenCalledWith(
      undefined,
      undefined,
      undefined,
      `${RBACRULE_OWNER_LABEL}=team-access`,
    );
    expect(items).toHaveLength(1);
  });

  it('should pass the selector as the fifth argument when listing namespaces', async () => {
    fake.core.listNamespace.mockResolvedValue({ response: {}, body: { items: [{ metadata: { name: 'apps' } }] } });

    const namespaces = await store.list('Namespace', { labelSelector: { matchLabels: { team: 'a' } } });

    expect(fake.core.listNamespace).toHaveBeenCalledWith(undefined, undefined, undefined, undefined, 'team=a');
    expect(namespaces).toEqual([{ apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'apps' } }]);
  });

  it('should list everything without a selector', async () => {
    fake.rbac.listClusterRoleBinding.mockResolvedValue({ response: {}, body: { items: [] } });

    await store.list('ClusterRoleBinding');

    expect(fake.rbac.listClusterRoleBinding).toHaveBeenCalledWith(undefined, undefined, undefined, undefined, undefined);
  });

  it('should map API failures to StoreErrors', async () => {
    fake.core.createNamespacedServiceAccount.mockRejectedValue(httpError(409, { reason: 'AlreadyExists' }));

    const attempt = store.create('ServiceAccount', {
      apiVersion: 'v1',
      kind: 'ServiceAccount',
      metadata: { name: 'deployer', namespace: 'apps' },
    });

    await expect(attempt).rejects.toBeInstanceOf(StoreError);
    await expect(attempt).rejects.toMatchObject({ reason: 'AlreadyExists' });
  });

  it('should refuse a namespaced key without a namespace', async () => {
    await expect(store.delete('ServiceAccount', { name: 'deployer' })).rejects.toBeInstanceOf(ObjectTypeError);
    expect(fake.core.deleteNamespacedServiceAccount).not.toHaveBeenCalled();
  });

  it('should send RBACRule updates without the status', async () => {
    const rule: RBACRule = {
      apiVersion: RBACRULE_API_VERSION,
      kind: 'RBACRule',
      metadata: { name: 'team-access', finalizers: [RBACRULE_FINALIZER] },
      spec: { bindings: [] },
      status: { phase: 'Active' },
    };
    fake.custom.replaceClusterCustomObject.mockResolvedValue({
      response: {},
      body: { ...rule, metadata: { ...rule.metadata, resourceVersion: '2' } },
    });

    const updated = await store.updateRule(rule);

    expect(fake.custom.replaceClusterCustomObject).toHaveBeenCalledWith(
      'rbac-sync.io',
      'v1alpha1',
      'rbacrules',
      'team-access',
      {
        apiVersion: RBACRULE_API_VERSION,
        kind: 'RBACRule',
        metadata: { name: 'team-access', finalizers: [RBACRULE_FINALIZER] },
        spec: { bindings: [] },
      },
    );
    expect(updated.metadata.resourceVersion).toBe('2');
  });

  it('should map a missing RBACRule to NotFound', async () => {
    fake.custom.getClusterCustomObject.mockRejectedValue(httpError(404, { reason: 'NotFound', message: 'not found' }));

    await expect(store.getRule('gone')).rejects.toMatchObject({ reason: 'NotFound', message: 'not found' });
  });
});
