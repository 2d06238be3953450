/**
 * ClusterStore backed by the Kubernetes API
 * @module @rbac-sync/controller/kubernetes/kube-cluster-store
 */

import {
  CoreV1Api,
  CustomObjectsApi,
  HttpError,
  RbacAuthorizationV1Api,
  type KubeConfig,
  type V1ClusterRoleBinding,
  type V1Namespace,
  type V1ObjectMeta,
  type V1RoleBinding,
  type V1RoleRef,
  type V1ServiceAccount,
} from '@kubernetes/client-node';
import {
  ObjectTypeError,
  RBAC_API_GROUP,
  RBAC_API_VERSION,
  RBACRULE_GROUP,
  RBACRULE_KIND,
  RBACRULE_PLURAL,
  RBACRULE_VERSION,
  StoreError,
  createServiceLogger,
  formatLabelSelector,
  formatObjectKey,
  isRecord,
  parseRbacRule,
  type ClusterRoleBindingObject,
  type ErrorMeta,
  type Logger,
  type ManagedKind,
  type ManagedObjectMap,
  type NamespaceObject,
  type ObjectKey,
  type ObjectMeta,
  type RBACRule,
  type RbacSubject,
  type RoleBindingObject,
  type RoleRef,
  type ServiceAccountObject,
  type SubjectKind,
} from '@rbac-sync/shared';
import type { ClusterStore, ListOptions } from '@rbac-sync/core';

/**
 * The client-node calls the store makes
 */
export interface KubeApis {
  core: Pick<
    CoreV1Api,
    | 'readNamespace'
    | 'listNamespace'
    | 'createNamespace'
    | 'replaceNamespace'
    | 'deleteNamespace'
    | 'readNamespacedServiceAccount'
    | 'listServiceAccountForAllNamespaces'
    | 'createNamespacedServiceAccount'
    | 'replaceNamespacedServiceAccount'
    | 'deleteNamespacedServiceAccount'
  >;
  rbac: Pick<
    RbacAuthorizationV1Api,
    | 'readNamespacedRoleBinding'
    | 'listRoleBindingForAllNamespaces'
    | 'createNamespacedRoleBinding'
    | 'replaceNamespacedRoleBinding'
    | 'deleteNamespacedRoleBinding'
    | 'readClusterRoleBinding'
    | 'listClusterRoleBinding'
    | 'createClusterRoleBinding'
    | 'replaceClusterRoleBinding'
    | 'deleteClusterRoleBinding'
  >;
  custom: Pick<
    CustomObjectsApi,
    | 'getClusterCustomObject'
    | 'replaceClusterCustomObject'
    | 'replaceClusterCustomObjectStatus'
    | 'deleteClusterCustomObject'
  >;
}

export function createKubeApis(kubeConfig: KubeConfig): KubeApis {
  return {
    core: kubeConfig.makeApiClient(CoreV1Api),
    rbac: kubeConfig.makeApiClient(RbacAuthorizationV1Api),
    custom: kubeConfig.makeApiClient(CustomObjectsApi),
  };
}

// ============================================================================
// Error mapping
// ============================================================================

/**
 * Turn a client-node failure into a StoreError. HTTP errors are classified by
 * status code and Status reason; anything else (socket errors, timeouts) is
 * reported as Unavailable.
 */
export function toStoreError(error: unknown, action: string, meta: ErrorMeta = {}): StoreError {
  if (error instanceof StoreError) {
    return error;
  }
  if (error instanceof HttpError) {
    const statusCode = error.statusCode ?? error.response?.statusCode;
    const body: unknown = error.body;
    const statusReason = isRecord(body) && typeof body.reason === 'string' ? body.reason : undefined;
    const message =
      isRecord(body) && typeof body.message === 'string'
        ? body.message
        : `${action} failed with HTTP ${statusCode ?? 'error'}`;
    return StoreError.fromStatus(statusCode, message, { ...meta, statusCode }, error, statusReason);
  }
  const cause = error instanceof Error ? error : new Error(String(error));
  return new StoreError('Unavailable', `${action} failed: ${cause.message}`, meta, cause);
}

// ============================================================================
// Object conversion
// ============================================================================

const SUBJECT_KINDS: readonly SubjectKind[] = ['User', 'Group', 'ServiceAccount'];

function isoTime(value: Date | string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value instanceof Date ? value.toISOString() : value;
}

/**
 * Metadata as read from the API. Timestamps become RFC 3339 strings.
 */
export function fromKubeMeta(meta: V1ObjectMeta | undefined, kind: string): ObjectMeta {
  if (!meta?.name) {
    throw new ObjectTypeError(kind, 'object without metadata.name');
  }
  const out: ObjectMeta = { name: meta.name };
  if (meta.namespace) out.namespace = meta.namespace;
  if (meta.uid) out.uid = meta.uid;
  if (meta.resourceVersion) out.resourceVersion = meta.resourceVersion;
  if (meta.generation !== undefined) out.generation = meta.generation;
  if (meta.labels) out.labels = { ...meta.labels };
  if (meta.annotations) out.annotations = { ...meta.annotations };
  if (meta.finalizers) out.finalizers = [...meta.finalizers];
  if (meta.ownerReferences) {
    out.ownerReferences = meta.ownerReferences.map((ref) => ({ ...ref }));
  }
  const created = isoTime(meta.creationTimestamp);
  if (created) out.creationTimestamp = created;
  const deleted = isoTime(meta.deletionTimestamp);
  if (deleted) out.deletionTimestamp = deleted;
  return out;
}

/**
 * Metadata to send. Server-owned fields other than resourceVersion are left out.
 */
export function toKubeMeta(meta: ObjectMeta): V1ObjectMeta {
  return {
    name: meta.name,
    namespace: meta.namespace,
    labels: meta.labels,
    annotations: meta.annotations,
    ownerReferences: meta.ownerReferences,
    finalizers: meta.finalizers,
    resourceVersion: meta.resourceVersion,
  };
}

function withNamespace(meta: ObjectMeta, kind: string): ObjectMeta & { namespace: string } {
  const { namespace } = meta;
  if (!namespace) {
    throw new ObjectTypeError(`namespaced ${kind}`, `${kind} "${meta.name}" without a namespace`);
  }
  return { ...meta, namespace };
}

type KubeSubject = NonNullable<V1RoleBinding['subjects']>[number];

/**
 * Subjects of kinds rbac-sync does not generate are dropped
 */
function fromKubeSubjects(subjects: KubeSubject[] | undefined): RbacSubject[] {
  return (subjects ?? []).flatMap((subject): RbacSubject[] => {
    const kind = SUBJECT_KINDS.find((k) => k === subject.kind);
    if (!kind) {
      return [];
    }
    const out: RbacSubject = { kind, name: subject.name, apiGroup: subject.apiGroup ?? '' };
    if (subject.namespace) {
      out.namespace = subject.namespace;
    }
    return [out];
  });
}

function fromKubeRoleRef(roleRef: V1RoleRef, owner: string): RoleRef {
  if (roleRef.kind !== 'Role' && roleRef.kind !== 'ClusterRole') {
    throw new ObjectTypeError('roleRef of kind Role or ClusterRole', `${roleRef.kind} in ${owner}`);
  }
  return { apiGroup: RBAC_API_GROUP, kind: roleRef.kind, name: roleRef.name };
}

export function fromKubeNamespace(ns: V1Namespace): NamespaceObject {
  return { apiVersion: 'v1', kind: 'Namespace', metadata: fromKubeMeta(ns.metadata, 'Namespace') };
}

export function fromKubeServiceAccount(sa: V1ServiceAccount): ServiceAccountObject {
  return {
    apiVersion: 'v1',
    kind: 'ServiceAccount',
    metadata: withNamespace(fromKubeMeta(sa.metadata, 'ServiceAccount'), 'ServiceAccount'),
  };
}

export function fromKubeRoleBinding(rb: V1RoleBinding): RoleBindingObject {
  const metadata = withNamespace(fromKubeMeta(rb.metadata, 'RoleBinding'), 'RoleBinding');
  return {
    apiVersion: RBAC_API_VERSION,
    kind: 'RoleBinding',
    metadata,
    subjects: fromKubeSubjects(rb.subjects),
    roleRef: fromKubeRoleRef(rb.roleRef, formatObjectKey(metadata)),
  };
}

export function fromKubeClusterRoleBinding(crb: V1ClusterRoleBinding): ClusterRoleBindingObject {
  const metadata = fromKubeMeta(crb.metadata, 'ClusterRoleBinding');
  return {
    apiVersion: RBAC_API_VERSION,
    kind: 'ClusterRoleBinding',
    metadata,
    subjects: fromKubeSubjects(crb.subjects),
    roleRef: fromKubeRoleRef(crb.roleRef, metadata.name),
  };
}

function toKubeBinding(object: RoleBindingObject | ClusterRoleBindingObject): V1RoleBinding {
  return {
    apiVersion: object.apiVersion,
    kind: object.kind,
    metadata: toKubeMeta(object.metadata),
    subjects: object.subjects.map((subject) => ({ ...subject })),
    roleRef: { ...object.roleRef },
  };
}

// ============================================================================
// Store
// ============================================================================

/**
 * Per-kind access, so the generic ClusterStore methods stay typed
 */
interface KindClient<T> {
  read(key: ObjectKey): Promise<T>;
  list(labelSelector: string | undefined): Promise<T[]>;
  create(object: T): Promise<T>;
  replace(object: T): Promise<T>;
  remove(key: ObjectKey): Promise<void>;
}

type KindClients = { [K in ManagedKind]: KindClient<ManagedObjectMap[K]> };

function namespaceOf(key: ObjectKey, kind: ManagedKind): string {
  if (!key.namespace) {
    throw new ObjectTypeError(`namespaced ${kind} key`, `"${key.name}" without a namespace`);
  }
  return key.namespace;
}

function buildKindClients({ core, rbac }: KubeApis): KindClients {
  return {
    Namespace: {
      read: async (key) => fromKubeNamespace((await core.readNamespace(key.name)).body),
      list: async (selector) =>
        (await core.listNamespace(undefined, undefined, undefined, undefined, selector)).body.items.map(
          fromKubeNamespace,
        ),
      create: async (ns) =>
        fromKubeNamespace(
          (await core.createNamespace({ apiVersion: 'v1', kind: 'Namespace', metadata: toKubeMeta(ns.metadata) })).body,
        ),
      replace: async (ns) =>
        fromKubeNamespace(
          (
            await core.replaceNamespace(ns.metadata.name, {
              apiVersion: 'v1',
              kind: 'Namespace',
              metadata: toKubeMeta(ns.metadata),
            })
          ).body,
        ),
      remove: async (key) => {
        await core.deleteNamespace(key.name);
      },
    },
    ServiceAccount: {
      read: async (key) =>
        fromKubeServiceAccount(
          (await core.readNamespacedServiceAccount(key.name, namespaceOf(key, 'ServiceAccount'))).body,
        ),
      list: async (selector) =>
        (await core.listServiceAccountForAllNamespaces(undefined, undefined, undefined, selector)).body.items.map(
          fromKubeServiceAccount,
        ),
      create: async (sa) =>
        fromKubeServiceAccount(
          (
            await core.createNamespacedServiceAccount(sa.metadata.namespace, {
              apiVersion: 'v1',
              kind: 'ServiceAccount',
              metadata: toKubeMeta(sa.metadata),
            })
          ).body,
        ),
      replace: async (sa) =>
        fromKubeServiceAccount(
          (
            await core.replaceNamespacedServiceAccount(sa.metadata.name, sa.metadata.namespace, {
              apiVersion: 'v1',
              kind: 'ServiceAccount',
              metadata: toKubeMeta(sa.metadata),
            })
          ).body,
        ),
      remove: async (key) => {
        await core.deleteNamespacedServiceAccount(key.name, namespaceOf(key, 'ServiceAccount'));
      },
    },
    RoleBinding: {
      read: async (key) =>
        fromKubeRoleBinding((await rbac.readNamespacedRoleBinding(key.name, namespaceOf(key, 'RoleBinding'))).body),
      list: async (selector) =>
        (await rbac.listRoleBindingForAllNamespaces(undefined, undefined, undefined, selector)).body.items.map(
          fromKubeRoleBinding,
        ),
      create: async (rb) =>
        fromKubeRoleBinding((await rbac.createNamespacedRoleBinding(rb.metadata.namespace, toKubeBinding(rb))).body),
      replace: async (rb) =>
        fromKubeRoleBinding(
          (await rbac.replaceNamespacedRoleBinding(rb.metadata.name, rb.metadata.namespace, toKubeBinding(rb))).body,
        ),
      remove: async (key) => {
        await rbac.deleteNamespacedRoleBinding(key.name, namespaceOf(key, 'RoleBinding'));
      },
    },
    ClusterRoleBinding: {
      read: async (key) => fromKubeClusterRoleBinding((await rbac.readClusterRoleBinding(key.name)).body),
      list: async (selector) =>
        (await rbac.listClusterRoleBinding(undefined, undefined, undefined, undefined, selector)).body.items.map(
          fromKubeClusterRoleBinding,
        ),
      create: async (crb) =>
        fromKubeClusterRoleBinding((await rbac.createClusterRoleBinding(toKubeBinding(crb))).body),
      replace: async (crb) =>
        fromKubeClusterRoleBinding(
          (await rbac.replaceClusterRoleBinding(crb.metadata.name, toKubeBinding(crb))).body,
        ),
      remove: async (key) => {
        await rbac.deleteClusterRoleBinding(key.name);
      },
    },
  };
}

export interface KubeClusterStoreOptions {
  logger?: Logger;
}

/**
 * ClusterStore over CoreV1Api, RbacAuthorizationV1Api and CustomObjectsApi
 */
export class KubeClusterStore implements ClusterStore {
  private readonly custom: KubeApis['custom'];
  private readonly clients: KindClients;
  private readonly logger: Logger;

  constructor(apis: KubeApis, options: KubeClusterStoreOptions = {}) {
    this.custom = apis.custom;
    this.clients = buildKindClients(apis);
    this.logger =
      options.logger ?? createServiceLogger({ service: 'rbac-sync' }, { component: 'kube-cluster-store' });
  }

  static fromKubeConfig(kubeConfig: KubeConfig, options: KubeClusterStoreOptions = {}): KubeClusterStore {
    return new KubeClusterStore(createKubeApis(kubeConfig), options);
  }

  // ==========================================================================
  // RBACRules
  // ==========================================================================

  async getRule(name: string): Promise<RBACRule> {
    const { body } = await this.call('get', RBACRULE_KIND, { name }, () =>
      this.custom.getClusterCustomObject(RBACRULE_GROUP, RBACRULE_VERSION, RBACRULE_PLURAL, name),
    );
    return parseRbacRule(body);
  }

  async updateRule(rule: RBACRule): Promise<RBACRule> {
    const { status: _status, ...object } = rule;
    const { body } = await this.call('update', RBACRULE_KIND, rule.metadata, () =>
      this.custom.replaceClusterCustomObject(
        RBACRULE_GROUP,
        RBACRULE_VERSION,
        RBACRULE_PLURAL,
        rule.metadata.name,
        object,
      ),
    );
    return parseRbacRule(body);
  }

  async updateRuleStatus(rule: RBACRule): Promise<RBACRule> {
    const { body } = await this.call('update status of', RBACRULE_KIND, rule.metadata, () =>
      this.custom.replaceClusterCustomObjectStatus(
        RBACRULE_GROUP,
        RBACRULE_VERSION,
        RBACRULE_PLURAL,
        rule.metadata.name,
        rule,
      ),
    );
    return parseRbacRule(body);
  }

  async deleteRule(name: string): Promise<void> {
    await this.call('delete', RBACRULE_KIND, { name }, () =>
      this.custom.deleteClusterCustomObject(RBACRULE_GROUP, RBACRULE_VERSION, RBACRULE_PLURAL, name),
    );
  }

  // ==========================================================================
  // Generated objects
  // ==========================================================================

  get<K extends ManagedKind>(kind: K, key: ObjectKey): Promise<ManagedObjectMap[K]> {
    const client: KindClient<ManagedObjectMap[K]> = this.clients[kind];
    return this.call('get', kind, key, () => client.read(key));
  }

  list<K extends ManagedKind>(kind: K, options: ListOptions = {}): Promise<ManagedObjectMap[K][]> {
    const client: KindClient<ManagedObjectMap[K]> = this.clients[kind];
    const selector = options.labelSelector ? formatLabelSelector(options.labelSelector) : '';
    return this.call('list', kind, {}, () => client.list(selector || undefined));
  }

  create<K extends ManagedKind>(kind: K, object: ManagedObjectMap[K]): Promise<ManagedObjectMap[K]> {
    const client: KindClient<ManagedObjectMap[K]> = this.clients[kind];
    return this.call('create', kind, object.metadata, () => client.create(object));
  }

  update<K extends ManagedKind>(kind: K, object: ManagedObjectMap[K]): Promise<ManagedObjectMap[K]> {
    const client: KindClient<ManagedObjectMap[K]> = this.clients[kind];
    return this.call('update', kind, object.metadata, () => client.replace(object));
  }

  async delete(kind: ManagedKind, key: ObjectKey): Promise<void> {
    const client = this.clients[kind];
    await this.call('delete', kind, key, () => client.remove(key));
  }

  /**
   * Run an API call, turning client failures into StoreErrors. Decoding errors
   * raised by the converters are passed through unchanged.
   */
  private async call<T>(action: string, kind: string, key: ObjectKey, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof ObjectTypeError) {
        throw error;
      }
      const storeError = toStoreError(error, `${action} ${kind}`, {
        resourceType: kind,
        resourceId: key.name,
        namespace: key.namespace,
      });
      this.logger.debug('Kubernetes API call failed', {
        action,
        kind,
        object: formatObjectKey(key),
        reason: storeError.reason,
      });
      throw storeError;
    }
  }
}
