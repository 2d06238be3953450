/**
 * Change source built on client-node informers
 * @module @rbac-sync/controller/kubernetes/informer-change-source
 */

import { EventEmitter } from 'node:events';
import {
  CoreV1Api,
  CustomObjectsApi,
  RbacAuthorizationV1Api,
  makeInformer,
  type Informer,
  type KubeConfig,
  type KubernetesListObject,
  type KubernetesObject,
  type ListPromise,
  type V1ObjectMeta,
} from '@kubernetes/client-node';
import {
  RBACRULE_GROUP,
  RBACRULE_KIND,
  RBACRULE_OWNER_LABEL,
  RBACRULE_PLURAL,
  RBACRULE_VERSION,
  createServiceLogger,
  isRecord,
  toError,
  type Logger,
  type ObjectMeta,
} from '@rbac-sync/shared';
import type { ChangeEventType, ChangeHandler, ChangeSource, WatchedKind } from '@rbac-sync/core';
import { toStoreError } from './kube-cluster-store.js';

const CHANGE_EVENT = 'change';

/** Delay before an informer that failed is restarted */
export const INFORMER_RESTART_DELAY_MS = 5000;

/**
 * Reduce watched metadata to what event mapping needs. Watch payloads are
 * raw JSON, so timestamps are not read here.
 */
export function eventMetadata(meta: V1ObjectMeta | undefined): ObjectMeta | null {
  if (!meta?.name) {
    return null;
  }
  const out: ObjectMeta = { name: meta.name };
  if (meta.namespace) out.namespace = meta.namespace;
  if (meta.uid) out.uid = meta.uid;
  if (meta.resourceVersion) out.resourceVersion = meta.resourceVersion;
  if (meta.labels) out.labels = { ...meta.labels };
  if (meta.ownerReferences) out.ownerReferences = meta.ownerReferences.map((ref) => ({ ...ref }));
  return out;
}

/**
 * Check the untyped custom-object list response and keep the fields informers use
 */
export function toCustomObjectList(body: unknown): KubernetesListObject<KubernetesObject> {
  if (!isRecord(body) || !Array.isArray(body.items)) {
    throw new Error('custom object list response has no items');
  }
  const metadata = isRecord(body.metadata) ? body.metadata : {};
  const items = body.items.filter(isRecord).map((item): KubernetesObject => {
    const meta = isRecord(item.metadata) ? item.metadata : {};
    const object: KubernetesObject = {
      apiVersion: typeof item.apiVersion === 'string' ? item.apiVersion : undefined,
      kind: typeof item.kind === 'string' ? item.kind : undefined,
      metadata: {
        name: typeof meta.name === 'string' ? meta.name : undefined,
        uid: typeof meta.uid === 'string' ? meta.uid : undefined,
        resourceVersion: typeof meta.resourceVersion === 'string' ? meta.resourceVersion : undefined,
      },
    };
    return object;
  });
  return {
    apiVersion: typeof body.apiVersion === 'string' ? body.apiVersion : 'v1',
    kind: typeof body.kind === 'string' ? body.kind : 'List',
    metadata: {
      resourceVersion: typeof metadata.resourceVersion === 'string' ? metadata.resourceVersion : undefined,
    },
    items,
  };
}

interface WatchSpec {
  kind: WatchedKind;
  path: string;
  list: ListPromise<KubernetesObject>;
  labelSelector?: string;
}

export interface InformerChangeSourceOptions {
  logger?: Logger;
  restartDelayMs?: number;
}

/**
 * Informers for RBACRules and the kinds generated for them. Owned kinds are
 * filtered by the ownership label; Namespaces are watched unfiltered because
 * namespaces created on demand carry only an owner reference.
 */
export class InformerChangeSource implements ChangeSource {
  private readonly events = new EventEmitter();
  private readonly specs: WatchSpec[];
  private readonly logger: Logger;
  private readonly restartDelayMs: number;
  private informers: Array<Informer<KubernetesObject>> = [];
  private restartTimers = new Set<NodeJS.Timeout>();
  private running = false;

  constructor(
    private readonly kubeConfig: KubeConfig,
    options: InformerChangeSourceOptions = {},
  ) {
    this.logger =
      options.logger ?? createServiceLogger({ service: 'rbac-sync' }, { component: 'informer-change-source' });
    this.restartDelayMs = options.restartDelayMs ?? INFORMER_RESTART_DELAY_MS;

    const core = kubeConfig.makeApiClient(CoreV1Api);
    const rbac = kubeConfig.makeApiClient(RbacAuthorizationV1Api);
    const custom = kubeConfig.makeApiClient(CustomObjectsApi);
    const owned = RBACRULE_OWNER_LABEL;

    this.specs = [
      {
        kind: RBACRULE_KIND,
        path: `/apis/${RBACRULE_GROUP}/${RBACRULE_VERSION}/${RBACRULE_PLURAL}`,
        list: async () => {
          const { response, body } = await custom.listClusterCustomObject(
            RBACRULE_GROUP,
            RBACRULE_VERSION,
            RBACRULE_PLURAL,
          );
          return { response, body: toCustomObjectList(body) };
        },
      },
      {
        kind: 'ServiceAccount',
        path: '/api/v1/serviceaccounts',
        labelSelector: owned,
        list: () => core.listServiceAccountForAllNamespaces(undefined, undefined, undefined, owned),
      },
      {
        kind: 'RoleBinding',
        path: '/apis/rbac.authorization.k8s.io/v1/rolebindings',
        labelSelector: owned,
        list: () => rbac.listRoleBindingForAllNamespaces(undefined, undefined, undefined, owned),
      },
      {
        kind: 'ClusterRoleBinding',
        path: '/apis/rbac.authorization.k8s.io/v1/clusterrolebindings',
        labelSelector: owned,
        list: () => rbac.listClusterRoleBinding(undefined, undefined, undefined, undefined, owned),
      },
      {
        kind: 'Namespace',
        path: '/api/v1/namespaces',
        list: () => core.listNamespace(),
      },
    ];
  }

  onEvent(handler: ChangeHandler): () => void {
    this.events.on(CHANGE_EVENT, handler);
    return () => {
      this.events.off(CHANGE_EVENT, handler);
    };
  }

  /**
   * Start every informer; resolves once each has delivered its initial list
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    this.informers = this.specs.map((spec) => this.createInformer(spec));
    await Promise.all(this.informers.map((informer) => informer.start()));
    this.logger.info('Informers started', { kinds: this.specs.map((spec) => spec.kind) });
  }

  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    for (const timer of this.restartTimers) {
      clearTimeout(timer);
    }
    this.restartTimers.clear();
    for (const informer of this.informers) {
      informer.stop().catch((error: unknown) => {
        this.logger.warn('Informer did not stop cleanly', { error: toError(error).message });
      });
    }
    this.informers = [];
    this.events.removeAllListeners(CHANGE_EVENT);
  }

  private createInformer(spec: WatchSpec): Informer<KubernetesObject> {
    const informer = makeInformer(this.kubeConfig, spec.path, spec.list, spec.labelSelector);
    const forward = (type: ChangeEventType) => (object: KubernetesObject) => {
      this.forward(spec.kind, type, object);
    };
    informer.on('add', forward('added'));
    informer.on('update', forward('modified'));
    informer.on('delete', forward('deleted'));
    informer.on('error', (error: unknown) => {
      const storeError = toStoreError(error, `watch ${spec.kind}`, { resourceType: spec.kind });
      this.logger.error('Informer failed, restarting', storeError, {
        kind: spec.kind,
        restartInMs: this.restartDelayMs,
      });
      this.scheduleRestart(informer, spec);
    });
    return informer;
  }

  private scheduleRestart(informer: Informer<KubernetesObject>, spec: WatchSpec): void {
    if (!this.running) {
      return;
    }
    const timer = setTimeout(() => {
      this.restartTimers.delete(timer);
      if (!this.running) {
        return;
      }
      informer.start().catch((error: unknown) => {
        this.logger.error('Informer restart failed', toError(error), { kind: spec.kind });
        this.scheduleRestart(informer, spec);
      });
    }, this.restartDelayMs);
    this.restartTimers.add(timer);
  }

  private forward(kind: WatchedKind, type: ChangeEventType, object: KubernetesObject): void {
    const metadata = eventMetadata(object.metadata);
    if (!metadata) {
      this.logger.warn('Ignoring watch event for an object without a name', { kind, type });
      return;
    }
    this.events.emit(CHANGE_EVENT, { type, kind, metadata });
  }
}
