/**
 * Kubernetes adapters
 * @module @rbac-sync/controller/kubernetes
 */

export {
  KubeClusterStore,
  createKubeApis,
  toStoreError,
  fromKubeMeta,
  toKubeMeta,
  fromKubeNamespace,
  fromKubeServiceAccount,
  fromKubeRoleBinding,
  fromKubeClusterRoleBinding,
  type KubeApis,
  type KubeClusterStoreOptions,
} from './kube-cluster-store.js';

export {
  InformerChangeSource,
  INFORMER_RESTART_DELAY_MS,
  eventMetadata,
  toCustomObjectList,
  type InformerChangeSourceOptions,
} from './informer-change-source.js';

export { loadKubeConfig } from './kube-config.js';
