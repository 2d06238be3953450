/**
 * Kubeconfig loading
 * @module @rbac-sync/controller/kubernetes/kube-config
 */

import { KubeConfig } from '@kubernetes/client-node';

/**
 * Load an explicit kubeconfig file, or fall back to $KUBECONFIG, ~/.kube/config
 * and finally the in-cluster service account
 */
export function loadKubeConfig(path?: string): KubeConfig {
  const kubeConfig = new KubeConfig();
  if (path) {
    kubeConfig.loadFromFile(path);
  } else {
    kubeConfig.loadFromDefault();
  }
  return kubeConfig;
}
