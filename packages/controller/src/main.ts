/**
 * Controller process
 * @module @rbac-sync/controller/main
 *
 * Assembles the controller manager with its probe, metrics and webhook
 * listeners. Each listener is only started when configured.
 */

import http from 'node:http';
import type https from 'node:https';
import { createServiceLogger, type Logger } from '@rbac-sync/shared';
import type { ChangeSource, ClusterStore } from '@rbac-sync/core';
import type { ControllerConfig } from './config.js';
import { ControllerManager } from './services/controller-manager.js';
import { KubeClusterStore, InformerChangeSource, loadKubeConfig } from './kubernetes/index.js';
import { closeServer, createMetricsApp, createProbeApp, listen } from './http/index.js';
import { createAdmissionApp, startWebhookServer } from './webhook/index.js';

export interface ControllerDependencies {
  /** Defaults to a store talking to the cluster in the kubeconfig */
  store?: ClusterStore;
  /** Defaults to informers on the same cluster */
  source?: ChangeSource;
  logger?: Logger;
}

export interface Controller {
  readonly manager: ControllerManager;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createController(config: ControllerConfig, deps: ControllerDependencies = {}): Controller {
  const logger =
    deps.logger ?? createServiceLogger({ service: 'rbac-sync', level: config.logLevel }, { component: 'controller' });

  let store = deps.store;
  let source = deps.source;
  if (!store || !source) {
    const kubeConfig = loadKubeConfig(config.kubeconfig);
    logger.info('Loaded kubeconfig', { context: kubeConfig.getCurrentContext() });
    store ??= KubeClusterStore.fromKubeConfig(kubeConfig, { logger: logger.child({ component: 'cluster-store' }) });
    source ??= new InformerChangeSource(kubeConfig, { logger: logger.child({ component: 'informers' }) });
  }

  const manager = new ControllerManager({
    store,
    source,
    logger: logger.child({ component: 'controller-manager' }),
    maxConcurrentReconciles: config.maxConcurrentReconciles,
    retryDelayMs: config.retryDelayMs,
  });

  const servers: http.Server[] = [];
  let webhookServer: https.Server | null = null;

  async function start(): Promise<void> {
    if (config.healthProbeAddress) {
      const app = createProbeApp({ isReady: () => manager.isReady() });
      servers.push(await listen(http.createServer(app), config.healthProbeAddress, logger, 'Probe'));
    }
    if (config.metricsAddress) {
      const app = createMetricsApp(manager.metrics);
      servers.push(await listen(http.createServer(app), config.metricsAddress, logger, 'Metrics'));
    }
    if (config.enableWebhook) {
      const app = createAdmissionApp({
        defaultNamespace: config.defaultNamespace,
        logger: logger.child({ component: 'admission-webhook' }),
      });
      webhookServer = await startWebhookServer(app, config, logger);
    } else {
      logger.info('Admission webhook disabled');
    }

    await manager.start();
    logger.info('rbac-sync controller running', {
      maxConcurrentReconciles: config.maxConcurrentReconciles,
      webhook: config.enableWebhook,
    });
  }

  async function stop(): Promise<void> {
    logger.info('Stopping rbac-sync controller');
    await manager.stop();
    const closing = servers.splice(0).map((server) => closeServer(server));
    if (webhookServer) {
      closing.push(closeServer(webhookServer));
      webhookServer = null;
    }
    await Promise.all(closing);
  }

  return { manager, start, stop };
}
