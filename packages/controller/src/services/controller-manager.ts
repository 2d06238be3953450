/**
 * Controller Manager
 * @module @rbac-sync/controller/services/controller-manager
 *
 * Wires a change source to the work queue and the work queue to the
 * RBACRule reconciler:
 * 1. Change events are mapped to rule names and queued
 * 2. Each queued name gets one reconcile pass at a time
 * 3. A requested requeue becomes a delayed add; a thrown error a rate-limited one
 * 4. Wrong object types are reported and dropped without retry
 */

import {
  createServiceLogger,
  isObjectTypeError,
  toError,
  type Logger,
} from '@rbac-sync/shared';
import {
  RbacRuleReconciler,
  ruleKeyForEvent,
  type ChangeEvent,
  type ChangeSource,
  type ClusterStore,
} from '@rbac-sync/core';
import { WorkQueue } from '../queue/work-queue.js';
import { MetricsService } from './metrics-service.js';

/**
 * The part of the reconciler the manager drives
 */
export type Reconciler = Pick<RbacRuleReconciler, 'reconcile'>;

export interface ControllerManagerOptions {
  store: ClusterStore;
  source: ChangeSource;
  /** Defaults to an RbacRuleReconciler over the store */
  reconciler?: Reconciler;
  /** Defaults to a queue with `maxConcurrentReconciles` workers */
  queue?: WorkQueue;
  metrics?: MetricsService;
  logger?: Logger;
  /** Parallel reconciles of different rules (default: 4) */
  maxConcurrentReconciles?: number;
  /** Passed to the default reconciler */
  retryDelayMs?: number;
  /** Time source for the default reconciler */
  now?: () => Date;
}

export class ControllerManager {
  readonly queue: WorkQueue;
  readonly metrics: MetricsService;
  private readonly source: ChangeSource;
  private readonly reconciler: Reconciler;
  private readonly logger: Logger;
  private unsubscribe: (() => void) | null = null;
  private started = false;

  constructor(options: ControllerManagerOptions) {
    this.logger =
      options.logger ?? createServiceLogger({ service: 'rbac-sync' }, { component: 'controller-manager' });
    this.source = options.source;
    this.reconciler =
      options.reconciler ??
      new RbacRuleReconciler({
        store: options.store,
        logger: this.logger.child({ component: 'rbacrule-reconciler' }),
        retryDelayMs: options.retryDelayMs,
        now: options.now,
      });
    this.queue =
      options.queue ??
      new WorkQueue({
        concurrency: options.maxConcurrentReconciles ?? 4,
        logger: this.logger.child({ component: 'work-queue' }),
      });
    this.metrics = options.metrics ?? new MetricsService();
    this.metrics.setQueueDepthSource(() => this.queue.length);
  }

  /**
   * Subscribe to changes, start the workers and wait for the initial listing
   */
  async start(): Promise<void> {
    if (this.started) {
      this.logger.warn('Controller manager is already running');
      return;
    }

    this.unsubscribe = this.source.onEvent((event) => this.enqueue(event));
    this.queue.start((key) => this.reconcile(key));
    await this.source.start();
    this.started = true;
    this.logger.info('Controller manager started');
  }

  /**
   * Stop watching and wait for in-flight passes
   */
  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.source.stop();
    await this.queue.shutDown();
    this.logger.info('Controller manager stopped');
  }

  /**
   * Ready once the initial listing has been delivered and until stopped
   */
  isReady(): boolean {
    return this.started;
  }

  private enqueue(event: ChangeEvent): void {
    const key = ruleKeyForEvent(event);
    if (key === undefined) {
      return;
    }
    this.logger.debug('Queueing rule for change', {
      rule: key,
      kind: event.kind,
      type: event.type,
      object: event.metadata.name,
    });
    this.queue.add(key);
  }

  private async reconcile(key: string): Promise<void> {
    const startedAt = Date.now();
    try {
      const result = await this.reconciler.reconcile(key);
      this.queue.forget(key);
      if (result.requeueAfterMs !== undefined) {
        this.queue.addAfter(key, result.requeueAfterMs);
        this.metrics.recordReconcile('requeue', Date.now() - startedAt);
      } else {
        this.metrics.recordReconcile('success', Date.now() - startedAt);
      }
    } catch (caught) {
      const error = toError(caught);
      this.metrics.recordReconcile('error', Date.now() - startedAt);
      this.metrics.recordError(error);

      if (isObjectTypeError(error)) {
        this.queue.forget(key);
        this.logger.fatal('Reconcile received an object of the wrong type; not retrying', error, { rule: key });
        return;
      }

      const retryInMs = this.queue.addRateLimited(key);
      this.logger.error('Reconcile failed', error, { rule: key, retryInMs });
    }
  }
}
