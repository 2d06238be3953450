/**
 * Keyed work queue
 * @module @rbac-sync/controller/queue/work-queue
 *
 * - A key is queued at most once, however often it is added
 * - A key is handled by at most one worker at a time; adding it while it is
 *   being handled schedules exactly one more run afterwards
 * - Up to `concurrency` different keys are handled in parallel
 * - Delayed adds keep the earliest pending wake-up per key
 * - Rate-limited adds back off exponentially per key until forgotten
 */

import { createServiceLogger, toError, type Logger } from '@rbac-sync/shared';

export type QueueHandler = (key: string) => Promise<void>;

export interface WorkQueueOptions {
  /** Parallel workers (default: 1) */
  concurrency?: number;
  /** First rate-limited delay in milliseconds (default: 5) */
  baseDelayMs?: number;
  /** Largest rate-limited delay in milliseconds (default: 1000000) */
  maxDelayMs?: number;
  logger?: Logger;
}

export const DEFAULT_BASE_DELAY_MS = 5;
export const DEFAULT_MAX_DELAY_MS = 1000 * 1000;
/** Largest delay setTimeout honours */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

interface DelayedAdd {
  timer: NodeJS.Timeout;
  dueAt: number;
}

export class WorkQueue {
  private readonly concurrency: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly logger: Logger;

  /** Keys waiting for a worker, in arrival order */
  private readonly queue: string[] = [];
  /** Keys that need a run (queued, or re-added while processing) */
  private readonly dirty = new Set<string>();
  private readonly processing = new Set<string>();
  private readonly delayed = new Map<string, DelayedAdd>();
  private readonly failures = new Map<string, number>();
  private idleWaiters: Array<() => void> = [];
  private handler: QueueHandler | null = null;
  private shuttingDown = false;

  constructor(options: WorkQueueOptions = {}) {
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
    this.logger =
      options.logger ?? createServiceLogger({ service: 'rbac-sync' }, { component: 'work-queue' });
  }

  /**
   * Number of keys waiting for a worker
   */
  get length(): number {
    return this.queue.length;
  }

  /**
   * Number of keys being handled right now
   */
  get inFlight(): number {
    return this.processing.size;
  }

  get isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  /**
   * Begin handing keys to the handler
   */
  start(handler: QueueHandler): void {
    this.handler = handler;
    this.pump();
  }

  add(key: string): void {
    if (this.shuttingDown || this.dirty.has(key)) {
      return;
    }
    this.dirty.add(key);
    if (this.processing.has(key)) {
      return;
    }
    this.queue.push(key);
    this.pump();
  }

  /**
   * Add the key once the delay has passed. An earlier pending wake-up for the
   * same key wins over a later one.
   */
  addAfter(key: string, delayMs: number): void {
    if (this.shuttingDown) {
      return;
    }
    if (delayMs <= 0) {
      this.add(key);
      return;
    }

    const dueAt = Date.now() + delayMs;
    const existing = this.delayed.get(key);
    if (existing) {
      if (existing.dueAt <= dueAt) {
        return;
      }
      clearTimeout(existing.timer);
    }

    this.arm(key, dueAt);
  }

  /**
   * Add the key after its backoff delay and grow the delay for next time.
   * Returns the delay used.
   */
  addRateLimited(key: string): number {
    const attempts = this.failures.get(key) ?? 0;
    this.failures.set(key, attempts + 1);
    const delay = Math.min(this.baseDelayMs * 2 ** attempts, this.maxDelayMs);
    this.addAfter(key, delay);
    return delay;
  }

  /**
   * Reset the backoff of a key
   */
  forget(key: string): void {
    this.failures.delete(key);
  }

  /**
   * Rate-limited adds since the key was last forgotten
   */
  numRequeues(key: string): number {
    return this.failures.get(key) ?? 0;
  }

  /**
   * Resolves once nothing is queued or in flight. Delayed adds are not waited for.
   */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Drop queued and delayed keys, refuse new ones, and wait for in-flight handlers
   */
  async shutDown(): Promise<void> {
    this.shuttingDown = true;
    for (const { timer } of this.delayed.values()) {
      clearTimeout(timer);
    }
    this.delayed.clear();
    this.queue.length = 0;
    this.dirty.clear();
    await this.onIdle();
  }

  /**
   * Timers longer than MAX_TIMER_DELAY_MS fire at once, so long waits are
   * taken in steps until `dueAt`.
   */
  private arm(key: string, dueAt: number): void {
    const wait = Math.min(Math.max(dueAt - Date.now(), 0), MAX_TIMER_DELAY_MS);
    const timer = setTimeout(() => {
      if (Date.now() < dueAt) {
        this.arm(key, dueAt);
        return;
      }
      this.delayed.delete(key);
      this.add(key);
    }, wait);
    this.delayed.set(key, { timer, dueAt });
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.processing.size === 0;
  }

  private pump(): void {
    const handler = this.handler;
    if (!handler) {
      return;
    }
    while (this.processing.size < this.concurrency && this.queue.length > 0) {
      const key = this.queue.shift();
      if (key === undefined) {
        break;
      }
      this.dirty.delete(key);
      this.processing.add(key);
      void this.process(key, handler);
    }
    if (this.isIdle()) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) {
        resolve();
      }
    }
  }

  private async process(key: string, handler: QueueHandler): Promise<void> {
    try {
      await handler(key);
    } catch (error) {
      this.logger.error('Work queue handler failed', toError(error), { key });
    } finally {
      this.processing.delete(key);
      if (this.dirty.has(key) && !this.shuttingDown) {
        this.queue.push(key);
      }
      this.pump();
    }
  }
}
