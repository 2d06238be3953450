/**
 * Metrics Service
 * @module @rbac-sync/controller/services/metrics-service
 *
 * In-process counters for the controller, rendered in the Prometheus text
 * exposition format:
 * - reconcile passes by result
 * - reconcile errors by error type
 * - reconcile duration (sum and count)
 * - work queue depth
 */

/**
 * How a reconcile pass ended
 */
export type ReconcileOutcome = 'success' | 'requeue' | 'error';

const OUTCOMES: readonly ReconcileOutcome[] = ['success', 'requeue', 'error'];

const PREFIX = 'rbacsync';

/**
 * Snapshot of the counters, for tests and debugging
 */
export interface MetricsSnapshot {
  reconcileTotal: Record<ReconcileOutcome, number>;
  reconcileErrors: Record<string, number>;
  durationSecondsSum: number;
  durationCount: number;
  queueDepth: number;
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

export class MetricsService {
  private readonly reconcileTotal: Record<ReconcileOutcome, number> = { success: 0, requeue: 0, error: 0 };
  private readonly reconcileErrors = new Map<string, number>();
  private durationSecondsSum = 0;
  private durationCount = 0;
  private queueDepth: () => number = () => 0;

  /**
   * Record one finished reconcile pass
   */
  recordReconcile(outcome: ReconcileOutcome, durationMs: number): void {
    this.reconcileTotal[outcome] += 1;
    this.durationSecondsSum += durationMs / 1000;
    this.durationCount += 1;
  }

  /**
   * Count a reconcile error by its type (the error's name)
   */
  recordError(error: Error): void {
    this.reconcileErrors.set(error.name, (this.reconcileErrors.get(error.name) ?? 0) + 1);
  }

  /**
   * Read queue depth lazily at render time
   */
  setQueueDepthSource(source: () => number): void {
    this.queueDepth = source;
  }

  snapshot(): MetricsSnapshot {
    return {
      reconcileTotal: { ...this.reconcileTotal },
      reconcileErrors: Object.fromEntries(this.reconcileErrors),
      durationSecondsSum: this.durationSecondsSum,
      durationCount: this.durationCount,
      queueDepth: this.queueDepth(),
    };
  }

  /**
   * Render all metrics in the Prometheus text format
   */
  render(): string {
    const lines: string[] = [
      `# HELP ${PREFIX}_reconcile_total Reconcile passes by result.`,
      `# TYPE ${PREFIX}_reconcile_total counter`,
      ...OUTCOMES.map((outcome) => `${PREFIX}_reconcile_total{result="${outcome}"} ${this.reconcileTotal[outcome]}`),
      `# HELP ${PREFIX}_reconcile_errors_total Reconcile passes that raised an error, by error type.`,
      `# TYPE ${PREFIX}_reconcile_errors_total counter`,
      ...[...this.reconcileErrors.keys()]
        .sort()
        .map(
          (name) =>
            `${PREFIX}_reconcile_errors_total{error="${escapeLabelValue(name)}"} ${this.reconcileErrors.get(name) ?? 0}`,
        ),
      `# HELP ${PREFIX}_reconcile_duration_seconds Time spent in reconcile passes.`,
      `# TYPE ${PREFIX}_reconcile_duration_seconds summary`,
      `${PREFIX}_reconcile_duration_seconds_sum ${this.durationSecondsSum}`,
      `${PREFIX}_reconcile_duration_seconds_count ${this.durationCount}`,
      `# HELP ${PREFIX}_workqueue_depth Keys waiting in the work queue.`,
      `# TYPE ${PREFIX}_workqueue_depth gauge`,
      `${PREFIX}_workqueue_depth ${this.queueDepth()}`,
    ];
    return `${lines.join('\n')}\n`;
  }
}
