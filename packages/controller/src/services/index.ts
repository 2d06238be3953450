export {
  ControllerManager,
  type ControllerManagerOptions,
  type Reconciler,
} from './controller-manager.js';
export {
  MetricsService,
  type MetricsSnapshot,
  type ReconcileOutcome,
} from './metrics-service.js';
