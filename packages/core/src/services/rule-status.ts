/**
 * RBACRule status helpers
 * @module @rbac-sync/core/services/rule-status
 */

import { isDeepStrictEqual } from 'node:util';
import type { Condition, ConditionStatus, RBACRuleStatus } from '@rbac-sync/shared';

export const READY_CONDITION = 'Ready';

/**
 * Reasons carried by the Ready condition
 */
export type ReadyReason =
  | 'Applied'
  | 'WaitingForStartTime'
  | 'BindingExpansionFailed'
  | 'ApplyFailed';

export interface ReadyState {
  status: ConditionStatus;
  reason: ReadyReason;
  message: string;
}

/**
 * Replace the Ready condition, keeping its transition time when the status
 * value did not flip. Other condition types are kept as they are.
 */
export function setReadyCondition(
  conditions: Condition[] | undefined,
  ready: ReadyState,
  now: Date,
  generation?: number,
): Condition[] {
  const existing = conditions ?? [];
  const previous = existing.find((c) => c.type === READY_CONDITION);
  const next: Condition = {
    type: READY_CONDITION,
    status: ready.status,
    reason: ready.reason,
    message: ready.message,
    lastTransitionTime:
      previous && previous.status === ready.status ? previous.lastTransitionTime : now.toISOString(),
    ...(generation === undefined ? {} : { observedGeneration: generation }),
  };
  return [...existing.filter((c) => c.type !== READY_CONDITION), next];
}

export function getReadyCondition(status: RBACRuleStatus | undefined): Condition | undefined {
  return status?.conditions?.find((c) => c.type === READY_CONDITION);
}

function comparable(status: RBACRuleStatus | undefined): unknown {
  return {
    phase: status?.phase ?? null,
    conditions: status?.conditions ?? [],
    roleBindings: status?.roleBindings ?? [],
    clusterRoleBindings: status?.clusterRoleBindings ?? [],
  };
}

/**
 * Whether two statuses differ in anything but lastReconcileTime.
 * Writing a status that only moves the timestamp would wake the watch for
 * nothing, so callers skip it.
 */
export function statusChanged(previous: RBACRuleStatus | undefined, next: RBACRuleStatus | undefined): boolean {
  return !isDeepStrictEqual(comparable(previous), comparable(next));
}
