/**
 * Mapping of change events to RBACRule keys
 * @module @rbac-sync/core/services/event-mapping
 */

import { RBACRULE_KIND } from '@rbac-sync/shared';
import type { ChangeEvent } from '../stores/change-source.js';
import { controllingRuleName } from './ownership.js';

/**
 * Key of the RBACRule an event concerns: the rule itself, or the rule that
 * controls the changed object. Objects nobody controls map to nothing.
 */
export function ruleKeyForEvent(event: ChangeEvent): string | undefined {
  if (event.kind === RBACRULE_KIND) {
    return event.metadata.name;
  }
  return controllingRuleName(event.metadata);
}
