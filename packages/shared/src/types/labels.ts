/**
 * Labels and LabelSelector types (Kubernetes-like)
 * @module @rbac-sync/shared/types/labels
 */

import { SelectorError } from '../errors/selector-error.js';

/**
 * Labels are key-value pairs used for organization and selection
 *
 * @example
 * {
 *   "env": "dev",
 *   "team": "payments"
 * }
 */
export type Labels = Record<string, string>;

/**
 * Label selector operator for match expressions
 */
export type LabelSelectorOperator = 'In' | 'NotIn' | 'Exists' | 'DoesNotExist';

const SELECTOR_OPERATORS: readonly LabelSelectorOperator[] = ['In', 'NotIn', 'Exists', 'DoesNotExist'];

/**
 * Match expression for advanced label selection
 *
 * @example
 * // In: key must have one of these values
 * { key: "env", operator: "In", values: ["dev", "staging"] }
 *
 * // DoesNotExist: key must not exist
 * { key: "deprecated", operator: "DoesNotExist" }
 */
export interface LabelSelectorMatchExpression {
  /** Label key to match */
  key: string;
  /** Operator for comparison */
  operator: LabelSelectorOperator;
  /** Values to match (required for In/NotIn, forbidden for Exists/DoesNotExist) */
  values?: string[];
}

/**
 * Label selector for querying resources
 */
export interface LabelSelector {
  /** Simple key-value matching (all must match) */
  matchLabels?: Labels;
  /** Advanced expression matching (all must match) */
  matchExpressions?: LabelSelectorMatchExpression[];
}

/**
 * Check if a match expression matches a set of labels
 */
export function matchesExpression(
  labels: Labels,
  expr: LabelSelectorMatchExpression,
): boolean {
  const value = labels[expr.key];
  const hasKey = Object.prototype.hasOwnProperty.call(labels, expr.key);

  switch (expr.operator) {
    case 'In':
      return hasKey && value !== undefined && (expr.values?.includes(value) ?? false);
    case 'NotIn':
      return !hasKey || value === undefined || !(expr.values?.includes(value) ?? false);
    case 'Exists':
      return hasKey;
    case 'DoesNotExist':
      return !hasKey;
    default:
      return false;
  }
}

/**
 * Check if labels match a label selector.
 * An empty selector matches everything; callers that want "empty means nothing"
 * check {@link isEmptySelector} first.
 */
export function matchesSelector(labels: Labels, selector: LabelSelector): boolean {
  if (selector.matchLabels) {
    for (const [key, value] of Object.entries(selector.matchLabels)) {
      if (labels[key] !== value) {
        return false;
      }
    }
  }

  if (selector.matchExpressions) {
    for (const expr of selector.matchExpressions) {
      if (!matchesExpression(labels, expr)) {
        return false;
      }
    }
  }

  return true;
}

/**
 * True when the selector carries no requirement at all
 */
export function isEmptySelector(selector: LabelSelector | undefined): boolean {
  if (!selector) {
    return true;
  }
  const labelCount = selector.matchLabels ? Object.keys(selector.matchLabels).length : 0;
  const exprCount = selector.matchExpressions?.length ?? 0;
  return labelCount === 0 && exprCount === 0;
}

/**
 * Create a label selector from simple labels
 */
export function createSelector(matchLabels: Labels): LabelSelector {
  return { matchLabels };
}

/**
 * Validate a label key
 * - Optional prefix (DNS subdomain, at most 253 chars) followed by /
 * - Name of 1-63 chars, alphanumeric at both ends, inner dash/underscore/dot
 */
export function isValidLabelKey(key: string): boolean {
  if (!key) {
    return false;
  }

  const parts = key.split('/');
  if (parts.length > 2) {
    return false;
  }

  if (parts.length === 2) {
    const prefix = parts[0] ?? '';
    if (prefix.length === 0 || prefix.length > 253 || !/^[a-z0-9]([-a-z0-9.]*[a-z0-9])?$/.test(prefix)) {
      return false;
    }
  }

  const name = parts.length === 2 ? parts[1] : parts[0];

  if (!name || name.length > 63) {
    return false;
  }

  return /^[a-zA-Z0-9]([a-zA-Z0-9._-]*[a-zA-Z0-9])?$/.test(name);
}

/**
 * Validate a label value
 * - Can be empty
 * - At most 63 characters
 * - If non-empty, alphanumeric at both ends, inner dash/underscore/dot
 */
export function isValidLabelValue(value: string): boolean {
  if (value.length > 63) {
    return false;
  }

  if (value === '') {
    return true;
  }

  return /^[a-zA-Z0-9]([a-zA-Z0-9._-]*[a-zA-Z0-9])?$/.test(value);
}

/**
 * Validate a selector the way the API server converts it into requirements.
 * Throws SelectorError on the first problem found.
 */
export function assertValidSelector(selector: LabelSelector): void {
  for (const [key, value] of Object.entries(selector.matchLabels ?? {})) {
    if (!isValidLabelKey(key)) {
      throw SelectorError.invalidKey(key);
    }
    if (!isValidLabelValue(value)) {
      throw SelectorError.invalidValue(key, value);
    }
  }

  for (const expr of selector.matchExpressions ?? []) {
    if (!isValidLabelKey(expr.key)) {
      throw SelectorError.invalidKey(expr.key);
    }
    if (!SELECTOR_OPERATORS.includes(expr.operator)) {
      throw SelectorError.invalidOperator(expr.key, String(expr.operator));
    }

    const values = expr.values ?? [];
    if ((expr.operator === 'In' || expr.operator === 'NotIn') && values.length === 0) {
      throw new SelectorError(
        `values must be non-empty for operator ${expr.operator} on key "${expr.key}"`,
        { key: expr.key, operator: expr.operator },
      );
    }
    if ((expr.operator === 'Exists' || expr.operator === 'DoesNotExist') && values.length > 0) {
      throw new SelectorError(
        `values must be empty for operator ${expr.operator} on key "${expr.key}"`,
        { key: expr.key, operator: expr.operator },
      );
    }
    for (const value of values) {
      if (!isValidLabelValue(value)) {
        throw SelectorError.invalidValue(expr.key, value);
      }
    }
  }
}

/**
 * Render a selector in the string syntax accepted by the Kubernetes API
 * (`app=web,env in (dev,qa),!legacy`). matchLabels come first, sorted by key.
 */
export function formatLabelSelector(selector: LabelSelector): string {
  const requirements: string[] = [];

  const matchLabels = selector.matchLabels ?? {};
  for (const key of Object.keys(matchLabels).sort()) {
    requirements.push(`${key}=${matchLabels[key]}`);
  }

  for (const expr of selector.matchExpressions ?? []) {
    const values = [...(expr.values ?? [])].sort().join(',');
    switch (expr.operator) {
      case 'In':
        requirements.push(`${expr.key} in (${values})`);
        break;
      case 'NotIn':
        requirements.push(`${expr.key} notin (${values})`);
        break;
      case 'Exists':
        requirements.push(expr.key);
        break;
      case 'DoesNotExist':
        requirements.push(`!${expr.key}`);
        break;
    }
  }

  return requirements.join(',');
}
