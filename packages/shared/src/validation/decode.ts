/**
 * Decoding of untyped API payloads into rbac-sync types
 * @module @rbac-sync/shared/validation/decode
 */

import { ObjectTypeError, describeValue } from '../errors/object-type-error.js';
import { ValidationError, type ValidationErrorDetail } from '../errors/validation-error.js';
import type { LabelSelector, LabelSelectorMatchExpression, LabelSelectorOperator } from '../types/labels.js';
import type { ObjectMeta, OwnerReference } from '../types/kubernetes.js';
import {
  RBACRULE_API_VERSION,
  RBACRULE_KIND,
  type Binding,
  type ClusterRoleBindingSpec,
  type Condition,
  type ConditionStatus,
  type NamespaceSelection,
  type RBACRule,
  type RBACRulePhase,
  type RBACRuleStatus,
  type RoleBindingSpec,
  type Subject,
} from '../types/rbac-rule.js';

/**
 * Narrow to a plain JSON object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Collects problems while walking a payload so that all of them are reported
 */
class Decoder {
  readonly errors: ValidationErrorDetail[] = [];

  fail(field: string, message: string, code = 'INVALID_TYPE'): void {
    this.errors.push({ field, message, code });
  }

  string(value: unknown, field: string, required: true): string;
  string(value: unknown, field: string, required?: false): string | undefined;
  string(value: unknown, field: string, required = false): string | undefined {
    if (value === undefined || value === null) {
      if (required) {
        this.fail(field, 'This field is required', 'REQUIRED');
        return '';
      }
      return undefined;
    }
    if (typeof value !== 'string') {
      this.fail(field, `Expected string, got ${describeValue(value)}`);
      return required ? '' : undefined;
    }
    return value;
  }

  stringArray(value: unknown, field: string): string[] | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!Array.isArray(value)) {
      this.fail(field, `Expected array, got ${describeValue(value)}`);
      return undefined;
    }
    const result: string[] = [];
    value.forEach((item, index) => {
      const str = this.string(item, `${field}[${index}]`, true);
      result.push(str);
    });
    return result;
  }

  stringMap(value: unknown, field: string): Record<string, string> | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!isRecord(value)) {
      this.fail(field, `Expected object, got ${describeValue(value)}`);
      return undefined;
    }
    const result: Record<string, string> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = this.string(entry, `${field}.${key}`, true);
    }
    return result;
  }

  array(value: unknown, field: string): unknown[] | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!Array.isArray(value)) {
      this.fail(field, `Expected array, got ${describeValue(value)}`);
      return undefined;
    }
    return value;
  }

  record(value: unknown, field: string): Record<string, unknown> | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!isRecord(value)) {
      this.fail(field, `Expected object, got ${describeValue(value)}`);
      return undefined;
    }
    return value;
  }
}

const OPERATORS: readonly LabelSelectorOperator[] = ['In', 'NotIn', 'Exists', 'DoesNotExist'];

function isOperator(value: unknown): value is LabelSelectorOperator {
  return OPERATORS.some(op => op === value);
}

function decodeSelector(d: Decoder, raw: unknown, field: string): LabelSelector | undefined {
  const obj = d.record(raw, field);
  if (!obj) {
    return undefined;
  }
  const selector: LabelSelector = {};
  const matchLabels = d.stringMap(obj.matchLabels, `${field}.matchLabels`);
  if (matchLabels) {
    selector.matchLabels = matchLabels;
  }
  const expressions = d.array(obj.matchExpressions, `${field}.matchExpressions`);
  if (expressions) {
    selector.matchExpressions = [];
    expressions.forEach((entry, index) => {
      const path = `${field}.matchExpressions[${index}]`;
      const expr = d.record(entry, path);
      if (!expr) {
        return;
      }
      const key = d.string(expr.key, `${path}.key`, true);
      if (!isOperator(expr.operator)) {
        d.fail(`${path}.operator`, `Unsupported operator ${String(expr.operator)}`, 'INVALID_VALUE');
        return;
      }
      const decoded: LabelSelectorMatchExpression = { key, operator: expr.operator };
      const values = d.stringArray(expr.values, `${path}.values`);
      if (values) {
        decoded.values = values;
      }
      selector.matchExpressions?.push(decoded);
    });
  }
  return selector;
}

function decodeSelection(d: Decoder, obj: Record<string, unknown>, field: string): NamespaceSelection {
  const selection: NamespaceSelection = {};
  const namespaces = d.stringArray(obj.namespaces, `${field}.namespaces`);
  if (namespaces) {
    selection.namespaces = namespaces;
  }
  const selector = decodeSelector(d, obj.namespaceSelector, `${field}.namespaceSelector`);
  if (selector) {
    selection.namespaceSelector = selector;
  }
  const expression = d.string(obj.namespaceMatchExpression, `${field}.namespaceMatchExpression`);
  if (expression !== undefined) {
    selection.namespaceMatchExpression = expression;
  }
  return selection;
}

function decodeSubject(d: Decoder, raw: unknown, field: string): Subject | undefined {
  const obj = d.record(raw, field);
  if (!obj) {
    return undefined;
  }
  const name = d.string(obj.name, `${field}.name`, true);
  switch (obj.kind) {
    case 'User':
      return { kind: 'User', name };
    case 'Group':
      return { kind: 'Group', name };
    case 'ServiceAccount':
      return { kind: 'ServiceAccount', name, ...decodeSelection(d, obj, field) };
    default:
      d.fail(`${field}.kind`, 'Subject kind must be one of User, Group, ServiceAccount', 'INVALID_VALUE');
      return undefined;
  }
}

function decodeRoleBinding(d: Decoder, raw: unknown, field: string): RoleBindingSpec | undefined {
  const obj = d.record(raw, field);
  if (!obj) {
    return undefined;
  }
  const spec: RoleBindingSpec = decodeSelection(d, obj, field);
  const role = d.string(obj.role, `${field}.role`);
  if (role !== undefined) {
    spec.role = role;
  }
  const clusterRole = d.string(obj.clusterRole, `${field}.clusterRole`);
  if (clusterRole !== undefined) {
    spec.clusterRole = clusterRole;
  }
  return spec;
}

function decodeClusterRoleBinding(d: Decoder, raw: unknown, field: string): ClusterRoleBindingSpec | undefined {
  const obj = d.record(raw, field);
  if (!obj) {
    return undefined;
  }
  return { clusterRole: d.string(obj.clusterRole, `${field}.clusterRole`, true) };
}

function decodeBinding(d: Decoder, raw: unknown, field: string): Binding | undefined {
  const obj = d.record(raw, field);
  if (!obj) {
    return undefined;
  }
  const binding: Binding = {
    name: d.string(obj.name, `${field}.name`, true),
    subjects: [],
  };
  (d.array(obj.subjects, `${field}.subjects`) ?? []).forEach((entry, index) => {
    const subject = decodeSubject(d, entry, `${field}.subjects[${index}]`);
    if (subject) {
      binding.subjects.push(subject);
    }
  });
  const roleBindings = d.array(obj.roleBindings, `${field}.roleBindings`);
  if (roleBindings) {
    binding.roleBindings = [];
    roleBindings.forEach((entry, index) => {
      const rb = decodeRoleBinding(d, entry, `${field}.roleBindings[${index}]`);
      if (rb) {
        binding.roleBindings?.push(rb);
      }
    });
  }
  const clusterRoleBindings = d.array(obj.clusterRoleBindings, `${field}.clusterRoleBindings`);
  if (clusterRoleBindings) {
    binding.clusterRoleBindings = [];
    clusterRoleBindings.forEach((entry, index) => {
      const crb = decodeClusterRoleBinding(d, entry, `${field}.clusterRoleBindings[${index}]`);
      if (crb) {
        binding.clusterRoleBindings?.push(crb);
      }
    });
  }
  return binding;
}

function decodeOwnerReferences(d: Decoder, raw: unknown, field: string): OwnerReference[] | undefined {
  const entries = d.array(raw, field);
  if (!entries) {
    return undefined;
  }
  const refs: OwnerReference[] = [];
  entries.forEach((entry, index) => {
    const path = `${field}[${index}]`;
    const obj = d.record(entry, path);
    if (!obj) {
      return;
    }
    const ref: OwnerReference = {
      apiVersion: d.string(obj.apiVersion, `${path}.apiVersion`, true),
      kind: d.string(obj.kind, `${path}.kind`, true),
      name: d.string(obj.name, `${path}.name`, true),
      uid: d.string(obj.uid, `${path}.uid`, true),
    };
    if (typeof obj.controller === 'boolean') {
      ref.controller = obj.controller;
    }
    if (typeof obj.blockOwnerDeletion === 'boolean') {
      ref.blockOwnerDeletion = obj.blockOwnerDeletion;
    }
    refs.push(ref);
  });
  return refs;
}

/**
 * Decode object metadata. Unknown fields are dropped.
 */
function decodeMetadataWith(d: Decoder, raw: unknown, field: string): ObjectMeta {
  const obj = d.record(raw, field) ?? {};
  const meta: ObjectMeta = { name: d.string(obj.name, `${field}.name`, true) };

  const optionalStrings = ['namespace', 'uid', 'resourceVersion', 'creationTimestamp', 'deletionTimestamp'] as const;
  for (const key of optionalStrings) {
    const value = d.string(obj[key], `${field}.${key}`);
    if (value !== undefined) {
      meta[key] = value;
    }
  }
  if (typeof obj.generation === 'number') {
    meta.generation = obj.generation;
  }
  const labels = d.stringMap(obj.labels, `${field}.labels`);
  if (labels) {
    meta.labels = labels;
  }
  const annotations = d.stringMap(obj.annotations, `${field}.annotations`);
  if (annotations) {
    meta.annotations = annotations;
  }
  const ownerReferences = decodeOwnerReferences(d, obj.ownerReferences, `${field}.ownerReferences`);
  if (ownerReferences) {
    meta.ownerReferences = ownerReferences;
  }
  const finalizers = d.stringArray(obj.finalizers, `${field}.finalizers`);
  if (finalizers) {
    meta.finalizers = finalizers;
  }
  return meta;
}

const PHASES: readonly RBACRulePhase[] = ['Pending', 'Active', 'Terminating'];
const CONDITION_STATUSES: readonly ConditionStatus[] = ['True', 'False', 'Unknown'];

function decodeStatus(d: Decoder, raw: unknown): RBACRuleStatus | undefined {
  const obj = d.record(raw, 'status');
  if (!obj) {
    return undefined;
  }
  const status: RBACRuleStatus = {};
  const phase = PHASES.find(p => p === obj.phase);
  if (phase) {
    status.phase = phase;
  }
  const roleBindings = d.stringArray(obj.roleBindings, 'status.roleBindings');
  if (roleBindings) {
    status.roleBindings = roleBindings;
  }
  const clusterRoleBindings = d.stringArray(obj.clusterRoleBindings, 'status.clusterRoleBindings');
  if (clusterRoleBindings) {
    status.clusterRoleBindings = clusterRoleBindings;
  }
  const lastReconcileTime = d.string(obj.lastReconcileTime, 'status.lastReconcileTime');
  if (lastReconcileTime !== undefined) {
    status.lastReconcileTime = lastReconcileTime;
  }
  const conditions = d.array(obj.conditions, 'status.conditions');
  if (conditions) {
    status.conditions = [];
    conditions.forEach((entry, index) => {
      const path = `status.conditions[${index}]`;
      const cond = d.record(entry, path);
      if (!cond) {
        return;
      }
      const conditionStatus = CONDITION_STATUSES.find(s => s === cond.status) ?? 'Unknown';
      const decoded: Condition = {
        type: d.string(cond.type, `${path}.type`, true),
        status: conditionStatus,
        reason: d.string(cond.reason, `${path}.reason`) ?? '',
        message: d.string(cond.message, `${path}.message`) ?? '',
        lastTransitionTime: d.string(cond.lastTransitionTime, `${path}.lastTransitionTime`) ?? '',
      };
      if (typeof cond.observedGeneration === 'number') {
        decoded.observedGeneration = cond.observedGeneration;
      }
      status.conditions?.push(decoded);
    });
  }
  return status;
}

/**
 * Decode object metadata from an untyped payload
 */
export function decodeObjectMeta(raw: unknown): ObjectMeta {
  const d = new Decoder();
  const meta = decodeMetadataWith(d, raw, 'metadata');
  if (d.errors.length > 0) {
    throw ValidationError.multiple(d.errors);
  }
  return meta;
}

/**
 * Decode an RBACRule from an untyped API payload.
 *
 * @throws ObjectTypeError when the payload is not an RBACRule at all
 * @throws ValidationError when fields have the wrong shape
 */
export function parseRbacRule(raw: unknown): RBACRule {
  if (!isRecord(raw)) {
    throw new ObjectTypeError(RBACRULE_KIND, describeValue(raw));
  }
  if (raw.kind !== RBACRULE_KIND || raw.apiVersion !== RBACRULE_API_VERSION) {
    throw new ObjectTypeError(
      `${RBACRULE_API_VERSION} ${RBACRULE_KIND}`,
      `${String(raw.apiVersion)} ${String(raw.kind)}`,
    );
  }

  const d = new Decoder();
  const metadata = decodeMetadataWith(d, raw.metadata, 'metadata');
  const specObj = d.record(raw.spec, 'spec') ?? {};

  const bindings: Binding[] = [];
  const rawBindings = d.array(specObj.bindings, 'spec.bindings');
  if (rawBindings === undefined) {
    d.fail('spec.bindings', 'This field is required', 'REQUIRED');
  }
  (rawBindings ?? []).forEach((entry, index) => {
    const binding = decodeBinding(d, entry, `spec.bindings[${index}]`);
    if (binding) {
      bindings.push(binding);
    }
  });

  const rule: RBACRule = {
    apiVersion: RBACRULE_API_VERSION,
    kind: RBACRULE_KIND,
    metadata,
    spec: { bindings },
  };
  const startTime = d.string(specObj.startTime, 'spec.startTime');
  if (startTime !== undefined) {
    rule.spec.startTime = startTime;
  }
  const endTime = d.string(specObj.endTime, 'spec.endTime');
  if (endTime !== undefined) {
    rule.spec.endTime = endTime;
  }
  const status = decodeStatus(d, raw.status);
  if (status) {
    rule.status = status;
  }

  if (d.errors.length > 0) {
    throw ValidationError.multiple(d.errors);
  }
  return rule;
}
