/**
 * RBACRule admission defaulting and validation
 * @module @rbac-sync/shared/validation/rbac-rule-validation
 */

import type { ValidationErrorDetail, ValidationResult } from '../errors/validation-error.js';
import { isSelectorError } from '../errors/selector-error.js';
import { assertValidSelector } from '../types/labels.js';
import { hasNamespaceSelection, parseRuleTime } from '../types/rbac-rule.js';
import type { Binding, NamespaceSelection, RBACRule, RBACRuleSpec, Subject } from '../types/rbac-rule.js';
import { isDnsSubdomain } from '../utils/names.js';

/**
 * Namespace given to selections that name none
 */
export const DEFAULT_FALLBACK_NAMESPACE = 'default';

/**
 * Namespace name pattern: DNS-1123 label
 */
const NAMESPACE_NAME_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

/**
 * Admission operation being validated
 */
export type AdmissionOperation = 'CREATE' | 'UPDATE' | 'DELETE' | 'CONNECT';

export interface RbacRuleValidationOptions {
  operation: AdmissionOperation;
  /** Reference instant for the start-time check */
  now?: Date;
}

/**
 * Fill the fallback namespace into ServiceAccount subjects and Role bindings that
 * select no namespace. Returns a new spec; the input is left untouched.
 */
export function applyRbacRuleDefaults(
  spec: RBACRuleSpec,
  fallbackNamespace: string = DEFAULT_FALLBACK_NAMESPACE,
): RBACRuleSpec {
  return {
    ...spec,
    bindings: spec.bindings.map((binding) => ({
      ...binding,
      subjects: binding.subjects.map((subject): Subject => {
        if (subject.kind === 'ServiceAccount' && !hasNamespaceSelection(subject)) {
          return { ...subject, namespaces: [fallbackNamespace] };
        }
        return subject;
      }),
      ...(binding.roleBindings && {
        roleBindings: binding.roleBindings.map((rb) =>
          rb.role && !hasNamespaceSelection(rb) ? { ...rb, namespaces: [fallbackNamespace] } : rb,
        ),
      }),
    })),
  };
}

/**
 * Validate a namespace name
 */
export function validateNamespaceName(name: string, field: string): ValidationErrorDetail | null {
  if (name.length === 0) {
    return { field, message: 'Namespace name cannot be empty', code: 'EMPTY' };
  }
  if (name.length > 63) {
    return { field, message: 'Namespace name cannot exceed 63 characters', code: 'TOO_LONG' };
  }
  if (!NAMESPACE_NAME_PATTERN.test(name)) {
    return {
      field,
      message: 'Namespace name must consist of lowercase alphanumeric characters or "-", and start and end with an alphanumeric character',
      code: 'INVALID_FORMAT',
    };
  }
  return null;
}

function validateSelection(
  selection: NamespaceSelection,
  field: string,
  errors: ValidationErrorDetail[],
  warnings: string[],
): void {
  selection.namespaces?.forEach((ns, index) => {
    const error = validateNamespaceName(ns, `${field}.namespaces[${index}]`);
    if (error) {
      errors.push(error);
    }
  });

  if (selection.namespaceSelector) {
    try {
      assertValidSelector(selection.namespaceSelector);
    } catch (error) {
      if (!isSelectorError(error)) {
        throw error;
      }
      errors.push({ field: `${field}.namespaceSelector`, message: error.message, code: 'INVALID_SELECTOR' });
    }
  }

  if (selection.namespaceMatchExpression) {
    warnings.push(`${field}.namespaceMatchExpression is deprecated and ignored; use namespaces or namespaceSelector`);
  }
}

function validateBinding(
  binding: Binding,
  field: string,
  errors: ValidationErrorDetail[],
  warnings: string[],
): void {
  if (!binding.name) {
    errors.push({ field: `${field}.name`, message: 'Binding name is required', code: 'REQUIRED' });
  }

  if (binding.subjects.length === 0) {
    errors.push({ field: `${field}.subjects`, message: 'At least one subject is required', code: 'REQUIRED' });
  }

  binding.subjects.forEach((subject, index) => {
    const path = `${field}.subjects[${index}]`;
    if (!subject.name) {
      errors.push({ field: `${path}.name`, message: 'Subject name is required', code: 'REQUIRED' });
    }
    if (subject.kind === 'ServiceAccount') {
      if (!hasNamespaceSelection(subject)) {
        errors.push({ field: path, message: 'at least one namespace must be specified', code: 'REQUIRED' });
      }
      validateSelection(subject, path, errors, warnings);
    }
  });

  const roleBindings = binding.roleBindings ?? [];
  const clusterRoleBindings = binding.clusterRoleBindings ?? [];
  if (roleBindings.length === 0 && clusterRoleBindings.length === 0) {
    errors.push({
      field,
      message: 'RoleBindings or ClusterRoleBindings should be specified',
      code: 'REQUIRED',
    });
  }

  roleBindings.forEach((rb, index) => {
    const path = `${field}.roleBindings[${index}]`;
    if (!rb.role && !rb.clusterRole) {
      errors.push({ field: path, message: 'at least one role must be specified', code: 'REQUIRED' });
    }
    if (!hasNamespaceSelection(rb)) {
      errors.push({ field: path, message: 'at least one namespace must be specified', code: 'REQUIRED' });
    }
    validateSelection(rb, path, errors, warnings);
  });

  clusterRoleBindings.forEach((crb, index) => {
    if (!crb.clusterRole) {
      errors.push({
        field: `${field}.clusterRoleBindings[${index}].clusterRole`,
        message: 'ClusterRole name is required',
        code: 'REQUIRED',
      });
    }
  });
}

/**
 * Validate an RBACRule the way the admission webhook does.
 * Expects the spec to be defaulted already.
 */
export function validateRbacRule(rule: RBACRule, options: RbacRuleValidationOptions): ValidationResult {
  const errors: ValidationErrorDetail[] = [];
  const warnings: string[] = [];

  if (options.operation === 'DELETE') {
    return { valid: true, errors, warnings };
  }

  if (!isDnsSubdomain(rule.metadata.name)) {
    errors.push({
      field: 'metadata.name',
      message: 'RBACRule name must be a lowercase RFC 1123 subdomain',
      code: 'INVALID_FORMAT',
    });
  }

  if (rule.spec.bindings.length === 0) {
    errors.push({ field: 'spec.bindings', message: 'At least one binding is required', code: 'REQUIRED' });
  }

  const seen = new Set<string>();
  rule.spec.bindings.forEach((binding, index) => {
    const field = `spec.bindings[${index}]`;
    if (binding.name && seen.has(binding.name)) {
      errors.push({ field: `${field}.name`, message: `Duplicate binding name "${binding.name}"`, code: 'DUPLICATE' });
    }
    seen.add(binding.name);
    validateBinding(binding, field, errors, warnings);
  });

  const start = parseRuleTime(rule.spec.startTime);
  const end = parseRuleTime(rule.spec.endTime);
  if (rule.spec.startTime && !start) {
    errors.push({ field: 'spec.startTime', message: 'startTime must be an RFC 3339 date-time', code: 'INVALID_FORMAT' });
  }
  if (rule.spec.endTime && !end) {
    errors.push({ field: 'spec.endTime', message: 'endTime must be an RFC 3339 date-time', code: 'INVALID_FORMAT' });
  }

  const now = options.now ?? new Date();
  if (options.operation === 'CREATE' && start && start.getTime() < now.getTime()) {
    errors.push({ field: 'spec.startTime', message: 'start time should not be earlier than now', code: 'OUT_OF_RANGE' });
  }
  if (start && end && start.getTime() > end.getTime()) {
    errors.push({ field: 'spec.startTime', message: 'start time should not be higher than end time', code: 'OUT_OF_RANGE' });
  }

  return { valid: errors.length === 0, errors, warnings };
}
