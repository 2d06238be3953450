/**
 * Deterministic names for generated objects
 * @module @rbac-sync/shared/utils/names
 */

import { createHash } from 'node:crypto';
import { isValidLabelValue } from '../types/labels.js';
import type { RoleRefKind } from '../types/kubernetes.js';

/** Longest name the API server accepts for RBAC objects */
export const MAX_OBJECT_NAME_LENGTH = 253;

const LABEL_VALUE_MAX_LENGTH = 63;

const HASH_LENGTH = 10;

const DNS_SUBDOMAIN_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?(\.[a-z0-9]([-a-z0-9]*[a-z0-9])?)*$/;

/**
 * First characters of the hex SHA-256 of the input
 */
export function shortHash(input: string, length = HASH_LENGTH): string {
  return createHash('sha256').update(input).digest('hex').slice(0, length);
}

/**
 * Check a string against the DNS-1123 subdomain rules used for object names
 */
export function isDnsSubdomain(name: string): boolean {
  return name.length > 0 && name.length <= MAX_OBJECT_NAME_LENGTH && DNS_SUBDOMAIN_PATTERN.test(name);
}

/**
 * Lowercase, replace anything outside [a-z0-9-] and trim to alphanumeric ends
 */
function sanitize(value: string, maxLength: number): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, '-')
    .slice(0, maxLength)
    .replace(/^[^a-z0-9]+/, '')
    .replace(/[^a-z0-9]+$/, '');
}

/**
 * Name of a RoleBinding or ClusterRoleBinding generated for one role reference.
 *
 * The readable part is `<rule>-<binding>-<role|clusterrole>-<roleName>`; the
 * hash of the raw tuple is always appended so that two tuples whose readable
 * parts happen to coincide (or collapse after sanitizing) never share a name.
 */
export function generateObjectName(
  ruleName: string,
  bindingName: string,
  kind: RoleRefKind,
  roleName: string,
): string {
  const readable = [ruleName, bindingName, kind.toLowerCase(), roleName].join('-');
  const suffix = shortHash([ruleName, bindingName, kind, roleName].join('\u0000'));
  const prefix = sanitize(readable, MAX_OBJECT_NAME_LENGTH - HASH_LENGTH - 1);
  return prefix ? `${prefix}-${suffix}` : suffix;
}

/**
 * Value of the ownership label for a rule name.
 * Names that are not valid label values are shortened and suffixed with a hash.
 */
export function ownerLabelValue(ruleName: string): string {
  if (isValidLabelValue(ruleName) && ruleName !== '') {
    return ruleName;
  }
  const prefix = ruleName
    .slice(0, LABEL_VALUE_MAX_LENGTH - HASH_LENGTH - 1)
    .replace(/[^a-zA-Z0-9._-]/g, '-')
    .replace(/[^a-zA-Z0-9]+$/, '');
  const suffix = shortHash(ruleName);
  return prefix ? `${prefix}-${suffix}` : suffix;
}
