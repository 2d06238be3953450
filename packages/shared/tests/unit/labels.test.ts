/**
 * Unit tests for label selectors
 */

import { describe, it, expect } from 'vitest';

import {
  assertValidSelector,
  formatLabelSelector,
  isEmptySelector,
  isValidLabelKey,
  isValidLabelValue,
  matchesSelector,
} from '../../src/types';
import { SelectorError } from '../../src/errors';

describe('matchesSelector', () => {
  const labels = { env: 'dev', team: 'payments' };

  it('should require every matchLabels pair', () => {
    expect(matchesSelector(labels, { matchLabels: { env: 'dev' } })).toBe(true);
    expect(matchesSelector(labels, { matchLabels: { env: 'dev', team: 'search' } })).toBe(false);
  });

  it('should evaluate each operator', () => {
    expect(matchesSelector(labels, { matchExpressions: [{ key: 'env', operator: 'In', values: ['dev', 'qa'] }] })).toBe(true);
    expect(matchesSelector(labels, { matchExpressions: [{ key: 'env', operator: 'NotIn', values: ['dev'] }] })).toBe(false);
    expect(matchesSelector(labels, { matchExpressions: [{ key: 'tier', operator: 'NotIn', values: ['db'] }] })).toBe(true);
    expect(matchesSelector(labels, { matchExpressions: [{ key: 'team', operator: 'Exists' }] })).toBe(true);
    expect(matchesSelector(labels, { matchExpressions: [{ key: 'team', operator: 'DoesNotExist' }] })).toBe(false);
  });

  it('should match everything with an empty selector', () => {
    expect(matchesSelector({}, {})).toBe(true);
    expect(isEmptySelector({})).toBe(true);
    expect(isEmptySelector(undefined)).toBe(true);
    expect(isEmptySelector({ matchLabels: {}, matchExpressions: [] })).toBe(true);
    expect(isEmptySelector({ matchLabels: { a: 'b' } })).toBe(false);
  });
});

describe('label syntax', () => {
  it('should accept prefixed and plain keys', () => {
    expect(isValidLabelKey('env')).toBe(true);
    expect(isValidLabelKey('rbac-sync.io/rbacrule')).toBe(true);
    expect(isValidLabelKey('a/b/c')).toBe(false);
    expect(isValidLabelKey('/name')).toBe(false);
    expect(isValidLabelKey('-env')).toBe(false);
  });

  it('should accept empty values and reject long ones', () => {
    expect(isValidLabelValue('')).toBe(true);
    expect(isValidLabelValue('a'.repeat(63))).toBe(true);
    expect(isValidLabelValue('a'.repeat(64))).toBe(false);
    expect(isValidLabelValue('bad value')).toBe(false);
  });
});

describe('assertValidSelector', () => {
  it('should accept a well-formed selector', () => {
    expect(() =>
      assertValidSelector({
        matchLabels: { env: 'dev' },
        matchExpressions: [{ key: 'tier', operator: 'In', values: ['web'] }],
      }),
    ).not.toThrow();
  });

  it('should reject malformed keys and values', () => {
    expect(() => assertValidSelector({ matchLabels: { 'bad key': 'x' } })).toThrow('invalid label key "bad key"');
    expect(() => assertValidSelector({ matchLabels: { env: 'no way' } })).toThrow(
      'invalid label value "no way" for key "env"',
    );
  });

  it('should check the value count against the operator', () => {
    expect(() => assertValidSelector({ matchExpressions: [{ key: 'env', operator: 'In', values: [] }] })).toThrow(
      'values must be non-empty for operator In on key "env"',
    );
    expect(() =>
      assertValidSelector({ matchExpressions: [{ key: 'env', operator: 'Exists', values: ['dev'] }] }),
    ).toThrow(SelectorError);
  });
});

describe('formatLabelSelector', () => {
  it('should render labels sorted, then expressions in order', () => {
    const rendered = formatLabelSelector({
      matchLabels: { team: 'payments', env: 'dev' },
      matchExpressions: [
        { key: 'tier', operator: 'In', values: ['web', 'api'] },
        { key: 'zone', operator: 'NotIn', values: ['b'] },
        { key: 'owner', operator: 'Exists' },
        { key: 'legacy', operator: 'DoesNotExist' },
      ],
    });

    expect(rendered).toBe('env=dev,team=payments,tier in (api,web),zone notin (b),owner,!legacy');
  });

  it('should render an empty selector as an empty string', () => {
    expect(formatLabelSelector({})).toBe('');
  });
});
