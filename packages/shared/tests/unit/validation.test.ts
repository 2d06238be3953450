/**
 * Unit tests for RBACRule decoding, defaulting and validation
 */

import { describe, it, expect } from 'vitest';

import {
  applyRbacRuleDefaults,
  validateNamespaceName,
  validateRbacRule,
  parseRbacRule,
  decodeObjectMeta,
} from '../../src/validation';
import { ObjectTypeError, ValidationError } from '../../src/errors';
import type { Binding, RBACRule, RBACRuleSpec } from '../../src/types';

const NOW = new Date('2026-05-01T10:00:00.000Z');

function makeRule(spec: RBACRuleSpec, name = 'team-access'): RBACRule {
  return { apiVersion: 'rbac-sync.io/v1alpha1', kind: 'RBACRule', metadata: { name }, spec };
}

const VALID_BINDING: Binding = {
  name: 'dev',
  subjects: [
    { kind: 'User', name: 'alice' },
    { kind: 'ServiceAccount', name: 'ci', namespaces: ['tools'] },
  ],
  roleBindings: [{ role: 'edit', namespaces: ['apps'] }],
  clusterRoleBindings: [{ clusterRole: 'view' }],
};

describe('applyRbacRuleDefaults', () => {
  it('should fill the fallback namespace for service accounts without a selection', () => {
    const spec: RBACRuleSpec = {
      bindings: [{ name: 'b', subjects: [{ kind: 'ServiceAccount', name: 'ci' }], clusterRoleBindings: [{ clusterRole: 'view' }] }],
    };

    const defaulted = applyRbacRuleDefaults(spec);

    expect(defaulted.bindings[0]?.subjects).toEqual([{ kind: 'ServiceAccount', name: 'ci', namespaces: ['default'] }]);
    expect(spec.bindings[0]?.subjects).toEqual([{ kind: 'ServiceAccount', name: 'ci' }]);
  });

  it('should fill role bindings that name a Role and select no namespace', () => {
    const spec: RBACRuleSpec = {
      bindings: [
        {
          name: 'b',
          subjects: [{ kind: 'User', name: 'alice' }],
          roleBindings: [{ role: 'edit' }, { clusterRole: 'view' }, { role: 'admin', namespaces: ['apps'] }],
        },
      ],
    };

    const defaulted = applyRbacRuleDefaults(spec, 'sandbox');

    expect(defaulted.bindings[0]?.roleBindings).toEqual([
      { role: 'edit', namespaces: ['sandbox'] },
      { clusterRole: 'view' },
      { role: 'admin', namespaces: ['apps'] },
    ]);
  });

  it('should not count a match expression as a selection', () => {
    const spec: RBACRuleSpec = {
      bindings: [
        {
          name: 'b',
          subjects: [{ kind: 'ServiceAccount', name: 'ci', namespaceMatchExpression: 'env=dev' }],
          clusterRoleBindings: [{ clusterRole: 'view' }],
        },
      ],
    };

    const defaulted = applyRbacRuleDefaults(spec);

    expect(defaulted.bindings[0]?.subjects[0]).toEqual({
      kind: 'ServiceAccount',
      name: 'ci',
      namespaceMatchExpression: 'env=dev',
      namespaces: ['default'],
    });
  });

  it('should leave a selector-based selection alone', () => {
    const spec: RBACRuleSpec = {
      bindings: [
        {
          name: 'b',
          subjects: [{ kind: 'ServiceAccount', name: 'ci', namespaceSelector: { matchLabels: { env: 'dev' } } }],
          clusterRoleBindings: [{ clusterRole: 'view' }],
        },
      ],
    };

    expect(applyRbacRuleDefaults(spec)).toEqual(spec);
  });
});

describe('validateNamespaceName', () => {
  it('should accept DNS labels', () => {
    expect(validateNamespaceName('team-a', 'ns')).toBeNull();
  });

  it('should reject malformed names', () => {
    expect(validateNamespaceName('', 'ns')?.code).toBe('EMPTY');
    expect(validateNamespaceName('a'.repeat(64), 'ns')?.code).toBe('TOO_LONG');
    expect(validateNamespaceName('Team_A', 'ns')?.code).toBe('INVALID_FORMAT');
  });
});

describe('validateRbacRule', () => {
  it('should accept a well-formed rule', () => {
    const result = validateRbacRule(makeRule({ bindings: [VALID_BINDING] }), { operation: 'CREATE', now: NOW });
    expect(result).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('should always allow deletes', () => {
    const result = validateRbacRule(makeRule({ bindings: [] }, 'Not Valid'), { operation: 'DELETE', now: NOW });
    expect(result.valid).toBe(true);
  });

  it('should require bindings, subjects and role references', () => {
    const result = validateRbacRule(
      makeRule({
        bindings: [
          { name: 'empty', subjects: [] },
          { name: 'no-role', subjects: [{ kind: 'User', name: 'bob' }], roleBindings: [{ namespaces: ['apps'] }] },
        ],
      }),
      { operation: 'CREATE', now: NOW },
    );

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => `${e.field}:${e.message}`)).toEqual([
      'spec.bindings[0].subjects:At least one subject is required',
      'spec.bindings[0]:RoleBindings or ClusterRoleBindings should be specified',
      'spec.bindings[1].roleBindings[0]:at least one role must be specified',
    ]);
  });

  it('should reject an empty binding list and duplicate binding names', () => {
    const empty = validateRbacRule(makeRule({ bindings: [] }), { operation: 'UPDATE', now: NOW });
    expect(empty.errors[0]?.field).toBe('spec.bindings');

    const duplicated = validateRbacRule(makeRule({ bindings: [VALID_BINDING, VALID_BINDING] }), {
      operation: 'UPDATE',
      now: NOW,
    });
    expect(duplicated.errors).toEqual([
      { field: 'spec.bindings[1].name', message: 'Duplicate binding name "dev"', code: 'DUPLICATE' },
    ]);
  });

  it('should require a namespace selection for service accounts and role bindings', () => {
    const result = validateRbacRule(
      makeRule({
        bindings: [
          {
            name: 'dev',
            subjects: [{ kind: 'ServiceAccount', name: 'ci' }],
            roleBindings: [{ clusterRole: 'view' }],
          },
        ],
      }),
      { operation: 'CREATE', now: NOW },
    );

    expect(result.errors.map((e) => e.field)).toEqual([
      'spec.bindings[0].subjects[0]',
      'spec.bindings[0].roleBindings[0]',
    ]);
  });

  it('should report malformed selectors and warn about match expressions', () => {
    const result = validateRbacRule(
      makeRule({
        bindings: [
          {
            name: 'dev',
            subjects: [{ kind: 'User', name: 'alice' }],
            roleBindings: [
              {
                role: 'edit',
                namespaces: ['apps'],
                namespaceSelector: { matchExpressions: [{ key: 'tier', operator: 'Exists', values: ['x'] }] },
                namespaceMatchExpression: 'tier in (a)',
              },
            ],
          },
        ],
      }),
      { operation: 'CREATE', now: NOW },
    );

    expect(result.errors).toEqual([
      {
        field: 'spec.bindings[0].roleBindings[0].namespaceSelector',
        message: 'values must be empty for operator Exists on key "tier"',
        code: 'INVALID_SELECTOR',
      },
    ]);
    expect(result.warnings).toEqual([
      'spec.bindings[0].roleBindings[0].namespaceMatchExpression is deprecated and ignored; use namespaces or namespaceSelector',
    ]);
  });

  it('should reject a start time in the past on create only', () => {
    const rule = makeRule({ bindings: [VALID_BINDING], startTime: '2026-05-01T09:00:00Z' });

    const created = validateRbacRule(rule, { operation: 'CREATE', now: NOW });
    expect(created.errors).toEqual([
      { field: 'spec.startTime', message: 'start time should not be earlier than now', code: 'OUT_OF_RANGE' },
    ]);

    expect(validateRbacRule(rule, { operation: 'UPDATE', now: NOW }).valid).toBe(true);
  });

  it('should reject a start time after the end time', () => {
    const rule = makeRule({
      bindings: [VALID_BINDING],
      startTime: '2026-06-01T00:00:00Z',
      endTime: '2026-05-15T00:00:00Z',
    });

    const result = validateRbacRule(rule, { operation: 'CREATE', now: NOW });
    expect(result.errors.map((e) => e.message)).toEqual(['start time should not be higher than end time']);
  });

  it('should accept a rule with only an end time', () => {
    const rule = makeRule({ bindings: [VALID_BINDING], endTime: '2026-05-15T00:00:00Z' });
    expect(validateRbacRule(rule, { operation: 'CREATE', now: NOW }).valid).toBe(true);
  });

  it('should reject unparseable times and bad names', () => {
    const rule = makeRule({ bindings: [VALID_BINDING], startTime: 'tomorrow' }, 'Team_Access');

    const result = validateRbacRule(rule, { operation: 'CREATE', now: NOW });
    expect(result.errors.map((e) => e.field)).toEqual(['metadata.name', 'spec.startTime']);
  });
});

describe('parseRbacRule', () => {
  it('should decode a complete payload', () => {
    const rule = parseRbacRule({
      apiVersion: 'rbac-sync.io/v1alpha1',
      kind: 'RBACRule',
      metadata: { name: 'team-access', uid: 'u1', resourceVersion: '7', generation: 3, extra: 'dropped' },
      spec: {
        bindings: [
          {
            name: 'dev',
            subjects: [
              { kind: 'User', name: 'alice' },
              { kind: 'ServiceAccount', name: 'ci', namespaceSelector: { matchLabels: { env: 'dev' } } },
            ],
            roleBindings: [{ role: 'edit', namespaces: ['apps'] }],
          },
        ],
        endTime: '2026-06-01T00:00:00Z',
      },
      status: {
        phase: 'Active',
        roleBindings: ['apps/rb'],
        conditions: [{ type: 'Ready', status: 'True', reason: 'Applied', message: 'ok', lastTransitionTime: 't' }],
      },
    });

    expect(rule).toEqual({
      apiVersion: 'rbac-sync.io/v1alpha1',
      kind: 'RBACRule',
      metadata: { name: 'team-access', uid: 'u1', resourceVersion: '7', generation: 3 },
      spec: {
        bindings: [
          {
            name: 'dev',
            subjects: [
              { kind: 'User', name: 'alice' },
              { kind: 'ServiceAccount', name: 'ci', namespaceSelector: { matchLabels: { env: 'dev' } } },
            ],
            roleBindings: [{ role: 'edit', namespaces: ['apps'] }],
          },
        ],
        endTime: '2026-06-01T00:00:00Z',
      },
      status: {
        phase: 'Active',
        roleBindings: ['apps/rb'],
        conditions: [{ type: 'Ready', status: 'True', reason: 'Applied', message: 'ok', lastTransitionTime: 't' }],
      },
    });
  });

  it('should reject objects of another kind', () => {
    expect(() => parseRbacRule({ apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'x' } })).toThrow(
      ObjectTypeError,
    );
    expect(() => parseRbacRule('not an object')).toThrow('expected RBACRule but got string');
  });

  it('should collect every malformed field', () => {
    let caught: unknown;
    try {
      parseRbacRule({
        apiVersion: 'rbac-sync.io/v1alpha1',
        kind: 'RBACRule',
        metadata: { name: 'r' },
        spec: {
          bindings: [{ name: 7, subjects: [{ kind: 'Robot', name: 'r2' }] }],
          startTime: 5,
        },
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.details.map((d) => d.field)).toEqual([
        'spec.bindings[0].name',
        'spec.bindings[0].subjects[0].kind',
        'spec.startTime',
      ]);
    }
  });

  it('should require the bindings list', () => {
    expect(() =>
      parseRbacRule({ apiVersion: 'rbac-sync.io/v1alpha1', kind: 'RBACRule', metadata: { name: 'r' }, spec: {} }),
    ).toThrow('Validation failed for fields: spec.bindings');
  });
});

describe('decodeObjectMeta', () => {
  it('should keep known fields and owner references', () => {
    const meta = decodeObjectMeta({
      name: 'rb',
      namespace: 'apps',
      labels: { a: '1' },
      ownerReferences: [{ apiVersion: 'rbac-sync.io/v1alpha1', kind: 'RBACRule', name: 'r', uid: 'u', controller: true }],
      managedFields: [],
    });

    expect(meta).toEqual({
      name: 'rb',
      namespace: 'apps',
      labels: { a: '1' },
      ownerReferences: [{ apiVersion: 'rbac-sync.io/v1alpha1', kind: 'RBACRule', name: 'r', uid: 'u', controller: true }],
    });
  });

  it('should reject metadata without a name', () => {
    expect(() => decodeObjectMeta({ namespace: 'apps' })).toThrow(ValidationError);
  });
});
