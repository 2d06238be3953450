/**
 * Unit tests for the RBACRule admission webhook
 * @module @rbac-sync/controller/tests/unit/admission
 */

import { describe, it, expect } from 'vitest';
import { RBACRULE_API_VERSION } from '@rbac-sync/shared';
import {
  createAdmissionHandlers,
  readAdmissionRequest,
  reviewMutation,
  reviewValidation,
  type AdmissionRequest,
  type JsonResponder,
} from '../../src/webhook/admission';

// ============================================================================
// Test Helpers
// ============================================================================

const NOW = new Date('2026-03-01T12:00:00.000Z');

function ruleObject(spec: Record<string, unknown>, name = 'team-access'): Record<string, unknown> {
  return {
    apiVersion: RBACRULE_API_VERSION,
    kind: 'RBACRule',
    metadata: { name },
    spec,
  };
}

function request(operation: AdmissionRequest['operation'], object: unknown): AdmissionRequest {
  return { uid: 'req-1', operation, name: 'team-access', object };
}

function decodePatch(patch: string | undefined): unknown {
  if (patch === undefined) {
    throw new Error('no patch');
  }
  return JSON.parse(Buffer.from(patch, 'base64').toString('utf8'));
}

interface RecordedResponse extends JsonResponder {
  statusCode: number;
  body: unknown;
}

function createMockResponse(): RecordedResponse {
  const res: RecordedResponse = {
    statusCode: 0,
    body: undefined,
    status(code) {
      res.statusCode = code;
      return res;
    },
    json(body) {
      res.body = body;
      return res;
    },
  };
  return res;
}

const VALID_SPEC = {
  bindings: [
    {
      name: 'dev',
      subjects: [{ kind: 'ServiceAccount', name: 'deployer', namespaces: ['apps'] }],
      roleBindings: [{ role: 'edit', namespaces: ['apps'] }],
    },
  ],
};

describe('readAdmissionRequest', () => {
  it('should extract the request fields', () => {
    const body = {
      apiVersion: 'admission.k8s.io/v1',
      kind: 'AdmissionReview',
      request: { uid: 'abc', operation: 'CREATE', name: 'r', object: { kind: 'RBACRule' }, oldObject: null },
    };

    expect(readAdmissionRequest(body)).toEqual({
      uid: 'abc',
      operation: 'CREATE',
      name: 'r',
      object: { kind: 'RBACRule' },
    });
  });

  it('should return null for a body that is not a review', () => {
    expect(readAdmissionRequest({ kind: 'Pod' })).toBeNull();
    expect(readAdmissionRequest({ kind: 'AdmissionReview' })).toBeNull();
    expect(readAdmissionRequest({ kind: 'AdmissionReview', request: { uid: 'abc', operation: 'PATCH' } })).toBeNull();
    expect(readAdmissionRequest('AdmissionReview')).toBeNull();
  });
});

describe('reviewMutation', () => {
  it('should fill the default namespace into unscoped selections', () => {
    const object = ruleObject({
      bindings: [
        {
          name: 'dev',
          subjects: [
            { kind: 'ServiceAccount', name: 'deployer' },
            { kind: 'User', name: 'alice' },
          ],
          roleBindings: [{ role: 'edit' }, { clusterRole: 'view' }],
        },
      ],
    });

    const response = reviewMutation(request('CREATE', object));

    expect(response.allowed).toBe(true);
    expect(response.patchType).toBe('JSONPatch');
    expect(decodePatch(response.patch)).toEqual([
      {
        op: 'replace',
        path: '/spec',
        value: {
          bindings: [
            {
              name: 'dev',
              subjects: [
                { kind: 'ServiceAccount', name: 'deployer', namespaces: ['default'] },
                { kind: 'User', name: 'alice' },
              ],
              roleBindings: [{ role: 'edit', namespaces: ['default'] }, { clusterRole: 'view' }],
            },
          ],
        },
      },
    ]);
  });

  it('should use the configured fallback namespace', () => {
    const object = ruleObject({
      bindings: [{ name: 'dev', subjects: [{ kind: 'ServiceAccount', name: 'deployer' }] }],
    });

    const response = reviewMutation(request('UPDATE', object), { defaultNamespace: 'platform' });

    expect(decodePatch(response.patch)).toEqual([
      {
        op: 'replace',
        path: '/spec',
        value: {
          bindings: [
            {
              name: 'dev',
              subjects: [{ kind: 'ServiceAccount', name: 'deployer', namespaces: ['platform'] }],
            },
          ],
        },
      },
    ]);
  });

  it('should admit without a patch when nothing needs defaulting', () => {
    expect(reviewMutation(request('CREATE', ruleObject(VALID_SPEC)))).toEqual({ uid: 'req-1', allowed: true });
  });

  it('should leave selector-scoped subjects alone', () => {
    const object = ruleObject({
      bindings: [
        {
          name: 'dev',
          subjects: [
            { kind: 'ServiceAccount', name: 'deployer', namespaceSelector: { matchLabels: { team: 'a' } } },
          ],
          clusterRoleBindings: [{ clusterRole: 'view' }],
        },
      ],
    });

    expect(reviewMutation(request('CREATE', object)).patch).toBeUndefined();
  });

  it('should deny an object that is not an RBACRule', () => {
    const response = reviewMutation(request('CREATE', { apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'x' } }));

    expect(response).toEqual({
      uid: 'req-1',
      allowed: false,
      status: {
        code: 400,
        message: `expected ${RBACRULE_API_VERSION} RBACRule but got v1 ConfigMap`,
        reason: 'BadRequest',
      },
    });
  });

  it('should deny a malformed RBACRule', () => {
    const response = reviewMutation(request('CREATE', ruleObject({})));

    expect(response.allowed).toBe(false);
    expect(response.status).toEqual({
      code: 400,
      message: 'malformed RBACRule: spec.bindings: This field is required',
      reason: 'BadRequest',
    });
  });

  it('should admit deletes untouched', () => {
    expect(reviewMutation(request('DELETE', undefined))).toEqual({ uid: 'req-1', allowed: true });
  });
});

describe('reviewValidation', () => {
  const options = { now: () => NOW };

  it('should admit a valid rule', () => {
    expect(reviewValidation(request('CREATE', ruleObject(VALID_SPEC)), options)).toEqual({
      uid: 'req-1',
      allowed: true,
    });
  });

  it('should deny a binding with neither role bindings nor cluster role bindings', () => {
    const object = ruleObject({
      bindings: [{ name: 'dev', subjects: [{ kind: 'User', name: 'alice' }] }],
    });

    expect(reviewValidation(request('CREATE', object), options)).toEqual({
      uid: 'req-1',
      allowed: false,
      status: {
        code: 403,
        message:
          'RBACRule "team-access" is invalid: spec.bindings[0]: RoleBindings or ClusterRoleBindings should be specified',
        reason: 'Forbidden',
      },
    });
  });

  it('should reject a start time in the past on create only', () => {
    const object = ruleObject({ ...VALID_SPEC, startTime: '2026-03-01T11:00:00Z' });

    const created = reviewValidation(request('CREATE', object), options);
    expect(created.allowed).toBe(false);
    expect(created.status?.message).toBe(
      'RBACRule "team-access" is invalid: spec.startTime: start time should not be earlier than now',
    );

    expect(reviewValidation(request('UPDATE', object), options).allowed).toBe(true);
  });

  it('should reject a start time after the end time', () => {
    const object = ruleObject({
      ...VALID_SPEC,
      startTime: '2026-03-03T00:00:00Z',
      endTime: '2026-03-02T00:00:00Z',
    });

    expect(reviewValidation(request('UPDATE', object), options).status?.message).toBe(
      'RBACRule "team-access" is invalid: spec.startTime: start time should not be higher than end time',
    );
  });

  it('should attach a warning for the deprecated match expression', () => {
    const object = ruleObject({
      bindings: [
        {
          name: 'dev',
          subjects: [{ kind: 'ServiceAccount', name: 'deployer', namespaces: ['apps'], namespaceMatchExpression: 'app-*' }],
          clusterRoleBindings: [{ clusterRole: 'view' }],
        },
      ],
    });

    expect(reviewValidation(request('CREATE', object), options)).toEqual({
      uid: 'req-1',
      allowed: true,
      warnings: [
        'spec.bindings[0].subjects[0].namespaceMatchExpression is deprecated and ignored; use namespaces or namespaceSelector',
      ],
    });
  });

  it('should always admit deletes', () => {
    expect(reviewValidation(request('DELETE', ruleObject({})), options)).toEqual({ uid: 'req-1', allowed: true });
  });
});

describe('admission handlers', () => {
  const handlers = createAdmissionHandlers({ now: () => NOW });

  it('should answer with an AdmissionReview', () => {
    const res = createMockResponse();
    handlers.validate(
      {
        path: '/validate',
        body: {
          apiVersion: 'admission.k8s.io/v1',
          kind: 'AdmissionReview',
          request: { uid: 'abc', operation: 'CREATE', object: ruleObject(VALID_SPEC) },
        },
      },
      res,
    );

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({
      apiVersion: 'admission.k8s.io/v1',
      kind: 'AdmissionReview',
      response: { uid: 'abc', allowed: true },
    });
  });

  it('should reject a body that is not a review with 400', () => {
    const res = createMockResponse();
    handlers.mutate({ path: '/mutate', body: { hello: 'world' } }, res);

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ error: 'request body must be an admission.k8s.io/v1 AdmissionReview' });
  });
});
