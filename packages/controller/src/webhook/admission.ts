/**
 * RBACRule admission webhook
 * @module @rbac-sync/controller/webhook/admission
 *
 * Speaks admission.k8s.io/v1 AdmissionReview. The mutating endpoint fills in
 * default namespaces; the validating endpoint checks create and update
 * requests and always admits deletes.
 */

import { isDeepStrictEqual } from 'node:util';
import express, { type Express, type Request } from 'express';
import {
  DEFAULT_FALLBACK_NAMESPACE,
  applyRbacRuleDefaults,
  createServiceLogger,
  isObjectTypeError,
  isRecord,
  isValidationError,
  parseRbacRule,
  toError,
  validateRbacRule,
  type AdmissionOperation,
  type Logger,
  type RBACRule,
  type ValidationErrorDetail,
} from '@rbac-sync/shared';

export const MUTATE_PATH = '/mutate-rbac-sync-io-v1alpha1-rbacrule';
export const VALIDATE_PATH = '/validate-rbac-sync-io-v1alpha1-rbacrule';

const ADMISSION_API_VERSION = 'admission.k8s.io/v1';

const OPERATIONS: readonly AdmissionOperation[] = ['CREATE', 'UPDATE', 'DELETE', 'CONNECT'];

/**
 * The fields of an AdmissionRequest the webhook reads
 */
export interface AdmissionRequest {
  uid: string;
  operation: AdmissionOperation;
  name?: string;
  object?: unknown;
  oldObject?: unknown;
}

export interface AdmissionStatus {
  code: number;
  message: string;
  reason?: string;
}

export interface AdmissionResponse {
  uid: string;
  allowed: boolean;
  status?: AdmissionStatus;
  patchType?: 'JSONPatch';
  /** Base64-encoded JSON Patch */
  patch?: string;
  warnings?: string[];
}

export interface AdmissionReview {
  apiVersion: typeof ADMISSION_API_VERSION;
  kind: 'AdmissionReview';
  response: AdmissionResponse;
}

export interface JsonPatchOperation {
  op: 'replace';
  path: string;
  value: unknown;
}

export interface AdmissionOptions {
  /** Namespace filled into selections that name none */
  defaultNamespace?: string;
  /** Reference instant for start-time validation */
  now?: () => Date;
  logger?: Logger;
}

/**
 * Pull the AdmissionRequest out of a review body; null when it is not one
 */
export function readAdmissionRequest(body: unknown): AdmissionRequest | null {
  if (!isRecord(body) || body.kind !== 'AdmissionReview') {
    return null;
  }
  const request = body.request;
  if (!isRecord(request)) {
    return null;
  }
  const operation = OPERATIONS.find((op) => op === request.operation);
  if (typeof request.uid !== 'string' || !operation) {
    return null;
  }
  const out: AdmissionRequest = { uid: request.uid, operation };
  if (typeof request.name === 'string') out.name = request.name;
  if (request.object !== undefined && request.object !== null) out.object = request.object;
  if (request.oldObject !== undefined && request.oldObject !== null) out.oldObject = request.oldObject;
  return out;
}

function deny(uid: string, code: number, message: string, reason?: string): AdmissionResponse {
  const status: AdmissionStatus = { code, message };
  if (reason) {
    status.reason = reason;
  }
  return { uid, allowed: false, status };
}

function describeDetails(details: ValidationErrorDetail[]): string {
  return details.map((d) => `${d.field}: ${d.message}`).join('; ');
}

/**
 * Decode the request object, or produce the denial explaining why it cannot be
 */
function decodeObject(request: AdmissionRequest): RBACRule | AdmissionResponse {
  try {
    return parseRbacRule(request.object);
  } catch (error) {
    if (isValidationError(error)) {
      return deny(request.uid, 400, `malformed RBACRule: ${describeDetails(error.details)}`, 'BadRequest');
    }
    if (isObjectTypeError(error)) {
      return deny(request.uid, 400, error.message, 'BadRequest');
    }
    throw error;
  }
}

function isResponse(value: RBACRule | AdmissionResponse): value is AdmissionResponse {
  return 'allowed' in value;
}

/**
 * Default an RBACRule. The patch replaces `/spec` wholesale and is only sent
 * when defaulting changed something.
 */
export function reviewMutation(request: AdmissionRequest, options: AdmissionOptions = {}): AdmissionResponse {
  if (request.operation !== 'CREATE' && request.operation !== 'UPDATE') {
    return { uid: request.uid, allowed: true };
  }
  const decoded = decodeObject(request);
  if (isResponse(decoded)) {
    return decoded;
  }

  const spec = applyRbacRuleDefaults(decoded.spec, options.defaultNamespace ?? DEFAULT_FALLBACK_NAMESPACE);
  if (isDeepStrictEqual(spec, decoded.spec)) {
    return { uid: request.uid, allowed: true };
  }

  const patch: JsonPatchOperation[] = [{ op: 'replace', path: '/spec', value: spec }];
  return {
    uid: request.uid,
    allowed: true,
    patchType: 'JSONPatch',
    patch: Buffer.from(JSON.stringify(patch)).toString('base64'),
  };
}

/**
 * Validate an RBACRule create or update. Deletes are always admitted.
 */
export function reviewValidation(request: AdmissionRequest, options: AdmissionOptions = {}): AdmissionResponse {
  if (request.operation === 'DELETE' || request.operation === 'CONNECT') {
    return { uid: request.uid, allowed: true };
  }
  const decoded = decodeObject(request);
  if (isResponse(decoded)) {
    return decoded;
  }

  const now = options.now?.() ?? new Date();
  const result = validateRbacRule(decoded, { operation: request.operation, now });
  const response: AdmissionResponse = result.valid
    ? { uid: request.uid, allowed: true }
    : deny(
        request.uid,
        403,
        `RBACRule "${decoded.metadata.name}" is invalid: ${describeDetails(result.errors)}`,
        'Forbidden',
      );
  if (result.warnings.length > 0) {
    response.warnings = result.warnings;
  }
  return response;
}

export function toAdmissionReview(response: AdmissionResponse): AdmissionReview {
  return { apiVersion: ADMISSION_API_VERSION, kind: 'AdmissionReview', response };
}

type Reviewer = (request: AdmissionRequest, options: AdmissionOptions) => AdmissionResponse;

/**
 * The parts of an express request and response the handlers touch
 */
export type AdmissionHttpRequest = Pick<Request, 'body' | 'path'>;

export interface JsonResponder {
  status(code: number): JsonResponder;
  json(body: unknown): unknown;
}

export type AdmissionHandler = (req: AdmissionHttpRequest, res: JsonResponder) => void;

function reviewHandler(review: Reviewer, options: AdmissionOptions, logger: Logger): AdmissionHandler {
  return (req, res) => {
    const body: unknown = req.body;
    const request = readAdmissionRequest(body);
    if (!request) {
      logger.warn('Rejecting a body that is not an AdmissionReview', { path: req.path });
      res.status(400).json({ error: 'request body must be an admission.k8s.io/v1 AdmissionReview' });
      return;
    }

    try {
      const response = review(request, options);
      logger.info('Admission reviewed', {
        path: req.path,
        uid: request.uid,
        operation: request.operation,
        name: request.name,
        allowed: response.allowed,
        patched: response.patch !== undefined,
      });
      res.status(200).json(toAdmissionReview(response));
    } catch (error) {
      const err = toError(error);
      logger.error('Admission review failed', err, { path: req.path, uid: request.uid });
      res.status(200).json(toAdmissionReview(deny(request.uid, 500, err.message, 'InternalError')));
    }
  };
}

export interface AdmissionHandlers {
  mutate: AdmissionHandler;
  validate: AdmissionHandler;
}

export function createAdmissionHandlers(options: AdmissionOptions = {}): AdmissionHandlers {
  const logger =
    options.logger ?? createServiceLogger({ service: 'rbac-sync' }, { component: 'admission-webhook' });
  return {
    mutate: reviewHandler(reviewMutation, options, logger),
    validate: reviewHandler(reviewValidation, options, logger),
  };
}

/**
 * Express app serving both admission endpoints
 */
export function createAdmissionApp(options: AdmissionOptions = {}): Express {
  const handlers = createAdmissionHandlers(options);
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '2mb' }));

  app.post(MUTATE_PATH, handlers.mutate);
  app.post(VALIDATE_PATH, handlers.validate);

  return app;
}
