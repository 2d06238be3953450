export {
  MUTATE_PATH,
  VALIDATE_PATH,
  createAdmissionApp,
  createAdmissionHandlers,
  readAdmissionRequest,
  reviewMutation,
  reviewValidation,
  toAdmissionReview,
  type AdmissionHandler,
  type AdmissionHandlers,
  type AdmissionHttpRequest,
  type AdmissionOptions,
  type AdmissionRequest,
  type AdmissionResponse,
  type AdmissionReview,
  type AdmissionStatus,
  type JsonPatchOperation,
  type JsonResponder,
} from './admission.js';

export { loadWebhookTls, startWebhookServer, type TlsMaterial } from './webhook-server.js';
