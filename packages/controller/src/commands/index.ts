export { createRunCommand } from './run.js';
export {
  createValidateCommand,
  checkManifests,
  validateFile,
  type CheckOptions,
  type ManifestReport,
} from './validate.js';
