/**
 * Utilities
 * @module @rbac-sync/shared/utils
 */

export {
  MAX_OBJECT_NAME_LENGTH,
  shortHash,
  isDnsSubdomain,
  generateObjectName,
  ownerLabelValue,
} from './names.js';

export { OrderedSet, uniqueBy } from './ordered-set.js';
