/**
 * rbac-sync - Shared Package
 * Types, validation, errors, logging, and utilities
 * @module @rbac-sync/shared
 */

// Types (includes selector helpers such as matchesSelector and formatLabelSelector)
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Validation and defaulting
export * from './validation/index.js';

// Logging
export {
  Logger,
  createLogger,
  createServiceLogger,
  formatPretty,
  isLogLevel,
  type LogLevel,
  type LogMeta,
  type LogEntry,
  type LoggerConfig,
} from './logging/logger.js';

// Utilities
export * from './utils/index.js';
