/**
 * rbac-sync Core Package
 * Namespace resolution, binding expansion and the RBACRule reconciler
 * @module @rbac-sync/core
 */

// Cluster store contract, change notifications and the in-memory store
export * from './stores/index.js';

// Resolver, expander, reconciler
export * from './services/index.js';
