/**
 * rbac-sync Controller Package
 * Kubernetes adapters, work queue, admission webhook and process wiring
 * @module @rbac-sync/controller
 */

export * from './config.js';
export * from './queue/index.js';
export * from './services/index.js';
export * from './kubernetes/index.js';
export * from './http/index.js';
export * from './webhook/index.js';
export { createController, type Controller, type ControllerDependencies } from './main.js';
export * from './commands/index.js';
