/**
 * RBACRule Reconciler
 * @module @rbac-sync/core/services/rbac-rule-reconciler
 *
 * Drives one RBACRule through its lifecycle on every pass:
 * 1. Deletion requested: sweep owned objects, then release the finalizer
 * 2. Attach the cleanup finalizer
 * 3. Hold everything until startTime (requeue, never sleep)
 * 4. Delete the rule once endTime has passed
 * 5. Expand and upsert every binding, recording owned bindings in status
 * 6. Prune owned objects that are no longer desired (only after a clean pass)
 *
 * A pass is level-triggered: it reads the rule fresh and can be re-run at any
 * point without changing the outcome.
 */

import {
  OrderedSet,
  RBACRULE_FINALIZER,
  createServiceLogger,
  formatObjectKey,
  isAlreadyExistsError,
  isNotFoundError,
  isObjectTypeError,
  isStoreError,
  parseRuleTime,
  toError,
  type Logger,
  type ManagedKind,
  type ManagedObjectMap,
  type ObjectKey,
  type RBACRule,
  type RBACRulePhase,
  type RBACRuleStatus,
} from '@rbac-sync/shared';
import type { ClusterStore } from '../stores/cluster-store.js';
import { BindingExpander, type BindingExpansion, type ExpansionContext } from './binding-expander.js';
import { NamespaceResolver } from './namespace-resolver.js';
import { ownerLabels, ownerSelector, ruleOwnerReference } from './ownership.js';
import { setReadyCondition, statusChanged, type ReadyState } from './rule-status.js';

/**
 * Outcome of a reconcile that did not throw
 */
export interface ReconcileResult {
  /** Run the rule again after this many milliseconds */
  requeueAfterMs?: number;
}

export interface RbacRuleReconcilerOptions {
  store: ClusterStore;
  logger?: Logger;
  /** Delay before retrying a pass that failed to write an object (default: 500) */
  retryDelayMs?: number;
  /** Time source (default: wall clock) */
  now?: () => Date;
}

export const DEFAULT_RETRY_DELAY_MS = 500;

/**
 * Objects a pass wants to exist, by identifier
 */
interface DesiredObjects {
  roleBindings: Set<string>;
  clusterRoleBindings: Set<string>;
  serviceAccounts: Set<string>;
}

interface PassContext {
  store: ClusterStore;
  logger: Logger;
  retryDelayMs: number;
  now: Date;
}

/**
 * Reconciles RBACRules by name
 */
export class RbacRuleReconciler {
  private readonly store: ClusterStore;
  private readonly logger: Logger;
  private readonly retryDelayMs: number;
  private readonly now: () => Date;

  constructor(options: RbacRuleReconcilerOptions) {
    this.store = options.store;
    this.logger =
      options.logger ?? createServiceLogger({ service: 'rbac-sync' }, { component: 'rbacrule-reconciler' });
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run one pass for the named rule. Store errors that the pass cannot absorb
   * (reading the rule, finalizer and status writes, the deletion sweep) are thrown.
   */
  async reconcile(name: string): Promise<ReconcileResult> {
    const log = this.logger.forPass(name);

    let rule: RBACRule;
    try {
      rule = await this.store.getRule(name);
    } catch (error) {
      if (isNotFoundError(error)) {
        log.debug('RBACRule no longer exists');
        return {};
      }
      throw error;
    }

    const pass = new ReconcilePass(rule, {
      store: this.store,
      logger: log,
      retryDelayMs: this.retryDelayMs,
      now: this.now(),
    });
    return pass.run();
  }
}

/**
 * State of one pass over one rule. Nothing here outlives the pass.
 */
class ReconcilePass {
  private rule: RBACRule;
  private readonly store: ClusterStore;
  private readonly log: Logger;
  private readonly retryDelayMs: number;
  private readonly now: Date;
  private readonly expander: BindingExpander;
  private readonly roleBindings: OrderedSet<string>;
  private readonly clusterRoleBindings: OrderedSet<string>;

  constructor(rule: RBACRule, context: PassContext) {
    this.rule = rule;
    this.store = context.store;
    this.log = context.logger;
    this.retryDelayMs = context.retryDelayMs;
    this.now = context.now;
    this.expander = new BindingExpander(new NamespaceResolver({ store: this.store, logger: this.log }));
    this.roleBindings = OrderedSet.from(rule.status?.roleBindings);
    this.clusterRoleBindings = OrderedSet.from(rule.status?.clusterRoleBindings);
  }

  private get name(): string {
    return this.rule.metadata.name;
  }

  async run(): Promise<ReconcileResult> {
    if (this.rule.metadata.deletionTimestamp) {
      await this.finalize();
      return {};
    }

    if (!this.hasFinalizer()) {
      await this.addFinalizer();
    }

    const now = this.now.getTime();
    const start = parseRuleTime(this.rule.spec.startTime);
    if (start && start.getTime() > now) {
      this.log.info('Waiting for start time', { startTime: start.toISOString() });
      await this.writeSummary('Pending', {
        status: 'False',
        reason: 'WaitingForStartTime',
        message: `bindings are applied from ${start.toISOString()}`,
      });
      return { requeueAfterMs: start.getTime() - now };
    }

    const end = parseRuleTime(this.rule.spec.endTime);
    if (end && end.getTime() <= now) {
      this.log.info('End time reached, deleting RBACRule', { endTime: end.toISOString() });
      await this.deleteRule();
      return {};
    }

    const applied = await this.applyBindings();
    if (!applied) {
      return { requeueAfterMs: this.retryDelayMs };
    }

    if (end) {
      return { requeueAfterMs: end.getTime() - now };
    }
    return {};
  }

  // ==========================================================================
  // Apply
  // ==========================================================================

  /**
   * Expand and write every binding. Returns false when a write failed and the
   * pass was cut short.
   */
  private async applyBindings(): Promise<boolean> {
    const context: ExpansionContext = {
      ruleName: this.name,
      labels: ownerLabels(this.name),
      ownerReferences: [ruleOwnerReference(this.rule)],
    };
    const desired: DesiredObjects = {
      roleBindings: new Set(),
      clusterRoleBindings: new Set(),
      serviceAccounts: new Set(),
    };
    const failures: string[] = [];

    for (const binding of this.rule.spec.bindings) {
      let expansion: BindingExpansion;
      try {
        expansion = await this.expander.expand(binding, context);
      } catch (error) {
        if (isObjectTypeError(error)) {
          throw error;
        }
        const cause = toError(error);
        this.log.error('Failed to expand binding', cause, { binding: binding.name });
        failures.push(`${binding.name}: ${cause.message}`);
        continue;
      }

      expansion.roleBindings.forEach((rb) => desired.roleBindings.add(formatObjectKey(rb.metadata)));
      expansion.clusterRoleBindings.forEach((crb) => desired.clusterRoleBindings.add(crb.metadata.name));
      expansion.serviceAccounts.forEach((sa) => desired.serviceAccounts.add(formatObjectKey(sa.metadata)));

      if (!(await this.applyExpansion(expansion))) {
        await this.writeSummary('Active', {
          status: 'False',
          reason: 'ApplyFailed',
          message: `binding ${binding.name}: failed to write generated objects`,
        });
        return false;
      }
      this.log.debug('Binding applied', {
        binding: binding.name,
        roleBindings: expansion.roleBindings.length,
        clusterRoleBindings: expansion.clusterRoleBindings.length,
        serviceAccounts: expansion.serviceAccounts.length,
      });
    }

    if (failures.length > 0) {
      this.log.warn('Skipping pruning after binding failures', { failed: failures.length });
      await this.writeSummary('Active', {
        status: 'False',
        reason: 'BindingExpansionFailed',
        message: failures.join('; '),
      });
      return true;
    }

    if (!(await this.prune(desired))) {
      await this.writeSummary('Active', {
        status: 'False',
        reason: 'ApplyFailed',
        message: 'failed to remove objects that are no longer desired',
      });
      return false;
    }

    await this.writeSummary('Active', {
      status: 'True',
      reason: 'Applied',
      message: `${this.rule.spec.bindings.length} binding(s) applied`,
    });
    return true;
  }

  private async applyExpansion(expansion: BindingExpansion): Promise<boolean> {
    for (const namespace of expansion.namespaces) {
      if (!(await this.attempt('Namespace', { name: namespace }, () => this.ensureNamespace(namespace)))) {
        return false;
      }
    }

    for (const sa of expansion.serviceAccounts) {
      if (!(await this.attempt('ServiceAccount', sa.metadata, () => this.upsert('ServiceAccount', sa)))) {
        return false;
      }
    }

    for (const rb of expansion.roleBindings) {
      if (!(await this.attempt('RoleBinding', rb.metadata, () => this.upsert('RoleBinding', rb)))) {
        return false;
      }
      if (this.roleBindings.add(formatObjectKey(rb.metadata))) {
        await this.writeStatus();
      }
    }

    for (const crb of expansion.clusterRoleBindings) {
      if (!(await this.attempt('ClusterRoleBinding', crb.metadata, () => this.upsert('ClusterRoleBinding', crb)))) {
        return false;
      }
      if (this.clusterRoleBindings.add(crb.metadata.name)) {
        await this.writeStatus();
      }
    }

    return true;
  }

  /**
   * Run a store write; store failures are logged and reported as false
   */
  private async attempt(kind: ManagedKind, key: ObjectKey, write: () => Promise<void>): Promise<boolean> {
    try {
      await write();
      return true;
    } catch (error) {
      if (!isStoreError(error)) {
        throw error;
      }
      this.log.error(`Failed to write ${kind}`, error, { kind, name: key.name, namespace: key.namespace });
      return false;
    }
  }

  /**
   * Create the namespace when it is missing. It gets the owner reference but
   * no ownership label, so the cleanup sweep leaves it alone.
   */
  private async ensureNamespace(name: string): Promise<void> {
    try {
      await this.store.get('Namespace', { name });
      return;
    } catch (error) {
      if (!isNotFoundError(error)) {
        throw error;
      }
    }

    try {
      await this.store.create('Namespace', {
        apiVersion: 'v1',
        kind: 'Namespace',
        metadata: { name, ownerReferences: [ruleOwnerReference(this.rule)] },
      });
      this.log.info('Created namespace', { namespace: name });
    } catch (error) {
      if (!isAlreadyExistsError(error)) {
        throw error;
      }
    }
  }

  /**
   * Create, or replace the live object with the desired content
   */
  private async upsert<K extends ManagedKind>(kind: K, desired: ManagedObjectMap[K]): Promise<void> {
    const key: ObjectKey = { name: desired.metadata.name, namespace: desired.metadata.namespace };
    try {
      await this.store.create(kind, desired);
      this.log.info(`Created ${kind}`, { name: key.name, namespace: key.namespace });
      return;
    } catch (error) {
      if (!isAlreadyExistsError(error)) {
        throw error;
      }
    }

    const live = await this.store.get(kind, key);
    const replacement = structuredClone(desired);
    replacement.metadata.resourceVersion = live.metadata.resourceVersion;
    await this.store.update(kind, replacement);
    this.log.debug(`Updated ${kind}`, { name: key.name, namespace: key.namespace });
  }

  // ==========================================================================
  // Prune
  // ==========================================================================

  /**
   * Delete labelled objects the rule no longer produces and drop status
   * entries that point at nothing desired
   */
  private async prune(desired: DesiredObjects): Promise<boolean> {
    const selector = ownerSelector(this.name);
    try {
      for (const rb of await this.store.list('RoleBinding', { labelSelector: selector })) {
        const id = formatObjectKey(rb.metadata);
        if (!desired.roleBindings.has(id)) {
          await this.removeOwned('RoleBinding', rb.metadata);
        }
      }
      for (const id of this.roleBindings.toArray()) {
        if (!desired.roleBindings.has(id) && this.roleBindings.delete(id)) {
          await this.writeStatus();
        }
      }

      for (const crb of await this.store.list('ClusterRoleBinding', { labelSelector: selector })) {
        if (!desired.clusterRoleBindings.has(crb.metadata.name)) {
          await this.removeOwned('ClusterRoleBinding', crb.metadata);
        }
      }
      for (const id of this.clusterRoleBindings.toArray()) {
        if (!desired.clusterRoleBindings.has(id) && this.clusterRoleBindings.delete(id)) {
          await this.writeStatus();
        }
      }

      for (const sa of await this.store.list('ServiceAccount', { labelSelector: selector })) {
        if (!desired.serviceAccounts.has(formatObjectKey(sa.metadata))) {
          await this.removeOwned('ServiceAccount', sa.metadata);
        }
      }
    } catch (error) {
      if (!isStoreError(error)) {
        throw error;
      }
      this.log.error('Failed to prune owned objects', error);
      return false;
    }
    return true;
  }

  // ==========================================================================
  // Finalize
  // ==========================================================================

  /**
   * Delete every labelled object of the rule, then release the finalizer.
   * Each removed binding is dropped from status as it goes, so a sweep that
   * fails midway leaves status naming exactly what is left.
   */
  private async finalize(): Promise<void> {
    if (!this.hasFinalizer()) {
      this.log.debug('RBACRule is terminating without our finalizer');
      return;
    }

    this.log.info('RBACRule is being deleted, removing owned objects');
    await this.writeSummary('Terminating');

    const selector = ownerSelector(this.name);

    for (const rb of await this.store.list('RoleBinding', { labelSelector: selector })) {
      await this.removeOwned('RoleBinding', rb.metadata);
      if (this.roleBindings.delete(formatObjectKey(rb.metadata))) {
        await this.writeStatus();
      }
    }

    for (const crb of await this.store.list('ClusterRoleBinding', { labelSelector: selector })) {
      await this.removeOwned('ClusterRoleBinding', crb.metadata);
      if (this.clusterRoleBindings.delete(crb.metadata.name)) {
        await this.writeStatus();
      }
    }

    for (const sa of await this.store.list('ServiceAccount', { labelSelector: selector })) {
      await this.removeOwned('ServiceAccount', sa.metadata);
    }

    this.rule = await this.store.updateRule({
      ...this.rule,
      metadata: {
        ...this.rule.metadata,
        finalizers: (this.rule.metadata.finalizers ?? []).filter((f) => f !== RBACRULE_FINALIZER),
      },
    });
    this.log.info('Finalizer removed');
  }

  /**
   * Delete an owned object; one that is already gone counts as deleted
   */
  private async removeOwned(kind: ManagedKind, key: ObjectKey): Promise<void> {
    try {
      await this.store.delete(kind, { name: key.name, namespace: key.namespace });
      this.log.info(`Deleted ${kind}`, { name: key.name, namespace: key.namespace });
    } catch (error) {
      if (!isNotFoundError(error)) {
        throw error;
      }
    }
  }

  // ==========================================================================
  // Rule writes
  // ==========================================================================

  private hasFinalizer(): boolean {
    return (this.rule.metadata.finalizers ?? []).includes(RBACRULE_FINALIZER);
  }

  private async addFinalizer(): Promise<void> {
    this.rule = await this.store.updateRule({
      ...this.rule,
      metadata: {
        ...this.rule.metadata,
        finalizers: [...(this.rule.metadata.finalizers ?? []), RBACRULE_FINALIZER],
      },
    });
    this.log.debug('Finalizer added');
  }

  private async deleteRule(): Promise<void> {
    try {
      await this.store.deleteRule(this.name);
    } catch (error) {
      if (!isNotFoundError(error)) {
        throw error;
      }
    }
  }

  /**
   * Write the owned-binding sets into status
   */
  private async writeStatus(): Promise<void> {
    await this.putStatus({
      ...this.rule.status,
      roleBindings: this.roleBindings.toArray(),
      clusterRoleBindings: this.clusterRoleBindings.toArray(),
    });
  }

  /**
   * Write phase and Ready condition, but only when something other than the
   * reconcile timestamp would change
   */
  private async writeSummary(phase: RBACRulePhase, ready?: ReadyState): Promise<void> {
    const previous = this.rule.status;
    const next: RBACRuleStatus = {
      ...previous,
      phase,
      roleBindings: this.roleBindings.toArray(),
      clusterRoleBindings: this.clusterRoleBindings.toArray(),
      lastReconcileTime: this.now.toISOString(),
    };
    if (ready) {
      next.conditions = setReadyCondition(previous?.conditions, ready, this.now, this.rule.metadata.generation);
    }
    if (!statusChanged(previous, next)) {
      return;
    }
    await this.putStatus(next);
  }

  private async putStatus(status: RBACRuleStatus): Promise<void> {
    this.rule = await this.store.updateRuleStatus({ ...this.rule, status });
  }
}
