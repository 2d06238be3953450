/**
 * Namespace Resolver
 * @module @rbac-sync/core/services/namespace-resolver
 *
 * Turns a namespace selection (explicit names and/or a label selector) into
 * namespace names. Explicit names come first, verbatim, followed by the
 * namespaces the selector matches in store order. De-duplication is left to
 * the caller.
 */

import {
  assertValidSelector,
  createServiceLogger,
  isEmptySelector,
  type Logger,
  type NamespaceSelection,
} from '@rbac-sync/shared';
import type { NamespaceLister } from '../stores/cluster-store.js';

export interface NamespaceResolverOptions {
  store: NamespaceLister;
  logger?: Logger;
}

export class NamespaceResolver {
  private readonly store: NamespaceLister;
  private readonly logger: Logger;

  constructor(options: NamespaceResolverOptions) {
    this.store = options.store;
    this.logger =
      options.logger ?? createServiceLogger({ service: 'rbac-sync' }, { component: 'namespace-resolver' });
  }

  /**
   * Resolve a selection to namespace names.
   * Rejects with a SelectorError when the label selector is malformed.
   */
  async resolve(selection: NamespaceSelection): Promise<string[]> {
    const result = [...(selection.namespaces ?? [])];

    if (selection.namespaceMatchExpression) {
      this.logger.warn('namespaceMatchExpression is deprecated and ignored', {
        expression: selection.namespaceMatchExpression,
      });
    }

    const selector = selection.namespaceSelector;
    if (!selector || isEmptySelector(selector)) {
      return result;
    }

    assertValidSelector(selector);
    const matched = await this.store.list('Namespace', { labelSelector: selector });
    for (const namespace of matched) {
      result.push(namespace.metadata.name);
    }
    return result;
  }
}
