/**
 * Binding Expander
 * @module @rbac-sync/core/services/binding-expander
 *
 * Expands one declarative binding into the concrete RBAC objects it stands for:
 * - ServiceAccount subjects become one subject entry and one ServiceAccount
 *   per resolved namespace
 * - every RoleBinding and ClusterRoleBinding of the binding grants the full
 *   expanded subject list
 * - each RoleBindingSpec yields one RoleBinding per namespace and per role
 *   field it sets
 */

import {
  ObjectTypeError,
  RBAC_API_GROUP,
  RBAC_API_VERSION,
  describeValue,
  formatObjectKey,
  generateObjectName,
  uniqueBy,
  type Binding,
  type ClusterRoleBindingObject,
  type Labels,
  type OwnerReference,
  type RbacSubject,
  type RoleBindingObject,
  type RoleBindingSpec,
  type RoleRef,
  type RoleRefKind,
  type ServiceAccountObject,
  type Subject,
} from '@rbac-sync/shared';
import type { NamespaceResolver } from './namespace-resolver.js';

/**
 * What the expander stamps onto every generated object
 */
export interface ExpansionContext {
  ruleName: string;
  labels: Labels;
  ownerReferences: OwnerReference[];
}

/**
 * Concrete objects for one binding
 */
export interface BindingExpansion {
  /** De-duplicated subject list shared by every generated binding */
  subjects: RbacSubject[];
  serviceAccounts: ServiceAccountObject[];
  /** Every namespace that must exist before the objects can be written */
  namespaces: string[];
  roleBindings: RoleBindingObject[];
  clusterRoleBindings: ClusterRoleBindingObject[];
}

function assertNever(value: never): never {
  throw new ObjectTypeError('Subject', describeValue(value));
}

function subjectKey(subject: RbacSubject): string {
  return `${subject.kind}/${subject.namespace ?? ''}/${subject.name}`;
}

function roleRef(kind: RoleRefKind, name: string): RoleRef {
  return { apiGroup: RBAC_API_GROUP, kind, name };
}

/**
 * The role references a RoleBindingSpec asks for, Role first
 */
function roleRefsOf(spec: RoleBindingSpec): RoleRef[] {
  const refs: RoleRef[] = [];
  if (spec.role) {
    refs.push(roleRef('Role', spec.role));
  }
  if (spec.clusterRole) {
    refs.push(roleRef('ClusterRole', spec.clusterRole));
  }
  return refs;
}

export class BindingExpander {
  constructor(private readonly resolver: NamespaceResolver) {}

  /**
   * Expand a binding. Rejects when namespace resolution fails.
   */
  async expand(binding: Binding, context: ExpansionContext): Promise<BindingExpansion> {
    const subjects: RbacSubject[] = [];
    const serviceAccounts: ServiceAccountObject[] = [];
    const namespaces: string[] = [];

    for (const subject of binding.subjects) {
      const expanded = await this.expandSubject(subject);
      subjects.push(...expanded);
      for (const entry of expanded) {
        if (entry.kind === 'ServiceAccount' && entry.namespace) {
          namespaces.push(entry.namespace);
          serviceAccounts.push(this.serviceAccount(entry.name, entry.namespace, context));
        }
      }
    }

    const uniqueSubjects = uniqueBy(subjects, subjectKey);

    const roleBindings: RoleBindingObject[] = [];
    for (const spec of binding.roleBindings ?? []) {
      const targets = uniqueBy(await this.resolver.resolve(spec), (ns) => ns);
      const refs = roleRefsOf(spec);
      for (const namespace of targets) {
        namespaces.push(namespace);
        for (const ref of refs) {
          roleBindings.push({
            apiVersion: RBAC_API_VERSION,
            kind: 'RoleBinding',
            metadata: {
              name: generateObjectName(context.ruleName, binding.name, ref.kind, ref.name),
              namespace,
              ...this.ownership(context),
            },
            subjects: uniqueSubjects.map((s) => ({ ...s })),
            roleRef: { ...ref },
          });
        }
      }
    }

    const clusterRoleBindings: ClusterRoleBindingObject[] = (binding.clusterRoleBindings ?? []).map(
      (spec): ClusterRoleBindingObject => ({
        apiVersion: RBAC_API_VERSION,
        kind: 'ClusterRoleBinding',
        metadata: {
          name: generateObjectName(context.ruleName, binding.name, 'ClusterRole', spec.clusterRole),
          ...this.ownership(context),
        },
        subjects: uniqueSubjects.map((s) => ({ ...s })),
        roleRef: roleRef('ClusterRole', spec.clusterRole),
      }),
    );

    return {
      subjects: uniqueSubjects,
      serviceAccounts: uniqueBy(serviceAccounts, (sa) => formatObjectKey(sa.metadata)),
      namespaces: uniqueBy(namespaces, (ns) => ns),
      roleBindings: uniqueBy(roleBindings, (rb) => formatObjectKey(rb.metadata)),
      clusterRoleBindings: uniqueBy(clusterRoleBindings, (crb) => crb.metadata.name),
    };
  }

  private async expandSubject(subject: Subject): Promise<RbacSubject[]> {
    switch (subject.kind) {
      case 'User':
      case 'Group':
        return [{ kind: subject.kind, name: subject.name, apiGroup: RBAC_API_GROUP }];
      case 'ServiceAccount': {
        const resolved = await this.resolver.resolve(subject);
        return resolved.map((namespace): RbacSubject => ({
          kind: 'ServiceAccount',
          name: subject.name,
          apiGroup: '',
          namespace,
        }));
      }
      default:
        return assertNever(subject);
    }
  }

  private serviceAccount(name: string, namespace: string, context: ExpansionContext): ServiceAccountObject {
    return {
      apiVersion: 'v1',
      kind: 'ServiceAccount',
      metadata: { name, namespace, ...this.ownership(context) },
    };
  }

  private ownership(context: ExpansionContext): { labels: Labels; ownerReferences: OwnerReference[] } {
    return {
      labels: { ...context.labels },
      ownerReferences: context.ownerReferences.map((ref) => ({ ...ref })),
    };
  }
}
