/**
 * Policy Store
 *
 * In-memory view of roles, policies, assignments and grants. Every change
 * replaces the whole snapshot and bumps its version; readers keep the snapshot
 * they started with.
 */

import {
  AccessControlList,
  DirectPermission,
  EffectivePermissions,
  Permission,
  PermissionPolicy,
  ResourcePermissions,
  Role,
  RoleAssignment
} from '../types/permission';

export interface PolicySnapshot {
  readonly version: number;
  readonly roles: ReadonlyMap<string, Role>;
  /** Creation order */
  readonly policies: readonly PermissionPolicy[];
  /** Assignment order, revoked ones included */
  readonly assignments: readonly RoleAssignment[];
  readonly directPermissions: readonly DirectPermission[];
  readonly resourcePermissions: ReadonlyMap<string, ResourcePermissions>;
  /** Creation order */
  readonly acls: readonly AccessControlList[];
  readonly principals: ReadonlyMap<string, EffectivePermissions>;
}

/**
 * Records loaded from the durable store
 */
export interface PolicyStoreRecords {
  roles: Role[];
  policies: PermissionPolicy[];
  assignments: RoleAssignment[];
  directPermissions: DirectPermission[];
  resourcePermissions: ResourcePermissions[];
  acls: AccessControlList[];
}

/**
 * Built-in roles, present from construction
 */
export function createDefaultRoles(createdAt: string): Role[] {
  return [
    {
      id: 'admin',
      name: 'Administrator',
      description: 'Full access to every resource',
      isSystemRole: true,
      createdAt,
      permissions: (['create', 'read', 'update', 'delete', 'manage'] as const).map((action): Permission => ({
        action,
        resourceType: 'any',
        isGranted: true,
        conditions: []
      }))
    },
    {
      id: 'manager',
      name: 'Manager',
      description: 'Manages documents and teams',
      isSystemRole: true,
      createdAt,
      permissions: [
        { action: 'create', resourceType: 'document', isGranted: true, conditions: [] },
        { action: 'read', resourceType: 'document', isGranted: true, conditions: [] },
        { action: 'update', resourceType: 'document', isGranted: true, conditions: [] },
        { action: 'approve', resourceType: 'document', isGranted: true, conditions: [] },
        { action: 'manage', resourceType: 'team', isGranted: true, conditions: [] }
      ]
    },
    {
      id: 'user',
      name: 'User',
      description: 'Creates and reads documents, updates own documents',
      isSystemRole: true,
      createdAt,
      permissions: [
        { action: 'create', resourceType: 'document', isGranted: true, conditions: [] },
        { action: 'read', resourceType: 'document', isGranted: true, conditions: [] },
        { action: 'update', resourceType: 'own_document', isGranted: true, conditions: [] }
      ]
    },
    {
      id: 'viewer',
      name: 'Viewer',
      description: 'Read-only access to documents',
      isSystemRole: true,
      createdAt,
      permissions: [
        { action: 'read', resourceType: 'document', isGranted: true, conditions: [] }
      ]
    }
  ];
}

/**
 * Built-in policies, present from construction
 */
export function createDefaultPolicies(createdAt: string): PermissionPolicy[] {
  return [
    {
      id: 'security-policy',
      name: 'Default Security Policy',
      description: 'Grants administrators full access and owners access to their resources',
      scope: 'global',
      priority: 'high',
      isActive: true,
      createdBy: 'system',
      createdAt,
      rules: [
        {
          id: 'admin-full-access',
          effect: 'allow',
          conditions: [{ type: 'userAttribute', attribute: 'role', operator: 'equals', value: 'admin' }]
        },
        {
          id: 'owner-access',
          effect: 'allow',
          conditions: [{ type: 'resourceAttribute', attribute: 'owner', operator: 'equals', value: '{{user.id}}' }]
        }
      ]
    }
  ];
}

function computePrincipal(
  principalId: string,
  assignments: readonly RoleAssignment[],
  directPermissions: readonly DirectPermission[],
  lastUpdated: string
): EffectivePermissions {
  const active = assignments.filter((a) => a.principalId === principalId && a.isActive);
  return {
    principalId,
    assignments: active,
    roleIds: active.map((a) => a.roleId),
    directPermissions: directPermissions.filter((p) => p.principalId === principalId),
    lastUpdated
  };
}

function computePrincipals(
  assignments: readonly RoleAssignment[],
  directPermissions: readonly DirectPermission[],
  lastUpdated: string
): Map<string, EffectivePermissions> {
  const ids = new Set<string>([
    ...assignments.map((a) => a.principalId),
    ...directPermissions.map((p) => p.principalId)
  ]);
  const principals = new Map<string, EffectivePermissions>();
  for (const id of ids) {
    principals.set(id, computePrincipal(id, assignments, directPermissions, lastUpdated));
  }
  return principals;
}

function withPrincipal(
  principals: ReadonlyMap<string, EffectivePermissions>,
  principalId: string,
  assignments: readonly RoleAssignment[],
  directPermissions: readonly DirectPermission[],
  lastUpdated: string
): Map<string, EffectivePermissions> {
  const next = new Map(principals);
  next.set(principalId, computePrincipal(principalId, assignments, directPermissions, lastUpdated));
  return next;
}

/**
 * Copy-on-write holder of the current snapshot
 */
export class PolicyStore {
  private current: PolicySnapshot;
  private seededRoles: Role[];
  private seededPolicies: PermissionPolicy[];

  constructor(seededAt: string) {
    this.seededRoles = createDefaultRoles(seededAt);
    this.seededPolicies = createDefaultPolicies(seededAt);
    this.current = {
      version: 0,
      roles: new Map(this.seededRoles.map((role) => [role.id, role])),
      policies: this.seededPolicies,
      assignments: [],
      directPermissions: [],
      resourcePermissions: new Map(),
      acls: [],
      principals: new Map()
    };
  }

  snapshot(): PolicySnapshot {
    return this.current;
  }

  get version(): number {
    return this.current.version;
  }

  private replace(changes: Partial<Omit<PolicySnapshot, 'version'>>): PolicySnapshot {
    this.current = { ...this.current, ...changes, version: this.current.version + 1 };
    return this.current;
  }

  putRole(role: Role): PolicySnapshot {
    const roles = new Map(this.current.roles);
    roles.set(role.id, role);
    return this.replace({ roles });
  }

  /**
   * Insert a policy, or replace the one with the same id in place
   */
  putPolicy(policy: PermissionPolicy): PolicySnapshot {
    const index = this.current.policies.findIndex((p) => p.id === policy.id);
    const policies = index === -1
      ? [...this.current.policies, policy]
      : this.current.policies.map((p, i) => (i === index ? policy : p));
    return this.replace({ policies });
  }

  /**
   * Insert an assignment, or replace the one with the same id in place
   */
  putAssignment(assignment: RoleAssignment, updatedAt: string): PolicySnapshot {
    const index = this.current.assignments.findIndex((a) => a.id === assignment.id);
    const assignments = index === -1
      ? [...this.current.assignments, assignment]
      : this.current.assignments.map((a, i) => (i === index ? assignment : a));
    const principals = withPrincipal(
      this.current.principals,
      assignment.principalId,
      assignments,
      this.current.directPermissions,
      updatedAt
    );
    return this.replace({ assignments, principals });
  }

  addDirectPermission(permission: DirectPermission, updatedAt: string): PolicySnapshot {
    const directPermissions = [...this.current.directPermissions, permission];
    const principals = withPrincipal(
      this.current.principals,
      permission.principalId,
      this.current.assignments,
      directPermissions,
      updatedAt
    );
    return this.replace({ directPermissions, principals });
  }

  removeDirectPermission(permission: DirectPermission, updatedAt: string): PolicySnapshot {
    const directPermissions = this.current.directPermissions.filter((p) => p.id !== permission.id);
    const principals = withPrincipal(
      this.current.principals,
      permission.principalId,
      this.current.assignments,
      directPermissions,
      updatedAt
    );
    return this.replace({ directPermissions, principals });
  }

  setResourcePermissions(permissions: ResourcePermissions): PolicySnapshot {
    const resourcePermissions = new Map(this.current.resourcePermissions);
    resourcePermissions.set(permissions.resourceId, permissions);
    return this.replace({ resourcePermissions });
  }

  addAccessControlList(acl: AccessControlList): PolicySnapshot {
    return this.replace({ acls: [...this.current.acls, acl] });
  }

  /**
   * Rebuild the snapshot from durable records on top of the seeded defaults.
   * Stored records never override a system role; a stored policy replaces the seeded one with its id.
   */
  load(records: PolicyStoreRecords, loadedAt: string): PolicySnapshot {
    const roles = new Map(this.seededRoles.map((role) => [role.id, role]));
    const storedRoles = [...records.roles].sort((a, b) => a.createdAt.localeCompare(b.createdAt));
    for (const role of storedRoles) {
      if (roles.get(role.id)?.isSystemRole) {
        continue;
      }
      roles.set(role.id, role);
    }

    const policies = [...this.seededPolicies];
    const storedPolicies = [...records.policies].sort((a, b) => a.createdAt.localeCompare(b.createdAt));
    for (const policy of storedPolicies) {
      const index = policies.findIndex((p) => p.id === policy.id);
      if (index === -1) {
        policies.push(policy);
      } else {
        policies[index] = policy;
      }
    }

    const assignments = [...records.assignments].sort((a, b) => a.assignedAt.localeCompare(b.assignedAt));
    const directPermissions = records.directPermissions
      .filter((permission) => permission.revokedAt === undefined)
      .sort((a, b) => a.grantedAt.localeCompare(b.grantedAt));
    const acls = [...records.acls].sort((a, b) => a.createdAt.localeCompare(b.createdAt));

    return this.replace({
      roles,
      policies,
      assignments,
      directPermissions,
      resourcePermissions: new Map(records.resourcePermissions.map((rp) => [rp.resourceId, rp])),
      acls,
      principals: computePrincipals(assignments, directPermissions, loadedAt)
    });
  }
}
