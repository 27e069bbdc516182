/**
 * Permission Administration Service
 *
 * Mutations of roles, assignments, policies and grants. Every operation runs
 * on a single-writer queue and follows the same steps:
 * 1. Validate against the current snapshot
 * 2. Persist (a failure leaves store and cache untouched)
 * 3. Apply the store change and the cache invalidation without yielding
 * 4. Append the change to the audit log
 */

import {
  AccessControlList,
  AssignRoleInput,
  CreateAccessControlListInput,
  CreatePolicyInput,
  CreateRoleInput,
  DirectPermission,
  GrantDirectPermissionInput,
  PermissionPolicy,
  ResourcePermissions,
  RevokeDirectPermissionInput,
  RevokeRoleInput,
  Role,
  RoleAssignment,
  SetResourcePermissionsInput,
  UpdatePolicyInput,
  UpdateRoleInput
} from '../types/permission';
import { InvalidRuleError, NotFoundError } from '../types/permission-error';
import { PermissionAuditAction } from '../types/permission-audit';
import {
  PermissionEntityKind,
  PermissionEntityMap,
  PermissionStore
} from '../repositories/permission-store';
import { Clock, systemClock } from '../utils/clock';
import { generateUUID } from '../utils/uuid';
import { SerialQueue } from '../utils/serial-queue';
import { DecisionCache } from './decision-cache';
import { PermissionAuditService } from './permission-audit';
import { isAssignmentEffective } from './permission-evaluator';
import { PolicyStore } from './policy-store';
import { PolicyValidator, policyValidator, validateConditions } from './policy-validator';

export interface PermissionAdminDeps {
  store: PermissionStore;
  policyStore: PolicyStore;
  cache: DecisionCache;
  audit: PermissionAuditService;
  clock?: Clock;
  validator?: PolicyValidator;
}

export class PermissionAdminService {
  private store: PermissionStore;
  private policyStore: PolicyStore;
  private cache: DecisionCache;
  private audit: PermissionAuditService;
  private clock: Clock;
  private validator: PolicyValidator;
  private mutations = new SerialQueue();

  constructor(deps: PermissionAdminDeps) {
    this.store = deps.store;
    this.policyStore = deps.policyStore;
    this.cache = deps.cache;
    this.audit = deps.audit;
    this.clock = deps.clock ?? systemClock;
    this.validator = deps.validator ?? policyValidator;
  }

  private now(): string {
    return this.clock.now().toISOString();
  }

  private recordChange(action: PermissionAuditAction, userId: string, changedBy: string, details: string, resource?: string): void {
    this.audit.record({
      userId,
      action,
      ...(resource !== undefined && { resource }),
      result: 'granted',
      context: { changedBy, details }
    });
  }

  // ==========================================================================
  // Roles
  // ==========================================================================

  /**
   * Assign a role. Every call creates a new assignment, even when an active
   * assignment of the same role already exists.
   */
  assignRole(input: AssignRoleInput): Promise<RoleAssignment> {
    return this.mutations.run(async () => {
      if (!this.policyStore.snapshot().roles.has(input.roleId)) {
        throw new NotFoundError('Role', input.roleId);
      }

      const assignedAt = this.now();
      const assignment: RoleAssignment = {
        id: generateUUID(),
        principalId: input.principalId,
        roleId: input.roleId,
        scope: input.scope ?? 'global',
        assignedBy: input.assignedBy,
        assignedAt,
        isActive: true
      };
      if (input.expirationDate !== undefined) {
        assignment.expirationDate = input.expirationDate;
      }

      await this.store.save('roleAssignment', assignment);

      this.policyStore.putAssignment(assignment, assignedAt);
      this.cache.clearForPrincipal(input.principalId);

      this.recordChange(
        'role_assigned',
        input.principalId,
        input.assignedBy,
        `Role ${input.roleId} assigned to ${input.principalId}`
      );
      return assignment;
    });
  }

  /**
   * Revoke the earliest assignment of the role that is still in effect, or the
   * earliest active but expired one when none is. Revocation is terminal.
   */
  revokeRole(input: RevokeRoleInput): Promise<RoleAssignment> {
    return this.mutations.run(async () => {
      const now = this.clock.now();
      const candidates = this.policyStore
        .snapshot()
        .assignments.filter((a) => a.principalId === input.principalId && a.roleId === input.roleId && a.isActive);
      const existing = candidates.find((a) => isAssignmentEffective(a, now)) ?? candidates[0];
      if (!existing) {
        throw new NotFoundError('RoleAssignment', `${input.principalId}/${input.roleId}`);
      }

      const revokedAt = now.toISOString();
      const revoked: RoleAssignment = {
        ...existing,
        isActive: false,
        revokedAt,
        revokedBy: input.revokedBy
      };
      if (input.reason !== undefined) {
        revoked.revocationReason = input.reason;
      }

      await this.store.save('roleAssignment', revoked);

      this.policyStore.putAssignment(revoked, revokedAt);
      this.cache.clearForPrincipal(input.principalId);

      this.recordChange(
        'role_revoked',
        input.principalId,
        input.revokedBy,
        `Role ${input.roleId} revoked from ${input.principalId}${input.reason ? `: ${input.reason}` : ''}`
      );
      return revoked;
    });
  }

  createRole(input: CreateRoleInput): Promise<Role> {
    return this.mutations.run(async () => {
      const existing = this.policyStore.snapshot().roles.get(input.id);
      if (existing) {
        throw new InvalidRuleError([
          existing.isSystemRole ? `System role ${input.id} cannot be redefined` : `Role already exists: ${input.id}`
        ]);
      }

      const role: Role = {
        id: input.id,
        name: input.name,
        description: input.description,
        permissions: input.permissions,
        isSystemRole: false,
        createdAt: this.now()
      };
      this.validator.assertValidRole(role);

      await this.store.save('role', role);

      this.policyStore.putRole(role);
      this.cache.clearAll();

      this.recordChange('role_created', input.createdBy, input.createdBy, `Role ${role.id} created`);
      return role;
    });
  }

  updateRole(input: UpdateRoleInput): Promise<Role> {
    return this.mutations.run(async () => {
      const existing = this.policyStore.snapshot().roles.get(input.roleId);
      if (!existing) {
        throw new NotFoundError('Role', input.roleId);
      }
      if (existing.isSystemRole) {
        throw new InvalidRuleError([`System role ${input.roleId} cannot be modified`]);
      }

      const role: Role = {
        ...existing,
        name: input.name ?? existing.name,
        description: input.description ?? existing.description,
        permissions: input.permissions ?? existing.permissions
      };
      this.validator.assertValidRole(role);

      await this.store.save('role', role);

      this.policyStore.putRole(role);
      this.cache.clearAll();

      this.recordChange('role_updated', input.modifiedBy, input.modifiedBy, `Role ${role.id} updated`);
      return role;
    });
  }

  // ==========================================================================
  // Policies
  // ==========================================================================

  createPolicy(input: CreatePolicyInput): Promise<PermissionPolicy> {
    return this.mutations.run(async () => {
      const policy: PermissionPolicy = {
        id: generateUUID(),
        name: input.name,
        description: input.description,
        rules: input.rules,
        scope: input.scope,
        priority: input.priority ?? 'normal',
        isActive: input.isActive ?? true,
        createdBy: input.createdBy,
        createdAt: this.now()
      };
      if (input.scopeId !== undefined) {
        policy.scopeId = input.scopeId;
      }
      this.validator.assertValidPolicy(policy);

      await this.store.save('policy', policy);

      this.policyStore.putPolicy(policy);
      this.cache.clearAll();

      this.recordChange('policy_created', input.createdBy, input.createdBy, `Policy ${policy.name} created`);
      return policy;
    });
  }

  updatePolicy(input: UpdatePolicyInput): Promise<PermissionPolicy> {
    return this.mutations.run(async () => {
      const existing = this.policyStore.snapshot().policies.find((p) => p.id === input.policyId);
      if (!existing) {
        throw new NotFoundError('PermissionPolicy', input.policyId);
      }

      const policy: PermissionPolicy = {
        ...existing,
        name: input.name ?? existing.name,
        description: input.description ?? existing.description,
        rules: input.rules ?? existing.rules,
        isActive: input.isActive ?? existing.isActive,
        modifiedBy: input.modifiedBy,
        modifiedAt: this.now()
      };
      this.validator.assertValidPolicy(policy);

      await this.store.save('policy', policy);

      this.policyStore.putPolicy(policy);
      this.cache.clearAll();

      this.recordChange('policy_updated', input.modifiedBy, input.modifiedBy, `Policy ${policy.name} updated`);
      return policy;
    });
  }

  // ==========================================================================
  // Resource Grants and ACLs
  // ==========================================================================

  setResourcePermissions(input: SetResourcePermissionsInput): Promise<ResourcePermissions> {
    return this.mutations.run(() => this.applyResourcePermissions(input));
  }

  /**
   * Copy the parent's grant set onto the child
   */
  inheritResourcePermissions(childResourceId: string, parentResourceId: string, inheritedBy: string): Promise<ResourcePermissions> {
    return this.mutations.run(async () => {
      const parent = this.policyStore.snapshot().resourcePermissions.get(parentResourceId);
      if (!parent) {
        throw new NotFoundError('ParentResource', parentResourceId);
      }

      return this.applyResourcePermissions({
        resourceId: childResourceId,
        resourceType: parent.resourceType,
        permissions: parent.permissions.map((grant) => ({ ...grant, conditions: [...grant.conditions] })),
        inheritFromParent: true,
        setBy: inheritedBy
      });
    });
  }

  private async applyResourcePermissions(input: SetResourcePermissionsInput): Promise<ResourcePermissions> {
    const errors = input.permissions.flatMap((grant, index) => validateConditions(grant.conditions, `/permissions/${index}`));
    if (errors.length > 0) {
      throw new InvalidRuleError(errors);
    }

    const permissions: ResourcePermissions = {
      resourceId: input.resourceId,
      resourceType: input.resourceType,
      permissions: input.permissions,
      inheritFromParent: input.inheritFromParent ?? true,
      setBy: input.setBy,
      setAt: this.now()
    };

    await this.store.save('resourcePermissions', permissions);

    this.policyStore.setResourcePermissions(permissions);
    this.cache.clearForResource(input.resourceId);

    this.recordChange(
      'resource_permissions_set',
      input.setBy,
      input.setBy,
      `Permissions set for resource ${input.resourceId} of type ${input.resourceType}`,
      input.resourceId
    );
    return permissions;
  }

  createAccessControlList(input: CreateAccessControlListInput): Promise<AccessControlList> {
    return this.mutations.run(async () => {
      const inheritanceRules = input.inheritanceRules ?? [];
      const errors = inheritanceRules.flatMap((rule, index) =>
        validateConditions(rule.conditions, `/inheritanceRules/${index}`)
      );
      if (errors.length > 0) {
        throw new InvalidRuleError(errors);
      }

      const acl: AccessControlList = {
        id: generateUUID(),
        resourceId: input.resourceId,
        resourceType: input.resourceType,
        entries: input.entries,
        inheritanceRules,
        createdBy: input.createdBy,
        createdAt: this.now()
      };

      await this.store.save('acl', acl);

      this.policyStore.addAccessControlList(acl);
      this.cache.clearForResource(input.resourceId);

      this.recordChange(
        'acl_created',
        input.createdBy,
        input.createdBy,
        `ACL created for resource ${input.resourceId} with ${input.entries.length} entries`,
        input.resourceId
      );
      return acl;
    });
  }

  // ==========================================================================
  // Direct Permissions
  // ==========================================================================

  grantDirectPermission(input: GrantDirectPermissionInput): Promise<DirectPermission> {
    return this.mutations.run(async () => {
      const grantedAt = this.now();
      const permission: DirectPermission = {
        id: generateUUID(),
        principalId: input.principalId,
        action: input.action,
        resourceType: input.resourceType,
        isGranted: input.isGranted,
        grantedBy: input.grantedBy,
        grantedAt
      };
      if (input.resourceId !== undefined) {
        permission.resourceId = input.resourceId;
      }

      await this.store.save('directPermission', permission);

      this.policyStore.addDirectPermission(permission, grantedAt);
      this.cache.clearForPrincipal(input.principalId);

      this.recordChange(
        'direct_permission_granted',
        input.principalId,
        input.grantedBy,
        `${input.isGranted ? 'Grant' : 'Denial'} of ${input.action} on ${input.resourceId ?? input.resourceType} for ${input.principalId}`,
        input.resourceId
      );
      return permission;
    });
  }

  revokeDirectPermission(input: RevokeDirectPermissionInput): Promise<DirectPermission> {
    return this.mutations.run(async () => {
      const existing = this.policyStore
        .snapshot()
        .directPermissions.find((p) => p.id === input.permissionId && p.principalId === input.principalId);
      if (!existing) {
        throw new NotFoundError('DirectPermission', input.permissionId);
      }

      const revokedAt = this.now();
      const revoked: DirectPermission = { ...existing, revokedAt, revokedBy: input.revokedBy };

      await this.store.save('directPermission', revoked);

      this.policyStore.removeDirectPermission(existing, revokedAt);
      this.cache.clearForPrincipal(input.principalId);

      this.recordChange(
        'direct_permission_revoked',
        input.principalId,
        input.revokedBy,
        `Direct permission ${existing.id} revoked from ${input.principalId}`,
        existing.resourceId
      );
      return revoked;
    });
  }

  // ==========================================================================
  // Reload
  // ==========================================================================

  private async fetchValid<K extends PermissionEntityKind>(kind: K): Promise<PermissionEntityMap[K][]> {
    const records = await this.store.fetchAll(kind);
    return records.filter((record) => {
      const errors = this.validator.recordErrors(kind, record);
      if (errors.length > 0) {
        console.warn(`Skipping invalid ${kind} record:`, errors);
        return false;
      }
      return true;
    });
  }

  /**
   * Rebuild the in-memory store from durable records on top of the built-in defaults
   */
  refresh(refreshedBy = 'system'): Promise<void> {
    return this.mutations.run(async () => {
      const [roles, policies, assignments, directPermissions, resourcePermissions, acls, auditLogs] = await Promise.all([
        this.fetchValid('role'),
        this.fetchValid('policy'),
        this.fetchValid('roleAssignment'),
        this.fetchValid('directPermission'),
        this.fetchValid('resourcePermissions'),
        this.fetchValid('acl'),
        this.fetchValid('auditLog')
      ]);

      const loadedAt = this.now();
      this.policyStore.load({ roles, policies, assignments, directPermissions, resourcePermissions, acls }, loadedAt);
      this.cache.clearAll();
      this.audit.restore(auditLogs);

      this.recordChange(
        'store_refreshed',
        refreshedBy,
        refreshedBy,
        `Loaded ${roles.length} roles, ${policies.length} policies and ${assignments.length} role assignments`
      );
    });
  }
}
