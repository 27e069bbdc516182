/**
 * Permission Evaluator
 *
 * Walks the precedence chain for a single (principal, action, resource) request
 * against one store snapshot:
 * direct grant, role, policy, resource grant, ACL, then default deny.
 * The first step that yields a result decides.
 */

import {
  DecisionOutcome,
  PermissionAction,
  PermissionPolicy,
  PermissionResourceType,
  POLICY_PRIORITY_WEIGHT,
  PolicyResult,
  RoleAssignment
} from '../types/permission';
import { ConditionEvaluator, ConditionInput } from './condition-evaluator';
import { PolicySnapshot } from './policy-store';

/**
 * True when the assignment has an expiration date strictly before now
 */
export function isAssignmentExpired(assignment: RoleAssignment, now: Date): boolean {
  if (!assignment.expirationDate) {
    return false;
  }
  const expiresAt = Date.parse(assignment.expirationDate);
  return !Number.isNaN(expiresAt) && now.getTime() > expiresAt;
}

export function isAssignmentEffective(assignment: RoleAssignment, now: Date): boolean {
  return assignment.isActive && !isAssignmentExpired(assignment, now);
}

/**
 * Does a policy's scope cover the resource being evaluated
 */
export function policyScopeApplies(policy: PermissionPolicy, input: Pick<ConditionInput, 'resource' | 'context'>): boolean {
  if (policy.scope === 'global' || !policy.scopeId) {
    return true;
  }
  if (policy.scope === 'resource') {
    return input.resource?.id === policy.scopeId;
  }

  const attribute = `${policy.scope}Id`;
  const candidates = [input.resource?.attributes?.[attribute], input.context?.attributes?.[attribute]];
  return candidates.some((value) =>
    Array.isArray(value) ? value.includes(policy.scopeId ?? '') : value !== undefined && String(value) === policy.scopeId
  );
}

/**
 * Highest priority first. Stable under Array.prototype.sort.
 */
export function comparePolicyPriority(a: PermissionPolicy, b: PermissionPolicy): number {
  return POLICY_PRIORITY_WEIGHT[b.priority] - POLICY_PRIORITY_WEIGHT[a.priority];
}

/**
 * Active policies whose scope applies, highest priority first.
 * Policies of equal priority keep their creation order.
 */
export function getApplicablePolicies(
  snapshot: PolicySnapshot,
  input: Pick<ConditionInput, 'resource' | 'context'>
): PermissionPolicy[] {
  return snapshot.policies
    .filter((policy) => policy.isActive && policyScopeApplies(policy, input))
    .sort(comparePolicyPriority);
}

export class PermissionEvaluator {
  private conditions: ConditionEvaluator;

  constructor(conditions: ConditionEvaluator) {
    this.conditions = conditions;
  }

  async evaluate(snapshot: PolicySnapshot, action: PermissionAction, input: ConditionInput): Promise<DecisionOutcome> {
    const direct = await this.checkDirect(snapshot, action, input);
    if (direct !== undefined) {
      return { granted: direct, source: 'direct', applicablePolicies: [] };
    }

    const role = await this.checkRoles(snapshot, action, input);
    if (role !== undefined) {
      return { granted: role, source: 'role', applicablePolicies: [] };
    }

    const applicable = getApplicablePolicies(snapshot, input);
    const applicablePolicies = applicable.map((policy) => policy.id);
    for (const policy of applicable) {
      const { result, ruleId } = await this.evaluatePolicy(policy, input);
      if (result !== 'not_applicable') {
        return {
          granted: result === 'granted',
          source: 'policy',
          applicablePolicies,
          decidingPolicyId: policy.id,
          decidingRuleId: ruleId
        };
      }
    }

    const resource = await this.checkResourceGrants(snapshot, action, input);
    if (resource !== undefined) {
      return { granted: resource, source: 'resource', applicablePolicies };
    }

    const acl = this.checkAccessControlLists(snapshot, action, input);
    if (acl !== undefined) {
      return { granted: acl, source: 'acl', applicablePolicies };
    }

    return { granted: false, source: 'default', applicablePolicies };
  }

  /**
   * 'any' matches every resource; 'own_document' matches a document whose owner is the principal
   */
  async resourceTypeMatches(resourceType: PermissionResourceType, input: ConditionInput): Promise<boolean> {
    const resource = input.resource;
    if (!resource) {
      return false;
    }
    if (resourceType === 'any') {
      return true;
    }
    if (resourceType === 'own_document') {
      if (resource.type !== 'document') {
        return false;
      }
      const attributes = await input.getResourceAttributes();
      return attributes.owner === input.principalId;
    }
    return resourceType === resource.type;
  }

  private async checkDirect(
    snapshot: PolicySnapshot,
    action: PermissionAction,
    input: ConditionInput
  ): Promise<boolean | undefined> {
    const grants = snapshot.principals.get(input.principalId)?.directPermissions ?? [];
    for (const grant of grants) {
      if (grant.action !== action) {
        continue;
      }
      const applies = grant.resourceId !== undefined
        ? grant.resourceId === input.resource?.id
        : await this.resourceTypeMatches(grant.resourceType, input);
      if (applies) {
        return grant.isGranted;
      }
    }
    return undefined;
  }

  private async checkRoles(
    snapshot: PolicySnapshot,
    action: PermissionAction,
    input: ConditionInput
  ): Promise<boolean | undefined> {
    const assignments = snapshot.principals.get(input.principalId)?.assignments ?? [];
    for (const assignment of assignments) {
      if (!isAssignmentEffective(assignment, input.now)) {
        continue;
      }
      const role = snapshot.roles.get(assignment.roleId);
      if (!role) {
        continue;
      }
      for (const permission of role.permissions) {
        if (permission.action !== action) {
          continue;
        }
        if (!(await this.resourceTypeMatches(permission.resourceType, input))) {
          continue;
        }
        if (await this.conditions.evaluateAll(permission.conditions, input)) {
          return permission.isGranted;
        }
      }
    }
    return undefined;
  }

  /**
   * Rules are tried in order; a rule decides only when all of its conditions hold
   */
  async evaluatePolicy(
    policy: PermissionPolicy,
    input: ConditionInput
  ): Promise<{ result: PolicyResult; ruleId?: string }> {
    for (const rule of policy.rules) {
      if (await this.conditions.evaluateAll(rule.conditions, input)) {
        return { result: rule.effect === 'allow' ? 'granted' : 'denied', ruleId: rule.id };
      }
    }
    return { result: 'not_applicable' };
  }

  private async checkResourceGrants(
    snapshot: PolicySnapshot,
    action: PermissionAction,
    input: ConditionInput
  ): Promise<boolean | undefined> {
    const resourceId = input.resource?.id;
    if (resourceId === undefined) {
      return undefined;
    }
    const grants = snapshot.resourcePermissions.get(resourceId)?.permissions ?? [];
    for (const grant of grants) {
      if (grant.action !== action || grant.principalId !== input.principalId) {
        continue;
      }
      if (await this.conditions.evaluateAll(grant.conditions, input)) {
        return grant.isGranted;
      }
    }
    return undefined;
  }

  private checkAccessControlLists(
    snapshot: PolicySnapshot,
    action: PermissionAction,
    input: ConditionInput
  ): boolean | undefined {
    const resourceId = input.resource?.id;
    for (const acl of snapshot.acls) {
      if (acl.resourceId !== resourceId) {
        continue;
      }
      const entry = acl.entries.find((e) => e.principalId === input.principalId && e.action === action);
      if (entry) {
        return entry.isGranted;
      }
    }
    return undefined;
  }
}
