import * as fc from 'fast-check';
import {
  getApplicablePolicies,
  isAssignmentEffective,
  isAssignmentExpired,
  PermissionEvaluator,
  policyScopeApplies
} from './permission-evaluator';
import { ConditionEvaluator, StaticAttributeProvider } from './condition-evaluator';
import { PolicyStore } from './policy-store';
import {
  DirectPermission,
  PermissionAction,
  PermissionPolicy,
  PermissionResource,
  RoleAssignment
} from '../types/permission';
import { createManualClock, permissionActionArb } from '../test/generators';

const NOW = '2024-01-15T10:00:00.000Z';

function assignment(principalId: string, roleId: string, overrides: Partial<RoleAssignment> = {}): RoleAssignment {
  return {
    id: `${principalId}-${roleId}`,
    principalId,
    roleId,
    scope: 'global',
    assignedBy: 'admin-1',
    assignedAt: NOW,
    isActive: true,
    ...overrides
  };
}

function directPermission(overrides: Partial<DirectPermission> & Pick<DirectPermission, 'id' | 'principalId'>): DirectPermission {
  return {
    action: 'read',
    resourceType: 'document',
    isGranted: true,
    grantedBy: 'admin-1',
    grantedAt: NOW,
    ...overrides
  };
}

function policy(overrides: Partial<PermissionPolicy> & Pick<PermissionPolicy, 'id'>): PermissionPolicy {
  return {
    name: overrides.id,
    description: '',
    rules: [],
    scope: 'global',
    priority: 'normal',
    isActive: true,
    createdBy: 'admin-1',
    createdAt: NOW,
    ...overrides
  };
}

const report: PermissionResource = { id: 'report-1', type: 'document' };

describe('PermissionEvaluator', () => {
  let store: PolicyStore;
  let provider: StaticAttributeProvider;
  let conditions: ConditionEvaluator;
  let evaluator: PermissionEvaluator;

  beforeEach(() => {
    store = new PolicyStore(NOW);
    provider = new StaticAttributeProvider();
    conditions = new ConditionEvaluator(provider, createManualClock(NOW));
    evaluator = new PermissionEvaluator(conditions);
  });

  function evaluate(principalId: string, action: PermissionAction, resource = report) {
    return evaluator.evaluate(store.snapshot(), action, conditions.createInput(principalId, resource));
  }

  describe('roles', () => {
    it('grants a viewer read access to documents', async () => {
      store.putAssignment(assignment('u1', 'viewer'), NOW);

      await expect(evaluate('u1', 'read')).resolves.toEqual({ granted: true, source: 'role', applicablePolicies: [] });
    });

    it('denies a viewer by default when no step decides', async () => {
      store.putAssignment(assignment('u1', 'viewer'), NOW);

      await expect(evaluate('u1', 'delete')).resolves.toEqual({
        granted: false,
        source: 'default',
        applicablePolicies: ['security-policy']
      });
    });

    it('grants a manager approval of documents', async () => {
      store.putAssignment(assignment('u1', 'manager'), NOW);

      await expect(evaluate('u1', 'approve')).resolves.toMatchObject({ granted: true, source: 'role' });
    });

    it('admin role grants every core action on any resource type', async () => {
      store.putAssignment(assignment('u1', 'admin'), NOW);

      for (const action of ['create', 'read', 'update', 'delete', 'manage'] as const) {
        await expect(evaluate('u1', action, { id: 'team-1', type: 'team' })).resolves.toMatchObject({
          granted: true,
          source: 'role'
        });
      }
    });

    it('own_document applies only to documents owned by the principal', async () => {
      store.putAssignment(assignment('u1', 'user'), NOW);

      await expect(
        evaluate('u1', 'update', { id: 'doc-1', type: 'document', attributes: { owner: 'u1' } })
      ).resolves.toMatchObject({ granted: true, source: 'role' });
      await expect(
        evaluate('u1', 'update', { id: 'doc-2', type: 'document', attributes: { owner: 'u2' } })
      ).resolves.toMatchObject({ granted: false, source: 'default' });
    });

    it('skips revoked and expired assignments', async () => {
      store.putAssignment(assignment('u1', 'viewer', { id: 'a-1', isActive: false, revokedAt: NOW }), NOW);
      store.putAssignment(assignment('u1', 'viewer', { id: 'a-2', expirationDate: '2024-01-15T09:59:59.999Z' }), NOW);

      await expect(evaluate('u1', 'read')).resolves.toMatchObject({ granted: false, source: 'default' });
    });

    it('applies the conditions of a role permission', async () => {
      store.putRole({
        id: 'finance-reader',
        name: 'Finance Reader',
        description: '',
        isSystemRole: false,
        createdAt: NOW,
        permissions: [
          {
            action: 'read',
            resourceType: 'document',
            isGranted: true,
            conditions: [{ type: 'resourceAttribute', attribute: 'department', operator: 'equals', value: 'finance' }]
          }
        ]
      });
      store.putAssignment(assignment('u1', 'finance-reader'), NOW);

      await expect(
        evaluate('u1', 'read', { id: 'doc-f', type: 'document', attributes: { department: 'finance' } })
      ).resolves.toMatchObject({ granted: true, source: 'role' });
      await expect(
        evaluate('u1', 'read', { id: 'doc-s', type: 'document', attributes: { department: 'sales' } })
      ).resolves.toMatchObject({ granted: false, source: 'default' });
    });
  });

  describe('direct permissions', () => {
    it('a direct denial takes precedence over a role grant', async () => {
      store.putAssignment(assignment('u1', 'viewer'), NOW);
      store.addDirectPermission(directPermission({ id: 'd-1', principalId: 'u1', isGranted: false }), NOW);

      await expect(evaluate('u1', 'read')).resolves.toEqual({ granted: false, source: 'direct', applicablePolicies: [] });
    });

    it('a grant bound to a resource id applies to that resource only', async () => {
      store.addDirectPermission(
        directPermission({ id: 'd-1', principalId: 'u1', action: 'share', resourceId: 'report-1' }),
        NOW
      );

      await expect(evaluate('u1', 'share')).resolves.toMatchObject({ granted: true, source: 'direct' });
      await expect(evaluate('u1', 'share', { id: 'report-2', type: 'document' })).resolves.toMatchObject({
        granted: false,
        source: 'default'
      });
    });
  });

  describe('policies', () => {
    it('the built-in policy grants principals whose role attribute is admin', async () => {
      provider.setUserAttributes('u-admin', { role: 'admin' });

      await expect(evaluate('u-admin', 'delete')).resolves.toEqual({
        granted: true,
        source: 'policy',
        applicablePolicies: ['security-policy'],
        decidingPolicyId: 'security-policy',
        decidingRuleId: 'admin-full-access'
      });
    });

    it('the built-in policy grants owners access to their resources', async () => {
      await expect(
        evaluate('u1', 'download', { id: 'doc-1', type: 'document', attributes: { owner: 'u1' } })
      ).resolves.toMatchObject({ granted: true, source: 'policy', decidingRuleId: 'owner-access' });
    });

    it('a higher priority deny wins over a lower priority allow', async () => {
      provider.setUserAttributes('u-admin', { role: 'admin', department: 'contractors' });
      store.putPolicy(
        policy({
          id: 'deny-contractors',
          priority: 'critical',
          rules: [
            {
              id: 'contractors',
              effect: 'deny',
              conditions: [{ type: 'userAttribute', attribute: 'department', operator: 'equals', value: 'contractors' }]
            }
          ]
        })
      );

      await expect(evaluate('u-admin', 'read')).resolves.toEqual({
        granted: false,
        source: 'policy',
        applicablePolicies: ['deny-contractors', 'security-policy'],
        decidingPolicyId: 'deny-contractors',
        decidingRuleId: 'contractors'
      });
    });

    it('inactive policies are ignored', async () => {
      provider.setUserAttributes('u-admin', { role: 'admin' });
      store.putPolicy({ ...store.snapshot().policies[0], isActive: false });

      await expect(evaluate('u-admin', 'delete')).resolves.toEqual({
        granted: false,
        source: 'default',
        applicablePolicies: []
      });
    });
  });

  describe('resource grants and ACLs', () => {
    it('a resource grant decides when its conditions hold', async () => {
      store.setResourcePermissions({
        resourceId: 'report-1',
        resourceType: 'document',
        inheritFromParent: true,
        setBy: 'admin-1',
        setAt: NOW,
        permissions: [
          {
            principalId: 'u5',
            principalType: 'user',
            action: 'share',
            isGranted: true,
            conditions: [{ type: 'temporal', attribute: 'hour', operator: 'less_than', value: '18' }]
          }
        ]
      });

      await expect(evaluate('u5', 'share')).resolves.toEqual({
        granted: true,
        source: 'resource',
        applicablePolicies: ['security-policy']
      });
      await expect(evaluate('u6', 'share')).resolves.toMatchObject({ granted: false, source: 'default' });
    });

    it('a resource grant whose conditions fail falls through to the ACL', async () => {
      store.setResourcePermissions({
        resourceId: 'report-1',
        resourceType: 'document',
        inheritFromParent: false,
        setBy: 'admin-1',
        setAt: NOW,
        permissions: [
          {
            principalId: 'u5',
            principalType: 'user',
            action: 'share',
            isGranted: true,
            conditions: [{ type: 'temporal', attribute: 'hour', operator: 'greater_than', value: '18' }]
          }
        ]
      });
      store.addAccessControlList({
        id: 'acl-1',
        resourceId: 'report-1',
        resourceType: 'document',
        entries: [{ principalId: 'u5', principalType: 'user', action: 'share', isGranted: false }],
        inheritanceRules: [],
        createdBy: 'admin-1',
        createdAt: NOW
      });

      await expect(evaluate('u5', 'share')).resolves.toMatchObject({ granted: false, source: 'acl' });
    });

    it('the earliest ACL with a matching entry decides', async () => {
      for (const [id, isGranted] of [['acl-1', true], ['acl-2', false]] as const) {
        store.addAccessControlList({
          id,
          resourceId: 'report-1',
          resourceType: 'document',
          entries: [{ principalId: 'u5', principalType: 'user', action: 'upload', isGranted }],
          inheritanceRules: [],
          createdBy: 'admin-1',
          createdAt: NOW
        });
      }

      await expect(evaluate('u5', 'upload')).resolves.toMatchObject({ granted: true, source: 'acl' });
    });
  });

  it('a principal with no grants SHALL be denied every action', async () => {
    await fc.assert(
      fc.asyncProperty(permissionActionArb(), async (action) => {
        const outcome = await evaluate('nobody', action);
        expect(outcome.granted).toBe(false);
        expect(outcome.source).toBe('default');
      }),
      { numRuns: 50 }
    );
  });
});

describe('assignment expiry', () => {
  const now = new Date(NOW);

  it('an assignment expires strictly after its expiration date', () => {
    expect(isAssignmentExpired(assignment('u1', 'viewer', { expirationDate: NOW }), now)).toBe(false);
    expect(isAssignmentExpired(assignment('u1', 'viewer', { expirationDate: '2024-01-15T09:00:00.000Z' }), now)).toBe(true);
    expect(isAssignmentExpired(assignment('u1', 'viewer'), now)).toBe(false);
  });

  it('a revoked assignment is never effective', () => {
    expect(isAssignmentEffective(assignment('u1', 'viewer', { isActive: false }), now)).toBe(false);
    expect(isAssignmentEffective(assignment('u1', 'viewer'), now)).toBe(true);
  });
});

describe('policy scope', () => {
  const departmentPolicy = policy({ id: 'eng', scope: 'department', scopeId: 'engineering' });

  it('global and unscoped policies always apply', () => {
    expect(policyScopeApplies(policy({ id: 'g' }), {})).toBe(true);
    expect(policyScopeApplies(policy({ id: 'd', scope: 'department' }), {})).toBe(true);
  });

  it('resource scope matches the resource id', () => {
    const scoped = policy({ id: 'r', scope: 'resource', scopeId: 'report-1' });

    expect(policyScopeApplies(scoped, { resource: report })).toBe(true);
    expect(policyScopeApplies(scoped, { resource: { id: 'report-2', type: 'document' } })).toBe(false);
  });

  it('other scopes match the scope id attribute of the resource or the context', () => {
    expect(
      policyScopeApplies(departmentPolicy, {
        resource: { id: 'doc-1', type: 'document', attributes: { departmentId: 'engineering' } }
      })
    ).toBe(true);
    expect(policyScopeApplies(departmentPolicy, { context: { attributes: { departmentId: ['sales', 'engineering'] } } })).toBe(true);
    expect(policyScopeApplies(departmentPolicy, { resource: report })).toBe(false);
  });

  it('orders applicable policies by priority and keeps creation order within a priority', () => {
    const store = new PolicyStore(NOW);
    store.putPolicy(policy({ id: 'low', priority: 'low' }));
    store.putPolicy(policy({ id: 'normal-a' }));
    store.putPolicy(policy({ id: 'critical', priority: 'critical' }));
    store.putPolicy(policy({ id: 'normal-b' }));
    store.putPolicy(departmentPolicy);

    expect(getApplicablePolicies(store.snapshot(), { resource: report }).map((p) => p.id)).toEqual([
      'critical',
      'security-policy',
      'normal-a',
      'normal-b',
      'low'
    ]);
  });
});
