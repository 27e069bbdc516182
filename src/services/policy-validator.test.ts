import { PolicyValidator, validateConditions } from './policy-validator';
import { createDefaultPolicies, createDefaultRoles } from './policy-store';
import { PermissionPolicy } from '../types/permission';
import { InvalidRuleError } from '../types/permission-error';

const NOW = '2024-01-15T10:00:00.000Z';

function policyWith(overrides: Partial<PermissionPolicy>): PermissionPolicy {
  return {
    id: 'p-1',
    name: 'Finance Policy',
    description: 'Finance documents',
    scope: 'global',
    priority: 'normal',
    isActive: true,
    createdBy: 'admin-1',
    createdAt: NOW,
    rules: [
      {
        id: 'finance-read',
        effect: 'allow',
        conditions: [{ type: 'userAttribute', attribute: 'department', operator: 'equals', value: 'finance' }]
      }
    ],
    ...overrides
  };
}

describe('PolicyValidator', () => {
  const validator = new PolicyValidator();

  it('accepts the built-in policies and roles', () => {
    for (const policy of createDefaultPolicies(NOW)) {
      expect(validator.recordErrors('policy', policy)).toEqual([]);
    }
    for (const role of createDefaultRoles(NOW)) {
      expect(validator.recordErrors('role', role)).toEqual([]);
    }
  });

  it('rejects a condition with an empty attribute', () => {
    const policy = policyWith({
      rules: [{ id: 'r1', effect: 'allow', conditions: [{ type: 'userAttribute', attribute: ' ', operator: 'equals', value: 'x' }] }]
    });

    expect(() => validator.assertValidPolicy(policy)).toThrow(InvalidRuleError);
    expect(validator.recordErrors('policy', policy)).toEqual(['/rules/0/conditions/0 attribute must not be empty']);
  });

  it('rejects a condition with an empty value', () => {
    const policy = policyWith({
      rules: [{ id: 'r1', effect: 'deny', conditions: [{ type: 'contextual', attribute: 'sessionId', operator: 'equals', value: '' }] }]
    });

    expect(validator.recordErrors('policy', policy)).toEqual(['/rules/0/conditions/0 value must not be empty']);
  });

  it('rejects a matches condition whose pattern does not compile', () => {
    const policy = policyWith({
      rules: [{ id: 'r1', effect: 'allow', conditions: [{ type: 'environmental', attribute: 'clientIP', operator: 'matches', value: '[' }] }]
    });

    let thrown: unknown;
    try {
      validator.assertValidPolicy(policy);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(InvalidRuleError);
    expect(thrown instanceof InvalidRuleError && thrown.details).toHaveLength(1);
    expect(thrown instanceof InvalidRuleError && thrown.code).toBe('INVALID_RULE');
  });

  it('reports schema violations with their paths', () => {
    const record = { ...policyWith({}), priority: 'urgent' };

    expect(validator.recordErrors('policy', record)).toEqual(['/priority must be equal to one of the allowed values']);
  });

  it('rejects records of other kinds that miss required fields', () => {
    expect(validator.recordErrors('roleAssignment', { id: 'a-1', principalId: 'u1' }).length).toBeGreaterThan(0);
    expect(validator.recordErrors('auditLog', { id: 'l-1', sequence: -1 }).length).toBeGreaterThan(0);
  });

  it('accepts a well-formed role assignment', () => {
    expect(
      validator.recordErrors('roleAssignment', {
        id: 'a-1',
        principalId: 'u1',
        roleId: 'viewer',
        scope: 'global',
        assignedBy: 'admin-1',
        assignedAt: NOW,
        isActive: true
      })
    ).toEqual([]);
  });
});

describe('validateConditions', () => {
  it('prefixes every message with the given path', () => {
    expect(
      validateConditions([{ type: 'userAttribute', attribute: '', operator: 'equals', value: '' }], '/permissions/2')
    ).toEqual([
      '/permissions/2/conditions/0 attribute must not be empty',
      '/permissions/2/conditions/0 value must not be empty'
    ]);
  });
});
