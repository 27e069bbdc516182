/**
 * Permission type definitions.
 * Defines principals' grants, roles, policies, resource grants and access control
 * lists consumed by the evaluation engine.
 */

// ============================================================================
// Actions and Resources
// ============================================================================

export const PERMISSION_ACTIONS = [
  'create',
  'read',
  'update',
  'delete',
  'approve',
  'reject',
  'share',
  'download',
  'upload',
  'manage',
  'admin'
] as const;

export type PermissionAction = typeof PERMISSION_ACTIONS[number];

export const RESOURCE_TYPES = ['document', 'folder', 'user', 'team', 'project', 'system'] as const;

export type ResourceType = typeof RESOURCE_TYPES[number];

/**
 * Resource type a permission is scoped to.
 * 'any' is a wildcard; 'own_document' is a document owned by the principal.
 */
export type PermissionResourceType = ResourceType | 'any' | 'own_document';

export const PERMISSION_SCOPES = ['global', 'organization', 'department', 'team', 'project', 'resource'] as const;

export type PermissionScope = typeof PERMISSION_SCOPES[number];

export type PrincipalType = 'user' | 'group' | 'role' | 'system';

export type AttributeValue = string | number | boolean | string[];

export type AttributeBag = Record<string, AttributeValue>;

/**
 * Target of an authorization decision
 */
export interface PermissionResource {
  id: string;
  type: ResourceType;
  attributes?: AttributeBag;
}

/**
 * Request-time information supplied by the caller
 */
export interface PermissionContext {
  requestTime?: string;
  clientIP?: string;
  userAgent?: string;
  deviceId?: string;
  location?: string;
  sessionId?: string;
  attributes?: AttributeBag;
}

// ============================================================================
// Conditions
// ============================================================================

export const CONDITION_TYPES = [
  'userAttribute',
  'resourceAttribute',
  'contextual',
  'temporal',
  'environmental'
] as const;

export type ConditionType = typeof CONDITION_TYPES[number];

export const CONDITION_OPERATORS = [
  'equals',
  'not_equals',
  'contains',
  'not_contains',
  'in',
  'not_in',
  'greater_than',
  'less_than',
  'matches'
] as const;

export type ConditionOperator = typeof CONDITION_OPERATORS[number];

export interface PermissionCondition {
  type: ConditionType;
  attribute: string;
  operator: ConditionOperator;
  value: string;
}

// ============================================================================
// Roles
// ============================================================================

/**
 * Atomic grant/deny statement scoped to a resource type
 */
export interface Permission {
  action: PermissionAction;
  resourceType: PermissionResourceType;
  isGranted: boolean;
  conditions: PermissionCondition[];
}

export interface Role {
  id: string;
  name: string;
  description: string;
  permissions: Permission[];
  isSystemRole: boolean;
  createdAt: string;
}

export interface RoleAssignment {
  id: string;
  principalId: string;
  roleId: string;
  scope: PermissionScope;
  assignedBy: string;
  assignedAt: string;
  expirationDate?: string;
  isActive: boolean;
  revokedAt?: string;
  revokedBy?: string;
  revocationReason?: string;
}

/**
 * Read-time state of an assignment. 'expired' is never stored.
 */
export type RoleAssignmentState = 'active' | 'revoked' | 'expired';

export interface RoleAssignmentWithState extends RoleAssignment {
  state: RoleAssignmentState;
}

/**
 * Principal-specific grant, consulted before roles and policies.
 * When resourceId is set the grant applies to that resource only.
 */
export interface DirectPermission {
  id: string;
  principalId: string;
  action: PermissionAction;
  resourceType: PermissionResourceType;
  resourceId?: string;
  isGranted: boolean;
  grantedBy: string;
  grantedAt: string;
  /** Set when revoked; revoked grants stay in the durable store but are never loaded */
  revokedAt?: string;
  revokedBy?: string;
}

/**
 * Snapshot of what a principal holds, recomputed on every mutation affecting them
 */
export interface EffectivePermissions {
  principalId: string;
  assignments: RoleAssignment[];
  roleIds: string[];
  directPermissions: DirectPermission[];
  lastUpdated: string;
}

// ============================================================================
// Policies
// ============================================================================

export type RuleEffect = 'allow' | 'deny';

export interface PermissionRule {
  id: string;
  conditions: PermissionCondition[];
  effect: RuleEffect;
}

export type PolicyPriority = 'low' | 'normal' | 'high' | 'critical';

export const POLICY_PRIORITY_WEIGHT: Record<PolicyPriority, number> = {
  low: 1,
  normal: 2,
  high: 3,
  critical: 4
};

export interface PermissionPolicy {
  id: string;
  name: string;
  description: string;
  rules: PermissionRule[];
  scope: PermissionScope;
  /** Restricts a non-global scope to one organization/department/team/project/resource */
  scopeId?: string;
  priority: PolicyPriority;
  isActive: boolean;
  createdBy: string;
  createdAt: string;
  modifiedBy?: string;
  modifiedAt?: string;
}

export type PolicyResult = 'granted' | 'denied' | 'not_applicable';

/**
 * How one applicable policy evaluates for a request
 */
export interface AppliedPolicy {
  policyId: string;
  name: string;
  priority: PolicyPriority;
  result: PolicyResult;
  ruleId?: string;
}

// ============================================================================
// Resource Grants and ACLs
// ============================================================================

export interface PermissionGrant {
  principalId: string;
  principalType: PrincipalType;
  action: PermissionAction;
  isGranted: boolean;
  conditions: PermissionCondition[];
}

export interface ResourcePermissions {
  resourceId: string;
  resourceType: ResourceType;
  permissions: PermissionGrant[];
  inheritFromParent: boolean;
  setBy: string;
  setAt: string;
}

export interface ACLEntry {
  principalId: string;
  principalType: PrincipalType;
  action: PermissionAction;
  isGranted: boolean;
}

export interface InheritanceRule {
  parentResourceId: string;
  inheritedActions: PermissionAction[];
  conditions: PermissionCondition[];
}

export interface AccessControlList {
  id: string;
  resourceId: string;
  resourceType: ResourceType;
  entries: ACLEntry[];
  inheritanceRules: InheritanceRule[];
  createdBy: string;
  createdAt: string;
}

// ============================================================================
// Decisions
// ============================================================================

/**
 * Which precedence step produced a decision
 */
export type DecisionSource = 'direct' | 'role' | 'policy' | 'resource' | 'acl' | 'default' | 'cache' | 'error';

export interface DecisionOutcome {
  granted: boolean;
  source: DecisionSource;
  applicablePolicies: string[];
  decidingPolicyId?: string;
  decidingRuleId?: string;
}

export interface PermissionEvaluationDetail {
  action: PermissionAction;
  resourceId: string;
  granted: boolean;
  source: DecisionSource;
  applicablePolicies: string[];
  decidingPolicyId?: string;
  decidingRuleId?: string;
  evaluatedAt: string;
}

export interface PermissionEvaluationResult {
  principalId: string;
  results: Partial<Record<PermissionAction, boolean>>;
  conditionsResult: boolean;
  evaluationDetails: PermissionEvaluationDetail[];
  evaluatedAt: string;
}

// ============================================================================
// Administration Inputs
// ============================================================================

export interface AssignRoleInput {
  principalId: string;
  roleId: string;
  scope?: PermissionScope;
  expirationDate?: string;
  assignedBy: string;
}

export interface RevokeRoleInput {
  principalId: string;
  roleId: string;
  revokedBy: string;
  reason?: string;
}

export interface CreatePolicyInput {
  name: string;
  description: string;
  rules: PermissionRule[];
  scope: PermissionScope;
  scopeId?: string;
  priority?: PolicyPriority;
  isActive?: boolean;
  createdBy: string;
}

export interface UpdatePolicyInput {
  policyId: string;
  name?: string;
  description?: string;
  rules?: PermissionRule[];
  isActive?: boolean;
  modifiedBy: string;
}

export interface SetResourcePermissionsInput {
  resourceId: string;
  resourceType: ResourceType;
  permissions: PermissionGrant[];
  inheritFromParent?: boolean;
  setBy: string;
}

export interface CreateAccessControlListInput {
  resourceId: string;
  resourceType: ResourceType;
  entries: ACLEntry[];
  inheritanceRules?: InheritanceRule[];
  createdBy: string;
}

export interface GrantDirectPermissionInput {
  principalId: string;
  action: PermissionAction;
  resourceType: PermissionResourceType;
  resourceId?: string;
  isGranted: boolean;
  grantedBy: string;
}

export interface RevokeDirectPermissionInput {
  principalId: string;
  permissionId: string;
  revokedBy: string;
}

export interface CreateRoleInput {
  id: string;
  name: string;
  description: string;
  permissions: Permission[];
  createdBy: string;
}

export interface UpdateRoleInput {
  roleId: string;
  name?: string;
  description?: string;
  permissions?: Permission[];
  modifiedBy: string;
}
