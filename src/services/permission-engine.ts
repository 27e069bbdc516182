/**
 * Permission Engine
 *
 * Entry point for authorization decisions and administration. Wires the policy
 * store, decision cache, condition evaluator, audit log and admin service
 * around injected collaborators.
 *
 * decide() never throws: any internal failure is logged, audited as a denial
 * and returned as false.
 */

import {
  AccessControlList,
  AppliedPolicy,
  AssignRoleInput,
  CreateAccessControlListInput,
  CreatePolicyInput,
  CreateRoleInput,
  DecisionOutcome,
  DirectPermission,
  EffectivePermissions,
  GrantDirectPermissionInput,
  PermissionAction,
  PermissionCondition,
  PermissionContext,
  PermissionEvaluationDetail,
  PermissionEvaluationResult,
  PermissionPolicy,
  PermissionResource,
  ResourcePermissions,
  RevokeDirectPermissionInput,
  RevokeRoleInput,
  Role,
  RoleAssignment,
  RoleAssignmentState,
  RoleAssignmentWithState,
  SetResourcePermissionsInput,
  UpdatePolicyInput,
  UpdateRoleInput
} from '../types/permission';
import {
  AuditContext,
  AuditLogFilters,
  PermissionAuditLog,
  SecurityAuditReport,
  SecurityAuditReportOptions,
  SecurityMetrics,
  TimeRange,
  TimeRangePreset
} from '../types/permission-audit';
import { DynamoPermissionStore, PermissionStore } from '../repositories/permission-store';
import { Clock, systemClock } from '../utils/clock';
import {
  AttributeProvider,
  ConditionEvaluator,
  StaticAttributeProvider
} from './condition-evaluator';
import { DecisionCache } from './decision-cache';
import { PermissionAdminService } from './permission-admin';
import { PermissionAuditService } from './permission-audit';
import {
  comparePolicyPriority,
  getApplicablePolicies,
  isAssignmentEffective,
  isAssignmentExpired,
  PermissionEvaluator
} from './permission-evaluator';
import { PolicyStore } from './policy-store';

/**
 * Engine configuration
 */
export interface EngineConfig {
  /** Lifetime of a cached decision */
  cacheTtlSeconds: number;
  /** Denied entries per user above which a violation is reported */
  deniedAttemptThreshold: number;
}

function readNumberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) {
    console.warn(`Ignoring invalid ${name} value: ${raw}`);
    return fallback;
  }
  return parsed;
}

/**
 * Defaults, overridable through environment variables
 */
export function loadEngineConfig(): EngineConfig {
  return {
    cacheTtlSeconds: readNumberFromEnv('PERMISSION_CACHE_TTL_SECONDS', 300),
    deniedAttemptThreshold: readNumberFromEnv('PERMISSION_DENIED_ATTEMPT_THRESHOLD', 10)
  };
}

export interface PermissionEngineDeps {
  store?: PermissionStore;
  clock?: Clock;
  attributeProvider?: AttributeProvider;
  cache?: DecisionCache;
  config?: Partial<EngineConfig>;
}

export function getRoleAssignmentState(assignment: RoleAssignment, now: Date): RoleAssignmentState {
  if (!assignment.isActive) {
    return 'revoked';
  }
  return isAssignmentExpired(assignment, now) ? 'expired' : 'active';
}

function buildAuditContext(
  action: PermissionAction,
  resource: PermissionResource,
  outcome: DecisionOutcome,
  context?: PermissionContext
): AuditContext {
  const auditContext: AuditContext = {
    permissionAction: action,
    resourceType: resource.type,
    decisionSource: outcome.source
  };
  if (outcome.decidingPolicyId !== undefined) auditContext.decidingPolicyId = outcome.decidingPolicyId;
  if (outcome.decidingRuleId !== undefined) auditContext.decidingRuleId = outcome.decidingRuleId;
  if (context?.sessionId !== undefined) auditContext.sessionId = context.sessionId;
  if (context?.clientIP !== undefined) auditContext.clientIP = context.clientIP;
  if (context?.userAgent !== undefined) auditContext.userAgent = context.userAgent;
  if (context?.deviceId !== undefined) auditContext.deviceId = context.deviceId;
  if (context?.location !== undefined) auditContext.location = context.location;
  return auditContext;
}

export class PermissionEngine {
  readonly config: EngineConfig;
  private clock: Clock;
  private cache: DecisionCache;
  private policyStore: PolicyStore;
  private conditions: ConditionEvaluator;
  private evaluator: PermissionEvaluator;
  private audit: PermissionAuditService;
  private admin: PermissionAdminService;

  constructor(deps: PermissionEngineDeps = {}) {
    this.config = { ...loadEngineConfig(), ...deps.config };
    const store = deps.store ?? new DynamoPermissionStore();
    this.clock = deps.clock ?? systemClock;
    this.cache = deps.cache ?? new DecisionCache({ ttlSeconds: this.config.cacheTtlSeconds }, this.clock);
    this.policyStore = new PolicyStore(this.clock.now().toISOString());
    this.conditions = new ConditionEvaluator(deps.attributeProvider ?? new StaticAttributeProvider(), this.clock);
    this.evaluator = new PermissionEvaluator(this.conditions);
    this.audit = new PermissionAuditService(store, this.clock, {
      deniedAttemptThreshold: this.config.deniedAttemptThreshold
    });
    this.admin = new PermissionAdminService({
      store,
      policyStore: this.policyStore,
      cache: this.cache,
      audit: this.audit,
      clock: this.clock
    });
  }

  // ==========================================================================
  // Decisions
  // ==========================================================================

  /**
   * Decide whether the principal may perform the action on the resource
   */
  async decide(
    principalId: string,
    action: PermissionAction,
    resource: PermissionResource,
    context?: PermissionContext
  ): Promise<boolean> {
    try {
      const outcome = await this.decideWithOutcome(principalId, action, resource, context);
      return outcome.granted;
    } catch (error) {
      console.error(`Permission decision error for ${principalId}:${action}:${resource.id}:`, error);
      return false;
    }
  }

  /**
   * Cache first, then the precedence chain. The outcome is cached only if the
   * store did not change while it was computed.
   */
  private async resolve(
    principalId: string,
    action: PermissionAction,
    resource: PermissionResource,
    context?: PermissionContext
  ): Promise<DecisionOutcome> {
    const cached = this.cache.get(principalId, action, resource.id);
    if (cached.found) {
      return { granted: cached.value, source: 'cache', applicablePolicies: [] };
    }

    const snapshot = this.policyStore.snapshot();
    try {
      const input = this.conditions.createInput(principalId, resource, context);
      const outcome = await this.evaluator.evaluate(snapshot, action, input);
      if (this.policyStore.version === snapshot.version) {
        this.cache.put(principalId, action, resource.id, outcome.granted);
      }
      return outcome;
    } catch (error) {
      console.error(`Permission evaluation error for ${principalId}:${action}:${resource.id}:`, error);
      return { granted: false, source: 'error', applicablePolicies: [] };
    }
  }

  private async decideWithOutcome(
    principalId: string,
    action: PermissionAction,
    resource: PermissionResource,
    context?: PermissionContext
  ): Promise<DecisionOutcome> {
    const outcome = await this.resolve(principalId, action, resource, context);
    this.audit.record({
      userId: principalId,
      action: 'permission_checked',
      resource: resource.id,
      result: outcome.granted ? 'granted' : 'denied',
      context: buildAuditContext(action, resource, outcome, context)
    });
    return outcome;
  }

  /**
   * Decide every action for every resource. An action is granted only when it
   * is granted for all resources; supplemental conditions must hold for all resources.
   */
  async evaluateComplex(
    principalId: string,
    actions: PermissionAction[],
    resources: PermissionResource[],
    conditions: PermissionCondition[] = [],
    context?: PermissionContext
  ): Promise<PermissionEvaluationResult> {
    const results: PermissionEvaluationResult['results'] = {};
    const evaluationDetails: PermissionEvaluationDetail[] = [];

    for (const action of actions) {
      let granted = resources.length > 0;
      for (const resource of resources) {
        const outcome = await this.decideWithOutcome(principalId, action, resource, context);
        granted = granted && outcome.granted;

        const detail: PermissionEvaluationDetail = {
          action,
          resourceId: resource.id,
          granted: outcome.granted,
          source: outcome.source,
          applicablePolicies: outcome.applicablePolicies,
          evaluatedAt: this.clock.now().toISOString()
        };
        if (outcome.decidingPolicyId !== undefined) detail.decidingPolicyId = outcome.decidingPolicyId;
        if (outcome.decidingRuleId !== undefined) detail.decidingRuleId = outcome.decidingRuleId;
        evaluationDetails.push(detail);
      }
      results[action] = granted;
    }

    return {
      principalId,
      results,
      conditionsResult: await this.evaluateConditions(principalId, conditions, resources, context),
      evaluationDetails,
      evaluatedAt: this.clock.now().toISOString()
    };
  }

  private async evaluateConditions(
    principalId: string,
    conditions: PermissionCondition[],
    resources: PermissionResource[],
    context?: PermissionContext
  ): Promise<boolean> {
    if (conditions.length === 0) {
      return true;
    }

    try {
      const targets: (PermissionResource | undefined)[] = resources.length > 0 ? resources : [undefined];
      for (const resource of targets) {
        const input = this.conditions.createInput(principalId, resource, context);
        if (!(await this.conditions.evaluateAll(conditions, input))) {
          return false;
        }
      }
      return true;
    } catch (error) {
      console.error(`Condition evaluation error for ${principalId}:`, error);
      return false;
    }
  }

  // ==========================================================================
  // Read Side
  // ==========================================================================

  /**
   * What the principal currently holds; expired assignments are left out
   */
  async getEffectivePermissions(principalId: string): Promise<EffectivePermissions> {
    const now = this.clock.now();
    const snapshot = this.policyStore.snapshot().principals.get(principalId);
    const assignments = (snapshot?.assignments ?? []).filter((a) => isAssignmentEffective(a, now));

    return {
      principalId,
      assignments,
      roleIds: assignments.map((a) => a.roleId),
      directPermissions: [...(snapshot?.directPermissions ?? [])],
      lastUpdated: snapshot?.lastUpdated ?? now.toISOString()
    };
  }

  /**
   * Applicable policies in evaluation order, each with the result it yields for the request.
   * Policy rules are not action-specific, so every action sees the same policies.
   */
  async getAppliedPolicies(
    principalId: string,
    action: PermissionAction,
    resource: PermissionResource,
    context?: PermissionContext
  ): Promise<AppliedPolicy[]> {
    const input = this.conditions.createInput(principalId, resource, context);
    const applied: AppliedPolicy[] = [];

    for (const policy of getApplicablePolicies(this.policyStore.snapshot(), input)) {
      const { result, ruleId } = await this.evaluator.evaluatePolicy(policy, input);
      const entry: AppliedPolicy = { policyId: policy.id, name: policy.name, priority: policy.priority, result };
      if (ruleId !== undefined) entry.ruleId = ruleId;
      applied.push(entry);
    }

    return applied;
  }

  async listRoleAssignments(filters: { principalId?: string; roleId?: string } = {}): Promise<RoleAssignmentWithState[]> {
    const now = this.clock.now();
    return this.policyStore
      .snapshot()
      .assignments.filter(
        (a) =>
          (filters.principalId === undefined || a.principalId === filters.principalId) &&
          (filters.roleId === undefined || a.roleId === filters.roleId)
      )
      .map((a) => ({ ...a, state: getRoleAssignmentState(a, now) }));
  }

  async listRoles(): Promise<Role[]> {
    return Array.from(this.policyStore.snapshot().roles.values());
  }

  async listPolicies(): Promise<PermissionPolicy[]> {
    return [...this.policyStore.snapshot().policies].sort(comparePolicyPriority);
  }

  // ==========================================================================
  // Administration
  // ==========================================================================

  assignRole(input: AssignRoleInput): Promise<RoleAssignment> {
    return this.admin.assignRole(input);
  }

  revokeRole(input: RevokeRoleInput): Promise<RoleAssignment> {
    return this.admin.revokeRole(input);
  }

  createRole(input: CreateRoleInput): Promise<Role> {
    return this.admin.createRole(input);
  }

  updateRole(input: UpdateRoleInput): Promise<Role> {
    return this.admin.updateRole(input);
  }

  createPolicy(input: CreatePolicyInput): Promise<PermissionPolicy> {
    return this.admin.createPolicy(input);
  }

  updatePolicy(input: UpdatePolicyInput): Promise<PermissionPolicy> {
    return this.admin.updatePolicy(input);
  }

  setResourcePermissions(input: SetResourcePermissionsInput): Promise<ResourcePermissions> {
    return this.admin.setResourcePermissions(input);
  }

  inheritResourcePermissions(childResourceId: string, parentResourceId: string, inheritedBy: string): Promise<ResourcePermissions> {
    return this.admin.inheritResourcePermissions(childResourceId, parentResourceId, inheritedBy);
  }

  createAccessControlList(input: CreateAccessControlListInput): Promise<AccessControlList> {
    return this.admin.createAccessControlList(input);
  }

  grantDirectPermission(input: GrantDirectPermissionInput): Promise<DirectPermission> {
    return this.admin.grantDirectPermission(input);
  }

  revokeDirectPermission(input: RevokeDirectPermissionInput): Promise<DirectPermission> {
    return this.admin.revokeDirectPermission(input);
  }

  refresh(refreshedBy?: string): Promise<void> {
    return this.admin.refresh(refreshedBy);
  }

  // ==========================================================================
  // Audit
  // ==========================================================================

  async generateSecurityAuditReport(options: SecurityAuditReportOptions): Promise<SecurityAuditReport> {
    return this.audit.generateSecurityAuditReport(options);
  }

  async loadSecurityMetrics(timeRange?: TimeRange | TimeRangePreset): Promise<SecurityMetrics> {
    return this.audit.loadSecurityMetrics(timeRange);
  }

  async queryAuditLogs(filters?: AuditLogFilters): Promise<PermissionAuditLog[]> {
    return this.audit.query(filters);
  }

  flushAudit(): Promise<void> {
    return this.audit.flush();
  }
}

/**
 * Create an engine with its own store snapshot, cache and audit log
 */
export function createPermissionEngine(deps: PermissionEngineDeps = {}): PermissionEngine {
  return new PermissionEngine(deps);
}
