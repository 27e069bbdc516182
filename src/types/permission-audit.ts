/**
 * Permission audit type definitions.
 * The audit log is append-only and is the sole source for security reports.
 */

export const PERMISSION_AUDIT_ACTIONS = [
  'permission_checked',
  'role_assigned',
  'role_revoked',
  'policy_created',
  'policy_updated',
  'resource_permissions_set',
  'acl_created',
  'direct_permission_granted',
  'direct_permission_revoked',
  'role_created',
  'role_updated',
  'store_refreshed'
] as const;

export type PermissionAuditAction = typeof PERMISSION_AUDIT_ACTIONS[number];

export type PermissionResultValue = 'granted' | 'denied';

export type AuditContext = Record<string, string | number | boolean>;

export interface PermissionAuditLog {
  id: string;
  /** Monotonic arrival number, strictly increasing per engine */
  sequence: number;
  timestamp: string;
  userId: string;
  action: PermissionAuditAction;
  resource?: string;
  result: PermissionResultValue;
  context?: AuditContext;
}

export type PermissionAuditLogInput = Omit<PermissionAuditLog, 'id' | 'sequence' | 'timestamp'>;

/**
 * Every audit action except a plain permission check is a change action
 */
export function isChangeAction(action: PermissionAuditAction): boolean {
  return action !== 'permission_checked';
}

// ============================================================================
// Time Ranges
// ============================================================================

export type TimeRangePreset = 'lastHour' | 'lastDay' | 'lastWeek' | 'lastMonth' | 'lastQuarter' | 'lastYear';

export interface TimeRange {
  start: string;
  end: string;
}

// ============================================================================
// Reports
// ============================================================================

export type SecurityViolationType =
  | 'excessive_denied_attempts'
  | 'suspicious_access'
  | 'privilege_escalation'
  | 'unauthorized_resource_access';

export type SecurityViolationSeverity = 'low' | 'medium' | 'high' | 'critical';

export type SecurityRiskLevel = 'low' | 'medium' | 'high';

export interface SecurityViolation {
  id: string;
  type: SecurityViolationType;
  severity: SecurityViolationSeverity;
  userId: string;
  description: string;
  detectedAt: string;
  relatedLogs: string[];
}

export interface UserActivitySummary {
  userId: string;
  totalChecks: number;
  successfulChecks: number;
  deniedChecks: number;
  uniqueResources: number;
  lastActivity: string;
}

export interface ResourceAccessSummary {
  resourceId: string;
  totalAccesses: number;
  successfulAccesses: number;
  deniedAccesses: number;
  uniqueUsers: number;
  lastAccess: string;
}

export interface SecurityRiskAssessment {
  riskLevel: SecurityRiskLevel;
  riskScore: number;
  factors: string[];
  recommendations: string[];
}

export interface SecurityAuditReportOptions {
  timeRange: TimeRange | TimeRangePreset;
  includePermissionChanges?: boolean;
  includeAccessAttempts?: boolean;
  includeViolations?: boolean;
}

export interface SecurityAuditReport {
  id: string;
  generatedAt: string;
  timeRange: TimeRange;
  totalPermissionChecks: number;
  successfulChecks: number;
  deniedChecks: number;
  permissionChanges: PermissionAuditLog[];
  accessAttempts: PermissionAuditLog[];
  securityViolations: SecurityViolation[];
  userActivitySummary: UserActivitySummary[];
  resourceAccessSummary: ResourceAccessSummary[];
  riskAssessment: SecurityRiskAssessment;
}

export interface SecurityMetrics {
  timeRange: TimeRange;
  totalPermissionChecks: number;
  successfulChecks: number;
  deniedChecks: number;
  uniqueUsers: number;
  uniqueResources: number;
  securityScore: number;
  riskLevel: SecurityRiskLevel;
}

export interface AuditLogFilters {
  userId?: string;
  action?: PermissionAuditAction;
  resource?: string;
  result?: PermissionResultValue;
  startDate?: string;
  endDate?: string;
  limit?: number;
}
