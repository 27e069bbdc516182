/**
 * Permission Audit Service
 *
 * Append-only log of every decision and administrative change, with the
 * read-side aggregations used for security reports:
 * - Activity summaries per user and per resource
 * - Excessive-denial violation detection
 * - Denial-rate risk assessment and recommendations
 *
 * Entries are numbered and kept in memory synchronously; persistence runs
 * behind a single-writer queue so entries reach the store in arrival order.
 */

import {
  AuditLogFilters,
  isChangeAction,
  PermissionAuditLog,
  PermissionAuditLogInput,
  ResourceAccessSummary,
  SecurityAuditReport,
  SecurityAuditReportOptions,
  SecurityMetrics,
  SecurityRiskAssessment,
  SecurityRiskLevel,
  SecurityViolation,
  TimeRange,
  TimeRangePreset,
  UserActivitySummary
} from '../types/permission-audit';
import { PermissionStore } from '../repositories/permission-store';
import { Clock, systemClock } from '../utils/clock';
import { generateUUID } from '../utils/uuid';
import { SerialQueue } from '../utils/serial-queue';

export interface PermissionAuditConfig {
  /** A user with more denied entries than this in a window is flagged */
  deniedAttemptThreshold: number;
}

const DEFAULT_CONFIG: PermissionAuditConfig = {
  deniedAttemptThreshold: 10
};

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export const TIME_RANGE_PRESET_MS: Record<TimeRangePreset, number> = {
  lastHour: HOUR_MS,
  lastDay: DAY_MS,
  lastWeek: 7 * DAY_MS,
  lastMonth: 30 * DAY_MS,
  lastQuarter: 90 * DAY_MS,
  lastYear: 365 * DAY_MS
};

/**
 * Turn a preset into an explicit range ending now
 */
export function resolveTimeRange(range: TimeRange | TimeRangePreset, now: Date): TimeRange {
  if (typeof range !== 'string') {
    return range;
  }
  return {
    start: new Date(now.getTime() - TIME_RANGE_PRESET_MS[range]).toISOString(),
    end: now.toISOString()
  };
}

export function isWithinTimeRange(timestamp: string, range: TimeRange): boolean {
  const time = Date.parse(timestamp);
  return time >= Date.parse(range.start) && time <= Date.parse(range.end);
}

function groupBy<T>(items: T[], keyOf: (item: T) => string | undefined): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    if (key === undefined) continue;
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

function latestTimestamp(logs: PermissionAuditLog[]): string {
  return logs.reduce((latest, log) => (log.timestamp > latest ? log.timestamp : latest), logs[0].timestamp);
}

/**
 * Flags every user whose denied entries exceed the threshold
 */
export function identifySecurityViolations(
  logs: PermissionAuditLog[],
  detectedAt: string,
  threshold: number = DEFAULT_CONFIG.deniedAttemptThreshold
): SecurityViolation[] {
  const denied = groupBy(logs.filter((log) => log.result === 'denied'), (log) => log.userId);

  return Array.from(denied.entries())
    .filter(([, attempts]) => attempts.length > threshold)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([userId, attempts]): SecurityViolation => ({
      id: generateUUID(),
      type: 'excessive_denied_attempts',
      severity: 'high',
      userId,
      description: `User has ${attempts.length} denied permission attempts`,
      detectedAt,
      relatedLogs: attempts.map((log) => log.id)
    }));
}

export function generateUserActivitySummary(logs: PermissionAuditLog[]): UserActivitySummary[] {
  return Array.from(groupBy(logs, (log) => log.userId).entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([userId, userLogs]) => ({
      userId,
      totalChecks: userLogs.length,
      successfulChecks: userLogs.filter((log) => log.result === 'granted').length,
      deniedChecks: userLogs.filter((log) => log.result === 'denied').length,
      uniqueResources: new Set(userLogs.flatMap((log) => (log.resource === undefined ? [] : [log.resource]))).size,
      lastActivity: latestTimestamp(userLogs)
    }));
}

export function generateResourceAccessSummary(logs: PermissionAuditLog[]): ResourceAccessSummary[] {
  return Array.from(groupBy(logs, (log) => log.resource).entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([resourceId, resourceLogs]) => ({
      resourceId,
      totalAccesses: resourceLogs.length,
      successfulAccesses: resourceLogs.filter((log) => log.result === 'granted').length,
      deniedAccesses: resourceLogs.filter((log) => log.result === 'denied').length,
      uniqueUsers: new Set(resourceLogs.map((log) => log.userId)).size,
      lastAccess: latestTimestamp(resourceLogs)
    }));
}

export function generateSecurityRecommendations(riskLevel: SecurityRiskLevel, denialRate: number): string[] {
  const recommendations: string[] = [];

  if (riskLevel === 'high') {
    recommendations.push('Review and update permission policies');
    recommendations.push('Investigate users with excessive denied attempts');
    recommendations.push('Consider implementing additional security measures');
  }

  if (denialRate > 0.2) {
    recommendations.push('Review role assignments and permissions');
    recommendations.push('Provide additional user training on system access');
  }

  if (recommendations.length === 0) {
    recommendations.push('Continue monitoring security metrics');
    recommendations.push('Regular security audits recommended');
  }

  return recommendations;
}

/**
 * Risk is the denial rate over every entry in the window
 */
export function assessSecurityRisk(logs: PermissionAuditLog[]): SecurityRiskAssessment {
  const totalChecks = logs.length;
  const deniedChecks = logs.filter((log) => log.result === 'denied').length;
  const denialRate = totalChecks > 0 ? deniedChecks / totalChecks : 0;

  let riskLevel: SecurityRiskLevel = 'low';
  if (denialRate > 0.3) {
    riskLevel = 'high';
  } else if (denialRate > 0.15) {
    riskLevel = 'medium';
  }

  return {
    riskLevel,
    riskScore: denialRate * 100,
    factors: [
      `Denial rate: ${(denialRate * 100).toFixed(2)}%`,
      `Total permission checks: ${totalChecks}`,
      `Denied attempts: ${deniedChecks}`
    ],
    recommendations: generateSecurityRecommendations(riskLevel, denialRate)
  };
}

/**
 * True when a log satisfies every filter that is set
 */
export function matchesAuditFilters(log: PermissionAuditLog, filters: AuditLogFilters): boolean {
  if (filters.userId !== undefined && log.userId !== filters.userId) return false;
  if (filters.action !== undefined && log.action !== filters.action) return false;
  if (filters.resource !== undefined && log.resource !== filters.resource) return false;
  if (filters.result !== undefined && log.result !== filters.result) return false;
  if (filters.startDate !== undefined && Date.parse(log.timestamp) < Date.parse(filters.startDate)) return false;
  if (filters.endDate !== undefined && Date.parse(log.timestamp) > Date.parse(filters.endDate)) return false;
  return true;
}

export class PermissionAuditService {
  private logs: PermissionAuditLog[] = [];
  private nextSequence = 0;
  private queue = new SerialQueue();
  private store: PermissionStore;
  private clock: Clock;
  private config: PermissionAuditConfig;

  constructor(store: PermissionStore, clock: Clock = systemClock, config?: Partial<PermissionAuditConfig>) {
    this.store = store;
    this.clock = clock;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Append an entry and schedule its persistence.
   * A persistence failure is logged and does not reach the caller.
   */
  record(input: PermissionAuditLogInput): PermissionAuditLog {
    const entry: PermissionAuditLog = {
      ...input,
      id: generateUUID(),
      sequence: this.nextSequence++,
      timestamp: this.clock.now().toISOString()
    };
    this.logs.push(entry);

    this.queue.run(() => this.store.save('auditLog', entry)).catch((error) => {
      console.error(`Audit log persistence error for ${entry.id}:`, error);
    });

    return entry;
  }

  /**
   * Wait until every entry recorded so far has been handed to the store
   */
  flush(): Promise<void> {
    return this.queue.drain();
  }

  get pendingWrites(): number {
    return this.queue.size;
  }

  /**
   * Merge previously persisted entries into the in-memory log, ordered by sequence
   */
  restore(entries: PermissionAuditLog[]): void {
    const known = new Set(this.logs.map((log) => log.id));
    const merged = [...this.logs, ...entries.filter((entry) => !known.has(entry.id))];
    merged.sort((a, b) => a.sequence - b.sequence);
    this.logs = merged;
    this.nextSequence = merged.reduce((max, log) => Math.max(max, log.sequence + 1), this.nextSequence);
  }

  /**
   * Entries matching the filters, oldest first, capped by filters.limit
   */
  query(filters: AuditLogFilters = {}): PermissionAuditLog[] {
    const matching = this.logs.filter((log) => matchesAuditFilters(log, filters));
    return filters.limit !== undefined ? matching.slice(0, filters.limit) : matching;
  }

  private logsIn(range: TimeRange): PermissionAuditLog[] {
    return this.logs.filter((log) => isWithinTimeRange(log.timestamp, range));
  }

  generateSecurityAuditReport(options: SecurityAuditReportOptions): SecurityAuditReport {
    const now = this.clock.now();
    const timeRange = resolveTimeRange(options.timeRange, now);
    const logs = this.logsIn(timeRange);
    const checks = logs.filter((log) => log.action === 'permission_checked');

    return {
      id: generateUUID(),
      generatedAt: now.toISOString(),
      timeRange,
      totalPermissionChecks: checks.length,
      successfulChecks: checks.filter((log) => log.result === 'granted').length,
      deniedChecks: checks.filter((log) => log.result === 'denied').length,
      permissionChanges: options.includePermissionChanges ? logs.filter((log) => isChangeAction(log.action)) : [],
      accessAttempts: options.includeAccessAttempts ? checks : [],
      securityViolations: options.includeViolations
        ? identifySecurityViolations(logs, now.toISOString(), this.config.deniedAttemptThreshold)
        : [],
      userActivitySummary: generateUserActivitySummary(logs),
      resourceAccessSummary: generateResourceAccessSummary(logs),
      riskAssessment: assessSecurityRisk(logs)
    };
  }

  loadSecurityMetrics(range: TimeRange | TimeRangePreset = 'lastMonth'): SecurityMetrics {
    const timeRange = resolveTimeRange(range, this.clock.now());
    const logs = this.logsIn(timeRange);
    const checks = logs.filter((log) => log.action === 'permission_checked');
    const risk = assessSecurityRisk(logs);

    return {
      timeRange,
      totalPermissionChecks: checks.length,
      successfulChecks: checks.filter((log) => log.result === 'granted').length,
      deniedChecks: checks.filter((log) => log.result === 'denied').length,
      uniqueUsers: new Set(checks.map((log) => log.userId)).size,
      uniqueResources: new Set(checks.flatMap((log) => (log.resource === undefined ? [] : [log.resource]))).size,
      securityScore: 100 - risk.riskScore,
      riskLevel: risk.riskLevel
    };
  }
}
