import * as fc from 'fast-check';
import {
  PERMISSION_ACTIONS,
  PermissionAction,
  PermissionCondition,
  PermissionResource,
  RESOURCE_TYPES,
  ResourceType
} from '../types/permission';
import { PermissionAuditLog, PermissionResultValue } from '../types/permission-audit';
import { Clock } from '../utils/clock';

/**
 * Clock whose time only moves when the test says so
 */
export interface ManualClock extends Clock {
  set(iso: string): void;
  advance(ms: number): void;
}

export function createManualClock(start = '2024-01-15T10:00:00.000Z'): ManualClock {
  let current = Date.parse(start);
  return {
    now: () => new Date(current),
    set: (iso: string) => {
      current = Date.parse(iso);
    },
    advance: (ms: number) => {
      current += ms;
    }
  };
}

/**
 * Generator for principal identifiers
 */
export const principalIdArb = (): fc.Arbitrary<string> =>
  fc.stringMatching(/^[a-z][a-z0-9-]{0,11}$/);

/**
 * Generator for resource identifiers; never contains the cache key separator
 */
export const resourceIdArb = (): fc.Arbitrary<string> =>
  fc.stringMatching(/^[a-z][a-z0-9-]{0,15}$/);

export const permissionActionArb = (): fc.Arbitrary<PermissionAction> =>
  fc.constantFrom(...PERMISSION_ACTIONS);

export const resourceTypeArb = (): fc.Arbitrary<ResourceType> =>
  fc.constantFrom(...RESOURCE_TYPES);

/**
 * Generator for resources without attributes
 */
export const permissionResourceArb = (): fc.Arbitrary<PermissionResource> =>
  fc.record({
    id: resourceIdArb(),
    type: resourceTypeArb()
  });

/**
 * Generator for well-formed userAttribute conditions
 */
export const userAttributeConditionArb = (): fc.Arbitrary<PermissionCondition> =>
  fc.record({
    type: fc.constant('userAttribute' as const),
    attribute: fc.constantFrom('department', 'title', 'region'),
    operator: fc.constantFrom('equals' as const, 'not_equals' as const, 'contains' as const),
    value: fc.stringMatching(/^[a-z]{1,10}$/)
  });

/**
 * Generator for a run of audit entries with the requested number of denials
 */
export const auditLogsArb = (
  options: { minLength?: number; maxLength?: number } = {}
): fc.Arbitrary<PermissionAuditLog[]> =>
  fc
    .array(
      fc.record({
        userId: fc.constantFrom('u1', 'u2', 'u3'),
        resource: fc.constantFrom('doc-1', 'doc-2', 'doc-3'),
        result: fc.constantFrom<PermissionResultValue>('granted', 'denied')
      }),
      { minLength: options.minLength ?? 0, maxLength: options.maxLength ?? 50 }
    )
    .map((entries) => entries.map((entry, index) => buildAuditLog(index, entry.userId, entry.result, entry.resource)));

/**
 * Build a permission_checked audit entry with a deterministic id and timestamp
 */
export function buildAuditLog(
  sequence: number,
  userId: string,
  result: PermissionResultValue,
  resource?: string,
  timestamp = new Date(Date.parse('2024-01-15T00:00:00.000Z') + sequence * 1000).toISOString()
): PermissionAuditLog {
  const log: PermissionAuditLog = {
    id: `log-${sequence}`,
    sequence,
    timestamp,
    userId,
    action: 'permission_checked',
    result
  };
  if (resource !== undefined) {
    log.resource = resource;
  }
  return log;
}
