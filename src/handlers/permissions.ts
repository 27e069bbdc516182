import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import Ajv, { ValidateFunction } from 'ajv';
import {
  AssignRoleRequestSchema,
  CreatePolicyRequestSchema,
  DecideRequestSchema,
  EvaluateRequestSchema,
  InheritResourcePermissionsRequestSchema,
  RevokeRoleRequestSchema,
  SetResourcePermissionsRequestSchema,
  UpdatePolicyRequestSchema
} from '../schemas/permission-requests';
import {
  PermissionAction,
  PermissionCondition,
  PermissionContext,
  PermissionGrant,
  PermissionPolicy,
  PermissionResource,
  PermissionRule,
  PermissionScope,
  PolicyPriority,
  ResourceType
} from '../types/permission';
import {
  AuditLogFilters,
  PERMISSION_AUDIT_ACTIONS,
  PermissionAuditAction,
  TimeRange,
  TimeRangePreset
} from '../types/permission-audit';
import {
  InvalidRuleError,
  NotFoundError,
  PersistenceFailureError
} from '../types/permission-error';
import { PermissionEngine } from '../services/permission-engine';
import { TIME_RANGE_PRESET_MS } from '../services/permission-audit';

/**
 * Permission API Handlers
 *
 * Lambda handlers wrapping the permission engine. The caller identity is taken
 * from the X-Principal-Id header and is trusted as given.
 */

/**
 * Parts of the API Gateway event the handlers read
 */
export type PermissionRequestEvent = Pick<APIGatewayProxyEvent, 'body' | 'headers' | 'pathParameters' | 'queryStringParameters'>;

const CORS_HEADERS = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,Authorization,X-Principal-Id',
  'Access-Control-Allow-Methods': 'GET,POST,PUT,OPTIONS'
};

interface ErrorResponseBody {
  error: string;
  code: string;
  details?: string[];
}

function successResponse<T>(data: T, statusCode = 200): APIGatewayProxyResult {
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify(data)
  };
}

function errorResponse(statusCode: number, message: string, code: string, details?: string[]): APIGatewayProxyResult {
  const body: ErrorResponseBody = { error: message, code };
  if (details) body.details = details;
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify(body)
  };
}

function getCallerId(event: PermissionRequestEvent): string | null {
  return event.headers['X-Principal-Id'] || event.headers['x-principal-id'] || null;
}

type BodyResult<T> = { ok: true; body: T } | { ok: false; response: APIGatewayProxyResult };

function parseBody<T>(event: PermissionRequestEvent, validate: ValidateFunction<T>): BodyResult<T> {
  let parsed: unknown;
  try {
    parsed = event.body ? JSON.parse(event.body) : null;
  } catch {
    return { ok: false, response: errorResponse(400, 'Invalid request body', 'INVALID_BODY') };
  }

  if (!validate(parsed)) {
    const details = (validate.errors || []).map(
      (error) => `${error.instancePath || '/'} ${error.message || 'is invalid'}`
    );
    return { ok: false, response: errorResponse(400, 'Validation failed', 'VALIDATION_FAILED', details) };
  }

  return { ok: true, body: parsed };
}

/**
 * Maps engine errors to HTTP responses
 */
function handleError(error: unknown, operation: string): APIGatewayProxyResult {
  if (error instanceof NotFoundError) {
    return errorResponse(404, error.message, error.code);
  }
  if (error instanceof InvalidRuleError) {
    return errorResponse(400, 'Invalid policy rule configuration', error.code, error.details);
  }
  if (error instanceof PersistenceFailureError) {
    console.error(`Persistence failure while ${operation}:`, error);
    return errorResponse(503, 'Storage unavailable', error.code);
  }
  console.error(`Error ${operation}:`, error);
  return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
}

interface DecideRequest {
  principalId: string;
  action: PermissionAction;
  resource: PermissionResource;
  context?: PermissionContext;
}

interface EvaluateRequest {
  principalId: string;
  actions: PermissionAction[];
  resources: PermissionResource[];
  conditions?: PermissionCondition[];
  context?: PermissionContext;
}

interface AssignRoleRequest {
  principalId: string;
  roleId: string;
  scope?: PermissionScope;
  expirationDate?: string;
}

interface RevokeRoleRequest {
  principalId: string;
  roleId: string;
  reason?: string;
}

interface CreatePolicyRequest {
  name: string;
  description: string;
  rules: PermissionRule[];
  scope: PermissionScope;
  scopeId?: string;
  priority?: PolicyPriority;
  isActive?: boolean;
}

interface UpdatePolicyRequest {
  name?: string;
  description?: string;
  rules?: PermissionRule[];
  isActive?: boolean;
}

interface SetResourcePermissionsRequest {
  resourceType: ResourceType;
  permissions: PermissionGrant[];
  inheritFromParent?: boolean;
}

interface InheritResourcePermissionsRequest {
  parentResourceId: string;
}

const ajv = new Ajv({ allErrors: true });
const validators = {
  decide: ajv.compile<DecideRequest>(DecideRequestSchema),
  evaluate: ajv.compile<EvaluateRequest>(EvaluateRequestSchema),
  assignRole: ajv.compile<AssignRoleRequest>(AssignRoleRequestSchema),
  revokeRole: ajv.compile<RevokeRoleRequest>(RevokeRoleRequestSchema),
  createPolicy: ajv.compile<CreatePolicyRequest>(CreatePolicyRequestSchema),
  updatePolicy: ajv.compile<UpdatePolicyRequest>(UpdatePolicyRequestSchema),
  setResourcePermissions: ajv.compile<SetResourcePermissionsRequest>(SetResourcePermissionsRequestSchema),
  inheritResourcePermissions: ajv.compile<InheritResourcePermissionsRequest>(InheritResourcePermissionsRequestSchema)
};

function isTimeRangePreset(value: string): value is TimeRangePreset {
  return Object.prototype.hasOwnProperty.call(TIME_RANGE_PRESET_MS, value);
}

function isAuditAction(value: string): value is PermissionAuditAction {
  return PERMISSION_AUDIT_ACTIONS.some((action) => action === value);
}

/**
 * Reads ?timeRange=<preset> or ?start=&end=; defaults to the given preset
 */
function parseTimeRange(event: PermissionRequestEvent, fallback: TimeRangePreset): TimeRange | TimeRangePreset | null {
  const params = event.queryStringParameters || {};
  if (params.start && params.end) {
    if (Number.isNaN(Date.parse(params.start)) || Number.isNaN(Date.parse(params.end))) {
      return null;
    }
    return { start: params.start, end: params.end };
  }
  const preset = params.timeRange || fallback;
  return isTimeRangePreset(preset) ? preset : null;
}

export type PermissionHandler = (event: PermissionRequestEvent) => Promise<APIGatewayProxyResult>;

export interface PermissionHandlers {
  decide: PermissionHandler;
  evaluate: PermissionHandler;
  getEffectivePermissions: PermissionHandler;
  assignRole: PermissionHandler;
  revokeRole: PermissionHandler;
  createPolicy: PermissionHandler;
  updatePolicy: PermissionHandler;
  setResourcePermissions: PermissionHandler;
  inheritResourcePermissions: PermissionHandler;
  getSecurityAuditReport: PermissionHandler;
  getSecurityMetrics: PermissionHandler;
  queryAuditLogs: PermissionHandler;
}

/**
 * Build the handlers around an engine. `ready` is awaited before each request,
 * which lets a cold start load the store once.
 */
export function createPermissionHandlers(engine: PermissionEngine, ready: () => Promise<void> = async () => {}): PermissionHandlers {
  /**
   * POST /permissions/decide
   * Decide a single (principal, action, resource) request
   */
  async function decide(event: PermissionRequestEvent): Promise<APIGatewayProxyResult> {
    try {
      const parsed = parseBody(event, validators.decide);
      if (!parsed.ok) return parsed.response;

      await ready();
      const { principalId, action, resource, context } = parsed.body;
      const granted = await engine.decide(principalId, action, resource, context);
      return successResponse({ principalId, action, resourceId: resource.id, granted });
    } catch (error) {
      return handleError(error, 'deciding permission');
    }
  }

  /**
   * POST /permissions/evaluate
   */
  async function evaluate(event: PermissionRequestEvent): Promise<APIGatewayProxyResult> {
    try {
      const parsed = parseBody(event, validators.evaluate);
      if (!parsed.ok) return parsed.response;

      await ready();
      const { principalId, actions, resources, conditions, context } = parsed.body;
      const result = await engine.evaluateComplex(principalId, actions, resources, conditions, context);
      return successResponse(result);
    } catch (error) {
      return handleError(error, 'evaluating permissions');
    }
  }

  /**
   * GET /principals/{id}/permissions
   */
  async function getEffectivePermissions(event: PermissionRequestEvent): Promise<APIGatewayProxyResult> {
    try {
      const principalId = event.pathParameters?.id;
      if (!principalId) {
        return errorResponse(400, 'Missing principal ID', 'MISSING_PARAMETER');
      }

      await ready();
      return successResponse(await engine.getEffectivePermissions(principalId));
    } catch (error) {
      return handleError(error, 'loading effective permissions');
    }
  }

  /**
   * POST /role-assignments
   */
  async function assignRole(event: PermissionRequestEvent): Promise<APIGatewayProxyResult> {
    try {
      const callerId = getCallerId(event);
      if (!callerId) {
        return errorResponse(401, 'Missing principal ID', 'UNAUTHORIZED');
      }

      const parsed = parseBody(event, validators.assignRole);
      if (!parsed.ok) return parsed.response;

      await ready();
      const assignment = await engine.assignRole({ ...parsed.body, assignedBy: callerId });
      return successResponse(assignment, 201);
    } catch (error) {
      return handleError(error, 'assigning role');
    }
  }

  /**
   * POST /role-assignments/revoke
   */
  async function revokeRole(event: PermissionRequestEvent): Promise<APIGatewayProxyResult> {
    try {
      const callerId = getCallerId(event);
      if (!callerId) {
        return errorResponse(401, 'Missing principal ID', 'UNAUTHORIZED');
      }

      const parsed = parseBody(event, validators.revokeRole);
      if (!parsed.ok) return parsed.response;

      await ready();
      const assignment = await engine.revokeRole({ ...parsed.body, revokedBy: callerId });
      return successResponse(assignment);
    } catch (error) {
      return handleError(error, 'revoking role');
    }
  }

  /**
   * POST /policies
   */
  async function createPolicy(event: PermissionRequestEvent): Promise<APIGatewayProxyResult> {
    try {
      const callerId = getCallerId(event);
      if (!callerId) {
        return errorResponse(401, 'Missing principal ID', 'UNAUTHORIZED');
      }

      const parsed = parseBody(event, validators.createPolicy);
      if (!parsed.ok) return parsed.response;

      await ready();
      const policy: PermissionPolicy = await engine.createPolicy({ ...parsed.body, createdBy: callerId });
      return successResponse(policy, 201);
    } catch (error) {
      return handleError(error, 'creating policy');
    }
  }

  /**
   * PUT /policies/{id}
   */
  async function updatePolicy(event: PermissionRequestEvent): Promise<APIGatewayProxyResult> {
    try {
      const callerId = getCallerId(event);
      if (!callerId) {
        return errorResponse(401, 'Missing principal ID', 'UNAUTHORIZED');
      }

      const policyId = event.pathParameters?.id;
      if (!policyId) {
        return errorResponse(400, 'Missing policy ID', 'MISSING_PARAMETER');
      }

      const parsed = parseBody(event, validators.updatePolicy);
      if (!parsed.ok) return parsed.response;

      await ready();
      const policy = await engine.updatePolicy({ ...parsed.body, policyId, modifiedBy: callerId });
      return successResponse(policy);
    } catch (error) {
      return handleError(error, 'updating policy');
    }
  }

  /**
   * PUT /resources/{id}/permissions
   */
  async function setResourcePermissions(event: PermissionRequestEvent): Promise<APIGatewayProxyResult> {
    try {
      const callerId = getCallerId(event);
      if (!callerId) {
        return errorResponse(401, 'Missing principal ID', 'UNAUTHORIZED');
      }

      const resourceId = event.pathParameters?.id;
      if (!resourceId) {
        return errorResponse(400, 'Missing resource ID', 'MISSING_PARAMETER');
      }

      const parsed = parseBody(event, validators.setResourcePermissions);
      if (!parsed.ok) return parsed.response;

      await ready();
      const permissions = await engine.setResourcePermissions({ ...parsed.body, resourceId, setBy: callerId });
      return successResponse(permissions);
    } catch (error) {
      return handleError(error, 'setting resource permissions');
    }
  }

  /**
   * POST /resources/{id}/inherit
   */
  async function inheritResourcePermissions(event: PermissionRequestEvent): Promise<APIGatewayProxyResult> {
    try {
      const callerId = getCallerId(event);
      if (!callerId) {
        return errorResponse(401, 'Missing principal ID', 'UNAUTHORIZED');
      }

      const resourceId = event.pathParameters?.id;
      if (!resourceId) {
        return errorResponse(400, 'Missing resource ID', 'MISSING_PARAMETER');
      }

      const parsed = parseBody(event, validators.inheritResourcePermissions);
      if (!parsed.ok) return parsed.response;

      await ready();
      const permissions = await engine.inheritResourcePermissions(resourceId, parsed.body.parentResourceId, callerId);
      return successResponse(permissions);
    } catch (error) {
      return handleError(error, 'inheriting resource permissions');
    }
  }

  /**
   * GET /security/audit-report
   * Query: timeRange | start & end, includePermissionChanges, includeAccessAttempts, includeViolations
   */
  async function getSecurityAuditReport(event: PermissionRequestEvent): Promise<APIGatewayProxyResult> {
    try {
      const timeRange = parseTimeRange(event, 'lastWeek');
      if (!timeRange) {
        return errorResponse(400, 'Invalid time range', 'INVALID_PARAMETER');
      }

      const params = event.queryStringParameters || {};
      await ready();
      const report = await engine.generateSecurityAuditReport({
        timeRange,
        includePermissionChanges: params.includePermissionChanges === 'true',
        includeAccessAttempts: params.includeAccessAttempts === 'true',
        includeViolations: params.includeViolations !== 'false'
      });
      return successResponse(report);
    } catch (error) {
      return handleError(error, 'generating security audit report');
    }
  }

  /**
   * GET /security/metrics
   */
  async function getSecurityMetrics(event: PermissionRequestEvent): Promise<APIGatewayProxyResult> {
    try {
      const timeRange = parseTimeRange(event, 'lastMonth');
      if (!timeRange) {
        return errorResponse(400, 'Invalid time range', 'INVALID_PARAMETER');
      }

      await ready();
      return successResponse(await engine.loadSecurityMetrics(timeRange));
    } catch (error) {
      return handleError(error, 'loading security metrics');
    }
  }

  /**
   * GET /audit-logs
   * Query: userId, action, resource, result, startDate, endDate, limit
   */
  async function queryAuditLogs(event: PermissionRequestEvent): Promise<APIGatewayProxyResult> {
    try {
      const params = event.queryStringParameters || {};
      const filters: AuditLogFilters = {};

      if (params.userId) filters.userId = params.userId;
      if (params.resource) filters.resource = params.resource;
      if (params.startDate) {
        if (Number.isNaN(Date.parse(params.startDate))) {
          return errorResponse(400, 'Invalid startDate parameter', 'INVALID_PARAMETER');
        }
        filters.startDate = params.startDate;
      }
      if (params.endDate) {
        if (Number.isNaN(Date.parse(params.endDate))) {
          return errorResponse(400, 'Invalid endDate parameter', 'INVALID_PARAMETER');
        }
        filters.endDate = params.endDate;
      }

      if (params.action) {
        if (!isAuditAction(params.action)) {
          return errorResponse(400, 'Invalid action parameter', 'INVALID_PARAMETER');
        }
        filters.action = params.action;
      }

      if (params.result) {
        if (params.result !== 'granted' && params.result !== 'denied') {
          return errorResponse(400, 'Invalid result parameter', 'INVALID_PARAMETER');
        }
        filters.result = params.result;
      }

      if (params.limit) {
        const limit = parseInt(params.limit, 10);
        if (isNaN(limit) || limit < 1) {
          return errorResponse(400, 'Invalid limit parameter', 'INVALID_PARAMETER');
        }
        filters.limit = limit;
      }

      await ready();
      const logs = await engine.queryAuditLogs(filters);
      return successResponse({ logs });
    } catch (error) {
      return handleError(error, 'querying audit logs');
    }
  }

  /**
   * Audit writes are queued; wait for them before the response is returned,
   * since Lambda may freeze the container right after.
   */
  function flushingAudit(handler: PermissionHandler): PermissionHandler {
    return async (event) => {
      const response = await handler(event);
      await engine.flushAudit();
      return response;
    };
  }

  return {
    decide: flushingAudit(decide),
    evaluate: flushingAudit(evaluate),
    getEffectivePermissions: flushingAudit(getEffectivePermissions),
    assignRole: flushingAudit(assignRole),
    revokeRole: flushingAudit(revokeRole),
    createPolicy: flushingAudit(createPolicy),
    updatePolicy: flushingAudit(updatePolicy),
    setResourcePermissions: flushingAudit(setResourcePermissions),
    inheritResourcePermissions: flushingAudit(inheritResourcePermissions),
    getSecurityAuditReport: flushingAudit(getSecurityAuditReport),
    getSecurityMetrics: flushingAudit(getSecurityMetrics),
    queryAuditLogs: flushingAudit(queryAuditLogs)
  };
}
