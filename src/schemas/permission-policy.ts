/**
 * JSON Schemas for permission records.
 * Validates policy definitions on create/update and every record loaded from the durable store.
 */

import {
  CONDITION_OPERATORS,
  CONDITION_TYPES,
  PERMISSION_ACTIONS,
  PERMISSION_SCOPES,
  RESOURCE_TYPES
} from '../types/permission';
import { PERMISSION_AUDIT_ACTIONS } from '../types/permission-audit';

const PERMISSION_RESOURCE_TYPES = [...RESOURCE_TYPES, 'any', 'own_document'];
const PRINCIPAL_TYPES = ['user', 'group', 'role', 'system'];

export const PermissionConditionSchema = {
  type: 'object',
  required: ['type', 'attribute', 'operator', 'value'],
  properties: {
    type: { type: 'string', enum: [...CONDITION_TYPES] },
    attribute: { type: 'string' },
    operator: { type: 'string', enum: [...CONDITION_OPERATORS] },
    value: { type: 'string' }
  },
  additionalProperties: false
} as const;

export const PermissionRuleSchema = {
  type: 'object',
  required: ['id', 'conditions', 'effect'],
  properties: {
    id: { type: 'string', minLength: 1 },
    conditions: { type: 'array', items: PermissionConditionSchema },
    effect: { type: 'string', enum: ['allow', 'deny'] }
  },
  additionalProperties: false
} as const;

export const PermissionPolicySchema = {
  type: 'object',
  required: ['id', 'name', 'description', 'rules', 'scope', 'priority', 'isActive', 'createdBy', 'createdAt'],
  properties: {
    id: { type: 'string', minLength: 1 },
    name: { type: 'string', minLength: 1 },
    description: { type: 'string' },
    rules: { type: 'array', items: PermissionRuleSchema },
    scope: { type: 'string', enum: [...PERMISSION_SCOPES] },
    scopeId: { type: 'string' },
    priority: { type: 'string', enum: ['low', 'normal', 'high', 'critical'] },
    isActive: { type: 'boolean' },
    createdBy: { type: 'string' },
    createdAt: { type: 'string' },
    modifiedBy: { type: 'string' },
    modifiedAt: { type: 'string' }
  }
} as const;

export const PermissionSchema = {
  type: 'object',
  required: ['action', 'resourceType', 'isGranted', 'conditions'],
  properties: {
    action: { type: 'string', enum: [...PERMISSION_ACTIONS] },
    resourceType: { type: 'string', enum: PERMISSION_RESOURCE_TYPES },
    isGranted: { type: 'boolean' },
    conditions: { type: 'array', items: PermissionConditionSchema }
  }
} as const;

export const RoleSchema = {
  type: 'object',
  required: ['id', 'name', 'description', 'permissions', 'isSystemRole', 'createdAt'],
  properties: {
    id: { type: 'string', minLength: 1 },
    name: { type: 'string' },
    description: { type: 'string' },
    permissions: { type: 'array', items: PermissionSchema },
    isSystemRole: { type: 'boolean' },
    createdAt: { type: 'string' }
  }
} as const;

export const RoleAssignmentSchema = {
  type: 'object',
  required: ['id', 'principalId', 'roleId', 'scope', 'assignedBy', 'assignedAt', 'isActive'],
  properties: {
    id: { type: 'string', minLength: 1 },
    principalId: { type: 'string', minLength: 1 },
    roleId: { type: 'string', minLength: 1 },
    scope: { type: 'string', enum: [...PERMISSION_SCOPES] },
    assignedBy: { type: 'string' },
    assignedAt: { type: 'string' },
    expirationDate: { type: 'string' },
    isActive: { type: 'boolean' },
    revokedAt: { type: 'string' },
    revokedBy: { type: 'string' },
    revocationReason: { type: 'string' }
  }
} as const;

export const DirectPermissionSchema = {
  type: 'object',
  required: ['id', 'principalId', 'action', 'resourceType', 'isGranted', 'grantedBy', 'grantedAt'],
  properties: {
    id: { type: 'string', minLength: 1 },
    principalId: { type: 'string', minLength: 1 },
    action: { type: 'string', enum: [...PERMISSION_ACTIONS] },
    resourceType: { type: 'string', enum: PERMISSION_RESOURCE_TYPES },
    resourceId: { type: 'string' },
    isGranted: { type: 'boolean' },
    grantedBy: { type: 'string' },
    grantedAt: { type: 'string' },
    revokedAt: { type: 'string' },
    revokedBy: { type: 'string' }
  }
} as const;

export const PermissionGrantSchema = {
  type: 'object',
  required: ['principalId', 'principalType', 'action', 'isGranted', 'conditions'],
  properties: {
    principalId: { type: 'string', minLength: 1 },
    principalType: { type: 'string', enum: PRINCIPAL_TYPES },
    action: { type: 'string', enum: [...PERMISSION_ACTIONS] },
    isGranted: { type: 'boolean' },
    conditions: { type: 'array', items: PermissionConditionSchema }
  }
} as const;

export const ResourcePermissionsSchema = {
  type: 'object',
  required: ['resourceId', 'resourceType', 'permissions', 'inheritFromParent', 'setBy', 'setAt'],
  properties: {
    resourceId: { type: 'string', minLength: 1 },
    resourceType: { type: 'string', enum: [...RESOURCE_TYPES] },
    permissions: { type: 'array', items: PermissionGrantSchema },
    inheritFromParent: { type: 'boolean' },
    setBy: { type: 'string' },
    setAt: { type: 'string' }
  }
} as const;

export const AccessControlListSchema = {
  type: 'object',
  required: ['id', 'resourceId', 'resourceType', 'entries', 'inheritanceRules', 'createdBy', 'createdAt'],
  properties: {
    id: { type: 'string', minLength: 1 },
    resourceId: { type: 'string', minLength: 1 },
    resourceType: { type: 'string', enum: [...RESOURCE_TYPES] },
    entries: {
      type: 'array',
      items: {
        type: 'object',
        required: ['principalId', 'principalType', 'action', 'isGranted'],
        properties: {
          principalId: { type: 'string' },
          principalType: { type: 'string', enum: PRINCIPAL_TYPES },
          action: { type: 'string', enum: [...PERMISSION_ACTIONS] },
          isGranted: { type: 'boolean' }
        }
      }
    },
    inheritanceRules: {
      type: 'array',
      items: {
        type: 'object',
        required: ['parentResourceId', 'inheritedActions', 'conditions'],
        properties: {
          parentResourceId: { type: 'string' },
          inheritedActions: { type: 'array', items: { type: 'string', enum: [...PERMISSION_ACTIONS] } },
          conditions: { type: 'array', items: PermissionConditionSchema }
        }
      }
    },
    createdBy: { type: 'string' },
    createdAt: { type: 'string' }
  }
} as const;

export const PermissionAuditLogSchema = {
  type: 'object',
  required: ['id', 'sequence', 'timestamp', 'userId', 'action', 'result'],
  properties: {
    id: { type: 'string', minLength: 1 },
    sequence: { type: 'integer', minimum: 0 },
    timestamp: { type: 'string' },
    userId: { type: 'string' },
    action: { type: 'string', enum: [...PERMISSION_AUDIT_ACTIONS] },
    resource: { type: 'string' },
    result: { type: 'string', enum: ['granted', 'denied'] },
    context: {
      type: 'object',
      additionalProperties: { type: ['string', 'number', 'boolean'] }
    }
  }
} as const;
