/**
 * JSON Schemas for permission API request bodies.
 */

import {
  PERMISSION_ACTIONS,
  PERMISSION_SCOPES,
  RESOURCE_TYPES
} from '../types/permission';
import {
  PermissionConditionSchema,
  PermissionGrantSchema,
  PermissionRuleSchema
} from './permission-policy';

const AttributeBagSchema = {
  type: 'object',
  additionalProperties: {
    anyOf: [
      { type: 'string' },
      { type: 'number' },
      { type: 'boolean' },
      { type: 'array', items: { type: 'string' } }
    ]
  }
} as const;

export const PermissionResourceSchema = {
  type: 'object',
  required: ['id', 'type'],
  properties: {
    id: { type: 'string', minLength: 1 },
    type: { type: 'string', enum: [...RESOURCE_TYPES] },
    attributes: AttributeBagSchema
  },
  additionalProperties: false
} as const;

export const PermissionContextSchema = {
  type: 'object',
  properties: {
    requestTime: { type: 'string' },
    clientIP: { type: 'string' },
    userAgent: { type: 'string' },
    deviceId: { type: 'string' },
    location: { type: 'string' },
    sessionId: { type: 'string' },
    attributes: AttributeBagSchema
  },
  additionalProperties: false
} as const;

export const DecideRequestSchema = {
  type: 'object',
  required: ['principalId', 'action', 'resource'],
  properties: {
    principalId: { type: 'string', minLength: 1 },
    action: { type: 'string', enum: [...PERMISSION_ACTIONS] },
    resource: PermissionResourceSchema,
    context: PermissionContextSchema
  },
  additionalProperties: false
} as const;

export const EvaluateRequestSchema = {
  type: 'object',
  required: ['principalId', 'actions', 'resources'],
  properties: {
    principalId: { type: 'string', minLength: 1 },
    actions: { type: 'array', minItems: 1, items: { type: 'string', enum: [...PERMISSION_ACTIONS] } },
    resources: { type: 'array', minItems: 1, items: PermissionResourceSchema },
    conditions: { type: 'array', items: PermissionConditionSchema },
    context: PermissionContextSchema
  },
  additionalProperties: false
} as const;

export const AssignRoleRequestSchema = {
  type: 'object',
  required: ['principalId', 'roleId'],
  properties: {
    principalId: { type: 'string', minLength: 1 },
    roleId: { type: 'string', minLength: 1 },
    scope: { type: 'string', enum: [...PERMISSION_SCOPES] },
    expirationDate: { type: 'string' }
  },
  additionalProperties: false
} as const;

export const RevokeRoleRequestSchema = {
  type: 'object',
  required: ['principalId', 'roleId'],
  properties: {
    principalId: { type: 'string', minLength: 1 },
    roleId: { type: 'string', minLength: 1 },
    reason: { type: 'string' }
  },
  additionalProperties: false
} as const;

export const CreatePolicyRequestSchema = {
  type: 'object',
  required: ['name', 'description', 'rules', 'scope'],
  properties: {
    name: { type: 'string', minLength: 1 },
    description: { type: 'string' },
    rules: { type: 'array', items: PermissionRuleSchema },
    scope: { type: 'string', enum: [...PERMISSION_SCOPES] },
    scopeId: { type: 'string' },
    priority: { type: 'string', enum: ['low', 'normal', 'high', 'critical'] },
    isActive: { type: 'boolean' }
  },
  additionalProperties: false
} as const;

export const UpdatePolicyRequestSchema = {
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1 },
    description: { type: 'string' },
    rules: { type: 'array', items: PermissionRuleSchema },
    isActive: { type: 'boolean' }
  },
  additionalProperties: false
} as const;

export const SetResourcePermissionsRequestSchema = {
  type: 'object',
  required: ['resourceType', 'permissions'],
  properties: {
    resourceType: { type: 'string', enum: [...RESOURCE_TYPES] },
    permissions: { type: 'array', items: PermissionGrantSchema },
    inheritFromParent: { type: 'boolean' }
  },
  additionalProperties: false
} as const;

export const InheritResourcePermissionsRequestSchema = {
  type: 'object',
  required: ['parentResourceId'],
  properties: {
    parentResourceId: { type: 'string', minLength: 1 }
  },
  additionalProperties: false
} as const;
