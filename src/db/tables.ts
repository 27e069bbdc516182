/**
 * DynamoDB table configurations for the permission store
 */

/**
 * Table name constants - use environment variables for flexibility across environments
 */
export const TableNames = {
  PERMISSION_POLICIES: process.env.PERMISSION_POLICIES_TABLE || 'permission-policies',
  ROLE_DEFINITIONS: process.env.ROLE_DEFINITIONS_TABLE || 'role-definitions',
  ROLE_ASSIGNMENTS: process.env.ROLE_ASSIGNMENTS_TABLE || 'role-assignments',
  DIRECT_PERMISSIONS: process.env.DIRECT_PERMISSIONS_TABLE || 'direct-permissions',
  RESOURCE_PERMISSIONS: process.env.RESOURCE_PERMISSIONS_TABLE || 'resource-permissions',
  ACCESS_CONTROL_LISTS: process.env.ACCESS_CONTROL_LISTS_TABLE || 'access-control-lists',
  PERMISSION_AUDIT_LOGS: process.env.PERMISSION_AUDIT_LOGS_TABLE || 'permission-audit-logs'
} as const;

/**
 * Key schema definitions for each table
 */
export const KeySchemas = {
  /**
   * Permission Policies Table
   * - Partition Key: id
   */
  PERMISSION_POLICIES: {
    partitionKey: 'id'
  },

  /**
   * Role Definitions Table
   * - Partition Key: id
   */
  ROLE_DEFINITIONS: {
    partitionKey: 'id'
  },

  /**
   * Role Assignments Table
   * - Partition Key: principalId
   * - Sort Key: id
   * Revoked assignments are overwritten in place, never deleted.
   */
  ROLE_ASSIGNMENTS: {
    partitionKey: 'principalId',
    sortKey: 'id'
  },

  /**
   * Direct Permissions Table
   * - Partition Key: principalId
   * - Sort Key: id
   */
  DIRECT_PERMISSIONS: {
    partitionKey: 'principalId',
    sortKey: 'id'
  },

  /**
   * Resource Permissions Table
   * - Partition Key: resourceId
   */
  RESOURCE_PERMISSIONS: {
    partitionKey: 'resourceId'
  },

  /**
   * Access Control Lists Table
   * - Partition Key: resourceId
   * - Sort Key: id
   */
  ACCESS_CONTROL_LISTS: {
    partitionKey: 'resourceId',
    sortKey: 'id'
  },

  /**
   * Permission Audit Logs Table
   * - Partition Key: userId
   * - Sort Key: id
   * Entries are written once; the sequence attribute restores arrival order.
   */
  PERMISSION_AUDIT_LOGS: {
    partitionKey: 'userId',
    sortKey: 'id'
  }
} as const;
