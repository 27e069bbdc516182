import { DynamoDB } from 'aws-sdk';
import { documentClient } from '../db/client';
import { TableNames, KeySchemas } from '../db/tables';
import {
  AccessControlList,
  DirectPermission,
  PermissionPolicy,
  ResourcePermissions,
  Role,
  RoleAssignment
} from '../types/permission';
import { PermissionAuditLog } from '../types/permission-audit';
import { PersistenceFailureError } from '../types/permission-error';

/**
 * Entities the engine persists, keyed by kind
 */
export interface PermissionEntityMap {
  policy: PermissionPolicy;
  role: Role;
  roleAssignment: RoleAssignment;
  directPermission: DirectPermission;
  resourcePermissions: ResourcePermissions;
  acl: AccessControlList;
  auditLog: PermissionAuditLog;
}

export type PermissionEntityKind = keyof PermissionEntityMap;

/**
 * Durable storage collaborator.
 * Implementations raise PersistenceFailureError and never retry.
 */
export interface PermissionStore {
  save<K extends PermissionEntityKind>(kind: K, entity: PermissionEntityMap[K]): Promise<void>;
  fetchAll<K extends PermissionEntityKind>(
    kind: K,
    predicate?: (entity: PermissionEntityMap[K]) => boolean
  ): Promise<PermissionEntityMap[K][]>;
}

/**
 * Subset of the DocumentClient the store relies on
 */
export interface PermissionDocumentClient {
  put(params: DynamoDB.DocumentClient.PutItemInput): { promise(): Promise<unknown> };
  scan(params: DynamoDB.DocumentClient.ScanInput): { promise(): Promise<DynamoDB.DocumentClient.ScanOutput> };
}

/**
 * Table backing each entity kind
 */
export const ENTITY_TABLES: Record<PermissionEntityKind, string> = {
  policy: TableNames.PERMISSION_POLICIES,
  role: TableNames.ROLE_DEFINITIONS,
  roleAssignment: TableNames.ROLE_ASSIGNMENTS,
  directPermission: TableNames.DIRECT_PERMISSIONS,
  resourcePermissions: TableNames.RESOURCE_PERMISSIONS,
  acl: TableNames.ACCESS_CONTROL_LISTS,
  auditLog: TableNames.PERMISSION_AUDIT_LOGS
};

/**
 * DynamoDB-backed permission store
 *
 * Each entity kind lives in its own table. Audit log entries are written with
 * a condition on the sort key so an existing entry is never overwritten.
 */
export class DynamoPermissionStore implements PermissionStore {
  private client: PermissionDocumentClient;

  constructor(client: PermissionDocumentClient = documentClient) {
    this.client = client;
  }

  async save<K extends PermissionEntityKind>(kind: K, entity: PermissionEntityMap[K]): Promise<void> {
    const params: DynamoDB.DocumentClient.PutItemInput = {
      TableName: ENTITY_TABLES[kind],
      Item: entity
    };

    if (kind === 'auditLog') {
      params.ConditionExpression = 'attribute_not_exists(#sk)';
      params.ExpressionAttributeNames = { '#sk': KeySchemas.PERMISSION_AUDIT_LOGS.sortKey };
    }

    try {
      await this.client.put(params).promise();
    } catch (error) {
      throw new PersistenceFailureError(`save ${kind}`, error);
    }
  }

  async fetchAll<K extends PermissionEntityKind>(
    kind: K,
    predicate?: (entity: PermissionEntityMap[K]) => boolean
  ): Promise<PermissionEntityMap[K][]> {
    const items: PermissionEntityMap[K][] = [];
    let exclusiveStartKey: DynamoDB.DocumentClient.Key | undefined;

    try {
      do {
        const scanParams: DynamoDB.DocumentClient.ScanInput = {
          TableName: ENTITY_TABLES[kind]
        };

        if (exclusiveStartKey) {
          scanParams.ExclusiveStartKey = exclusiveStartKey;
        }

        const result = await this.client.scan(scanParams).promise();
        items.push(...((result.Items || []) as PermissionEntityMap[K][]));
        exclusiveStartKey = result.LastEvaluatedKey;
      } while (exclusiveStartKey);
    } catch (error) {
      throw new PersistenceFailureError(`fetch ${kind}`, error);
    }

    return predicate ? items.filter(predicate) : items;
  }
}
