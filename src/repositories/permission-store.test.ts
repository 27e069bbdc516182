import { DynamoDB } from 'aws-sdk';
import { DynamoPermissionStore, ENTITY_TABLES } from './permission-store';
import { PermissionPolicy, Role } from '../types/permission';
import { PermissionAuditLog } from '../types/permission-audit';
import { PersistenceFailureError } from '../types/permission-error';

jest.mock('../db/client', () => ({ documentClient: {} }));

const NOW = '2024-01-15T10:00:00.000Z';

const policy: PermissionPolicy = {
  id: 'p-1',
  name: 'Finance Access',
  description: '',
  rules: [],
  scope: 'global',
  priority: 'normal',
  isActive: true,
  createdBy: 'admin-1',
  createdAt: NOW
};

function role(id: string): Role {
  return { id, name: id, description: '', permissions: [], isSystemRole: false, createdAt: NOW };
}

/**
 * DocumentClient stand-in returning the given scan pages in order
 */
function createFakeClient(pages: DynamoDB.DocumentClient.ScanOutput[] = [], putError?: Error, scanError?: Error) {
  let page = 0;
  return {
    put: jest.fn((_params: DynamoDB.DocumentClient.PutItemInput) => ({
      promise: () => (putError ? Promise.reject(putError) : Promise.resolve({}))
    })),
    scan: jest.fn((_params: DynamoDB.DocumentClient.ScanInput) => ({
      promise: (): Promise<DynamoDB.DocumentClient.ScanOutput> =>
        scanError ? Promise.reject(scanError) : Promise.resolve(pages[page++] ?? {})
    }))
  };
}

describe('DynamoPermissionStore', () => {
  describe('save', () => {
    it('puts the entity into the table of its kind', async () => {
      const client = createFakeClient();
      const store = new DynamoPermissionStore(client);

      await store.save('policy', policy);

      expect(client.put).toHaveBeenCalledWith({ TableName: ENTITY_TABLES.policy, Item: policy });
    });

    it('never overwrites an existing audit entry', async () => {
      const client = createFakeClient();
      const store = new DynamoPermissionStore(client);
      const entry: PermissionAuditLog = {
        id: 'log-1',
        sequence: 1,
        timestamp: NOW,
        userId: 'u1',
        action: 'permission_checked',
        result: 'denied'
      };

      await store.save('auditLog', entry);

      expect(client.put).toHaveBeenCalledWith({
        TableName: ENTITY_TABLES.auditLog,
        Item: entry,
        ConditionExpression: 'attribute_not_exists(#sk)',
        ExpressionAttributeNames: { '#sk': 'id' }
      });
    });

    it('wraps client errors in PersistenceFailureError', async () => {
      const store = new DynamoPermissionStore(createFakeClient([], new Error('throttled')));

      const result = store.save('role', role('publisher'));

      await expect(result).rejects.toThrow(PersistenceFailureError);
      await expect(result).rejects.toThrow('Persistence failed during save role: throttled');
    });
  });

  describe('fetchAll', () => {
    it('follows scan pages until there is no continuation key', async () => {
      const client = createFakeClient([
        { Items: [role('a')], LastEvaluatedKey: { id: 'a' } },
        { Items: [role('b')] }
      ]);
      const store = new DynamoPermissionStore(client);

      await expect(store.fetchAll('role')).resolves.toEqual([role('a'), role('b')]);
      expect(client.scan).toHaveBeenCalledTimes(2);
      expect(client.scan).toHaveBeenNthCalledWith(1, { TableName: ENTITY_TABLES.role });
      expect(client.scan).toHaveBeenNthCalledWith(2, { TableName: ENTITY_TABLES.role, ExclusiveStartKey: { id: 'a' } });
    });

    it('treats a page without items as empty', async () => {
      const store = new DynamoPermissionStore(createFakeClient([{}]));

      await expect(store.fetchAll('acl')).resolves.toEqual([]);
    });

    it('applies the predicate', async () => {
      const store = new DynamoPermissionStore(createFakeClient([{ Items: [role('a'), role('b')] }]));

      await expect(store.fetchAll('role', (r) => r.id === 'b')).resolves.toEqual([role('b')]);
    });

    it('wraps client errors in PersistenceFailureError', async () => {
      const store = new DynamoPermissionStore(createFakeClient([], undefined, new Error('timeout')));

      await expect(store.fetchAll('acl')).rejects.toMatchObject({
        code: 'PERSISTENCE_FAILURE',
        operation: 'fetch acl'
      });
    });
  });
});
