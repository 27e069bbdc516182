import {
  PermissionEntityKind,
  PermissionEntityMap,
  PermissionStore
} from './permission-store';

type EntityTables = { [K in PermissionEntityKind]: Map<string, PermissionEntityMap[K]> };

/**
 * Identity of a stored entity within its kind; saving the same identity overwrites
 */
const ENTITY_KEYS: { [K in PermissionEntityKind]: (entity: PermissionEntityMap[K]) => string } = {
  policy: (policy) => policy.id,
  role: (role) => role.id,
  roleAssignment: (assignment) => assignment.id,
  directPermission: (permission) => permission.id,
  resourcePermissions: (permissions) => permissions.resourceId,
  acl: (acl) => acl.id,
  auditLog: (log) => log.id
};

function createTables(): EntityTables {
  return {
    policy: new Map(),
    role: new Map(),
    roleAssignment: new Map(),
    directPermission: new Map(),
    resourcePermissions: new Map(),
    acl: new Map(),
    auditLog: new Map()
  };
}

/**
 * In-memory permission store for tests and local runs
 */
export class InMemoryPermissionStore implements PermissionStore {
  private tables: EntityTables = createTables();

  async save<K extends PermissionEntityKind>(kind: K, entity: PermissionEntityMap[K]): Promise<void> {
    const table: Map<string, PermissionEntityMap[K]> = this.tables[kind];
    const keyOf: (entity: PermissionEntityMap[K]) => string = ENTITY_KEYS[kind];
    table.set(keyOf(entity), structuredClone(entity));
  }

  async fetchAll<K extends PermissionEntityKind>(
    kind: K,
    predicate?: (entity: PermissionEntityMap[K]) => boolean
  ): Promise<PermissionEntityMap[K][]> {
    const table: Map<string, PermissionEntityMap[K]> = this.tables[kind];
    const items = Array.from(table.values(), (item) => structuredClone(item));
    return predicate ? items.filter(predicate) : items;
  }

  /**
   * Number of stored entities of a kind
   */
  count(kind: PermissionEntityKind): number {
    return this.tables[kind].size;
  }

  clear(): void {
    this.tables = createTables();
  }
}
