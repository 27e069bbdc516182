import { createPermissionEngine } from '../services/permission-engine';
import { createPermissionHandlers } from './permissions';

/**
 * Lambda entry points backed by the DynamoDB permission store.
 * The store is loaded on the first request of each container and reloaded once
 * the last load is older than the decision cache TTL, so changes made through
 * other containers are seen within one TTL. A failed load is retried on the next request.
 */

const engine = createPermissionEngine();
const reloadAfterMs = engine.config.cacheTtlSeconds * 1000;
let loading: Promise<void> | undefined;
let loadedAt: number | undefined;

function ensureLoaded(): Promise<void> {
  if (loading && loadedAt !== undefined && Date.now() - loadedAt >= reloadAfterMs) {
    loading = undefined;
  }
  if (!loading) {
    const startedAt = Date.now();
    loadedAt = undefined;
    loading = engine.refresh().then(
      () => {
        loadedAt = startedAt;
      },
      (error: unknown) => {
        loading = undefined;
        throw error;
      }
    );
  }
  return loading;
}

export const {
  decide,
  evaluate,
  getEffectivePermissions,
  assignRole,
  revokeRole,
  createPolicy,
  updatePolicy,
  setResourcePermissions,
  inheritResourcePermissions,
  getSecurityAuditReport,
  getSecurityMetrics,
  queryAuditLogs
} = createPermissionHandlers(engine, ensureLoaded);
