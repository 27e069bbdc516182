export * from './types/permission';
export * from './types/permission-audit';
export * from './types/permission-error';
export { Clock, systemClock } from './utils/clock';
export {
  PermissionStore,
  PermissionEntityKind,
  PermissionEntityMap,
  PermissionDocumentClient,
  DynamoPermissionStore
} from './repositories/permission-store';
export { InMemoryPermissionStore } from './repositories/in-memory-permission-store';
export {
  AttributeProvider,
  StaticAttributeProvider,
  ConditionEvaluator,
  ConditionStrategy
} from './services/condition-evaluator';
export { DecisionCache, DecisionCacheConfig, DecisionCacheStats } from './services/decision-cache';
export {
  assessSecurityRisk,
  generateSecurityRecommendations,
  identifySecurityViolations,
  resolveTimeRange
} from './services/permission-audit';
export { PolicyValidator } from './services/policy-validator';
export { createDefaultPolicies, createDefaultRoles } from './services/policy-store';
export {
  EngineConfig,
  PermissionEngine,
  PermissionEngineDeps,
  createPermissionEngine,
  loadEngineConfig
} from './services/permission-engine';
export { createPermissionHandlers, PermissionHandlers } from './handlers/permissions';
