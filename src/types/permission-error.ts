/**
 * Permission error taxonomy.
 * Administrative operations throw these; the decision path logs them and denies.
 */

export type PermissionsErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_RULE'
  | 'PERSISTENCE_FAILURE'
  | 'EVALUATION_FAILURE';

export type NotFoundEntity =
  | 'Role'
  | 'RoleAssignment'
  | 'PermissionPolicy'
  | 'ParentResource'
  | 'DirectPermission';

/**
 * Base class for every error raised by the engine
 */
export class PermissionsError extends Error {
  readonly code: PermissionsErrorCode;

  constructor(code: PermissionsErrorCode, message: string) {
    super(message);
    this.name = 'PermissionsError';
    this.code = code;
  }
}

export class NotFoundError extends PermissionsError {
  readonly entity: NotFoundEntity;
  readonly entityId: string;

  constructor(entity: NotFoundEntity, entityId: string) {
    super('NOT_FOUND', `${entity} not found: ${entityId}`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.entityId = entityId;
  }
}

export class InvalidRuleError extends PermissionsError {
  readonly details: string[];

  constructor(details: string[]) {
    super('INVALID_RULE', `Invalid policy rule configuration: ${details.join('; ')}`);
    this.name = 'InvalidRuleError';
    this.details = details;
  }
}

export class PersistenceFailureError extends PermissionsError {
  readonly operation: string;
  readonly cause: unknown;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('PERSISTENCE_FAILURE', `Persistence failed during ${operation}: ${reason}`);
    this.name = 'PersistenceFailureError';
    this.operation = operation;
    this.cause = cause;
  }
}

export class EvaluationFailureError extends PermissionsError {
  constructor(message: string) {
    super('EVALUATION_FAILURE', message);
    this.name = 'EvaluationFailureError';
  }
}
