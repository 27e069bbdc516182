/**
 * Policy Validator Service
 * Validates policy definitions before they are persisted and records loaded from the durable store.
 */

import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import {
  AccessControlListSchema,
  DirectPermissionSchema,
  PermissionAuditLogSchema,
  PermissionPolicySchema,
  ResourcePermissionsSchema,
  RoleAssignmentSchema,
  RoleSchema
} from '../schemas/permission-policy';
import { PermissionCondition, PermissionPolicy, Role } from '../types/permission';
import { InvalidRuleError } from '../types/permission-error';
import { PermissionEntityKind, PermissionEntityMap } from '../repositories/permission-store';
import { compilePattern } from './condition-evaluator';

type RecordValidators = { [K in PermissionEntityKind]: ValidateFunction<PermissionEntityMap[K]> };

/**
 * Converts AJV errors to "path message" strings
 */
function convertErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors) return [];

  return errors.map((error) => `${error.instancePath || '/'} ${error.message || 'Unknown validation error'}`);
}

/**
 * Checks a condition list beyond its shape: attribute and value must be non-empty
 * and a 'matches' value must compile as a regular expression.
 */
export function validateConditions(conditions: PermissionCondition[], path: string): string[] {
  const errors: string[] = [];

  conditions.forEach((condition, index) => {
    const conditionPath = `${path}/conditions/${index}`;
    if (condition.attribute.trim() === '') {
      errors.push(`${conditionPath} attribute must not be empty`);
    }
    if (condition.value.trim() === '') {
      errors.push(`${conditionPath} value must not be empty`);
    }
    if (condition.operator === 'matches' && condition.value.trim() !== '') {
      try {
        compilePattern(condition.value);
      } catch (error) {
        errors.push(`${conditionPath} ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  });

  return errors;
}

export class PolicyValidator {
  private ajv: Ajv;
  private validators: RecordValidators;

  constructor() {
    this.ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
    this.validators = {
      policy: this.ajv.compile<PermissionPolicy>(PermissionPolicySchema),
      role: this.ajv.compile<Role>(RoleSchema),
      roleAssignment: this.ajv.compile<PermissionEntityMap['roleAssignment']>(RoleAssignmentSchema),
      directPermission: this.ajv.compile<PermissionEntityMap['directPermission']>(DirectPermissionSchema),
      resourcePermissions: this.ajv.compile<PermissionEntityMap['resourcePermissions']>(ResourcePermissionsSchema),
      acl: this.ajv.compile<PermissionEntityMap['acl']>(AccessControlListSchema),
      auditLog: this.ajv.compile<PermissionEntityMap['auditLog']>(PermissionAuditLogSchema)
    };
  }

  /**
   * Returns every problem found in a record of the given kind; empty when valid
   */
  recordErrors<K extends PermissionEntityKind>(kind: K, record: unknown): string[] {
    const validate: ValidateFunction<PermissionEntityMap[K]> = this.validators[kind];

    if (!validate(record)) {
      return convertErrors(validate.errors);
    }

    if (kind === 'policy' && this.validators.policy(record)) {
      return record.rules.flatMap((rule, index) => validateConditions(rule.conditions, `/rules/${index}`));
    }

    if (kind === 'role' && this.validators.role(record)) {
      return record.permissions.flatMap((permission, index) =>
        validateConditions(permission.conditions, `/permissions/${index}`)
      );
    }

    return [];
  }

  /**
   * Throws InvalidRuleError unless the policy is well formed
   */
  assertValidPolicy(policy: PermissionPolicy): void {
    const errors = this.recordErrors('policy', policy);
    if (errors.length > 0) {
      throw new InvalidRuleError(errors);
    }
  }

  /**
   * Throws InvalidRuleError unless the role is well formed
   */
  assertValidRole(role: Role): void {
    const errors = this.recordErrors('role', role);
    if (errors.length > 0) {
      throw new InvalidRuleError(errors);
    }
  }
}

export const policyValidator = new PolicyValidator();
