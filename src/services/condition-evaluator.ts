/**
 * Condition Evaluator
 *
 * Resolves the attribute a condition refers to through a strategy per condition
 * type, then compares it with the condition value using the condition operator.
 * Missing attributes never satisfy a condition.
 */

import {
  AttributeBag,
  AttributeValue,
  ConditionOperator,
  ConditionType,
  PermissionCondition,
  PermissionContext,
  PermissionResource
} from '../types/permission';
import { EvaluationFailureError } from '../types/permission-error';
import { Clock, systemClock } from '../utils/clock';

/**
 * Directory collaborator resolving user and resource attributes
 */
export interface AttributeProvider {
  getUserAttributes(principalId: string): Promise<AttributeBag>;
  getResourceAttributes(resource: PermissionResource): Promise<AttributeBag>;
}

/**
 * Attribute provider backed by in-memory maps.
 * Resource attributes carried on the resource itself take precedence.
 */
export class StaticAttributeProvider implements AttributeProvider {
  private users: Map<string, AttributeBag>;
  private resources: Map<string, AttributeBag>;

  constructor(
    users: Record<string, AttributeBag> = {},
    resources: Record<string, AttributeBag> = {}
  ) {
    this.users = new Map(Object.entries(users));
    this.resources = new Map(Object.entries(resources));
  }

  async getUserAttributes(principalId: string): Promise<AttributeBag> {
    return { ...this.users.get(principalId) };
  }

  async getResourceAttributes(resource: PermissionResource): Promise<AttributeBag> {
    return { ...this.resources.get(resource.id), ...resource.attributes };
  }

  setUserAttributes(principalId: string, attributes: AttributeBag): void {
    this.users.set(principalId, { ...attributes });
  }

  setResourceAttributes(resourceId: string, attributes: AttributeBag): void {
    this.resources.set(resourceId, { ...attributes });
  }
}

/**
 * Everything a condition may refer to for one evaluation.
 * Attribute lookups are memoized so a provider is hit at most once per evaluation.
 */
export class ConditionInput {
  readonly principalId: string;
  readonly resource?: PermissionResource;
  readonly context?: PermissionContext;
  readonly now: Date;
  private provider: AttributeProvider;
  private userAttributes?: Promise<AttributeBag>;
  private resourceAttributes?: Promise<AttributeBag>;

  constructor(
    provider: AttributeProvider,
    principalId: string,
    now: Date,
    resource?: PermissionResource,
    context?: PermissionContext
  ) {
    this.provider = provider;
    this.principalId = principalId;
    this.now = now;
    this.resource = resource;
    this.context = context;
  }

  getUserAttributes(): Promise<AttributeBag> {
    if (!this.userAttributes) {
      this.userAttributes = this.provider.getUserAttributes(this.principalId);
    }
    return this.userAttributes;
  }

  getResourceAttributes(): Promise<AttributeBag> {
    if (!this.resource) {
      return Promise.resolve({});
    }
    if (!this.resourceAttributes) {
      this.resourceAttributes = this.provider.getResourceAttributes(this.resource);
    }
    return this.resourceAttributes;
  }
}

/**
 * Resolves the actual value a condition compares against
 */
export type ConditionStrategy = (
  condition: PermissionCondition,
  input: ConditionInput
) => Promise<AttributeValue | undefined>;

async function resolveUserAttribute(
  condition: PermissionCondition,
  input: ConditionInput
): Promise<AttributeValue | undefined> {
  if (condition.attribute === 'id') {
    return input.principalId;
  }
  const attributes = await input.getUserAttributes();
  return attributes[condition.attribute];
}

async function resolveResourceAttribute(
  condition: PermissionCondition,
  input: ConditionInput
): Promise<AttributeValue | undefined> {
  if (!input.resource) {
    return undefined;
  }
  if (condition.attribute === 'id') {
    return input.resource.id;
  }
  if (condition.attribute === 'type') {
    return input.resource.type;
  }
  const attributes = await input.getResourceAttributes();
  return attributes[condition.attribute];
}

async function resolveContextual(
  condition: PermissionCondition,
  input: ConditionInput
): Promise<AttributeValue | undefined> {
  const context = input.context;
  if (!context) {
    return undefined;
  }
  if (condition.attribute === 'sessionId') {
    return context.sessionId;
  }
  return context.attributes?.[condition.attribute];
}

async function resolveTemporal(
  condition: PermissionCondition,
  input: ConditionInput
): Promise<AttributeValue | undefined> {
  const requestTime = input.context?.requestTime ? new Date(input.context.requestTime) : input.now;
  if (Number.isNaN(requestTime.getTime())) {
    return undefined;
  }

  switch (condition.attribute) {
    case 'hour':
      return requestTime.getUTCHours();
    case 'dayOfWeek':
      return requestTime.getUTCDay();
    case 'date':
      return requestTime.toISOString().slice(0, 10);
    case 'timestamp':
      return requestTime.toISOString();
    default:
      return undefined;
  }
}

async function resolveEnvironmental(
  condition: PermissionCondition,
  input: ConditionInput
): Promise<AttributeValue | undefined> {
  const context = input.context;
  if (!context) {
    return undefined;
  }

  switch (condition.attribute) {
    case 'location':
      return context.location;
    case 'deviceId':
      return context.deviceId;
    case 'clientIP':
      return context.clientIP;
    case 'userAgent':
      return context.userAgent;
    default:
      return undefined;
  }
}

export const DEFAULT_CONDITION_STRATEGIES: Record<ConditionType, ConditionStrategy> = {
  userAttribute: resolveUserAttribute,
  resourceAttribute: resolveResourceAttribute,
  contextual: resolveContextual,
  temporal: resolveTemporal,
  environmental: resolveEnvironmental
};

/**
 * Substitute {{user.id}}, {{resource.id}} and {{resource.type}} placeholders
 */
export function expandConditionValue(value: string, input: Pick<ConditionInput, 'principalId' | 'resource'>): string {
  return value.replace(/\{\{\s*([a-z]+)\.([a-z]+)\s*\}\}/gi, (placeholder, scope: string, field: string) => {
    if (scope === 'user' && field === 'id') {
      return input.principalId;
    }
    if (scope === 'resource' && input.resource && field === 'id') {
      return input.resource.id;
    }
    if (scope === 'resource' && input.resource && field === 'type') {
      return input.resource.type;
    }
    return placeholder;
  });
}

function toComparableNumber(value: string | number | boolean): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'boolean') {
    return Number.NaN;
  }
  const numeric = Number(value);
  if (value.trim() !== '' && !Number.isNaN(numeric)) {
    return numeric;
  }
  return Date.parse(value);
}

function parseList(expected: string): string[] {
  return expected.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
}

/**
 * Compile a 'matches' pattern, raising EvaluationFailureError when it is not a valid expression
 */
export function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new EvaluationFailureError(`Invalid condition pattern '${pattern}': ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Compare an actual attribute value with the expected condition value
 */
export function compareValues(
  actual: AttributeValue | undefined,
  operator: ConditionOperator,
  expected: string
): boolean {
  if (actual === undefined) {
    return false;
  }

  const values = Array.isArray(actual) ? actual : [actual];
  const asStrings = values.map((value) => String(value));

  switch (operator) {
    case 'equals':
      return asStrings.includes(expected);
    case 'not_equals':
      return !asStrings.includes(expected);
    case 'contains':
      return Array.isArray(actual)
        ? asStrings.includes(expected)
        : String(actual).includes(expected);
    case 'not_contains':
      return Array.isArray(actual)
        ? !asStrings.includes(expected)
        : !String(actual).includes(expected);
    case 'in': {
      const list = parseList(expected);
      return asStrings.some((value) => list.includes(value));
    }
    case 'not_in': {
      const list = parseList(expected);
      return !asStrings.some((value) => list.includes(value));
    }
    case 'greater_than':
    case 'less_than': {
      if (Array.isArray(actual)) {
        return false;
      }
      const left = toComparableNumber(actual);
      const right = toComparableNumber(expected);
      if (Number.isNaN(left) || Number.isNaN(right)) {
        return false;
      }
      return operator === 'greater_than' ? left > right : left < right;
    }
    case 'matches': {
      const pattern = compilePattern(expected);
      return asStrings.some((value) => pattern.test(value));
    }
  }
}

export class ConditionEvaluator {
  private strategies: Record<ConditionType, ConditionStrategy>;
  private provider: AttributeProvider;
  private clock: Clock;

  constructor(
    provider: AttributeProvider,
    clock: Clock = systemClock,
    strategies: Partial<Record<ConditionType, ConditionStrategy>> = {}
  ) {
    this.provider = provider;
    this.clock = clock;
    this.strategies = { ...DEFAULT_CONDITION_STRATEGIES, ...strategies };
  }

  createInput(principalId: string, resource?: PermissionResource, context?: PermissionContext): ConditionInput {
    return new ConditionInput(this.provider, principalId, this.clock.now(), resource, context);
  }

  async evaluate(condition: PermissionCondition, input: ConditionInput): Promise<boolean> {
    const actual = await this.strategies[condition.type](condition, input);
    return compareValues(actual, condition.operator, expandConditionValue(condition.value, input));
  }

  /**
   * True when every condition holds; an empty list always holds
   */
  async evaluateAll(conditions: PermissionCondition[], input: ConditionInput): Promise<boolean> {
    for (const condition of conditions) {
      if (!(await this.evaluate(condition, input))) {
        return false;
      }
    }
    return true;
  }
}
