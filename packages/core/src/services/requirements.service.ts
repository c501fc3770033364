import type { BaseLogger } from 'pino';

import { deepEqual, isRecord } from '../utils/deepEqual.js';
import { formatError } from '../utils/errorFormatting.js';
import { matchGlob } from '../utils/glob.js';
import {
  compileTemplate,
  isTemplate,
  type Template,
  type TemplateVariables,
} from '../utils/template.js';

/**
 * A configured rule that a claim value must satisfy.
 */
export interface Requirement {
  validate(value: unknown, variables: TemplateVariables): boolean;
}

/** Claim name to the requirement its value must satisfy; every claim must pass. */
export type Requirements = ReadonlyMap<string, Requirement>;

/**
 * A requirement on a known value, with an optional requirement on the nested value when
 * the claim is an object.
 *
 * Matching by the shape of the claim value:
 * - array: any element matches
 * - object: any key matches and its value satisfies the nested requirement
 * - string: glob match in either direction, or the claim is `*.<required>`
 * - number: equal to a numeric required value
 * - anything else: structural equality
 */
export class ValueRequirement implements Requirement {
  constructor(
    readonly value: unknown,
    readonly nested: unknown,
    private logger: BaseLogger,
  ) {}

  validate(value: unknown, variables: TemplateVariables): boolean {
    if (Array.isArray(value)) {
      if (value.some((item) => this.validate(item, variables))) {
        return true;
      }
    } else if (isRecord(value)) {
      for (const [key, nested] of Object.entries(value)) {
        if (this.validate(key, variables) && this.validateNested(nested)) {
          return true;
        }
      }
    } else if (typeof value === 'string') {
      return typeof this.value === 'string' && matchString(value, this.value);
    } else if (typeof value === 'number') {
      if (typeof this.value !== 'number') {
        this.logger.warn(
          { required: this.value, type: typeof this.value },
          'unsupported requirement type for numeric claim comparison',
        );
        return false;
      }
      return value === this.value;
    }

    return deepEqual(value, this.value);
  }

  /**
   * Checks the value under a matched object key. Either side may be a single value or a
   * list; any required value equal to any supplied value is a match. A missing nested
   * requirement accepts anything.
   */
  validateNested(value: unknown): boolean {
    if (this.nested === undefined || this.nested === null) {
      return true;
    }
    const required: unknown[] = Array.isArray(this.nested) ? this.nested : [this.nested];
    const supplied: unknown[] = Array.isArray(value) ? value : [value];
    return required.some((candidate) => supplied.some((item) => deepEqual(candidate, item)));
  }
}

/**
 * A requirement whose value is interpolated from the request's template variables
 * before being matched like a {@link ValueRequirement}. An expansion error fails the
 * requirement.
 */
export class TemplateRequirement implements Requirement {
  constructor(
    readonly template: Template,
    readonly nested: unknown,
    private logger: BaseLogger,
  ) {}

  validate(value: unknown, variables: TemplateVariables): boolean {
    let expanded: string;
    try {
      expanded = this.template.expand(variables);
    } catch (error) {
      this.logger.warn(
        { template: this.template.text, error: formatError(error) },
        'failed to expand requirement template',
      );
      return false;
    }
    return new ValueRequirement(expanded, this.nested, this.logger).validate(value, variables);
  }
}

/** Satisfied when any of its requirements is (OR). */
export class AnyRequirement implements Requirement {
  constructor(readonly requirements: readonly Requirement[]) {}

  validate(value: unknown, variables: TemplateVariables): boolean {
    return this.requirements.some((requirement) => requirement.validate(value, variables));
  }
}

/** Satisfied when every one of its requirements is, against the same value (AND). */
export class AllRequirement implements Requirement {
  constructor(readonly requirements: readonly Requirement[]) {}

  validate(value: unknown, variables: TemplateVariables): boolean {
    return this.requirements.every((requirement) => requirement.validate(value, variables));
  }
}

function matchString(claim: string, required: string): boolean {
  return matchGlob(claim, required) || matchGlob(required, claim) || claim === `*.${required}`;
}

/**
 * Builds the requirement for one claim from its declarative configuration.
 *
 * - a scalar is a value requirement (a template requirement when it contains `{{ }}`)
 * - a list is satisfied by any of its entries
 * - an object is satisfied by any of its keys, each key's value being the nested
 *   requirement; the reserved keys `$and` and `$or` combine their entries instead
 *
 * @param value - Requirement configuration
 * @param logger - Logger for evaluation problems
 * @returns Requirement tree
 * @throws {Error} On an unknown `$` operator or a malformed template
 *
 * @example
 * ```typescript
 * buildRequirement({ 'test.example.com': ['user', 'admin'] }, logger);
 * buildRequirement({ $and: ['user', 'billing'] }, logger);
 * ```
 */
export function buildRequirement(value: unknown, logger: BaseLogger): Requirement {
  if (Array.isArray(value)) {
    return new AnyRequirement(value.map((item) => buildRequirement(item, logger)));
  }
  if (isRecord(value)) {
    return new AnyRequirement(
      Object.entries(value).map(([key, nested]) => buildKeyedRequirement(key, nested, logger)),
    );
  }
  return createRequirement(value, undefined, logger);
}

function buildKeyedRequirement(key: string, nested: unknown, logger: BaseLogger): Requirement {
  const operands = Array.isArray(nested) ? nested : [nested];
  switch (key) {
    case '$and':
      return new AllRequirement(operands.map((item) => buildRequirement(item, logger)));
    case '$or':
      return new AnyRequirement(operands.map((item) => buildRequirement(item, logger)));
  }
  if (key.startsWith('$')) {
    throw new Error(`unknown requirement operator: ${key}`);
  }
  return createRequirement(key, nested, logger);
}

function createRequirement(value: unknown, nested: unknown, logger: BaseLogger): Requirement {
  if (typeof value === 'string' && isTemplate(value)) {
    return new TemplateRequirement(compileTemplate(value), nested, logger);
  }
  return new ValueRequirement(value, nested, logger);
}

/**
 * Builds the requirements for every configured claim.
 *
 * @throws {Error} When a claim's requirement is invalid
 */
export function buildRequirements(
  require: Readonly<Record<string, unknown>>,
  logger: BaseLogger,
): Requirements {
  const requirements = new Map<string, Requirement>();
  for (const [claim, value] of Object.entries(require)) {
    try {
      requirements.set(claim, buildRequirement(value, logger));
    } catch (error) {
      throw new Error(`require.${claim}: ${formatError(error)}`);
    }
  }
  return requirements;
}

/**
 * Checks every configured claim against its requirement.
 *
 * @param requirements - Requirements by claim name
 * @param claims - Verified token payload
 * @param variables - Template variables of the current request
 * @throws {Error} On the first claim that is absent or does not match
 */
export function validateClaims(
  requirements: Requirements,
  claims: Readonly<Record<string, unknown>>,
  variables: TemplateVariables,
): void {
  for (const [claim, requirement] of requirements) {
    if (!Object.hasOwn(claims, claim)) {
      throw new Error(`claim is not present: ${claim}`);
    }
    if (!requirement.validate(claims[claim], variables)) {
      throw new Error(`claim is not valid: ${claim}`);
    }
  }
}
