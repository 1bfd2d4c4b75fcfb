import { createElement, isRecord, type ElementInput } from '../element/element';
import { ConfigurationError, errorMessage } from '../errors';
import { frozenCopy, frozenRecord } from '../shared/freeze';
import { createLogger } from '../shared/logger';
import {
  contains,
  isBlank,
  isContainer,
  matchesAtStart,
  matchesType,
  measure,
  toNumber,
  valuesEqual,
} from './checks';
import { actionMessage, failureMessage } from './messages';
import type { ValidatorRegistry } from './registry';
import { isLockType, OPTIONAL_EXPECTATION, type LockResult, type LockType } from './types';

const logger = createLogger('lock');

/**
 * Per-evaluation environment handed down from the process.
 */
export interface EvaluationContext {
  validators?: ValidatorRegistry;
}

export interface LockOptions {
  type: LockType;
  propertyPath: string;
  expectedValue?: unknown;
  validatorName?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Atomic predicate over one property path.
 */
export class Lock {
  readonly type: LockType;
  readonly propertyPath: string;
  readonly expectedValue: unknown;
  readonly validatorName?: string;
  readonly metadata: Readonly<Record<string, unknown>>;

  constructor(options: LockOptions) {
    if (!isLockType(options.type)) {
      throw new ConfigurationError(`Unknown lock type: ${String(options.type)}`);
    }
    if (typeof options.propertyPath !== 'string' || options.propertyPath.trim() === '') {
      throw new ConfigurationError('Lock property path must be a non-empty string', {
        lockType: options.type,
      });
    }
    const expected = options.type === 'exists' && options.expectedValue === undefined
      ? true
      : options.expectedValue;
    if (!OPTIONAL_EXPECTATION.has(options.type) && (expected === undefined || expected === null)) {
      throw new ConfigurationError(`Lock type ${options.type} requires expected_value`, {
        propertyPath: options.propertyPath,
      });
    }
    if (options.type === 'custom' && !options.validatorName) {
      throw new ConfigurationError(`Custom lock on '${options.propertyPath}' requires validator_name`);
    }

    this.type = options.type;
    this.propertyPath = options.propertyPath;
    this.expectedValue = frozenCopy(expected);
    this.validatorName = options.validatorName;
    this.metadata = frozenRecord(options.metadata ?? {});
    Object.freeze(this);
  }

  static exists(path: string, metadata?: Record<string, unknown>): Lock {
    return new Lock({ type: 'exists', propertyPath: path, metadata });
  }

  static equals(path: string, expected: unknown, metadata?: Record<string, unknown>): Lock {
    return new Lock({ type: 'equals', propertyPath: path, expectedValue: expected, metadata });
  }

  static custom(path: string, validatorName: string, expected?: unknown): Lock {
    return new Lock({ type: 'custom', propertyPath: path, validatorName, expectedValue: expected });
  }

  validate(input: ElementInput, context: EvaluationContext = {}): LockResult {
    const lookup = createElement(input).lookup(this.propertyPath);

    if (!lookup.found) {
      const success = this.type === 'exists' && this.expectedValue === false;
      return this.result(success, undefined);
    }

    return this.result(this.check(lookup.value, context), lookup.value);
  }

  /** Same semantics as `validate`; no extra work is scheduled. */
  async validateAsync(input: ElementInput, context: EvaluationContext = {}): Promise<LockResult> {
    return this.validate(input, context);
  }

  private result(success: boolean, value: unknown): LockResult {
    return {
      success,
      propertyPath: this.propertyPath,
      lockType: this.type,
      actualValue: value,
      expectedValue: this.expectedValue,
      errorMessage: success ? '' : failureMessage(this, value),
      actionMessage: success ? '' : actionMessage(this, value),
      metadata: { ...this.metadata },
    };
  }

  private check(value: unknown, context: EvaluationContext): boolean {
    const expected = this.expectedValue;

    if (this.type === 'exists') {
      return expected === false ? isBlank(value) : !isBlank(value);
    }
    if (value === null || value === undefined) {
      return false;
    }

    switch (this.type) {
      case 'equals':
        return valuesEqual(value, expected);

      case 'greater_than':
      case 'less_than': {
        const actual = toNumber(value);
        const bound = toNumber(expected);
        if (actual === null || bound === null) return false;
        return this.type === 'greater_than' ? actual > bound : actual < bound;
      }

      case 'contains':
        return contains(value, expected);

      case 'regex':
        return typeof value === 'string' && matchesAtStart(String(expected), value);

      case 'type_check':
        return matchesType(value, expected);

      case 'range': {
        if (!Array.isArray(expected) || expected.length !== 2) return false;
        const actual = toNumber(value);
        const min = toNumber(expected[0]);
        const max = toNumber(expected[1]);
        if (actual === null || min === null || max === null) return false;
        return min <= actual && actual <= max;
      }

      case 'length':
        return checkLength(measure(value), expected);

      case 'not_empty': {
        if (typeof value === 'string') return value.trim().length > 0;
        const size = measure(value);
        return size === null ? true : size > 0;
      }

      case 'in_list':
        return isContainer(expected) && contains(expected, value);

      case 'not_in_list':
        return isContainer(expected) && !contains(expected, value);

      case 'custom':
        return this.runCustom(value, context);

      default: {
        const unreachable: never = this.type;
        logger.warn('Unhandled lock type', { lockType: String(unreachable) });
        return false;
      }
    }
  }

  private runCustom(value: unknown, context: EvaluationContext): boolean {
    const name = this.validatorName;
    const validator = name ? context.validators?.get(name) : undefined;
    if (!validator) {
      logger.debug('Custom validator not registered', { validator: name, propertyPath: this.propertyPath });
      return false;
    }
    try {
      return validator(value, this.expectedValue) === true;
    } catch (err) {
      logger.debug('Custom validator threw', {
        validator: name,
        propertyPath: this.propertyPath,
        error: errorMessage(err),
      });
      return false;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      type: this.type,
      property_path: this.propertyPath,
      expected_value: this.expectedValue,
      ...(this.validatorName ? { validator_name: this.validatorName } : {}),
      metadata: { ...this.metadata },
    };
  }
}

function checkLength(length: number | null, expected: unknown): boolean {
  if (length === null) return false;

  if (typeof expected === 'number') {
    return length === expected;
  }
  if (Array.isArray(expected) && expected.length === 2) {
    const min = toNumber(expected[0]);
    const max = toNumber(expected[1]);
    return min !== null && max !== null && min <= length && length <= max;
  }
  if (isRecord(expected)) {
    const min = expected.min === undefined || expected.min === null ? null : toNumber(expected.min);
    const max = expected.max === undefined || expected.max === null ? null : toNumber(expected.max);
    if (min !== null && length < min) return false;
    if (max !== null && length > max) return false;
    return true;
  }
  return false;
}
