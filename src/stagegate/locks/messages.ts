import { isRecord } from '../element/element';
import { measure, typeLabel, describeType } from './checks';
import type { Lock } from './lock';

export function show(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') return value;
  if (typeof value === 'function') return typeLabel(value);
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function rangeBounds(expected: unknown): [unknown, unknown] | null {
  return Array.isArray(expected) && expected.length === 2 ? [expected[0], expected[1]] : null;
}

function lengthConstraint(expected: unknown): string {
  if (isRecord(expected)) {
    const parts: string[] = [];
    if (expected.min !== undefined) parts.push(`at least ${show(expected.min)}`);
    if (expected.max !== undefined) parts.push(`at most ${show(expected.max)}`);
    return parts.join(' and ');
  }
  const bounds = rangeBounds(expected);
  if (bounds) return `between ${show(bounds[0])} and ${show(bounds[1])}`;
  return show(expected);
}

export function failureMessage(lock: Lock, value: unknown): string {
  const p = lock.propertyPath;
  const e = lock.expectedValue;

  switch (lock.type) {
    case 'exists':
      return e === false
        ? `Property '${p}' should not exist but has value: ${show(value)}`
        : `Property '${p}' is required but missing or empty`;
    case 'equals':
      return `Property '${p}' should equal '${show(e)}' but is '${show(value)}'`;
    case 'greater_than':
      return `Property '${p}' should be greater than ${show(e)} but is ${show(value)}`;
    case 'less_than':
      return `Property '${p}' should be less than ${show(e)} but is ${show(value)}`;
    case 'regex':
      return `Property '${p}' should match pattern '${show(e)}' but is '${show(value)}'`;
    case 'in_list':
      return `Property '${p}' should be one of ${show(e)} but is '${show(value)}'`;
    case 'not_in_list':
      return `Property '${p}' should not be one of ${show(e)} but is '${show(value)}'`;
    case 'contains':
      return `Property '${p}' should contain '${show(e)}' but is '${show(value)}'`;
    case 'type_check':
      return `Property '${p}' should be of type '${typeLabel(e)}' but is '${describeType(value)}' with value '${show(value)}'`;
    case 'range': {
      const bounds = rangeBounds(e);
      return bounds
        ? `Property '${p}' should be between ${show(bounds[0])} and ${show(bounds[1])} but is ${show(value)}`
        : `Property '${p}' should be within range ${show(e)} but is ${show(value)}`;
    }
    case 'length': {
      const actual = measure(value);
      const label = actual === null ? '<non-measurable>' : String(actual);
      return `Property '${p}' should have length ${lengthConstraint(e)} but has length ${label}`;
    }
    case 'not_empty':
      return `Property '${p}' should not be empty but is '${show(value)}'`;
    case 'custom':
      return `Custom validation '${lock.validatorName ?? ''}' failed for property '${p}'`;
    default: {
      const unreachable: never = lock.type;
      return `Validation failed for property '${p}' (${String(unreachable)})`;
    }
  }
}

export function actionMessage(lock: Lock, _value: unknown): string {
  const p = lock.propertyPath;
  const e = lock.expectedValue;

  switch (lock.type) {
    case 'exists':
      return e === false ? `Remove property: ${p}` : `Set missing field: ${p}`;
    case 'equals':
      return `Set ${p} to '${show(e)}'`;
    case 'greater_than':
      return `Increase ${p} to be greater than ${show(e)}`;
    case 'less_than':
      return `Decrease ${p} to be less than ${show(e)}`;
    case 'regex':
      return `Update ${p} to match pattern: ${show(e)}`;
    case 'in_list':
      return Array.isArray(e)
        ? `Set ${p} to one of: ${e.map(show).join(', ')}`
        : `Set ${p} to one of: ${show(e)}`;
    case 'not_in_list':
      return `Change ${p} from restricted value`;
    case 'contains':
      return `Ensure ${p} contains '${show(e)}'`;
    case 'type_check':
      return `Change ${p} to be of type ${typeLabel(e)}`;
    case 'range': {
      const bounds = rangeBounds(e);
      return bounds
        ? `Set ${p} to a value between ${show(bounds[0])} and ${show(bounds[1])}`
        : `Set ${p} to a value within range ${show(e)}`;
    }
    case 'length':
      if (typeof e === 'number') {
        return `Adjust ${p} to have exactly ${e} elements/characters`;
      }
      return `Adjust ${p} to have ${lengthConstraint(e)} elements/characters`;
    case 'not_empty':
      return `Provide a non-empty value for ${p}`;
    case 'custom':
      return `Fix custom validation for ${p}`;
    default: {
      const unreachable: never = lock.type;
      return `Fix validation for ${p} (${String(unreachable)})`;
    }
  }
}
