import { createElement, isRecord, type ElementInput } from '../element/element';
import { parsePath } from '../element/path';
import { ConfigurationError } from '../errors';
import { contains, matchesAtStart, toNumber } from '../locks/checks';
import { show } from '../locks/messages';
import { frozenRecord } from '../shared/freeze';

export const FIELD_TYPES = ['string', 'number', 'integer', 'boolean', 'array', 'object', 'null'] as const;
export type FieldType = typeof FIELD_TYPES[number];

export interface FieldRules {
  min?: number;
  max?: number;
  min_length?: number;
  max_length?: number;
  pattern?: string;
  enum?: readonly unknown[];
}

export interface SchemaOptions {
  name: string;
  requiredFields?: Iterable<string>;
  optionalFields?: Iterable<string>;
  fieldTypes?: Record<string, FieldType>;
  defaultValues?: Record<string, unknown>;
  validationRules?: Record<string, FieldRules>;
  metadata?: Record<string, unknown>;
}

function freezeRules(rules: Record<string, FieldRules>): Readonly<Record<string, FieldRules>> {
  const out: Record<string, FieldRules> = {};
  for (const [field, rule] of Object.entries(rules)) {
    out[field] = Object.freeze(rule.enum ? { ...rule, enum: Object.freeze([...rule.enum]) } : { ...rule });
  }
  return Object.freeze(out);
}

function isFieldType(value: string): value is FieldType {
  return FIELD_TYPES.some(t => t === value);
}

function matchesFieldType(value: unknown, type: FieldType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return isRecord(value);
    case 'null':
      return value === null;
  }
}

/**
 * Structural contract for an element: presence, declared types and
 * per-field rules.
 */
export class ItemSchema {
  readonly name: string;
  readonly requiredFields: ReadonlySet<string>;
  readonly optionalFields: ReadonlySet<string>;
  readonly fieldTypes: Readonly<Record<string, FieldType>>;
  readonly defaultValues: Readonly<Record<string, unknown>>;
  readonly validationRules: Readonly<Record<string, FieldRules>>;
  readonly metadata: Readonly<Record<string, unknown>>;

  constructor(options: SchemaOptions) {
    if (!options.name) {
      throw new ConfigurationError('Schema must have a name');
    }
    const required = new Set(options.requiredFields ?? []);
    const optional = new Set(options.optionalFields ?? []);

    const overlap = Array.from(required).filter(f => optional.has(f));
    if (overlap.length > 0) {
      throw new ConfigurationError(`Fields cannot be both required and optional: ${overlap.join(', ')}`, {
        schema: options.name,
      });
    }

    const defaults = options.defaultValues ?? {};
    const invalidDefaults = Object.keys(defaults).filter(f => !optional.has(f));
    if (invalidDefaults.length > 0) {
      throw new ConfigurationError(`Default values provided for non-optional fields: ${invalidDefaults.join(', ')}`, {
        schema: options.name,
      });
    }

    const fieldTypes = options.fieldTypes ?? {};
    for (const [field, type] of Object.entries(fieldTypes)) {
      if (!field.trim()) {
        throw new ConfigurationError(`Invalid field path: '${field}'`, { schema: options.name });
      }
      if (!isFieldType(type)) {
        throw new ConfigurationError(`Invalid type '${String(type)}' for field '${field}'`, { schema: options.name });
      }
    }

    this.name = options.name;
    this.requiredFields = required;
    this.optionalFields = optional;
    this.fieldTypes = Object.freeze({ ...fieldTypes });
    this.defaultValues = frozenRecord(defaults);
    this.validationRules = freezeRules(options.validationRules ?? {});
    this.metadata = frozenRecord(options.metadata ?? {});
    Object.freeze(this);
  }

  /**
   * All violations, accumulated. An empty list means valid.
   */
  validate(input: ElementInput): string[] {
    const element = createElement(input);
    const errors: string[] = [];

    for (const field of this.requiredFields) {
      if (!element.hasProperty(field)) {
        errors.push(`Required field missing: ${field}`);
      }
    }

    for (const [field, type] of Object.entries(this.fieldTypes)) {
      const lookup = element.lookup(field);
      if (lookup.found && !matchesFieldType(lookup.value, type)) {
        errors.push(`Field '${field}' has invalid type: expected ${type}`);
      }
    }

    for (const [field, rules] of Object.entries(this.validationRules)) {
      const lookup = element.lookup(field);
      if (lookup.found) {
        errors.push(...checkRules(field, lookup.value, rules));
      }
    }

    return errors;
  }

  isValid(input: ElementInput): boolean {
    return this.validate(input).length === 0;
  }

  getAllFields(): Set<string> {
    return new Set([...this.requiredFields, ...this.optionalFields]);
  }

  isFieldRequired(field: string): boolean {
    return this.requiredFields.has(field);
  }

  getFieldType(field: string): FieldType | undefined {
    return this.fieldTypes[field];
  }

  getDefaultValue(field: string): unknown {
    return this.defaultValues[field];
  }

  /**
   * Copy of `data` with defaults filled in for absent optional fields.
   */
  applyDefaults(data: Record<string, unknown>): Record<string, unknown> {
    const copy = structuredClone(data);
    const element = createElement(copy);
    for (const [field, value] of Object.entries(this.defaultValues)) {
      if (!element.hasProperty(field)) {
        setPath(copy, field, structuredClone(value));
      }
    }
    return copy;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      required_fields: Array.from(this.requiredFields),
      optional_fields: Array.from(this.optionalFields),
      field_types: { ...this.fieldTypes },
      default_values: { ...this.defaultValues },
      validation_rules: { ...this.validationRules },
    };
  }
}

function checkRules(field: string, value: unknown, rules: FieldRules): string[] {
  const errors: string[] = [];

  if (rules.min !== undefined) {
    const n = toNumber(value);
    if (n === null) errors.push(`Field '${field}' cannot be compared to minimum value`);
    else if (n < rules.min) errors.push(`Field '${field}' below minimum value ${rules.min}`);
  }
  if (rules.max !== undefined) {
    const n = toNumber(value);
    if (n === null) errors.push(`Field '${field}' cannot be compared to maximum value`);
    else if (n > rules.max) errors.push(`Field '${field}' above maximum value ${rules.max}`);
  }

  if (typeof value === 'string') {
    const length = Array.from(value).length;
    if (rules.min_length !== undefined && length < rules.min_length) {
      errors.push(`Field '${field}' below minimum length ${rules.min_length}`);
    }
    if (rules.max_length !== undefined && length > rules.max_length) {
      errors.push(`Field '${field}' above maximum length ${rules.max_length}`);
    }
    if (rules.pattern !== undefined) {
      if (!isValidPattern(rules.pattern)) {
        errors.push(`Invalid pattern for field '${field}'`);
      } else if (!matchesAtStart(rules.pattern, value)) {
        errors.push(`Field '${field}' does not match required pattern`);
      }
    }
  }

  if (rules.enum !== undefined && !contains(rules.enum, value)) {
    errors.push(`Field '${field}' must be one of: ${show(rules.enum)}`);
  }

  return errors;
}

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

function setPath(target: Record<string, unknown>, path: string, value: unknown): void {
  const keys: string[] = [];
  for (const segment of parsePath(path)) {
    keys.push(segment.kind === 'key' ? segment.key : segment.raw);
  }
  if (keys.length === 0) return;

  let current = target;
  for (const key of keys.slice(0, -1)) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else if (next === undefined) {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    } else {
      // An existing non-object blocks the path
      return;
    }
  }
  current[keys[keys.length - 1]] = value;
}
