import { describe, it, expect } from 'vitest';
import { ItemSchema } from './schema';
import { ConfigurationError } from '../errors';

const schema = new ItemSchema({
  name: 'applicant',
  requiredFields: ['email', 'age'],
  optionalFields: ['nickname', 'prefs.theme'],
  fieldTypes: { email: 'string', age: 'integer', nickname: 'string' },
  defaultValues: { 'prefs.theme': 'light' },
  validationRules: {
    age: { min: 18, max: 120 },
    email: { pattern: '[^@]+@', max_length: 40 },
    nickname: { enum: ['ace', 'bee'] },
  },
});

describe('ItemSchema construction', () => {
  it('should require a name', () => {
    expect(() => new ItemSchema({ name: '' })).toThrow('Schema must have a name');
  });

  it('should reject overlapping required and optional fields', () => {
    expect(() => new ItemSchema({ name: 's', requiredFields: ['a'], optionalFields: ['a'] }))
      .toThrow('Fields cannot be both required and optional: a');
  });

  it('should reject defaults for non-optional fields', () => {
    expect(() => new ItemSchema({ name: 's', requiredFields: ['a'], defaultValues: { a: 1 } }))
      .toThrow(ConfigurationError);
  });
});

describe('ItemSchema immutability', () => {
  it('should freeze the schema and copy its defaults', () => {
    const tags = ['new'];
    const frozen = new ItemSchema({ name: 'f', optionalFields: ['tags'], defaultValues: { tags } });
    tags.push('late');

    expect(Object.isFrozen(frozen)).toBe(true);
    expect(frozen.defaultValues.tags).toEqual(['new']);
    expect(frozen.applyDefaults({})).toEqual({ tags: ['new'] });
  });
});

describe('ItemSchema.validate', () => {
  it('should accept a conforming record', () => {
    expect(schema.validate({ email: 'ada@example.com', age: 36 })).toEqual([]);
  });

  it('should report every missing required field', () => {
    expect(schema.validate({})).toEqual([
      'Required field missing: email',
      'Required field missing: age',
    ]);
  });

  it('should never errors on absent optional fields', () => {
    expect(schema.validate({ email: 'a@b', age: 20 })).toEqual([]);
  });

  it('should report type mismatches', () => {
    expect(schema.validate({ email: 'a@b', age: 20.5 })).toEqual([
      "Field 'age' has invalid type: expected integer",
    ]);
  });

  it('should apply rules to present fields', () => {
    expect(schema.validate({ email: 'nobody', age: 12, nickname: 'zed' })).toEqual([
      "Field 'age' below minimum value 18",
      "Field 'email' does not match required pattern",
      "Field 'nickname' must be one of: [\"ace\",\"bee\"]",
    ]);
  });
});

describe('ItemSchema helpers', () => {
  it('should list fields and lookups', () => {
    expect(Array.from(schema.getAllFields()).sort()).toEqual(['age', 'email', 'nickname', 'prefs.theme']);
    expect(schema.isFieldRequired('email')).toBe(true);
    expect(schema.getFieldType('age')).toBe('integer');
    expect(schema.getDefaultValue('prefs.theme')).toBe('light');
  });

  it('should fill defaults without touching the input', () => {
    const input = { email: 'a@b', age: 20 };
    expect(schema.applyDefaults(input)).toEqual({ email: 'a@b', age: 20, prefs: { theme: 'light' } });
    expect(input).toEqual({ email: 'a@b', age: 20 });
  });

  it('should keep present values when applying defaults', () => {
    expect(schema.applyDefaults({ prefs: { theme: 'dark' } })).toEqual({ prefs: { theme: 'dark' } });
  });
});
