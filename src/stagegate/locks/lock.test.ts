import { describe, it, expect } from 'vitest';
import { Lock } from './lock';
import { ValidatorRegistry } from './registry';
import { LOCK_TYPES } from './types';
import { ConfigurationError } from '../errors';

const record = {
  email: 'ada@example.com',
  age: 36,
  age_text: '36',
  verified: true,
  blank: '   ',
  nothing: null,
  tags: ['admin', 'ops'],
  profile: { city: 'Paris', zip: '75001' },
  empty_list: [],
  name: 'Ada',
};

function lock(type: Lock['type'], propertyPath: string, expectedValue?: unknown): Lock {
  return new Lock({ type, propertyPath, expectedValue });
}

describe('Lock construction', () => {
  it('should reject an empty path', () => {
    expect(() => lock('exists', '')).toThrow(ConfigurationError);
  });

  it('should require an expected value for comparison types', () => {
    expect(() => lock('equals', 'email')).toThrow('Lock type equals requires expected_value');
    expect(() => lock('greater_than', 'age', null)).toThrow(ConfigurationError);
  });

  it('should require a validator name for custom locks', () => {
    expect(() => lock('custom', 'email')).toThrow(/requires validator_name/);
  });

  it('should default exists to expecting presence', () => {
    expect(Lock.exists('email').expectedValue).toBe(true);
  });
});

describe('Lock.validate', () => {
  it('should fail a missing property with the required message', () => {
    const result = Lock.exists('phone').validate(record);
    expect(result.success).toBe(false);
    expect(result.errorMessage).toBe("Property 'phone' is required but missing or empty");
    expect(result.actionMessage).toBe('Set missing field: phone');
  });

  it('should pass exists(false) on a missing or blank property', () => {
    expect(lock('exists', 'phone', false).validate(record).success).toBe(true);
    expect(lock('exists', 'empty_list', false).validate(record).success).toBe(true);
    expect(lock('exists', 'email', false).validate(record).success).toBe(false);
  });

  it('should fail every non-exists type on a missing property', () => {
    expect(lock('not_empty', 'phone').validate(record).success).toBe(false);
    expect(lock('equals', 'phone', 'x').validate(record).success).toBe(false);
  });

  it('should fail a present null for non-exists types', () => {
    expect(lock('not_empty', 'nothing').validate(record).success).toBe(false);
    expect(lock('type_check', 'nothing', 'null').validate(record).success).toBe(false);
  });

  it('should compare structurally with equals', () => {
    expect(lock('equals', 'profile', { city: 'Paris', zip: '75001' }).validate(record).success).toBe(true);
    expect(lock('equals', 'tags', ['admin']).validate(record).success).toBe(false);
  });

  it('should coerce numeric strings for greater_than and less_than', () => {
    expect(lock('greater_than', 'age_text', 18).validate(record).success).toBe(true);
    expect(lock('less_than', 'age', '40').validate(record).success).toBe(true);
    expect(lock('greater_than', 'name', 1).validate(record).success).toBe(false);
  });

  it('should format the greater_than failure', () => {
    const result = lock('greater_than', 'age', 40).validate(record);
    expect(result.errorMessage).toBe("Property 'age' should be greater than 40 but is 36");
    expect(result.actionMessage).toBe('Increase age to be greater than 40');
    expect(result.actualValue).toBe(36);
  });

  it('should check contains on strings, arrays and maps', () => {
    expect(lock('contains', 'email', '@').validate(record).success).toBe(true);
    expect(lock('contains', 'tags', 'ops').validate(record).success).toBe(true);
    expect(lock('contains', 'profile', 'city').validate(record).success).toBe(true);
    expect(lock('contains', 'age', 3).validate(record).success).toBe(false);
  });

  it('should anchor regex at the start and fail on malformed patterns', () => {
    expect(lock('regex', 'email', '[a-z]+@').validate(record).success).toBe(true);
    expect(lock('regex', 'email', 'example').validate(record).success).toBe(false);
    expect(lock('regex', 'email', '([').validate(record).success).toBe(false);
    expect(lock('regex', 'age', '3').validate(record).success).toBe(false);
  });

  it('should check type names and constructors', () => {
    expect(lock('type_check', 'age', 'int').validate(record).success).toBe(true);
    expect(lock('type_check', 'age', 'string').validate(record).success).toBe(false);
    expect(lock('type_check', 'tags', 'list').validate(record).success).toBe(true);
    expect(lock('type_check', 'profile', 'dict').validate(record).success).toBe(true);
    expect(lock('type_check', 'email', String).validate(record).success).toBe(true);
    expect(lock('type_check', 'email', 'unknown-type').validate(record).success).toBe(false);
  });

  it('should check inclusive ranges', () => {
    expect(lock('range', 'age', [18, 36]).validate(record).success).toBe(true);
    expect(lock('range', 'age', [37, 99]).validate(record).success).toBe(false);
    expect(lock('range', 'age', 18).validate(record).success).toBe(false);
  });

  it('should check length as exact, pair or bounds', () => {
    expect(lock('length', 'name', 3).validate(record).success).toBe(true);
    expect(lock('length', 'tags', [1, 2]).validate(record).success).toBe(true);
    expect(lock('length', 'profile', { min: 3 }).validate(record).success).toBe(false);
    expect(lock('length', 'age', 2).validate(record).success).toBe(false);
  });

  it('should describe length bounds in messages', () => {
    const result = lock('length', 'name', { min: 5, max: 10 }).validate(record);
    expect(result.errorMessage).toBe("Property 'name' should have length at least 5 and at most 10 but has length 3");
    expect(result.actionMessage).toBe('Adjust name to have at least 5 and at most 10 elements/characters');
  });

  it('should trim strings for not_empty', () => {
    expect(lock('not_empty', 'blank').validate(record).success).toBe(false);
    expect(lock('not_empty', 'tags').validate(record).success).toBe(true);
    expect(lock('not_empty', 'age').validate(record).success).toBe(true);
  });

  it('should check list membership', () => {
    expect(lock('in_list', 'name', ['Ada', 'Grace']).validate(record).success).toBe(true);
    expect(lock('not_in_list', 'name', ['Ada']).validate(record).success).toBe(false);
    expect(lock('in_list', 'age', 36).validate(record).success).toBe(false);
    expect(lock('not_in_list', 'age', 36).validate(record).success).toBe(false);
  });

  it('should format in_list actions', () => {
    const result = lock('in_list', 'name', ['Grace', 'Alan']).validate(record);
    expect(result.errorMessage).toBe(`Property 'name' should be one of ["Grace","Alan"] but is 'Ada'`);
    expect(result.actionMessage).toBe('Set name to one of: Grace, Alan');
  });
});

describe('custom locks', () => {
  const validators = new ValidatorRegistry({
    is_even: value => typeof value === 'number' && value % 2 === 0,
    explodes: () => {
      throw new Error('boom');
    },
  });

  it('should dispatch through the context registry', () => {
    expect(Lock.custom('age', 'is_even').validate(record, { validators }).success).toBe(true);
  });

  it('should fail when the validator is not registered', () => {
    const result = Lock.custom('age', 'missing').validate(record, { validators });
    expect(result.success).toBe(false);
    expect(result.errorMessage).toBe("Custom validation 'missing' failed for property 'age'");
  });

  it('should fail without a registry', () => {
    expect(Lock.custom('age', 'is_even').validate(record).success).toBe(false);
  });

  it('should treat a throwing validator as failure', () => {
    expect(Lock.custom('age', 'explodes').validate(record, { validators }).success).toBe(false);
  });
});

describe('Lock.validateAsync', () => {
  it('should resolve to the synchronous result', async () => {
    const l = lock('equals', 'name', 'Ada');
    await expect(l.validateAsync(record)).resolves.toEqual(l.validate(record));
  });
});

describe('ValidatorRegistry', () => {
  it('should overwrite on re-register and list sorted names', () => {
    const registry = new ValidatorRegistry();
    registry.register('b', () => false).register('a', () => true).register('b', () => true);
    expect(registry.list()).toEqual(['a', 'b']);
    expect(registry.get('b')?.(1, 2)).toBe(true);
    expect(registry.unregister('a')).toBe(true);
    registry.clear();
    expect(registry.size).toBe(0);
  });
});

describe('Lock totality', () => {
  const samples: Array<[string, Record<string, unknown>]> = [
    ['absent', {}],
    ['null', { v: null }],
    ['number', { v: 5 }],
    ['string', { v: 'text' }],
    ['list', { v: [1] }],
    ['map', { v: { a: 1 } }],
    ['boolean', { v: true }],
  ];
  const malformed: unknown[] = [{ nonsense: [] }, '([', -1];

  for (const type of LOCK_TYPES) {
    it(`should return a result for ${type} on any input`, () => {
      for (const expectedValue of malformed) {
        const subject = new Lock({ type, propertyPath: 'v', expectedValue, validatorName: 'unregistered' });
        for (const [, data] of samples) {
          const result = subject.validate(data);
          expect(result.lockType).toBe(type);
          expect(typeof result.success).toBe('boolean');
          expect(result.errorMessage === '').toBe(result.success);
        }
      }
    });
  }

  it('should fail a malformed pattern instead of throwing', () => {
    expect(lock('regex', 'email', '([').validate(record).success).toBe(false);
  });
});

describe('range lock', () => {
  const age = lock('range', 'age', [18, 65]);

  it('should fail above the upper bound and pass inside', () => {
    expect(age.validate({ age: 70 }).success).toBe(false);
    expect(age.validate({ age: 40 }).success).toBe(true);
  });
});

describe('Lock immutability', () => {
  it('should copy and freeze the expected value', () => {
    const allowed = ['admin', 'ops'];
    const subject = lock('in_list', 'role', allowed);
    allowed.push('guest');

    expect(subject.expectedValue).toEqual(['admin', 'ops']);
    expect(Object.isFrozen(subject.expectedValue)).toBe(true);
    expect(subject.validate({ role: 'guest' }).success).toBe(false);
  });
});
