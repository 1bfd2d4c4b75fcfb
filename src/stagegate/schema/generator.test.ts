import { describe, it, expect } from 'vitest';
import { JSON_SCHEMA_DRAFT, SchemaGenerator, requiredByLocks } from './generator';
import { ItemSchema } from './schema';
import { Process } from '../process/process';
import { Stage } from '../stages/stage';
import { Gate } from '../gates/gate';
import { Lock } from '../locks/lock';
import { ConfigurationError } from '../errors';

const contact = new Gate('contact', [
  Lock.exists('address.city'),
  new Lock({ type: 'exists', propertyPath: 'banned', expectedValue: false }),
  new Gate('basket', [Lock.exists('items[0].sku')]),
]);

const apply = new Stage({
  name: 'apply',
  schema: new ItemSchema({
    name: 'application',
    requiredFields: ['email'],
    optionalFields: ['nickname'],
    fieldTypes: { email: 'string' },
    defaultValues: { nickname: 'anon' },
    validationRules: { email: { pattern: '^[^@]+@' } },
  }),
  gates: [contact],
});

const approve = new Stage({
  name: 'approve',
  schema: new ItemSchema({ name: 'approval', requiredFields: ['approver'], fieldTypes: { approver: 'string' } }),
  gates: [new Gate('signed', [Lock.exists('approver')])],
});

const generator = new SchemaGenerator(new Process({ name: 'loan', stages: [apply, approve] }));

describe('requiredByLocks', () => {
  it('should collect presence locks from nested gates', () => {
    expect(Array.from(requiredByLocks([contact]))).toEqual(['address.city', 'items[0].sku']);
  });
});

describe('SchemaGenerator', () => {
  it('should build a stage-specific schema from fields and presence locks', () => {
    expect(generator.generateStageSchema('apply')).toEqual({
      $schema: JSON_SCHEMA_DRAFT,
      title: 'loan - apply (Stage-Specific)',
      description: 'Schema for stage: apply',
      type: 'object',
      properties: {
        email: { type: 'string', pattern: '^[^@]+@' },
        nickname: { default: 'anon' },
        address: { type: 'object', properties: { city: {} }, required: ['city'] },
        items: {
          type: 'array',
          items: { type: 'object', properties: { sku: {} }, required: ['sku'] },
        },
      },
      required: ['address', 'email', 'items'],
    });
  });

  it('should limit a stage-specific schema to that stage', () => {
    expect(generator.generateStageSchema('approve')).toEqual({
      $schema: JSON_SCHEMA_DRAFT,
      title: 'loan - approve (Stage-Specific)',
      description: 'Schema for stage: approve',
      type: 'object',
      properties: { approver: { type: 'string' } },
      required: ['approver'],
    });
  });

  it('should merge every stage up to the target into a cumulative schema', () => {
    const schema = generator.generateCumulativeSchema('approve');
    expect(schema.title).toBe('loan - approve (Cumulative)');
    expect(schema.required).toEqual(['address', 'approver', 'email', 'items']);
    expect(Object.keys(schema.properties ?? {}).sort()).toEqual(['address', 'approver', 'email', 'items', 'nickname']);
  });

  it('should reject unknown stages', () => {
    expect(() => generator.generateStageSchema('nope')).toThrow(ConfigurationError);
    expect(() => generator.generateCumulativeSchema('nope'))
      .toThrow("Stage 'nope' not found in process. Available stages: apply, approve");
  });
});
