import { z } from 'zod';
import { LEGACY_OPERATORS, type GateOperator } from '../gates/gate';
import { LOCK_TYPES, isLockType, type LockType } from '../locks/types';
import { ACTION_TYPES, EVALUATION_STATES, PRIORITIES } from '../process/result';
import { FIELD_TYPES } from '../schema/schema';

const Metadata = z.record(z.string(), z.unknown());

/**
 * Canonical lock form.
 */
export const LockSchema = z.object({
  type: z.enum(LOCK_TYPES).describe('Lock type'),
  property_path: z.string().min(1).describe('Dotted/bracketed path into the element'),
  expected_value: z.unknown().optional().describe('Value the lock compares against'),
  validator_name: z.string().optional().describe('Registered validator (custom locks)'),
  metadata: Metadata.optional(),
});

/**
 * Structured shorthand body: `{regex: {property_path, value}}`.
 */
export const StructuredLockSchema = z.object({
  property_path: z.string().min(1),
  value: z.unknown().optional(),
  expected_value: z.unknown().optional(),
  validator_name: z.string().optional(),
  metadata: Metadata.optional(),
});

export type LockSpec = z.infer<typeof LockSchema>;

export type ComponentNode =
  | { kind: 'lock'; lock: LockSpec }
  | { kind: 'gate'; gate: GateDefinition }
  | { kind: 'use'; name: string };

export interface GateDefinition {
  name?: string;
  description?: string;
  target_stage?: string;
  operator?: GateOperator;
  components: ComponentNode[];
  metadata?: Record<string, unknown>;
}

/** `{exists: path}` style keys that are not lock type names. */
const PATH_SHORTHANDS: Record<string, (path: string) => LockSpec> = {
  not_exists: path => ({ type: 'exists', property_path: path, expected_value: false }),
  is_true: path => ({ type: 'equals', property_path: path, expected_value: true }),
  is_false: path => ({ type: 'equals', property_path: path, expected_value: false }),
};

function lockOf(type: LockType, body: string | z.infer<typeof StructuredLockSchema>): LockSpec {
  if (typeof body === 'string') {
    return { type, property_path: body };
  }
  return {
    type,
    property_path: body.property_path,
    expected_value: body.expected_value !== undefined ? body.expected_value : body.value,
    validator_name: body.validator_name,
    metadata: body.metadata,
  };
}

export const ShorthandLockSchema = z
  .record(z.string(), z.union([z.string().min(1), StructuredLockSchema]))
  .transform((entry, ctx): ComponentNode => {
    const keys = Object.keys(entry);
    if (keys.length !== 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Lock shorthand must have exactly one key, got ${keys.length}` });
      return z.NEVER;
    }
    const key = keys[0];
    const body = entry[key];
    const shorthand = Object.prototype.hasOwnProperty.call(PATH_SHORTHANDS, key) ? PATH_SHORTHANDS[key] : undefined;
    if (shorthand && typeof body === 'string') {
      return { kind: 'lock', lock: shorthand(body) };
    }
    if (isLockType(key)) {
      return { kind: 'lock', lock: lockOf(key, body) };
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown lock form '${key}'` });
    return z.NEVER;
  });

export const ComponentSchema: z.ZodType<ComponentNode, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    LockSchema.transform((lock): ComponentNode => ({ kind: 'lock', lock })),
    z.object({ gate: GateDefinitionSchema }).transform((g): ComponentNode => ({ kind: 'gate', gate: g.gate })),
    z.object({ use: z.string().min(1) }).transform((u): ComponentNode => ({ kind: 'use', name: u.use })),
    ShorthandLockSchema,
  ]),
);

/**
 * Gate: `locks` and `components` are concatenated in that order.
 */
export const GateDefinitionSchema: z.ZodType<GateDefinition, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    name: z.string().min(1).optional().describe('Gate name; map keys supply it when omitted'),
    description: z.string().optional(),
    target_stage: z.string().optional(),
    operator: z.enum(LEGACY_OPERATORS).optional().describe('Recorded only; evaluation is always AND'),
    locks: z.array(ComponentSchema).optional(),
    components: z.array(ComponentSchema).optional(),
    metadata: Metadata.optional(),
  })
    .transform(({ locks, components, ...rest }): GateDefinition => ({
      ...rest,
      components: [...(locks ?? []), ...(components ?? [])],
    }))
    .refine(gate => gate.components.length > 0, {
      message: 'Gate must declare at least one lock or component',
    }),
);

export const FieldRulesSchema = z.object({
  min: z.number().optional(),
  max: z.number().optional(),
  min_length: z.number().int().nonnegative().optional(),
  max_length: z.number().int().nonnegative().optional(),
  pattern: z.string().optional(),
  enum: z.array(z.unknown()).optional(),
});

export const ItemSchemaDefinitionSchema = z.object({
  name: z.string().optional(),
  required_fields: z.array(z.string().min(1)).default([]),
  optional_fields: z.array(z.string().min(1)).default([]),
  field_types: z.record(z.string(), z.enum(FIELD_TYPES)).default({}),
  default_values: z.record(z.string(), z.unknown()).default({}),
  validation_rules: z.record(z.string(), FieldRulesSchema).default({}),
  metadata: Metadata.optional(),
}).passthrough();

export const ActionTemplateSchema = z.object({
  type: z.enum(ACTION_TYPES),
  description: z.string(),
  priority: z.enum(PRIORITIES).optional(),
  conditions: z.array(z.string()).optional(),
  metadata: Metadata.optional(),
  properties: z.record(z.string(), z.string()).optional().describe('Placeholder name -> property path'),
});

export const StageDefinitionSchema = z.object({
  name: z.string().min(1).optional().describe('Stage name; map keys supply it when omitted'),
  description: z.string().optional(),
  allow_partial: z.boolean().default(false),
  schema: ItemSchemaDefinitionSchema.optional(),
  gates: z.union([z.array(GateDefinitionSchema), z.record(z.string(), GateDefinitionSchema)]).default([]),
  actions: z.record(z.enum(EVALUATION_STATES), z.array(ActionTemplateSchema)).optional(),
  metadata: Metadata.optional(),
}).passthrough();

export const ProcessDefinitionSchema = z.object({
  name: z.string().min(1).describe('Process name'),
  description: z.string().optional(),
  stages: z.union([z.array(StageDefinitionSchema), z.record(z.string(), StageDefinitionSchema)])
    .refine(stages => (Array.isArray(stages) ? stages.length : Object.keys(stages).length) > 0, {
      message: 'Process must contain at least one stage',
    }),
  stage_order: z.array(z.string()).optional(),
  allow_stage_skipping: z.boolean().default(false),
  regression_detection: z.boolean().default(false),
  gate_library: z.record(z.string(), GateDefinitionSchema).default({}),
  metadata: Metadata.optional(),
}).passthrough();
