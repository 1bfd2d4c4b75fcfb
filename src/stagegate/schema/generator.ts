import { parsePath, type PathSegment } from '../element/path';
import { ConfigurationError } from '../errors';
import type { Gate } from '../gates/gate';
import type { Process } from '../process/process';
import type { Stage } from '../stages/stage';
import type { FieldRules } from './schema';

export const JSON_SCHEMA_DRAFT = 'http://json-schema.org/draft-07/schema#';

export interface JsonSchema {
  $schema?: string;
  title?: string;
  description?: string;
  type?: string;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  items?: JsonSchema;
  default?: unknown;
  enum?: unknown[];
  minimum?: number;
  maximum?: number;
  minLength?: number;
  maxLength?: number;
  pattern?: string;
}

/** Property paths a stage's gates insist on through `exists` locks. */
export function requiredByLocks(gates: readonly Gate[]): Set<string> {
  const paths = new Set<string>();
  const visit = (gate: Gate) => {
    for (const lock of gate.locks) {
      if (lock.type === 'exists' && lock.expectedValue !== false) paths.add(lock.propertyPath);
    }
    gate.gates.forEach(visit);
  };
  gates.forEach(visit);
  return paths;
}

/**
 * JSON Schema (draft-07) for the data an element needs at a stage.
 *
 * Cumulative schemas merge every stage from the first one up to the target;
 * later stages override earlier definitions of the same property.
 */
export class SchemaGenerator {
  constructor(private readonly process: Process) {}

  generateCumulativeSchema(stageName: string): JsonSchema {
    const target = this.stage(stageName);
    const index = this.process.getStageIndex(target.name);
    return this.build(this.process.stages.slice(0, index + 1), `${this.process.name} - ${target.name} (Cumulative)`, target.name);
  }

  generateStageSchema(stageName: string): JsonSchema {
    const target = this.stage(stageName);
    return this.build([target], `${this.process.name} - ${target.name} (Stage-Specific)`, target.name);
  }

  private stage(name: string): Stage {
    const stage = this.process.getStage(name);
    if (!stage) {
      throw new ConfigurationError(
        `Stage '${name}' not found in process. Available stages: ${this.process.stageOrder.join(', ')}`,
      );
    }
    return stage;
  }

  private build(stages: readonly Stage[], title: string, stageName: string): JsonSchema {
    const root: JsonSchema = {
      $schema: JSON_SCHEMA_DRAFT,
      title,
      description: `Schema for stage: ${stageName}`,
      type: 'object',
      properties: {},
    };

    for (const stage of stages) {
      const schema = stage.schema;
      if (schema) {
        for (const field of schema.getAllFields()) {
          insert(root, parsePath(field), fieldSchema(
            schema.getFieldType(field),
            schema.validationRules[field],
            schema.getDefaultValue(field),
          ), schema.isFieldRequired(field));
        }
      }
      for (const path of requiredByLocks(stage.gates)) {
        insert(root, parsePath(path), {}, true);
      }
    }
    return root;
  }
}

function fieldSchema(type: string | undefined, rules: FieldRules | undefined, defaultValue: unknown): JsonSchema {
  const out: JsonSchema = {};
  if (type) out.type = type;
  if (defaultValue !== undefined) out.default = defaultValue;
  if (rules) {
    if (rules.min !== undefined) out.minimum = rules.min;
    if (rules.max !== undefined) out.maximum = rules.max;
    if (rules.min_length !== undefined) out.minLength = rules.min_length;
    if (rules.max_length !== undefined) out.maxLength = rules.max_length;
    if (rules.pattern !== undefined) out.pattern = rules.pattern;
    if (rules.enum !== undefined) out.enum = [...rules.enum];
  }
  return out;
}

// Intermediate keys become objects, bracket segments become arrays
function insert(root: JsonSchema, segments: PathSegment[], leaf: JsonSchema, required: boolean): void {
  let node = root;
  segments.forEach((segment, i) => {
    const last = i === segments.length - 1;
    if (segment.kind === 'index') {
      node.type = 'array';
      const items = last ? { ...node.items, ...leaf } : node.items ?? {};
      node.items = items;
      node = items;
      return;
    }
    node.type = 'object';
    const properties = node.properties ?? {};
    node.properties = properties;
    if (required) addRequired(node, segment.key);
    const child = last ? { ...properties[segment.key], ...leaf } : properties[segment.key] ?? {};
    properties[segment.key] = child;
    node = child;
  });
}

function addRequired(node: JsonSchema, key: string): void {
  const required = node.required ?? [];
  if (!required.includes(key)) {
    required.push(key);
    required.sort();
  }
  node.required = required;
}
