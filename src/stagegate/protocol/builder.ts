import { ConfigurationError } from '../errors';
import { Gate, type GateComponent } from '../gates/gate';
import { Lock } from '../locks/lock';
import type { ValidatorRegistry } from '../locks/registry';
import { Process } from '../process/process';
import { ItemSchema } from '../schema/schema';
import { Stage } from '../stages/stage';
import type { ItemSchemaDefinition, ProcessDefinition, StageDefinition } from '../types';
import type { ComponentNode, GateDefinition, LockSpec } from './schemas';

export interface BuildOptions {
  validators?: ValidatorRegistry;
  trackHistory?: boolean;
  clock?: () => Date;
}

/**
 * Turns a parsed definition into the immutable Lock/Gate/Stage/Process graph.
 */
export function buildProcess(definition: ProcessDefinition, options: BuildOptions = {}): Process {
  const builder = new GraphBuilder(definition.gate_library);

  const stages = named(definition.stages, 'Stage').map(([name, def]) => builder.stage(name, def));

  return new Process({
    name: definition.name,
    stages,
    stageOrder: definition.stage_order,
    allowStageSkipping: definition.allow_stage_skipping,
    regressionDetection: definition.regression_detection,
    metadata: {
      ...(definition.metadata ?? {}),
      ...(definition.description ? { description: definition.description } : {}),
    },
    validators: options.validators,
    trackHistory: options.trackHistory,
    clock: options.clock,
  });
}

function named<T extends { name?: string }>(items: T[] | Record<string, T>, kind: string): Array<[string, T]> {
  if (Array.isArray(items)) {
    return items.map((item, i) => {
      if (!item.name) {
        throw new ConfigurationError(`${kind} at position ${i} has no name`);
      }
      return [item.name, item];
    });
  }
  return Object.entries(items).map(([key, item]) => [item.name ?? key, item]);
}

class GraphBuilder {
  private library: Record<string, GateDefinition>;
  private resolved = new Map<string, Gate>();
  private resolving: string[] = [];

  constructor(library: Record<string, GateDefinition>) {
    this.library = library;
  }

  stage(name: string, def: StageDefinition): Stage {
    const gates = named(def.gates, `Gate in stage '${name}'`).map(([gateName, gateDef]) => this.gate(gateName, gateDef));
    return new Stage({
      name,
      description: def.description,
      gates,
      schema: def.schema ? this.schema(name, def.schema) : undefined,
      allowPartial: def.allow_partial,
      actions: def.actions,
      metadata: def.metadata,
    });
  }

  private schema(stageName: string, def: ItemSchemaDefinition): ItemSchema {
    return new ItemSchema({
      name: def.name ?? `${stageName}_schema`,
      requiredFields: def.required_fields,
      optionalFields: def.optional_fields,
      fieldTypes: def.field_types,
      defaultValues: def.default_values,
      validationRules: def.validation_rules,
      metadata: def.metadata,
    });
  }

  gate(name: string, def: GateDefinition): Gate {
    const components = def.components.map(node => this.component(node, name));
    return new Gate(def.name ?? name, components, {
      targetStage: def.target_stage,
      operator: def.operator,
      metadata: {
        ...(def.metadata ?? {}),
        ...(def.description ? { description: def.description } : {}),
      },
    });
  }

  private component(node: ComponentNode, parent: string): GateComponent {
    switch (node.kind) {
      case 'lock':
        return lock(node.lock);
      case 'gate':
        return this.gate(node.gate.name ?? `${parent}_nested`, node.gate);
      case 'use':
        return this.reference(node.name);
    }
  }

  /** Library gates are built once and shared; reference cycles are rejected. */
  private reference(name: string): Gate {
    const cached = this.resolved.get(name);
    if (cached) return cached;

    if (this.resolving.includes(name)) {
      const cycle = [...this.resolving.slice(this.resolving.indexOf(name)), name];
      throw new ConfigurationError(`Gate reference cycle: ${cycle.join(' -> ')}`, { cycle });
    }
    const def = Object.prototype.hasOwnProperty.call(this.library, name) ? this.library[name] : undefined;
    if (!def) {
      throw new ConfigurationError(`Unknown gate reference '${name}'`, {
        available: Object.keys(this.library),
      });
    }

    this.resolving.push(name);
    try {
      const gate = this.gate(name, def);
      this.resolved.set(name, gate);
      return gate;
    } finally {
      this.resolving.pop();
    }
  }
}

function lock(spec: LockSpec): Lock {
  return new Lock({
    type: spec.type,
    propertyPath: spec.property_path,
    expectedValue: spec.expected_value,
    validatorName: spec.validator_name,
    metadata: spec.metadata,
  });
}
