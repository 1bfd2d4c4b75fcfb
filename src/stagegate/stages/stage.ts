import { createElement, type ElementInput } from '../element/element';
import { ConfigurationError } from '../errors';
import { Gate, type GateResult } from '../gates/gate';
import type { EvaluationContext } from '../locks/lock';
import type { Action, EvaluationState } from '../process/result';
import { ItemSchema } from '../schema/schema';
import { frozenRecord } from '../shared/freeze';
import { freezeTemplates, resolveTemplate, type ActionTemplates } from './actions';

export interface StageOptions {
  name: string;
  description?: string;
  gates?: Gate[];
  schema?: ItemSchema;
  allowPartial?: boolean;
  actions?: ActionTemplates;
  metadata?: Record<string, unknown>;
}

export interface StageResult {
  stageName: string;
  schemaValid: boolean;
  schemaErrors: string[];
  gateResults: GateResult[];
  overallPassed: boolean;
  actions: string[];
  /** 0..1 */
  completion: number;
  passedGates: string[];
  failedGates: string[];
}

/**
 * A workflow checkpoint: schema plus ordered gates.
 */
export class Stage {
  readonly name: string;
  readonly description: string;
  readonly gates: readonly Gate[];
  readonly schema?: ItemSchema;
  readonly allowPartial: boolean;
  readonly actionTemplates: Readonly<ActionTemplates>;
  readonly metadata: Readonly<Record<string, unknown>>;

  constructor(options: StageOptions) {
    if (typeof options.name !== 'string' || options.name.trim() === '') {
      throw new ConfigurationError('Stage name must be a non-empty string');
    }
    const gates = options.gates ?? [];
    const seen = new Set<string>();
    for (const gate of gates) {
      if (seen.has(gate.name)) {
        throw new ConfigurationError(`Stage '${options.name}' has duplicate gate name '${gate.name}'`);
      }
      seen.add(gate.name);
    }

    this.name = options.name;
    this.description = options.description ?? '';
    this.gates = Object.freeze([...gates]);
    this.schema = options.schema;
    this.allowPartial = options.allowPartial ?? false;
    this.actionTemplates = freezeTemplates(options.actions ?? {});
    this.metadata = frozenRecord(options.metadata ?? {});
    Object.freeze(this);
  }

  evaluate(input: ElementInput, context: EvaluationContext = {}): StageResult {
    const element = createElement(input);
    const schemaErrors = this.schema ? this.schema.validate(element) : [];
    const schemaValid = schemaErrors.length === 0;

    // Every gate runs, whatever the schema outcome
    const gateResults = this.gates.map(g => g.evaluate(element, context));
    const passedGates = gateResults.filter(r => r.passed).map(r => r.gateName);
    const failedGates = gateResults.filter(r => !r.passed).map(r => r.gateName);

    let gatesOk: boolean;
    if (gateResults.length === 0) gatesOk = true;
    else if (this.allowPartial) gatesOk = passedGates.length > 0;
    else gatesOk = failedGates.length === 0;

    return {
      stageName: this.name,
      schemaValid,
      schemaErrors,
      gateResults,
      overallPassed: schemaValid && gatesOk,
      actions: gateResults.flatMap(r => r.actions),
      completion: completionOf(schemaValid, this.schema !== undefined, gateResults),
      passedGates,
      failedGates,
    };
  }

  async evaluateAsync(input: ElementInput, context: EvaluationContext = {}): Promise<StageResult> {
    return this.evaluate(input, context);
  }

  /** True when every required schema field is present. */
  isCompatibleWithElement(input: ElementInput): boolean {
    if (!this.schema) return true;
    const element = createElement(input);
    for (const field of this.schema.requiredFields) {
      if (!element.hasProperty(field)) return false;
    }
    return true;
  }

  getCompletionPercentage(input: ElementInput, context: EvaluationContext = {}): number {
    return this.evaluate(input, context).completion;
  }

  getRequiredProperties(): Set<string> {
    const props = new Set<string>(this.schema?.requiredFields ?? []);
    for (const gate of this.gates) {
      for (const p of gate.getPropertyPaths()) props.add(p);
    }
    return props;
  }

  getGate(name: string): Gate | undefined {
    return this.gates.find(g => g.name === name);
  }

  hasGate(name: string): boolean {
    return this.getGate(name) !== undefined;
  }

  hasActions(state: EvaluationState): boolean {
    return (this.actionTemplates[state]?.length ?? 0) > 0;
  }

  /**
   * Templated actions for a state, or null when the stage declares none.
   */
  resolveActions(
    state: EvaluationState,
    input: ElementInput,
    context: Record<string, unknown> = {},
  ): Action[] | null {
    const templates = this.actionTemplates[state];
    if (!templates || templates.length === 0) return null;
    const element = createElement(input);
    return templates.map(t => resolveTemplate(t, element, { stage: this.name, ...context }));
  }

  getSummary(): string {
    const parts = [`Stage '${this.name}'`, `${this.gates.length} gate(s)`];
    if (this.schema) parts.push(`schema '${this.schema.name}' (${this.schema.requiredFields.size} required)`);
    if (this.allowPartial) parts.push('partial');
    return parts.join(', ');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      description: this.description,
      allow_partial: this.allowPartial,
      gates: this.gates.map(g => g.toJSON()),
      ...(this.schema ? { schema: this.schema.toJSON() } : {}),
    };
  }
}

function completionOf(schemaValid: boolean, hasSchema: boolean, gates: GateResult[]): number {
  const schemaScore = schemaValid ? 1 : 0;
  if (gates.length === 0) {
    return hasSchema ? schemaScore : 1;
  }
  const gateScore = gates.filter(g => g.passed).length / gates.length;
  return (gateScore + schemaScore) / 2;
}
