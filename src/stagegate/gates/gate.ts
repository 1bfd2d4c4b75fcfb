import { createElement, type ElementInput } from '../element/element';
import { ConfigurationError } from '../errors';
import { getConfig } from '../config';
import { Lock, type EvaluationContext } from '../locks/lock';
import type { LockResult } from '../locks/types';

export type GateComponent = Lock | Gate;

export type ComponentResult =
  | { kind: 'lock'; lock: Lock; result: LockResult }
  | { kind: 'gate'; gate: Gate; result: GateResult };

export interface GateResult {
  gateName: string;
  passed: boolean;
  passedComponents: ComponentResult[];
  failedComponents: ComponentResult[];
  messages: string[];
  actions: string[];
  shortCircuited: boolean;
  evaluatedCount: number;
}

export const LEGACY_OPERATORS = ['and', 'or', 'xor', 'not'] as const;
export type GateOperator = typeof LEGACY_OPERATORS[number];

export interface GateOptions {
  targetStage?: string;
  metadata?: Record<string, unknown>;
  /** Only `and` is evaluated; other tags are recorded in metadata. */
  operator?: GateOperator;
}

export interface StructureThresholds {
  maxDepth?: number;
  maxComplexity?: number;
}

/**
 * Ordered AND-composition of locks and nested gates.
 * Evaluation stops at the first failing component.
 */
export class Gate {
  readonly name: string;
  readonly components: readonly GateComponent[];
  readonly targetStage?: string;
  readonly metadata: Readonly<Record<string, unknown>>;

  constructor(name: string, components: GateComponent[], options: GateOptions = {}) {
    if (typeof name !== 'string' || name.trim() === '') {
      throw new ConfigurationError('Gate name must be a non-empty string');
    }
    if (!Array.isArray(components) || components.length === 0) {
      throw new ConfigurationError(`Gate '${name}' must contain at least one lock or gate`);
    }
    for (const component of components) {
      if (!(component instanceof Lock) && !(component instanceof Gate)) {
        throw new ConfigurationError(`Gate '${name}' has a component that is neither a lock nor a gate`);
      }
    }

    const metadata: Record<string, unknown> = { ...(options.metadata ?? {}) };
    if (options.operator && options.operator !== 'and') {
      metadata.legacy_operator = options.operator;
    }

    this.name = name;
    this.components = Object.freeze([...components]);
    this.targetStage = options.targetStage;
    this.metadata = Object.freeze(metadata);
    Object.freeze(this);
  }

  static and(name: string, components: GateComponent[], options: Omit<GateOptions, 'operator'> = {}): Gate {
    return new Gate(name, components, { ...options, operator: 'and' });
  }

  get locks(): Lock[] {
    return this.components.filter((c): c is Lock => c instanceof Lock);
  }

  get gates(): Gate[] {
    return this.components.filter((c): c is Gate => c instanceof Gate);
  }

  evaluate(input: ElementInput, context: EvaluationContext = {}): GateResult {
    const element = createElement(input);
    const passedComponents: ComponentResult[] = [];
    const failedComponents: ComponentResult[] = [];
    const messages: string[] = [];
    const actions: string[] = [];
    let evaluatedCount = 0;

    for (const component of this.components) {
      evaluatedCount++;

      if (component instanceof Lock) {
        const result = component.validate(element, context);
        if (result.success) {
          passedComponents.push({ kind: 'lock', lock: component, result });
          continue;
        }
        failedComponents.push({ kind: 'lock', lock: component, result });
        if (result.errorMessage) messages.push(result.errorMessage);
        if (result.actionMessage) actions.push(result.actionMessage);
        break;
      }

      const result = component.evaluate(element, context);
      if (result.passed) {
        passedComponents.push({ kind: 'gate', gate: component, result });
        continue;
      }
      failedComponents.push({ kind: 'gate', gate: component, result });
      messages.push(...result.messages.map(m => `${component.name}: ${m}`));
      actions.push(...result.actions);
      break;
    }

    return {
      gateName: this.name,
      passed: failedComponents.length === 0,
      passedComponents,
      failedComponents,
      messages,
      actions,
      shortCircuited: evaluatedCount < this.components.length,
      evaluatedCount,
    };
  }

  async evaluateAsync(input: ElementInput, context: EvaluationContext = {}): Promise<GateResult> {
    return this.evaluate(input, context);
  }

  /** Union of property paths referenced anywhere in the tree. */
  getPropertyPaths(): Set<string> {
    const paths = new Set<string>();
    for (const component of this.components) {
      if (component instanceof Lock) {
        paths.add(component.propertyPath);
      } else {
        for (const p of component.getPropertyPaths()) paths.add(p);
      }
    }
    return paths;
  }

  requiresProperty(path: string): boolean {
    return this.getPropertyPaths().has(path);
  }

  /** Number of leaf locks in the tree. */
  getComplexity(): number {
    return this.components.reduce(
      (sum, c) => sum + (c instanceof Lock ? 1 : c.getComplexity()),
      0,
    );
  }

  maxDepth(): number {
    const nested = this.gates.map(g => g.maxDepth());
    return 1 + (nested.length > 0 ? Math.max(...nested) : 0);
  }

  /**
   * Advisory warnings. Never throws.
   */
  validateStructure(thresholds: StructureThresholds = {}): string[] {
    const config = getConfig().gate;
    const maxDepth = thresholds.maxDepth ?? config.maxDepth;
    const maxComplexity = thresholds.maxComplexity ?? config.maxComplexity;
    const warnings: string[] = [];

    const depth = this.maxDepth();
    if (depth > maxDepth) {
      warnings.push(`Gate '${this.name}' nesting depth ${depth} exceeds recommended maximum of ${maxDepth}`);
    }
    const complexity = this.getComplexity();
    if (complexity > maxComplexity) {
      warnings.push(`Gate '${this.name}' has ${complexity} locks, above the recommended maximum of ${maxComplexity}`);
    }

    const seen = new Set<string>();
    for (const lock of this.locks) {
      const key = JSON.stringify(lock.toJSON());
      if (seen.has(key)) {
        warnings.push(`Gate '${this.name}' has a duplicate lock on '${lock.propertyPath}' (${lock.type})`);
      }
      seen.add(key);
    }

    const legacy = this.metadata.legacy_operator;
    if (typeof legacy === 'string') {
      warnings.push(`Gate '${this.name}' declares legacy operator '${legacy}'; components are evaluated with AND`);
    }

    for (const gate of this.gates) {
      warnings.push(...gate.validateStructure({ maxDepth, maxComplexity }));
    }
    return warnings;
  }

  getSummary(): string {
    const parts = [`Gate '${this.name}': ${this.locks.length} lock(s)`];
    if (this.gates.length > 0) parts.push(`${this.gates.length} nested gate(s)`);
    if (this.targetStage) parts.push(`targets '${this.targetStage}'`);
    return parts.join(', ');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      ...(this.targetStage ? { target_stage: this.targetStage } : {}),
      components: this.components.map(c => (c instanceof Gate ? { gate: c.toJSON() } : c.toJSON())),
      metadata: { ...this.metadata },
    };
  }
}
