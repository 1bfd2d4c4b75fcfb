import { createElement, type Element, type ElementInput } from '../element/element';
import { ConfigurationError, errorMessage } from '../errors';
import { getConfig } from '../config';
import type { EvaluationContext } from '../locks/lock';
import { ValidatorRegistry } from '../locks/registry';
import { stableHash } from '../shared/canonical';
import { createLogger } from '../shared/logger';
import type { Stage, StageResult } from '../stages/stage';
import { ElementStateHistory } from './history';
import { createAction, StatusResult, type Action, type EvaluationState } from './result';

const logger = createLogger('process');

const ID_FIELDS = ['id', '_id', 'uuid', 'element_id'] as const;
const UNHASHABLE_ID = 'element_unhashable';

export interface ProcessOptions {
  name: string;
  stages: Stage[];
  /** Explicit order; must name exactly the given stages. */
  stageOrder?: string[];
  allowStageSkipping?: boolean;
  regressionDetection?: boolean;
  /** Defaults to the `history.enabled` configuration value. */
  trackHistory?: boolean;
  validators?: ValidatorRegistry;
  metadata?: Record<string, unknown>;
  clock?: () => Date;
}

export interface ProgressionCheck {
  allowed: boolean;
  reasons: string[];
}

interface WalkOutcome {
  state: EvaluationState;
  stage: Stage;
  currentStage: string | null;
  actions: Action[];
  warnings: string[];
  metadata: Record<string, unknown>;
}

/**
 * Ordered stages plus the evaluation state machine. Owns the
 * per-element transition history.
 */
export class Process {
  readonly name: string;
  readonly stages: readonly Stage[];
  readonly allowStageSkipping: boolean;
  readonly regressionDetection: boolean;
  readonly trackHistory: boolean;
  readonly validators: ValidatorRegistry;
  readonly metadata: Readonly<Record<string, unknown>>;

  private readonly stageIndex = new Map<string, number>();
  private readonly histories = new Map<string, ElementStateHistory>();
  private readonly clock: () => Date;

  constructor(options: ProcessOptions) {
    if (typeof options.name !== 'string' || options.name.trim() === '') {
      throw new ConfigurationError('Process must have a name');
    }
    if (!Array.isArray(options.stages) || options.stages.length === 0) {
      throw new ConfigurationError('Process must contain at least one stage', { process: options.name });
    }

    const byName = new Map<string, Stage>();
    const duplicates = new Set<string>();
    for (const stage of options.stages) {
      if (byName.has(stage.name)) duplicates.add(stage.name);
      byName.set(stage.name, stage);
    }
    if (duplicates.size > 0) {
      throw new ConfigurationError(`Duplicate stage names found: ${Array.from(duplicates).join(', ')}`, {
        process: options.name,
      });
    }

    let ordered = [...options.stages];
    if (options.stageOrder && options.stageOrder.length > 0) {
      const expected = Array.from(byName.keys()).sort();
      const got = [...options.stageOrder].sort();
      const mismatch = expected.length !== got.length || expected.some((n, i) => n !== got[i]);
      if (mismatch) {
        throw new ConfigurationError(
          `Stage order mismatch. Expected: [${expected.join(', ')}], Got: [${got.join(', ')}]`,
          { process: options.name },
        );
      }
      ordered = [];
      for (const name of options.stageOrder) {
        const stage = byName.get(name);
        if (stage) ordered.push(stage);
      }
    }

    ordered.forEach((stage, i) => this.stageIndex.set(stage.name, i));

    this.name = options.name;
    this.stages = Object.freeze(ordered);
    this.allowStageSkipping = options.allowStageSkipping ?? false;
    this.regressionDetection = options.regressionDetection ?? false;
    this.trackHistory = options.trackHistory ?? getConfig().history.enabled;
    this.validators = options.validators ?? new ValidatorRegistry();
    this.metadata = Object.freeze({ ...(options.metadata ?? {}) });
    this.clock = options.clock ?? (() => new Date());
  }

  get stageOrder(): string[] {
    return this.stages.map(s => s.name);
  }

  get initialStage(): string {
    return this.stages[0].name;
  }

  get finalStage(): string {
    return this.stages[this.stages.length - 1].name;
  }

  getStage(name: string): Stage | undefined {
    const index = this.stageIndex.get(name);
    return index === undefined ? undefined : this.stages[index];
  }

  /** -1 when unknown. */
  getStageIndex(name: string): number {
    return this.stageIndex.get(name) ?? -1;
  }

  getNextStageName(name: string): string | null {
    const index = this.getStageIndex(name);
    if (index === -1 || index >= this.stages.length - 1) return null;
    return this.stages[index + 1].name;
  }

  canTransition(from: string, to: string): boolean {
    const fromIndex = this.getStageIndex(from);
    const toIndex = this.getStageIndex(to);
    if (fromIndex === -1 || toIndex === -1) return false;
    return this.allowStageSkipping || toIndex === fromIndex + 1;
  }

  validateStageProgression(input: ElementInput, from: string, to: string): ProgressionCheck {
    const element = createElement(input);
    const reasons: string[] = [];
    if (!this.canTransition(from, to)) {
      reasons.push(`Direct transition from '${from}' to '${to}' not allowed`);
    }
    const target = this.getStage(to);
    if (target && !target.isCompatibleWithElement(element)) {
      reasons.push(`Element does not meet requirements for stage '${to}'`);
    }
    return { allowed: reasons.length === 0, reasons };
  }

  /**
   * Never throws; faults surface as a SCOPING result.
   */
  evaluate(input: ElementInput, knownStage?: string): StatusResult {
    let elementId = UNHASHABLE_ID;
    let history: ElementStateHistory | undefined;
    let result: StatusResult;
    try {
      const element = createElement(input);
      elementId = this.getElementId(element);
      history = this.trackHistory ? this.historyFor(elementId) : undefined;
      result = this.run(element, elementId, knownStage, history);
    } catch (err) {
      result = this.failed(elementId, err);
    }

    if (history) {
      const stage = result.currentStage ?? stringOrNull(result.metadata.final_stage);
      history.append({
        timestamp: result.timestamp,
        toState: result.state,
        stage: result.state === 'regressing' ? result.proposedStage : stage,
        reason: result.summary(),
        metadata: { ...result.metadata },
      });
      history.markEvaluated();
    }

    logger.debug('Evaluated element', { process: this.name, elementId, state: result.state });
    return result;
  }

  private failed(elementId: string, err: unknown): StatusResult {
    const message = errorMessage(err);
    logger.warn('Evaluation failed', { process: this.name, elementId, error: message });
    return new StatusResult({
      state: 'scoping',
      elementId,
      currentStage: null,
      actions: [createAction('manual_review', 'Process evaluation failed', {
        priority: 'critical',
        metadata: { error: message },
      })],
      errors: [`Evaluation error: ${message}`],
      timestamp: this.clock(),
    });
  }

  async evaluateAsync(input: ElementInput, knownStage?: string): Promise<StatusResult> {
    return this.evaluate(input, knownStage);
  }

  evaluateBatch(inputs: ElementInput[]): StatusResult[] {
    return inputs.map(input => this.evaluate(input));
  }

  private run(
    element: Element,
    elementId: string,
    knownStage: string | undefined,
    history: ElementStateHistory | undefined,
  ): StatusResult {
    const now = this.clock();
    let stage: Stage;

    if (knownStage !== undefined) {
      const found = this.getStage(knownStage);
      if (!found) {
        return new StatusResult({
          state: 'scoping',
          elementId,
          currentStage: null,
          actions: [createAction('manual_review', `Invalid current stage: ${knownStage}`, { priority: 'high' })],
          errors: [`Stage '${knownStage}' not found in process`],
          timestamp: now,
        });
      }
      stage = found;
    } else {
      const scoped = this.scope(element);
      if (!scoped) {
        return new StatusResult({
          state: 'scoping',
          elementId,
          currentStage: null,
          actions: [createAction('complete_field', 'Ensure element has required properties for at least one stage', {
            priority: 'high',
          })],
          errors: ['Element lacks required properties for any stage'],
          timestamp: now,
        });
      }
      stage = scoped;
    }

    const outcome = this.walk(element, stage, history, now);
    const traversed = outcome.metadata.stages_traversed;
    const after = this.getStageIndex(outcome.stage.name);
    const previousStage = history?.furthestStage ?? null;
    history?.reach(outcome.stage.name, after);

    // Stays regressing until the element is back at its furthest stage
    if (this.regressionDetection && knownStage === undefined && previousStage !== null) {
      const before = this.getStageIndex(previousStage);
      if (before !== -1 && after < before) {
        const context = { previous_stage: previousStage, regressed_to: outcome.stage.name };
        logger.info('Element regressed', { process: this.name, elementId, ...context });
        return new StatusResult({
          state: 'regressing',
          elementId,
          currentStage: previousStage,
          proposedStage: outcome.stage.name,
          actions: outcome.stage.resolveActions('regressing', element, context) ?? outcome.actions,
          warnings: [`Element regressed from stage '${previousStage}' to '${outcome.stage.name}'`, ...outcome.warnings],
          metadata: { ...context, stages_traversed: traversed, regressed_state: outcome.state },
          timestamp: now,
        });
      }
    }

    return new StatusResult({
      state: outcome.state,
      elementId,
      currentStage: outcome.currentStage,
      actions: outcome.actions,
      warnings: outcome.warnings,
      metadata: outcome.metadata,
      timestamp: now,
    });
  }

  /** Highest completion among compatible stages; ties go to the earlier stage. */
  private scope(element: Element): Stage | undefined {
    const context = this.context();
    let best: Stage | undefined;
    let bestCompletion = -1;
    for (const stage of this.stages) {
      if (!stage.isCompatibleWithElement(element)) continue;
      const completion = stage.getCompletionPercentage(element, context);
      if (completion > bestCompletion) {
        best = stage;
        bestCompletion = completion;
      }
    }
    return best;
  }

  private walk(element: Element, start: Stage, history: ElementStateHistory | undefined, now: Date): WalkOutcome {
    const context = this.context();
    const visited = new Set<string>();
    const traversed: string[] = [];
    let stage = start;

    // Each stage is visited at most once
    for (let step = 0; step <= this.stages.length; step++) {
      if (visited.has(stage.name)) {
        throw new Error(`Stage '${stage.name}' revisited during evaluation`);
      }
      visited.add(stage.name);
      traversed.push(stage.name);

      const result = stage.evaluate(element, context);

      if (!result.overallPassed) {
        return this.fulfilling(element, stage, result, traversed);
      }

      const nextName = this.getNextStageName(stage.name);
      if (nextName === null) {
        return {
          state: 'completed',
          stage,
          currentStage: null,
          actions: stage.resolveActions('completed', element, { final_stage: stage.name }) ?? [
            createAction('transition_stage', 'Process completed successfully'),
          ],
          warnings: [],
          metadata: { final_stage: stage.name, stages_traversed: [...traversed] },
        };
      }

      const check = this.validateStageProgression(element, stage.name, nextName);
      const next = this.getStage(nextName);
      if (!check.allowed || !next) {
        return {
          state: 'awaiting',
          stage,
          currentStage: stage.name,
          actions: stage.resolveActions('awaiting', element, { next_stage: nextName })
            ?? check.reasons.map(reason => createAction('wait_for_condition', reason, {
              metadata: { next_stage: nextName },
            })),
          warnings: [],
          metadata: { next_stage: nextName, stages_traversed: [...traversed] },
        };
      }

      history?.append({
        timestamp: now,
        toState: 'qualifying',
        stage: stage.name,
        reason: `Stage '${stage.name}' requirements met`,
        metadata: { next_stage: nextName },
      });
      history?.append({
        timestamp: now,
        toState: 'advancing',
        stage: stage.name,
        reason: `Advancing from '${stage.name}' to '${nextName}'`,
        metadata: { next_stage: nextName },
      });
      stage = next;
    }

    throw new Error(`Stage walk exceeded ${this.stages.length} steps`);
  }

  private fulfilling(element: Element, stage: Stage, result: StageResult, traversed: string[]): WalkOutcome {
    const completion = result.completion;
    const actions = stage.resolveActions('fulfilling', element, { completion })
      ?? result.actions.map(action => createAction('complete_field', action, { metadata: { completion } }));
    return {
      state: 'fulfilling',
      stage,
      currentStage: stage.name,
      actions,
      warnings: [...result.schemaErrors],
      metadata: {
        completion,
        failed_gates: result.failedGates,
        stages_traversed: [...traversed],
      },
    };
  }

  private context(): EvaluationContext {
    return { validators: this.validators };
  }

  private historyFor(elementId: string): ElementStateHistory {
    let history = this.histories.get(elementId);
    if (!history) {
      history = new ElementStateHistory(elementId, this.clock());
      this.histories.set(elementId, history);
    }
    return history;
  }

  /**
   * First scalar `id`-like field, else a stable content hash.
   */
  getElementId(input: ElementInput): string {
    try {
      const element = createElement(input);
      for (const field of ID_FIELDS) {
        const value = element.getProperty(field);
        if (typeof value === 'string' && value !== '') return value;
        if (typeof value === 'number' && Number.isFinite(value)) return String(value);
      }
      const root = element.getProperty('');
      return `element_${stableHash(root === undefined ? element.toDict() : root)}`;
    } catch (err) {
      // Cyclic records cannot be serialised; custom elements may fail to read
      logger.warn('Element id unavailable; using a shared id', { error: errorMessage(err) });
      return UNHASHABLE_ID;
    }
  }

  getHistory(target: string | ElementInput): ElementStateHistory | undefined {
    const id = typeof target === 'string' ? target : this.getElementId(target);
    return this.histories.get(id);
  }

  /** Drops one element's history, or all of it. */
  clearHistory(elementId?: string): void {
    if (elementId === undefined) this.histories.clear();
    else this.histories.delete(elementId);
  }

  get trackedElementCount(): number {
    return this.histories.size;
  }

  getAllRequiredProperties(): Set<string> {
    const props = new Set<string>();
    for (const stage of this.stages) {
      for (const p of stage.getRequiredProperties()) props.add(p);
    }
    return props;
  }

  /**
   * Advisory structure warnings. Never throws.
   */
  validateStructure(): string[] {
    const issues: string[] = [];

    for (let i = 1; i < this.stages.length; i++) {
      const prev = this.stages[i - 1];
      const current = this.stages[i];
      const prevProps = prev.getRequiredProperties();
      const shared = Array.from(current.getRequiredProperties()).some(p => prevProps.has(p));
      if (!shared) {
        issues.push(`Stage '${current.name}' may be unreachable from '${prev.name}' - no shared properties`);
      }
    }

    for (let i = 0; i < this.stages.length - 1; i++) {
      const stage = this.stages[i];
      const next = this.stages[i + 1];
      const nextProps = next.getRequiredProperties();
      const continuous = Array.from(stage.getRequiredProperties()).some(p => nextProps.has(p));
      if (!continuous) {
        issues.push(`Stage '${stage.name}' may create dead-end - no property continuity to '${next.name}'`);
      }
    }

    for (const stage of this.stages) {
      if (stage.gates.length === 0 && !stage.schema) {
        issues.push(`Stage '${stage.name}' has no gates or schema and always passes`);
      }
      for (const gate of stage.gates) {
        if (gate.targetStage && !this.stageIndex.has(gate.targetStage)) {
          issues.push(`Gate '${gate.name}' in stage '${stage.name}' targets unknown stage '${gate.targetStage}'`);
        }
      }
    }

    return issues;
  }

  getSummary(): string {
    return `Process '${this.name}' with ${this.stages.length} stage(s): ${this.stageOrder.join(' -> ')}`;
  }
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

