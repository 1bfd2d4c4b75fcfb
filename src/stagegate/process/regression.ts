import { isDeepStrictEqual } from 'util';
import { createElement, type Element, type ElementInput } from '../element/element';
import { describeType } from '../locks/checks';
import type { Process } from './process';
import type { EvaluationState, StatusResult } from './result';

export type RegressionKind = 'stage_regression' | 'property_loss' | 'gate_failure';
export type RegressionSeverity = 'warning' | 'error';

export interface RegressionIssue {
  kind: RegressionKind;
  description: string;
  currentValue: unknown;
  expectedValue: unknown;
  location: string;
  severity: RegressionSeverity;
}

export interface RegressionReport {
  elementId: string;
  hasRegression: boolean;
  issues: RegressionIssue[];
  current: StatusResult;
  previous?: Snapshot;
  detectedAt: Date;
}

export interface Snapshot {
  properties: Record<string, unknown>;
  stage: string | null;
  state: EvaluationState;
  passedGates: Set<string>;
  takenAt: Date;
}

/** Stage an evaluation left the element in. */
export function occupiedStage(result: StatusResult): string | null {
  if (result.state === 'regressing') return result.proposedStage;
  if (result.currentStage !== null) return result.currentStage;
  const final = result.metadata.final_stage;
  return typeof final === 'string' ? final : null;
}

/**
 * Compares successive evaluations of the same element.
 */
export class RegressionDetector {
  private snapshots = new Map<string, Snapshot>();

  detect(process: Process, input: ElementInput, elementId?: string, previous?: StatusResult): RegressionReport {
    const element = createElement(input);
    const id = elementId ?? process.getElementId(element);
    const current = process.evaluate(element);
    const stored = this.snapshots.get(id);
    const baseline = previous ? this.fromResult(previous, stored) : stored;

    const issues: RegressionIssue[] = [];
    if (baseline) {
      issues.push(...this.checkStage(process, baseline, current));
      issues.push(...this.checkProperties(baseline, element));
      issues.push(...this.checkGates(baseline, passedGates(process, element)));
    }

    this.snapshots.set(id, {
      properties: element.toDict(),
      stage: occupiedStage(current),
      state: current.state,
      passedGates: passedGates(process, element),
      takenAt: current.timestamp,
    });

    return {
      elementId: id,
      hasRegression: issues.length > 0,
      issues,
      current,
      previous: baseline,
      detectedAt: current.timestamp,
    };
  }

  getSnapshot(elementId: string): Snapshot | undefined {
    return this.snapshots.get(elementId);
  }

  clearSnapshots(elementId?: string): void {
    if (elementId === undefined) this.snapshots.clear();
    else this.snapshots.delete(elementId);
  }

  getSnapshotCount(): number {
    return this.snapshots.size;
  }

  private fromResult(result: StatusResult, stored: Snapshot | undefined): Snapshot {
    return {
      properties: stored?.properties ?? {},
      stage: occupiedStage(result),
      state: result.state,
      passedGates: stored?.passedGates ?? new Set<string>(),
      takenAt: result.timestamp,
    };
  }

  private checkStage(process: Process, before: Snapshot, current: StatusResult): RegressionIssue[] {
    const now = occupiedStage(current);
    if (before.stage === null || now === null) return [];

    const movedBack = process.getStageIndex(now) < process.getStageIndex(before.stage);
    const leftCompleted = before.state === 'completed' && current.state !== 'completed';
    if (!movedBack && !leftCompleted) return [];

    return [{
      kind: 'stage_regression',
      description: movedBack
        ? `Element moved from stage '${before.stage}' to '${now}'`
        : `Element left the completed state at stage '${now}'`,
      currentValue: now,
      expectedValue: before.stage,
      location: 'stage',
      severity: 'warning',
    }];
  }

  private checkProperties(before: Snapshot, element: Element): RegressionIssue[] {
    const issues: RegressionIssue[] = [];
    for (const [key, previous] of Object.entries(before.properties)) {
      const lookup = element.lookup(key);
      if (!lookup.found) {
        issues.push({
          kind: 'property_loss',
          description: `Property '${key}' was removed`,
          currentValue: undefined,
          expectedValue: previous,
          location: `property.${key}`,
          severity: 'error',
        });
      } else if (isSignificantChange(previous, lookup.value)) {
        issues.push({
          kind: 'property_loss',
          description: `Property '${key}' value changed significantly`,
          currentValue: lookup.value,
          expectedValue: previous,
          location: `property.${key}`,
          severity: 'warning',
        });
      }
    }
    return issues;
  }

  private checkGates(before: Snapshot, nowPassing: Set<string>): RegressionIssue[] {
    return Array.from(before.passedGates)
      .filter(gate => !nowPassing.has(gate))
      .map(gate => ({
        kind: 'gate_failure' as const,
        description: `Gate '${gate}' was passing but now fails`,
        currentValue: false,
        expectedValue: true,
        location: `gate.${gate}`,
        severity: 'error' as const,
      }));
  }
}

/** Gate names qualified by stage, e.g. `registration.profile`. */
function passedGates(process: Process, element: Element): Set<string> {
  const passed = new Set<string>();
  for (const stage of process.stages) {
    const result = stage.evaluate(element, { validators: process.validators });
    for (const gate of result.passedGates) passed.add(`${stage.name}.${gate}`);
  }
  return passed;
}

/**
 * Type changes, numbers moving more than 10% and strings changing
 * length by more than 20% count; anything else must differ structurally.
 */
export function isSignificantChange(before: unknown, after: unknown): boolean {
  if (describeType(before) !== describeType(after) && !(typeof before === 'number' && typeof after === 'number')) {
    return true;
  }
  if (typeof before === 'number' && typeof after === 'number') {
    if (before === 0) return after !== 0;
    return Math.abs(after - before) / Math.abs(before) > 0.1;
  }
  if (typeof before === 'string' && typeof after === 'string') {
    if (before.length === 0) return after.length > 0;
    return Math.abs(after.length - before.length) / before.length > 0.2;
  }
  return !isDeepStrictEqual(before, after);
}
