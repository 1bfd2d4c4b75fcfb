import type { EvaluationState } from './result';

export interface StateTransition {
  timestamp: Date;
  fromState: EvaluationState | null;
  toState: EvaluationState;
  stage: string | null;
  reason: string;
  metadata: Record<string, unknown>;
}

// Lateral moves sit between ranks; regressing is below everything
const RANK: Record<EvaluationState, number> = {
  scoping: 0,
  fulfilling: 1,
  awaiting: 1.5,
  qualifying: 2,
  advancing: 3,
  completed: 4,
  regressing: -1,
};

export function isProgression(t: StateTransition): boolean {
  if (t.fromState === null) return true;
  return RANK[t.toState] > RANK[t.fromState];
}

export function isRegression(t: StateTransition): boolean {
  if (t.toState === 'regressing') return true;
  return t.fromState !== null && !isProgression(t) && t.toState !== 'awaiting';
}

export interface StateSummary {
  element_id: string;
  current_state: EvaluationState | null;
  current_stage: string | null;
  total_evaluations: number;
  progressions: number;
  regressions: number;
  state_counts: Partial<Record<EvaluationState, number>>;
  first_seen: string;
  last_transition: string | null;
}

/**
 * Append-only transition log for one element.
 */
export class ElementStateHistory {
  readonly elementId: string;
  readonly createdAt: Date;
  private entries: StateTransition[] = [];
  private evaluations = 0;
  private lastStage: string | null = null;
  private furthest: { stage: string; index: number } | null = null;

  constructor(elementId: string, createdAt: Date = new Date()) {
    this.elementId = elementId;
    this.createdAt = createdAt;
  }

  append(entry: Omit<StateTransition, 'fromState'>): StateTransition {
    const transition: StateTransition = {
      ...entry,
      fromState: this.currentState,
      metadata: { ...entry.metadata },
    };
    this.entries.push(transition);
    if (entry.stage !== null) {
      this.lastStage = entry.stage;
    }
    return transition;
  }

  /** Records the stage an evaluation ended in; only a later stage moves the mark. */
  reach(stage: string, index: number): void {
    if (index < 0) return;
    if (!this.furthest || index > this.furthest.index) {
      this.furthest = { stage, index };
    }
  }

  /** Latest stage in process order the element has occupied. */
  get furthestStage(): string | null {
    return this.furthest?.stage ?? null;
  }

  /** Counts one completed evaluation call. */
  markEvaluated(): void {
    this.evaluations++;
  }

  get transitions(): readonly StateTransition[] {
    return this.entries;
  }

  get currentState(): EvaluationState | null {
    return this.entries.length > 0 ? this.entries[this.entries.length - 1].toState : null;
  }

  /** Last stage any transition was recorded against. */
  get currentStage(): string | null {
    return this.lastStage;
  }

  get evaluationCount(): number {
    return this.evaluations;
  }

  get progressionCount(): number {
    return this.entries.filter(isProgression).length;
  }

  get regressionCount(): number {
    return this.entries.filter(isRegression).length;
  }

  tail(n = 20): StateTransition[] {
    return n <= 0 ? [] : this.entries.slice(-n);
  }

  getStateSummary(): StateSummary {
    const stateCounts: Partial<Record<EvaluationState, number>> = {};
    for (const t of this.entries) {
      stateCounts[t.toState] = (stateCounts[t.toState] ?? 0) + 1;
    }
    const last = this.entries[this.entries.length - 1];
    return {
      element_id: this.elementId,
      current_state: this.currentState,
      current_stage: this.currentStage,
      total_evaluations: this.evaluations,
      progressions: this.progressionCount,
      regressions: this.regressionCount,
      state_counts: stateCounts,
      first_seen: this.createdAt.toISOString(),
      last_transition: last ? last.timestamp.toISOString() : null,
    };
  }
}
