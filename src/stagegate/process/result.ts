export const EVALUATION_STATES = [
  'scoping',
  'fulfilling',
  'qualifying',
  'awaiting',
  'advancing',
  'regressing',
  'completed',
] as const;
export type EvaluationState = typeof EVALUATION_STATES[number];

export const ACTION_TYPES = [
  'complete_field',
  'validate_data',
  'wait_for_condition',
  'transition_stage',
  'manual_review',
] as const;
export type ActionType = typeof ACTION_TYPES[number];

export const PRIORITIES = ['low', 'normal', 'high', 'critical'] as const;
export type Priority = typeof PRIORITIES[number];

export interface Action {
  type: ActionType;
  description: string;
  priority: Priority;
  conditions: string[];
  metadata: Record<string, unknown>;
}

export function createAction(
  type: ActionType,
  description: string,
  options: Partial<Omit<Action, 'type' | 'description'>> = {},
): Action {
  return {
    type,
    description,
    priority: options.priority ?? 'normal',
    conditions: options.conditions ?? [],
    metadata: options.metadata ?? {},
  };
}

export interface StatusResultInit {
  state: EvaluationState;
  elementId: string;
  currentStage: string | null;
  proposedStage?: string | null;
  actions?: Action[];
  errors?: string[];
  warnings?: string[];
  metadata?: Record<string, unknown>;
  timestamp?: Date;
}

const TERMINAL: ReadonlySet<EvaluationState> = new Set<EvaluationState>(['completed']);

/**
 * Outcome of one evaluation call.
 */
export class StatusResult {
  readonly state: EvaluationState;
  readonly elementId: string;
  readonly currentStage: string | null;
  readonly proposedStage: string | null;
  readonly actions: Action[];
  readonly errors: string[];
  readonly warnings: string[];
  readonly metadata: Record<string, unknown>;
  readonly timestamp: Date;

  constructor(init: StatusResultInit) {
    this.state = init.state;
    this.elementId = init.elementId;
    this.currentStage = init.currentStage;
    this.proposedStage = init.proposedStage === undefined ? defaultProposed(init) : init.proposedStage;
    this.actions = init.actions ?? [];
    this.errors = init.errors ?? [];
    this.warnings = init.warnings ?? [];
    this.metadata = init.metadata ?? {};
    this.timestamp = init.timestamp ?? new Date();
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  isTerminal(): boolean {
    return TERMINAL.has(this.state);
  }

  summary(): string {
    const stage = this.currentStage ?? 'none';
    let text = `${this.state.toUpperCase()} at stage '${stage}'`;
    if (this.proposedStage && this.proposedStage !== this.currentStage) {
      text += ` -> '${this.proposedStage}'`;
    }
    if (this.actions.length > 0) text += ` (${this.actions.length} action(s))`;
    if (this.errors.length > 0) text += ` [${this.errors.length} error(s)]`;
    return text;
  }

  toDict(): Record<string, unknown> {
    return {
      state: this.state,
      element_id: this.elementId,
      current_stage: this.currentStage,
      proposed_stage: this.proposedStage,
      actions: this.actions.map(a => ({
        type: a.type,
        description: a.description,
        priority: a.priority,
        conditions: [...a.conditions],
        metadata: { ...a.metadata },
      })),
      errors: [...this.errors],
      warnings: [...this.warnings],
      metadata: { ...this.metadata },
      timestamp: this.timestamp.toISOString(),
    };
  }
}

function defaultProposed(init: StatusResultInit): string | null {
  switch (init.state) {
    case 'fulfilling':
    case 'qualifying':
    case 'awaiting':
      return init.currentStage;
    default:
      return null;
  }
}
