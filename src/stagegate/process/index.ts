export { Process, type ProcessOptions, type ProgressionCheck } from './process';
export {
  StatusResult,
  createAction,
  ACTION_TYPES,
  EVALUATION_STATES,
  PRIORITIES,
  type Action,
  type ActionType,
  type EvaluationState,
  type Priority,
  type StatusResultInit,
} from './result';
export { RegressionDetector, isSignificantChange, occupiedStage, type RegressionIssue, type RegressionKind, type RegressionReport, type Snapshot } from './regression';
export {
  ProcessValidator,
  DEFAULT_RULES,
  VALIDATION_SEVERITIES,
  atSeverity,
  type ProcessValidationReport,
  type ValidationMessage,
  type ValidationRule,
  type ValidationSeverity,
} from './validator';
export { ElementStateHistory, isProgression, isRegression, type StateTransition, type StateSummary } from './history';
