import { errorMessage } from '../errors';
import { createLogger } from '../shared/logger';
import type { Process } from './process';

const logger = createLogger('validator');

export const VALIDATION_SEVERITIES = ['error', 'warning', 'info'] as const;
export type ValidationSeverity = typeof VALIDATION_SEVERITIES[number];

export interface ValidationMessage {
  severity: ValidationSeverity;
  code: string;
  message: string;
  /** `process`, `stage.<name>`, `stage.<name>.gate.<name>`, `property.<path>` or `schema.<name>` */
  location: string;
  suggestion: string;
}

export interface ProcessValidationReport {
  processName: string;
  messages: ValidationMessage[];
  errors: number;
  warnings: number;
  info: number;
  hasErrors: boolean;
  isClean: boolean;
}

export type ValidationRule = (process: Process) => ValidationMessage[];

/** Messages at or above the given severity. */
export function atSeverity(messages: ValidationMessage[], minimum: ValidationSeverity): ValidationMessage[] {
  const limit = VALIDATION_SEVERITIES.indexOf(minimum);
  return messages.filter(m => VALIDATION_SEVERITIES.indexOf(m.severity) <= limit);
}

function message(
  severity: ValidationSeverity,
  code: string,
  text: string,
  location: string,
  suggestion = '',
): ValidationMessage {
  return { severity, code, message: text, location, suggestion };
}

function disjoint(a: Set<string>, b: Set<string>): boolean {
  for (const item of a) {
    if (b.has(item)) return false;
  }
  return true;
}

function adjacentPairs(process: Process) {
  return process.stages.slice(1).map((stage, i) => ({ prev: process.stages[i], next: stage }));
}

const checkReachability: ValidationRule = process =>
  adjacentPairs(process)
    .filter(({ prev, next }) => disjoint(prev.getRequiredProperties(), next.getRequiredProperties()))
    .map(({ prev, next }) => message(
      'warning',
      'UNREACHABLE_STAGE',
      `Stage '${next.name}' may be unreachable from '${prev.name}'`,
      `stage.${next.name}`,
      'Ensure stages share some common properties for progression',
    ));

const checkDeadEnds: ValidationRule = process =>
  adjacentPairs(process)
    .filter(({ prev, next }) => disjoint(prev.getRequiredProperties(), next.getRequiredProperties()))
    .map(({ prev }) => message(
      'warning',
      'DEAD_END_STAGE',
      `Stage '${prev.name}' has no property continuity to next stage`,
      `stage.${prev.name}`,
      'Add gates that prepare properties needed for next stage',
    ));

const checkPropertyCoverage: ValidationRule = process => {
  const users = new Map<string, string[]>();
  for (const stage of process.stages) {
    for (const prop of stage.getRequiredProperties()) {
      users.set(prop, [...(users.get(prop) ?? []), stage.name]);
    }
  }
  return Array.from(users.entries())
    .filter(([, stages]) => stages.length === 1)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([prop, stages]) => message(
      'info',
      'SINGLE_USE_PROPERTY',
      `Property '${prop}' only used by stage '${stages[0]}'`,
      `property.${prop}`,
      'Consider if property should be used by other stages',
    ));
};

const checkGateLogic: ValidationRule = process => {
  const out: ValidationMessage[] = [];
  for (const stage of process.stages) {
    for (const gate of stage.gates) {
      const location = `stage.${stage.name}.gate.${gate.name}`;
      for (const warning of gate.validateStructure()) {
        out.push(message('warning', 'GATE_STRUCTURE', warning, location));
      }
      if (gate.targetStage && process.getStageIndex(gate.targetStage) === -1) {
        out.push(message(
          'error',
          'UNKNOWN_TARGET_STAGE',
          `Gate '${gate.name}' targets unknown stage '${gate.targetStage}'`,
          location,
          'Point target_stage at an existing stage or remove it',
        ));
      }
    }
  }
  return out;
};

const checkNaming: ValidationRule = process =>
  process.stages
    .filter(stage => stage.name.includes(' '))
    .map(stage => message(
      'warning',
      'STAGE_NAME_SPACES',
      `Stage name '${stage.name}' contains spaces`,
      `stage.${stage.name}`,
      'Consider using underscores or camelCase instead of spaces',
    ));

const checkSchemaConsistency: ValidationRule = process => {
  const byName = new Map<string, string[]>();
  for (const stage of process.stages) {
    if (stage.schema) {
      byName.set(stage.schema.name, [...(byName.get(stage.schema.name) ?? []), stage.name]);
    }
  }
  return Array.from(byName.entries())
    .filter(([, stages]) => stages.length > 1)
    .map(([name, stages]) => message(
      'info',
      'DUPLICATE_SCHEMA_NAME',
      `Schema '${name}' used by multiple stages: ${stages.join(', ')}`,
      `schema.${name}`,
      'Verify schemas are truly identical or use unique names',
    ));
};

const checkOrdering: ValidationRule = process =>
  process.stages.length === 1
    ? [message(
      'info',
      'SINGLE_STAGE_PROCESS',
      'Process contains only one stage',
      'process.stages',
      'Consider if this process really needs multi-stage validation',
    )]
    : [];

const checkTransitions: ValidationRule = process => {
  if (process.allowStageSkipping) return [];
  const out = adjacentPairs(process)
    .filter(({ prev, next }) => disjoint(prev.getRequiredProperties(), next.getRequiredProperties()))
    .map(({ prev, next }) => message(
      'warning',
      'DIFFICULT_TRANSITION',
      `No property overlap between '${prev.name}' and '${next.name}'`,
      `stage.${prev.name}`,
      'Ensure stages have logical progression or enable stage skipping',
    ));
  // Only stages that lead into another non-final stage
  for (const stage of process.stages.slice(0, -2)) {
    if (stage.gates.length === 0) {
      out.push(message(
        'warning',
        'UNGATED_INTERMEDIATE_STAGE',
        `Stage '${stage.name}' has no gates but is not final`,
        `stage.${stage.name}`,
        'Add gates to control progression or reconsider stage order',
      ));
    }
  }
  return out;
};

export const DEFAULT_RULES: readonly ValidationRule[] = [
  checkReachability,
  checkDeadEnds,
  checkPropertyCoverage,
  checkGateLogic,
  checkNaming,
  checkSchemaConsistency,
  checkOrdering,
  checkTransitions,
];

/**
 * Structural and semantic checks over a built process. A rule that throws
 * is reported as a `VALIDATION_ERROR` message.
 */
export class ProcessValidator {
  private readonly rules: readonly ValidationRule[];

  constructor(rules: readonly ValidationRule[] = DEFAULT_RULES) {
    this.rules = rules;
  }

  validate(process: Process): ProcessValidationReport {
    const messages: ValidationMessage[] = [];
    for (const rule of this.rules) {
      try {
        messages.push(...rule(process));
      } catch (err) {
        messages.push(message('error', 'VALIDATION_ERROR', `Validation rule failed: ${errorMessage(err)}`, 'process'));
      }
    }

    const count = (severity: ValidationSeverity) => messages.filter(m => m.severity === severity).length;
    const errors = count('error');
    logger.debug('Validated process', { process: process.name, messages: messages.length, errors });
    return {
      processName: process.name,
      messages,
      errors,
      warnings: count('warning'),
      info: count('info'),
      hasErrors: errors > 0,
      isClean: messages.length === 0,
    };
  }
}
