import type { ZodIssue } from 'zod';

/**
 * Raised while building locks, gates, schemas, stages or processes
 * from an invalid description. Never raised during evaluation.
 */
export class ConfigurationError extends Error {
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ConfigurationError';
    this.details = details;
  }
}

/**
 * Raised by the definition loader when a file cannot be read, parsed
 * or does not match the process definition schema.
 */
export class DefinitionError extends Error {
  public source?: string;
  public issues: ZodIssue[];

  constructor(message: string, source?: string, issues: ZodIssue[] = []) {
    super(source ? `${source}: ${message}` : message);
    this.name = 'DefinitionError';
    this.source = source;
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
