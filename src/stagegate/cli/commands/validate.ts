import * as path from 'path';
import { errorMessage } from '../../errors';
import { buildProcess } from '../../protocol/builder';
import { ProcessLoader } from '../../protocol/loader';
import { atSeverity, ProcessValidator, type ValidationMessage, type ValidationSeverity } from '../../process/validator';

const MARKS: Record<ValidationSeverity, string> = {
  error: '\x1b[31m✗\x1b[0m',
  warning: '\x1b[33m!\x1b[0m',
  info: '\x1b[36mi\x1b[0m',
};

/**
 * Validate a process definition and report findings at or above `severity`.
 */
export async function validateDefinition(
  cwd: string,
  processFile: string,
  severity: ValidationSeverity = 'info',
): Promise<number> {
  const errors: string[] = [];
  let findings: ValidationMessage[] = [];

  console.log('Validating process definition...');
  console.log('');

  try {
    const definition = await new ProcessLoader().loadFile(path.resolve(cwd, processFile));
    const flow = buildProcess(definition);
    console.log(`\x1b[32m✓\x1b[0m ${flow.getSummary()}`);
    for (const stage of flow.stages) {
      console.log(`\x1b[32m✓\x1b[0m ${stage.getSummary()}`);
    }
    findings = atSeverity(new ProcessValidator().validate(flow).messages, severity);
  } catch (err) {
    errors.push(errorMessage(err));
  }

  console.log('');
  console.log('── Validation Summary ─────────────────');

  if (errors.length > 0) {
    console.log(`\x1b[31mErrors: ${errors.length}\x1b[0m`);
    for (const error of errors) {
      console.log(`  ${MARKS.error} ${error}`);
    }
  }

  for (const finding of findings) {
    console.log(`  ${MARKS[finding.severity]} [${finding.code}] ${finding.message} (${finding.location})`);
    if (finding.suggestion) {
      console.log(`      ${finding.suggestion}`);
    }
  }

  const failed = errors.length > 0 || findings.some(f => f.severity === 'error');
  if (!failed && findings.length === 0) {
    console.log('\x1b[32m✓ Process definition is valid\x1b[0m');
  }

  console.log('');
  return failed ? 1 : 0;
}
