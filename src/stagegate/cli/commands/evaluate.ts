import { parse as parseYaml } from 'yaml';
import * as fs from 'fs/promises';
import * as path from 'path';
import { isRecord } from '../../element/element';
import { DefinitionError, errorMessage } from '../../errors';
import { ProcessLoader } from '../../protocol/loader';
import type { EvaluationState, StatusResult } from '../../process/result';

export interface EvaluateOptions {
  stage?: string;
  json?: boolean;
}

/**
 * Evaluate one element file against a process definition.
 */
export async function evaluateElement(
  cwd: string,
  processFile: string,
  elementFile: string,
  options: EvaluateOptions = {},
): Promise<number> {
  const loader = new ProcessLoader();
  const flow = await loader.loadProcess(path.resolve(cwd, processFile));
  const element = await readElement(path.resolve(cwd, elementFile));

  const result = flow.evaluate(element, options.stage);

  if (options.json) {
    console.log(JSON.stringify(result.toDict(), null, 2));
  } else {
    printResult(flow.name, result);
  }
  return result.hasErrors() ? 1 : 0;
}

export async function readElement(filePath: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new DefinitionError(`Cannot read element: ${errorMessage(err)}`, filePath);
  }

  let data: unknown;
  try {
    data = path.extname(filePath).toLowerCase() === '.json' ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    throw new DefinitionError(`Invalid element file: ${errorMessage(err)}`, filePath);
  }
  if (!isRecord(data)) {
    throw new DefinitionError('Element file must contain an object at the top level', filePath);
  }
  return data;
}

function printResult(processName: string, result: StatusResult): void {
  console.log('');
  console.log(`Process:   ${processName}`);
  console.log(`Element:   ${result.elementId}`);
  console.log(`State:     ${formatState(result.state)}`);
  console.log(`Stage:     ${result.currentStage ?? 'none'}`);
  if (result.proposedStage && result.proposedStage !== result.currentStage) {
    console.log(`Proposed:  ${result.proposedStage}`);
  }

  if (result.actions.length > 0) {
    console.log('');
    console.log('── Actions ────────────────────────────');
    for (const action of result.actions) {
      console.log(`  ${priorityIcon(action.priority)} [${action.type}] ${action.description}`);
    }
  }

  for (const warning of result.warnings) {
    console.log(`  \x1b[33m!\x1b[0m ${warning}`);
  }
  for (const error of result.errors) {
    console.log(`  \x1b[31m✗\x1b[0m ${error}`);
  }
  console.log('');
}

function formatState(state: EvaluationState): string {
  const colors: Record<EvaluationState, string> = {
    scoping: '\x1b[31m●\x1b[0m scoping',
    fulfilling: '\x1b[33m●\x1b[0m fulfilling',
    qualifying: '\x1b[36m●\x1b[0m qualifying',
    awaiting: '\x1b[33m●\x1b[0m awaiting',
    advancing: '\x1b[36m●\x1b[0m advancing',
    regressing: '\x1b[31m●\x1b[0m regressing',
    completed: '\x1b[32m✓\x1b[0m completed',
  };
  return colors[state];
}

function priorityIcon(priority: string): string {
  const icons: Record<string, string> = {
    critical: '\x1b[31m■\x1b[0m',
    high: '\x1b[33m●\x1b[0m',
    normal: '\x1b[90m○\x1b[0m',
    low: '\x1b[90m·\x1b[0m',
  };
  return icons[priority] ?? '○';
}
