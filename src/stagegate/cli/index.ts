import { evaluateElement } from './commands/evaluate';
import { printStageSchema } from './commands/schema';
import { validateDefinition } from './commands/validate';
import { VALIDATION_SEVERITIES, type ValidationSeverity } from '../process/validator';

export interface ParsedArgs {
  positional: string[];
  flags: Record<string, string | boolean>;
}

/** `--name value` and `--name=value` take a value; bare `--name` is boolean. */
export function parseArgs(args: string[], valueFlags: string[] = []): ParsedArgs {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq !== -1) {
      flags[body.slice(0, eq)] = body.slice(eq + 1);
    } else if (valueFlags.includes(body) && i + 1 < args.length) {
      flags[body] = args[++i];
    } else {
      flags[body] = true;
    }
  }
  return { positional, flags };
}

export async function runStagegateCli(args: string[], cwd: string = process.cwd()): Promise<number> {
  const command = args[0] ?? 'help';
  const restArgs = args.slice(1);

  try {
    switch (command) {
      case 'evaluate': {
        const { positional, flags } = parseArgs(restArgs, ['stage']);
        const [processFile, elementFile] = positional;
        if (!processFile || !elementFile) {
          console.error('Usage: stagegate evaluate <process-file> <element-file> [--stage <name>] [--json]');
          return 1;
        }
        const stage = typeof flags.stage === 'string' ? flags.stage : undefined;
        return await evaluateElement(cwd, processFile, elementFile, { stage, json: flags.json === true });
      }

      case 'validate': {
        const { positional, flags } = parseArgs(restArgs, ['severity']);
        const processFile = positional[0];
        const severity = flags.severity ?? 'info';
        if (!processFile || !isSeverity(severity)) {
          console.error('Usage: stagegate validate <process-file> [--severity error|warning|info]');
          return 1;
        }
        return await validateDefinition(cwd, processFile, severity);
      }

      case 'schema': {
        const { positional, flags } = parseArgs(restArgs);
        const [processFile, stage] = positional;
        if (!processFile || !stage) {
          console.error('Usage: stagegate schema <process-file> <stage> [--stage-specific] [--json]');
          return 1;
        }
        return await printStageSchema(cwd, processFile, stage, {
          stageSpecific: flags['stage-specific'] === true,
          json: flags.json === true,
        });
      }

      case 'help':
      case '--help':
      case '-h':
        printHelp();
        return 0;

      default:
        console.error(`Unknown command: ${command}`);
        printHelp();
        return 1;
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

function isSeverity(value: string | boolean): value is ValidationSeverity {
  return VALIDATION_SEVERITIES.some(s => s === value);
}

function printHelp(): void {
  console.log(`
stagegate - Stage-gated workflow evaluation

Usage: stagegate <command> [options]

Commands:
  evaluate <process> <element>   Evaluate an element file against a process
      --stage <name>             Start from a known stage
      --json                     Print the result as JSON
  validate <process>             Validate a process definition
      --severity <level>         Lowest severity to report (error, warning, info)
  schema <process> <stage>       Print the JSON Schema for a stage as YAML
      --stage-specific           Only that stage's fields, not earlier ones
      --json                     Print JSON instead of YAML
  help                           Show this help message

Examples:
  stagegate validate onboarding.yaml
  stagegate evaluate onboarding.yaml applicant.json --json
  stagegate schema onboarding.yaml verification --json
`);
}
