import { parse as parseYaml } from 'yaml';
import * as fs from 'fs/promises';
import * as path from 'path';
import { isRecord } from '../element/element';
import { DefinitionError, errorMessage } from '../errors';
import type { Process } from '../process/process';
import type { ProcessDefinition } from '../types';
import { buildProcess, type BuildOptions } from './builder';
import { ProcessDefinitionSchema } from './schemas';

export type DefinitionFormat = 'yaml' | 'json';

export function formatFromPath(filePath: string): DefinitionFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') return 'yaml';
  if (ext === '.json') return 'json';
  throw new DefinitionError(`Unsupported definition file extension '${ext || '(none)'}'`, filePath);
}

export class ProcessLoader {
  /**
   * Load and validate a process definition file.
   */
  async loadFile(filePath: string): Promise<ProcessDefinition> {
    const format = formatFromPath(filePath);
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      throw new DefinitionError(`Cannot read definition: ${errorMessage(err)}`, filePath);
    }
    return this.parse(content, format, filePath);
  }

  /**
   * Parse definition text. A top-level `process:` key is unwrapped.
   */
  parse(content: string, format: DefinitionFormat, source?: string): ProcessDefinition {
    let data: unknown;
    try {
      data = format === 'json' ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
      throw new DefinitionError(`Invalid ${format.toUpperCase()}: ${errorMessage(err)}`, source);
    }
    return this.validate(data, source);
  }

  validate(data: unknown, source?: string): ProcessDefinition {
    const body = isRecord(data) && isRecord(data.process) ? data.process : data;
    const result = ProcessDefinitionSchema.safeParse(body);
    if (!result.success) {
      const problems = result.error.issues.map(issue => {
        const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${where}: ${issue.message}`;
      });
      throw new DefinitionError(`Invalid process definition: ${problems.join('; ')}`, source, result.error.issues);
    }
    return result.data;
  }

  async loadProcess(filePath: string, options: BuildOptions = {}): Promise<Process> {
    return buildProcess(await this.loadFile(filePath), options);
  }
}
