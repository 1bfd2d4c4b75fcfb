import { stringify } from 'yaml';
import * as path from 'path';
import { ProcessLoader } from '../../protocol/loader';
import { SchemaGenerator } from '../../schema/generator';

export interface SchemaOptions {
  stageSpecific?: boolean;
  json?: boolean;
}

/** Print the JSON Schema an element needs to satisfy at a stage. */
export async function printStageSchema(
  cwd: string,
  processFile: string,
  stageName: string,
  options: SchemaOptions = {},
): Promise<number> {
  const flow = await new ProcessLoader().loadProcess(path.resolve(cwd, processFile));
  const generator = new SchemaGenerator(flow);
  const schema = options.stageSpecific
    ? generator.generateStageSchema(stageName)
    : generator.generateCumulativeSchema(stageName);

  console.log(options.json ? JSON.stringify(schema, null, 2) : stringify(schema));
  return 0;
}
