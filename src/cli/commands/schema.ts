import { loadSchemaFile } from '../../schema/loadSchema.js';
import type { Schema } from '../../schema/types.js';
import { renderUsage } from '../../usage/renderUsage.js';
import { resolvePolicyOverrides, resolveProgramName } from './parse.js';
import type { CliEnvironment } from '../../shared/envFlags.js';
import { runCommand } from '../shared/result.js';

export interface SchemaCommandInput {
  kind: 'usage' | 'check';
  schemaPath: string;
  program?: string;
  environment: CliEnvironment;
}

export function summarizeSchema(schema: Schema): string {
  const required = schema.options.filter((option) => option.required).length;
  const parts = [
    `${schema.options.length} option(s)${required > 0 ? `, ${required} required` : ''}`,
    `${schema.positionals.length} positional slot(s)`,
    schema.variadic ? `variadic ${schema.variadic.name}` : 'no variadic slot',
  ];
  return `OK: ${parts.join('; ')}`;
}

export async function runSchemaCommand(input: SchemaCommandInput): Promise<number> {
  return runCommand(async () => {
    const schema = await loadSchemaFile(input.schemaPath, resolvePolicyOverrides(input.environment));
    if (input.kind === 'usage') {
      console.log(renderUsage(schema, resolveProgramName(input.schemaPath, input.program)));
      return 0;
    }
    console.log(summarizeSchema(schema));
    return 0;
  });
}
