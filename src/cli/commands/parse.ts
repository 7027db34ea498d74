import path from 'node:path';
import { bindingValues } from '../../bindings/format.js';
import { parseArgs } from '../../parser/parseArgs.js';
import { loadSchemaFile } from '../../schema/loadSchema.js';
import type { ParserPolicy, Schema } from '../../schema/types.js';
import { renderUsage } from '../../usage/renderUsage.js';
import { debugTrace, type CliEnvironment } from '../../shared/envFlags.js';
import { HELP_EXIT_CODE } from '../shared/exitCode.js';
import { printJsonResult, runCommand } from '../shared/result.js';

export interface ParseCommandInput {
  schemaPath: string;
  args: string[];
  program?: string;
  values?: boolean;
  environment: CliEnvironment;
}

export function resolveProgramName(schemaPath: string, program?: string): string {
  const explicit = program?.trim();
  if (explicit) {
    return explicit;
  }
  return path.basename(schemaPath, path.extname(schemaPath));
}

export function resolvePolicyOverrides(environment: CliEnvironment): Partial<ParserPolicy> {
  return environment.posixlyCorrect ? { permute: false } : {};
}

export async function runParseCommand(input: ParseCommandInput): Promise<number> {
  const program = resolveProgramName(input.schemaPath, input.program);
  let schema: Schema | undefined;

  return runCommand(
    async () => {
      schema = await loadSchemaFile(input.schemaPath, resolvePolicyOverrides(input.environment));
      const outcome = parseArgs(schema, input.args);
      debugTrace(input.environment, {
        source: 'cli.parse',
        schemaPath: input.schemaPath,
        argc: input.args.length,
        outcome: outcome.kind,
        ...(outcome.kind === 'error' ? { errorKind: outcome.error.kind, index: outcome.error.index } : {}),
      });

      if (outcome.kind === 'help') {
        console.log(renderUsage(schema, program));
        return HELP_EXIT_CODE;
      }
      if (outcome.kind === 'error') {
        throw outcome.error;
      }

      printJsonResult(input.values ? bindingValues(outcome.bindings) : outcome.bindings);
      return 0;
    },
    {
      usage: () => (schema ? renderUsage(schema, program) : undefined),
      printUsageOnValidationError: true,
    },
  );
}
