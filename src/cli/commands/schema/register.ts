import { Command } from 'commander';
import { runSchemaCommand } from '../schema.js';
import { resolveCliEnvironment } from '../../../shared/envFlags.js';
import { setExitCode } from '../../shared/exitCode.js';

export function buildUsageCommand(program: Command): Command {
  return program
    .command('usage')
    .description('Print usage text rendered from a schema file.')
    .argument('<schema>', 'Schema file (JSON).')
    .option('--prog <name>', 'Program name used in usage text.')
    .action(async (schemaPath: string, options: { prog?: string }) => {
      setExitCode(await runSchemaCommand({
        kind: 'usage',
        schemaPath,
        environment: resolveCliEnvironment(),
        ...(options.prog ? { program: options.prog } : {}),
      }));
    });
}

export function buildCheckCommand(program: Command): Command {
  return program
    .command('check')
    .description('Validate a schema file.')
    .argument('<schema>', 'Schema file (JSON).')
    .action(async (schemaPath: string) => {
      setExitCode(await runSchemaCommand({
        kind: 'check',
        schemaPath,
        environment: resolveCliEnvironment(),
      }));
    });
}
