import { Command } from 'commander';
import { runParseCommand } from '../parse.js';
import { resolveCliEnvironment } from '../../../shared/envFlags.js';
import { setExitCode } from '../../shared/exitCode.js';

interface ParseCommandOptions {
  prog?: string;
  values?: boolean;
}

export function buildParseCommand(program: Command): Command {
  return program
    .command('parse')
    .description('Parse arguments against a schema file and print the bindings as JSON.')
    .argument('<schema>', 'Schema file (JSON).')
    .argument('[args...]', 'Arguments to parse; everything after <schema> is passed through.')
    .option('--prog <name>', 'Program name used in usage text.')
    .option('--values', 'Print plain values instead of bindings with their sources.')
    .passThroughOptions()
    .addHelpText('after', [
      '',
      'Examples:',
      '  argbind parse schemas/example.json -b 20 out.txt in.txt foo bar',
      '  argbind parse --values schemas/example.json --block-size=20 out.txt',
      '  POSIXLY_CORRECT=1 argbind parse schemas/example.json out.txt -q',
    ].join('\n'))
    .action(async (schemaPath: string, args: string[], options: ParseCommandOptions) => {
      const code = await runParseCommand({
        schemaPath,
        args,
        environment: resolveCliEnvironment(),
        ...(options.prog ? { program: options.prog } : {}),
        ...(options.values ? { values: true } : {}),
      });
      setExitCode(code);
    });
}
