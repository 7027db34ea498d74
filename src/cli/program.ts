import { Command } from 'commander';
import { buildParseCommand } from './commands/parse/register.js';
import { buildCheckCommand, buildUsageCommand } from './commands/schema/register.js';
import { setExitCode } from './shared/exitCode.js';
import { VERSION } from './version.js';

const GLOBAL_NOTES = 'Notes: POSIXLY_CORRECT stops option scanning at the first operand; ARGBIND_DEBUG=1 prints trace records.';

export function buildProgram(): Command {
  const program = new Command('argbind');

  program
    .description('Schema-driven command-line argument parser')
    .addHelpText('beforeAll', `${GLOBAL_NOTES}\n`)
    .helpOption('-h, --help', 'display help for command')
    .option('-v, --version', 'display version')
    .enablePositionalOptions()
    .allowExcessArguments(true)
    .action((options: { version?: boolean }, command: Command) => {
      if (options.version) {
        console.log(`argbind v${VERSION}`);
        setExitCode(0);
        return;
      }

      if (command.args.length > 0) {
        console.error(`Unknown command: ${command.args[0]}`);
        setExitCode(1);
        return;
      }

      command.outputHelp();
      setExitCode(0);
    });

  buildParseCommand(program);
  buildUsageCommand(program);
  buildCheckCommand(program);

  return program;
}
