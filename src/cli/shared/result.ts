import { ValidationError } from '../../shared/types.js';
import { asErrorMessage } from './exitCode.js';

export interface CommandExecutionOptions {
  usage?: string | (() => string | undefined);
  printUsageOnValidationError?: boolean;
}

export function printJsonResult(payload: unknown): void {
  console.log(JSON.stringify(payload, null, 2));
}

function resolveUsage(usage: CommandExecutionOptions['usage']): string | undefined {
  const text = typeof usage === 'function' ? usage() : usage;
  return text && text.length > 0 ? text : undefined;
}

export async function runCommand(
  execute: () => Promise<number> | number,
  options: CommandExecutionOptions = {},
): Promise<number> {
  try {
    return await Promise.resolve(execute());
  } catch (error) {
    const message = asErrorMessage(error);
    const validationError = error instanceof ValidationError ? error : undefined;

    if (validationError) {
      console.error(`[${validationError.code}] ${message}`);
    } else {
      console.error('ERROR:', message);
    }
    if (options.printUsageOnValidationError && validationError !== undefined) {
      const usage = resolveUsage(options.usage);
      if (usage) {
        console.error(usage);
      }
    }
    return 1;
  }
}
