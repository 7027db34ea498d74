import type { Bindings } from '../bindings/types.js';
import type { Schema } from '../schema/types.js';
import { resolveOptionBindings } from './defaults.js';
import { isParseError, type ParseError } from './errors.js';
import { distributePositionals } from './positionals.js';
import { scanArgv } from './scan.js';

export type ParseOutcome =
  | { readonly kind: 'bindings'; readonly bindings: Bindings }
  | { readonly kind: 'help' }
  | { readonly kind: 'error'; readonly error: ParseError };

export const HELP_REQUESTED: ParseOutcome = Object.freeze({ kind: 'help' });

/**
 * Parses argv against a schema. Returns fully resolved bindings, the help
 * outcome, or exactly one ParseError; never a partial result. Options are
 * validated before positional slots, each in declaration order.
 */
export function parseArgs(schema: Schema, argv: readonly string[]): ParseOutcome {
  try {
    const scan = scanArgv(schema, argv);
    if (scan.kind === 'help') {
      return HELP_REQUESTED;
    }

    const options = resolveOptionBindings(schema, scan.values);
    const { positionals, variadic, variadicSource } = distributePositionals(schema, scan.operands);
    const bindings: Bindings = Object.freeze({ options, positionals, variadic, variadicSource });
    return { kind: 'bindings', bindings };
  } catch (error) {
    if (isParseError(error)) {
      return { kind: 'error', error };
    }
    throw error;
  }
}
