import { fromArgv, fromDefault, type Binding } from '../bindings/types.js';
import type { OptionSpec, OptionValue, Schema } from '../schema/types.js';
import { ParseError } from './errors.js';

export function displayFlag(spec: OptionSpec): string {
  if (spec.long !== undefined) {
    return `--${spec.long}`;
  }
  if (spec.aliases.length > 0) {
    return `--${spec.aliases[0]}`;
  }
  return `-${spec.short ?? spec.name}`;
}

/**
 * Resolves every declared option, in declaration order, into a binding.
 * The first required option left unset raises MissingRequiredOption.
 */
export function resolveOptionBindings(
  schema: Schema,
  values: ReadonlyMap<string, OptionValue>,
): Record<string, Binding<OptionValue>> {
  const entries = schema.options.map((spec): [string, Binding<OptionValue>] => {
    const supplied = values.get(spec.name);
    if (supplied !== undefined) {
      return [spec.name, fromArgv(supplied)];
    }
    if (spec.required) {
      throw new ParseError('MissingRequiredOption', `Missing required option: ${displayFlag(spec)}`, {
        target: spec.name,
      });
    }
    return [spec.name, fromDefault(spec.defaultValue)];
  });
  return Object.freeze(Object.fromEntries(entries));
}
