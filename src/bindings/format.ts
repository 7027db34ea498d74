import type { OptionSpec, OptionValue, PositionalValue, Schema } from '../schema/types.js';
import { formatValue } from '../schema/values.js';
import { bindingValue, type Bindings } from './types.js';

export interface BindingValues {
  options: Record<string, OptionValue | null>;
  positionals: Record<string, PositionalValue | null>;
  variadic: string[];
}

/** Flattens bindings into plain values; unset entries become null. */
export function bindingValues(bindings: Bindings): BindingValues {
  return {
    options: Object.fromEntries(
      Object.entries(bindings.options).map(([name, binding]) => [name, bindingValue(binding) ?? null]),
    ),
    positionals: Object.fromEntries(
      Object.entries(bindings.positionals).map(([name, binding]) => [name, bindingValue(binding) ?? null]),
    ),
    variadic: [...bindings.variadic],
  };
}

function formatOption(spec: OptionSpec, value: OptionValue): string[] {
  const longName = spec.long ?? spec.aliases[0];
  if (!spec.takesValue) {
    if (value !== true) {
      return [];
    }
    return [longName !== undefined ? `--${longName}` : `-${spec.short ?? ''}`];
  }
  if (longName !== undefined) {
    return [`--${longName}=${formatValue(value)}`];
  }
  return [`-${spec.short ?? ''}`, formatValue(value)];
}

/**
 * Re-serializes bindings into a canonical argument vector: user-supplied
 * options in schema order, then `--` and the positional tokens. Defaulted and
 * unset entries, a defaulted variadic capture included, are left out so that
 * reparsing reproduces their sources.
 */
export function formatArgv(schema: Schema, bindings: Bindings): string[] {
  const argv: string[] = [];
  for (const spec of schema.options) {
    const binding = bindings.options[spec.name];
    if (binding?.source === 'argv') {
      argv.push(...formatOption(spec, binding.value));
    }
  }

  const operands: string[] = [];
  for (const slot of schema.positionals) {
    const binding = bindings.positionals[slot.name];
    if (binding?.source !== 'argv') {
      break;
    }
    operands.push(formatValue(binding.value));
  }
  if (bindings.variadicSource === 'argv') {
    operands.push(...bindings.variadic);
  }

  if (operands.length > 0) {
    argv.push('--', ...operands);
  }
  return argv;
}
