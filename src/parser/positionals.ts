import { fromArgv, fromDefault, type Binding, type VariadicSource } from '../bindings/types.js';
import type { PositionalSpec, PositionalValue, Schema } from '../schema/types.js';
import { parseIntegerText } from '../schema/values.js';
import { ParseError } from './errors.js';
import type { Operand } from './scan.js';

export interface DistributedPositionals {
  positionals: Record<string, Binding<PositionalValue>>;
  variadic: readonly string[];
  variadicSource: VariadicSource;
}

function convertPositional(spec: PositionalSpec, operand: Operand): PositionalValue {
  if (spec.valueType !== 'integer') {
    return operand.token;
  }
  const parsed = parseIntegerText(operand.token);
  if (parsed === undefined) {
    throw new ParseError(
      'InvalidPositionalValue',
      `Invalid value for ${spec.name} at arg ${operand.index + 1}: ${operand.token}`,
      { token: operand.token, index: operand.index, target: spec.name },
    );
  }
  return parsed;
}

/**
 * Fills fixed slots in declared order, then hands every remaining operand to
 * the variadic slot or applies the extra-positional policy.
 */
export function distributePositionals(schema: Schema, operands: readonly Operand[]): DistributedPositionals {
  const entries = schema.positionals.map((spec, slotIndex): [string, Binding<PositionalValue>] => {
    const operand = operands[slotIndex];
    if (operand === undefined) {
      if (spec.required) {
        throw new ParseError('MissingPositionalArgument', `Missing required argument: ${spec.name}`, {
          target: spec.name,
        });
      }
      return [spec.name, fromDefault(spec.defaultValue)];
    }
    return [spec.name, fromArgv(convertPositional(spec, operand))];
  });

  const rest = operands.slice(schema.positionals.length);
  const extra = rest[0];
  if (!schema.variadic && extra !== undefined && schema.policy.extraPositionals === 'reject') {
    throw new ParseError('UnexpectedPositionalArgument', `Unexpected argument: ${extra.token}`, {
      token: extra.token,
      index: extra.index,
    });
  }

  const positionals = Object.freeze(Object.fromEntries(entries));
  const variadicDefault = schema.variadic?.defaultValue;
  if (rest.length === 0 && variadicDefault !== undefined) {
    return { positionals, variadic: Object.freeze([variadicDefault]), variadicSource: 'default' };
  }
  return {
    positionals,
    variadic: Object.freeze(schema.variadic ? rest.map((operand) => operand.token) : []),
    variadicSource: 'argv',
  };
}
