import { HELP_LONG, HELP_SHORT, type OptionSpec, type OptionValue, type Schema } from '../schema/types.js';
import { parseIntegerText } from '../schema/values.js';
import { ParseError } from './errors.js';

export interface Operand {
  token: string;
  index: number;
}

export type ScanResult =
  | { kind: 'help' }
  | { kind: 'options'; values: Map<string, OptionValue>; operands: Operand[] };

interface OptionLookup {
  byShort: Map<string, OptionSpec>;
  byLong: Map<string, OptionSpec>;
}

interface ClusterEntry {
  spec: OptionSpec;
  flag: string;
  inlineValue?: string;
}

type ClusterPlan =
  | { kind: 'help' }
  | { kind: 'unknown'; flag: string }
  | { kind: 'options'; entries: ClusterEntry[] };

function buildOptionLookup(schema: Schema): OptionLookup {
  const byShort = new Map<string, OptionSpec>();
  const byLong = new Map<string, OptionSpec>();
  for (const spec of schema.options) {
    if (spec.short !== undefined) {
      byShort.set(spec.short, spec);
    }
    if (spec.long !== undefined) {
      byLong.set(spec.long, spec);
    }
    for (const alias of spec.aliases) {
      byLong.set(alias, spec);
    }
  }
  return { byShort, byLong };
}

function convertOptionValue(spec: OptionSpec, raw: string, flag: string, token: string, index: number): OptionValue {
  if (spec.valueType !== 'integer') {
    return raw;
  }
  const parsed = parseIntegerText(raw);
  if (parsed === undefined) {
    throw new ParseError('InvalidOptionValue', `Invalid value for ${flag} at arg ${index + 1}: ${raw}`, {
      token,
      index,
      target: spec.name,
    });
  }
  return parsed;
}

function planCluster(chars: string, lookup: OptionLookup, helpEnabled: boolean): ClusterPlan {
  const entries: ClusterEntry[] = [];
  for (let position = 0; position < chars.length; position += 1) {
    const char = chars[position];
    if (helpEnabled && char === HELP_SHORT) {
      return { kind: 'help' };
    }
    const spec = lookup.byShort.get(char);
    if (!spec) {
      return { kind: 'unknown', flag: `-${char}` };
    }
    if (spec.takesValue) {
      const rest = chars.slice(position + 1);
      entries.push({ spec, flag: `-${char}`, ...(rest.length > 0 ? { inlineValue: rest } : {}) });
      break;
    }
    entries.push({ spec, flag: `-${char}` });
  }
  return { kind: 'options', entries };
}

/**
 * Walks argv once, left to right, binding option values and collecting every
 * other token as an operand for positional distribution.
 */
export function scanArgv(schema: Schema, argv: readonly string[]): ScanResult {
  const { policy } = schema;
  const lookup = buildOptionLookup(schema);
  const values = new Map<string, OptionValue>();
  const operands: Operand[] = [];
  let optionsEnded = false;

  const rejectUnknown = (flag: string, token: string, index: number): void => {
    if (policy.unknownOptions === 'reject') {
      throw new ParseError('UnknownOption', `Unknown option: ${flag}`, { token, index });
    }
    operands.push({ token, index });
  };

  const takeNextValue = (flag: string, token: string, index: number, spec: OptionSpec): string => {
    if (index + 1 >= argv.length) {
      throw new ParseError('MissingOptionValue', `Missing value for ${flag}`, { token, index, target: spec.name });
    }
    return argv[index + 1];
  };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];

    if (optionsEnded) {
      operands.push({ token, index });
      continue;
    }

    if (token === '--') {
      optionsEnded = true;
      continue;
    }

    if (token.startsWith('--')) {
      const equalsIndex = token.indexOf('=');
      const hasEquals = equalsIndex >= 0;
      const name = hasEquals ? token.slice(2, equalsIndex) : token.slice(2);
      const flag = `--${name}`;
      const inlineValue = hasEquals ? token.slice(equalsIndex + 1) : undefined;

      if (policy.help && name === HELP_LONG) {
        if (hasEquals) {
          throw new ParseError('InvalidOptionValue', `${flag} does not take a value`, { token, index });
        }
        return { kind: 'help' };
      }

      const spec = lookup.byLong.get(name);
      if (!spec) {
        rejectUnknown(flag, token, index);
        continue;
      }

      if (!spec.takesValue) {
        if (hasEquals) {
          throw new ParseError('InvalidOptionValue', `${flag} does not take a value`, {
            token,
            index,
            target: spec.name,
          });
        }
        values.set(spec.name, true);
        continue;
      }

      if (inlineValue !== undefined) {
        values.set(spec.name, convertOptionValue(spec, inlineValue, flag, token, index));
        continue;
      }

      const raw = takeNextValue(flag, token, index, spec);
      values.set(spec.name, convertOptionValue(spec, raw, flag, raw, index + 1));
      index += 1;
      continue;
    }

    if (token.startsWith('-') && token.length > 1) {
      const plan = planCluster(token.slice(1), lookup, policy.help);
      if (plan.kind === 'help') {
        return plan;
      }
      if (plan.kind === 'unknown') {
        rejectUnknown(plan.flag, token, index);
        continue;
      }

      let consumedNext = false;
      for (const entry of plan.entries) {
        if (!entry.spec.takesValue) {
          values.set(entry.spec.name, true);
          continue;
        }
        if (entry.inlineValue !== undefined) {
          values.set(entry.spec.name, convertOptionValue(entry.spec, entry.inlineValue, entry.flag, token, index));
          continue;
        }
        const raw = takeNextValue(entry.flag, token, index, entry.spec);
        values.set(entry.spec.name, convertOptionValue(entry.spec, raw, entry.flag, raw, index + 1));
        consumedNext = true;
      }
      if (consumedNext) {
        index += 1;
      }
      continue;
    }

    operands.push({ token, index });
    if (!policy.permute) {
      optionsEnded = true;
    }
  }

  return { kind: 'options', values, operands };
}
