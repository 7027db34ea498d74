import { SchemaError } from './errors.js';
import {
  DEFAULT_POLICY,
  HELP_LONG,
  HELP_SHORT,
  type OptionDefinition,
  type OptionSpec,
  type OptionValue,
  type OptionValueType,
  type ParserPolicy,
  type PositionalDefinition,
  type PositionalSpec,
  type PositionalValue,
  type PositionalValueType,
  type Schema,
  type SchemaDefinition,
  type VariadicSpec,
} from './types.js';
import { parseIntegerText } from './values.js';

const WHITESPACE_PATTERN = /\s/;

function requireName(raw: string, path: string): string {
  if (raw.trim().length === 0 || WHITESPACE_PATTERN.test(raw)) {
    throw new SchemaError(`invalid name "${raw}"`, path);
  }
  return raw;
}

function checkLongFlag(raw: string, path: string): string {
  if (raw.length === 0 || WHITESPACE_PATTERN.test(raw) || raw.includes('=') || raw.startsWith('-')) {
    throw new SchemaError(`invalid long flag "${raw}"`, path);
  }
  return raw;
}

function checkShortFlag(raw: string, path: string): string {
  if (raw.length !== 1 || raw === '-' || WHITESPACE_PATTERN.test(raw)) {
    throw new SchemaError(`invalid short flag "${raw}"`, path);
  }
  return raw;
}

function coerceDefault(
  value: OptionValue,
  valueType: Exclude<OptionValueType, 'boolean'>,
  path: string,
): string | number {
  if (valueType === 'string') {
    if (typeof value !== 'string') {
      throw new SchemaError(`default ${JSON.stringify(value)} is not a string`, path);
    }
    return value;
  }

  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new SchemaError(`default ${value} is not an integer`, path);
    }
    return value;
  }
  if (typeof value === 'string') {
    const parsed = parseIntegerText(value);
    if (parsed === undefined) {
      throw new SchemaError(`default "${value}" is not an integer`, path);
    }
    return parsed;
  }
  throw new SchemaError(`default ${JSON.stringify(value)} is not an integer`, path);
}

class FlagRegistry {
  private readonly owners = new Map<string, string>();

  claim(token: string, owner: string, path: string): void {
    const existing = this.owners.get(token);
    if (existing !== undefined) {
      throw new SchemaError(`flag ${token} is already claimed by "${existing}"`, path);
    }
    this.owners.set(token, owner);
  }
}

function defineOption(
  definition: OptionDefinition,
  index: number,
  names: Set<string>,
  flags: FlagRegistry,
): OptionSpec {
  const path = `options[${index}]`;
  const name = requireName(definition.name, `${path}.name`);
  if (names.has(name)) {
    throw new SchemaError(`duplicate option name "${name}"`, `${path}.name`);
  }
  names.add(name);

  const short = definition.short === undefined ? undefined : checkShortFlag(definition.short, `${path}.short`);
  const long = definition.long === undefined ? undefined : checkLongFlag(definition.long, `${path}.long`);
  const aliases = (definition.aliases ?? []).map((alias, aliasIndex) =>
    checkLongFlag(alias, `${path}.aliases[${aliasIndex}]`),
  );
  if (short === undefined && long === undefined && aliases.length === 0) {
    throw new SchemaError(`option "${name}" needs a short flag, a long flag or an alias`, path);
  }

  if (short !== undefined) {
    flags.claim(`-${short}`, name, `${path}.short`);
  }
  if (long !== undefined) {
    flags.claim(`--${long}`, name, `${path}.long`);
  }
  aliases.forEach((alias, aliasIndex) => {
    flags.claim(`--${alias}`, name, `${path}.aliases[${aliasIndex}]`);
  });

  const required = definition.required ?? false;
  const takesValue = definition.takesValue ?? definition.valueType !== undefined;

  if (!takesValue) {
    if (definition.valueType !== undefined) {
      throw new SchemaError('flag options cannot declare a value type', `${path}.valueType`);
    }
    if (definition.defaultValue !== undefined) {
      throw new SchemaError('flag options cannot have a default value', `${path}.defaultValue`);
    }
    if (required) {
      throw new SchemaError('flag options cannot be required', `${path}.required`);
    }
    return Object.freeze({
      name,
      ...(short !== undefined ? { short } : {}),
      ...(long !== undefined ? { long } : {}),
      aliases: Object.freeze(aliases),
      takesValue: false,
      valueType: 'boolean',
      required: false,
      ...(definition.help !== undefined ? { help: definition.help } : {}),
    });
  }

  const valueType = definition.valueType ?? 'string';
  if (required && definition.defaultValue !== undefined) {
    throw new SchemaError('required options cannot have a default value', `${path}.defaultValue`);
  }
  const defaultValue = definition.defaultValue === undefined
    ? undefined
    : coerceDefault(definition.defaultValue, valueType, `${path}.defaultValue`);

  return Object.freeze({
    name,
    ...(short !== undefined ? { short } : {}),
    ...(long !== undefined ? { long } : {}),
    aliases: Object.freeze(aliases),
    takesValue: true,
    valueType,
    ...(defaultValue !== undefined ? { defaultValue } : {}),
    required,
    ...(definition.help !== undefined ? { help: definition.help } : {}),
    ...(definition.valueName !== undefined ? { valueName: definition.valueName } : {}),
  });
}

function definePositional(
  definition: PositionalDefinition,
  index: number,
  slotNames: Set<string>,
  sawOptional: boolean,
): PositionalSpec {
  const path = `positionals[${index}]`;
  const name = requireName(definition.name, `${path}.name`);
  if (slotNames.has(name)) {
    throw new SchemaError(`duplicate positional slot "${name}"`, `${path}.name`);
  }
  slotNames.add(name);

  const required = definition.required ?? true;
  if (required && sawOptional) {
    throw new SchemaError('a required positional slot cannot follow an optional one', `${path}.required`);
  }
  if (required && definition.defaultValue !== undefined) {
    throw new SchemaError('required positional slots cannot have a default value', `${path}.defaultValue`);
  }

  const valueType: PositionalValueType = definition.valueType ?? 'string';
  const defaultValue: PositionalValue | undefined = definition.defaultValue === undefined
    ? undefined
    : coerceDefault(definition.defaultValue, valueType, `${path}.defaultValue`);

  return Object.freeze({
    name,
    valueType,
    required,
    ...(defaultValue !== undefined ? { defaultValue } : {}),
    ...(definition.help !== undefined ? { help: definition.help } : {}),
  });
}

function resolvePolicy(overrides: Partial<ParserPolicy> = {}): ParserPolicy {
  return Object.freeze({
    unknownOptions: overrides.unknownOptions ?? DEFAULT_POLICY.unknownOptions,
    extraPositionals: overrides.extraPositionals ?? DEFAULT_POLICY.extraPositionals,
    permute: overrides.permute ?? DEFAULT_POLICY.permute,
    help: overrides.help ?? DEFAULT_POLICY.help,
  });
}

/**
 * Validates a schema definition and returns a frozen Schema.
 * Throws SchemaError on the first violated invariant, checking options in
 * declaration order, then positional slots, then the variadic slot.
 */
export function defineSchema(definition: SchemaDefinition): Schema {
  const policy = resolvePolicy(definition.policy);

  const flags = new FlagRegistry();
  if (policy.help) {
    flags.claim(`-${HELP_SHORT}`, HELP_LONG, 'policy.help');
    flags.claim(`--${HELP_LONG}`, HELP_LONG, 'policy.help');
  }

  const optionNames = new Set<string>();
  const options = (definition.options ?? []).map((option, index) =>
    defineOption(option, index, optionNames, flags),
  );

  const slotNames = new Set<string>();
  let sawOptional = false;
  const positionals = (definition.positionals ?? []).map((slot, index) => {
    const spec = definePositional(slot, index, slotNames, sawOptional);
    sawOptional = sawOptional || !spec.required;
    return spec;
  });

  let variadic: VariadicSpec | undefined;
  if (definition.variadic) {
    const name = requireName(definition.variadic.name, 'variadic.name');
    if (slotNames.has(name)) {
      throw new SchemaError(`duplicate positional slot "${name}"`, 'variadic.name');
    }
    variadic = Object.freeze({
      name,
      ...(definition.variadic.defaultValue !== undefined ? { defaultValue: definition.variadic.defaultValue } : {}),
      ...(definition.variadic.help !== undefined ? { help: definition.variadic.help } : {}),
    });
  }

  return Object.freeze({
    options: Object.freeze(options),
    positionals: Object.freeze(positionals),
    ...(variadic ? { variadic } : {}),
    policy,
  });
}

export function findOption(schema: Schema, name: string): OptionSpec | undefined {
  return schema.options.find((option) => option.name === name);
}
