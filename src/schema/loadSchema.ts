import fs from 'node:fs/promises';
import { defineSchema } from './defineSchema.js';
import { SchemaError } from './errors.js';
import type {
  OptionDefinition,
  ParserPolicy,
  PositionalDefinition,
  PositionalValueType,
  Schema,
  SchemaDefinition,
  VariadicDefinition,
} from './types.js';

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readRecord(value: unknown, path: string): JsonRecord {
  if (!isRecord(value)) {
    throw new SchemaError('expected an object', path);
  }
  return value;
}

function readString(record: JsonRecord, key: string, path: string): string | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new SchemaError('expected a string', `${path}.${key}`);
  }
  return value;
}

function readRequiredString(record: JsonRecord, key: string, path: string): string {
  const value = readString(record, key, path);
  if (value === undefined) {
    throw new SchemaError('is required', `${path}.${key}`);
  }
  return value;
}

function readBoolean(record: JsonRecord, key: string, path: string): boolean | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new SchemaError('expected true or false', `${path}.${key}`);
  }
  return value;
}

function readDefault(record: JsonRecord, path: string): string | number | undefined {
  const value = record.defaultValue;
  if (value === undefined || typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  throw new SchemaError('expected a string or a number', `${path}.defaultValue`);
}

function readValueType(record: JsonRecord, path: string): PositionalValueType | undefined {
  const value = record.valueType;
  if (value === undefined || value === 'string' || value === 'integer') {
    return value;
  }
  throw new SchemaError('expected "string" or "integer"', `${path}.valueType`);
}

function readArray(record: JsonRecord, key: string, path: string): unknown[] {
  const value = record[key];
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new SchemaError('expected an array', `${path}${path ? '.' : ''}${key}`);
  }
  return value;
}

function toOptionDefinition(raw: unknown, path: string): OptionDefinition {
  const record = readRecord(raw, path);
  const aliases = readArray(record, 'aliases', path).map((alias, index) => {
    if (typeof alias !== 'string') {
      throw new SchemaError('expected a string', `${path}.aliases[${index}]`);
    }
    return alias;
  });
  const short = readString(record, 'short', path);
  const long = readString(record, 'long', path);
  const takesValue = readBoolean(record, 'takesValue', path);
  const valueType = readValueType(record, path);
  const defaultValue = readDefault(record, path);
  const required = readBoolean(record, 'required', path);
  const help = readString(record, 'help', path);
  const valueName = readString(record, 'valueName', path);

  return {
    name: readRequiredString(record, 'name', path),
    ...(short !== undefined ? { short } : {}),
    ...(long !== undefined ? { long } : {}),
    ...(aliases.length > 0 ? { aliases } : {}),
    ...(takesValue !== undefined ? { takesValue } : {}),
    ...(valueType !== undefined ? { valueType } : {}),
    ...(defaultValue !== undefined ? { defaultValue } : {}),
    ...(required !== undefined ? { required } : {}),
    ...(help !== undefined ? { help } : {}),
    ...(valueName !== undefined ? { valueName } : {}),
  };
}

function toPositionalDefinition(raw: unknown, path: string): PositionalDefinition {
  const record = readRecord(raw, path);
  const valueType = readValueType(record, path);
  const required = readBoolean(record, 'required', path);
  const defaultValue = readDefault(record, path);
  const help = readString(record, 'help', path);

  return {
    name: readRequiredString(record, 'name', path),
    ...(valueType !== undefined ? { valueType } : {}),
    ...(required !== undefined ? { required } : {}),
    ...(defaultValue !== undefined ? { defaultValue } : {}),
    ...(help !== undefined ? { help } : {}),
  };
}

function toVariadicDefinition(raw: unknown): VariadicDefinition {
  const record = readRecord(raw, 'variadic');
  const defaultValue = readString(record, 'defaultValue', 'variadic');
  const help = readString(record, 'help', 'variadic');
  return {
    name: readRequiredString(record, 'name', 'variadic'),
    ...(defaultValue !== undefined ? { defaultValue } : {}),
    ...(help !== undefined ? { help } : {}),
  };
}

function toPolicy(raw: unknown): Partial<ParserPolicy> {
  const record = readRecord(raw, 'policy');
  const policy: { -readonly [K in keyof ParserPolicy]?: ParserPolicy[K] } = {};

  const unknownOptions = record.unknownOptions;
  if (unknownOptions === 'reject' || unknownOptions === 'positional') {
    policy.unknownOptions = unknownOptions;
  } else if (unknownOptions !== undefined) {
    throw new SchemaError('expected "reject" or "positional"', 'policy.unknownOptions');
  }

  const extraPositionals = record.extraPositionals;
  if (extraPositionals === 'reject' || extraPositionals === 'ignore') {
    policy.extraPositionals = extraPositionals;
  } else if (extraPositionals !== undefined) {
    throw new SchemaError('expected "reject" or "ignore"', 'policy.extraPositionals');
  }

  const permute = readBoolean(record, 'permute', 'policy');
  if (permute !== undefined) {
    policy.permute = permute;
  }
  const help = readBoolean(record, 'help', 'policy');
  if (help !== undefined) {
    policy.help = help;
  }
  return policy;
}

/** Normalizes a parsed JSON schema document into a SchemaDefinition. */
export function toSchemaDefinition(raw: unknown): SchemaDefinition {
  const record = readRecord(raw, '$');
  return {
    options: readArray(record, 'options', '').map((entry, index) => toOptionDefinition(entry, `options[${index}]`)),
    positionals: readArray(record, 'positionals', '').map((entry, index) =>
      toPositionalDefinition(entry, `positionals[${index}]`),
    ),
    ...(record.variadic !== undefined ? { variadic: toVariadicDefinition(record.variadic) } : {}),
    ...(record.policy !== undefined ? { policy: toPolicy(record.policy) } : {}),
  };
}

export async function loadSchemaFile(
  filePath: string,
  overrides: Partial<ParserPolicy> = {},
): Promise<Schema> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SchemaError(`cannot read schema file ${filePath}: ${message}`, undefined, 'SCHEMA_FILE_UNREADABLE');
  }

  const definition = toSchemaDefinition(raw);
  return defineSchema({
    ...definition,
    policy: { ...definition.policy, ...overrides },
  });
}
