export { defineSchema, findOption } from './schema/defineSchema.js';
export { loadSchemaFile, toSchemaDefinition } from './schema/loadSchema.js';
export { SchemaError, type SchemaErrorCode } from './schema/errors.js';
export { parseIntegerText } from './schema/values.js';
export type {
  ExtraPositionalPolicy,
  OptionDefinition,
  OptionSpec,
  OptionValue,
  OptionValueType,
  ParserPolicy,
  PositionalDefinition,
  PositionalSpec,
  PositionalValue,
  PositionalValueType,
  Schema,
  SchemaDefinition,
  UnknownOptionPolicy,
  VariadicDefinition,
  VariadicSpec,
} from './schema/types.js';
export { DEFAULT_POLICY } from './schema/types.js';

export { parseArgs, HELP_REQUESTED, type ParseOutcome } from './parser/parseArgs.js';
export { ParseError, isParseError, type ParseErrorKind, type ParseErrorDetails } from './parser/errors.js';

export { bindingValue, type Binding, type BindingSource, type Bindings, type VariadicSource } from './bindings/types.js';
export { bindingValues, formatArgv, type BindingValues } from './bindings/format.js';

export { renderUsage, positionalSynopsis } from './usage/renderUsage.js';
export { ValidationError } from './shared/types.js';
