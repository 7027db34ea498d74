export type OptionValueType = 'boolean' | 'string' | 'integer';
export type PositionalValueType = 'string' | 'integer';

export type OptionValue = string | number | boolean;
export type PositionalValue = string | number;

export interface OptionSpec {
  readonly name: string;
  readonly short?: string;
  readonly long?: string;
  readonly aliases: readonly string[];
  readonly takesValue: boolean;
  readonly valueType: OptionValueType;
  readonly defaultValue?: OptionValue;
  readonly required: boolean;
  readonly help?: string;
  /** Placeholder shown in usage text, e.g. `<num>`. */
  readonly valueName?: string;
}

export interface PositionalSpec {
  readonly name: string;
  readonly valueType: PositionalValueType;
  readonly required: boolean;
  readonly defaultValue?: PositionalValue;
  readonly help?: string;
}

export interface VariadicSpec {
  readonly name: string;
  /** Bound as the only entry when no token is left for the slot. */
  readonly defaultValue?: string;
  readonly help?: string;
}

export type UnknownOptionPolicy = 'reject' | 'positional';
export type ExtraPositionalPolicy = 'reject' | 'ignore';

export interface ParserPolicy {
  readonly unknownOptions: UnknownOptionPolicy;
  readonly extraPositionals: ExtraPositionalPolicy;
  /** GNU-style interleaving of options and positionals. */
  readonly permute: boolean;
  /** Intercept `-h` / `--help`. */
  readonly help: boolean;
}

export interface Schema {
  readonly options: readonly OptionSpec[];
  readonly positionals: readonly PositionalSpec[];
  readonly variadic?: VariadicSpec;
  readonly policy: ParserPolicy;
}

// Loosely-typed input accepted by defineSchema.

export interface OptionDefinition {
  name: string;
  short?: string;
  long?: string;
  aliases?: string[];
  takesValue?: boolean;
  valueType?: Exclude<OptionValueType, 'boolean'>;
  defaultValue?: OptionValue;
  required?: boolean;
  help?: string;
  valueName?: string;
}

export interface PositionalDefinition {
  name: string;
  valueType?: PositionalValueType;
  required?: boolean;
  defaultValue?: PositionalValue;
  help?: string;
}

export interface VariadicDefinition {
  name: string;
  defaultValue?: string;
  help?: string;
}

export interface SchemaDefinition {
  options?: OptionDefinition[];
  positionals?: PositionalDefinition[];
  variadic?: VariadicDefinition;
  policy?: Partial<ParserPolicy>;
}

export const DEFAULT_POLICY: ParserPolicy = {
  unknownOptions: 'reject',
  extraPositionals: 'reject',
  permute: true,
  help: true,
};

export const HELP_SHORT = 'h';
export const HELP_LONG = 'help';
