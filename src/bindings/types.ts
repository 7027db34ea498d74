import type { OptionValue, PositionalValue } from '../schema/types.js';

export type BindingSource = 'argv' | 'default' | 'unset';
export type VariadicSource = Exclude<BindingSource, 'unset'>;

/**
 * A resolved value and where it came from. `unset` carries no value, so an
 * omitted option without a default never collapses into a zero or empty value.
 */
export type Binding<V> =
  | { readonly source: 'argv'; readonly value: V }
  | { readonly source: 'default'; readonly value: V }
  | { readonly source: 'unset' };

export interface Bindings {
  readonly options: Readonly<Record<string, Binding<OptionValue>>>;
  readonly positionals: Readonly<Record<string, Binding<PositionalValue>>>;
  readonly variadic: readonly string[];
  /** `default` when the capture holds the declared default instead of tokens. */
  readonly variadicSource: VariadicSource;
}

export const UNSET_BINDING: Binding<never> = Object.freeze({ source: 'unset' });

export function fromArgv<V>(value: V): Binding<V> {
  const binding: Binding<V> = { source: 'argv', value };
  return Object.freeze(binding);
}

export function fromDefault<V>(value: V | undefined): Binding<V> {
  if (value === undefined) {
    return UNSET_BINDING;
  }
  const binding: Binding<V> = { source: 'default', value };
  return Object.freeze(binding);
}

export function bindingValue<V>(binding: Binding<V> | undefined): V | undefined {
  if (!binding || binding.source === 'unset') {
    return undefined;
  }
  return binding.value;
}
