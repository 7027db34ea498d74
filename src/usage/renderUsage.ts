import { HELP_LONG, HELP_SHORT, type OptionSpec, type Schema } from '../schema/types.js';
import { formatValue } from '../schema/values.js';

interface UsageEntry {
  usage: string;
  description: string;
}

function describe(help: string | undefined, notes: string[]): string {
  const text = help ?? '';
  if (notes.length === 0) {
    return text;
  }
  return `${text} (${notes.join('; ')})`.trim();
}

function valuePlaceholder(spec: OptionSpec): string {
  if (spec.valueName !== undefined) {
    return spec.valueName;
  }
  return spec.valueType === 'integer' ? 'num' : 'value';
}

function optionEntry(spec: OptionSpec): UsageEntry {
  const primary = spec.long ?? spec.aliases[0];
  const shortPart = spec.short !== undefined ? `-${spec.short}` : undefined;
  const longPart = primary !== undefined ? `--${primary}` : undefined;

  let usage: string;
  if (shortPart !== undefined && longPart !== undefined) {
    usage = `${shortPart}, ${longPart}`;
  } else if (longPart !== undefined) {
    usage = `    ${longPart}`;
  } else {
    usage = shortPart ?? '';
  }
  if (spec.takesValue) {
    usage += ` <${valuePlaceholder(spec)}>`;
  }

  const notes: string[] = [];
  const extraAliases = spec.long !== undefined ? spec.aliases : spec.aliases.slice(1);
  if (extraAliases.length > 0) {
    notes.push(`aliases: ${extraAliases.map((alias) => `--${alias}`).join(', ')}`);
  }
  if (spec.required) {
    notes.push('required');
  }
  if (spec.defaultValue !== undefined) {
    notes.push(`default: ${formatValue(spec.defaultValue)}`);
  }
  return { usage, description: describe(spec.help, notes) };
}

/** Positional synopsis, e.g. `<out_file> [<in_file> [<words>...]]`. */
export function positionalSynopsis(schema: Schema): string {
  const required = schema.positionals.filter((slot) => slot.required).map((slot) => `<${slot.name}>`);
  let tail = schema.variadic ? `[<${schema.variadic.name}>...]` : '';
  const optional = schema.positionals.filter((slot) => !slot.required);
  for (let index = optional.length - 1; index >= 0; index -= 1) {
    tail = `[<${optional[index].name}>${tail ? ` ${tail}` : ''}]`;
  }
  return [...required, ...(tail ? [tail] : [])].join(' ');
}

function formatEntries(entries: UsageEntry[]): string[] {
  const maxUsageLength = Math.max(0, ...entries.map((entry) => entry.usage.length));
  return entries.map((entry) => `  ${entry.usage.padEnd(maxUsageLength)}  ${entry.description}`.trimEnd());
}

/**
 * Renders help text for a schema. The parser only reports that help was
 * requested; callers print this when it does.
 */
export function renderUsage(schema: Schema, program: string): string {
  const hasOptions = schema.options.length > 0 || schema.policy.help;
  const synopsis = [program, ...(hasOptions ? ['[options]'] : []), positionalSynopsis(schema)]
    .filter((part) => part.length > 0)
    .join(' ');
  const lines: string[] = ['Usage:', `  ${synopsis}`];

  const argumentEntries: UsageEntry[] = schema.positionals.map((slot) => ({
    usage: slot.name,
    description: describe(
      slot.help,
      slot.defaultValue !== undefined ? [`default: ${formatValue(slot.defaultValue)}`] : [],
    ),
  }));
  if (schema.variadic) {
    const { variadic } = schema;
    argumentEntries.push({
      usage: `${variadic.name}...`,
      description: describe(
        variadic.help,
        variadic.defaultValue !== undefined ? [`default: ${variadic.defaultValue}`] : [],
      ),
    });
  }
  if (argumentEntries.length > 0) {
    lines.push('', 'Arguments:', ...formatEntries(argumentEntries));
  }

  const optionEntries: UsageEntry[] = [];
  if (schema.policy.help) {
    optionEntries.push({ usage: `-${HELP_SHORT}, --${HELP_LONG}`, description: 'Show this usage and exit.' });
  }
  optionEntries.push(...schema.options.map(optionEntry));
  if (optionEntries.length > 0) {
    lines.push('', 'Options:', ...formatEntries(optionEntries));
  }

  return lines.join('\n');
}
