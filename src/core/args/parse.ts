/**
 * Parsing of a raw argument vector against an {@link ArgRegistry}.
 */

import {
  argNotFound,
  malformedDashToken,
  missingRequiredArgument,
  missingValue,
  unexpectedPositional,
  unknownArgument,
} from './errors';
import type { ArgRegistry } from './registry';
import type { ArgDefinition, ArgError, ParsedArg, Result } from '../../types';

/** Value stored for a flag that was supplied. */
export const FLAG_SET = 'true';

/**
 * Values produced by one parse, keyed by canonical name.
 * The registry's definitions are left untouched.
 */
export class ParsedArgs {
  private readonly registry: ArgRegistry;
  private readonly values: ReadonlyMap<string, string>;

  constructor(registry: ArgRegistry, values: ReadonlyMap<string, string>) {
    this.registry = registry;
    this.values = values;
  }

  /**
   * Whether the user supplied this option.
   * Unknown names are false rather than an error.
   */
  hasValue(name: string): boolean {
    return this.registry.findByLongName(name) !== undefined && this.values.has(name);
  }

  getArgByName(name: string): Result<ParsedArg, ArgError> {
    const definition = this.registry.findByLongName(name);
    if (!definition) {
      return { ok: false, error: argNotFound(name) };
    }
    const value = this.values.get(name);
    return { ok: true, value: value === undefined ? definition : { ...definition, value } };
  }

  getValue(name: string): string | undefined {
    return this.hasValue(name) ? this.values.get(name) : undefined;
  }

  /** Number of options that received a value. */
  get size(): number {
    return this.values.size;
  }
}

/**
 * Parse `tokens` against `registry`. `tokens[0]` is the program name and is skipped.
 *
 * Positional arguments are never accepted and a bare `--` is not an
 * end-of-options marker. Short forms match the whole text after the dash,
 * so `-ab` is one alias, not `-a -b`. The first error ends the parse.
 */
export function parseArgs(
  registry: ArgRegistry,
  tokens: readonly string[],
): Result<ParsedArgs, ArgError> {
  const values = new Map<string, string>();

  for (let index = 1; index < tokens.length; index++) {
    const token = tokens[index] ?? '';

    if (!token.startsWith('-')) {
      return { ok: false, error: unexpectedPositional(token) };
    }
    if (token === '--') {
      return { ok: false, error: malformedDashToken(token) };
    }
    if (token === '-') {
      return { ok: false, error: unknownArgument(token) };
    }

    const definition: Readonly<ArgDefinition> | undefined = token.startsWith('--')
      ? registry.findByLongName(token.slice(2))
      : registry.findByShortAlias(token.slice(1));

    if (!definition) {
      return { ok: false, error: unknownArgument(token) };
    }

    if (definition.kind === 'flag') {
      values.set(definition.name, FLAG_SET);
      continue;
    }

    const value = tokens[index + 1];
    if (value === undefined) {
      return { ok: false, error: missingValue(token) };
    }
    values.set(definition.name, value);
    index++;
  }

  for (const definition of registry.definitions) {
    if (definition.required && !values.has(definition.name)) {
      return { ok: false, error: missingRequiredArgument(definition.name) };
    }
  }

  return { ok: true, value: new ParsedArgs(registry, values) };
}
