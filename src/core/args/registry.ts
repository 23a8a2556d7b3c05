import { argNotFound } from './errors';
import type { ArgDefinition, ArgError, Result } from '../../types';

const HELP_ARG: ArgDefinition = {
  name: 'help',
  shortAlias: 'h',
  kind: 'flag',
  description: 'Show this help page',
};

/**
 * Ordered collection of option definitions for one program.
 *
 * Definitions are copied and frozen on registration, so parsing never
 * touches them. Duplicate names or aliases are not rejected; lookups
 * return the first one registered.
 */
export class ArgRegistry {
  readonly program: string;
  readonly description: string;
  private readonly args: Readonly<ArgDefinition>[] = [];

  /**
   * @param suppressDefaultHelp - skip registering the built-in `--help`/`-h` flag
   */
  constructor(program: string, description: string, suppressDefaultHelp = false) {
    this.program = program;
    this.description = description;
    if (!suppressDefaultHelp) {
      this.register(HELP_ARG);
    }
  }

  register(definition: ArgDefinition): this {
    this.args.push(Object.freeze({ ...definition, required: definition.required ?? false }));
    return this;
  }

  /** Definitions in registration order. */
  get definitions(): readonly Readonly<ArgDefinition>[] {
    return this.args;
  }

  find(name: string): Result<Readonly<ArgDefinition>, ArgError> {
    const definition = this.findByLongName(name);
    if (!definition) {
      return { ok: false, error: argNotFound(name) };
    }
    return { ok: true, value: definition };
  }

  findByLongName(name: string): Readonly<ArgDefinition> | undefined {
    return this.args.find((arg) => arg.name === name);
  }

  findByShortAlias(alias: string): Readonly<ArgDefinition> | undefined {
    return this.args.find((arg) => arg.shortAlias === alias);
  }
}
