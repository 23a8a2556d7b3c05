import type { ArgRegistry } from './registry';
import type { ArgDefinition } from '../../types';

const INDENT = '    ';
/** Space between the option column and the description. */
const DESCRIPTION_GAP = 6;
/** Width of `-x, `; the alias cell is never narrower. */
const MIN_ALIAS_WIDTH = 4;

function compareNames(a: Readonly<ArgDefinition>, b: Readonly<ArgDefinition>): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

function formatAlias(arg: Readonly<ArgDefinition>): string {
  return arg.shortAlias === undefined ? '' : `-${arg.shortAlias}, `;
}

/**
 * Render the help page for a registry.
 *
 * Rows are sorted by name. Long names line up whether or not a row has a
 * short alias, and descriptions start {@link DESCRIPTION_GAP} columns after
 * the widest option.
 */
export function renderHelp(registry: ArgRegistry): string {
  const lines: string[] = [];

  lines.push(`Usage: ${registry.program} [OPTIONS]`);
  lines.push('');

  if (registry.description) {
    lines.push(registry.description);
    lines.push('');
  }

  lines.push('Options:');

  const sorted = [...registry.definitions].sort(compareNames);
  const aliasWidth = Math.max(MIN_ALIAS_WIDTH, ...sorted.map((arg) => formatAlias(arg).length));
  const options = sorted.map((arg) => `${formatAlias(arg).padEnd(aliasWidth)}--${arg.name}`);
  const optionWidth = Math.max(0, ...options.map((opt) => opt.length));

  sorted.forEach((arg, i) => {
    const option = options[i] ?? '';
    lines.push(`${INDENT}${option.padEnd(optionWidth + DESCRIPTION_GAP)}${arg.description}`);
  });

  return lines.join('\n');
}
