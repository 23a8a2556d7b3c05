import pkg from '../../package.json';
import { renderHelp } from '../core/args/help';
import type { ArgRegistry } from '../core/args/registry';

export const version: string = pkg.version;

/** Release codename shown next to the version number. */
export const VERSION_NAME = 'Ymir';

/**
 * Print the help page for the given option set.
 */
export function printHelp(registry: ArgRegistry): void {
  console.log(renderHelp(registry));
}

/**
 * Print version line.
 */
export function printVersion(): void {
  console.log(`TimeKeeper version ${VERSION_NAME} (${version})`);
}
