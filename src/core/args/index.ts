export { renderHelp } from './help';
export { FLAG_SET, ParsedArgs, parseArgs } from './parse';
export { ArgRegistry } from './registry';
