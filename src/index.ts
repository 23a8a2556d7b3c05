export { FLAG_SET, ParsedArgs, parseArgs, renderHelp, ArgRegistry } from './core/args/index';
export { Database } from './core/store/database';
export type { Column, Field, RecordData } from './core/store/database';
export { TaskStore } from './core/store/tasks';
export type {
  ArgDefinition,
  ArgError,
  ArgErrorKind,
  ArgKind,
  CompletedTask,
  ParsedArg,
  Result,
  Task,
} from './types';
