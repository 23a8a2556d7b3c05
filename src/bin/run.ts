/**
 * Top-level dispatch: parse the argument vector, run the requested task
 * commands in a fixed order, and map every outcome to an exit code.
 */

import {
  missingTitle,
  parseTaskNumber,
  reportError,
  reportUnexpected,
  taskNotFound,
} from './errors';
import { formatCompletedTasks, formatTasks, numberTasks } from './format';
import { printHelp, printVersion } from './help';
import { createTikeArgs } from './options';
import { type ParsedArgs, parseArgs } from '../core/args/parse';
import { loadConfig } from '../core/config';
import { TaskStore } from '../core/store/tasks';
import type { Result, TaskError, TikeConfig } from '../types';

/** `stop` ends the run successfully; `continue` lets later commands run. */
type Flow = 'stop' | 'continue';
type CommandResult = Result<Flow, TaskError>;

interface CommandContext {
  args: ParsedArgs;
  store: TaskStore;
}

interface TaskCommand {
  /** Option that triggers the command */
  option: string;
  run: (ctx: CommandContext) => CommandResult;
}

export interface RunOptions {
  config?: TikeConfig;
  /** Open the task store; defaults to the SQLite file at config.dbPath */
  openStore?: (config: TikeConfig) => TaskStore;
}

const CONTINUE: CommandResult = { ok: true, value: 'continue' };
const STOP: CommandResult = { ok: true, value: 'stop' };

function taskNumberOption(ctx: CommandContext, option: string): Result<number, TaskError> {
  return parseTaskNumber(option, ctx.args.getValue(option) ?? '');
}

function addTask(ctx: CommandContext): CommandResult {
  const title = ctx.args.getValue('title');
  if (title === undefined) {
    return { ok: false, error: missingTitle() };
  }
  ctx.store.add({ title, description: ctx.args.getValue('description') });
  console.log('Task added successfully');
  return STOP;
}

function listTask(ctx: CommandContext): CommandResult {
  const taskNumber = taskNumberOption(ctx, 'list');
  if (!taskNumber.ok) return taskNumber;

  const task = ctx.store.get(taskNumber.value);
  if (!task) {
    return { ok: false, error: taskNotFound(taskNumber.value) };
  }
  console.log(formatTasks('Task:', [{ number: taskNumber.value, task }]));
  return STOP;
}

function listAllTasks(ctx: CommandContext): CommandResult {
  const tasks = ctx.store.list();
  if (tasks.length === 0) {
    console.log('No tasks found');
  } else {
    console.log(formatTasks('Tasks:', numberTasks(tasks)));
  }
  return CONTINUE;
}

function removeTask(ctx: CommandContext): CommandResult {
  const taskNumber = taskNumberOption(ctx, 'remove');
  if (!taskNumber.ok) return taskNumber;

  const task = ctx.store.remove(taskNumber.value);
  if (!task) {
    return { ok: false, error: taskNotFound(taskNumber.value) };
  }
  console.log(`Task ${taskNumber.value} removed successfully`);
  return CONTINUE;
}

function completeTask(ctx: CommandContext): CommandResult {
  const taskNumber = taskNumberOption(ctx, 'complete');
  if (!taskNumber.ok) return taskNumber;

  const task = ctx.store.complete(taskNumber.value);
  if (!task) {
    return { ok: false, error: taskNotFound(taskNumber.value) };
  }
  console.log(`Task ${taskNumber.value} completed successfully`);
  return CONTINUE;
}

function listCompletedTask(ctx: CommandContext): CommandResult {
  const taskNumber = taskNumberOption(ctx, 'list-completed');
  if (!taskNumber.ok) return taskNumber;

  const task = ctx.store.getCompleted(taskNumber.value);
  if (!task) {
    return { ok: false, error: taskNotFound(taskNumber.value) };
  }
  console.log(formatCompletedTasks('Completed task:', [{ number: taskNumber.value, task }]));
  return STOP;
}

function listAllCompletedTasks(ctx: CommandContext): CommandResult {
  const tasks = ctx.store.listCompleted();
  if (tasks.length === 0) {
    console.log('No completed tasks found');
  } else {
    console.log(formatCompletedTasks('Completed tasks:', numberTasks(tasks)));
  }
  return CONTINUE;
}

/**
 * Commands in the order they run. Several may be combined in one
 * invocation; a `stop` result ends the run.
 */
const TASK_COMMANDS: readonly TaskCommand[] = [
  { option: 'add', run: addTask },
  { option: 'list', run: listTask },
  { option: 'list-all', run: listAllTasks },
  { option: 'remove', run: removeTask },
  { option: 'complete', run: completeTask },
  { option: 'list-completed', run: listCompletedTask },
  { option: 'list-all-completed', run: listAllCompletedTasks },
];

function runTaskCommands(args: ParsedArgs, options: RunOptions): number {
  const config = options.config ?? loadConfig();
  const openStore = options.openStore ?? ((cfg: TikeConfig) => TaskStore.open(cfg.dbPath));
  const store = openStore(config);

  try {
    const ctx: CommandContext = { args, store };
    for (const command of TASK_COMMANDS) {
      if (!args.hasValue(command.option)) {
        continue;
      }
      const result = command.run(ctx);
      if (!result.ok) {
        reportError(result.error.message);
        return 1;
      }
      if (result.value === 'stop') {
        return 0;
      }
    }
    return 0;
  } finally {
    store.close();
  }
}

/**
 * Run tike against `argv` (program name first) and return the exit code.
 * Nothing thrown escapes: unexpected failures are printed and map to 1.
 */
export function runTike(argv: readonly string[], options: RunOptions = {}): number {
  try {
    const registry = createTikeArgs();
    const parsed = parseArgs(registry, argv);
    if (!parsed.ok) {
      reportError(parsed.error.message);
      return 1;
    }

    const args = parsed.value;
    if (args.size === 0 || args.hasValue('help')) {
      printHelp(registry);
      return 0;
    }
    if (args.hasValue('version')) {
      printVersion();
      return 0;
    }

    return runTaskCommands(args, options);
  } catch (error: unknown) {
    reportUnexpected(error);
    return 1;
  }
}
