import { ArgRegistry } from '../core/args/registry';

export const PROGRAM_NAME = 'tike';
export const PROGRAM_DESCRIPTION = 'TimeKeeper';

/**
 * Build the registry for tike's option set.
 * `--help` / `-h` is added by the registry itself.
 */
export function createTikeArgs(): ArgRegistry {
  return new ArgRegistry(PROGRAM_NAME, PROGRAM_DESCRIPTION)
    .register({ name: 'add', shortAlias: 'a', kind: 'flag', description: 'Add a new task' })
    .register({
      name: 'complete',
      shortAlias: 'c',
      kind: 'valued',
      description: 'Mark a task as completed by id',
    })
    .register({
      name: 'description',
      shortAlias: 'd',
      kind: 'valued',
      description: 'Description of the task',
    })
    .register({ name: 'list', shortAlias: 'l', kind: 'valued', description: 'List a task by id' })
    .register({ name: 'list-all', shortAlias: 'L', kind: 'flag', description: 'List all tasks' })
    .register({ name: 'list-all-completed', kind: 'flag', description: 'List all completed tasks' })
    .register({
      name: 'list-completed',
      kind: 'valued',
      description: 'List a completed task by id',
    })
    .register({ name: 'remove', shortAlias: 'r', kind: 'valued', description: 'Remove a task by id' })
    .register({ name: 'title', shortAlias: 't', kind: 'valued', description: 'Title of the task' })
    .register({
      name: 'version',
      shortAlias: 'v',
      kind: 'flag',
      description: 'Prints the version number',
    });
}
