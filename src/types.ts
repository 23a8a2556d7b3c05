/**
 * Shared types for tike.
 */

/** Either a value or a tagged error; nothing is thrown across this boundary. */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/** `flag` options take no value; `valued` options consume the next token. */
export type ArgKind = 'flag' | 'valued';

/** A declared command-line option. */
export interface ArgDefinition {
  /** Canonical name, matched against `--name` */
  name: string;
  /** Matched against the whole remainder of a `-x` token */
  shortAlias?: string;
  kind: ArgKind;
  /** Shown in help output */
  description: string;
  /** Parsing fails unless the option was supplied */
  required?: boolean;
}

/** A definition paired with the value it received, if any. */
export interface ParsedArg extends Readonly<ArgDefinition> {
  value?: string;
}

export type ArgErrorKind =
  | 'UnknownArgument'
  | 'MissingValue'
  | 'MissingRequiredArgument'
  | 'UnexpectedPositional'
  | 'MalformedDashToken'
  | 'NotFound';

export interface ArgError {
  kind: ArgErrorKind;
  /** Raw token or canonical name the error refers to */
  subject: string;
  message: string;
}

export type TaskErrorKind = 'MissingTitle' | 'InvalidTaskNumber' | 'TaskNotFound';

export interface TaskError {
  kind: TaskErrorKind;
  message: string;
}

/** A pending task as stored in the `tasks` table. */
export interface Task {
  id: number;
  title: string;
  description: string;
  /** SQLite CURRENT_TIMESTAMP text, UTC */
  timeCreated: string;
}

/** A task moved to the `completedTasks` table. */
export interface CompletedTask extends Task {
  timeCompleted: string;
}

export interface NewTask {
  title: string;
  description?: string;
}

/** Runtime settings. */
export interface TikeConfig {
  dbPath: string;
}
