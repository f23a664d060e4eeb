/**
 * A set of statuses, given either as a `Set` or as a plain array.
 */
export type StatusSet = ReadonlySet<string> | readonly string[];

/**
 * The log lines a task has produced so far, or nothing if it has none yet.
 */
export type TaskLog = readonly string[] | null | undefined;

/**
 * Something that can be waited on with `taskwait()`.
 *
 * Implement this for whatever backs the task (an HTTP API, a subprocess, a
 * file on disk...). The wait engine only ever calls these members one at a
 * time and never caches `status()`.
 */
export interface Task {
  /** Statuses that mean the task has not started yet */
  readonly statusWaiting: StatusSet;
  /** Statuses that mean the task is executing */
  readonly statusRunning: StatusSet;

  /** Query for the current status of the task. */
  status(): string | Promise<string>;

  /**
   * Fetch all log lines produced so far. Each call must return the lines of
   * the previous call as a prefix.
   */
  log(): TaskLog | Promise<TaskLog>;

  /** Whether this task may produce logs, now or in future. */
  hasLog(): boolean;
}

export function toStatusSet(statuses: StatusSet): ReadonlySet<string> {
  return new Set(statuses);
}

/**
 * Returns the statuses present in both sets, in the order they appear in
 * `waiting`.
 */
export function overlappingStatuses(
  waiting: ReadonlySet<string>,
  running: ReadonlySet<string>
): string[] {
  return [...waiting].filter((status) => running.has(status));
}
