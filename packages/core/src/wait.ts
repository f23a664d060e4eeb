import { waitLogger } from './logger.js';
import {
  resolveWaitOptions,
  type ResolvedWaitOptions,
  type WaitOptions,
} from './options.js';
import type { OutputSink } from './output.js';
import { delay } from './pacing.js';
import { withProgress } from './progress.js';
import { createResult, type TaskWaitResult } from './result.js';
import { showNewLog } from './tail.js';
import { overlappingStatuses, type Task, toStatusSet } from './task.js';

/**
 * The state of a single wait. Owned by one `taskwait()` call and discarded
 * once the result is produced.
 */
class RunningTask {
  private readonly statusWaiting: ReadonlySet<string>;
  private readonly statusRunning: ReadonlySet<string>;
  private readonly showLog: boolean;
  private readonly progress: boolean;
  private readonly poll: number;
  private readonly timeout?: number;
  private readonly output: OutputSink;
  private readonly timeEnd: number;
  /** Number of log lines already written */
  private skip = 0;
  private lastPoll?: number;

  private constructor(
    private readonly task: Task,
    private readonly start: Date,
    private status: string,
    options: ResolvedWaitOptions,
    timeEnd: number
  ) {
    this.statusWaiting = toStatusSet(task.statusWaiting);
    this.statusRunning = toStatusSet(task.statusRunning);
    this.showLog = options.showLog && task.hasLog();
    this.progress = options.showProgress && !this.showLog;
    this.poll = options.poll;
    this.timeout = options.timeout;
    this.output = options.output;
    this.timeEnd = timeEnd;

    const overlap = overlappingStatuses(
      this.statusWaiting,
      this.statusRunning
    );
    if (overlap.length > 0) {
      waitLogger.warn('Status sets overlap', { statuses: overlap });
    }
  }

  /**
   * Starts a wait: fixes the deadline and queries the initial status.
   */
  static async begin(
    task: Task,
    options: ResolvedWaitOptions
  ): Promise<RunningTask> {
    const start = new Date();
    const timeEnd =
      options.timeout === undefined
        ? Number.POSITIVE_INFINITY
        : start.getTime() + options.timeout;
    const status = await task.status();
    return new RunningTask(task, start, status, options, timeEnd);
  }

  async wait(): Promise<TaskWaitResult> {
    await this.waitToStart();
    await this.waitToFinish();
    waitLogger.debug('Task reached terminal status', { status: this.status });
    return createResult(this.status, this.start, new Date());
  }

  private async waitToStart(): Promise<void> {
    if (!this.statusWaiting.has(this.status)) return;
    waitLogger.debug('Task entered waiting phase', { status: this.status });
    await withProgress(
      'Waiting',
      { display: this.progress, output: this.output },
      async (tick) => {
        while (this.statusWaiting.has(this.status)) {
          tick();
          this.status = await this.taskStatus();
        }
      }
    );
  }

  private async waitToFinish(): Promise<void> {
    if (this.statusRunning.has(this.status)) {
      waitLogger.debug('Task entered running phase', { status: this.status });
      await withProgress(
        'Running',
        { display: this.progress, output: this.output },
        async (tick) => {
          while (this.statusRunning.has(this.status)) {
            tick();
            await this.showNewLog();
            this.status = await this.taskStatus();
          }
        }
      );
    }
    await this.showNewLog();
  }

  private async taskStatus(): Promise<string> {
    this.lastPoll = await delay(
      this.lastPoll,
      this.poll,
      this.timeEnd,
      this.timeout
    );
    return this.task.status();
  }

  private async showNewLog(): Promise<void> {
    if (!this.showLog) return;
    this.skip = showNewLog(this.skip, await this.task.log(), this.output);
  }
}

/**
 * Waits for a task to leave its waiting and running statuses.
 *
 * While the task runs, new log lines are written to the output as they
 * appear (when `showLog` is on and the task has logs); otherwise a dotted
 * progress indicator is shown.
 *
 * @param task - The task to wait on.
 * @param options - Display, poll and timeout settings.
 * @returns The final status along with when the wait started and ended.
 * @throws TaskTimeoutError if `timeout` elapses first.
 * @throws TaskWaitOptionsError if the options are invalid.
 *
 * @example
 * ```ts
 * const result = await taskwait(task, { poll: 500, timeout: 60_000 });
 * console.log(result.status);
 * ```
 */
export async function taskwait(
  task: Task,
  options?: WaitOptions
): Promise<TaskWaitResult> {
  const resolved = resolveWaitOptions(options);
  const running = await RunningTask.begin(task, resolved);
  return running.wait();
}

export { taskwait as wait };
