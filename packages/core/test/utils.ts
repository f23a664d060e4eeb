import type { OutputSink } from '../src/output.js';
import type { StatusSet, Task, TaskLog } from '../src/task.js';

/**
 * Collects everything written to it.
 */
export class MemoryOutput implements OutputSink {
  chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}

export interface ScriptedTaskOptions {
  hasLog?: boolean;
  statusWaiting?: StatusSet;
  statusRunning?: StatusSet;
  /**
   * Called on every `log()`; receives the number of `log()` calls so far
   * (starting at 1) and the last status handed out.
   */
  onLog?: (call: number, lastStatus: string | undefined) => TaskLog;
}

/**
 * A task that hands out a fixed sequence of statuses, one per `status()`.
 */
export class ScriptedTask implements Task {
  readonly statusWaiting: StatusSet;
  readonly statusRunning: StatusSet;
  statusCalls = 0;
  logCalls = 0;
  lastStatus?: string;
  private readonly plan: string[];
  private readonly options: ScriptedTaskOptions;

  constructor(plan: string[], options: ScriptedTaskOptions = {}) {
    this.plan = [...plan];
    this.options = options;
    this.statusWaiting = options.statusWaiting ?? ['created', 'submitted'];
    this.statusRunning = options.statusRunning ?? ['running', 'finishing'];
  }

  status(): string {
    const next = this.plan[this.statusCalls];
    if (next === undefined) {
      throw new Error('ScriptedTask ran out of statuses');
    }
    this.statusCalls++;
    this.lastStatus = next;
    return next;
  }

  log(): TaskLog {
    this.logCalls++;
    return this.options.onLog?.(this.logCalls, this.lastStatus);
  }

  hasLog(): boolean {
    return this.options.hasLog ?? false;
  }
}
