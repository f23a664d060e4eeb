export {
  TaskTimeoutError,
  TaskWaitConfigError,
  TaskWaitError,
  TaskWaitOptionsError,
} from '@taskwait/errors';
export {
  DEFAULT_POLL_MS,
  getConfig,
  resetConfig,
  resolveConfig,
  type TaskWaitConfig,
} from './config.js';
export {
  createLogger,
  type LogLevel,
  type LogMetadata,
  type Logger,
} from './logger.js';
export {
  type ResolvedWaitOptions,
  resolveWaitOptions,
  type WaitOptions,
  WaitOptionsSchema,
} from './options.js';
export type { OutputSink } from './output.js';
export { delay, sleep } from './pacing.js';
export {
  type ProgressOptions,
  type ProgressTick,
  withProgress,
} from './progress.js';
export {
  createResult,
  type TaskWaitResult,
  TaskWaitResultSchema,
} from './result.js';
export { showNewLog } from './tail.js';
export type { StatusSet, Task, TaskLog } from './task.js';
export { taskwait, wait } from './wait.js';
