import { TaskWaitOptionsError } from '@taskwait/errors';
import { z } from 'zod';
import { getConfig, MAX_POLL_MS, type TaskWaitConfig } from './config.js';
import type { OutputSink } from './output.js';

const durationSchema = z
  .number()
  .finite('must be finite')
  .nonnegative('must not be negative');

export const WaitOptionsSchema = z.object({
  showLog: z.boolean().optional(),
  showProgress: z.boolean().optional(),
  poll: durationSchema
    .max(MAX_POLL_MS, `must be at most ${MAX_POLL_MS}`)
    .optional(),
  timeout: durationSchema.optional(),
});

export interface WaitOptions extends z.input<typeof WaitOptionsSchema> {
  /**
   * Show task logs, if the task has any, while it runs. Defaults to `true`.
   */
  showLog?: boolean;
  /**
   * Show a dotted progress indicator. Only shown when logs are not being
   * shown. Defaults to `true`.
   */
  showProgress?: boolean;
  /** Minimum time between status queries, in milliseconds. */
  poll?: number;
  /**
   * Time to wait, in milliseconds, before rejecting with a
   * `TaskTimeoutError`. When omitted, waits forever.
   */
  timeout?: number;
  /** Where progress and log lines are written. Defaults to stdout. */
  output?: OutputSink;
}

export interface ResolvedWaitOptions {
  showLog: boolean;
  showProgress: boolean;
  poll: number;
  timeout?: number;
  output: OutputSink;
}

/**
 * Validates caller options and fills in defaults from the environment
 * configuration. The environment is only read when `poll` or `timeout` is
 * missing.
 */
export function resolveWaitOptions(
  options: WaitOptions = {},
  config?: TaskWaitConfig
): ResolvedWaitOptions {
  const { output, ...rest } = options;
  const result = WaitOptionsSchema.safeParse(rest);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new TaskWaitOptionsError(issues, { cause: result.error });
  }

  const parsed = result.data;
  const defaults = (): TaskWaitConfig => config ?? getConfig();
  return {
    showLog: parsed.showLog ?? true,
    showProgress: parsed.showProgress ?? true,
    poll: parsed.poll ?? defaults().poll,
    timeout: parsed.timeout ?? defaults().timeout,
    output: output ?? process.stdout,
  };
}
