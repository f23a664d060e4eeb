import { TaskWaitConfigError } from '@taskwait/errors';
import { z } from 'zod';

// Only the following environment variables are read:
// - TASKWAIT_DEBUG
// - TASKWAIT_POLL_MS
// - TASKWAIT_TIMEOUT_MS

/** Default poll interval in milliseconds */
export const DEFAULT_POLL_MS = 1_000;

/** Longest delay `setTimeout` honours; larger values fire after 1ms */
export const MAX_POLL_MS = 2_147_483_647;

const durationSchema = z.coerce
  .number({ invalid_type_error: 'must be a number' })
  .finite('must be finite')
  .nonnegative('must not be negative');

const DebugSchema = z.enum(['1', '0', 'true', 'false']);

const EnvSchema = z.object({
  TASKWAIT_POLL_MS: durationSchema
    .max(MAX_POLL_MS, `must be at most ${MAX_POLL_MS}`)
    .optional(),
  TASKWAIT_TIMEOUT_MS: durationSchema.optional(),
});

export interface TaskWaitConfig {
  /** Emit debug log lines to stderr */
  debug: boolean;
  /** Poll interval used when the caller does not pass one */
  poll: number;
  /** Timeout used when the caller does not pass one; `undefined` waits forever */
  timeout?: number;
  /** Variables that were ignored, with the reason */
  warnings?: string[];
}

/**
 * Parses the `TASKWAIT_*` variables out of the given environment.
 * Empty strings are treated as unset. An unrecognised `TASKWAIT_DEBUG`
 * leaves debug logging off and is reported in `warnings`.
 */
export function resolveConfig(
  env: NodeJS.ProcessEnv = process.env
): TaskWaitConfig {
  const debug = env.TASKWAIT_DEBUG?.trim() || undefined;
  const raw = {
    TASKWAIT_POLL_MS: env.TASKWAIT_POLL_MS?.trim() || undefined,
    TASKWAIT_TIMEOUT_MS: env.TASKWAIT_TIMEOUT_MS?.trim() || undefined,
  };

  const result = EnvSchema.safeParse(raw);
  if (!result.success) {
    const [issue] = result.error.issues;
    const variable = String(issue?.path[0] ?? 'TASKWAIT_*');
    throw new TaskWaitConfigError(variable, issue?.message ?? 'invalid', {
      cause: result.error,
    });
  }

  const config: TaskWaitConfig = {
    debug: false,
    poll: result.data.TASKWAIT_POLL_MS ?? DEFAULT_POLL_MS,
    timeout: result.data.TASKWAIT_TIMEOUT_MS,
  };

  if (debug !== undefined) {
    const parsedDebug = DebugSchema.safeParse(debug);
    if (parsedDebug.success) {
      config.debug = parsedDebug.data === '1' || parsedDebug.data === 'true';
    } else {
      config.warnings = [
        `Ignoring TASKWAIT_DEBUG=${debug}: must be one of 1, 0, true, false`,
      ];
    }
  }

  return config;
}

let cachedConfig: TaskWaitConfig | undefined;

export function getConfig(): TaskWaitConfig {
  cachedConfig ??= resolveConfig();
  return cachedConfig;
}

/**
 * Drops the cached configuration so the next `getConfig()` re-reads the
 * environment.
 */
export function resetConfig(): void {
  cachedConfig = undefined;
}
