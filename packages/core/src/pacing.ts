import { TaskTimeoutError } from '@taskwait/errors';
import { MAX_POLL_MS } from './config.js';

/**
 * Sleeps for `ms`, splitting delays longer than `setTimeout` can hold.
 */
export async function sleep(ms: number): Promise<void> {
  let left = ms;
  while (left > MAX_POLL_MS) {
    await new Promise((resolve) => setTimeout(resolve, MAX_POLL_MS));
    left -= MAX_POLL_MS;
  }
  await new Promise((resolve) => setTimeout(resolve, left));
}

/**
 * Paces consecutive status queries so they are at least `poll` ms apart.
 *
 * @param prev - Timestamp returned by the previous call, or `undefined` on the
 * first call (which never waits).
 * @param poll - Minimum interval between queries, in milliseconds.
 * @param end - Absolute deadline (epoch ms); `Infinity` never expires.
 * @param timeout - The configured timeout, only used for the error message.
 * @returns The timestamp to pass as `prev` next time.
 * @throws TaskTimeoutError if the deadline has already passed.
 */
export async function delay(
  prev: number | undefined,
  poll: number,
  end: number,
  timeout?: number
): Promise<number> {
  const now = Date.now();
  if (prev === undefined) {
    return now;
  }
  if (now > end) {
    throw new TaskTimeoutError(end, { timeout });
  }
  const remaining = poll - (now - prev);
  if (remaining > 0) {
    await sleep(remaining);
    return Date.now();
  }
  return now;
}
