import type { OutputSink } from './output.js';
import type { TaskLog } from './task.js';

/**
 * Writes the log lines after the first `skip` ones and returns the new
 * cursor. A log that is missing, or no longer than `skip`, writes nothing
 * and leaves the cursor where it was.
 */
export function showNewLog(
  skip: number,
  lines: TaskLog,
  output: OutputSink
): number {
  if (!lines || lines.length <= skip) {
    return skip;
  }
  output.write(`${lines.slice(skip).join('\n')}\n`);
  return lines.length;
}
