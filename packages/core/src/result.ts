import { z } from 'zod';

export const TaskWaitResultSchema = z.object({
  /** The final status, as returned by the task's `status()` */
  status: z.string(),
  /** When the wait began */
  start: z.date(),
  /** When the wait concluded */
  end: z.date(),
});

export type TaskWaitResult = Readonly<z.infer<typeof TaskWaitResultSchema>>;

/**
 * Builds a frozen result. `start` and `end` hand out a fresh `Date` on every
 * read, so neither the caller's dates nor a returned date can change it.
 */
export function createResult(
  status: string,
  start: Date,
  end: Date
): TaskWaitResult {
  const parsed = TaskWaitResultSchema.parse({ status, start, end });
  const startTime = parsed.start.getTime();
  const endTime = parsed.end.getTime();
  return Object.freeze({
    status: parsed.status,
    get start() {
      return new Date(startTime);
    },
    get end() {
      return new Date(endTime);
    },
  });
}
