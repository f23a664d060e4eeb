import type { OutputSink } from './output.js';

export type ProgressTick = () => void;

export interface ProgressOptions {
  display: boolean;
  output: OutputSink;
  /** Written once the body settles. Defaults to `OK`. */
  end?: string;
}

/**
 * Runs `body` with a dotted progress indicator: `label`, one `.` per tick,
 * then the end label and a newline. The end label is written whether the
 * body resolves or throws. Nothing is written when `display` is false.
 */
export async function withProgress<T>(
  label: string,
  { display, output, end = 'OK' }: ProgressOptions,
  body: (tick: ProgressTick) => Promise<T>
): Promise<T> {
  if (display) {
    output.write(label);
  }
  const tick: ProgressTick = () => {
    if (display) {
      output.write('.');
    }
  };
  try {
    return await body(tick);
  } finally {
    if (display) {
      output.write(`${end}\n`);
    }
  }
}
