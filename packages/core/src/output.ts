/**
 * Where the human-facing wait output goes. `process.stdout` satisfies this.
 */
export interface OutputSink {
  write(chunk: string): unknown;
}
