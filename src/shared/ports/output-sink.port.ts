/**
 * Port for the line-oriented output channel notifiers write to.
 * Production uses stdout; tests use RecordingOutputSink.
 */
export interface OutputSink {
  /** Whether the sink can currently accept writes */
  isAvailable(): boolean;

  writeLine(line: string): void;
}

export const OUTPUT_SINK = Symbol('OUTPUT_SINK');
