/**
 * Debug logging. Off unless EDITOR_DEBUG is set or the `debug.enabled`
 * setting turns it on.
 */

export type DebugSink = (line: string) => void;

let enabled = process.env.EDITOR_DEBUG !== undefined && process.env.EDITOR_DEBUG !== '0';
let sink: DebugSink = (line) => {
  process.stderr.write(line + '\n');
};

export function isDebugEnabled(): boolean {
  return enabled;
}

export function setDebugEnabled(value: boolean): void {
  enabled = value;
}

/** Redirect debug output (tests, embedding hosts). Returns the previous sink. */
export function setDebugSink(next: DebugSink): DebugSink {
  const prev = sink;
  sink = next;
  return prev;
}

export function debugLog(message: string): void {
  if (!enabled) return;
  sink(`[${new Date().toISOString()}] ${message}`);
}
