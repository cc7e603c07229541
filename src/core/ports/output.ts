/**
 * Where user-facing progress goes. Core code reports through this port
 * instead of writing to the console, so the same install can run under the
 * CLI, in a test, or inside another program.
 */

export interface Spinner {
  start(message: string): void;
  /** Replace the spinner text while it runs */
  message(text: string): void;
  stop(finalMessage?: string): void;
}

export interface OutputPort {
  info(message: string): void;
  /** Plain line without decoration */
  message(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  note(content: string, title?: string): void;
  spinner(): Spinner;
}
