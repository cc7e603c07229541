import type { OutputPort, Spinner } from './output.js';

const noop = (): void => {};

const silentSpinner: Spinner = { start: noop, message: noop, stop: noop };

/** Discards everything; for library callers that only read return values */
export const silentOutput: OutputPort = {
  info: noop,
  message: noop,
  success: noop,
  warn: noop,
  note: noop,
  spinner: () => silentSpinner
};
