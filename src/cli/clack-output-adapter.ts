import { log, note, spinner as clackSpinner } from '@clack/prompts';
import type { OutputPort, Spinner } from '../core/ports/output.js';

/**
 * OutputPort for terminal sessions, drawn with @clack/prompts
 */
export function createClackOutput(): OutputPort {
  return {
    info: message => log.info(message),
    message: message => log.message(message),
    success: message => log.success(message),
    warn: message => log.warn(message),
    note: (content, title) => note(content, title ?? ''),

    spinner(): Spinner {
      const s = clackSpinner();
      let running = false;

      return {
        start(message) {
          if (running) return;
          s.start(message);
          running = true;
        },
        message(text) {
          if (running) s.message(text);
        },
        stop(finalMessage) {
          if (!running) return;
          s.stop(finalMessage);
          running = false;
        }
      };
    }
  };
}
