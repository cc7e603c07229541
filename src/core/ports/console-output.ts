import pc from 'picocolors';
import type { OutputPort, Spinner } from './output.js';

/**
 * Line-oriented output for pipes and CI logs: no cursor movement, one line
 * per event.
 */
export const consoleOutput: OutputPort = {
  info: message => console.log(message),
  message: message => console.log(message),
  success: message => console.log(`${pc.green('✓')} ${message}`),
  warn: message => console.log(`${pc.yellow('!')} ${message}`),

  note(content, title) {
    console.log(title ? `\n${pc.bold(title)}\n${content}` : `\n${content}`);
  },

  spinner(): Spinner {
    let current = '';
    return {
      start(message) {
        current = message;
        console.log(`${pc.dim('…')} ${message}`);
      },
      message(text) {
        current = text;
      },
      stop(finalMessage) {
        console.log(`${pc.dim('·')} ${finalMessage ?? current}`);
      }
    };
  }
};
