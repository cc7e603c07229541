import type { PromptPort } from './prompt.js';
import { PromptUnavailableError } from '../../utils/errors.js';

/** Prompt port for sessions without a terminal: every question fails */
export const nonInteractivePrompt: PromptPort = {
  async select(message: string): Promise<string> {
    throw new PromptUnavailableError(message);
  }
};
