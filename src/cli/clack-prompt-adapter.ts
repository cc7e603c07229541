import * as clack from '@clack/prompts';
import type { PromptChoice, PromptPort } from '../core/ports/prompt.js';
import { UserCancellationError } from '../utils/errors.js';

/**
 * PromptPort for terminal sessions. Ctrl+C on a prompt ends the command
 * with UserCancellationError.
 */
export function createClackPrompt(): PromptPort {
  return {
    async select(message: string, choices: PromptChoice[], initialValue?: string): Promise<string> {
      const result = await clack.select<string>({
        message,
        options: choices.map(choice => ({
          value: choice.value,
          label: choice.label,
          ...(choice.hint ? { hint: choice.hint } : {})
        })),
        ...(initialValue !== undefined ? { initialValue } : {})
      });
      if (clack.isCancel(result)) {
        clack.cancel('Cancelled.');
        throw new UserCancellationError();
      }
      return result;
    }
  };
}
