import type { InteractionPolicy } from '../core/interaction-policy.js';
import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';

/**
 * Ports and prompting rules a command runs with. Missing ports fall back to
 * console output and a prompt port that refuses to ask.
 */
export interface ExecutionContext {
  interactionPolicy?: InteractionPolicy;
  output?: OutputPort;
  prompt?: PromptPort;
}

export interface ExecutionOptions {
  /** --interactive */
  interactive?: boolean;
}
