import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { createInteractionPolicy } from '../core/interaction-policy.js';
import { consoleOutput, nonInteractivePrompt } from '../core/ports/index.js';
import { createClackOutput } from './clack-output-adapter.js';
import { createClackPrompt } from './clack-prompt-adapter.js';

/**
 * Context for one CLI command: clack drawing and prompts on a terminal,
 * plain lines and no prompts otherwise.
 */
export function createCliExecutionContext(options: ExecutionOptions = {}): ExecutionContext {
  const interactionPolicy = createInteractionPolicy(
    options.interactive !== undefined ? { interactive: options.interactive } : {}
  );

  if (interactionPolicy.mode === 'never') {
    return { interactionPolicy, output: consoleOutput, prompt: nonInteractivePrompt };
  }
  return { interactionPolicy, output: createClackOutput(), prompt: createClackPrompt() };
}
