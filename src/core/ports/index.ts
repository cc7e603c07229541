import type { OutputPort } from './output.js';
import type { PromptPort } from './prompt.js';
import { consoleOutput } from './console-output.js';
import { nonInteractivePrompt } from './non-interactive-prompt.js';

export type { OutputPort, Spinner } from './output.js';
export type { PromptPort, PromptChoice } from './prompt.js';
export { consoleOutput } from './console-output.js';
export { silentOutput } from './silent-output.js';
export { nonInteractivePrompt } from './non-interactive-prompt.js';

/** Output port of a context, plain console output when it has none */
export function resolveOutput(ports?: { output?: OutputPort }): OutputPort {
  return ports?.output ?? consoleOutput;
}

/** Prompt port of a context; without one every prompt fails */
export function resolvePrompt(ports?: { prompt?: PromptPort }): PromptPort {
  return ports?.prompt ?? nonInteractivePrompt;
}
