import { ValidationError } from '../utils/errors.js';

/**
 * Whether a command may stop and ask the user something.
 *
 * Prompts are ranked: a mode allows a prompt when the prompt's tier is at or
 * below what the mode permits.
 */

export enum PromptTier {
  /** Nothing sensible can happen without an answer */
  Required = 0,
  /** The dependency sheet: download everything, only the main file, or cancel */
  Confirmation = 1,
  /** Overriding the preselected release of each dependency */
  VersionSelection = 2,
}

export type InteractionMode = 'never' | 'auto' | 'always';

export interface InteractionPolicy {
  readonly mode: InteractionMode;
  canPrompt(tier: PromptTier): boolean;
}

const HIGHEST_TIER: Record<InteractionMode, number> = {
  never: -1,
  auto: PromptTier.Confirmation,
  always: PromptTier.VersionSelection,
};

export interface InteractionPolicyOptions {
  /** --interactive */
  interactive?: boolean;
  isTTY?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * --interactive asks for every prompt and needs a terminal. Without it a
 * terminal gets the confirmation sheet only, and CI or piped input never
 * prompts.
 */
export function createInteractionPolicy(options: InteractionPolicyOptions = {}): InteractionPolicy {
  const isTTY = options.isTTY ?? process.stdin.isTTY === true;
  const env = options.env ?? process.env;

  let mode: InteractionMode;
  if (options.interactive) {
    if (!isTTY) {
      throw new ValidationError('--interactive needs a terminal; use --policy and --release instead');
    }
    mode = 'always';
  } else if (!isTTY || env.CI === 'true' || env.CI === '1') {
    mode = 'never';
  } else {
    mode = 'auto';
  }

  return {
    mode,
    canPrompt: (tier: PromptTier): boolean => tier <= HIGHEST_TIER[mode],
  };
}
