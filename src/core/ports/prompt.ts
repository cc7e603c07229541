export interface PromptChoice {
  label: string;
  value: string;
  hint?: string;
}

/**
 * Questions core code may ask. Implementations resolve to the chosen value
 * or reject with UserCancellationError when the user backs out.
 */
export interface PromptPort {
  select(message: string, choices: PromptChoice[], initialValue?: string): Promise<string>;
}
