import { cancel, isCancel, select } from '@clack/prompts';
import chalk from 'chalk';
import { PromptCancelledError } from '../powermodes/errors.js';

export interface SelectChoice {
  value: string;
  label: string;
  hint?: string;
}

export function stylePromptMessage(message: string): string {
  return process.stdout.isTTY ? chalk.bold(message) : message;
}

/**
 * Asks the user to pick one of `choices`. Cancelling (Ctrl-C / Esc) throws
 * PromptCancelledError.
 */
export async function promptSelect(message: string, choices: SelectChoice[]): Promise<string> {
  const options = choices.map((choice) =>
    choice.hint === undefined ? choice : { ...choice, hint: chalk.dim(choice.hint) },
  );
  const selection = await select({ message: stylePromptMessage(message), options });
  if (isCancel(selection) || typeof selection !== 'string') {
    cancel('Cancelled.');
    throw new PromptCancelledError();
  }
  return selection;
}
