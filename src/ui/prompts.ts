import { confirm } from '@inquirer/prompts';

import { UserCancelledError } from '../utils/errors.js';

export async function confirmPrompt(message: string, defaultValue = true): Promise<boolean> {
  return confirm({ message, default: defaultValue });
}

/** Asks before a destructive step; a "no" becomes a UserCancelledError. */
export async function requireConfirmation(message: string): Promise<void> {
  const confirmed = await confirmPrompt(message, false);
  if (!confirmed) {
    throw new UserCancelledError();
  }
}
