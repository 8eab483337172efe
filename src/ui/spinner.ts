import ora from 'ora';
import type { Ora } from 'ora';

import { getLogLevel } from './logger.js';

export function createSpinner(text: string): Ora {
  // Debug output would interleave with the spinner frames, so it stays quiet then.
  const level = getLogLevel();
  return ora({ text, spinner: 'dots', isSilent: level === 'silent' || level === 'debug' });
}

/**
 * Runs `fn` under a spinner. `done` replaces the spinner text on success,
 * either as fixed text or derived from the result.
 */
export async function withSpinner<T>(
  text: string,
  fn: () => Promise<T>,
  done?: string | ((result: T) => string),
): Promise<T> {
  const spinner = createSpinner(text);
  spinner.start();
  try {
    const result = await fn();
    spinner.succeed(typeof done === 'function' ? done(result) : done);
    return result;
  } catch (error) {
    spinner.fail();
    throw error;
  }
}
