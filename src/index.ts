#!/usr/bin/env node
import { program } from './cli.js';
import { logger } from './ui/logger.js';
import { StackguardError, UserCancelledError, errorMessage } from './utils/errors.js';

function isPromptExit(error: unknown): boolean {
  return error instanceof Error && error.name === 'ExitPromptError';
}

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof UserCancelledError || isPromptExit(error)) {
    logger.warn('Cancelled, no files were written');
    process.exitCode = 130;
  } else if (error instanceof StackguardError) {
    logger.error(error.message);
    process.exitCode = 1;
  } else {
    logger.error(`Unexpected error: ${errorMessage(error)}`);
    logger.debug('Stack trace', { stack: error instanceof Error ? error.stack : undefined });
    process.exitCode = 1;
  }
}
