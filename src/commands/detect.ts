import chalk from 'chalk';

import type { LanguageDetectionResult } from '../languages/types.js';
import { logger } from '../ui/logger.js';
import { withSpinner } from '../ui/spinner.js';
import { createCommandContext, formatConfidence } from './context.js';

export async function detectCommand(dir?: string): Promise<LanguageDetectionResult[]> {
  const ctx = await createCommandContext(dir);

  const results = await withSpinner(
    'Detecting languages...',
    () => ctx.registry.detectLanguages(ctx.root, ctx.config.minConfidence),
    (found) => `Detected ${found.length} language(s)`,
  );

  logger.header(`Languages in ${ctx.root}`);

  if (results.length === 0) {
    logger.warn('No supported language detected', { minConfidence: ctx.config.minConfidence });
    return results;
  }

  for (const [index, result] of results.entries()) {
    const label = index === 0 ? chalk.bold(`${result.language} (primary)`) : chalk.bold(result.language);
    logger.info(`${label} ${formatConfidence(result.confidence)}`);
    for (const indicator of result.indicators) {
      logger.dim(`    ${indicator}`);
    }
  }

  return results;
}
