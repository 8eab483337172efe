import chalk from 'chalk';

import { formatRecommendation } from '../core/gap-analysis.js';
import type { LanguageAnalysis } from '../languages/types.js';
import { logger } from '../ui/logger.js';
import { withSpinner } from '../ui/spinner.js';
import { createCommandContext, formatConfidence, parseLanguageOption, selectLanguages } from './context.js';

export interface ToolsOptions {
  language?: string;
}

export async function toolsCommand(dir: string | undefined, options: ToolsOptions = {}): Promise<LanguageAnalysis[]> {
  const language = parseLanguageOption(options.language);
  const ctx = await createCommandContext(dir);

  // An explicitly named language is analyzed even when its score is low.
  const minConfidence = language ? 0 : ctx.config.minConfidence;

  const analyses = await withSpinner('Analyzing tooling...', async () => {
    const tags = await selectLanguages(ctx, language);
    return ctx.registry.analyzeProject(ctx.root, tags, minConfidence);
  });

  const detected = analyses.filter((analysis) => analysis.detected);
  if (detected.length === 0) {
    logger.warn('No supported language detected', { root: ctx.root });
    return analyses;
  }

  for (const analysis of detected) {
    logger.header(`${analysis.language} (${formatConfidence(analysis.confidence)})`);

    for (const [tool, configured] of Object.entries(analysis.tools)) {
      console.log(configured ? chalk.green(`  ✔ ${tool}`) : chalk.dim(`  ✖ ${tool}`));
    }

    if (analysis.missingTools.length === 0) {
      console.log();
      logger.success('All recommended tools are configured');
      continue;
    }

    console.log();
    logger.info('Recommendations:');
    for (const rec of analysis.missingTools) {
      logger.dim(`  ${formatRecommendation(rec)}`);
    }
  }

  return analyses;
}
