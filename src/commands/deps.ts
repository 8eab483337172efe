import type { LanguageTag } from '../languages/types.js';
import { logger } from '../ui/logger.js';
import { withSpinner } from '../ui/spinner.js';
import { createCommandContext, parseLanguageOption, selectLanguages } from './context.js';

export interface DepsOptions {
  language?: string;
}

export interface LanguageDependencies {
  language: LanguageTag;
  dependencies: string[];
}

export async function depsCommand(dir: string | undefined, options: DepsOptions = {}): Promise<LanguageDependencies[]> {
  const language = parseLanguageOption(options.language);
  const ctx = await createCommandContext(dir);

  const results = await withSpinner('Reading dependency manifests...', async () => {
    const found: LanguageDependencies[] = [];
    for (const tag of await selectLanguages(ctx, language)) {
      const analyzer = ctx.registry.getAnalyzer(tag);
      if (analyzer) {
        found.push({ language: tag, dependencies: await analyzer.parseDependencies(ctx.root) });
      }
    }
    return found;
  });

  if (results.length === 0) {
    logger.warn('No supported language detected', { root: ctx.root });
    return results;
  }

  for (const { language: tag, dependencies } of results) {
    logger.header(`${tag} (${dependencies.length})`);
    if (dependencies.length === 0) {
      logger.dim('  No dependencies declared');
      continue;
    }
    for (const dependency of dependencies) {
      console.log(`  ${dependency}`);
    }
  }

  return results;
}
