import { resolve } from 'node:path';

import { loadProjectConfig } from '../core/config.js';
import type { ProjectConfig } from '../core/config.js';
import { createLanguageRegistry, isLanguageTag, LANGUAGE_TAGS } from '../languages/registry.js';
import type { LanguageRegistry } from '../languages/registry.js';
import type { LanguageTag } from '../languages/types.js';
import { ConfigurationError, ProjectNotFoundError } from '../utils/errors.js';
import { isDirectory } from '../utils/fs.js';

export interface CommandContext {
  root: string;
  config: ProjectConfig;
  registry: LanguageRegistry;
}

export async function createCommandContext(dir = '.'): Promise<CommandContext> {
  const root = resolve(dir);
  if (!(await isDirectory(root))) {
    throw new ProjectNotFoundError(root);
  }

  return {
    root,
    config: await loadProjectConfig(root),
    registry: createLanguageRegistry(),
  };
}

export function parseLanguageOption(value: string | undefined): LanguageTag | undefined {
  if (value === undefined) return undefined;
  if (!isLanguageTag(value)) {
    throw new ConfigurationError(`Unknown language "${value}". Known languages: ${LANGUAGE_TAGS.join(', ')}`);
  }
  return value;
}

/** The --language option wins, then the config's list, then detection. */
export async function selectLanguages(ctx: CommandContext, language?: LanguageTag): Promise<LanguageTag[]> {
  if (language) return [language];
  if (ctx.config.languages) return [...ctx.config.languages];

  const detected = await ctx.registry.detectLanguages(ctx.root, ctx.config.minConfidence);
  return detected.map((result) => result.language);
}

export function formatConfidence(confidence: number): string {
  return `${Math.round(confidence * 100)}%`;
}
