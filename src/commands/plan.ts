import { join, relative, resolve } from 'node:path';

import chalk from 'chalk';

import { isNoopChange, squashChanges } from '../core/config-change.js';
import type { ConfigChange } from '../core/config-change.js';
import { renderUnifiedDiff, summarizeChange } from '../core/diff.js';
import { FileWriter } from '../core/file-writer.js';
import type { FileWriterSummary } from '../core/file-writer.js';
import { getToolConfigBlocks, planToolChanges } from '../core/tool-configs.js';
import { logger } from '../ui/logger.js';
import { requireConfirmation } from '../ui/prompts.js';
import { withSpinner } from '../ui/spinner.js';
import { fileExists } from '../utils/fs.js';
import { createCommandContext } from './context.js';
import type { CommandContext } from './context.js';

export interface PlanOptions {
  /** Comma-separated tool names. */
  tools?: string;
  write?: boolean;
  yes?: boolean;
  /** Back up updated files here; overrides `backupDir` from the project config. */
  backupDir?: string;
}

export interface PlanResult {
  tools: string[];
  /** One entry per file, excluding files that would not change. */
  changes: ConfigChange[];
  written: FileWriterSummary | null;
}

export function parseToolList(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value
    .split(',')
    .map((tool) => tool.trim())
    .filter((tool) => tool.length > 0);
}

/**
 * Tools to merge when none are named: the config's list, or every catalog
 * tool whose manifest already exists in the project.
 */
async function defaultTools(ctx: CommandContext): Promise<string[]> {
  if (ctx.config.tools.length > 0) return [...ctx.config.tools];

  const tools: string[] = [];
  for (const block of getToolConfigBlocks()) {
    const manifest = ctx.config.manifests[block.tool] ?? block.manifest;
    if (await fileExists(join(ctx.root, manifest))) {
      tools.push(block.tool);
    }
  }
  return tools;
}

function printDiff(diff: string): void {
  for (const line of diff.split('\n')) {
    if (line.startsWith('+++') || line.startsWith('---')) {
      console.log(chalk.bold(line));
    } else if (line.startsWith('+')) {
      console.log(chalk.green(line));
    } else if (line.startsWith('-')) {
      console.log(chalk.red(line));
    } else if (line.startsWith('@@')) {
      console.log(chalk.cyan(line));
    } else {
      console.log(line);
    }
  }
}

export async function planCommand(dir: string | undefined, options: PlanOptions = {}): Promise<PlanResult> {
  const ctx = await createCommandContext(dir);

  const requested = parseToolList(options.tools);
  const tools = requested.length > 0 ? requested : await defaultTools(ctx);

  if (tools.length === 0) {
    logger.warn('Nothing to plan: no tools requested and no known manifest found', { root: ctx.root });
    return { tools, changes: [], written: null };
  }

  const planned = await withSpinner(
    `Planning configuration for ${tools.join(', ')}...`,
    () => planToolChanges(ctx.root, tools, { manifests: ctx.config.manifests }),
  );

  const changes: ConfigChange[] = [];
  for (const change of squashChanges(planned)) {
    const name = relative(ctx.root, change.filePath);
    if (isNoopChange(change)) {
      logger.info(`${name} is already up to date`);
      continue;
    }
    changes.push(change);

    logger.header(name);
    console.log(summarizeChange(change));
    console.log();
    printDiff(renderUnifiedDiff(change));
  }

  if (changes.length === 0) {
    logger.success('No changes needed');
    return { tools, changes, written: null };
  }

  if (!options.write) {
    logger.dim('Dry run. Re-run with --write to apply these changes.');
    return { tools, changes, written: null };
  }

  if (!options.yes) {
    await requireConfirmation(`Apply ${changes.length} change(s)?`);
  }

  const backupDir =
    options.backupDir !== undefined
      ? resolve(options.backupDir)
      : ctx.config.backupDir !== undefined
        ? resolve(ctx.root, ctx.config.backupDir)
        : undefined;
  const writer = new FileWriter({ backupDir });
  const written = await writer.applyAll(changes);

  console.log();
  for (const file of written.created) {
    logger.fileCreated(relative(ctx.root, file));
  }
  for (const file of written.modified) {
    logger.fileModified(relative(ctx.root, file));
  }
  for (const file of written.backups) {
    logger.dim(`Backup: ${file}`);
  }

  return { tools, changes, written };
}
