import { basename } from 'node:path';
import { isDeepStrictEqual } from 'node:util';

import { logger } from '../ui/logger.js';
import { ConfigurationError } from '../utils/errors.js';
import { fileExists, readTextFile } from '../utils/fs.js';
import { err, ok } from '../utils/result.js';
import type { Result } from '../utils/result.js';
import { codecForPath } from './codecs.js';
import type { DocumentCodec } from './codecs.js';
import { createFileChange, updateFileChange } from './config-change.js';
import type { ConfigChange } from './config-change.js';
import { cloneConfigValue, getEntry, isConfigMap, setEntry } from './config-value.js';
import type { ConfigMap, ConfigValue } from './config-value.js';
import { mergeLines } from './text-merge.js';

interface BlockBase {
  tool: string;
  /** Target file, relative to the project root. */
  manifest: string;
  description: string;
}

/** Default settings for one tool and where they live in a shared manifest. */
export interface SectionBlock extends BlockBase {
  kind: 'section';
  section: string;
  defaults: ConfigMap;
}

export interface PreCommitHook extends ConfigMap {
  id: string;
}

/**
 * A repository entry for `.pre-commit-config.yaml`. Repositories are matched
 * by URL and hooks by id; `settings` are top-level keys added when absent.
 */
export interface HookRepoBlock extends BlockBase {
  kind: 'hook-repo';
  repo: string;
  rev: string;
  hooks: PreCommitHook[];
  settings: ConfigMap;
}

/** Lines a plain-text file such as `.gitignore` must contain. */
export interface LineBlock extends BlockBase {
  kind: 'lines';
  lines: string[];
}

export type StructuredBlock = SectionBlock | HookRepoBlock;

export type ToolConfigBlock = StructuredBlock | LineBlock;

export interface MergeOutcome {
  merged: ConfigMap;
  conflicts: string[];
}

export interface LoadedDocument {
  filePath: string;
  codec: DocumentCodec;
  existed: boolean;
  originalText: string | null;
  doc: ConfigMap;
}

export interface PlannedChange {
  change: ConfigChange;
  merged: ConfigMap;
}

function joinPath(prefix: string, key: string): string {
  return prefix ? `${prefix}.${key}` : key;
}

/**
 * Fills keys missing from `existing` with values from `defaults`. Two mappings
 * under the same key are merged recursively; every other value already present
 * is kept as is, and recorded as a conflict when it differs from the default.
 */
export function mergeMissing(existing: ConfigMap, defaults: ConfigMap, path = ''): MergeOutcome {
  const merged = cloneConfigValue(existing);
  const conflicts: string[] = [];

  for (const [key, defaultValue] of Object.entries(defaults)) {
    const keyPath = joinPath(path, key);
    const current = getEntry(merged, key);

    if (current === undefined) {
      setEntry(merged, key, cloneConfigValue(defaultValue));
      continue;
    }

    if (isConfigMap(current) && isConfigMap(defaultValue)) {
      const nested = mergeMissing(current, defaultValue, keyPath);
      setEntry(merged, key, nested.merged);
      conflicts.push(...nested.conflicts);
    } else if (!isDeepStrictEqual(current, defaultValue)) {
      conflicts.push(`${keyPath}: kept existing value`);
    }
  }

  return { merged, conflicts };
}

/**
 * Walks `segments` from the document root, creating empty mappings where a
 * segment is missing. Fails with the blocking path when a segment already
 * holds something other than a mapping.
 */
export function ensureSection(doc: ConfigMap, segments: string[]): Result<ConfigMap, string> {
  let current = doc;
  let path = '';

  for (const segment of segments) {
    path = joinPath(path, segment);
    const next = getEntry(current, segment);
    if (next === undefined) {
      const created: ConfigMap = {};
      setEntry(current, segment, created);
      current = created;
    } else if (isConfigMap(next)) {
      current = next;
    } else {
      return err(path);
    }
  }

  return ok(current);
}

/** Applies one section block to a copy of `doc`. */
export function mergeToolBlock(doc: ConfigMap, block: SectionBlock): MergeOutcome {
  const working = cloneConfigValue(doc);
  const segments = block.section.split('.');
  const leaf = segments.pop();
  if (leaf === undefined || leaf === '') {
    throw new ConfigurationError(`Invalid config section for ${block.tool}: "${block.section}"`);
  }

  const parent = ensureSection(working, segments);
  if (!parent.ok) {
    return {
      merged: cloneConfigValue(doc),
      conflicts: [`${parent.error}: existing value is not a table, ${block.tool} section skipped`],
    };
  }

  const existing = getEntry(parent.value, leaf);
  if (existing === undefined) {
    setEntry(parent.value, leaf, cloneConfigValue(block.defaults));
    return { merged: working, conflicts: [] };
  }

  if (!isConfigMap(existing)) {
    return {
      merged: cloneConfigValue(doc),
      conflicts: [`${block.section}: existing value is not a table, ${block.tool} section skipped`],
    };
  }

  const outcome = mergeMissing(existing, block.defaults, block.section);
  setEntry(parent.value, leaf, outcome.merged);
  return { merged: working, conflicts: outcome.conflicts };
}

function normalizeRepoUrl(url: string): string {
  return url
    .trim()
    .toLowerCase()
    .replace(/\/+$/, '')
    .replace(/\.git$/, '');
}

function isSameRepo(entry: ConfigValue, url: string): entry is ConfigMap {
  if (!isConfigMap(entry)) return false;
  const repo = getEntry(entry, 'repo');
  return typeof repo === 'string' && normalizeRepoUrl(repo) === normalizeRepoUrl(url);
}

function hasHookId(entry: ConfigValue, id: string): entry is ConfigMap {
  return isConfigMap(entry) && getEntry(entry, 'id') === id;
}

/**
 * Adds a pre-commit repository to `repos`, or merges its hooks into the entry
 * with the same URL. Hook settings the project already has are kept; the
 * pinned `rev` of an existing entry is never touched.
 */
export function mergeHookRepo(doc: ConfigMap, block: HookRepoBlock): MergeOutcome {
  const { merged: working, conflicts } = mergeMissing(doc, block.settings);

  const repos = getEntry(working, 'repos');
  const entry: ConfigMap = { repo: block.repo, rev: block.rev, hooks: cloneConfigValue(block.hooks) };

  if (repos === undefined) {
    setEntry(working, 'repos', [entry]);
    return { merged: working, conflicts };
  }
  if (!Array.isArray(repos)) {
    conflicts.push(`repos: existing value is not a list, ${block.tool} hook skipped`);
    return { merged: working, conflicts };
  }

  const existing = repos.find((candidate) => isSameRepo(candidate, block.repo));
  if (existing === undefined || !isConfigMap(existing)) {
    repos.push(entry);
    return { merged: working, conflicts };
  }

  const repoPath = `repos.${block.repo}.hooks`;
  const hooks = getEntry(existing, 'hooks');
  if (hooks === undefined) {
    setEntry(existing, 'hooks', cloneConfigValue(block.hooks));
    return { merged: working, conflicts };
  }
  if (!Array.isArray(hooks)) {
    conflicts.push(`${repoPath}: existing value is not a list, ${block.tool} hook skipped`);
    return { merged: working, conflicts };
  }

  for (const hook of block.hooks) {
    const index = hooks.findIndex((candidate) => hasHookId(candidate, hook.id));
    const current = index === -1 ? undefined : hooks[index];
    if (current === undefined || !isConfigMap(current)) {
      hooks.push(cloneConfigValue(hook));
      continue;
    }
    const outcome = mergeMissing(current, hook, `${repoPath}.${hook.id}`);
    hooks[index] = outcome.merged;
    conflicts.push(...outcome.conflicts);
  }

  return { merged: working, conflicts };
}

export function mergeStructuredBlock(doc: ConfigMap, block: StructuredBlock): MergeOutcome {
  return block.kind === 'section' ? mergeToolBlock(doc, block) : mergeHookRepo(doc, block);
}

function isLineBlock(block: ToolConfigBlock): block is LineBlock {
  return block.kind === 'lines';
}

function isStructuredBlock(block: ToolConfigBlock): block is StructuredBlock {
  return block.kind !== 'lines';
}

export class ConfigMerger {
  /**
   * Reads the target document. A missing file is an empty document; a file
   * that exists but cannot be read or parsed is a ConfigurationError.
   */
  async load(filePath: string): Promise<LoadedDocument> {
    const codec = codecForPath(filePath);
    const text = await this.readExisting(filePath);

    if (text === null) {
      return { filePath, codec, existed: false, originalText: null, doc: {} };
    }

    const parsed = codec.parse(text);
    if (!parsed.ok) {
      throw new ConfigurationError(`Failed to load ${basename(filePath)}: ${parsed.error.message}`, {
        path: filePath,
        cause: parsed.error,
      });
    }

    return { filePath, codec, existed: true, originalText: text, doc: parsed.value };
  }

  /**
   * Plans one tool against `filePath`. `current` replaces the document read
   * from disk, for callers that already hold a merged document for this file;
   * the change still records the on-disk text as `oldContent`.
   */
  async planToolChange(filePath: string, block: StructuredBlock, current?: ConfigMap): Promise<PlannedChange> {
    const loaded = await this.load(filePath);
    return this.plan(loaded, current ?? loaded.doc, block);
  }

  /**
   * Merges several tools into the same file, feeding each tool's result into
   * the next. Every returned change carries the file text from before the
   * batch as `oldContent` and the cumulative result as `newContent`. A batch
   * is either all line blocks or all structured blocks.
   */
  async planBatch(filePath: string, blocks: ToolConfigBlock[]): Promise<ConfigChange[]> {
    const lineBlocks = blocks.filter(isLineBlock);
    if (lineBlocks.length === blocks.length) {
      return this.planLineBatch(filePath, lineBlocks);
    }
    if (lineBlocks.length > 0) {
      const tools = blocks.map((block) => block.tool).join(', ');
      throw new ConfigurationError(`${basename(filePath)} cannot take both line-based and structured tools: ${tools}`, {
        path: filePath,
      });
    }

    return this.planLoaded(await this.load(filePath), blocks.filter(isStructuredBlock));
  }

  /** Runs a structured batch against an already loaded document. */
  planLoaded(loaded: LoadedDocument, blocks: StructuredBlock[]): ConfigChange[] {
    const changes: ConfigChange[] = [];
    let current = loaded.doc;

    for (const block of blocks) {
      const { change, merged } = this.plan(loaded, current, block);
      changes.push(change);
      current = this.carryForward(loaded, change.newContent, merged, block.tool);
    }

    return changes;
  }

  async planLineBatch(filePath: string, blocks: LineBlock[]): Promise<ConfigChange[]> {
    const originalText = await this.readExisting(filePath);
    const changes: ConfigChange[] = [];
    let current = originalText ?? '';

    for (const block of blocks) {
      const { content } = mergeLines(current, block.lines);
      changes.push(
        originalText === null
          ? createFileChange(filePath, content, block.description)
          : updateFileChange(filePath, originalText, content, block.description),
      );
      current = content;
    }

    return changes;
  }

  plan(loaded: LoadedDocument, doc: ConfigMap, block: StructuredBlock): PlannedChange {
    const { merged, conflicts } = mergeStructuredBlock(doc, block);
    const newContent = loaded.codec.stringify(merged);

    const change =
      loaded.existed && loaded.originalText !== null
        ? updateFileChange(loaded.filePath, loaded.originalText, newContent, block.description, conflicts)
        : createFileChange(loaded.filePath, newContent, block.description, conflicts);

    return { change, merged };
  }

  // The in-memory result always wins; the re-parse only reports a serializer
  // and parser that disagree.
  private carryForward(loaded: LoadedDocument, text: string, merged: ConfigMap, tool: string): ConfigMap {
    const reparsed = loaded.codec.parse(text);
    if (!reparsed.ok) {
      logger.debug('Could not parse intermediate config, continuing with in-memory document', {
        tool,
        path: loaded.filePath,
        error: reparsed.error,
      });
      return merged;
    }

    if (!isDeepStrictEqual(reparsed.value, merged)) {
      logger.debug('Serialized config does not round-trip, continuing with in-memory document', {
        tool,
        path: loaded.filePath,
      });
    }

    return merged;
  }

  /** File text, or null when the file does not exist; unreadable is fatal. */
  private async readExisting(filePath: string): Promise<string | null> {
    if (!(await fileExists(filePath))) return null;

    const text = await readTextFile(filePath);
    if (!text.ok) {
      throw new ConfigurationError(`Failed to read ${filePath}: ${text.error.message}`, {
        path: filePath,
        cause: text.error,
      });
    }
    return text.value;
  }
}
