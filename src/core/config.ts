import { join } from 'node:path';

import { z } from 'zod';

import { DEFAULT_MIN_CONFIDENCE } from '../languages/base.js';
import { LANGUAGE_TAGS } from '../languages/registry.js';
import { ConfigurationError } from '../utils/errors.js';
import { fileExists, readTextFile } from '../utils/fs.js';

export const CONFIG_FILENAME = 'stackguard.config.json';

const projectConfigSchema = z
  .object({
    minConfidence: z.number().min(0).max(1).default(DEFAULT_MIN_CONFIDENCE),
    /** Restrict analysis to these languages instead of auto-detecting. */
    languages: z.array(z.enum(LANGUAGE_TAGS)).optional(),
    /** Tools `plan` merges when --tools is not given. */
    tools: z.array(z.string().min(1)).default([]),
    /** Tool name → manifest path relative to the project root. */
    manifests: z.record(z.string().min(1)).default({}),
    /** Directory, relative to the project root, for copies of files `plan --write` updates. */
    backupDir: z.string().min(1).optional(),
  })
  .strict();

export type ProjectConfig = z.infer<typeof projectConfigSchema>;

export function defaultProjectConfig(): ProjectConfig {
  return projectConfigSchema.parse({});
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Validates an already-parsed config object. */
export function parseProjectConfig(data: unknown, source = CONFIG_FILENAME): ProjectConfig {
  const parsed = projectConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${source}: ${formatIssues(parsed.error)}`, { path: source });
  }
  return parsed.data;
}

/**
 * Loads stackguard.config.json from the project root. A missing file yields the
 * defaults; a file that cannot be read, is not JSON or fails validation is a
 * ConfigurationError.
 */
export async function loadProjectConfig(root: string): Promise<ProjectConfig> {
  const configPath = join(root, CONFIG_FILENAME);
  if (!(await fileExists(configPath))) {
    return defaultProjectConfig();
  }

  const raw = await readTextFile(configPath);
  if (!raw.ok) {
    throw new ConfigurationError(`Failed to read ${CONFIG_FILENAME}: ${raw.error.message}`, {
      path: configPath,
      cause: raw.error,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw.value);
  } catch (error) {
    throw new ConfigurationError(`${CONFIG_FILENAME} is not valid JSON`, { path: configPath, cause: error });
  }

  return parseProjectConfig(data, configPath);
}
