import { access, readFile, stat } from 'node:fs/promises';

import { glob } from 'glob';

import { err, ok } from './result.js';
import type { Result } from './result.js';

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export async function readFileIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch {
    return null;
  }
}

export async function readTextFile(path: string): Promise<Result<string>> {
  try {
    return ok(await readFile(path, 'utf-8'));
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

/**
 * Files under `root` matching `pattern`, relative to `root` and sorted so
 * callers see the same order for the same tree.
 */
export async function findFiles(root: string, pattern: string, ignore: string[] = []): Promise<string[]> {
  const matches = await glob(pattern, { cwd: root, nodir: true, dot: true, posix: true, ignore });
  return matches.sort();
}

export async function countFiles(root: string, pattern: string, ignore: string[] = []): Promise<number> {
  return (await findFiles(root, pattern, ignore)).length;
}
