import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

export interface PackageInfo {
  name: string;
  version: string;
  description: string;
}

const FALLBACK: PackageInfo = { name: 'stackguard', version: '0.0.0', description: '' };

function readPackageJson(path: string): PackageInfo | null {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch {
    return null;
  }

  let pkg: unknown;
  try {
    pkg = JSON.parse(content);
  } catch {
    return null;
  }
  if (typeof pkg !== 'object' || pkg === null || !('version' in pkg) || typeof pkg.version !== 'string') {
    return null;
  }

  return {
    name: 'name' in pkg && typeof pkg.name === 'string' ? pkg.name : FALLBACK.name,
    version: pkg.version,
    description: 'description' in pkg && typeof pkg.description === 'string' ? pkg.description : '',
  };
}

/**
 * Reads package.json by walking up from this file's directory, so the same
 * lookup works from src/ under the test runner and from dist/ after a build.
 */
export function getPackageInfo(startDir = dirname(fileURLToPath(import.meta.url))): PackageInfo {
  let dir = startDir;

  while (true) {
    const info = readPackageJson(join(dir, 'package.json'));
    if (info) return info;

    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return { ...FALLBACK };
}
