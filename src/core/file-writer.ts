import { mkdir, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { fileExists, readFileIfExists } from '../utils/fs.js';
import type { ConfigChange } from './config-change.js';

export interface FileWriterSummary {
  created: string[];
  modified: string[];
  backups: string[];
}

export interface FileWriterOptions {
  /** When set, every file is copied here before it is updated. */
  backupDir?: string;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as YYYYMMDD_HHMMSS. */
export function backupTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  return `${day}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * Writes planned changes to disk and remembers what it touched. A change is
 * refused when the file no longer matches what it was planned against.
 */
export class FileWriter {
  private created: Set<string> = new Set();
  private modified: Set<string> = new Set();
  private backups: string[] = [];

  constructor(private readonly options: FileWriterOptions = {}) {}

  async apply(change: ConfigChange): Promise<void> {
    const current = await readFileIfExists(change.filePath);

    if (change.changeType === 'create') {
      if (current !== null) {
        throw new ConfigurationError(`Refusing to create ${change.filePath}: file already exists`, {
          path: change.filePath,
        });
      }
    } else {
      if (current === null) {
        throw new ConfigurationError(`Refusing to update ${change.filePath}: file does not exist`, {
          path: change.filePath,
        });
      }
      if (change.oldContent !== null && current !== change.oldContent) {
        throw new ConfigurationError(`Refusing to update ${change.filePath}: file changed since it was read`, {
          path: change.filePath,
        });
      }
      if (this.options.backupDir !== undefined) {
        this.backups.push(await this.backup(change.filePath, current, this.options.backupDir));
      }
    }

    await mkdir(dirname(change.filePath), { recursive: true });
    await writeFile(change.filePath, change.newContent, 'utf-8');

    if (change.changeType === 'create') {
      this.created.add(change.filePath);
    } else {
      this.modified.add(change.filePath);
    }
  }

  async applyAll(changes: ConfigChange[]): Promise<FileWriterSummary> {
    for (const change of changes) {
      await this.apply(change);
    }
    return this.getSummary();
  }

  getCreatedFiles(): string[] {
    return [...this.created];
  }

  getModifiedFiles(): string[] {
    return [...this.modified];
  }

  getBackups(): string[] {
    return [...this.backups];
  }

  getSummary(): FileWriterSummary {
    return {
      created: this.getCreatedFiles(),
      modified: this.getModifiedFiles(),
      backups: this.getBackups(),
    };
  }

  /** Writes `content` to `<name>.<timestamp>.backup`, never over an earlier backup. */
  private async backup(filePath: string, content: string, backupDir: string): Promise<string> {
    const stem = `${basename(filePath)}.${backupTimestamp(new Date())}`;
    let target = join(backupDir, `${stem}.backup`);
    for (let n = 1; await fileExists(target); n++) {
      target = join(backupDir, `${stem}-${n}.backup`);
    }

    try {
      await mkdir(backupDir, { recursive: true });
      await writeFile(target, content, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(`Failed to back up ${filePath}: ${errorMessage(error)}`, {
        path: filePath,
        cause: error,
      });
    }
    return target;
  }
}
