export type ChangeType = 'create' | 'update';

/**
 * A proposed edit to one file. Nothing is written until a caller hands it to
 * FileWriter. `oldContent` is the file text before the change and is null
 * exactly when `changeType` is 'create'.
 */
export interface ConfigChange {
  filePath: string;
  changeType: ChangeType;
  oldContent: string | null;
  newContent: string;
  description: string;
  conflicts: string[];
}

export function createFileChange(
  filePath: string,
  newContent: string,
  description: string,
  conflicts: string[] = [],
): ConfigChange {
  return { filePath, changeType: 'create', oldContent: null, newContent, description, conflicts };
}

export function updateFileChange(
  filePath: string,
  oldContent: string,
  newContent: string,
  description: string,
  conflicts: string[] = [],
): ConfigChange {
  return { filePath, changeType: 'update', oldContent, newContent, description, conflicts };
}

/**
 * Collapses a batch to one change per file: the first change's type and old
 * text, the last change's new text, every description and each distinct
 * conflict in order.
 */
export function squashChanges(changes: ConfigChange[]): ConfigChange[] {
  const byFile = new Map<string, ConfigChange>();

  for (const change of changes) {
    const previous = byFile.get(change.filePath);
    if (!previous) {
      byFile.set(change.filePath, { ...change, conflicts: [...change.conflicts] });
      continue;
    }
    byFile.set(change.filePath, {
      ...previous,
      newContent: change.newContent,
      description: `${previous.description}; ${change.description}`,
      conflicts: [...new Set([...previous.conflicts, ...change.conflicts])],
    });
  }

  return [...byFile.values()];
}

export function isNoopChange(change: ConfigChange): boolean {
  return change.changeType === 'update' && change.oldContent === change.newContent;
}
