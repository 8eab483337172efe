import { basename } from 'node:path';

import { createTwoFilesPatch } from 'diff';

import type { ConfigChange } from './config-change.js';

const CONTEXT_LINES = 3;

/**
 * Unified diff for a proposed change. New files are diffed against
 * /dev/null so the whole content shows as additions.
 */
export function renderUnifiedDiff(change: ConfigChange, contextLines = CONTEXT_LINES): string {
  const name = basename(change.filePath);
  const oldLabel = change.changeType === 'create' ? '/dev/null' : `a/${name}`;
  return createTwoFilesPatch(oldLabel, `b/${name}`, change.oldContent ?? '', change.newContent, undefined, undefined, {
    context: contextLines,
  });
}

export function summarizeChange(change: ConfigChange): string {
  const lines = [
    `File: ${change.filePath}`,
    `Change Type: ${change.changeType === 'create' ? 'Create' : 'Update'}`,
    `Description: ${change.description}`,
  ];

  if (change.conflicts.length > 0) {
    lines.push(`Conflicts: ${change.conflicts.length}`);
    for (const conflict of change.conflicts) {
      lines.push(`  - ${conflict}`);
    }
  }

  return lines.join('\n');
}
