export interface LineMergeOutcome {
  content: string;
  added: string[];
}

/**
 * Appends each of `lines` that `existing` does not already contain, compared
 * after trimming. Existing text is kept byte for byte and in order, since
 * later patterns in files like `.gitignore` override earlier ones.
 */
export function mergeLines(existing: string, lines: string[]): LineMergeOutcome {
  const present = new Set(existing.split(/\r?\n/).map((line) => line.trim()));
  const added: string[] = [];

  for (const raw of lines) {
    const line = raw.trim();
    if (line === '' || present.has(line)) continue;
    present.add(line);
    added.push(line);
  }

  if (added.length === 0) {
    return { content: existing, added };
  }

  const prefix = existing === '' || existing.endsWith('\n') ? existing : `${existing}\n`;
  return { content: `${prefix}${added.join('\n')}\n`, added };
}
