import { TOP_LEVEL_SCOPE } from '../analyzers/types.js';
import type { DiffFile, Group } from '../types.js';
import type { GroupingContext } from './types.js';
import { partitionLines } from './partition.js';

function scopeLabel(scopeId: string, filePath: string): string {
  const name = scopeId.slice(filePath.length + 2);
  if (name === TOP_LEVEL_SCOPE) return filePath;
  return `${name} (${filePath})`;
}

/**
 * One group per enclosing definition. Files without a registered analyzer
 * form a single whole-file group.
 */
export function buildScopeGroups(ctx: GroupingContext): Group[] {
  const files = new Map<string, DiffFile>(ctx.diff.files.map(file => [file.path, file]));

  return partitionLines('scope', ctx.reviewable, line => {
    const file = files.get(line.filePath);
    const analyzer = ctx.analyzers.forPath(line.filePath);
    if (!file || !analyzer || line.newLineNumber === undefined) {
      return { key: line.filePath, label: line.filePath };
    }

    const scopeId = analyzer.detectScope(file, { start: line.newLineNumber, end: line.newLineNumber });
    return { key: scopeId, label: scopeLabel(scopeId, line.filePath) };
  });
}
