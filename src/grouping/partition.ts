import type { DiffLine, Group, SchemeName } from '../types.js';
import type { GroupKey } from './types.js';

export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Assign each line to exactly one group by key. Member order follows the
 * input (diff) order; groups are ordered by primary path, then id.
 */
export function partitionLines(
  scheme: SchemeName,
  lines: readonly DiffLine[],
  keyOf: (line: DiffLine) => GroupKey
): Group[] {
  const groups = new Map<string, Group>();

  for (const line of lines) {
    const { key, label } = keyOf(line);
    const id = `${scheme}:${key}`;
    const existing = groups.get(id);
    if (existing) {
      existing.lineIds.push(line.id);
      if (line.filePath < existing.primaryPath) {
        existing.primaryPath = line.filePath;
      }
    } else {
      groups.set(id, {
        id,
        label,
        scheme,
        primaryPath: line.filePath,
        lineIds: [line.id],
      });
    }
  }

  return Array.from(groups.values()).sort(
    (a, b) => compareCodeUnits(a.primaryPath, b.primaryPath) || compareCodeUnits(a.id, b.id)
  );
}
