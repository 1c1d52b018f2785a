import type { AnalyzerRegistry } from '../analyzers/registry.js';
import { stripComments } from '../analyzers/common.js';
import type { LanguageAnalyzer } from '../analyzers/types.js';
import type { DiffLine, Group, LineID, ParsedDiff } from '../types.js';
import type { GroupingContext } from './types.js';
import { partitionLines } from './partition.js';

export const FORMATTING_ONLY_KEY = 'formatting-only';
export const LOGIC_KEY = 'logic';

/**
 * Comment- and whitespace-insensitive form of a line. All whitespace is
 * dropped, so `a b` and `ab` compare equal; that misses changes where
 * whitespace is significant.
 */
export function normalizeForComparison(content: string, analyzer: LanguageAnalyzer | null): string {
  const withoutComments = analyzer
    ? stripComments(content, analyzer.lineComment, analyzer.blockComment)
    : content;
  return withoutComments.replace(/\s+/g, '');
}

function classifyBlock(
  removed: DiffLine[],
  added: DiffLine[],
  analyzer: LanguageAnalyzer | null,
  result: Set<LineID>
): void {
  if (added.length === 0) return;

  const normalize = (line: DiffLine) => normalizeForComparison(line.content, analyzer);
  const removedForms = removed.map(normalize);
  const reflowed = removed.length > 0 && removedForms.join('') === added.map(normalize).join('');

  added.forEach((line, position) => {
    if (reflowed || (position < removedForms.length && removedForms[position] === normalize(line))) {
      result.add(line.id);
    }
  });
}

/**
 * Reviewable lines whose change only touches whitespace or comments. Each
 * added line is compared with the removed line at the same position in its
 * change block (a run of removed lines followed by a run of added lines).
 * An added line with no removed counterpart is new content, even when it is
 * blank or a comment.
 */
export function classifyFormatting(diff: ParsedDiff, analyzers: AnalyzerRegistry): Set<LineID> {
  const result = new Set<LineID>();

  for (const file of diff.files) {
    if (file.binary) continue;
    const analyzer = analyzers.forPath(file.path);

    for (const hunk of file.hunks) {
      let removed: DiffLine[] = [];
      let added: DiffLine[] = [];
      const flush = () => {
        classifyBlock(removed, added, analyzer, result);
        removed = [];
        added = [];
      };

      for (const line of hunk.lines) {
        if (line.kind === 'context') {
          flush();
        } else if (line.kind === 'removed') {
          if (added.length > 0) flush();
          removed.push(line);
        } else {
          added.push(line);
        }
      }
      flush();
    }
  }

  return result;
}

export function buildFormattingGroups(ctx: GroupingContext): Group[] {
  return partitionLines('formatting', ctx.reviewable, line =>
    ctx.formattingOnly.has(line.id)
      ? { key: FORMATTING_ONLY_KEY, label: FORMATTING_ONLY_KEY }
      : { key: LOGIC_KEY, label: LOGIC_KEY }
  );
}
