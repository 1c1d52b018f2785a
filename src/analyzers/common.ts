import type { DiffFile, DiffLine, Hunk } from '../types.js';
import { TOP_LEVEL_SCOPE } from './types.js';
import type { ScopeID } from './types.js';

const STRING_LITERAL = /(["'`])(?:\\.|(?!\1).)*\1/g;

export function stripStrings(content: string): string {
  return content.replace(STRING_LITERAL, '""');
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Remove line and inline block comments. A line-comment token only counts at
 * the start of the line or after whitespace, so `http://` survives.
 */
export function stripComments(
  content: string,
  lineComment: readonly string[],
  blockComment?: readonly [string, string]
): string {
  let result = content;

  if (blockComment) {
    const [open, close] = blockComment;
    const inline = new RegExp(`${escapeRegExp(open)}.*?${escapeRegExp(close)}`, 'g');
    result = result.replace(inline, ' ');
    const openAt = result.indexOf(open);
    if (openAt !== -1) {
      result = result.slice(0, openAt);
    }
    // inside or closing a multi-line block comment
    const trimmed = result.trim();
    if (trimmed.endsWith(close) || /^\*(\s|$)/.test(trimmed)) {
      return '';
    }
  }

  for (const token of lineComment) {
    const pattern = new RegExp(`(^|\\s)${escapeRegExp(token)}.*$`);
    result = result.replace(pattern, '$1');
  }

  return result;
}

export function countPattern(content: string, pattern: RegExp): number {
  const flags = pattern.flags.includes('g') ? pattern.flags : pattern.flags + 'g';
  const matches = content.match(new RegExp(pattern.source, flags));
  return matches ? matches.length : 0;
}

export function indentationOf(content: string): number {
  const match = content.match(/^[ \t]*/);
  if (!match) return 0;
  return match[0].replace(/\t/g, '    ').length;
}

export function findHunk(file: DiffFile, newLineNumber: number): Hunk | undefined {
  return file.hunks.find(hunk =>
    hunk.lines.some(line => line.kind !== 'removed' && line.newLineNumber === newLineNumber)
  );
}

/** Post-image lines of the hunk up to and including `newLineNumber`. */
export function postImagePrefix(hunk: Hunk, newLineNumber: number): DiffLine[] {
  const result: DiffLine[] = [];
  for (const line of hunk.lines) {
    if (line.kind === 'removed') continue;
    result.push(line);
    if (line.newLineNumber === newLineNumber) break;
  }
  return result;
}

export function scopeId(filePath: string, name: string | null): ScopeID {
  return `${filePath}::${name ?? TOP_LEVEL_SCOPE}`;
}

export function branchDeltaOf(hunk: Hunk, countBranches: (content: string) => number): number {
  let delta = 0;
  for (const line of hunk.lines) {
    if (line.kind === 'added') delta += countBranches(line.content);
    if (line.kind === 'removed') delta -= countBranches(line.content);
  }
  return delta;
}
