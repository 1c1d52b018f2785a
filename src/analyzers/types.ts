import type { DiffFile, Hunk, LineRange } from '../types.js';

/** `<file path>::<enclosing definition>`; `<file path>::<top-level>` outside any definition. */
export type ScopeID = string;

export const TOP_LEVEL_SCOPE = '<top-level>';

/**
 * Per-language capability used by the scope grouping, the formatting
 * classifier and the complexity scorer. Implementations are heuristics over
 * diff text; nothing here parses a full syntax tree.
 */
export interface LanguageAnalyzer {
  readonly name: string;
  readonly extensions: readonly string[];
  readonly lineComment: readonly string[];
  readonly blockComment?: readonly [string, string];

  detectScope(file: DiffFile, range: LineRange): ScopeID;
  branchDelta(hunk: Hunk): number;
  countBranches(content: string): number;
  definitionName(content: string): string | null;
  isDeclarative(content: string): boolean;
}
