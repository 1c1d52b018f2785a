import type { DiffFile, Hunk, LineRange } from '../types.js';
import type { LanguageAnalyzer, ScopeID } from './types.js';
import {
  branchDeltaOf,
  countPattern,
  findHunk,
  indentationOf,
  postImagePrefix,
  scopeId,
  stripComments,
  stripStrings,
} from './common.js';

export interface IndentationLanguageConfig {
  name: string;
  extensions: string[];
  branchPattern: RegExp;
  definitionPattern: RegExp;
  declarativePatterns: RegExp[];
  lineComment: string[];
}

/**
 * Heuristic analyzer for languages whose blocks are delimited by
 * indentation. The enclosing scope is the nearest definition above the target
 * line with a smaller indent.
 */
export class IndentationAnalyzer implements LanguageAnalyzer {
  readonly name: string;
  readonly extensions: readonly string[];
  readonly lineComment: readonly string[];

  constructor(private readonly config: IndentationLanguageConfig) {
    this.name = config.name;
    this.extensions = config.extensions;
    this.lineComment = config.lineComment;
  }

  private code(content: string): string {
    return stripComments(stripStrings(content), this.lineComment);
  }

  countBranches(content: string): number {
    return countPattern(this.code(content), this.config.branchPattern);
  }

  definitionName(content: string): string | null {
    const match = this.code(content).match(this.config.definitionPattern);
    return match?.groups?.name ?? null;
  }

  isDeclarative(content: string): boolean {
    const code = this.code(content).trim();
    if (code.length === 0) return true;
    return this.config.declarativePatterns.some(pattern => pattern.test(code));
  }

  branchDelta(hunk: Hunk): number {
    return branchDeltaOf(hunk, content => this.countBranches(content));
  }

  detectScope(file: DiffFile, range: LineRange): ScopeID {
    const hunk = findHunk(file, range.start);
    if (!hunk) return scopeId(file.path, null);

    const prefix = postImagePrefix(hunk, range.start);
    const target = prefix[prefix.length - 1];
    const ownName = this.definitionName(target.content);
    if (ownName) return scopeId(file.path, ownName);

    let indent = target.content.trim().length === 0 ? Number.POSITIVE_INFINITY : indentationOf(target.content);

    for (let i = prefix.length - 2; i >= 0; i--) {
      const content = prefix[i].content;
      if (content.trim().length === 0) continue;
      const lineIndent = indentationOf(content);
      if (lineIndent >= indent) continue;

      const name = this.definitionName(content);
      if (name) return scopeId(file.path, name);
      indent = lineIndent;
      if (indent === 0) break;
    }

    if (hunk.section && indent > 0) {
      return scopeId(file.path, this.definitionName(hunk.section) ?? hunk.section);
    }
    return scopeId(file.path, null);
  }
}

export const pythonAnalyzer = new IndentationAnalyzer({
  name: 'python',
  extensions: ['.py', '.pyi'],
  branchPattern: /\b(?:if|elif|for|while|except)\b|\band\b|\bor\b/,
  definitionPattern: /^\s*(?:async\s+)?(?:def|class)\s+(?<name>[A-Za-z_]\w*)/,
  declarativePatterns: [
    /^(?:from\s+\S+\s+)?import\b/,
    /^@[\w.]+(?:\(.*\))?$/,
    /^[\w]+\s*:\s*[\w[\], .|]+$/,
    /^(?:pass|\.\.\.)$/,
  ],
  lineComment: ['#'],
});

export const rubyAnalyzer = new IndentationAnalyzer({
  name: 'ruby',
  extensions: ['.rb', '.rake'],
  branchPattern: /\b(?:if|elsif|unless|while|until|when|rescue)\b|&&|\|\|/,
  definitionPattern: /^\s*(?:def\s+(?:self\.)?|class\s+|module\s+)(?<name>[A-Za-z_][\w:]*[?!]?)/,
  declarativePatterns: [
    /^(?:require|require_relative|include|extend)\b/,
    /^end$/,
  ],
  lineComment: ['#'],
});
