import type { DiffFile, Hunk, LineRange } from '../types.js';
import type { LanguageAnalyzer, ScopeID } from './types.js';
import {
  branchDeltaOf,
  countPattern,
  findHunk,
  postImagePrefix,
  scopeId,
  stripComments,
  stripStrings,
} from './common.js';

export interface BraceLanguageConfig {
  name: string;
  extensions: string[];
  branchPattern: RegExp;
  definitionPatterns: RegExp[];
  declarativePatterns: RegExp[];
  lineComment?: string[];
}

const CONTROL_KEYWORDS = new Set(['if', 'for', 'while', 'switch', 'catch', 'return', 'function', 'else', 'do', 'try', 'new', 'await', 'typeof']);

const PUNCTUATION_ONLY = /^[\s{}()[\];,]*$/;

function countChar(content: string, char: string): number {
  let count = 0;
  for (const c of content) {
    if (c === char) count++;
  }
  return count;
}

/**
 * Heuristic analyzer for C-family languages. Scope detection walks back
 * through the hunk's post-image lines balancing braces until it reaches a
 * definition that opens a block around the target line.
 */
export class BraceAnalyzer implements LanguageAnalyzer {
  readonly name: string;
  readonly extensions: readonly string[];
  readonly lineComment: readonly string[];
  readonly blockComment: readonly [string, string] = ['/*', '*/'];

  constructor(private readonly config: BraceLanguageConfig) {
    this.name = config.name;
    this.extensions = config.extensions;
    this.lineComment = config.lineComment ?? ['//'];
  }

  private code(content: string): string {
    return stripComments(stripStrings(content), this.lineComment, this.blockComment);
  }

  countBranches(content: string): number {
    return countPattern(this.code(content), this.config.branchPattern);
  }

  definitionName(content: string): string | null {
    const code = this.code(content);
    for (const pattern of this.config.definitionPatterns) {
      const match = code.match(pattern);
      const name = match?.groups?.name;
      if (name && !CONTROL_KEYWORDS.has(name)) {
        return name;
      }
    }
    return null;
  }

  isDeclarative(content: string): boolean {
    const code = this.code(content).trim();
    if (PUNCTUATION_ONLY.test(code)) return true;
    return this.config.declarativePatterns.some(pattern => pattern.test(code));
  }

  branchDelta(hunk: Hunk): number {
    return branchDeltaOf(hunk, content => this.countBranches(content));
  }

  detectScope(file: DiffFile, range: LineRange): ScopeID {
    const hunk = findHunk(file, range.start);
    if (!hunk) return scopeId(file.path, null);

    const prefix = postImagePrefix(hunk, range.start);
    let balance = 0;

    for (let i = prefix.length - 1; i >= 0; i--) {
      const name = this.definitionName(prefix[i].content);

      if (i === prefix.length - 1) {
        if (name) return scopeId(file.path, name);
        continue;
      }

      const code = this.code(prefix[i].content);
      balance += countChar(code, '}') - countChar(code, '{');
      if (balance < 0) {
        if (name) return scopeId(file.path, name);
        // an anonymous block (if/for/object literal) around the target
        balance = 0;
      }
    }

    if (hunk.section) {
      return scopeId(file.path, this.definitionName(hunk.section) ?? hunk.section);
    }
    return scopeId(file.path, null);
  }
}

const IDENT = '[A-Za-z_$][\\w$]*';

export const typescriptAnalyzer = new BraceAnalyzer({
  name: 'typescript',
  extensions: ['.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs', '.mts', '.cts'],
  branchPattern: /\b(?:if|for|while|case|catch)\b|&&|\|\||\?\?/,
  definitionPatterns: [
    new RegExp(`\\bfunction\\*?\\s+(?<name>${IDENT})`),
    new RegExp(`\\b(?:class|interface|enum)\\s+(?<name>${IDENT})`),
    new RegExp(`\\btype\\s+(?<name>${IDENT})\\s*(?:<[^>]*>)?\\s*=`),
    new RegExp(`\\b(?:const|let|var)\\s+(?<name>${IDENT})\\s*(?::[^=]+)?=\\s*(?:async\\s+)?(?:function\\b|\\([^)]*\\)\\s*(?::[^=]+)?=>|${IDENT}\\s*=>)`),
    new RegExp(`^\\s*(?:(?:public|private|protected|static|readonly|async|override|get|set)\\s+)*(?<name>${IDENT})\\s*(?:<[^>]*>)?\\([^)]*\\)\\s*(?::\\s*[^={;]+)?\\{\\s*$`),
  ],
  declarativePatterns: [
    /^import\b/,
    /^export\s+(?:\*|\{[^}]*\})\s+from\b/,
    /^export\s+\{[^}]*\};?$/,
    /^(?:readonly\s+)?[\w$]+\??:\s*[^=()]+[;,]?$/,
    /^@\w+(?:\([^)]*\))?$/,
  ],
});

export const javaLikeAnalyzer = new BraceAnalyzer({
  name: 'java-like',
  extensions: ['.java', '.kt', '.kts', '.scala', '.cs', '.swift', '.dart'],
  branchPattern: /\b(?:if|for|foreach|while|case|catch|when)\b|&&|\|\|/,
  definitionPatterns: [
    new RegExp(`\\b(?:class|interface|enum|record|struct|object|protocol)\\s+(?<name>${IDENT})`),
    new RegExp(`\\b(?:fun|func|def)\\s+(?<name>${IDENT})`),
    new RegExp(`^\\s*(?:(?:public|private|protected|internal|static|final|abstract|override|virtual|async|synchronized)\\s+)*[\\w<>\\[\\],.?]+\\s+(?<name>${IDENT})\\s*\\([^)]*\\)\\s*(?:throws\\s+[\\w.,\\s]+)?\\{?\\s*$`),
  ],
  declarativePatterns: [
    /^(?:import|package|using)\b/,
    /^@\w+(?:\([^)]*\))?$/,
  ],
});

export const goAnalyzer = new BraceAnalyzer({
  name: 'go',
  extensions: ['.go'],
  branchPattern: /\b(?:if|for|case|select)\b|&&|\|\|/,
  definitionPatterns: [
    new RegExp(`\\bfunc\\s+(?:\\([^)]*\\)\\s*)?(?<name>${IDENT})`),
    new RegExp(`\\btype\\s+(?<name>${IDENT})\\s+(?:struct|interface)\\b`),
  ],
  declarativePatterns: [
    /^(?:import|package)\b/,
    /^"[^"]*"$/,
  ],
});

export const rustAnalyzer = new BraceAnalyzer({
  name: 'rust',
  extensions: ['.rs'],
  branchPattern: /\b(?:if|for|while|loop|match)\b|&&|\|\||\?;/,
  definitionPatterns: [
    new RegExp(`\\bfn\\s+(?<name>${IDENT})`),
    new RegExp(`\\b(?:struct|enum|trait|mod)\\s+(?<name>${IDENT})`),
    new RegExp(`\\bimpl(?:<[^>]*>)?\\s+(?:${IDENT}\\s+for\\s+)?(?<name>${IDENT})`),
  ],
  declarativePatterns: [
    /^(?:use|mod)\b.*;$/,
    /^#\[.*\]$/,
  ],
});

export const cAnalyzer = new BraceAnalyzer({
  name: 'c',
  extensions: ['.c', '.h', '.cc', '.cpp', '.cxx', '.hpp', '.hh', '.m'],
  branchPattern: /\b(?:if|for|while|case|catch)\b|&&|\|\|/,
  definitionPatterns: [
    new RegExp(`\\b(?:class|struct|union|enum|namespace)\\s+(?<name>${IDENT})\\s*(?:[:{]|$)`),
    new RegExp(`^\\s*(?:static\\s+|inline\\s+|virtual\\s+|const\\s+)*[\\w:<>*&]+[\\s*&]+(?<name>${IDENT}(?:::${IDENT})?)\\s*\\([^;]*\\)\\s*(?:const\\s*)?\\{?\\s*$`),
  ],
  declarativePatterns: [
    /^#\s*(?:include|pragma|define)\b/,
    /^using\b/,
  ],
});
