import type { LanguageAnalyzer } from '../analyzers/types.js';
import type { DiffLine, Hunk, LineID } from '../types.js';
import type { ReviewSession } from '../session/types.js';
import { logger } from '../observability/logger.js';
import type { CompletionClient } from './claude-client.js';
import type { DocSuggestion, PostProcessingHook } from './types.js';

const MAX_CLAUDE_SUGGESTIONS = 5;
const DOCSTRING_OPENERS = ['"""', "'''"];

export interface UndocumentedDefinition {
  line: DiffLine;
  hunk: Hunk;
  name: string;
}

function isCommentLine(content: string, analyzer: LanguageAnalyzer): boolean {
  const trimmed = content.trim();
  if (analyzer.lineComment.some(token => trimmed.startsWith(token))) return true;
  if (analyzer.blockComment) {
    const [open, close] = analyzer.blockComment;
    if (trimmed.startsWith(open) || trimmed.endsWith(close)) return true;
  }
  return trimmed.startsWith('* ') || trimmed === '*';
}

function neighbour(hunk: Hunk, line: DiffLine, step: -1 | 1): DiffLine | null {
  const position = hunk.lines.indexOf(line);
  for (let i = position + step; i >= 0 && i < hunk.lines.length; i += step) {
    const candidate = hunk.lines[i];
    if (candidate.kind === 'removed') continue;
    // decorators and attributes sit between a definition and its comment
    if (step === -1 && /^\s*(@|#\[)/.test(candidate.content)) continue;
    return candidate;
  }
  return null;
}

function isDocumented(hunk: Hunk, line: DiffLine, analyzer: LanguageAnalyzer): boolean {
  const above = neighbour(hunk, line, -1);
  if (above && isCommentLine(above.content, analyzer)) return true;

  const below = neighbour(hunk, line, 1);
  const first = below?.content.trim() ?? '';
  return DOCSTRING_OPENERS.some(opener => first.startsWith(opener));
}

/** Definitions among `ids` with no comment directly above (or docstring below). */
export function findUndocumentedDefinitions(session: ReviewSession, ids: readonly LineID[]): UndocumentedDefinition[] {
  const wanted = new Set(ids);
  const result: UndocumentedDefinition[] = [];

  for (const file of session.diff.files) {
    const analyzer = session.settings.analyzers.forPath(file.path);
    if (!analyzer || file.binary) continue;

    for (const hunk of file.hunks) {
      for (const line of hunk.lines) {
        if (line.kind !== 'added' || !wanted.has(line.id)) continue;
        const name = analyzer.definitionName(line.content);
        if (name && !isDocumented(hunk, line, analyzer)) {
          result.push({ line, hunk, name });
        }
      }
    }
  }
  return result;
}

export const missingDocSuggester: PostProcessingHook = {
  name: 'missing-doc-suggester',
  phase: 'resolution',
  run: ({ session, result }) => {
    if (!result || result.changed.length === 0) return {};
    const suggestions: DocSuggestion[] = findUndocumentedDefinitions(session, result.changed).map(found => ({
      filePath: found.line.filePath,
      line: found.line.newLineNumber ?? 0,
      definition: found.name,
      text: `${found.name} has no doc comment`,
      source: 'heuristic',
    }));
    return { suggestions };
  },
};

const SYSTEM_PROMPT =
  'You write documentation comments for code under review. ' +
  'Reply with the comment text only: one or two plain sentences, no comment delimiters, no code.';

function buildPrompt(found: UndocumentedDefinition): string {
  const body = found.hunk.lines
    .filter(line => line.kind !== 'removed')
    .map(line => line.content)
    .join('\n');
  return `File: ${found.line.filePath}\nDefinition: ${found.name}\n\n${body}`;
}

/** Resolution hook asking Claude for doc text; registered only when an API key is configured. */
export function createClaudeDocSuggester(client: CompletionClient): PostProcessingHook {
  return {
    name: 'claude-doc-suggester',
    phase: 'resolution',
    run: async ({ session, result }) => {
      if (!result || result.action !== 'deep-confirm' || result.changed.length === 0) return {};

      const candidates = findUndocumentedDefinitions(session, result.changed).slice(0, MAX_CLAUDE_SUGGESTIONS);
      const suggestions: DocSuggestion[] = [];

      for (const found of candidates) {
        const completion = await client.complete(SYSTEM_PROMPT, buildPrompt(found));
        if (!completion.text) continue;
        suggestions.push({
          filePath: found.line.filePath,
          line: found.line.newLineNumber ?? 0,
          definition: found.name,
          text: completion.text,
          source: 'claude',
        });
      }

      logger.forChange(session.changeId).info('claude_doc_suggestions', 'Claude doc suggestions generated', {
        candidates: candidates.length,
        suggestions: suggestions.length,
      });
      return { suggestions };
    },
  };
}
