import type { DiffFile, DiffLine, FileStatus, Hunk, ParsedDiff } from '../types.js';
import { ParseError } from './errors.js';
import { diffContentHash, postImageLineId, preImageLineId } from './line-id.js';

const GIT_DIFF_HEADER = /^diff --git "?a\/(.+?)"? "?b\/(.+?)"?$/;
const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@ ?(.*)$/;
const DEV_NULL = '/dev/null';

interface FileBuilder {
  file: DiffFile;
  sawOldHeader: boolean;
  sawNewHeader: boolean;
}

interface OpenHunk {
  hunk: Hunk;
  oldRemaining: number;
  newRemaining: number;
  oldCursor: number;
  newCursor: number;
}

function stripPathPrefix(raw: string, prefix: 'a/' | 'b/'): string {
  // plain diffs may carry a tab-separated timestamp after the path
  const path = raw.split('\t')[0].trim().replace(/^"(.*)"$/, '$1');
  if (path === DEV_NULL) return path;
  return path.startsWith(prefix) ? path.slice(prefix.length) : path;
}

function newFile(path: string, oldPath: string): FileBuilder {
  return {
    file: { path, oldPath, status: 'modified', binary: false, hunks: [] },
    sawOldHeader: false,
    sawNewHeader: false,
  };
}

function resolveStatus(file: DiffFile, explicit: FileStatus | null): FileStatus {
  if (explicit) return explicit;
  return file.oldPath !== file.path ? 'renamed' : 'modified';
}

/**
 * Parse unified diff text into files, hunks and addressable lines.
 *
 * Hunks are closed by their header counts, so content lines that happen to
 * start with `---` or `+++` are read as removed/added lines while a hunk is
 * open. Binary files yield a file with no hunks.
 */
export function parseUnifiedDiff(raw: string): ParsedDiff {
  const normalized = raw.replace(/\r\n/g, '\n');
  const lines = normalized.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  const files: DiffFile[] = [];
  let current: FileBuilder | null = null;
  let explicitStatus: FileStatus | null = null;
  let open: OpenHunk | null = null;
  let ordinal = 0;

  const finishFile = () => {
    if (current) {
      current.file.status = resolveStatus(current.file, explicitStatus);
      files.push(current.file);
    }
    current = null;
    explicitStatus = null;
  };

  const closeHunk = (state: OpenHunk, builder: FileBuilder) => {
    builder.file.hunks.push(state.hunk);
    open = null;
  };

  for (let i = 0; i < lines.length; i++) {
    const text = lines[i];
    const lineNo = i + 1;

    if (open !== null && current !== null) {
      const state: OpenHunk = open;
      const builder: FileBuilder = current;
      const path = builder.file.path;

      if (text.startsWith('\\')) {
        continue;
      }

      const prefix = text.length === 0 ? ' ' : text[0];
      const content = text.slice(1);
      let line: DiffLine;

      if (prefix === ' ') {
        if (state.oldRemaining === 0 || state.newRemaining === 0) {
          throw new ParseError({ line: lineNo, filePath: path }, 'context line exceeds hunk header counts');
        }
        line = {
          id: postImageLineId(path, state.newCursor),
          filePath: path,
          hunkIndex: state.hunk.index,
          kind: 'context',
          content,
          oldLineNumber: state.oldCursor,
          newLineNumber: state.newCursor,
        };
        state.oldCursor++;
        state.newCursor++;
        state.oldRemaining--;
        state.newRemaining--;
      } else if (prefix === '+') {
        if (state.newRemaining === 0) {
          throw new ParseError({ line: lineNo, filePath: path }, 'added line exceeds hunk header counts');
        }
        line = {
          id: postImageLineId(path, state.newCursor),
          filePath: path,
          hunkIndex: state.hunk.index,
          kind: 'added',
          content,
          newLineNumber: state.newCursor,
        };
        state.newCursor++;
        state.newRemaining--;
      } else if (prefix === '-') {
        if (state.oldRemaining === 0) {
          throw new ParseError({ line: lineNo, filePath: path }, 'removed line exceeds hunk header counts');
        }
        line = {
          id: preImageLineId(path, state.oldCursor),
          filePath: path,
          hunkIndex: state.hunk.index,
          kind: 'removed',
          content,
          oldLineNumber: state.oldCursor,
        };
        state.oldCursor++;
        state.oldRemaining--;
      } else {
        throw new ParseError(
          { line: lineNo, filePath: path },
          `unterminated hunk: expected ${state.oldRemaining} old and ${state.newRemaining} new lines`
        );
      }

      state.hunk.lines.push(line);
      if (state.oldRemaining === 0 && state.newRemaining === 0) {
        closeHunk(state, builder);
      }
      continue;
    }

    const gitHeader = text.match(GIT_DIFF_HEADER);
    if (gitHeader) {
      finishFile();
      current = newFile(gitHeader[2], gitHeader[1]);
      continue;
    }

    if (text.startsWith('--- ')) {
      const builder: FileBuilder | null = current;
      if (builder === null || builder.sawOldHeader || builder.file.hunks.length > 0) {
        finishFile();
        const oldPath = stripPathPrefix(text.slice(4), 'a/');
        current = newFile(oldPath, oldPath);
      }
      const target: FileBuilder | null = current;
      if (target !== null) {
        const oldPath = stripPathPrefix(text.slice(4), 'a/');
        target.sawOldHeader = true;
        if (oldPath === DEV_NULL) {
          explicitStatus = 'added';
        } else {
          target.file.oldPath = oldPath;
        }
      }
      continue;
    }

    if (text.startsWith('+++ ') && current !== null) {
      const builder: FileBuilder = current;
      const newPath = stripPathPrefix(text.slice(4), 'b/');
      builder.sawNewHeader = true;
      if (newPath === DEV_NULL) {
        explicitStatus = 'removed';
        builder.file.path = builder.file.oldPath;
      } else {
        builder.file.path = newPath;
        if (explicitStatus === 'added') {
          builder.file.oldPath = newPath;
        }
      }
      continue;
    }

    if (text.startsWith('@@')) {
      const match = text.match(HUNK_HEADER);
      if (!match) {
        throw new ParseError({ line: lineNo, filePath: current?.file.path }, `malformed hunk header "${text}"`);
      }
      if (current === null) {
        throw new ParseError({ line: lineNo }, 'hunk header before any file header');
      }
      const builder: FileBuilder = current;
      const oldStart = parseInt(match[1], 10);
      const oldLines = match[2] === undefined ? 1 : parseInt(match[2], 10);
      const newStart = parseInt(match[3], 10);
      const newLines = match[4] === undefined ? 1 : parseInt(match[4], 10);

      const state: OpenHunk = {
        hunk: {
          filePath: builder.file.path,
          index: builder.file.hunks.length,
          ordinal: ordinal++,
          header: text,
          section: match[5].trim(),
          oldStart,
          oldLines,
          newStart,
          newLines,
          lines: [],
        },
        oldRemaining: oldLines,
        newRemaining: newLines,
        // a zero-length side starts at the line before the change
        oldCursor: oldLines === 0 ? oldStart + 1 : oldStart,
        newCursor: newLines === 0 ? newStart + 1 : newStart,
      };
      open = state;
      if (oldLines === 0 && newLines === 0) {
        closeHunk(state, builder);
      }
      continue;
    }

    if (current === null) {
      // preamble such as a commit message
      continue;
    }

    const builder: FileBuilder = current;
    if (text.startsWith('new file mode')) {
      explicitStatus = 'added';
    } else if (text.startsWith('deleted file mode')) {
      explicitStatus = 'removed';
    } else if (text.startsWith('rename from ')) {
      builder.file.oldPath = text.slice('rename from '.length).trim();
      explicitStatus = 'renamed';
    } else if (text.startsWith('rename to ')) {
      builder.file.path = text.slice('rename to '.length).trim();
      explicitStatus = 'renamed';
    } else if (text.startsWith('GIT binary patch') || (text.startsWith('Binary files ') && text.endsWith(' differ'))) {
      builder.file.binary = true;
    }
  }

  const pending: OpenHunk | null = open;
  if (pending !== null) {
    throw new ParseError(
      { line: lines.length, filePath: pending.hunk.filePath },
      `unterminated hunk at end of input: expected ${pending.oldRemaining} old and ${pending.newRemaining} new lines`
    );
  }
  finishFile();

  return {
    files,
    contentHash: diffContentHash(normalized),
  };
}

export function reviewableLines(diff: ParsedDiff): DiffLine[] {
  const result: DiffLine[] = [];
  for (const file of diff.files) {
    if (file.binary) continue;
    for (const hunk of file.hunks) {
      for (const line of hunk.lines) {
        if (line.kind === 'added') result.push(line);
      }
    }
  }
  return result;
}

export function allHunks(diff: ParsedDiff): Hunk[] {
  return diff.files.flatMap(file => file.hunks).sort((a, b) => a.ordinal - b.ordinal);
}
