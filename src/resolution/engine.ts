import type { DiffLine, LineID, LineStatus, Selector } from '../types.js';
import { describeSelector } from '../types.js';
import type { AuditRecord, ResolutionAction, ReviewSession } from '../session/types.js';
import { InvalidSelectorError } from '../queue/errors.js';
import { enforceInvariants } from '../invariants/checker.js';
import { logger } from '../observability/logger.js';
import { FILE_PREFIX, resolveSelector } from './selector.js';
import { confirmStop, openCursor, resumeCursor, suspendCursor } from './deep-dive/machine.js';
import type { DeepDiveCursor, DeepDiveStop } from './deep-dive/states.js';

export type NamedFilter = 'formatting-only' | 'vendor' | 'generated';

export const NAMED_FILTERS: readonly NamedFilter[] = ['formatting-only', 'vendor', 'generated'];

export type LinePredicate = (line: DiffLine, tags: ReadonlySet<string>) => boolean;

export type FilterPredicate = NamedFilter | LinePredicate;

export type ReviewMode = 'skim' | 'deep' | 'file-mode' | 'filter';

export const REVIEW_MODES: readonly ReviewMode[] = ['skim', 'deep', 'file-mode', 'filter'];

export interface ResolutionResult {
  action: ResolutionAction;
  selector: string;
  tag?: string;
  changed: LineID[];
  unchanged: LineID[];
  remaining: number;
  cursor: DeepDiveCursor | null;
}

const NO_TAGS: ReadonlySet<string> = new Set();

export function isNamedFilter(value: string): value is NamedFilter {
  return NAMED_FILTERS.some(name => name === value);
}

export function isReviewMode(value: string): value is ReviewMode {
  return (REVIEW_MODES as readonly string[]).includes(value);
}

function record(
  session: ReviewSession,
  action: ResolutionAction,
  selector: string,
  changed: LineID[],
  unchanged: LineID[],
  tag?: string
): ResolutionResult {
  const at = new Date().toISOString();
  const entry: AuditRecord = { action, selector, changed: changed.length, at };
  if (tag) entry.tag = tag;
  session.audit.push(entry);
  session.updatedAt = at;

  logger.forChange(session.changeId).info('resolution_applied', `Resolution ${action} applied`, {
    selector,
    tag,
    changed: changed.length,
    unchanged: unchanged.length,
    remaining: session.queue.remainingCount(),
  });

  return {
    action,
    selector,
    tag,
    changed,
    unchanged,
    remaining: session.queue.remainingCount(),
    cursor: session.cursor,
  };
}

function transition(
  session: ReviewSession,
  action: ResolutionAction,
  selector: Selector,
  target: LineStatus,
  tag?: string
): ResolutionResult {
  const ids = resolveSelector(session, selector);
  const label = describeSelector(selector);
  const { changed, unchanged } = session.queue.applyBulk(ids, target, label);
  return record(session, action, label, changed, unchanged, tag);
}

/** Mark every member line as skimmed. Lines already resolved are left as they are. */
export function skim(session: ReviewSession, selector: Selector): ResolutionResult {
  return transition(session, 'skim', selector, 'SKIMMED');
}

/** Skim a whole file at once. */
export function fileMode(session: ReviewSession, path: string): ResolutionResult {
  return transition(session, 'file-mode', { kind: 'file', path }, 'SKIMMED', 'whole-file');
}

/** Send member lines back to the queue, whatever their status. */
export function reopen(session: ReviewSession, selector: Selector): ResolutionResult {
  return transition(session, 'reopen', selector, 'UNREVIEWED');
}

/**
 * Move every unreviewed line matching `predicate` to FILTERED. Matching
 * nothing is a valid outcome.
 */
export function filter(session: ReviewSession, predicate: FilterPredicate): ResolutionResult {
  const test: LinePredicate = typeof predicate === 'function'
    ? predicate
    : (_line, tags) => tags.has(predicate);
  const label = typeof predicate === 'function' ? `predicate:${predicate.name || 'custom'}` : predicate;

  const matching: LineID[] = [];
  for (const id of session.queue.linesWithStatus('UNREVIEWED')) {
    const line = session.queue.line(id);
    if (line && test(line, session.classifications.get(id) ?? NO_TAGS)) {
      matching.push(id);
    }
  }

  if (matching.length === 0) {
    return record(session, 'filter', label, [], []);
  }
  const { changed, unchanged } = session.queue.applyBulk(matching, 'FILTERED', label);
  return record(session, 'filter', label, changed, unchanged);
}

/** The selector's member lines split by hunk, in diff order. */
export function deepDiveStops(session: ReviewSession, ids: readonly LineID[]): DeepDiveStop[] {
  const members = new Set(ids);
  const stops: DeepDiveStop[] = [];

  for (const file of session.diff.files) {
    for (const hunk of file.hunks) {
      const lineIds = hunk.lines.filter(line => members.has(line.id)).map(line => line.id);
      if (lineIds.length === 0) continue;
      stops.push({
        filePath: file.path,
        hunkIndex: hunk.index,
        ordinal: hunk.ordinal,
        header: hunk.header,
        lineIds,
      });
    }
  }
  return stops;
}

function checkCursor(cursor: DeepDiveCursor): void {
  enforceInvariants({
    kind: 'cursor',
    selector: cursor.key,
    index: cursor.index,
    hunkCount: cursor.stops.length,
    completed: cursor.phase === 'COMPLETED',
  });
}

/**
 * Open a hunk-by-hunk review of the selector. Re-opening the selector of a
 * suspended or in-progress deep dive resumes it where it stopped. A completed
 * deep dive or any other selector gets a fresh cursor.
 */
export function deepDive(session: ReviewSession, selector: Selector): ResolutionResult {
  const key = describeSelector(selector);
  const existing = session.cursor;

  let cursor: DeepDiveCursor;
  if (existing && existing.key === key && existing.phase !== 'COMPLETED') {
    cursor = resumeCursor(existing);
  } else {
    const ids = resolveSelector(session, selector);
    cursor = openCursor(selector, deepDiveStops(session, ids));
  }
  checkCursor(cursor);

  session.cursor = cursor;
  return record(session, 'deep-dive', key, [], []);
}

/** Mark the lines of the current hunk DEEP_REVIEWED and move to the next one. */
export function confirmHunk(session: ReviewSession): ResolutionResult {
  const { cursor, confirmed } = confirmStop(session.cursor);
  checkCursor(cursor);

  const { changed, unchanged } = session.queue.applyBulk(confirmed.lineIds, 'DEEP_REVIEWED', cursor.key);
  session.cursor = cursor;
  return record(session, 'deep-confirm', cursor.key, changed, unchanged, `hunk:${confirmed.filePath}#${confirmed.hunkIndex}`);
}

/** Suspend the deep dive without touching any line. */
export function cancelDeepDive(session: ReviewSession): ResolutionResult {
  const cursor = suspendCursor(session.cursor);
  session.cursor = cursor;
  return record(session, 'deep-cancel', cursor.key, [], []);
}

/**
 * Single entry point for the command surface's `review <selector> --mode`.
 * In filter mode the selector text is the filter name; in file-mode it is a
 * path, read as one even when a group of the active scheme shares the name.
 */
export function applyReviewMode(
  session: ReviewSession,
  mode: ReviewMode,
  selectorText: string,
  parse: (text: string) => Selector
): ResolutionResult {
  switch (mode) {
    case 'skim':
      return skim(session, parse(selectorText));
    case 'deep':
      return deepDive(session, parse(selectorText));
    case 'file-mode': {
      const trimmed = selectorText.trim();
      return fileMode(session, trimmed.startsWith(FILE_PREFIX) ? trimmed.slice(FILE_PREFIX.length) : trimmed);
    }
    case 'filter':
      if (!isNamedFilter(selectorText)) {
        throw new InvalidSelectorError(selectorText, `unknown filter, expected one of ${NAMED_FILTERS.join(', ')}`);
      }
      return filter(session, selectorText);
  }
}
