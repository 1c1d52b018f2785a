import type { GroupingScheme, LineID, Selector } from '../types.js';
import { describeSelector, isSchemeName } from '../types.js';
import type { ReviewSession } from '../session/types.js';
import { InvalidSelectorError } from '../queue/errors.js';
import { StaleGroupingError } from '../grouping/errors.js';
import { findGroup } from '../grouping/chunker.js';

const LINES_PREFIX = 'lines:';
export const FILE_PREFIX = 'file:';
const GROUP_PREFIX = 'group:';

/**
 * Read the text form used by the command surface:
 *
 *   lines:<id>,<id>   explicit line ids
 *   file:<path>       every reviewable line of a file
 *   group:<name>      a group of the active scheme
 *   <name>            a group of the active scheme if one matches, else a file
 */
export function parseSelector(session: ReviewSession, text: string): Selector {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new InvalidSelectorError(text, 'empty selector');
  }

  if (trimmed.startsWith(LINES_PREFIX)) {
    const ids = trimmed
      .slice(LINES_PREFIX.length)
      .split(',')
      .map(id => id.trim())
      .filter(id => id.length > 0);
    return { kind: 'lines', ids };
  }
  if (trimmed.startsWith(FILE_PREFIX)) {
    return { kind: 'file', path: trimmed.slice(FILE_PREFIX.length) };
  }
  if (trimmed.startsWith(GROUP_PREFIX)) {
    return { kind: 'group', name: trimmed.slice(GROUP_PREFIX.length) };
  }

  const scheme = schemeFor(session, trimmed);
  if (scheme && !scheme.stale && findGroup(scheme, trimmed)) {
    return { kind: 'group', name: trimmed };
  }
  if (session.queue.linesInFile(trimmed).length > 0) {
    return { kind: 'file', path: trimmed };
  }
  if (scheme?.stale) {
    throw new StaleGroupingError(scheme.name, `cannot look up "${trimmed}" while it is being computed`);
  }
  throw new InvalidSelectorError(trimmed, `no group in ${session.activeScheme} and no changed file by that name`);
}

/** A `<scheme>:` prefix naming a held scheme targets that scheme, otherwise the active one. */
function schemeFor(session: ReviewSession, name: string): GroupingScheme | undefined {
  const colon = name.indexOf(':');
  if (colon > 0) {
    const prefix = name.slice(0, colon);
    if (isSchemeName(prefix) && session.schemes.has(prefix)) {
      return session.schemes.get(prefix);
    }
  }
  return session.schemes.get(session.activeScheme);
}

/**
 * Member line ids of a selector, deduplicated, in the order the selector
 * gives them. Never returns an empty list.
 */
export function resolveSelector(session: ReviewSession, selector: Selector): LineID[] {
  const label = describeSelector(selector);

  switch (selector.kind) {
    case 'group': {
      const scheme = schemeFor(session, selector.name);
      if (!scheme) {
        throw new InvalidSelectorError(label, `scheme ${session.activeScheme} has not been built`);
      }
      if (scheme.stale) {
        throw new StaleGroupingError(scheme.name, 'group membership is still being computed');
      }
      const group = findGroup(scheme, selector.name);
      if (!group) {
        throw new InvalidSelectorError(label, `no group named "${selector.name}" in ${scheme.name}`);
      }
      return [...group.lineIds];
    }

    case 'file': {
      const ids = session.queue.linesInFile(selector.path);
      if (ids.length === 0) {
        throw new InvalidSelectorError(label, `no reviewable lines in ${selector.path}`);
      }
      return ids;
    }

    case 'lines': {
      const ids = Array.from(new Set(selector.ids));
      if (ids.length === 0) {
        throw new InvalidSelectorError(label, 'no line ids given');
      }
      const offending = ids.filter(id => !session.queue.isReviewable(id));
      if (offending.length > 0) {
        throw new InvalidSelectorError(label, `${offending.length} line id(s) are unknown or not reviewable`, offending);
      }
      return ids;
    }
  }
}


/** Files the selector touches, in first-member order. */
export function selectorFiles(session: ReviewSession, selector: Selector): string[] {
  const files = new Set<string>();
  for (const id of resolveSelector(session, selector)) {
    const line = session.queue.line(id);
    if (line) files.add(line.filePath);
  }
  return Array.from(files);
}
