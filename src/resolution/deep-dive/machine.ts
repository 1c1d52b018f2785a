import type { Selector } from '../../types.js';
import { describeSelector } from '../../types.js';
import { logger } from '../../observability/logger.js';
import { DeepDiveStateError } from './errors.js';
import { acceptsEvent, describeCursor } from './states.js';
import type { DeepDiveCursor, DeepDiveEvent, DeepDiveStop } from './states.js';

function requireEvent(cursor: DeepDiveCursor | null, event: DeepDiveEvent): DeepDiveCursor {
  if (cursor === null) {
    throw new DeepDiveStateError(event, null, 'no deep dive is open');
  }
  if (!acceptsEvent(cursor.phase, event)) {
    logger.warn('deep_dive_rejected', 'Deep dive event not accepted in current phase', {
      event,
      cursor: describeCursor(cursor),
      selector: cursor.key,
    });
    throw new DeepDiveStateError(event, cursor.phase, `${cursor.key} is ${describeCursor(cursor)}`);
  }
  return cursor;
}

/**
 * Cursor transitions. Every function returns a new cursor and leaves its
 * argument untouched, so callers can discard the result if a later step
 * fails.
 */
export function openCursor(selector: Selector, stops: DeepDiveStop[]): DeepDiveCursor {
  const cursor: DeepDiveCursor = {
    selector,
    key: describeSelector(selector),
    stops,
    index: 0,
    phase: stops.length === 0 ? 'COMPLETED' : 'AT_HUNK',
  };
  logger.info('deep_dive_opened', 'Deep dive opened', {
    selector: cursor.key,
    hunks: stops.length,
  });
  return cursor;
}

export function confirmStop(current: DeepDiveCursor | null): { cursor: DeepDiveCursor; confirmed: DeepDiveStop } {
  const cursor = requireEvent(current, 'confirm');
  const confirmed = cursor.stops[cursor.index];
  const index = cursor.index + 1;
  const next: DeepDiveCursor = {
    ...cursor,
    index,
    phase: index >= cursor.stops.length ? 'COMPLETED' : 'AT_HUNK',
  };
  logger.debug('deep_dive_transition', 'Deep dive advanced', {
    selector: cursor.key,
    from: describeCursor(cursor),
    to: describeCursor(next),
  });
  return { cursor: next, confirmed };
}

export function suspendCursor(current: DeepDiveCursor | null): DeepDiveCursor {
  const cursor = requireEvent(current, 'cancel');
  return { ...cursor, phase: 'SUSPENDED' };
}

export function resumeCursor(current: DeepDiveCursor): DeepDiveCursor {
  if (current.phase !== 'SUSPENDED') return current;
  const cursor = requireEvent(current, 'resume');
  return { ...cursor, phase: 'AT_HUNK' };
}

export function currentStop(cursor: DeepDiveCursor): DeepDiveStop | null {
  return cursor.phase === 'COMPLETED' ? null : cursor.stops[cursor.index] ?? null;
}
