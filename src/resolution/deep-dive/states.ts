import type { LineID, Selector } from '../../types.js';

export type DeepDivePhase = 'AT_HUNK' | 'SUSPENDED' | 'COMPLETED';

export type DeepDiveEvent = 'confirm' | 'cancel' | 'resume';

/** One stop of a deep dive: the selector's member lines inside one hunk. */
export interface DeepDiveStop {
  filePath: string;
  hunkIndex: number;
  ordinal: number;
  header: string;
  lineIds: LineID[];
}

export interface DeepDiveCursor {
  selector: Selector;
  key: string;
  stops: DeepDiveStop[];
  index: number;
  phase: DeepDivePhase;
}

const ACCEPTED_EVENTS: Record<DeepDivePhase, readonly DeepDiveEvent[]> = {
  AT_HUNK: ['confirm', 'cancel'],
  SUSPENDED: ['resume'],
  COMPLETED: [],
};

export function acceptsEvent(phase: DeepDivePhase, event: DeepDiveEvent): boolean {
  return ACCEPTED_EVENTS[phase].includes(event);
}

export function isDeepDivePhase(value: unknown): value is DeepDivePhase {
  return typeof value === 'string' && value in ACCEPTED_EVENTS;
}

/** `AT_HUNK(1)`-style label, index shown zero-based. */
export function describeCursor(cursor: DeepDiveCursor): string {
  return cursor.phase === 'COMPLETED' ? 'COMPLETED' : `${cursor.phase}(${cursor.index})`;
}
