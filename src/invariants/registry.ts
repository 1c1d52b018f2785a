import type { LineID } from '../types.js';
import type {
  CursorSubject,
  InvariantDefinition,
  InvariantSeverity,
  InvariantSubject,
  InvariantID,
  PartitionSubject,
  QueueSubject,
} from './types.js';

const QUEUE_INVARIANTS: InvariantDefinition<QueueSubject>[] = [
  {
    id: 'QUEUE_SUM_MATCHES_TOTAL',
    description: 'Unreviewed + Skimmed + DeepReviewed + Filtered must equal the reviewable line total',
    severity: 'fatal',
    holds: ({ breakdown: b, totalReviewable }) =>
      b.UNREVIEWED + b.SKIMMED + b.DEEP_REVIEWED + b.FILTERED === totalReviewable && b.total === totalReviewable,
  },
  {
    id: 'QUEUE_COUNTS_NON_NEGATIVE',
    description: 'Per-status line counts must never be negative',
    severity: 'fatal',
    holds: ({ breakdown: b }) => b.UNREVIEWED >= 0 && b.SKIMMED >= 0 && b.DEEP_REVIEWED >= 0 && b.FILTERED >= 0,
  },
];

const PARTITION_INVARIANTS: InvariantDefinition<PartitionSubject>[] = [
  {
    id: 'PARTITION_EXHAUSTIVE',
    description: 'Every reviewable line must belong to a group of the scheme',
    severity: 'fatal',
    holds: ({ reviewableIds, groupMembers }) => {
      const covered = new Set<LineID>(groupMembers.flat());
      return covered.size === reviewableIds.length && reviewableIds.every(id => covered.has(id));
    },
  },
  {
    id: 'PARTITION_DISJOINT',
    description: 'No line may belong to two groups of the same scheme',
    severity: 'fatal',
    holds: ({ groupMembers }) => {
      const all = groupMembers.flat();
      return new Set(all).size === all.length;
    },
  },
  {
    id: 'GROUPS_NON_EMPTY',
    description: 'Groups of a scheme must have at least one member',
    severity: 'error',
    holds: ({ groupMembers }) => groupMembers.every(members => members.length > 0),
  },
];

const CURSOR_INVARIANTS: InvariantDefinition<CursorSubject>[] = [
  {
    id: 'DEEP_DIVE_CURSOR_IN_RANGE',
    description: 'An open deep-dive cursor must point at an existing hunk',
    severity: 'error',
    holds: ({ index, hunkCount, completed }) =>
      completed ? index === hunkCount : index >= 0 && index < hunkCount,
  },
];

/** An invariant applied to one subject, ready to evaluate. */
export interface BoundInvariant {
  id: InvariantID;
  description: string;
  severity: InvariantSeverity;
  evaluate: () => boolean;
}

function bind<S extends InvariantSubject>(definitions: InvariantDefinition<S>[], subject: S): BoundInvariant[] {
  return definitions.map(({ holds, ...definition }) => ({ ...definition, evaluate: () => holds(subject) }));
}

export function invariantsFor(subject: InvariantSubject): BoundInvariant[] {
  switch (subject.kind) {
    case 'queue':
      return bind(QUEUE_INVARIANTS, subject);
    case 'partition':
      return bind(PARTITION_INVARIANTS, subject);
    case 'cursor':
      return bind(CURSOR_INVARIANTS, subject);
  }
}
