import type { LineID, SchemeName, StatusBreakdown } from '../types.js';

export type InvariantSeverity = 'warn' | 'error' | 'fatal';

export type InvariantID =
  | 'QUEUE_SUM_MATCHES_TOTAL'
  | 'QUEUE_COUNTS_NON_NEGATIVE'
  | 'PARTITION_EXHAUSTIVE'
  | 'PARTITION_DISJOINT'
  | 'GROUPS_NON_EMPTY'
  | 'DEEP_DIVE_CURSOR_IN_RANGE';

export interface QueueSubject {
  kind: 'queue';
  breakdown: StatusBreakdown;
  totalReviewable: number;
}

export interface PartitionSubject {
  kind: 'partition';
  scheme: SchemeName;
  reviewableIds: readonly LineID[];
  groupMembers: ReadonlyArray<readonly LineID[]>;
}

export interface CursorSubject {
  kind: 'cursor';
  selector: string;
  index: number;
  hunkCount: number;
  completed: boolean;
}

/** The state an invariant is checked against. Each kind has its own rule set. */
export type InvariantSubject = QueueSubject | PartitionSubject | CursorSubject;

export interface InvariantDefinition<S extends InvariantSubject> {
  id: InvariantID;
  description: string;
  severity: InvariantSeverity;
  holds: (subject: S) => boolean;
}

export interface InvariantViolation {
  invariantId: InvariantID;
  subject: InvariantSubject['kind'];
  description: string;
  severity: InvariantSeverity;
  timestamp: string;
}

export interface InvariantCheckResult {
  passed: boolean;
  violations: InvariantViolation[];
}
