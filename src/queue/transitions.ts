import type { LineStatus } from '../types.js';

interface StatusDefinition {
  isResolved: boolean;
  canTransitionTo: LineStatus[];
  description: string;
}

const STATUS_DEFINITIONS: Record<LineStatus, StatusDefinition> = {
  UNREVIEWED: {
    isResolved: false,
    canTransitionTo: ['SKIMMED', 'DEEP_REVIEWED', 'FILTERED'],
    description: 'Not yet looked at',
  },

  SKIMMED: {
    isResolved: true,
    canTransitionTo: ['DEEP_REVIEWED', 'UNREVIEWED'],
    description: 'Approved in bulk without per-line confirmation',
  },

  DEEP_REVIEWED: {
    isResolved: true,
    canTransitionTo: ['UNREVIEWED'],
    description: 'Confirmed hunk by hunk in a deep dive',
  },

  FILTERED: {
    isResolved: true,
    canTransitionTo: ['UNREVIEWED'],
    description: 'Excluded as low-signal (formatting, vendored, generated)',
  },
};

export function isResolvedStatus(status: LineStatus): boolean {
  return STATUS_DEFINITIONS[status].isResolved;
}

export function canTransition(from: LineStatus, to: LineStatus): boolean {
  return STATUS_DEFINITIONS[from].canTransitionTo.includes(to);
}
