import { describe, it, expect } from 'vitest';
import { checkInvariants, enforceInvariants } from '../../invariants/checker.js';
import { InvariantViolationError } from '../../invariants/violations.js';

describe('partition invariants', () => {
  it('passes an exhaustive disjoint partition', () => {
    const result = checkInvariants({
      kind: 'partition',
      scheme: 'file-type',
      reviewableIds: ['a', 'b', 'c'],
      groupMembers: [['a'], ['b', 'c']],
    });
    expect(result.passed).toBe(true);
  });

  it('reports a line missing from every group', () => {
    const result = checkInvariants({
      kind: 'partition',
      scheme: 'scope',
      reviewableIds: ['a', 'b'],
      groupMembers: [['a']],
    });
    expect(result.violations.map(v => [v.invariantId, v.subject])).toEqual([['PARTITION_EXHAUSTIVE', 'partition']]);
  });

  it('throws on a line shared by two groups', () => {
    expect(() =>
      enforceInvariants({ kind: 'partition', scheme: 'scope', reviewableIds: ['a'], groupMembers: [['a'], ['a']] })
    ).toThrow('Invariant violations: PARTITION_DISJOINT');
  });

  it('only logs non-fatal violations', () => {
    expect(() =>
      enforceInvariants({ kind: 'partition', scheme: 'commit', reviewableIds: [], groupMembers: [[]] })
    ).not.toThrow();
  });
});

describe('queue invariants', () => {
  it('throws when the status counts do not add up to the total', () => {
    expect(() =>
      enforceInvariants({
        kind: 'queue',
        breakdown: { UNREVIEWED: 1, SKIMMED: 1, DEEP_REVIEWED: 0, FILTERED: 0, total: 3 },
        totalReviewable: 3,
      })
    ).toThrow(InvariantViolationError);
  });

  it('flags negative counts', () => {
    const result = checkInvariants({
      kind: 'queue',
      breakdown: { UNREVIEWED: 3, SKIMMED: -1, DEEP_REVIEWED: 0, FILTERED: 0, total: 2 },
      totalReviewable: 2,
    });
    expect(result.violations.map(v => v.invariantId)).toEqual(['QUEUE_COUNTS_NON_NEGATIVE']);
  });
});

describe('deep-dive cursor invariant', () => {
  it('accepts a completed cursor past the last hunk', () => {
    const result = checkInvariants({ kind: 'cursor', selector: 'file:a.ts', index: 2, hunkCount: 2, completed: true });
    expect(result.passed).toBe(true);
  });

  it('flags an open cursor past the last hunk', () => {
    const result = checkInvariants({ kind: 'cursor', selector: 'file:a.ts', index: 2, hunkCount: 2, completed: false });
    expect(result.violations).toMatchObject([{ invariantId: 'DEEP_DIVE_CURSOR_IN_RANGE', severity: 'error' }]);
  });
});
