import { describe, it, expect } from 'vitest';
import { parseUnifiedDiff } from '../../diff/parser.js';
import { LineQueue, percentReviewed } from '../../queue/line-queue.js';
import { InvalidSelectorError } from '../../queue/errors.js';
import { canTransition, isResolvedStatus } from '../../queue/transitions.js';
import { preImageLineId } from '../../diff/line-id.js';
import type { LineID, LineStatus } from '../../types.js';
import { APP_DIFF, appLine, readmeLine } from '../helpers/fixtures.js';

function queue(): LineQueue {
  return new LineQueue(parseUnifiedDiff(APP_DIFF));
}

describe('LineQueue', () => {
  it('starts every reviewable line UNREVIEWED', () => {
    const q = queue();
    expect(q.total).toBe(5);
    expect(q.breakdown()).toEqual({ UNREVIEWED: 5, SKIMMED: 0, DEEP_REVIEWED: 0, FILTERED: 0, total: 5 });
    expect(q.filesTouched()).toEqual(['src/app.ts', 'README.md']);
    expect(q.linesInFile('src/app.ts')).toEqual([appLine(2), appLine(3), appLine(4), appLine(13)]);
  });

  it('never counts context or removed lines', () => {
    const q = queue();
    expect(q.isReviewable(appLine(1))).toBe(false);
    expect(q.isReviewable(preImageLineId('src/app.ts', 2))).toBe(false);
  });

  it('applies a bulk transition and reports unchanged lines', () => {
    const q = queue();
    q.applyBulk([appLine(2)], 'SKIMMED');

    const result = q.applyBulk([appLine(2), appLine(3), appLine(3)], 'SKIMMED');
    expect(result.changed).toEqual([appLine(3)]);
    expect(result.unchanged).toEqual([appLine(2)]);
    expect(q.remainingCount()).toBe(3);
    expect(q.breakdown().SKIMMED).toBe(2);
  });

  it('rejects the whole call when one id is unknown', () => {
    const q = queue();
    const before = q.snapshot();

    try {
      q.applyBulk([appLine(2), 'ffffffffffffffff'], 'SKIMMED', 'lines:test');
      expect.fail('expected InvalidSelectorError');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidSelectorError);
      if (error instanceof InvalidSelectorError) {
        expect(error.offending).toEqual(['ffffffffffffffff']);
        expect(error.reason).toBe('1 unknown line id(s)');
      }
    }
    expect(q.snapshot()).toEqual(before);
  });

  it('names non-reviewable ids separately from unknown ones', () => {
    expect(() => queue().applyBulk([appLine(1)], 'SKIMMED')).toThrow('1 line(s) are not reviewable');
  });

  it('leaves lines without an allowed transition unchanged', () => {
    const q = queue();
    q.applyBulk([readmeLine(2)], 'FILTERED');

    const result = q.applyBulk([readmeLine(2)], 'SKIMMED');
    expect(result.changed).toEqual([]);
    expect(q.status(readmeLine(2))).toBe('FILTERED');
  });

  it('tracks files that still have unreviewed lines', () => {
    const q = queue();
    q.applyBulk(q.linesInFile('README.md'), 'SKIMMED');
    expect(q.filesWithRemaining()).toEqual(['src/app.ts']);
  });

  it('restores a snapshot', () => {
    const q = queue();
    const saved = q.snapshot();
    q.applyBulk(q.reviewableIds(), 'DEEP_REVIEWED');
    expect(q.remainingCount()).toBe(0);

    q.restore(saved);
    expect(q.remainingCount()).toBe(5);
    expect(q.breakdown().DEEP_REVIEWED).toBe(0);
  });

  it('keeps prior statuses for ids still in the diff', () => {
    const prior = new Map<LineID, LineStatus>([[appLine(3), 'SKIMMED'], ['0000000000000000', 'FILTERED']]);
    const q = new LineQueue(parseUnifiedDiff(APP_DIFF), prior);
    expect(q.status(appLine(3))).toBe('SKIMMED');
    expect(q.breakdown()).toEqual({ UNREVIEWED: 4, SKIMMED: 1, DEEP_REVIEWED: 0, FILTERED: 0, total: 5 });
  });
});

describe('status transitions', () => {
  it('allows moving out of UNREVIEWED to every resolved status', () => {
    expect(canTransition('UNREVIEWED', 'SKIMMED')).toBe(true);
    expect(canTransition('UNREVIEWED', 'DEEP_REVIEWED')).toBe(true);
    expect(canTransition('UNREVIEWED', 'FILTERED')).toBe(true);
  });

  it('allows upgrading a skim to a deep review but not the reverse', () => {
    expect(canTransition('SKIMMED', 'DEEP_REVIEWED')).toBe(true);
    expect(canTransition('DEEP_REVIEWED', 'SKIMMED')).toBe(false);
    expect(canTransition('FILTERED', 'SKIMMED')).toBe(false);
  });

  it('lets every resolved status reopen', () => {
    expect(canTransition('SKIMMED', 'UNREVIEWED')).toBe(true);
    expect(canTransition('DEEP_REVIEWED', 'UNREVIEWED')).toBe(true);
    expect(canTransition('FILTERED', 'UNREVIEWED')).toBe(true);
    expect(isResolvedStatus('UNREVIEWED')).toBe(false);
  });
});

describe('percentReviewed', () => {
  it('floors the percentage', () => {
    expect(percentReviewed({ UNREVIEWED: 2, SKIMMED: 1, DEEP_REVIEWED: 0, FILTERED: 0, total: 3 })).toBe(33);
  });

  it('is 100 for an empty diff', () => {
    expect(percentReviewed({ UNREVIEWED: 0, SKIMMED: 0, DEEP_REVIEWED: 0, FILTERED: 0, total: 0 })).toBe(100);
  });
});
