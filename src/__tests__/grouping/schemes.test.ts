import { describe, it, expect } from 'vitest';
import { buildScheme, findGroup, groupBreakdown, groupStatus, staleScheme } from '../../grouping/chunker.js';
import { classifyFormatting } from '../../grouping/formatting.js';
import { parseUnifiedDiff } from '../../diff/parser.js';
import { postImageLineId } from '../../diff/line-id.js';
import { createDefaultRegistry } from '../../analyzers/registry.js';
import { InvalidSelectorError } from '../../queue/errors.js';
import { groupingContext } from '../../session/session.js';
import type { GroupingScheme } from '../../types.js';
import { APP_DIFF, FORMATTING_DIFF, appLine, buildSession, readmeLine } from '../helpers/fixtures.js';

describe('file-type scheme', () => {
  it('groups lines by file category, ordered by primary path', async () => {
    const session = await buildSession();
    const scheme = buildScheme('file-type', groupingContext(session));

    expect(scheme.stale).toBe(false);
    expect(scheme.diffHash).toBe(session.diffHash);
    expect(scheme.groups.map(group => [group.id, group.label, group.primaryPath])).toEqual([
      ['file-type:doc', 'doc', 'README.md'],
      ['file-type:source', 'source', 'src/app.ts'],
    ]);
    expect(scheme.groups[1].lineIds).toEqual([appLine(2), appLine(3), appLine(4), appLine(13)]);
  });
});

describe('scope scheme', () => {
  it('groups lines by enclosing definition', async () => {
    const session = await buildSession();
    const scheme = buildScheme('scope', groupingContext(session));

    expect(scheme.groups.map(group => [group.id, group.label, group.lineIds])).toEqual([
      ['scope:README.md', 'README.md', [readmeLine(2)]],
      ['scope:src/app.ts::<top-level>', 'src/app.ts', [appLine(2)]],
      ['scope:src/app.ts::Service', 'Service (src/app.ts)', [appLine(13)]],
      ['scope:src/app.ts::run', 'run (src/app.ts)', [appLine(3), appLine(4)]],
    ]);
  });
});

describe('formatting scheme', () => {
  it('splits formatting-only lines from logic changes', async () => {
    const session = await buildSession(FORMATTING_DIFF);
    const scheme = buildScheme('formatting', groupingContext(session));

    expect(scheme.groups.map(group => [group.id, group.lineIds])).toEqual([
      ['formatting:formatting-only', [postImageLineId('lib/util.ts', 1)]],
      ['formatting:logic', [postImageLineId('lib/util.ts', 2), postImageLineId('vendor/dep.js', 1)]],
    ]);
  });

  it('treats comment-only edits and reflowed statements as formatting', () => {
    const raw = [
      '--- a/a.ts',
      '+++ b/a.ts',
      '@@ -1,3 +1,2 @@',
      '-x = 1; // old',
      '-foo(a,',
      '-  b);',
      '+x = 1; // new',
      '+foo(a, b);',
      '',
    ].join('\n');

    const result = classifyFormatting(parseUnifiedDiff(raw), createDefaultRegistry());
    expect(result).toEqual(new Set([postImageLineId('a.ts', 1), postImageLineId('a.ts', 2)]));
  });

  it('treats inserted blank and comment lines as new content', () => {
    const raw = [
      '--- a/a.ts',
      '+++ b/a.ts',
      '@@ -1,1 +1,4 @@',
      ' const x = 1;',
      '+// keep it',
      '+',
      '+const y = 2;',
      '',
    ].join('\n');

    expect(classifyFormatting(parseUnifiedDiff(raw), createDefaultRegistry())).toEqual(new Set());
  });

  it('marks only the positional counterpart when a block grows', () => {
    const raw = [
      '--- a/a.ts',
      '+++ b/a.ts',
      '@@ -1,1 +1,3 @@',
      '-let  total = 0;',
      '+let total = 0;',
      '+',
      '+total += step();',
      '',
    ].join('\n');

    expect(classifyFormatting(parseUnifiedDiff(raw), createDefaultRegistry())).toEqual(
      new Set([postImageLineId('a.ts', 1)])
    );
  });
});

describe('commit scheme', () => {
  it('groups lines by originating commit', async () => {
    const session = await buildSession(APP_DIFF, {
      inputs: {
        commits: {
          lines: {
            'src/app.ts': {
              2: { sha: 'a'.repeat(40), summary: 'Add run' },
              3: { sha: 'a'.repeat(40), summary: 'Add run' },
              4: { sha: 'b'.repeat(40), summary: 'Guard input' },
            },
          },
        },
      },
    });
    const scheme = buildScheme('commit', groupingContext(session));

    expect(scheme.groups.map(group => [group.label, group.lineIds])).toEqual([
      ['unattributed', [appLine(13), readmeLine(2)]],
      ['aaaaaaa Add run', [appLine(2), appLine(3)]],
      ['bbbbbbb Guard input', [appLine(4)]],
    ]);
  });
});

describe('co-change scheme', () => {
  it('clusters files modified together more often than the threshold', async () => {
    const session = await buildSession(APP_DIFF, {
      inputs: { coChange: { pairs: [{ a: 'README.md', b: 'src/app.ts', count: 3 }], commitsScanned: 10 } },
    });
    const scheme = buildScheme('co-change', groupingContext(session));

    expect(scheme.groups).toHaveLength(1);
    expect(scheme.groups[0]).toMatchObject({ id: 'co-change:README.md', label: 'README.md +1 co-changed' });
    expect(scheme.groups[0].lineIds).toHaveLength(5);
  });

  it('keeps files apart at or below the threshold', async () => {
    const session = await buildSession(APP_DIFF, {
      inputs: { coChange: { pairs: [{ a: 'README.md', b: 'src/app.ts', count: 2 }], commitsScanned: 10 } },
    });
    const scheme = buildScheme('co-change', groupingContext(session));

    expect(scheme.groups.map(group => group.label)).toEqual(['README.md', 'src/app.ts']);
  });

  it('is a stale placeholder until computed in the background', async () => {
    const session = await buildSession();
    expect(session.schemes.get('co-change')).toEqual({
      name: 'co-change',
      diffHash: session.diffHash,
      stale: true,
      groups: [],
    });
  });
});

describe('group lookup and status', () => {
  it('finds a group by id, by bare key or by label', async () => {
    const session = await buildSession();
    const scheme = buildScheme('scope', groupingContext(session));

    expect(findGroup(scheme, 'scope:src/app.ts::run')?.lineIds).toEqual([appLine(3), appLine(4)]);
    expect(findGroup(scheme, 'src/app.ts::run')?.id).toBe('scope:src/app.ts::run');
    expect(findGroup(scheme, 'run (src/app.ts)')?.id).toBe('scope:src/app.ts::run');
    expect(findGroup(scheme, 'missing')).toBeNull();
  });

  it('rejects a label shared by two groups', () => {
    const scheme: GroupingScheme = {
      name: 'commit',
      diffHash: 'h',
      stale: false,
      groups: [
        { id: 'commit:1', label: 'fix', scheme: 'commit', primaryPath: 'a', lineIds: ['x'] },
        { id: 'commit:2', label: 'fix', scheme: 'commit', primaryPath: 'b', lineIds: ['y'] },
      ],
    };
    expect(() => findGroup(scheme, 'fix')).toThrow(InvalidSelectorError);
  });

  it('derives group status from line statuses', async () => {
    const session = await buildSession();
    const [doc, source] = session.schemes.get('file-type')?.groups ?? [];
    session.queue.applyBulk(source.lineIds, 'SKIMMED');

    expect(groupStatus(source, session.queue)).toBe('REVIEWED');
    expect(groupStatus(doc, session.queue)).toBe('PARTIAL');
    expect(groupBreakdown(source, session.queue)).toEqual({
      UNREVIEWED: 0,
      SKIMMED: 4,
      DEEP_REVIEWED: 0,
      FILTERED: 0,
      total: 4,
    });
  });

  it('keeps previous groups on a stale placeholder', () => {
    const previous: GroupingScheme = { name: 'co-change', diffHash: 'old', stale: false, groups: [] };
    expect(staleScheme('co-change', 'new', previous)).toEqual({
      name: 'co-change',
      diffHash: 'new',
      stale: true,
      groups: [],
    });
  });
});
