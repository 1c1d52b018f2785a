import { describe, it, expect } from 'vitest';
import { ConcurrentMutationError } from '../../concurrency/errors.js';
import { missingDocSuggester } from '../../hooks/doc-suggestions.js';
import { SessionCorruptError, SessionNotFoundError } from '../../session/errors.js';
import { InMemorySessionStore } from '../../session/store.js';
import { groupsView, statusView } from '../../session/views.js';
import { InvalidSelectorError } from '../../queue/errors.js';
import {
  APP_DIFF,
  APP_DIFF_REFRESHED,
  appLine,
  createManager,
  readmeLine,
  testHooks,
} from '../helpers/fixtures.js';

class FlakyStore extends InMemorySessionStore {
  failWrites = false;
  private slowFailure: number | null = null;

  failNextWriteAfter(ms: number): void {
    this.slowFailure = ms;
  }

  async write(changeId: string, serialized: string): Promise<void> {
    if (this.failWrites) {
      throw new Error('disk full');
    }
    if (this.slowFailure !== null) {
      const delay = this.slowFailure;
      this.slowFailure = null;
      await new Promise(resolve => setTimeout(resolve, delay));
      throw new Error('disk full');
    }
    await super.write(changeId, serialized);
  }
}

async function storedSchemes(store: InMemorySessionStore, changeId: string): Promise<Array<[string, boolean]>> {
  const raw = await store.read(changeId);
  if (raw === null) return [];
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || !('schemes' in parsed) || !Array.isArray(parsed.schemes)) {
    return [];
  }
  return parsed.schemes.flatMap((scheme: unknown): Array<[string, boolean]> =>
    typeof scheme === 'object' && scheme !== null && 'name' in scheme && 'stale' in scheme &&
    typeof scheme.name === 'string' && typeof scheme.stale === 'boolean'
      ? [[scheme.name, scheme.stale]]
      : []
  );
}

async function storedStatuses(store: InMemorySessionStore, changeId: string): Promise<unknown> {
  const raw = await store.read(changeId);
  if (raw === null) return null;
  const parsed: unknown = JSON.parse(raw);
  return typeof parsed === 'object' && parsed !== null && 'statuses' in parsed ? parsed.statuses : null;
}

describe('SessionManager', () => {
  it('persists a session on ingest', async () => {
    const store = new InMemorySessionStore();
    const manager = createManager(store);

    const { session, reconciled } = await manager.ingest({ changeId: 'feature-x', diffText: APP_DIFF });
    await manager.awaitBackground('feature-x');

    expect(reconciled).toBe(false);
    expect(session.queue.total).toBe(5);
    expect(await store.list()).toEqual(['feature-x']);
  });

  it('reconciles a repeated ingest', async () => {
    const manager = createManager();
    await manager.ingest({ changeId: 'feature-x', diffText: APP_DIFF });
    await manager.review('feature-x', 'README.md', 'skim');

    const { session, reconciled } = await manager.ingest({ changeId: 'feature-x', diffText: APP_DIFF_REFRESHED });
    await manager.awaitBackground('feature-x');

    expect(reconciled).toBe(true);
    expect(session.queue.status(readmeLine(2))).toBe('SKIMMED');
    expect(session.queue.remainingCount()).toBe(5);
  });

  it('writes every resolution through to the store', async () => {
    const store = new InMemorySessionStore();
    const manager = createManager(store);
    await manager.ingest({ changeId: 'feature-x', diffText: APP_DIFF });

    const { result } = await manager.review('feature-x', 'src/app.ts', 'file-mode');
    await manager.awaitBackground('feature-x');

    expect(result.changed).toHaveLength(4);
    expect(await storedStatuses(store, 'feature-x')).toEqual({
      [appLine(2)]: 'SKIMMED',
      [appLine(3)]: 'SKIMMED',
      [appLine(4)]: 'SKIMMED',
      [appLine(13)]: 'SKIMMED',
      [readmeLine(2)]: 'UNREVIEWED',
    });
  });

  it('loads a session written by another manager', async () => {
    const store = new InMemorySessionStore();
    const first = createManager(store);
    await first.ingest({ changeId: 'feature-x', diffText: APP_DIFF });
    await first.review('feature-x', 'README.md', 'skim');
    await first.awaitBackground('feature-x');

    const second = createManager(store);
    const status = await second.read('feature-x', statusView);
    await second.awaitBackground('feature-x');

    expect(status.remaining).toBe(4);
    expect(status.filesTouched).toBe(1);
  });

  it('rolls the mutation back when the write fails', async () => {
    const store = new FlakyStore();
    const manager = createManager(store);
    await manager.ingest({ changeId: 'feature-x', diffText: APP_DIFF });
    await manager.awaitBackground('feature-x');
    const auditBefore = await manager.read('feature-x', session => session.audit.length);

    store.failWrites = true;
    await expect(manager.review('feature-x', 'src/app.ts', 'skim')).rejects.toThrow('disk full');
    await expect(manager.setActiveScheme('feature-x', 'scope')).rejects.toThrow('disk full');

    const after = await manager.read('feature-x', session => ({
      remaining: session.queue.remainingCount(),
      audit: session.audit.length,
      scheme: session.activeScheme,
    }));
    expect(after).toEqual({ remaining: 5, audit: auditBefore, scheme: 'file-type' });
    expect(await storedStatuses(store, 'feature-x')).toEqual({
      [appLine(2)]: 'UNREVIEWED',
      [appLine(3)]: 'UNREVIEWED',
      [appLine(4)]: 'UNREVIEWED',
      [appLine(13)]: 'UNREVIEWED',
      [readmeLine(2)]: 'UNREVIEWED',
    });
  });

  it('keeps the previous session when a re-ingest cannot be persisted', async () => {
    const store = new FlakyStore();
    const manager = createManager(store);
    const { session } = await manager.ingest({ changeId: 'feature-x', diffText: APP_DIFF });
    await manager.awaitBackground('feature-x');

    store.failWrites = true;
    await expect(manager.ingest({ changeId: 'feature-x', diffText: APP_DIFF_REFRESHED })).rejects.toThrow('disk full');

    expect(await manager.read('feature-x', live => live.diffHash)).toBe(session.diffHash);
  });

  it('leaves state untouched when the selector is invalid', async () => {
    const manager = createManager();
    await manager.ingest({ changeId: 'feature-x', diffText: APP_DIFF });

    await expect(manager.review('feature-x', 'lines:zzzz', 'skim')).rejects.toThrow(InvalidSelectorError);
    expect(await manager.read('feature-x', session => session.queue.remainingCount())).toBe(5);
    await manager.awaitBackground('feature-x');
  });

  it('rejects a second mutation while one is in flight', async () => {
    const manager = createManager();
    await manager.ingest({ changeId: 'feature-x', diffText: APP_DIFF });

    const [first, second] = await Promise.allSettled([
      manager.review('feature-x', 'README.md', 'skim'),
      manager.review('feature-x', 'src/app.ts', 'skim'),
    ]);
    await manager.awaitBackground('feature-x');

    expect(first.status).toBe('fulfilled');
    expect(second.status).toBe('rejected');
    if (second.status === 'rejected') {
      expect(second.reason).toBeInstanceOf(ConcurrentMutationError);
    }
    expect(await manager.read('feature-x', session => session.queue.remainingCount())).toBe(4);
  });

  it('installs the co-change grouping once computed', async () => {
    const manager = createManager();
    await manager.ingest({
      changeId: 'feature-x',
      diffText: APP_DIFF,
      inputs: { coChange: { pairs: [{ a: 'README.md', b: 'src/app.ts', count: 5 }], commitsScanned: 5 } },
    });
    await manager.awaitBackground('feature-x');

    const session = await manager.setActiveScheme('feature-x', 'co-change');
    const view = groupsView(session);
    expect(view.stale).toBe(false);
    expect(view.groups.map(group => group.label)).toEqual(['README.md +1 co-changed']);
  });

  it('installs a background grouping only after a failed mutation has rolled back', async () => {
    const store = new FlakyStore();
    const manager = createManager(store);
    await manager.ingest({
      changeId: 'feature-x',
      diffText: APP_DIFF,
      inputs: { coChange: { pairs: [{ a: 'README.md', b: 'src/app.ts', count: 3 }], commitsScanned: 10 } },
    });

    store.failNextWriteAfter(30);
    await expect(manager.review('feature-x', 'README.md', 'skim')).rejects.toThrow('disk full');
    await manager.awaitBackground('feature-x');

    expect(await storedStatuses(store, 'feature-x')).toEqual({
      [appLine(2)]: 'UNREVIEWED',
      [appLine(3)]: 'UNREVIEWED',
      [appLine(4)]: 'UNREVIEWED',
      [appLine(13)]: 'UNREVIEWED',
      [readmeLine(2)]: 'UNREVIEWED',
    });
    expect(await storedSchemes(store, 'feature-x')).toContainEqual(['co-change', false]);
  });

  it('applies file-mode to a path that also names a co-change group', async () => {
    const manager = createManager();
    await manager.ingest({
      changeId: 'feature-x',
      diffText: APP_DIFF,
      inputs: { coChange: { pairs: [], commitsScanned: 0 } },
    });
    await manager.awaitBackground('feature-x');
    await manager.setActiveScheme('feature-x', 'co-change');

    const { result } = await manager.review('feature-x', 'src/app.ts', 'file-mode');
    expect(result.tag).toBe('whole-file');
    expect(result.changed).toEqual([appLine(2), appLine(3), appLine(4), appLine(13)]);
  });

  it('runs resolution hooks after the write and reports their suggestions', async () => {
    const hooks = testHooks()
      .register(missingDocSuggester)
      .register({
        name: 'broken',
        phase: 'resolution',
        run: () => {
          throw new Error('hook exploded');
        },
      });
    const manager = createManager(new InMemorySessionStore(), 'file-type', hooks);
    await manager.ingest({ changeId: 'feature-x', diffText: APP_DIFF });

    const { result, suggestions } = await manager.review('feature-x', 'src/app.ts', 'skim');
    await manager.awaitBackground('feature-x');

    expect(result.changed).toHaveLength(4);
    expect(suggestions).toEqual([
      {
        filePath: 'src/app.ts',
        line: 3,
        definition: 'run',
        text: 'run has no doc comment',
        source: 'heuristic',
      },
    ]);
  });

  it('reports a missing session', async () => {
    await expect(createManager().read('nope', statusView)).rejects.toThrow(SessionNotFoundError);
  });

  it('reports a damaged record and recovers from the diff it stored', async () => {
    const store = new InMemorySessionStore();
    const first = createManager(store);
    await first.ingest({ changeId: 'feature-x', diffText: APP_DIFF });
    await first.review('feature-x', 'README.md', 'skim');
    await first.awaitBackground('feature-x');

    const raw = await store.read('feature-x');
    await store.write('feature-x', (raw ?? '').replace('"checksum": "', '"checksum": "0'));

    const second = createManager(store);
    await expect(second.read('feature-x', statusView)).rejects.toThrow(SessionCorruptError);

    const { session, kept } = await second.recover('feature-x');
    await second.awaitBackground('feature-x');
    expect(kept).toBe(1);
    expect(session.queue.status(readmeLine(2))).toBe('SKIMMED');
    expect((await second.read('feature-x', statusView)).remaining).toBe(4);
  });

  it('recovers a record that is not JSON from a live diff', async () => {
    const store = new InMemorySessionStore();
    await store.write('feature-x', '{not json');
    const manager = createManager(store);

    await expect(manager.read('feature-x', statusView)).rejects.toThrow('record is not valid JSON');
    await expect(manager.recover('feature-x')).rejects.toThrow('no diff available to rebuild from');

    const { kept } = await manager.recover('feature-x', APP_DIFF);
    await manager.awaitBackground('feature-x');
    expect(kept).toBe(0);
  });

  it('resets a session', async () => {
    const store = new InMemorySessionStore();
    const manager = createManager(store);
    await manager.ingest({ changeId: 'feature-x', diffText: APP_DIFF });
    await manager.awaitBackground('feature-x');

    expect(await manager.reset('feature-x')).toBe(true);
    expect(await manager.reset('feature-x')).toBe(false);
    expect(await manager.list()).toEqual([]);
  });
});
