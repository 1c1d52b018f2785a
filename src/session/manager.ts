import type { LineStatus, SchemeName } from '../types.js';
import { BACKGROUND_SCHEMES, buildScheme } from '../grouping/chunker.js';
import { BackgroundGrouping } from '../grouping/background.js';
import type { GroupingInputs } from '../grouping/types.js';
import { SessionLocks } from '../concurrency/session-lock.js';
import type { HookRegistry } from '../hooks/registry.js';
import type { DocSuggestion } from '../hooks/types.js';
import type { SessionStore } from '../persistence/types.js';
import { logger } from '../observability/logger.js';
import {
  applyReviewMode,
  cancelDeepDive,
  confirmHunk,
  filter,
  reopen,
} from '../resolution/engine.js';
import type { FilterPredicate, ResolutionResult, ReviewMode } from '../resolution/engine.js';
import { parseSelector } from '../resolution/selector.js';
import type { DeepDiveCursor } from '../resolution/deep-dive/states.js';
import { SessionCorruptError, SessionNotFoundError } from './errors.js';
import {
  createSession,
  fromRecord,
  groupingContext,
  reconcileSession,
  recoverSession,
  toRecord,
} from './session.js';
import type { SessionOptions } from './session.js';
import type { ChangeMetadata, ReviewSession, SessionSettings } from './types.js';

export interface ManagerOptions {
  store: SessionStore;
  hooks: HookRegistry;
  settings: SessionSettings;
  defaultScheme: SchemeName;
}

export interface IngestRequest {
  changeId: string;
  diffText: string;
  inputs?: GroupingInputs;
  metadata?: ChangeMetadata;
}

export interface IngestOutcome {
  session: ReviewSession;
  reconciled: boolean;
}

export interface MutationOutcome {
  result: ResolutionResult;
  suggestions: DocSuggestion[];
}

interface Checkpoint {
  statuses: Record<string, LineStatus>;
  cursor: DeepDiveCursor | null;
  auditLength: number;
  activeScheme: SchemeName;
  updatedAt: string;
}

function checkpoint(session: ReviewSession): Checkpoint {
  return {
    statuses: session.queue.snapshot(),
    cursor: session.cursor,
    auditLength: session.audit.length,
    activeScheme: session.activeScheme,
    updatedAt: session.updatedAt,
  };
}

function rollback(session: ReviewSession, saved: Checkpoint): void {
  session.queue.restore(saved.statuses);
  session.cursor = saved.cursor;
  session.audit.length = saved.auditLength;
  session.activeScheme = saved.activeScheme;
  session.updatedAt = saved.updatedAt;
}

/**
 * Owns one live session per change id. Mutations are serialized per change
 * and written ahead: the new state is persisted before the call resolves,
 * and a failed write puts the in-memory state back.
 */
export class SessionManager {
  private readonly sessions = new Map<string, ReviewSession>();
  private readonly locks = new SessionLocks();
  private readonly background = new BackgroundGrouping();

  constructor(private readonly options: ManagerOptions) {}

  private sessionOptions(request?: Pick<IngestRequest, 'inputs' | 'metadata'>): SessionOptions {
    return {
      settings: this.options.settings,
      defaultScheme: this.options.defaultScheme,
      hooks: this.options.hooks,
      inputs: request?.inputs,
      metadata: request?.metadata,
    };
  }

  private async persist(session: ReviewSession): Promise<void> {
    await this.options.store.write(session.changeId, JSON.stringify(toRecord(session), null, 2));
  }

  private async load(changeId: string): Promise<ReviewSession> {
    const live = this.sessions.get(changeId);
    if (live) return live;

    const raw = await this.options.store.read(changeId);
    if (raw === null) {
      throw new SessionNotFoundError(changeId);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new SessionCorruptError(
        changeId,
        'JSON',
        error instanceof Error ? error.message : 'unparseable',
        'record is not valid JSON'
      );
    }

    const session = fromRecord(changeId, parsed, this.options.settings);
    this.sessions.set(changeId, session);
    this.scheduleBackground(session);
    return session;
  }

  private async loadIfPresent(changeId: string): Promise<ReviewSession | null> {
    try {
      return await this.load(changeId);
    } catch (error) {
      if (error instanceof SessionNotFoundError) return null;
      throw error;
    }
  }

  private scheduleBackground(session: ReviewSession): void {
    for (const name of BACKGROUND_SCHEMES) {
      if (session.schemes.get(name)?.stale !== true) continue;

      const diffHash = session.diffHash;
      this.background.schedule(
        session.changeId,
        name,
        diffHash,
        () => buildScheme(name, groupingContext(session)),
        scheme => this.locks.for(session.changeId).maintain(async () => {
          if (this.sessions.get(session.changeId) !== session || session.diffHash !== diffHash) {
            return false;
          }
          session.schemes.set(name, scheme);
          try {
            await this.persist(session);
          } catch (error) {
            logger.forChange(session.changeId).error('grouping_persist_failed', 'Background scheme installed but not persisted', {
              scheme: name,
              error: error instanceof Error ? error.message : 'Unknown error',
            });
          }
          return true;
        })
      );
    }
  }

  private async mutate<T>(changeId: string, operation: (session: ReviewSession) => T): Promise<T> {
    return this.locks.for(changeId).write(async () => {
      const session = await this.load(changeId);
      const saved = checkpoint(session);

      let value: T;
      try {
        value = operation(session);
      } catch (error) {
        rollback(session, saved);
        throw error;
      }

      try {
        await this.persist(session);
      } catch (error) {
        rollback(session, saved);
        logger.forChange(changeId).error('session_persist_failed', 'Write-ahead persist failed, mutation rolled back', {
          error: error instanceof Error ? error.message : 'Unknown error',
        });
        throw error;
      }
      return value;
    });
  }

  private async resolve(
    changeId: string,
    operation: (session: ReviewSession) => ResolutionResult
  ): Promise<MutationOutcome> {
    const { result, session } = await this.mutate(changeId, live => ({ result: operation(live), session: live }));
    const report = await this.options.hooks.run('resolution', { session, result });
    return { result, suggestions: report.suggestions };
  }

  /** Read-only access under the session's read lock. */
  async read<T>(changeId: string, view: (session: ReviewSession) => T): Promise<T> {
    return this.locks.for(changeId).read(async () => view(await this.load(changeId)));
  }

  /**
   * Create the session for a change, or reconcile an existing one with a
   * refreshed diff. The previous session stays live if persisting fails.
   */
  async ingest(request: IngestRequest): Promise<IngestOutcome> {
    const { changeId } = request;

    return this.locks.for(changeId).write(async () => {
      const previous = await this.loadIfPresent(changeId);
      const options = this.sessionOptions({
        inputs: request.inputs ?? previous?.inputs,
        metadata: { ...previous?.metadata, ...request.metadata },
      });

      const session = previous
        ? await reconcileSession(previous, request.diffText, options)
        : await createSession(changeId, request.diffText, options);

      await this.persist(session);
      this.sessions.set(changeId, session);
      this.scheduleBackground(session);

      return { session, reconciled: previous !== null };
    });
  }

  /** Make `scheme` the active grouping. */
  async setActiveScheme(changeId: string, scheme: SchemeName): Promise<ReviewSession> {
    return this.mutate(changeId, session => {
      session.activeScheme = scheme;
      session.updatedAt = new Date().toISOString();
      logger.forChange(changeId).info('grouping_activated', 'Active grouping scheme changed', { scheme });
      return session;
    });
  }

  async review(changeId: string, selectorText: string, mode: ReviewMode): Promise<MutationOutcome> {
    return this.resolve(changeId, session =>
      applyReviewMode(session, mode, selectorText, text => parseSelector(session, text))
    );
  }

  async reopen(changeId: string, selectorText: string): Promise<MutationOutcome> {
    return this.resolve(changeId, session => reopen(session, parseSelector(session, selectorText)));
  }

  async filter(changeId: string, predicate: FilterPredicate): Promise<MutationOutcome> {
    return this.resolve(changeId, session => filter(session, predicate));
  }

  async confirmDeepDive(changeId: string): Promise<MutationOutcome> {
    return this.resolve(changeId, session => confirmHunk(session));
  }

  async cancelDeepDive(changeId: string): Promise<MutationOutcome> {
    return this.resolve(changeId, session => cancelDeepDive(session));
  }

  /** Wait for background groupings of a change to finish. */
  async awaitBackground(changeId: string): Promise<void> {
    await this.background.settle(changeId);
  }

  /** Forget a change entirely. Returns false when there was nothing to remove. */
  async reset(changeId: string): Promise<boolean> {
    return this.locks.for(changeId).write(async () => {
      const live = this.sessions.delete(changeId);
      const stored = await this.options.store.delete(changeId);
      logger.forChange(changeId).info('session_reset', 'Review session removed', { live, stored });
      return live || stored;
    });
  }

  /**
   * Rebuild a session that no longer verifies. `diffText` is the live diff;
   * without it the diff stored in the damaged record is used.
   */
  async recover(changeId: string, diffText?: string): Promise<{ session: ReviewSession; kept: number }> {
    return this.locks.for(changeId).write(async () => {
      const raw = await this.options.store.read(changeId);
      let damaged: unknown = null;
      if (raw !== null) {
        try {
          damaged = JSON.parse(raw);
        } catch (error) {
          logger.forChange(changeId).warn('session_recover_unparseable', 'Damaged record is not JSON, statuses cannot be kept', {
            error: error instanceof Error ? error.message : 'Unknown error',
          });
        }
      }

      const source = diffText ?? storedDiff(damaged);
      if (source === null) {
        throw new SessionCorruptError(changeId, 'diff', 'missing', 'no diff available to rebuild from');
      }

      const outcome = await recoverSession(changeId, damaged, source, this.sessionOptions({
        inputs: this.sessions.get(changeId)?.inputs,
      }));
      await this.persist(outcome.session);
      this.sessions.set(changeId, outcome.session);
      this.scheduleBackground(outcome.session);
      return outcome;
    });
  }

  async list(): Promise<string[]> {
    return this.options.store.list();
  }
}

function storedDiff(damaged: unknown): string | null {
  if (typeof damaged === 'object' && damaged !== null && 'diffText' in damaged && typeof damaged.diffText === 'string') {
    return damaged.diffText;
  }
  return null;
}
