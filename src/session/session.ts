import type { GroupingScheme, LineID, LineStatus, SchemeName } from '../types.js';
import { SCHEME_NAMES, isLineStatus, isSchemeName } from '../types.js';
import { parseUnifiedDiff, reviewableLines } from '../diff/parser.js';
import { contentDigest } from '../diff/line-id.js';
import { LineQueue } from '../queue/line-queue.js';
import { BACKGROUND_SCHEMES, buildScheme, staleScheme } from '../grouping/chunker.js';
import { FORMATTING_ONLY_KEY } from '../grouping/formatting.js';
import type { GroupingContext, GroupingInputs } from '../grouping/types.js';
import type { HookRegistry } from '../hooks/registry.js';
import { enforceInvariants } from '../invariants/checker.js';
import { logger } from '../observability/logger.js';
import type { DeepDiveCursor } from '../resolution/deep-dive/states.js';
import { isDeepDivePhase } from '../resolution/deep-dive/states.js';
import { computeRecordChecksum } from './hasher.js';
import { SessionCorruptError } from './errors.js';
import { RECORD_VERSION } from './types.js';
import type {
  AuditRecord,
  ChangeMetadata,
  PersistedSessionRecord,
  ReviewSession,
  SessionSettings,
  UnsignedSessionRecord,
} from './types.js';

export interface SessionOptions {
  settings: SessionSettings;
  defaultScheme: SchemeName;
  hooks: HookRegistry;
  inputs?: GroupingInputs;
  metadata?: ChangeMetadata;
}

interface PriorState {
  statuses: ReadonlyMap<LineID, LineStatus>;
  activeScheme: SchemeName;
  audit: AuditRecord[];
  cursor: DeepDiveCursor | null;
  createdAt: string;
}

export function groupingContext(session: ReviewSession): GroupingContext {
  const formattingOnly = new Set<LineID>();
  for (const [id, tags] of session.classifications) {
    if (tags.has(FORMATTING_ONLY_KEY)) formattingOnly.add(id);
  }

  return {
    ...session.inputs,
    diff: session.diff,
    reviewable: reviewableLines(session.diff),
    analyzers: session.settings.analyzers,
    coChangeThreshold: session.settings.coChangeThreshold,
    formattingOnly,
  };
}

/**
 * Build every scheme that is cheap to compute. Background schemes get a
 * stale placeholder; the session manager schedules the real computation.
 */
export function buildEagerSchemes(session: ReviewSession, only?: readonly SchemeName[]): void {
  const ctx = groupingContext(session);
  for (const name of only ?? SCHEME_NAMES) {
    if (BACKGROUND_SCHEMES.has(name)) {
      session.schemes.set(name, staleScheme(name, session.diffHash, session.schemes.get(name)));
    } else {
      session.schemes.set(name, buildScheme(name, ctx));
    }
  }
}

async function assemble(
  changeId: string,
  diffText: string,
  options: SessionOptions,
  prior: PriorState | null
): Promise<ReviewSession> {
  const diff = parseUnifiedDiff(diffText);
  const now = new Date().toISOString();

  const session: ReviewSession = {
    changeId,
    diffText,
    diff,
    diffHash: diff.contentHash,
    queue: new LineQueue(diff, prior?.statuses),
    schemes: new Map(),
    activeScheme: prior?.activeScheme ?? options.defaultScheme,
    cursor: prior?.cursor ?? null,
    classifications: new Map(),
    audit: prior ? [...prior.audit] : [],
    inputs: options.inputs ?? {},
    metadata: options.metadata ?? {},
    settings: options.settings,
    createdAt: prior?.createdAt ?? now,
    updatedAt: now,
  };

  await options.hooks.run('ingest', { session });
  buildEagerSchemes(session);

  session.audit.push({
    action: 'ingest',
    selector: diff.contentHash.substring(0, 12),
    changed: session.queue.total,
    at: now,
  });

  return session;
}

/** Parse a diff into a fresh session with every reviewable line UNREVIEWED. */
export async function createSession(changeId: string, diffText: string, options: SessionOptions): Promise<ReviewSession> {
  const session = await assemble(changeId, diffText, options, null);
  logger.forChange(changeId).info('session_created', 'Review session created', {
    files: session.diff.files.length,
    reviewable: session.queue.total,
    activeScheme: session.activeScheme,
  });
  return session;
}

/**
 * Re-ingest a refreshed diff. Line ids present in both diffs keep their
 * status, ids that disappeared are dropped and new ids start UNREVIEWED. The
 * deep-dive cursor survives only when the diff is byte-for-byte the same.
 */
export async function reconcileSession(
  previous: ReviewSession,
  diffText: string,
  options: SessionOptions
): Promise<ReviewSession> {
  const session = await assemble(previous.changeId, diffText, options, {
    statuses: previous.queue.statusMap(),
    activeScheme: previous.activeScheme,
    audit: previous.audit,
    cursor: null,
    createdAt: previous.createdAt,
  });

  const unchanged = session.diffHash === previous.diffHash;
  if (unchanged) {
    session.cursor = previous.cursor;
  }

  const carried = session.queue.reviewableIds().filter(id => previous.queue.isReviewable(id)).length;
  logger.forChange(session.changeId).info('session_reconciled', 'Review session reconciled with refreshed diff', {
    unchanged,
    carried,
    dropped: previous.queue.total - carried,
    added: session.queue.total - carried,
    remaining: session.queue.remainingCount(),
  });
  return session;
}

export function lineDigests(session: ReviewSession): Record<LineID, string> {
  const digests: Record<LineID, string> = {};
  for (const id of session.queue.reviewableIds()) {
    const line = session.queue.line(id);
    if (line) digests[id] = contentDigest(line.content);
  }
  return digests;
}

export function toRecord(session: ReviewSession): PersistedSessionRecord {
  const classifications: Record<LineID, string[]> = {};
  for (const [id, tags] of session.classifications) {
    classifications[id] = Array.from(tags).sort();
  }

  const unsigned: UnsignedSessionRecord = {
    version: RECORD_VERSION,
    changeId: session.changeId,
    diffHash: session.diffHash,
    diffText: session.diffText,
    statuses: session.queue.snapshot(),
    lineDigests: lineDigests(session),
    classifications,
    activeScheme: session.activeScheme,
    schemes: SCHEME_NAMES.flatMap(name => {
      const scheme = session.schemes.get(name);
      return scheme ? [scheme] : [];
    }),
    cursor: session.cursor,
    inputs: session.inputs,
    metadata: session.metadata,
    audit: session.audit,
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
  };

  return { ...unsigned, checksum: computeRecordChecksum(unsigned) };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringMap(value: unknown): value is Record<string, string> {
  return isObject(value) && Object.values(value).every(member => typeof member === 'string');
}

function isScheme(value: unknown): value is GroupingScheme {
  return isObject(value) &&
    isSchemeName(value.name) &&
    typeof value.diffHash === 'string' &&
    typeof value.stale === 'boolean' &&
    Array.isArray(value.groups);
}

function isCursor(value: unknown): boolean {
  return isObject(value) &&
    typeof value.key === 'string' &&
    isDeepDivePhase(value.phase) &&
    typeof value.index === 'number' &&
    Array.isArray(value.stops);
}

/** Shape check of a record read back from a store. */
export function isSessionRecord(value: unknown): value is PersistedSessionRecord {
  return isObject(value) &&
    value.version === RECORD_VERSION &&
    typeof value.changeId === 'string' &&
    typeof value.diffHash === 'string' &&
    typeof value.diffText === 'string' &&
    isObject(value.statuses) &&
    Object.values(value.statuses).every(isLineStatus) &&
    isStringMap(value.lineDigests) &&
    isObject(value.classifications) &&
    isSchemeName(value.activeScheme) &&
    Array.isArray(value.schemes) &&
    value.schemes.every(isScheme) &&
    (value.cursor === null || isCursor(value.cursor)) &&
    isObject(value.inputs) &&
    isObject(value.metadata) &&
    Array.isArray(value.audit) &&
    typeof value.createdAt === 'string' &&
    typeof value.updatedAt === 'string' &&
    typeof value.checksum === 'string';
}

/**
 * Verify a stored record and rebuild the live session from it. Any mismatch
 * between the checksum, the stored diff and the stored hashes is corruption.
 */
export function fromRecord(changeId: string, value: unknown, settings: SessionSettings): ReviewSession {
  if (!isSessionRecord(value)) {
    throw new SessionCorruptError(changeId, 'session record', 'unrecognised shape', 'record is malformed');
  }

  const { checksum, ...unsigned } = value;
  const actual = computeRecordChecksum(unsigned);
  if (actual !== checksum) {
    logger.forChange(changeId).error('session_checksum_mismatch', 'Stored session failed checksum verification', {
      expected: checksum,
      actual,
    });
    throw new SessionCorruptError(changeId, checksum, actual);
  }

  const diff = parseUnifiedDiff(value.diffText);
  if (diff.contentHash !== value.diffHash) {
    throw new SessionCorruptError(changeId, value.diffHash, diff.contentHash, 'stored diff does not match its hash');
  }

  const session: ReviewSession = {
    changeId: value.changeId,
    diffText: value.diffText,
    diff,
    diffHash: value.diffHash,
    queue: new LineQueue(diff, new Map(Object.entries(value.statuses))),
    schemes: new Map(),
    activeScheme: value.activeScheme,
    cursor: value.cursor,
    classifications: new Map(
      Object.entries(value.classifications).map(([id, tags]): [LineID, Set<string>] => [id, new Set(tags)])
    ),
    audit: value.audit,
    inputs: value.inputs,
    metadata: value.metadata,
    settings,
    createdAt: value.createdAt,
    updatedAt: value.updatedAt,
  };

  const reviewableIds = session.queue.reviewableIds();
  const missing: SchemeName[] = [];
  for (const scheme of value.schemes) {
    if (scheme.diffHash !== session.diffHash || scheme.stale) {
      missing.push(scheme.name);
      continue;
    }
    enforceInvariants({
      kind: 'partition',
      scheme: scheme.name,
      reviewableIds,
      groupMembers: scheme.groups.map(group => group.lineIds),
    });
    session.schemes.set(scheme.name, scheme);
  }
  for (const name of SCHEME_NAMES) {
    if (!session.schemes.has(name) && !missing.includes(name)) missing.push(name);
  }
  if (missing.length > 0) {
    buildEagerSchemes(session, missing);
  }

  return session;
}

/**
 * Rebuild a session from a diff and whatever survives of a damaged record:
 * a resolved status is kept only where the record's digest of that line
 * still matches the line's content.
 */
export async function recoverSession(
  changeId: string,
  damaged: unknown,
  diffText: string,
  options: SessionOptions
): Promise<{ session: ReviewSession; kept: number }> {
  const session = await createSession(changeId, diffText, options);

  const record = isObject(damaged) ? damaged : {};
  const statuses = isObject(record.statuses) ? record.statuses : {};
  const digests = isObject(record.lineDigests) ? record.lineDigests : {};

  const keep = new Map<LineStatus, LineID[]>();
  for (const id of session.queue.reviewableIds()) {
    const status = statuses[id];
    const line = session.queue.line(id);
    if (!isLineStatus(status) || status === 'UNREVIEWED' || !line) continue;
    if (digests[id] !== contentDigest(line.content)) continue;
    keep.set(status, [...(keep.get(status) ?? []), id]);
  }

  let kept = 0;
  for (const [status, ids] of keep) {
    kept += session.queue.applyBulk(ids, status, 'recover').changed.length;
  }

  if (isSchemeName(record.activeScheme)) {
    session.activeScheme = record.activeScheme;
  }
  session.audit.push({ action: 'recover', selector: changeId, changed: kept, at: new Date().toISOString() });

  logger.forChange(changeId).warn('session_recovered', 'Session rebuilt from diff after corruption', {
    kept,
    reviewable: session.queue.total,
  });
  return { session, kept };
}
