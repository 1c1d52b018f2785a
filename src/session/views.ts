import type { DiffLine, GroupStatus, LineID, SchemeName, StatusBreakdown } from '../types.js';
import { SCHEME_NAMES } from '../types.js';
import type { FileCategory } from '../filters/deterministic.js';
import { categorizePath } from '../filters/deterministic.js';
import { groupBreakdown, groupStatus } from '../grouping/chunker.js';
import { percentReviewed } from '../queue/line-queue.js';
import { nextPriorityGroup, rankActiveScheme } from '../prioritizer/prioritizer.js';
import type { RankedGroup } from '../prioritizer/types.js';
import { currentStop } from '../resolution/deep-dive/machine.js';
import { describeCursor } from '../resolution/deep-dive/states.js';
import type { DeepDivePhase } from '../resolution/deep-dive/states.js';
import { ticketLink } from '../providers/ticket.js';
import type { ReviewSession } from './types.js';

export interface StatusView {
  changeId: string;
  breakdown: StatusBreakdown;
  remaining: number;
  percentReviewed: number;
  filesTouched: number;
  activeScheme: SchemeName;
  staleSchemes: SchemeName[];
  deepDive: string | null;
}

export interface GroupView {
  rank: number;
  id: string;
  label: string;
  primaryPath: string;
  score: number;
  branchDelta: number;
  definitions: string[];
  status: GroupStatus;
  breakdown: StatusBreakdown;
}

export interface GroupsView {
  scheme: SchemeName;
  stale: boolean;
  groups: GroupView[];
}

export interface NextView {
  group: GroupView | null;
  reason: 'ready' | 'stale' | 'done';
}

export interface RemainingLine {
  id: LineID;
  line: number;
  content: string;
}

export interface RemainingFile {
  path: string;
  lines: RemainingLine[];
}

export interface FileProgress {
  path: string;
  category: FileCategory;
  total: number;
  remaining: number;
}

export interface OverviewView {
  title?: string;
  body?: string;
  ticket?: string;
  branch?: string;
  baseRef?: string;
  files: FileProgress[];
  status: StatusView;
}

export interface DeepDiveLine {
  kind: DiffLine['kind'];
  content: string;
  oldLineNumber?: number;
  newLineNumber?: number;
  member: boolean;
}

export interface DeepDiveView {
  selector: string;
  phase: DeepDivePhase;
  label: string;
  position: number;
  stops: number;
  filePath?: string;
  header?: string;
  lines: DeepDiveLine[];
}

export function statusView(session: ReviewSession): StatusView {
  const breakdown = session.queue.breakdown();
  return {
    changeId: session.changeId,
    breakdown,
    remaining: breakdown.UNREVIEWED,
    percentReviewed: percentReviewed(breakdown),
    filesTouched: session.queue.filesWithRemaining().length,
    activeScheme: session.activeScheme,
    staleSchemes: SCHEME_NAMES.filter(name => session.schemes.get(name)?.stale === true),
    deepDive: session.cursor ? `${session.cursor.key} ${describeCursor(session.cursor)}` : null,
  };
}

function groupView(session: ReviewSession, ranked: RankedGroup): GroupView {
  return {
    rank: ranked.rank,
    id: ranked.group.id,
    label: ranked.group.label,
    primaryPath: ranked.group.primaryPath,
    score: ranked.score.score,
    branchDelta: ranked.score.branchDelta,
    definitions: ranked.score.definitions,
    status: groupStatus(ranked.group, session.queue),
    breakdown: groupBreakdown(ranked.group, session.queue),
  };
}

export function groupsView(session: ReviewSession): GroupsView {
  const scheme = session.schemes.get(session.activeScheme);
  return {
    scheme: session.activeScheme,
    stale: scheme?.stale ?? true,
    groups: scheme?.stale ? [] : rankActiveScheme(session).map(ranked => groupView(session, ranked)),
  };
}

export function nextView(session: ReviewSession): NextView {
  if (session.schemes.get(session.activeScheme)?.stale !== false) {
    return { group: null, reason: 'stale' };
  }
  const next = nextPriorityGroup(session);
  return next ? { group: groupView(session, next), reason: 'ready' } : { group: null, reason: 'done' };
}

export function remainingView(session: ReviewSession): RemainingFile[] {
  const files: RemainingFile[] = [];
  for (const path of session.queue.filesWithRemaining()) {
    const lines: RemainingLine[] = [];
    for (const id of session.queue.linesInFile(path)) {
      const line = session.queue.line(id);
      if (!line || session.queue.status(id) !== 'UNREVIEWED') continue;
      lines.push({ id, line: line.newLineNumber ?? 0, content: line.content });
    }
    files.push({ path, lines });
  }
  return files;
}

export function fileProgress(session: ReviewSession): FileProgress[] {
  return session.queue.filesTouched().map(path => {
    const ids = session.queue.linesInFile(path);
    return {
      path,
      category: categorizePath(path),
      total: ids.length,
      remaining: ids.filter(id => session.queue.status(id) === 'UNREVIEWED').length,
    };
  });
}

/** Progress of the test files in the change. */
export function testsView(session: ReviewSession): FileProgress[] {
  return fileProgress(session).filter(file => file.category === 'test');
}

export function overviewView(session: ReviewSession, jiraBase?: string): OverviewView {
  const { title, body, ticketKey, branch, baseRef } = session.metadata;
  return {
    title,
    body,
    ticket: ticketKey ? ticketLink(ticketKey, jiraBase) : undefined,
    branch,
    baseRef,
    files: fileProgress(session),
    status: statusView(session),
  };
}

export function deepDiveView(session: ReviewSession): DeepDiveView | null {
  const cursor = session.cursor;
  if (!cursor) return null;

  const view: DeepDiveView = {
    selector: cursor.key,
    phase: cursor.phase,
    label: describeCursor(cursor),
    position: cursor.index,
    stops: cursor.stops.length,
    lines: [],
  };

  const stop = currentStop(cursor);
  if (!stop) return view;

  const hunk = session.diff.files
    .find(file => file.path === stop.filePath)
    ?.hunks[stop.hunkIndex];
  const members = new Set(stop.lineIds);

  view.filePath = stop.filePath;
  view.header = stop.header;
  view.lines = (hunk?.lines ?? []).map(line => ({
    kind: line.kind,
    content: line.content,
    oldLineNumber: line.oldLineNumber,
    newLineNumber: line.newLineNumber,
    member: members.has(line.id),
  }));
  return view;
}
