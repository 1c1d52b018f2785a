import type { Group, GroupStatus, GroupingScheme, LineStatus, SchemeName, StatusBreakdown } from '../types.js';
import type { LineQueue } from '../queue/line-queue.js';
import { InvalidSelectorError } from '../queue/errors.js';
import { enforceInvariants } from '../invariants/checker.js';
import { logger } from '../observability/logger.js';
import type { GroupingContext } from './types.js';
import { buildFileTypeGroups } from './file-type.js';
import { buildFormattingGroups } from './formatting.js';
import { buildScopeGroups } from './scope.js';
import { buildCommitGroups } from './commit.js';
import { buildCoChangeGroups } from './co-change.js';

const BUILDERS: Record<SchemeName, (ctx: GroupingContext) => Group[]> = {
  'file-type': buildFileTypeGroups,
  'formatting': buildFormattingGroups,
  'scope': buildScopeGroups,
  'commit': buildCommitGroups,
  'co-change': buildCoChangeGroups,
};

/** Schemes whose inputs are expensive enough to compute off the request path. */
export const BACKGROUND_SCHEMES: ReadonlySet<SchemeName> = new Set<SchemeName>(['co-change']);

export function buildScheme(name: SchemeName, ctx: GroupingContext): GroupingScheme {
  const groups = BUILDERS[name](ctx);

  enforceInvariants({
    kind: 'partition',
    scheme: name,
    reviewableIds: ctx.reviewable.map(line => line.id),
    groupMembers: groups.map(group => group.lineIds),
  });

  logger.debug('grouping_built', 'Grouping scheme built', {
    scheme: name,
    groups: groups.length,
    lines: ctx.reviewable.length,
  });

  return {
    name,
    diffHash: ctx.diff.contentHash,
    stale: false,
    groups,
  };
}

/** Stand-in held while a background computation is running. */
export function staleScheme(name: SchemeName, diffHash: string, previous?: GroupingScheme): GroupingScheme {
  return {
    name,
    diffHash,
    stale: true,
    groups: previous?.groups ?? [],
  };
}

export function groupBreakdown(group: Group, queue: LineQueue): StatusBreakdown {
  const counts: StatusBreakdown = { UNREVIEWED: 0, SKIMMED: 0, DEEP_REVIEWED: 0, FILTERED: 0, total: 0 };
  for (const id of group.lineIds) {
    const status: LineStatus | undefined = queue.status(id);
    if (status === undefined) continue;
    counts[status]++;
    counts.total++;
  }
  return counts;
}

/** Derived on every call; groups never store status. */
export function groupStatus(group: Group, queue: LineQueue): GroupStatus {
  return group.lineIds.every(id => queue.status(id) !== 'UNREVIEWED') ? 'REVIEWED' : 'PARTIAL';
}

/**
 * Look a group up by id, by id without the scheme prefix, or by label.
 * Returns null when nothing matches; an ambiguous label is an error.
 */
export function findGroup(scheme: GroupingScheme, name: string): Group | null {
  const byId = scheme.groups.find(group => group.id === name || group.id === `${scheme.name}:${name}`);
  if (byId) return byId;

  const byLabel = scheme.groups.filter(group => group.label === name);
  if (byLabel.length > 1) {
    throw new InvalidSelectorError(
      `group:${name}`,
      `label matches ${byLabel.length} groups in ${scheme.name}: ${byLabel.map(g => g.id).join(', ')}`
    );
  }
  return byLabel[0] ?? null;
}
