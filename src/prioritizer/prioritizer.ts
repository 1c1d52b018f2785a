import type { GroupingScheme } from '../types.js';
import type { ReviewSession } from '../session/types.js';
import { compareCodeUnits } from '../grouping/partition.js';
import { logger } from '../observability/logger.js';
import { ScoringIndex, scoreGroup } from './complexity-scorer.js';
import type { RankedGroup, ScoringWeights } from './types.js';

/**
 * Total order over a scheme's groups: score descending, then primary path
 * ascending, then group id ascending. Comparisons are by code unit, never
 * locale, so the order is reproducible across machines.
 */
export function rankGroups(scheme: GroupingScheme, index: ScoringIndex, weights: ScoringWeights): RankedGroup[] {
  const scored = scheme.groups.map(group => ({ group, score: scoreGroup(group, index, weights) }));

  scored.sort((a, b) =>
    b.score.score - a.score.score ||
    compareCodeUnits(a.group.primaryPath, b.group.primaryPath) ||
    compareCodeUnits(a.group.id, b.group.id)
  );

  return scored.map((entry, position) => ({ rank: position + 1, ...entry }));
}

export function rankActiveScheme(session: ReviewSession): RankedGroup[] {
  const scheme = session.schemes.get(session.activeScheme);
  if (!scheme) return [];
  const index = new ScoringIndex(session.diff, session.settings.analyzers);
  return rankGroups(scheme, index, session.settings.weights);
}

/**
 * Highest-ranked group of the active scheme that still has an unreviewed
 * line. A stale scheme yields nothing until its computation finishes.
 */
export function nextPriorityGroup(session: ReviewSession): RankedGroup | null {
  const scheme = session.schemes.get(session.activeScheme);
  if (!scheme) return null;

  if (scheme.stale) {
    logger.forChange(session.changeId).info('priority_stale_scheme', 'Active scheme is stale, no priority group available', {
      scheme: scheme.name,
    });
    return null;
  }

  for (const ranked of rankActiveScheme(session)) {
    if (ranked.group.lineIds.some(id => session.queue.status(id) === 'UNREVIEWED')) {
      return ranked;
    }
  }
  return null;
}
