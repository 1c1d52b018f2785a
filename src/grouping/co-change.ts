import type { Group } from '../types.js';
import type { CoChangeLog, GroupingContext } from './types.js';
import { partitionLines } from './partition.js';
import { UnionFind } from './union-find.js';

/**
 * Cluster files that were modified together more than `threshold` times.
 * Pairs naming files outside `files` are ignored.
 */
export function clusterCoChangedFiles(
  files: readonly string[],
  log: CoChangeLog | undefined,
  threshold: number
): UnionFind {
  const forest = new UnionFind();
  for (const file of files) forest.add(file);

  for (const pair of log?.pairs ?? []) {
    if (pair.count <= threshold) continue;
    if (!forest.has(pair.a) || !forest.has(pair.b)) continue;
    forest.union(pair.a, pair.b);
  }

  return forest;
}

export function buildCoChangeGroups(ctx: GroupingContext): Group[] {
  const files = Array.from(new Set(ctx.reviewable.map(line => line.filePath)));
  const forest = clusterCoChangedFiles(files, ctx.coChange, ctx.coChangeThreshold);
  const clusters = forest.clusters();

  return partitionLines('co-change', ctx.reviewable, line => {
    const key = forest.representative(line.filePath);
    const size = clusters.get(key)?.length ?? 1;
    return { key, label: size > 1 ? `${key} +${size - 1} co-changed` : key };
  });
}
