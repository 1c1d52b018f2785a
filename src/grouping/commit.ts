import type { Group } from '../types.js';
import type { GroupingContext } from './types.js';
import { partitionLines } from './partition.js';

export const UNATTRIBUTED_KEY = 'unattributed';

export function buildCommitGroups(ctx: GroupingContext): Group[] {
  const attribution = ctx.commits?.lines ?? {};

  return partitionLines('commit', ctx.reviewable, line => {
    const commit = line.newLineNumber === undefined
      ? undefined
      : attribution[line.filePath]?.[line.newLineNumber];
    if (!commit) {
      return { key: UNATTRIBUTED_KEY, label: UNATTRIBUTED_KEY };
    }
    return { key: commit.sha, label: `${commit.sha.substring(0, 7)} ${commit.summary}`.trim() };
  });
}
