import { categorizePath } from '../filters/deterministic.js';
import type { Group } from '../types.js';
import type { GroupingContext } from './types.js';
import { partitionLines } from './partition.js';

export function buildFileTypeGroups(ctx: GroupingContext): Group[] {
  return partitionLines('file-type', ctx.reviewable, line => {
    const category = categorizePath(line.filePath);
    return { key: category, label: category };
  });
}
