import { simpleGit } from 'simple-git';
import { logger } from '../observability/logger.js';

/**
 * Unified diff of HEAD against the merge base with `baseRef`, the same range
 * a pull request shows.
 */
export async function readBranchDiff(repoRoot: string, baseRef: string, headRef: string = 'HEAD'): Promise<string> {
  const git = simpleGit(repoRoot);
  const range = `${baseRef}...${headRef}`;

  const diff = await git.raw(['diff', '--no-color', '--no-ext-diff', '--find-renames', range]);

  logger.debug('git_diff_read', 'Read branch diff', {
    range,
    bytes: diff.length,
  });
  return diff;
}

/** The branch diff limited to one file, for showing it to the reviewer. */
export async function readFileDiff(repoRoot: string, baseRef: string, filePath: string): Promise<string> {
  return simpleGit(repoRoot).raw(['diff', '--no-ext-diff', `${baseRef}...HEAD`, '--', filePath]);
}
