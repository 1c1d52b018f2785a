import { simpleGit } from 'simple-git';
import type { CoChangeLog, CoChangePair, CommitAttribution, CommitRef } from '../grouping/types.js';
import { compareCodeUnits } from '../grouping/partition.js';
import { logger } from '../observability/logger.js';

const COMMIT_MARKER = 'commit:';
const BLAME_HEADER = /^([0-9a-f]{40}) \d+ (\d+)(?: \d+)?$/;
const UNCOMMITTED_SHA = '0'.repeat(40);

/**
 * Count how often each pair of `files` was modified by the same commit.
 * Expects `git log --name-only --pretty=format:commit:%H` output.
 */
export function parseCoChangeLog(output: string, files?: ReadonlySet<string>): CoChangeLog {
  const counts = new Map<string, CoChangePair>();
  let commitsScanned = 0;
  let touched: string[] = [];

  const flush = () => {
    const unique = Array.from(new Set(touched)).sort(compareCodeUnits);
    for (let i = 0; i < unique.length; i++) {
      for (let j = i + 1; j < unique.length; j++) {
        const key = `${unique[i]}\0${unique[j]}`;
        const pair = counts.get(key);
        if (pair) {
          pair.count++;
        } else {
          counts.set(key, { a: unique[i], b: unique[j], count: 1 });
        }
      }
    }
    touched = [];
  };

  for (const raw of output.split('\n')) {
    const line = raw.trim();
    if (line.startsWith(COMMIT_MARKER)) {
      flush();
      commitsScanned++;
      continue;
    }
    if (line.length === 0) continue;
    if (!files || files.has(line)) touched.push(line);
  }
  flush();

  const pairs = Array.from(counts.values()).sort((x, y) =>
    compareCodeUnits(x.a, y.a) || compareCodeUnits(x.b, y.b)
  );
  return { pairs, commitsScanned };
}

/** Post-image line number → originating commit, from `git blame --line-porcelain`. */
export function parseBlamePorcelain(output: string): Record<number, CommitRef> {
  const result: Record<number, CommitRef> = {};
  const summaries = new Map<string, string>();
  let sha: string | null = null;
  let finalLine = 0;

  for (const line of output.split('\n')) {
    const header = line.match(BLAME_HEADER);
    if (header) {
      sha = header[1];
      finalLine = parseInt(header[2], 10);
      continue;
    }
    if (sha === null) continue;

    if (line.startsWith('summary ')) {
      summaries.set(sha, line.slice('summary '.length));
    } else if (line.startsWith('\t')) {
      if (sha !== UNCOMMITTED_SHA) {
        result[finalLine] = { sha, summary: summaries.get(sha) ?? '' };
      }
      sha = null;
    }
  }

  return result;
}

export async function readCoChangeLog(
  repoRoot: string,
  files: readonly string[],
  maxCommits: number
): Promise<CoChangeLog> {
  const output = await simpleGit(repoRoot).raw([
    'log',
    `--max-count=${maxCommits}`,
    '--name-only',
    `--pretty=format:${COMMIT_MARKER}%H`,
  ]);
  const log = parseCoChangeLog(output, new Set(files));

  logger.debug('git_co_change_read', 'Read co-change history', {
    commits: log.commitsScanned,
    pairs: log.pairs.length,
  });
  return log;
}

/** Blame every file at `headRef`; files that cannot be blamed are skipped. */
export async function readCommitAttribution(
  repoRoot: string,
  files: readonly string[],
  headRef: string = 'HEAD'
): Promise<CommitAttribution> {
  const git = simpleGit(repoRoot);
  const lines: CommitAttribution['lines'] = {};

  for (const file of files) {
    try {
      const output = await git.raw(['blame', '--line-porcelain', headRef, '--', file]);
      lines[file] = parseBlamePorcelain(output);
    } catch (error) {
      logger.warn('git_blame_skipped', 'Could not attribute file to commits', {
        file,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  return { lines };
}
