import { Octokit } from '@octokit/rest';
import { logger } from '../observability/logger.js';

export interface RepoCoordinates {
  owner: string;
  repo: string;
}

export interface PullRequestSummary {
  number: number;
  title: string;
  body: string;
  url: string;
  baseRef: string;
  headRef: string;
}

const REMOTE_PATTERNS = [
  /^git@github\.com:([^/]+)\/(.+?)(?:\.git)?$/,
  /^https?:\/\/(?:[^@/]+@)?github\.com\/([^/]+)\/(.+?)(?:\.git)?\/?$/,
  /^ssh:\/\/git@github\.com\/([^/]+)\/(.+?)(?:\.git)?$/,
];

export function parseGitHubRemote(remoteUrl: string): RepoCoordinates | null {
  for (const pattern of REMOTE_PATTERNS) {
    const match = remoteUrl.trim().match(pattern);
    if (match) {
      return { owner: match[1], repo: match[2] };
    }
  }
  return null;
}

export function createGitHubClient(token: string | undefined): Octokit | null {
  if (!token) {
    return null;
  }
  return new Octokit({ auth: token });
}

/**
 * Open pull request whose head is `branch`, or null when there is none. Only
 * reads; nothing is ever posted back.
 */
export async function findPullRequest(
  octokit: Octokit,
  coordinates: RepoCoordinates,
  branch: string
): Promise<PullRequestSummary | null> {
  try {
    const { data } = await octokit.rest.pulls.list({
      owner: coordinates.owner,
      repo: coordinates.repo,
      head: `${coordinates.owner}:${branch}`,
      state: 'open',
      per_page: 1,
    });

    const pr = data[0];
    if (!pr) {
      return null;
    }

    return {
      number: pr.number,
      title: pr.title.trim(),
      body: (pr.body ?? '').trim(),
      url: pr.html_url,
      baseRef: pr.base.ref,
      headRef: pr.head.ref,
    };
  } catch (error) {
    logger.warn('github_pr_lookup_failed', 'Could not fetch pull request summary', {
      owner: coordinates.owner,
      repo: coordinates.repo,
      branch,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    return null;
  }
}
