import { readFile } from 'fs/promises';
import type { AppConfig } from '../config/config.js';
import { parseUnifiedDiff, reviewableLines } from '../diff/parser.js';
import { createGitHubClient, findPullRequest, parseGitHubRemote } from '../providers/github.js';
import type { PullRequestSummary } from '../providers/github.js';
import { findTicketKey } from '../providers/ticket.js';
import { logger } from '../observability/logger.js';
import type { IngestRequest } from '../session/manager.js';
import type { ChangeMetadata } from '../session/types.js';
import { readBranchDiff } from './diff-source.js';
import { readCoChangeLog, readCommitAttribution } from './history.js';
import type { RepoContext } from './repo.js';

export interface CollectOptions {
  changeId: string;
  baseRef?: string;
  diffFile?: string;
  /** Read co-change history and blame; off for diffs that did not come from this repo. */
  history?: boolean;
}

/** Title, description and the ticket key found in either. */
export function pullRequestMetadata(pr: PullRequestSummary): ChangeMetadata {
  return {
    title: pr.title,
    body: pr.body || undefined,
    ticketKey: findTicketKey(pr.title, pr.body) ?? undefined,
  };
}

async function describeChange(repo: RepoContext, config: AppConfig, baseRef: string): Promise<ChangeMetadata> {
  let metadata: ChangeMetadata = { baseRef, branch: repo.branch ?? undefined };

  const octokit = createGitHubClient(config.githubToken);
  const coordinates = repo.remoteUrl ? parseGitHubRemote(repo.remoteUrl) : null;
  if (octokit && coordinates && repo.branch) {
    const pr = await findPullRequest(octokit, coordinates, repo.branch);
    if (pr) {
      metadata = { ...metadata, ...pullRequestMetadata(pr) };
    }
  }

  metadata.ticketKey = metadata.ticketKey ?? findTicketKey(repo.branch) ?? undefined;
  return metadata;
}

/**
 * Everything an ingest needs from the working copy: the diff, history for
 * the co-change and commit groupings, and display metadata.
 */
export async function collectChange(
  repo: RepoContext,
  config: AppConfig,
  options: CollectOptions
): Promise<IngestRequest> {
  const baseRef = options.baseRef ?? config.baseRef;
  const diffText = options.diffFile
    ? await readFile(options.diffFile, 'utf8')
    : await readBranchDiff(repo.root, baseRef);

  const request: IngestRequest = {
    changeId: options.changeId,
    diffText,
    metadata: await describeChange(repo, config, baseRef),
  };

  const useHistory = options.history ?? !options.diffFile;
  if (!useHistory) {
    return request;
  }

  const files = Array.from(new Set(reviewableLines(parseUnifiedDiff(diffText)).map(line => line.filePath)));
  try {
    request.inputs = {
      coChange: await readCoChangeLog(repo.root, files, config.coChange.maxCommits),
      commits: await readCommitAttribution(repo.root, files),
    };
  } catch (error) {
    logger.warn('git_history_unavailable', 'History unavailable, co-change and commit groupings fall back to files', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
  return request;
}
