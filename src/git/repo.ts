import path from 'path';
import { simpleGit } from 'simple-git';

export interface RepoContext {
  root: string;
  branch: string | null;
  remoteUrl: string | null;
}

export async function detectRepo(inputPath: string): Promise<RepoContext> {
  const absolutePath = path.resolve(inputPath);
  const git = simpleGit(absolutePath);

  const isRepo = await git.checkIsRepo();
  if (!isRepo) {
    throw new Error(`Not a git repository: ${absolutePath}`);
  }

  const root = (await git.revparse(['--show-toplevel'])).trim();

  let branch: string | null = (await git.revparse(['--abbrev-ref', 'HEAD'])).trim();
  if (branch === 'HEAD') {
    // detached
    branch = null;
  }

  const remotes = await git.getRemotes(true);
  const origin = remotes.find(remote => remote.name === 'origin') ?? remotes[0];

  return {
    root,
    branch,
    remoteUrl: origin?.refs.fetch || null,
  };
}

/** Session key for a branch: the branch name, or the short HEAD sha when detached. */
export async function changeIdFor(repo: RepoContext): Promise<string> {
  if (repo.branch) return repo.branch;
  const sha = await simpleGit(repo.root).revparse(['--short', 'HEAD']);
  return sha.trim();
}
