import pc from 'picocolors';
import type { AppConfig } from '../config/config.js';
import { exitCodeFor } from '../errors.js';
import { changeIdFor, detectRepo } from '../git/repo.js';
import type { RepoContext } from '../git/repo.js';
import { logger } from '../observability/logger.js';
import { shutdownRedis } from '../persistence/redis-client.js';
import { createSessionManager } from '../runtime.js';
import type { SessionManager } from '../session/manager.js';

export type GlobalOptions = {
  change?: string;
  repo: string;
  verbose?: boolean;
};

export interface CommandContext {
  config: AppConfig;
  repo: RepoContext;
  changeId: string;
  manager: SessionManager;
}

async function resolveRepo(options: GlobalOptions, config: AppConfig): Promise<RepoContext> {
  try {
    return await detectRepo(options.repo);
  } catch (error) {
    // an explicit change id with an explicit store needs no repository
    if (options.change && (config.stateDir || config.redisUrl)) {
      return { root: process.cwd(), branch: null, remoteUrl: null };
    }
    throw error;
  }
}

export async function createContext(options: GlobalOptions, config: AppConfig): Promise<CommandContext> {
  if (options.verbose) {
    logger.setLevel('debug');
  }

  const repo = await resolveRepo(options, config);
  const changeId = options.change ?? await changeIdFor(repo);
  logger.setContext({ changeId, repoRoot: repo.root });

  return {
    config,
    repo,
    changeId,
    manager: createSessionManager(config, { repoRoot: repo.root }),
  };
}

/**
 * Run one command: build the context, run the action, wait for background
 * groupings so they are persisted, and map any error to an exit code.
 */
export async function runCommand(
  options: GlobalOptions,
  config: AppConfig,
  action: (context: CommandContext) => Promise<void>
): Promise<void> {
  let context: CommandContext | null = null;
  try {
    context = await createContext(options, config);
    await action(context);
  } catch (error) {
    console.error(pc.red('Error:'), error instanceof Error ? error.message : error);
    process.exitCode = exitCodeFor(error);
  } finally {
    if (context) {
      await context.manager.awaitBackground(context.changeId);
    }
    await shutdownRedis();
  }
}
