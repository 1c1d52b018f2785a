import type { GroupingScheme, SchemeName } from '../types.js';
import { logger } from '../observability/logger.js';

export type SchemeComputation = () => GroupingScheme;

export interface BackgroundTask {
  scheme: SchemeName;
  diffHash: string;
  done: Promise<GroupingScheme | null>;
}

function nextTick(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

/**
 * Runs scheme computations after yielding to the event loop so queries and
 * mutations queued before them are not delayed. `install` decides whether a
 * finished result still applies (the diff may have been re-ingested).
 */
export class BackgroundGrouping {
  private readonly tasks = new Map<string, BackgroundTask>();

  schedule(
    key: string,
    scheme: SchemeName,
    diffHash: string,
    compute: SchemeComputation,
    install: (result: GroupingScheme) => boolean | Promise<boolean>
  ): BackgroundTask {
    const taskKey = `${key}:${scheme}`;

    const run = async (): Promise<GroupingScheme | null> => {
      await nextTick();
      try {
        const result = compute();
        const installed = await install(result);
        logger.forChange(key).info('grouping_background_done', 'Background grouping finished', {
          scheme,
          groups: result.groups.length,
          installed,
        });
        return installed ? result : null;
      } catch (error) {
        logger.forChange(key).error('grouping_background_error', 'Background grouping failed', {
          scheme,
          error: error instanceof Error ? error.message : 'Unknown error',
        });
        return null;
      } finally {
        if (this.tasks.get(taskKey)?.done === done) {
          this.tasks.delete(taskKey);
        }
      }
    };
    const done = run();

    const task: BackgroundTask = { scheme, diffHash, done };
    this.tasks.set(taskKey, task);
    return task;
  }

  pending(key: string): BackgroundTask[] {
    return Array.from(this.tasks.entries())
      .filter(([taskKey]) => taskKey.startsWith(`${key}:`))
      .map(([, task]) => task);
  }

  async settle(key: string): Promise<void> {
    await Promise.all(this.pending(key).map(task => task.done));
  }
}
