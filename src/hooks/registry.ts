import { logger } from '../observability/logger.js';
import type { HookContext, HookPhase, HookReport, PostProcessingHook } from './types.js';

export class HookRegistry {
  private readonly hooks: PostProcessingHook[] = [];

  register(hook: PostProcessingHook): this {
    this.hooks.push(hook);
    return this;
  }

  forPhase(phase: HookPhase): PostProcessingHook[] {
    return this.hooks.filter(hook => hook.phase === phase);
  }

  /**
   * Run every hook of a phase in registration order and merge their tags into
   * the session's classifications. A failing hook is logged and skipped.
   */
  async run(phase: HookPhase, context: HookContext): Promise<HookReport> {
    const report: HookReport = { suggestions: [], failed: [] };

    for (const hook of this.forPhase(phase)) {
      try {
        const outcome = await hook.run(context);

        for (const [id, tags] of Object.entries(outcome.tags ?? {})) {
          const existing = context.session.classifications.get(id);
          if (existing) {
            tags.forEach(tag => existing.add(tag));
          } else {
            context.session.classifications.set(id, new Set(tags));
          }
        }
        report.suggestions.push(...(outcome.suggestions ?? []));

        logger.forChange(context.session.changeId).debug('hook_completed', 'Post-processing hook completed', {
          hook: hook.name,
          phase,
          tagged: Object.keys(outcome.tags ?? {}).length,
          suggestions: outcome.suggestions?.length ?? 0,
        });
      } catch (error) {
        report.failed.push(hook.name);
        logger.forChange(context.session.changeId).error('hook_failed', 'Post-processing hook failed', {
          hook: hook.name,
          phase,
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      }
    }

    return report;
  }
}
