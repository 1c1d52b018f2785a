import type { LineID } from '../types.js';
import type { ReviewSession } from '../session/types.js';
import type { ResolutionResult } from '../resolution/engine.js';

export type HookPhase = 'ingest' | 'resolution';

export interface HookContext {
  session: ReviewSession;
  /** Present for resolution-phase hooks. */
  result?: ResolutionResult;
}

export interface DocSuggestion {
  filePath: string;
  line: number;
  definition: string;
  text: string;
  source: 'heuristic' | 'claude';
}

export interface HookOutcome {
  tags?: Record<LineID, string[]>;
  suggestions?: DocSuggestion[];
}

/**
 * Work attached to a session after ingestion or after a resolution. Hooks
 * only add information; they never change a line's status.
 */
export interface PostProcessingHook {
  name: string;
  phase: HookPhase;
  run(context: HookContext): HookOutcome | Promise<HookOutcome>;
}

export interface HookReport {
  suggestions: DocSuggestion[];
  failed: string[];
}
