import type { AnalyzerRegistry } from '../analyzers/registry.js';
import type { DiffLine, ParsedDiff } from '../types.js';

export interface CommitRef {
  sha: string;
  summary: string;
}

/** Originating commit per post-image line: `path → line number → commit`. */
export interface CommitAttribution {
  lines: Record<string, Record<number, CommitRef>>;
}

export interface CoChangePair {
  a: string;
  b: string;
  count: number;
}

/** Pairwise co-modification counts read from version-control history. */
export interface CoChangeLog {
  pairs: CoChangePair[];
  commitsScanned: number;
}

export interface GroupingInputs {
  commits?: CommitAttribution;
  coChange?: CoChangeLog;
}

export interface GroupingContext extends GroupingInputs {
  diff: ParsedDiff;
  reviewable: DiffLine[];
  analyzers: AnalyzerRegistry;
  coChangeThreshold: number;
  formattingOnly: ReadonlySet<string>;
}

export interface GroupKey {
  key: string;
  label: string;
}
