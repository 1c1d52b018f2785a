import type { AnalyzerRegistry } from '../analyzers/registry.js';
import type { GroupingInputs } from '../grouping/types.js';
import type { ScoringWeights } from '../prioritizer/types.js';
import type { LineQueue } from '../queue/line-queue.js';
import type { DeepDiveCursor } from '../resolution/deep-dive/states.js';
import type { GroupingScheme, LineID, LineStatus, ParsedDiff, SchemeName } from '../types.js';

export type ResolutionAction =
  | 'ingest'
  | 'skim'
  | 'file-mode'
  | 'filter'
  | 'deep-dive'
  | 'deep-confirm'
  | 'deep-cancel'
  | 'reopen'
  | 'recover';

export interface AuditRecord {
  action: ResolutionAction;
  selector: string;
  tag?: string;
  changed: number;
  at: string;
}

export interface SessionSettings {
  weights: ScoringWeights;
  coChangeThreshold: number;
  analyzers: AnalyzerRegistry;
}

/** Display-only facts about the change, filled by providers. */
export interface ChangeMetadata {
  title?: string;
  /** Pull request description, shown in the overview. */
  body?: string;
  branch?: string;
  baseRef?: string;
  ticketKey?: string;
}

export interface ReviewSession {
  changeId: string;
  diffText: string;
  diff: ParsedDiff;
  diffHash: string;
  queue: LineQueue;
  schemes: Map<SchemeName, GroupingScheme>;
  activeScheme: SchemeName;
  cursor: DeepDiveCursor | null;
  classifications: Map<LineID, Set<string>>;
  audit: AuditRecord[];
  inputs: GroupingInputs;
  metadata: ChangeMetadata;
  settings: SessionSettings;
  createdAt: string;
  updatedAt: string;
}

export const RECORD_VERSION = 1;

export interface PersistedSessionRecord {
  version: typeof RECORD_VERSION;
  changeId: string;
  diffHash: string;
  diffText: string;
  statuses: Record<LineID, LineStatus>;
  lineDigests: Record<LineID, string>;
  classifications: Record<LineID, string[]>;
  activeScheme: SchemeName;
  schemes: GroupingScheme[];
  cursor: DeepDiveCursor | null;
  inputs: GroupingInputs;
  metadata: ChangeMetadata;
  audit: AuditRecord[];
  createdAt: string;
  updatedAt: string;
  checksum: string;
}

export type UnsignedSessionRecord = Omit<PersistedSessionRecord, 'checksum'>;
