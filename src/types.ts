export type ChangeKind = 'added' | 'context' | 'removed';

export type LineID = string;

export type LineStatus = 'UNREVIEWED' | 'SKIMMED' | 'DEEP_REVIEWED' | 'FILTERED';

export const LINE_STATUSES: readonly LineStatus[] = ['UNREVIEWED', 'SKIMMED', 'DEEP_REVIEWED', 'FILTERED'];

export interface DiffLine {
  id: LineID;
  filePath: string;
  hunkIndex: number;
  kind: ChangeKind;
  content: string;
  oldLineNumber?: number;
  newLineNumber?: number;
}

export interface Hunk {
  filePath: string;
  index: number;
  ordinal: number;
  header: string;
  section: string;
  oldStart: number;
  oldLines: number;
  newStart: number;
  newLines: number;
  lines: DiffLine[];
}

export type FileStatus = 'added' | 'removed' | 'modified' | 'renamed';

export interface DiffFile {
  path: string;
  oldPath: string;
  status: FileStatus;
  binary: boolean;
  hunks: Hunk[];
}

export interface ParsedDiff {
  files: DiffFile[];
  contentHash: string;
}

export interface LineRange {
  start: number;
  end: number;
}

export type SchemeName = 'file-type' | 'formatting' | 'scope' | 'commit' | 'co-change';

export const SCHEME_NAMES: readonly SchemeName[] = ['file-type', 'formatting', 'scope', 'commit', 'co-change'];

export interface Group {
  id: string;
  label: string;
  scheme: SchemeName;
  primaryPath: string;
  lineIds: LineID[];
}

export type GroupStatus = 'REVIEWED' | 'PARTIAL';

export interface GroupingScheme {
  name: SchemeName;
  diffHash: string;
  stale: boolean;
  groups: Group[];
}

export type Selector =
  | { kind: 'group'; name: string }
  | { kind: 'file'; path: string }
  | { kind: 'lines'; ids: LineID[] };

export interface StatusBreakdown {
  UNREVIEWED: number;
  SKIMMED: number;
  DEEP_REVIEWED: number;
  FILTERED: number;
  total: number;
}

export function isLineStatus(value: unknown): value is LineStatus {
  return typeof value === 'string' && (LINE_STATUSES as readonly string[]).includes(value);
}

export function isSchemeName(value: unknown): value is SchemeName {
  return typeof value === 'string' && (SCHEME_NAMES as readonly string[]).includes(value);
}

export function describeSelector(selector: Selector): string {
  switch (selector.kind) {
    case 'group':
      return `group:${selector.name}`;
    case 'file':
      return `file:${selector.path}`;
    case 'lines':
      return `lines:${selector.ids.join(',')}`;
  }
}
