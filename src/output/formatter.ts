import type { ResolutionResult } from '../resolution/engine.js';
import type { DocSuggestion } from '../hooks/types.js';
import type {
  DeepDiveView,
  FileProgress,
  GroupsView,
  NextView,
  OverviewView,
  RemainingFile,
  StatusView,
} from '../session/views.js';
import type { GroupView } from '../session/views.js';

const PATH_COLUMN = 25;

const RESULT_VERBS: Record<ResolutionResult['action'], string> = {
  'ingest': 'Ingested',
  'skim': 'Skimmed',
  'file-mode': 'Skimmed',
  'filter': 'Filtered',
  'deep-dive': 'Opened',
  'deep-confirm': 'Deep-reviewed',
  'deep-cancel': 'Suspended',
  'reopen': 'Reopened',
  'recover': 'Recovered',
};

export function formatStatusLine(status: StatusView): string {
  return `${status.remaining} remaining, ${status.percentReviewed}% reviewed, ${status.filesTouched} files touched`;
}

export function formatStatus(status: StatusView): string {
  const lines = [formatStatusLine(status)];
  const { SKIMMED, DEEP_REVIEWED, FILTERED, total } = status.breakdown;
  lines.push(`skimmed ${SKIMMED}, deep-reviewed ${DEEP_REVIEWED}, filtered ${FILTERED}, of ${total} lines`);
  lines.push(`grouping: ${status.activeScheme}${status.staleSchemes.includes(status.activeScheme) ? ' (computing)' : ''}`);
  if (status.deepDive) {
    lines.push(`deep dive: ${status.deepDive}`);
  }
  return lines.join('\n');
}

function fileRow(file: FileProgress, bullet: string): string {
  const mark = file.remaining === 0 ? '✅ ' : '';
  return `${bullet} ${mark}${file.path.padEnd(PATH_COLUMN)} +${file.total}`;
}

/** Files numbered by position, optionally only those with unreviewed lines. */
export function formatFileList(files: FileProgress[], onlyUnreviewed = false): string {
  return files
    .map((file, index) => ({ file, row: fileRow(file, `${index + 1}.`) }))
    .filter(({ file }) => !onlyUnreviewed || file.remaining > 0)
    .map(({ row }) => row)
    .join('\n');
}

export function formatOverview(view: OverviewView, numbered = false): string {
  const sections: string[] = [];

  if (view.title) {
    sections.push(`📌 PR Summary: ${view.title}`);
  }
  if (view.ticket) {
    sections.push(`🔗 Jira: ${view.ticket}`);
  }
  if (view.body) {
    sections.push(...view.body.split('\n').map(line => `> ${line}`.trimEnd()));
  }
  if (view.branch) {
    sections.push(`🌿 Branch: ${view.branch}${view.baseRef ? ` (against ${view.baseRef})` : ''}`);
  }

  sections.push('');
  sections.push('📁 File Summary:');
  view.files.forEach((file, index) => sections.push(fileRow(file, numbered ? `${index + 1}.` : '-')));

  const total = view.files.reduce((sum, file) => sum + file.total, 0);
  sections.push('');
  sections.push(`🦮 Total: ${view.files.length} files, ${total} changed lines`);
  sections.push(formatStatusLine(view.status));

  return sections.join('\n').replace(/^\n/, '');
}

function groupRow(group: GroupView): string {
  const mark = group.status === 'REVIEWED' ? '✅' : '  ';
  const remaining = `${group.breakdown.UNREVIEWED}/${group.breakdown.total} left`;
  return `${String(group.rank).padStart(3)}. ${mark} ${group.label}  [score ${group.score}, ${remaining}]`;
}

export function formatGroups(view: GroupsView): string {
  if (view.stale) {
    return `Grouping ${view.scheme} is still being computed; try again shortly.`;
  }
  const lines = [`Grouping: ${view.scheme} (${view.groups.length} groups)`];
  view.groups.forEach(group => lines.push(groupRow(group)));
  return lines.join('\n');
}

export function formatNext(view: NextView): string {
  switch (view.reason) {
    case 'stale':
      return 'Active grouping is still being computed; no priority group yet.';
    case 'done':
      return 'Nothing left to review in the active grouping.';
    case 'ready': {
      if (!view.group) return 'Nothing left to review in the active grouping.';
      const group = view.group;
      const lines = [
        `Next: ${group.label} (${group.id})`,
        `  score ${group.score}, branch delta ${group.branchDelta >= 0 ? '+' : ''}${group.branchDelta}, ${group.breakdown.UNREVIEWED} of ${group.breakdown.total} lines unreviewed`,
      ];
      if (group.definitions.length > 0) {
        lines.push(`  defines ${group.definitions.join(', ')}`);
      }
      return lines.join('\n');
    }
  }
}

export function formatRemaining(files: RemainingFile[]): string {
  if (files.length === 0) {
    return 'No unreviewed lines.';
  }
  const lines: string[] = [];
  for (const file of files) {
    lines.push(`${file.path} (${file.lines.length})`);
    file.lines.forEach(line => lines.push(`  ${String(line.line).padStart(5)}  ${line.content}`));
  }
  return lines.join('\n');
}

export function formatTests(files: FileProgress[]): string {
  if (files.length === 0) {
    return 'No test files in this change.';
  }
  const untested = files.filter(file => file.remaining > 0).length;
  const lines = files.map(file => fileRow(file, '-'));
  lines.push(`${files.length} test files, ${untested} with unreviewed lines`);
  return lines.join('\n');
}

export function formatDeepDive(view: DeepDiveView | null): string {
  if (!view) {
    return 'No deep dive in progress.';
  }
  if (view.phase === 'COMPLETED') {
    return `Deep dive ${view.selector}: COMPLETED (${view.stops} hunks)`;
  }

  const lines = [
    `Deep dive ${view.selector}: ${view.label} [${view.position + 1}/${view.stops}]`,
  ];
  if (view.phase === 'SUSPENDED') {
    lines.push('Suspended; review the same selector in deep mode to resume.');
  }
  if (view.filePath) lines.push(view.filePath);
  if (view.header) lines.push(view.header);

  for (const line of view.lines) {
    const sign = line.kind === 'added' ? '+' : line.kind === 'removed' ? '-' : ' ';
    const number = line.newLineNumber ?? line.oldLineNumber ?? 0;
    lines.push(`${line.member ? '>' : ' '}${String(number).padStart(5)} ${sign}${line.content}`);
  }
  return lines.join('\n');
}

export function formatResult(result: ResolutionResult): string {
  const verb = RESULT_VERBS[result.action];
  const tag = result.tag ? ` [${result.tag}]` : '';

  if (result.action === 'deep-dive' || result.action === 'deep-cancel') {
    return `${verb} deep dive ${result.selector}${tag}`;
  }

  const already = result.unchanged.length > 0 ? `, ${result.unchanged.length} unchanged` : '';
  return `> ${verb} ${result.changed.length} lines (${result.selector})${tag}${already}; ${result.remaining} remaining`;
}

export function formatSuggestions(suggestions: DocSuggestion[]): string {
  return suggestions
    .map(suggestion => `💡 ${suggestion.filePath}:${suggestion.line} ${suggestion.definition}: ${suggestion.text}`)
    .join('\n');
}
