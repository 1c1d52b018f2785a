import type { AnalyzerRegistry } from '../analyzers/registry.js';
import type { LanguageAnalyzer } from '../analyzers/types.js';
import { isBoilerplatePath } from '../filters/deterministic.js';
import type { DiffLine, Group, Hunk, LineID, ParsedDiff } from '../types.js';
import type { GroupScore, LineScore, ScoringWeights } from './types.js';

const PRECISION = 10000;

function round(value: number): number {
  return Math.round(value * PRECISION) / PRECISION;
}

/**
 * Score one added line: a base line weight, plus weight per branching
 * construct, plus weight when it introduces a definition. Lines in vendored
 * or generated files, and purely declarative lines, are scaled down by
 * `boilerplateFactor`.
 */
export function scoreLine(
  line: DiffLine,
  analyzer: LanguageAnalyzer | null,
  weights: ScoringWeights
): LineScore {
  const branches = analyzer ? analyzer.countBranches(line.content) : 0;
  const definition = analyzer ? analyzer.definitionName(line.content) : null;
  const declarative = analyzer
    ? definition === null && analyzer.isDeclarative(line.content)
    : line.content.trim().length === 0;
  const boilerplate = isBoilerplatePath(line.filePath) || declarative;

  let score = weights.line + weights.branch * branches + (definition ? weights.definition : 0);
  if (boilerplate) {
    score *= weights.boilerplateFactor;
  }

  return { score, branches, definition, boilerplate };
}

/** Lookup tables shared by every group scored against one diff. */
export class ScoringIndex {
  private readonly hunkOf = new Map<LineID, Hunk>();
  private readonly lineOf = new Map<LineID, DiffLine>();

  constructor(diff: ParsedDiff, private readonly analyzers: AnalyzerRegistry) {
    for (const file of diff.files) {
      for (const hunk of file.hunks) {
        for (const line of hunk.lines) {
          this.hunkOf.set(line.id, hunk);
          this.lineOf.set(line.id, line);
        }
      }
    }
  }

  analyzerFor(filePath: string): LanguageAnalyzer | null {
    return this.analyzers.forPath(filePath);
  }

  line(id: LineID): DiffLine | undefined {
    return this.lineOf.get(id);
  }

  hunk(id: LineID): Hunk | undefined {
    return this.hunkOf.get(id);
  }
}

export function scoreGroup(group: Group, index: ScoringIndex, weights: ScoringWeights): GroupScore {
  let score = 0;
  let branches = 0;
  let boilerplateLines = 0;
  const definitions: string[] = [];
  const hunks = new Set<Hunk>();

  for (const id of group.lineIds) {
    const line = index.line(id);
    if (!line) continue;

    const result = scoreLine(line, index.analyzerFor(line.filePath), weights);
    score += result.score;
    branches += result.branches;
    if (result.definition) definitions.push(result.definition);
    if (result.boilerplate) boilerplateLines++;

    const hunk = index.hunk(id);
    if (hunk) hunks.add(hunk);
  }

  let branchDelta = 0;
  for (const hunk of hunks) {
    const analyzer = index.analyzerFor(hunk.filePath);
    if (analyzer) branchDelta += analyzer.branchDelta(hunk);
  }

  return {
    score: round(score),
    lines: group.lineIds.length,
    branches,
    branchDelta,
    definitions,
    boilerplateLines,
  };
}
