import type { Group } from '../types.js';

export interface ScoringWeights {
  definition: number;
  branch: number;
  line: number;
  boilerplateFactor: number;
}

export const DEFAULT_WEIGHTS: ScoringWeights = {
  definition: 5,
  branch: 3,
  line: 1,
  boilerplateFactor: 0.05,
};

export interface LineScore {
  score: number;
  branches: number;
  definition: string | null;
  boilerplate: boolean;
}

export interface GroupScore {
  score: number;
  lines: number;
  branches: number;
  branchDelta: number;
  definitions: string[];
  boilerplateLines: number;
}

export interface RankedGroup {
  rank: number;
  group: Group;
  score: GroupScore;
}
