import type { SchemeName } from '../types.js';

export class StaleGroupingError extends Error {
  constructor(
    public readonly scheme: SchemeName,
    public readonly reason: string
  ) {
    super(`Grouping scheme ${scheme} is stale: ${reason}. Re-fetch the grouping and retry`);
    this.name = 'StaleGroupingError';
  }
}
