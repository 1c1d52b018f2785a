import type { LineID } from '../types.js';

export class InvalidSelectorError extends Error {
  constructor(
    public readonly selector: string,
    public readonly reason: string,
    public readonly offending: LineID[] = []
  ) {
    super(`Invalid selector ${selector}: ${reason}`);
    this.name = 'InvalidSelectorError';
  }
}
