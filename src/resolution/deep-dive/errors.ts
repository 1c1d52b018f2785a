import type { DeepDiveEvent, DeepDivePhase } from './states.js';

export class DeepDiveStateError extends Error {
  constructor(
    public readonly event: DeepDiveEvent,
    public readonly phase: DeepDivePhase | null,
    public readonly reason: string
  ) {
    super(`Cannot ${event} deep dive${phase ? ` in ${phase}` : ''}: ${reason}`);
    this.name = 'DeepDiveStateError';
  }
}
