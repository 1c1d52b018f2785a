export class ConcurrentMutationError extends Error {
  readonly retryable = true;

  constructor(public readonly changeId: string) {
    super(`Another mutation of ${changeId} is in progress; retry once it finishes`);
    this.name = 'ConcurrentMutationError';
  }
}
