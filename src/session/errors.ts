export class SessionCorruptError extends Error {
  constructor(
    public readonly changeId: string,
    public readonly expected: string,
    public readonly actual: string,
    reason: string = 'checksum mismatch'
  ) {
    super(`Session ${changeId} is corrupt: ${reason}. Run "recover" to rebuild it from the diff.`);
    this.name = 'SessionCorruptError';
  }
}

export class SessionNotFoundError extends Error {
  constructor(public readonly changeId: string) {
    super(`No review session for ${changeId}. Run "ingest" first.`);
    this.name = 'SessionNotFoundError';
  }
}
