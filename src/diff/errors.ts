export interface ParseLocation {
  line: number;
  filePath?: string;
}

export class ParseError extends Error {
  constructor(
    public readonly location: ParseLocation,
    public readonly reason: string
  ) {
    const where = location.filePath ? `${location.filePath} (diff line ${location.line})` : `diff line ${location.line}`;
    super(`Malformed diff at ${where}: ${reason}`);
    this.name = 'ParseError';
  }
}
