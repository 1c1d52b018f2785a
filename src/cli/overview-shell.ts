/** Commands of the interactive overview. Numbers are the 1-based file positions it prints. */
export type ShellCommand =
  | { kind: 'show' | 'skim' | 'deep'; ids: number[]; invalid: string[] }
  | { kind: 'list' }
  | { kind: 'list-unreviewed' }
  | { kind: 'quit' }
  | { kind: 'unknown'; word: string };

export const SHELL_HELP = 'commands: p <ids>, rs <ids>, rd <ids>, ls, lsu, empty line to exit';

const FILE_COMMANDS: Record<string, 'show' | 'skim' | 'deep'> = {
  p: 'show',
  print: 'show',
  rs: 'skim',
  rd: 'deep',
};

export function parseShellCommand(entry: string, fileCount: number): ShellCommand {
  const [word, ...args] = entry.trim().split(/\s+/);
  if (!word || word === 'q' || word === 'quit') return { kind: 'quit' };
  if (word === 'ls') return { kind: 'list' };
  if (word === 'lsu') return { kind: 'list-unreviewed' };

  const kind = Object.prototype.hasOwnProperty.call(FILE_COMMANDS, word) ? FILE_COMMANDS[word] : undefined;
  if (!kind) return { kind: 'unknown', word };

  const ids: number[] = [];
  const invalid: string[] = [];
  for (const arg of args) {
    const id = /^\d+$/.test(arg) ? Number(arg) : NaN;
    if (id >= 1 && id <= fileCount) {
      ids.push(id);
    } else {
      invalid.push(arg);
    }
  }
  return { kind, ids, invalid };
}
