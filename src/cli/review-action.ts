import { spawn } from 'child_process';
import type { AppConfig } from '../config/config.js';
import { splitArgs } from '../config/config.js';
import { readFileDiff } from '../git/diff-source.js';
import { logger } from '../observability/logger.js';

export const FILE_PLACEHOLDER = '{file}';

/**
 * Arguments of the configured review command for `filePath`, or null when
 * none is configured. The path replaces every `{file}`, or is appended.
 */
export function reviewCommandArgs(template: string | undefined, filePath: string): string[] | null {
  if (!template) return null;
  const args = splitArgs(template);
  if (!template.includes(FILE_PLACEHOLDER)) {
    return [...args, filePath];
  }
  return args.map(arg => arg.split(FILE_PLACEHOLDER).join(filePath));
}

function run(command: string, args: string[], cwd: string): Promise<number | null> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd, stdio: 'inherit' });
    child.on('error', reject);
    child.on('exit', code => resolve(code));
  });
}

/**
 * Show a file to the reviewer: the `actions.onReview` command when one is
 * configured, otherwise the file's branch diff. A non-zero exit is logged
 * and does not stop the review.
 */
export async function showFileForReview(config: AppConfig, repoRoot: string, filePath: string): Promise<void> {
  const args = reviewCommandArgs(config.actions.onReview, filePath);
  if (!args) {
    process.stdout.write(await readFileDiff(repoRoot, config.baseRef, filePath));
    return;
  }

  const [command, ...rest] = args;
  const code = await run(command, rest, repoRoot);
  if (code !== 0) {
    logger.warn('review_action_failed', 'Review command exited with an error', { command, filePath, code });
  }
}
