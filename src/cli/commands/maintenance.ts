import pc from 'picocolors';
import { readFile } from 'fs/promises';
import { formatStatusLine } from '../../output/formatter.js';
import { statusView } from '../../session/views.js';
import type { CommandContext } from '../context.js';

export async function reset(context: CommandContext): Promise<void> {
  const removed = await context.manager.reset(context.changeId);
  console.log(removed ? 'Reset review progress' : 'No state to reset');
}

export async function recover(context: CommandContext, options: { diffFile?: string }): Promise<void> {
  const diffText = options.diffFile ? await readFile(options.diffFile, 'utf8') : undefined;
  const { session, kept } = await context.manager.recover(context.changeId, diffText);
  console.log(pc.yellow('Recovered'), `${context.changeId}: kept ${kept} reviewed lines`);
  console.log(formatStatusLine(statusView(session)));
}

export async function sessions(context: CommandContext): Promise<void> {
  const ids = await context.manager.list();
  if (ids.length === 0) {
    console.log(pc.dim('No sessions'));
    return;
  }
  ids.forEach(id => console.log(id === context.changeId ? `* ${id}` : `  ${id}`));
}
