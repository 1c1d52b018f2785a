import pc from 'picocolors';
import { collectChange } from '../../git/collect.js';
import { formatStatusLine } from '../../output/formatter.js';
import { statusView } from '../../session/views.js';
import type { CommandContext } from '../context.js';

export interface IngestOptions {
  base?: string;
  diffFile?: string;
  history: boolean;
}

export async function ingest(context: CommandContext, options: IngestOptions): Promise<void> {
  const request = await collectChange(context.repo, context.config, {
    changeId: context.changeId,
    baseRef: options.base,
    diffFile: options.diffFile,
    history: options.history && !options.diffFile,
  });

  const { session, reconciled } = await context.manager.ingest(request);

  console.log(
    pc.cyan(reconciled ? 'Refreshed' : 'Ingested'),
    `${context.changeId}:`,
    `${session.queue.total} reviewable lines in ${session.queue.filesTouched().length} files`
  );
  console.log(formatStatusLine(statusView(session)));
}
