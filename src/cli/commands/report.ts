import path from 'path';
import pc from 'picocolors';
import type { SchemeName } from '../../types.js';
import {
  formatDeepDive,
  formatFileList,
  formatGroups,
  formatNext,
  formatOverview,
  formatRemaining,
  formatStatus,
  formatStatusLine,
  formatTests,
} from '../../output/formatter.js';
import {
  deepDiveView,
  fileProgress,
  groupsView,
  nextView,
  overviewView,
  remainingView,
  statusView,
  testsView,
} from '../../session/views.js';
import type { CommandContext } from '../context.js';
import { SHELL_HELP, parseShellCommand } from '../overview-shell.js';
import { ask, createPrompt } from '../prompt.js';
import type { Prompt } from '../prompt.js';
import { showFileForReview } from '../review-action.js';
import { reviewWithConfirmation, walkDeepDive } from './review.js';

export interface OverviewOptions {
  interactive?: boolean;
}

export async function overview(context: CommandContext, options: OverviewOptions = {}): Promise<void> {
  const view = await context.manager.read(context.changeId, session => overviewView(session, context.config.jira.base));
  console.log(formatOverview(view, options.interactive));

  if (options.interactive) {
    const prompt = createPrompt();
    try {
      await overviewShell(context, prompt, view.files.map(file => file.path));
    } finally {
      prompt.close();
    }
  }
}

/** Numbered-file loop: show, skim or deep-review files by number until an empty line. */
async function overviewShell(context: CommandContext, prompt: Prompt, paths: string[]): Promise<void> {
  const approved: string[] = [];
  console.log(SHELL_HELP);

  for (;;) {
    const entry = await ask(prompt, '> ');
    const command = parseShellCommand(entry ?? '', paths.length);
    if (command.kind === 'quit') break;
    if (command.kind === 'unknown') {
      console.log(`unknown command: ${command.word}`);
      continue;
    }

    if (command.kind === 'list' || command.kind === 'list-unreviewed') {
      const files = await context.manager.read(context.changeId, fileProgress);
      console.log(formatFileList(files, command.kind === 'list-unreviewed'));
      continue;
    }

    command.invalid.forEach(id => console.log(`invalid file id: ${id}`));
    for (const id of command.ids) {
      const filePath = paths[id - 1];
      if (command.kind === 'show') {
        console.log(`== ${path.join(context.repo.root, filePath)} ==`);
        await showFileForReview(context.config, context.repo.root, filePath);
      } else if (command.kind === 'skim') {
        const remaining = await context.manager.read(context.changeId, session =>
          fileProgress(session).find(file => file.path === filePath)?.remaining ?? 0
        );
        if (remaining === 0) {
          console.log(`${filePath} already reviewed`);
        } else if (await reviewWithConfirmation(context, prompt, `file:${filePath}`, 'skim')) {
          approved.push(filePath);
        }
      } else {
        await context.manager.review(context.changeId, `file:${filePath}`, 'deep');
        await walkDeepDive(context, prompt);
      }
    }
    console.log(pc.dim(formatStatusLine(await context.manager.read(context.changeId, statusView))));
  }

  if (approved.length > 0) {
    console.log('\nApproved in this session:');
    approved.forEach(filePath => console.log(`- ${filePath}`));
  }
}

export async function status(context: CommandContext): Promise<void> {
  const view = await context.manager.read(context.changeId, statusView);
  console.log(formatStatus(view));
}

export async function group(context: CommandContext, scheme?: SchemeName): Promise<void> {
  if (scheme) {
    await context.manager.setActiveScheme(context.changeId, scheme);
  }
  // a one-shot process has to wait for background groupings to show them
  await context.manager.awaitBackground(context.changeId);
  const view = await context.manager.read(context.changeId, groupsView);
  console.log(formatGroups(view));
}

export async function next(context: CommandContext): Promise<void> {
  await context.manager.awaitBackground(context.changeId);
  const view = await context.manager.read(context.changeId, nextView);
  console.log(view.group ? pc.bold(formatNext(view)) : formatNext(view));
}

export async function remaining(context: CommandContext): Promise<void> {
  const files = await context.manager.read(context.changeId, remainingView);
  console.log(formatRemaining(files));
}

export async function tests(context: CommandContext): Promise<void> {
  const files = await context.manager.read(context.changeId, testsView);
  console.log(formatTests(files));
}

export async function deepStatus(context: CommandContext): Promise<void> {
  const view = await context.manager.read(context.changeId, deepDiveView);
  console.log(formatDeepDive(view));
}
