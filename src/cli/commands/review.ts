import pc from 'picocolors';
import { formatDeepDive, formatResult, formatStatusLine, formatSuggestions } from '../../output/formatter.js';
import { InvalidSelectorError } from '../../queue/errors.js';
import type { NamedFilter, ReviewMode } from '../../resolution/engine.js';
import { FILE_PREFIX, parseSelector, selectorFiles } from '../../resolution/selector.js';
import { REVIEW_MODES, isReviewMode } from '../../resolution/engine.js';
import type { MutationOutcome } from '../../session/manager.js';
import { deepDiveView, statusView } from '../../session/views.js';
import type { CommandContext } from '../context.js';
import { askYesNo, createPrompt } from '../prompt.js';
import type { Prompt } from '../prompt.js';
import { showFileForReview } from '../review-action.js';

export interface ReviewOptions {
  mode: string;
  interactive?: boolean;
}

export interface FilterOptions {
  skipFormatting?: boolean;
  vendor?: boolean;
  generated?: boolean;
}

function report(outcome: MutationOutcome): void {
  console.log(formatResult(outcome.result));
  if (outcome.suggestions.length > 0) {
    console.log(formatSuggestions(outcome.suggestions));
  }
}

async function printStatus(context: CommandContext): Promise<void> {
  const view = await context.manager.read(context.changeId, statusView);
  console.log(pc.dim(formatStatusLine(view)));
}

async function printDeepDive(context: CommandContext): Promise<void> {
  const view = await context.manager.read(context.changeId, deepDiveView);
  console.log(formatDeepDive(view));
}

/**
 * Walk the open deep dive hunk by hunk: confirm, or stop and leave it
 * suspended for later.
 */
export async function walkDeepDive(context: CommandContext, prompt: Prompt): Promise<void> {
  for (;;) {
    const view = await context.manager.read(context.changeId, deepDiveView);
    if (!view || view.phase !== 'AT_HUNK') break;

    console.log(formatDeepDive(view));
    if (await askYesNo(prompt, 'Confirm hunk?', true)) {
      report(await context.manager.confirmDeepDive(context.changeId));
    } else {
      report(await context.manager.cancelDeepDive(context.changeId));
      break;
    }
  }
  await printDeepDive(context);
}

async function selectedFiles(context: CommandContext, selector: string, mode: ReviewMode): Promise<string[]> {
  if (mode === 'file-mode') {
    const trimmed = selector.trim();
    return [trimmed.startsWith(FILE_PREFIX) ? trimmed.slice(FILE_PREFIX.length) : trimmed];
  }
  return context.manager.read(context.changeId, session => selectorFiles(session, parseSelector(session, selector)));
}

/**
 * Show every file of the selector, then ask before marking. Returns whether
 * the lines were marked.
 */
export async function reviewWithConfirmation(
  context: CommandContext,
  prompt: Prompt,
  selector: string,
  mode: 'skim' | 'file-mode'
): Promise<boolean> {
  for (const file of await selectedFiles(context, selector, mode)) {
    await showFileForReview(context.config, context.repo.root, file);
  }
  if (!(await askYesNo(prompt, 'Mark reviewed?', true))) {
    console.log(pc.dim('Left unreviewed'));
    return false;
  }
  report(await context.manager.review(context.changeId, selector, mode));
  return true;
}

export async function review(context: CommandContext, selector: string, options: ReviewOptions): Promise<void> {
  if (!isReviewMode(options.mode)) {
    throw new InvalidSelectorError(selector, `unknown mode ${options.mode}, expected one of ${REVIEW_MODES.join(', ')}`);
  }
  const mode: ReviewMode = options.mode;

  if (!options.interactive || mode === 'filter') {
    report(await context.manager.review(context.changeId, selector, mode));
    if (mode === 'deep') await printDeepDive(context);
    await printStatus(context);
    return;
  }

  const prompt = createPrompt();
  try {
    if (mode === 'deep') {
      report(await context.manager.review(context.changeId, selector, mode));
      await walkDeepDive(context, prompt);
    } else {
      await reviewWithConfirmation(context, prompt, selector, mode);
    }
  } finally {
    prompt.close();
  }
  await printStatus(context);
}

export async function filter(context: CommandContext, options: FilterOptions): Promise<void> {
  const names: NamedFilter[] = [];
  if (options.skipFormatting) names.push('formatting-only');
  if (options.vendor) names.push('vendor');
  if (options.generated) names.push('generated');
  if (names.length === 0) {
    throw new InvalidSelectorError('filter', 'choose at least one of --skip-formatting, --vendor, --generated');
  }

  for (const name of names) {
    report(await context.manager.filter(context.changeId, name));
  }
  await printStatus(context);
}

export async function reopen(context: CommandContext, selector: string): Promise<void> {
  report(await context.manager.reopen(context.changeId, selector));
  await printStatus(context);
}

export async function deep(context: CommandContext, action: string): Promise<void> {
  switch (action) {
    case 'confirm':
      report(await context.manager.confirmDeepDive(context.changeId));
      break;
    case 'cancel':
      report(await context.manager.cancelDeepDive(context.changeId));
      break;
    case 'status':
      break;
    default:
      throw new InvalidSelectorError(action, 'expected confirm, cancel or status');
  }
  await printDeepDive(context);
}
