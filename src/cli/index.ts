#!/usr/bin/env node

import { Command, Option } from 'commander';
import pc from 'picocolors';
import { SCHEME_NAMES, isSchemeName } from '../types.js';
import { expandAliases, loadConfig } from '../config/config.js';
import type { AppConfig } from '../config/config.js';
import { logger } from '../observability/logger.js';
import { REVIEW_MODES } from '../resolution/engine.js';
import { runCommand } from './context.js';
import type { GlobalOptions } from './context.js';
import { ingest } from './commands/ingest.js';
import { deepStatus, group, next, overview, remaining, status, tests } from './commands/report.js';
import { deep, filter, reopen, review } from './commands/review.js';
import { recover, reset, sessions } from './commands/maintenance.js';

function buildProgram(config: AppConfig): Command {
  const program = new Command();
  const globals = () => program.opts<GlobalOptions>();

  program
    .name('linequeue')
    .description('Drive a change\'s unreviewed lines to zero, group by group')
    .version('0.1.0')
    .option('--change <id>', 'Change id (defaults to the current branch)')
    .option('--repo <path>', 'Repository path', '.')
    .option('-v, --verbose', 'Debug logging on stderr');

  program
    .command('ingest')
    .description('Parse the branch diff into a review queue, or refresh an existing one')
    .option('--base <ref>', `Base ref (default ${config.baseRef})`)
    .option('--diff-file <path>', 'Read the diff from a file instead of git')
    .option('--no-history', 'Skip git log and blame for co-change and commit groupings')
    .action(async (options: { base?: string; diffFile?: string; history: boolean }) => {
      await runCommand(globals(), config, context => ingest(context, options));
    });

  program
    .command('overview')
    .description('PR summary, ticket link and per-file progress')
    .option('-i, --interactive', 'Numbered file list with p/rs/rd <ids>, ls and lsu commands')
    .action(async (options: { interactive?: boolean }) => {
      await runCommand(globals(), config, context => overview(context, options));
    });

  program
    .command('status')
    .description('Remaining lines and review progress')
    .action(async () => {
      await runCommand(globals(), config, status);
    });

  program
    .command('group')
    .description('List the groups of the active grouping, ranked by complexity')
    .addOption(new Option('--by <scheme>', 'Switch the active grouping').choices(SCHEME_NAMES))
    .action(async (options: { by?: string }) => {
      const scheme = isSchemeName(options.by) ? options.by : undefined;
      await runCommand(globals(), config, context => group(context, scheme));
    });

  program
    .command('review')
    .description('Resolve a group, file or line list')
    .argument('<selector>', 'Group id or label, file path, or lines:<id>,<id>')
    .addOption(new Option('--mode <mode>', 'How to resolve it').choices(REVIEW_MODES).default('skim'))
    .option('-i, --interactive', 'Show each file and ask before marking it; deep dives go hunk by hunk')
    .action(async (selector: string, options: { mode: string; interactive?: boolean }) => {
      await runCommand(globals(), config, context => review(context, selector, options));
    });

  program
    .command('filter')
    .description('Move classified lines out of the queue')
    .option('--skip-formatting', 'Filter whitespace- and comment-only lines')
    .option('--vendor', 'Filter vendored files')
    .option('--generated', 'Filter generated files')
    .action(async (options: { skipFormatting?: boolean; vendor?: boolean; generated?: boolean }) => {
      await runCommand(globals(), config, context => filter(context, options));
    });

  program
    .command('reopen')
    .description('Put lines back into the queue')
    .argument('<selector>', 'Group id or label, file path, or lines:<id>,<id>')
    .action(async (selector: string) => {
      await runCommand(globals(), config, context => reopen(context, selector));
    });

  program
    .command('next')
    .description('Highest-priority group with unreviewed lines')
    .action(async () => {
      await runCommand(globals(), config, next);
    });

  program
    .command('deep')
    .description('Drive the open deep dive')
    .argument('<action>', 'confirm | cancel | status')
    .action(async (action: string) => {
      await runCommand(globals(), config, context =>
        action === 'status' ? deepStatus(context) : deep(context, action)
      );
    });

  program
    .command('remaining')
    .description('Every unreviewed line, by file')
    .action(async () => {
      await runCommand(globals(), config, remaining);
    });

  program
    .command('tests')
    .description('Review progress of the test files in the change')
    .action(async () => {
      await runCommand(globals(), config, tests);
    });

  program
    .command('reset')
    .description('Delete review progress for the change')
    .action(async () => {
      await runCommand(globals(), config, reset);
    });

  program
    .command('recover')
    .description('Rebuild a corrupt session, keeping statuses of unchanged lines')
    .option('--diff-file <path>', 'Rebuild from this diff instead of the stored one')
    .action(async (options: { diffFile?: string }) => {
      await runCommand(globals(), config, context => recover(context, options));
    });

  program
    .command('sessions')
    .description('List stored sessions')
    .action(async () => {
      await runCommand(globals(), config, sessions);
    });

  return program;
}

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig({ loadDotenv: true });
  } catch (error) {
    console.error(pc.red('Error:'), error instanceof Error ? error.message : error);
    process.exitCode = 1;
    return;
  }

  // stderr stays quiet unless asked for
  logger.setLevel(process.env.LOG_LEVEL ? config.logLevel : 'warn');

  const argv = expandAliases(process.argv.slice(2), config.aliases);
  await buildProgram(config).parseAsync(argv, { from: 'user' });
}

main().catch(error => {
  console.error(pc.red('Error:'), error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
