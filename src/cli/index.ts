#!/usr/bin/env node
/**
 * cmdgate CLI
 *
 * Commands:
 * - check: classify a command
 * - run: take a plan file through validation, confirmation and execution
 * - history: show recent runs
 * - undo: restore the snapshot of the last run
 * - cleanup: prune old snapshots
 * - snapshots: list stored snapshots
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { VERSION } from '../version';
import { checkCommand } from './commands/check';
import { cleanupCommand } from './commands/cleanup';
import { historyCommand } from './commands/history';
import { runCommand } from './commands/run';
import { snapshotsCommand } from './commands/snapshots';
import { undoCommand } from './commands/undo';
import { GlobalOptions } from './context';

const program = new Command();

program
  .name('cmdgate')
  .description('Safety gate for shell commands proposed by a language model')
  .version(VERSION)
  .option('--home <dir>', 'State directory for history and snapshots')
  .option('-e, --executor <backend>', 'Executor backend (mock, local, sandboxed, docker)')
  .option('--sandbox <dir>', 'Sandbox root; confines the local backend to it')
  .option('--dry-run', 'Confirm and preview, but execute nothing')
  .option('--auto-snapshot', 'Snapshot every confirmed plan')
  .option('--timeout <ms>', 'Per-command timeout in milliseconds')
  .option('--rules <file>', 'Policy rule file to use instead of the built-in rules')
  .option('-v, --verbose', 'Log state transitions to stderr');

function globals(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

function fail(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`\n❌ Error: ${message}\n`));
  process.exit(1);
}

program
  .command('check')
  .description('Classify a command without running it')
  .argument('<command...>', 'Command to classify (quote it to keep shell operators)')
  .action(async (words: string[]) => {
    try {
      await checkCommand(words, globals());
    } catch (error) {
      fail(error);
    }
  });

program
  .command('run')
  .description('Validate, confirm and execute a plan file')
  .argument('<plan>', 'Path to a plan JSON file')
  .option('-q, --query <text>', 'Request the plan answers, stored in history')
  .action(async (planFile: string, options: { query?: string }) => {
    try {
      await runCommand(planFile, options, globals());
    } catch (error) {
      fail(error);
    }
  });

program
  .command('history')
  .description('Show recent runs')
  .option('-n, --limit <count>', 'Number of records to show')
  .action(async (options: { limit?: string }) => {
    try {
      await historyCommand(options, globals());
    } catch (error) {
      fail(error);
    }
  });

program
  .command('undo')
  .description('Restore the files changed by the last run')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .action(async (options: { yes?: boolean }) => {
    try {
      await undoCommand(options, globals());
    } catch (error) {
      fail(error);
    }
  });

program
  .command('cleanup')
  .description('Delete old snapshots')
  .option('--keep <count>', 'Snapshots to keep regardless of age')
  .option('--days <count>', 'Delete snapshots older than this many days')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .action(async (options: { keep?: string; days?: string; yes?: boolean }) => {
    try {
      await cleanupCommand(options, globals());
    } catch (error) {
      fail(error);
    }
  });

program
  .command('snapshots')
  .description('List stored snapshots')
  .action(async () => {
    try {
      await snapshotsCommand(globals());
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);
