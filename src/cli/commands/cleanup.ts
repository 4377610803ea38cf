/**
 * Cleanup Command - prune old snapshots
 */

import chalk from 'chalk';
import ora from 'ora';
import { RETENTION_DEFAULTS } from '../../constants';
import { ConfigurationError } from '../../errors';
import { GlobalOptions, buildOrchestrator } from '../context';
import { askQuestion } from '../prompt';

interface CleanupCommandOptions {
  keep?: string;
  days?: string;
  yes?: boolean;
}

function parseCount(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    throw new ConfigurationError(`Invalid ${name}: ${value}`);
  }
  return parsed;
}

export async function cleanupCommand(options: CleanupCommandOptions, globals: GlobalOptions): Promise<void> {
  const keep = parseCount(options.keep, RETENTION_DEFAULTS.KEEP_NEWEST, '--keep');
  const days = parseCount(options.days, RETENTION_DEFAULTS.OLDER_THAN_DAYS, '--days');
  const gate = await buildOrchestrator(globals);

  if (!options.yes) {
    const answer = await askQuestion(
      `Delete snapshots older than ${days} days, keeping the newest ${keep}? (y/N)`
    );
    if (!['y', 'yes'].includes(answer.trim().toLowerCase())) {
      console.log(chalk.gray('Cleanup cancelled.'));
      return;
    }
  }

  const spinner = ora('Pruning snapshots...').start();
  const pruned = await gate.cleanup(keep, days);
  spinner.succeed(`Deleted ${pruned} snapshot${pruned === 1 ? '' : 's'}`);
}
