/**
 * Undo Command - restore the snapshot of the last change
 */

import chalk from 'chalk';
import ora from 'ora';
import { GlobalOptions, buildOrchestrator } from '../context';
import { renderRestore } from '../display';
import { askQuestion } from '../prompt';

interface UndoCommandOptions {
  yes?: boolean;
}

export async function undoCommand(options: UndoCommandOptions, globals: GlobalOptions): Promise<void> {
  const gate = await buildOrchestrator(globals);

  if (!options.yes) {
    const answer = await askQuestion('Restore the files changed by the last run? (y/N)');
    if (!['y', 'yes'].includes(answer.trim().toLowerCase())) {
      console.log(chalk.gray('Undo cancelled.'));
      return;
    }
  }

  const spinner = ora('Restoring snapshot...').start();
  try {
    const report = await gate.undo();
    spinner.succeed(`Restored snapshot ${report.snapshotId}`);
    renderRestore(report);
  } catch (error) {
    spinner.fail('Undo failed');
    throw error;
  }
}
