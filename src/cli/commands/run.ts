/**
 * Run Command - take a plan file through the gate
 */

import chalk from 'chalk';
import * as fs from 'fs-extra';
import ora from 'ora';
import { parsePlanJson } from '../../validation';
import { ConfirmationRequest } from '../../types';
import { GlobalOptions, buildOrchestrator } from '../context';
import { renderOutcomes, renderPlan } from '../display';
import { askQuestion } from '../prompt';

interface RunCommandOptions {
  query?: string;
}

async function confirmInteractively(request: ConfirmationRequest): Promise<string> {
  renderPlan(request.plan, request.verdict);
  if (request.dryRun) {
    console.log(chalk.cyan('  Dry-run is on: nothing will be executed.\n'));
  }
  return askQuestion(request.prompt);
}

export async function runCommand(planFile: string, options: RunCommandOptions, globals: GlobalOptions): Promise<void> {
  const plan = parsePlanJson(await fs.readFile(planFile, 'utf-8'));
  const gate = await buildOrchestrator(globals);

  const spinner = ora('Checking snapshot retention...').start();
  const pruned = await gate.autoPrune();
  if (pruned > 0) {
    spinner.succeed(`Pruned ${pruned} old snapshots`);
  } else {
    spinner.stop();
  }

  const outcome = await gate.run(plan, confirmInteractively, { query: options.query });

  switch (outcome.state) {
    case 'blocked':
      renderPlan(plan, outcome.verdict);
      console.error(chalk.red(`\n❌ ${outcome.error.message}\n`));
      process.exitCode = 2;
      return;

    case 'cancelled':
      console.error(chalk.yellow(`\n${outcome.error.message}\n`));
      process.exitCode = 1;
      return;

    case 'dry-run':
      console.log(chalk.cyan('\nDry-run, nothing executed. Would run:\n'));
      for (const preview of outcome.previews) {
        console.log(`  ${chalk.gray(`${preview.index + 1}.`)} ${preview.shown}`);
      }
      console.log();
      return;

    case 'recorded':
      console.log();
      renderOutcomes(outcome.record.outcomes);
      if (outcome.snapshot) {
        console.log(chalk.gray(`\nSnapshot ${outcome.snapshot.id} saved; 'cmdgate undo' reverts this run.`));
      }
      if (outcome.record.status === 'executed') {
        console.log(chalk.green('\n✅ Plan executed\n'));
      } else {
        console.error(chalk.red(`\n❌ Plan failed (exit ${outcome.record.exitCode ?? 'n/a'})\n`));
        process.exitCode = 1;
      }
      return;
  }
}
