/**
 * Terminal rendering for the CLI
 */

import chalk from 'chalk';
import { describeVerdict } from '../policy/classifier';
import { formatWarnings } from '../policy/validator';
import {
  CommandOutcome,
  HistoryRecord,
  Plan,
  PlanVerdict,
  RestoreReport,
  SnapshotSummary,
  Verdict,
} from '../types';

export function colorVerdict(verdict: Verdict): string {
  switch (verdict) {
    case 'LOW':
      return chalk.green(verdict);
    case 'MEDIUM':
      return chalk.yellow(verdict);
    case 'HIGH':
      return chalk.red(verdict);
    case 'BLOCKED':
      return chalk.bgRed.white.bold(` ${verdict} `);
  }
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function renderPlan(plan: Plan, verdict: PlanVerdict): void {
  console.log(chalk.bold(`\n${plan.summary}`));
  if (plan.explanation) {
    console.log(chalk.gray(plan.explanation));
  }
  console.log();

  for (const v of verdict.perCommand) {
    const cmd = plan.commands[v.index];
    console.log(`  ${chalk.gray(`${v.index + 1}.`)} ${chalk.cyan(v.command)}  ${colorVerdict(v.verdict)}`);
    if (cmd?.description) {
      console.log(chalk.gray(`     ${cmd.description}`));
    }
  }

  if (plan.affectedFiles && plan.affectedFiles.length > 0) {
    console.log(chalk.gray(`\n  Affected files: ${plan.affectedFiles.join(', ')}`));
  }

  console.log(`\n  Risk: ${colorVerdict(verdict.overall)} - ${describeVerdict(verdict.overall)}`);
  for (const warning of formatWarnings(verdict)) {
    console.log(chalk.yellow(`  ! ${warning}`));
  }
  console.log();
}

function renderOutcome(outcome: CommandOutcome): void {
  const label =
    outcome.status === 'succeeded'
      ? chalk.green('ok')
      : outcome.status === 'skipped'
        ? chalk.gray('skipped')
        : chalk.red(outcome.status);
  console.log(`  ${chalk.gray(`${outcome.index + 1}.`)} ${outcome.command}  [${label}]`);

  if (outcome.result) {
    const stdout = outcome.result.stdout.trimEnd();
    const stderr = outcome.result.stderr.trimEnd();
    if (stdout) {
      console.log(stdout);
    }
    if (stderr) {
      console.log(chalk.red(stderr));
    }
  }
  if (outcome.error) {
    console.log(chalk.red(`     ${outcome.error}`));
  }
}

export function renderRecord(record: HistoryRecord, verbose = false): void {
  const status =
    record.status === 'executed'
      ? chalk.green(record.status)
      : record.status === 'blocked'
        ? chalk.red(record.status)
        : chalk.yellow(record.status);
  const when = new Date(record.timestamp).toLocaleString();

  console.log(`${chalk.gray(when)}  ${status}  ${colorVerdict(record.verdict)}  ${chalk.bold(record.query)}`);
  if (record.blockedBy) {
    console.log(chalk.red(`  blocked by ${record.blockedBy.ruleId}: ${record.blockedBy.reason}`));
  }
  if (record.snapshotId) {
    console.log(chalk.gray(`  snapshot ${record.snapshotId}`));
  }
  if (verbose) {
    for (const outcome of record.outcomes) {
      renderOutcome(outcome);
    }
  }
}

export function renderOutcomes(outcomes: readonly CommandOutcome[]): void {
  for (const outcome of outcomes) {
    renderOutcome(outcome);
  }
}

export function renderRestore(report: RestoreReport): void {
  for (const p of report.restored) {
    console.log(chalk.green(`  restored  ${p}`));
  }
  for (const p of report.removed) {
    console.log(chalk.yellow(`  removed   ${p}`));
  }
  for (const p of report.unchanged) {
    console.log(chalk.gray(`  unchanged ${p}`));
  }
}

export function renderSnapshots(snapshots: readonly SnapshotSummary[]): void {
  for (const s of snapshots) {
    const when = new Date(s.createdAt).toLocaleString();
    console.log(`${chalk.cyan(s.id)}  ${chalk.gray(when)}  ${s.entryCount} paths  ${formatBytes(s.sizeBytes)}`);
  }
}
