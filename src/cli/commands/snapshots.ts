/**
 * Snapshots Command - list stored snapshots
 */

import chalk from 'chalk';
import { GlobalOptions, buildOrchestrator } from '../context';
import { formatBytes, renderSnapshots } from '../display';

export async function snapshotsCommand(globals: GlobalOptions): Promise<void> {
  const gate = await buildOrchestrator(globals);
  const snapshots = await gate.listSnapshots();

  if (snapshots.length === 0) {
    console.log(chalk.gray('No snapshots.'));
    return;
  }
  renderSnapshots(snapshots);

  const total = snapshots.reduce((sum, s) => sum + s.sizeBytes, 0);
  console.log(chalk.gray(`\n${snapshots.length} snapshots, ${formatBytes(total)}`));
}
