/**
 * History Command
 */

import chalk from 'chalk';
import { HISTORY_DEFAULTS } from '../../constants';
import { GlobalOptions, buildOrchestrator } from '../context';
import { renderRecord } from '../display';

interface HistoryCommandOptions {
  limit?: string;
}

export async function historyCommand(options: HistoryCommandOptions, globals: GlobalOptions): Promise<void> {
  const limit = options.limit ? parseInt(options.limit, 10) : HISTORY_DEFAULTS.DISPLAY_LIMIT;
  const gate = await buildOrchestrator(globals);
  const records = await gate.history(isNaN(limit) ? HISTORY_DEFAULTS.DISPLAY_LIMIT : limit);

  if (records.length === 0) {
    console.log(chalk.gray('No history yet.'));
    return;
  }
  for (const record of records) {
    renderRecord(record, globals.verbose === true);
  }
}
