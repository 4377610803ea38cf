/**
 * Sequential plan driver
 *
 * Runs a plan's commands in order. A non-zero exit stops the plan unless its
 * commands are declared independent; an executor exception always stops it.
 * Every command that did not run is reported as skipped.
 */

import { EXIT_CODES } from '../constants';
import { StructuredLogger } from '../core/structured_log';
import { toError } from '../errors';
import { CommandOutcome, CommandStatus, ExecutionResult, Plan } from '../types';
import { ExecuteOptions, Executor } from './types';

export interface RunPlanOptions extends ExecuteOptions {
  logger?: StructuredLogger;

  /** Called after each command, before the next one starts */
  onOutcome?: (outcome: CommandOutcome) => void;
}

export function statusOf(result: ExecutionResult): CommandStatus {
  if (result.timedOut) {
    return 'timed-out';
  }
  return result.exitCode === 0 ? 'succeeded' : 'failed';
}

export async function runPlanCommands(
  plan: Plan,
  executor: Executor,
  options: RunPlanOptions = {}
): Promise<CommandOutcome[]> {
  const { logger, onOutcome, ...executeOptions } = options;
  const outcomes: CommandOutcome[] = [];
  let stopped = false;

  for (let index = 0; index < plan.commands.length; index++) {
    const command = plan.commands[index];
    let outcome: CommandOutcome;

    if (stopped) {
      outcome = { index, command: command.command, status: 'skipped' };
      logger?.info('command_skipped', { index, command: command.command }, options.traceId);
    } else {
      try {
        const result = await executor.execute(command, executeOptions);
        outcome = { index, command: command.command, status: statusOf(result), result };
        logger?.info(
          'command_finished',
          { index, status: outcome.status, exitCode: result.exitCode, durationMs: result.durationMs },
          options.traceId
        );
        if (outcome.status !== 'succeeded' && !plan.independent) {
          stopped = true;
        }
      } catch (error) {
        const err = toError(error);
        outcome = { index, command: command.command, status: 'error', error: err.message };
        logger?.error('command_error', { index, command: command.command }, options.traceId, err);
        stopped = true;
      }
    }

    outcomes.push(outcome);
    onOutcome?.(outcome);
  }

  return outcomes;
}

/**
 * Exit code of the last command that ran; null when none did
 */
export function aggregateExitCode(outcomes: readonly CommandOutcome[]): number | null {
  for (let i = outcomes.length - 1; i >= 0; i--) {
    const outcome = outcomes[i];
    if (outcome.result) {
      return outcome.result.exitCode;
    }
    if (outcome.status === 'error') {
      return EXIT_CODES.SPAWN_FAILURE;
    }
  }
  return null;
}
