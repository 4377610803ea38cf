import { describe, expect, it } from 'vitest';
import { aggregateExitCode, runPlanCommands, statusOf } from '../src/executor/run_plan';
import { Executor } from '../src/executor/types';
import { buildPrompt, isConfirmed, requiredStrength } from '../src/orchestrator/confirmation';
import { Command, CommandOutcome, ExecutionResult, Plan } from '../src/types';

function result(exitCode: number, timedOut = false): ExecutionResult {
  return { stdout: '', stderr: '', exitCode, durationMs: 1, simulated: false, timedOut };
}

/**
 * Executor whose commands are `exit:<code>`, `timeout` or `throw`
 */
class ScriptedExecutor implements Executor {
  readonly backend = 'mock' as const;
  readonly ran: string[] = [];

  async execute(command: Command): Promise<ExecutionResult> {
    this.ran.push(command.command);
    if (command.command === 'throw') {
      throw new Error('backend unavailable');
    }
    if (command.command === 'timeout') {
      return result(124, true);
    }
    return result(parseInt(command.command.split(':')[1], 10));
  }
}

function plan(commands: string[], independent?: boolean): Plan {
  return { summary: 'scripted', risk: 'low', commands: commands.map(command => ({ command })), independent };
}

describe('runPlanCommands', () => {
  it('runs every command when all succeed', async () => {
    const executor = new ScriptedExecutor();
    const outcomes = await runPlanCommands(plan(['exit:0', 'exit:0']), executor);
    expect(outcomes.map(o => o.status)).toEqual(['succeeded', 'succeeded']);
    expect(aggregateExitCode(outcomes)).toBe(0);
  });

  it('skips the rest after a failure', async () => {
    const executor = new ScriptedExecutor();
    const outcomes = await runPlanCommands(plan(['exit:0', 'exit:2', 'exit:0']), executor);

    expect(outcomes.map(o => o.status)).toEqual(['succeeded', 'failed', 'skipped']);
    expect(outcomes[2].result).toBeUndefined();
    expect(executor.ran).toEqual(['exit:0', 'exit:2']);
    expect(aggregateExitCode(outcomes)).toBe(2);
  });

  it('keeps going after a failure when commands are independent', async () => {
    const executor = new ScriptedExecutor();
    const outcomes = await runPlanCommands(plan(['exit:0', 'exit:2', 'exit:0'], true), executor);

    expect(outcomes.map(o => o.status)).toEqual(['succeeded', 'failed', 'succeeded']);
    expect(aggregateExitCode(outcomes)).toBe(0);
  });

  it('stops on timeouts', async () => {
    const outcomes = await runPlanCommands(plan(['timeout', 'exit:0']), new ScriptedExecutor());
    expect(outcomes.map(o => o.status)).toEqual(['timed-out', 'skipped']);
    expect(aggregateExitCode(outcomes)).toBe(124);
  });

  it('records executor exceptions and stops, even for independent commands', async () => {
    const outcomes = await runPlanCommands(plan(['exit:0', 'throw', 'exit:0'], true), new ScriptedExecutor());

    expect(outcomes[1]).toEqual({ index: 1, command: 'throw', status: 'error', error: 'backend unavailable' });
    expect(outcomes[2].status).toBe('skipped');
    expect(aggregateExitCode(outcomes)).toBe(-1);
  });

  it('reports each outcome as it happens', async () => {
    const seen: CommandOutcome[] = [];
    await runPlanCommands(plan(['exit:0', 'exit:1']), new ScriptedExecutor(), {
      onOutcome: outcome => seen.push(outcome),
    });
    expect(seen.map(o => [o.index, o.status])).toEqual([
      [0, 'succeeded'],
      [1, 'failed'],
    ]);
  });

  it('has no exit code when nothing ran', () => {
    expect(aggregateExitCode([])).toBeNull();
    expect(statusOf(result(0, true))).toBe('timed-out');
  });
});

describe('confirmation', () => {
  it('requires the exact literal for HIGH', () => {
    expect(requiredStrength('HIGH')).toBe('exact-yes');
    expect(isConfirmed('YES', 'exact-yes')).toBe(true);
    expect(isConfirmed('yes', 'exact-yes')).toBe(false);
    expect(isConfirmed('Y', 'exact-yes')).toBe(false);
    expect(isConfirmed(' YES', 'exact-yes')).toBe(false);
  });

  it('takes y or yes in any case for lower tiers', () => {
    expect(requiredStrength('LOW')).toBe('affirmative');
    expect(requiredStrength('MEDIUM')).toBe('affirmative');
    expect(isConfirmed('y', 'affirmative')).toBe(true);
    expect(isConfirmed(' Yes ', 'affirmative')).toBe(true);
    expect(isConfirmed('', 'affirmative')).toBe(false);
    expect(isConfirmed('n', 'affirmative')).toBe(false);
    expect(isConfirmed('yep', 'affirmative')).toBe(false);
  });

  it('builds prompts', () => {
    expect(buildPrompt('LOW', 'affirmative', false)).toBe(
      'Low risk: read-only or easily reversed. Execute this plan? (y/N)'
    );
  });
});
