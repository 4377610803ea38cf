/**
 * Basic usage: classify commands, then run a plan against the mock backend
 * with an auto-approving confirmation callback.
 */

import * as os from 'os';
import * as path from 'path';
import {
  classify,
  createOrchestrator,
  createSilentLogger,
  formatWarnings,
  parsePlan,
  ConfirmationRequest,
} from '../src';

async function main(): Promise<void> {
  for (const command of ['ls -la', 'mv notes.txt archive/', 'sudo apt-get update', 'rm -rf /']) {
    const result = classify(command);
    console.log(`${result.verdict.padEnd(8)} ${command}${result.match ? `  (${result.match.ruleId})` : ''}`);
  }

  const gate = createOrchestrator({
    config: { executor: 'mock', homeDir: path.join(os.tmpdir(), 'cmdgate-example') },
    logger: createSilentLogger(),
  });

  const plan = parsePlan({
    summary: 'Archive old log files',
    risk: 'medium',
    commands: [
      { command: 'mkdir -p archive', description: 'Create the archive directory' },
      { command: 'mv app.log archive/app.log', description: 'Move the log', preview: 'ls -l app.log' },
    ],
    affectedFiles: ['app.log'],
  });

  const verdict = gate.validate(plan);
  console.log(`\nPlan verdict: ${verdict.overall}`);
  formatWarnings(verdict).forEach(line => console.log(`  ${line}`));

  const approve = (request: ConfirmationRequest) => (request.strength === 'exact-yes' ? 'YES' : 'y');
  const outcome = await gate.run(plan, approve, { query: 'archive the logs' });

  if (outcome.state === 'recorded') {
    for (const result of outcome.record.outcomes) {
      console.log(`  [${result.status}] ${result.result?.stdout.trim() ?? result.command}`);
    }
  } else {
    console.log(`Run ended in state ${outcome.state}`);
  }
}

main().catch(error => {
  console.error(error);
  process.exit(1);
});
