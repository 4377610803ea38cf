/**
 * Check Command - classify a command without running it
 */

import chalk from 'chalk';
import { classify, describeVerdict } from '../../policy/classifier';
import { getDefaultRuleSet, loadRuleFile } from '../../policy/rules';
import { GlobalOptions } from '../context';
import { colorVerdict } from '../display';

/**
 * Exit status 2 marks a blocked command so scripts can test for it
 */
export async function checkCommand(words: string[], options: GlobalOptions): Promise<void> {
  const rules = options.rules ? await loadRuleFile(options.rules) : getDefaultRuleSet();
  const result = classify(words.join(' '), rules);

  console.log(`${colorVerdict(result.verdict)}  ${describeVerdict(result.verdict)}`);
  if (result.match) {
    console.log(chalk.gray(`  rule:   ${result.match.ruleId}`));
    console.log(chalk.gray(`  reason: ${result.match.reason}`));
    if (result.match.matchedText !== result.normalized) {
      console.log(chalk.gray(`  in:     ${result.match.matchedText}`));
    }
  }

  if (result.verdict === 'BLOCKED') {
    process.exitCode = 2;
  }
}
