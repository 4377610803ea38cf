/**
 * Plan Validator
 *
 * Applies the classifier to every command of a plan and folds the results
 * into one plan-level verdict. Pure: the plan is never mutated.
 */

import { classify, describeVerdict, maxVerdict, verdictFromRisk, verdictRank } from './classifier';
import { RuleSet, getDefaultRuleSet } from './rules';
import { CommandVerdict, Plan, PlanVerdict, Verdict } from '../types';

export function validate(plan: Plan, rules: RuleSet = getDefaultRuleSet()): PlanVerdict {
  const perCommand: CommandVerdict[] = plan.commands.map((cmd, index) => ({
    index,
    ...classify(cmd.command, rules),
  }));

  const blocked = perCommand.filter(v => v.verdict === 'BLOCKED');
  const overall: Verdict = perCommand.reduce<Verdict>((acc, v) => maxVerdict(acc, v.verdict), 'LOW');

  return {
    overall,
    perCommand,
    blocked,
    declaredRisk: plan.risk,
    underDeclared: verdictRank(verdictFromRisk(plan.risk)) < verdictRank(overall),
  };
}

/**
 * One warning line per command above LOW
 */
export function formatWarnings(verdict: PlanVerdict): string[] {
  const warnings: string[] = [];

  for (const v of verdict.perCommand) {
    if (v.verdict === 'LOW') {
      continue;
    }
    const reason = v.match ? `${v.match.reason} [${v.match.ruleId}]` : describeVerdict(v.verdict);
    warnings.push(`${v.verdict} #${v.index + 1} ${v.command}: ${reason}`);
  }

  if (verdict.underDeclared && verdict.declaredRisk) {
    warnings.push(`Plan declared ${verdict.declaredRisk} risk but was classified ${verdict.overall}`);
  }

  return warnings;
}
