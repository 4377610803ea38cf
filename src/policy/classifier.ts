/**
 * Pattern Classifier
 *
 * Maps a command string to a verdict. The whole normalised command and each
 * of its sub-commands are checked against the blocked, high and medium tiers
 * in that order; the most severe tier wins and BLOCKED is terminal.
 */

import { normalizeCommand, splitCommand } from './command_split';
import { RuleSet, TIER_ORDER, getDefaultRuleSet } from './rules';
import { CommandClassification, DeclaredRisk, RuleMatch, RuleTier, Verdict } from '../types';

/**
 * Verdicts from least to most severe
 */
export const VERDICT_ORDER: readonly Verdict[] = ['LOW', 'MEDIUM', 'HIGH', 'BLOCKED'];

const TIER_VERDICT: Record<RuleTier, Verdict> = {
  blocked: 'BLOCKED',
  high: 'HIGH',
  medium: 'MEDIUM',
};

export function verdictRank(verdict: Verdict): number {
  return VERDICT_ORDER.indexOf(verdict);
}

export function maxVerdict(a: Verdict, b: Verdict): Verdict {
  return verdictRank(a) >= verdictRank(b) ? a : b;
}

export function verdictFromRisk(risk: DeclaredRisk): Verdict {
  switch (risk) {
    case 'low':
      return 'LOW';
    case 'medium':
      return 'MEDIUM';
    case 'high':
      return 'HIGH';
  }
}

/**
 * Classify a single command string
 */
export function classify(command: string, rules: RuleSet = getDefaultRuleSet()): CommandClassification {
  const normalized = normalizeCommand(command);
  const subCommands = splitCommand(normalized);

  // Sub-commands first so a match names the smallest offending piece
  const candidates = Array.from(new Set([...subCommands, normalized])).filter(text => text !== '');

  for (const tier of TIER_ORDER) {
    for (const text of candidates) {
      const rule = rules.rulesFor(tier).find(r => r.regex.test(text));
      if (rule) {
        const match: RuleMatch = {
          ruleId: rule.id,
          tier: rule.tier,
          reason: rule.reason,
          matchedText: text,
        };
        return { command, normalized, subCommands, verdict: TIER_VERDICT[tier], match };
      }
    }
  }

  return { command, normalized, subCommands, verdict: 'LOW' };
}

/**
 * Human label for a verdict
 */
export function describeVerdict(verdict: Verdict): string {
  switch (verdict) {
    case 'LOW':
      return 'Low risk: read-only or easily reversed';
    case 'MEDIUM':
      return 'Medium risk: modifies files or installs software';
    case 'HIGH':
      return 'High risk: destructive or privileged';
    case 'BLOCKED':
      return 'Blocked: never executed';
  }
}
