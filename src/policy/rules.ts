/**
 * Policy Rules
 *
 * Rules are data: a list of `{ id, tier, pattern, reason }` objects validated
 * with zod and compiled to case-sensitive regular expressions once per set.
 */

import * as fs from 'fs-extra';
import { z } from 'zod';
import defaultRuleData from './default_rules.json';
import { RuleCompilationError, ValidationError } from '../errors';
import { PolicyRule, RuleTier } from '../types';

/**
 * Tier evaluation order
 */
export const TIER_ORDER: readonly RuleTier[] = ['blocked', 'high', 'medium'];

const ruleSchema = z.object({
  id: z.string().min(1, 'Rule id cannot be empty'),
  tier: z.enum(['blocked', 'high', 'medium']),
  pattern: z.string().min(1, 'Rule pattern cannot be empty'),
  reason: z.string().min(1, 'Rule reason cannot be empty'),
});

export const ruleFileSchema = z.object({
  version: z.number().int().positive().optional(),
  rules: z.array(ruleSchema),
});

export interface CompiledRule extends PolicyRule {
  readonly regex: RegExp;
}

/**
 * An immutable, compiled set of policy rules grouped by tier
 */
export class RuleSet {
  private readonly byTier: ReadonlyMap<RuleTier, readonly CompiledRule[]>;

  private constructor(readonly rules: readonly CompiledRule[]) {
    const grouped = new Map<RuleTier, CompiledRule[]>();
    for (const tier of TIER_ORDER) {
      grouped.set(tier, rules.filter(rule => rule.tier === tier));
    }
    this.byTier = grouped;
  }

  /**
   * Compile rules; throws on duplicate ids or invalid patterns
   */
  static fromRules(rules: readonly PolicyRule[]): RuleSet {
    const seen = new Set<string>();
    const compiled: CompiledRule[] = [];

    for (const rule of rules) {
      if (seen.has(rule.id)) {
        throw new ValidationError(`Duplicate rule id: ${rule.id}`);
      }
      seen.add(rule.id);

      let regex: RegExp;
      try {
        regex = new RegExp(rule.pattern);
      } catch (error) {
        throw new RuleCompilationError(
          rule.id,
          rule.tier,
          error instanceof Error ? error.message : String(error)
        );
      }
      compiled.push({ ...rule, regex });
    }

    return new RuleSet(compiled);
  }

  /**
   * Parse untrusted rule data (the contents of a rule file)
   */
  static parse(data: unknown): RuleSet {
    const result = ruleFileSchema.safeParse(data);
    if (!result.success) {
      const details = result.error.errors.map(err => `${err.path.join('.')}: ${err.message}`).join(', ');
      throw new ValidationError(`Invalid rule set: ${details}`, result.error.errors);
    }
    return RuleSet.fromRules(result.data.rules);
  }

  rulesFor(tier: RuleTier): readonly CompiledRule[] {
    return this.byTier.get(tier) ?? [];
  }

  get size(): number {
    return this.rules.length;
  }

  /**
   * A new set with extra rules appended to their tiers
   */
  extend(rules: readonly PolicyRule[]): RuleSet {
    return RuleSet.fromRules([...this.rules.map(stripRegex), ...rules]);
  }
}

function stripRegex(rule: CompiledRule): PolicyRule {
  return { id: rule.id, tier: rule.tier, pattern: rule.pattern, reason: rule.reason };
}

let defaultRuleSet: RuleSet | null = null;

/**
 * The built-in rule set, compiled on first use
 */
export function getDefaultRuleSet(): RuleSet {
  if (!defaultRuleSet) {
    defaultRuleSet = RuleSet.parse(defaultRuleData);
  }
  return defaultRuleSet;
}

/**
 * Load a rule file from disk
 */
export async function loadRuleFile(filePath: string): Promise<RuleSet> {
  const data: unknown = await fs.readJson(filePath);
  return RuleSet.parse(data);
}
