/**
 * Policy Module
 *
 * Pattern classification of commands and validation of whole plans.
 */

export { RuleSet, TIER_ORDER, getDefaultRuleSet, loadRuleFile, ruleFileSchema } from './rules';
export type { CompiledRule } from './rules';
export { normalizeCommand, splitCommand, isBalanced, needsShell } from './command_split';
export {
  classify,
  describeVerdict,
  maxVerdict,
  verdictRank,
  verdictFromRisk,
  VERDICT_ORDER,
} from './classifier';
export { validate, formatWarnings } from './validator';
