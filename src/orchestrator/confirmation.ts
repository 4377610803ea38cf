/**
 * Confirmation rules: how strong an answer each verdict demands, and the
 * prompt shown to the user.
 */

import { CONFIRMATION } from '../constants';
import { describeVerdict } from '../policy/classifier';
import { ConfirmationStrength, Verdict } from '../types';

/**
 * HIGH demands the literal YES; anything lower takes a plain affirmative
 */
export function requiredStrength(verdict: Verdict): ConfirmationStrength {
  return verdict === 'HIGH' ? 'exact-yes' : 'affirmative';
}

export function isConfirmed(input: string, strength: ConfirmationStrength): boolean {
  if (strength === 'exact-yes') {
    return input === CONFIRMATION.HIGH_RISK_LITERAL;
  }
  const normalized = input.trim().toLowerCase();
  return CONFIRMATION.AFFIRMATIVES.some(answer => answer === normalized);
}

export function buildPrompt(verdict: Verdict, strength: ConfirmationStrength, dryRun: boolean): string {
  const action = dryRun ? 'Preview (dry-run)' : 'Execute';
  const answer =
    strength === 'exact-yes' ? `type ${CONFIRMATION.HIGH_RISK_LITERAL} to confirm` : 'y/N';
  return `${describeVerdict(verdict)}. ${action} this plan? (${answer})`;
}
