import { err, ok, type Result } from '@stakebook/shared';
import type {
  SettlementFacts,
  SettlementParties,
  StakeContract,
  StakeStatus,
} from './types';

export type StakeTerms = {
  percentage: number;
  markup: number;
};

export function validateStakeTerms(
  terms: StakeTerms,
): Result<StakeTerms, 'INVALID_PERCENTAGE' | 'INVALID_MARKUP'> {
  const { percentage, markup } = terms;
  if (!Number.isFinite(percentage) || percentage <= 0 || percentage > 1) {
    return err('INVALID_PERCENTAGE');
  }
  if (!Number.isFinite(markup) || markup < 1) {
    return err('INVALID_MARKUP');
  }
  return ok(terms);
}

/**
 * Signed amount owed between staked player and staker.
 *
 * ```
 * profit   = cashout - buyIn
 * adjusted = profit * percentage * markup
 * amount   = -adjusted
 * ```
 *
 * Negative when the player won (player pays the staker their marked-up share); positive when the
 * player lost (staker covers their marked-up share of the loss). Break-even yields `0`, never `-0`.
 */
export function calculateSettlementAmount(facts: SettlementFacts, terms: StakeTerms): number {
  const profit = facts.cashout - facts.buyIn;
  const stakerGrossShare = profit * terms.percentage;
  const adjustedStakerShare = stakerGrossShare * terms.markup;
  return adjustedStakerShare === 0 ? 0 : -adjustedStakerShare;
}

const RECOMPUTABLE: ReadonlySet<StakeStatus> = new Set(['PROPOSED', 'AWAITING_SETTLEMENT']);

export function isRecomputable(stake: StakeContract): boolean {
  return RECOMPUTABLE.has(stake.status);
}

export function hasCurrentFacts(stake: StakeContract, facts: SettlementFacts): boolean {
  return stake.sessionBuyIn === facts.buyIn && stake.sessionCashout === facts.cashout;
}

/**
 * Re-runs the formula against new facts; the caller decides whether the stake may change.
 * A pending settlement request is dropped when the amount moves.
 */
export function applySettlementFacts(
  stake: StakeContract,
  facts: SettlementFacts,
  nowIso: string,
): StakeContract {
  const settlementAmount = calculateSettlementAmount(facts, stake);
  const pending =
    settlementAmount === stake.settlementAmount
      ? {}
      : { settlementInitiatedByUserId: null, settlementInitiatedAt: null };
  return {
    ...stake,
    ...pending,
    sessionBuyIn: facts.buyIn,
    sessionCashout: facts.cashout,
    settlementAmount,
    lastUpdatedAt: nowIso,
  };
}

export type RecomputationPlan = {
  /** Unsettled stakes whose captured facts changed, with their new amounts. */
  updated: Array<{ previous: StakeContract; next: StakeContract }>;
  /** Settled stakes left frozen although the session's facts moved away from them. */
  staleSettled: Array<{ stake: StakeContract; currentAmount: number }>;
};

export function planRecomputation(
  stakes: readonly StakeContract[],
  facts: SettlementFacts,
  nowIso: string,
): RecomputationPlan {
  const plan: RecomputationPlan = { updated: [], staleSettled: [] };

  for (const stake of stakes) {
    if (hasCurrentFacts(stake, facts)) {
      continue;
    }
    if (isRecomputable(stake)) {
      plan.updated.push({ previous: stake, next: applySettlementFacts(stake, facts, nowIso) });
    } else if (stake.status === 'SETTLED') {
      plan.staleSettled.push({ stake, currentAmount: calculateSettlementAmount(facts, stake) });
    }
  }

  return plan;
}

export function describeSettlement(
  stake: Pick<StakeContract, 'settlementAmount'>,
): SettlementParties {
  if (stake.settlementAmount < 0) {
    return { payer: 'PLAYER', amount: -stake.settlementAmount };
  }
  if (stake.settlementAmount > 0) {
    return { payer: 'STAKER', amount: stake.settlementAmount };
  }
  return { payer: 'NONE', amount: 0 };
}
