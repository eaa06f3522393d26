import type { StakeContract, StakerPerformance, StakerRef } from './types';
import { sameStaker } from './stakerRef';

/**
 * Staker-side results over settled stakes. The staker's result on a stake is the negated
 * settlement amount; the amount staked is their marked-up share of the buy-in.
 */
export function summarizeStakerPerformance(
  stakes: readonly StakeContract[],
  staker: StakerRef,
): StakerPerformance {
  const settled = stakes.filter(
    (stake) => stake.status === 'SETTLED' && sameStaker(stake.staker, staker),
  );

  let totalStaked = 0;
  let totalProfit = 0;
  let winning = 0;

  for (const stake of settled) {
    totalStaked += stake.sessionBuyIn * stake.percentage * stake.markup;
    const stakerResult = -stake.settlementAmount;
    totalProfit += stakerResult;
    if (stakerResult > 0) {
      winning += 1;
    }
  }

  return {
    stakeCount: settled.length,
    totalStaked,
    totalProfit,
    roi: totalStaked > 0 ? totalProfit / totalStaked : 0,
    winRate: settled.length > 0 ? winning / settled.length : 0,
  };
}
