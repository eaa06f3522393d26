import type { StakeContract, StakeStatus, StakerRef } from './types';

export type StakeTransitionError =
  | 'INVALID_TRANSITION'
  | 'STAKE_ALREADY_SETTLED'
  | 'STAKE_NOT_SETTLED'
  | 'SETTLEMENT_PENDING'
  | 'SETTLEMENT_NOT_INITIATED'
  | 'SETTLEMENT_NEEDS_COUNTERPARTY';

export type StakeTransitionPlan =
  | { type: 'apply'; stake: StakeContract }
  | { type: 'reject'; error: StakeTransitionError };

type StateContext = {
  stake: StakeContract;
  nowIso: string;
  actorId: string;
};

type StakeState = {
  onAccept(ctx: StateContext): StakeTransitionPlan;
  onInitiateSettlement(ctx: StateContext): StakeTransitionPlan;
  onConfirmSettlement(ctx: StateContext): StakeTransitionPlan;
  onReopen(ctx: StateContext): StakeTransitionPlan;
  onCancel(ctx: StateContext): StakeTransitionPlan;
  onUpdateTerms(ctx: StateContext): StakeTransitionPlan;
};

const reject = (error: StakeTransitionError): StakeTransitionPlan => ({ type: 'reject', error });

const apply = (stake: StakeContract): StakeTransitionPlan => ({ type: 'apply', stake });

const cancel = ({ stake, nowIso }: StateContext): StakeTransitionPlan =>
  apply({ ...stake, status: 'CANCELLED', cancelledAt: nowIso, lastUpdatedAt: nowIso });

const settle = (
  { stake, nowIso, actorId }: StateContext,
  initiated: Pick<StakeContract, 'settlementInitiatedByUserId' | 'settlementInitiatedAt'>,
): StakeTransitionPlan =>
  apply({
    ...stake,
    ...initiated,
    status: 'SETTLED',
    settledAt: nowIso,
    settledByUserId: actorId,
    lastUpdatedAt: nowIso,
  });

const proposedState: StakeState = {
  onAccept: ({ stake, nowIso }) =>
    apply({ ...stake, status: 'AWAITING_SETTLEMENT', acceptedAt: nowIso, lastUpdatedAt: nowIso }),
  onInitiateSettlement: () => reject('INVALID_TRANSITION'),
  onConfirmSettlement: () => reject('INVALID_TRANSITION'),
  onReopen: () => reject('STAKE_NOT_SETTLED'),
  onCancel: cancel,
  onUpdateTerms: ({ stake }) => apply(stake),
};

// A manual staker has no account to confirm with, so initiating settles at once.
const awaitingSettlementState: StakeState = {
  onAccept: () => reject('INVALID_TRANSITION'),
  onInitiateSettlement: (ctx) => {
    const { stake, nowIso, actorId } = ctx;
    if (stake.settlementInitiatedByUserId !== null) {
      return reject('SETTLEMENT_PENDING');
    }
    const initiated = { settlementInitiatedByUserId: actorId, settlementInitiatedAt: nowIso };
    if (stake.staker.kind === 'MANUAL') {
      return settle(ctx, initiated);
    }
    return apply({ ...stake, ...initiated, lastUpdatedAt: nowIso });
  },
  onConfirmSettlement: (ctx) => {
    const { settlementInitiatedByUserId, settlementInitiatedAt } = ctx.stake;
    if (settlementInitiatedByUserId === null) {
      return reject('SETTLEMENT_NOT_INITIATED');
    }
    if (settlementInitiatedByUserId === ctx.actorId) {
      return reject('SETTLEMENT_NEEDS_COUNTERPARTY');
    }
    return settle(ctx, { settlementInitiatedByUserId, settlementInitiatedAt });
  },
  onReopen: () => reject('STAKE_NOT_SETTLED'),
  onCancel: cancel,
  onUpdateTerms: ({ stake }) => apply(stake),
};

// Leaving SETTLED is only possible through an explicit reopen.
const settledState: StakeState = {
  onAccept: () => reject('STAKE_ALREADY_SETTLED'),
  onInitiateSettlement: () => reject('STAKE_ALREADY_SETTLED'),
  onConfirmSettlement: () => reject('STAKE_ALREADY_SETTLED'),
  onReopen: ({ stake, nowIso }) =>
    apply({
      ...stake,
      status: 'AWAITING_SETTLEMENT',
      settlementInitiatedByUserId: null,
      settlementInitiatedAt: null,
      settledAt: null,
      settledByUserId: null,
      reopenedAt: nowIso,
      lastUpdatedAt: nowIso,
    }),
  onCancel: () => reject('STAKE_ALREADY_SETTLED'),
  onUpdateTerms: () => reject('STAKE_ALREADY_SETTLED'),
};

const cancelledState: StakeState = {
  onAccept: () => reject('INVALID_TRANSITION'),
  onInitiateSettlement: () => reject('INVALID_TRANSITION'),
  onConfirmSettlement: () => reject('INVALID_TRANSITION'),
  onReopen: () => reject('STAKE_NOT_SETTLED'),
  onCancel: () => reject('INVALID_TRANSITION'),
  onUpdateTerms: () => reject('INVALID_TRANSITION'),
};

const states: Record<StakeStatus, StakeState> = {
  PROPOSED: proposedState,
  AWAITING_SETTLEMENT: awaitingSettlementState,
  SETTLED: settledState,
  CANCELLED: cancelledState,
};

/** Off-app stakers have no account to confirm a proposal, so their stakes start already agreed. */
export function initialStakeStatus(staker: StakerRef): StakeStatus {
  return staker.kind === 'MANUAL' ? 'AWAITING_SETTLEMENT' : 'PROPOSED';
}

export function isUnresolved(status: StakeStatus): boolean {
  return status === 'PROPOSED' || status === 'AWAITING_SETTLEMENT';
}

export function planStakeAccept(
  stake: StakeContract,
  nowIso: string,
  actorId: string,
): StakeTransitionPlan {
  return states[stake.status].onAccept({ stake, nowIso, actorId });
}

export function planStakeInitiateSettlement(
  stake: StakeContract,
  nowIso: string,
  actorId: string,
): StakeTransitionPlan {
  return states[stake.status].onInitiateSettlement({ stake, nowIso, actorId });
}

export function planStakeConfirmSettlement(
  stake: StakeContract,
  nowIso: string,
  actorId: string,
): StakeTransitionPlan {
  return states[stake.status].onConfirmSettlement({ stake, nowIso, actorId });
}

export function planStakeReopen(
  stake: StakeContract,
  nowIso: string,
  actorId: string,
): StakeTransitionPlan {
  return states[stake.status].onReopen({ stake, nowIso, actorId });
}

export function planStakeCancel(
  stake: StakeContract,
  nowIso: string,
  actorId: string,
): StakeTransitionPlan {
  return states[stake.status].onCancel({ stake, nowIso, actorId });
}

export function planStakeTermsUpdate(
  stake: StakeContract,
  nowIso: string,
  actorId: string,
): StakeTransitionPlan {
  return states[stake.status].onUpdateTerms({ stake, nowIso, actorId });
}
