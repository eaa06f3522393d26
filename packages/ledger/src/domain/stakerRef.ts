import { err, ok, type Result } from '@stakebook/shared';
import type { StakeContract, StakerRef } from './types';

/** Loose staker selection as it arrives from a form: exactly one of the ids must be set. */
export type StakerSelection = {
  appUserId?: string | null;
  manualStakerId?: string | null;
};

export type StakerSelectionResult =
  | { kind: 'APP_USER'; userId: string }
  | { kind: 'MANUAL'; profileId: string };

function present(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  return trimmed.length > 0 ? trimmed : null;
}

export function parseStakerSelection(
  selection: StakerSelection,
): Result<StakerSelectionResult, 'MISSING_STAKER' | 'AMBIGUOUS_STAKER'> {
  const userId = present(selection.appUserId);
  const profileId = present(selection.manualStakerId);

  if (userId && profileId) {
    return err('AMBIGUOUS_STAKER');
  }
  if (userId) {
    return ok({ kind: 'APP_USER', userId });
  }
  if (profileId) {
    return ok({ kind: 'MANUAL', profileId });
  }
  return err('MISSING_STAKER');
}

export function sameStaker(a: StakerRef, b: StakerRef): boolean {
  if (a.kind === 'APP_USER' && b.kind === 'APP_USER') {
    return a.userId === b.userId;
  }
  if (a.kind === 'MANUAL' && b.kind === 'MANUAL') {
    return a.profileId === b.profileId;
  }
  return false;
}

export function isOffAppStaker(stake: Pick<StakeContract, 'staker'>): boolean {
  return stake.staker.kind === 'MANUAL';
}

/** Users who may act on a stake: the staked player and, for app stakers, the staker. */
export function isStakeParticipant(stake: StakeContract, userId: string): boolean {
  if (stake.stakedPlayerId === userId) {
    return true;
  }
  return stake.staker.kind === 'APP_USER' && stake.staker.userId === userId;
}
