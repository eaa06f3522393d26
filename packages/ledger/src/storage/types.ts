import type { ManualStakerProfile, Session, StakeContract } from '../domain/types';

/**
 * Persistence ports. Adapters throw on infrastructure failure; services turn that into
 * `PERSIST_FAILED` and roll back the rest of the change.
 */
export interface SessionRepository {
  getSession(sessionId: string): Promise<Session | null>;
  saveSession(session: Session): Promise<void>;
  deleteSession(sessionId: string): Promise<void>;
  listSessionsForPlayer(playerId: string): Promise<Session[]>;
}

export interface StakeRepository {
  getStake(stakeId: string): Promise<StakeContract | null>;
  saveStake(stake: StakeContract): Promise<void>;
  deleteStake(stakeId: string): Promise<void>;
  listStakesForSession(sessionId: string): Promise<StakeContract[]>;
  /** Stakes where the user is the app-user staker or the staked player. */
  listStakesForUser(userId: string): Promise<StakeContract[]>;
}

export interface ManualStakerRepository {
  getProfile(profileId: string): Promise<ManualStakerProfile | null>;
  saveProfile(profile: ManualStakerProfile): Promise<void>;
  deleteProfile(profileId: string): Promise<void>;
  listProfilesForOwner(ownerId: string): Promise<ManualStakerProfile[]>;
}

export type LedgerRepositories = {
  sessions: SessionRepository;
  stakes: StakeRepository;
  manualStakers: ManualStakerRepository;
};
