import { isStakeParticipant } from '../domain/stakerRef';
import type { ManualStakerProfile, Session, StakeContract } from '../domain/types';
import type {
  LedgerRepositories,
  ManualStakerRepository,
  SessionRepository,
  StakeRepository,
} from './types';

// Records are cloned on the way in and out so callers never share mutable state with the store.

export function createInMemorySessionRepository(): SessionRepository {
  const sessions = new Map<string, Session>();

  return {
    async getSession(sessionId) {
      const session = sessions.get(sessionId);
      return session ? structuredClone(session) : null;
    },
    async saveSession(session) {
      sessions.set(session.sessionId, structuredClone(session));
    },
    async deleteSession(sessionId) {
      sessions.delete(sessionId);
    },
    async listSessionsForPlayer(playerId) {
      return Array.from(sessions.values())
        .filter((session) => session.playerId === playerId)
        .map((session) => structuredClone(session));
    },
  };
}

export function createInMemoryStakeRepository(): StakeRepository {
  const stakes = new Map<string, StakeContract>();

  const select = (predicate: (stake: StakeContract) => boolean): StakeContract[] =>
    Array.from(stakes.values())
      .filter(predicate)
      .map((stake) => structuredClone(stake));

  return {
    async getStake(stakeId) {
      const stake = stakes.get(stakeId);
      return stake ? structuredClone(stake) : null;
    },
    async saveStake(stake) {
      stakes.set(stake.stakeId, structuredClone(stake));
    },
    async deleteStake(stakeId) {
      stakes.delete(stakeId);
    },
    async listStakesForSession(sessionId) {
      return select((stake) => stake.sessionId === sessionId);
    },
    async listStakesForUser(userId) {
      return select((stake) => isStakeParticipant(stake, userId));
    },
  };
}

export function createInMemoryManualStakerRepository(): ManualStakerRepository {
  const profiles = new Map<string, ManualStakerProfile>();

  return {
    async getProfile(profileId) {
      const profile = profiles.get(profileId);
      return profile ? structuredClone(profile) : null;
    },
    async saveProfile(profile) {
      profiles.set(profile.profileId, structuredClone(profile));
    },
    async deleteProfile(profileId) {
      profiles.delete(profileId);
    },
    async listProfilesForOwner(ownerId) {
      return Array.from(profiles.values())
        .filter((profile) => profile.ownerId === ownerId)
        .map((profile) => structuredClone(profile));
    },
  };
}

export function createInMemoryRepositories(): LedgerRepositories {
  return {
    sessions: createInMemorySessionRepository(),
    stakes: createInMemoryStakeRepository(),
    manualStakers: createInMemoryManualStakerRepository(),
  };
}
