import type { Logger } from 'pino';
import type { ManualStakerProfile, Session, StakeContract } from '../domain/types';
import { tryJsonParse } from '../utils/json';
import { decodeManualStakerProfile, decodeSession, decodeStake } from './decoders';
import type { RedisCommands } from './redisClient';
import type {
  LedgerRepositories,
  ManualStakerRepository,
  SessionRepository,
  StakeRepository,
} from './types';

export type RedisRepositoryOptions = {
  commands: () => Promise<RedisCommands>;
  keyPrefix: string;
  logger: Logger;
};

type Decoder<T> = (value: unknown) => T | null;

function createRecordReader<T>(
  options: RedisRepositoryOptions,
  hashKey: string,
  decode: Decoder<T>,
  kind: string,
) {
  return async (id: string): Promise<T | null> => {
    const redis = await options.commands();
    const payload = await redis.hGet(hashKey, id);
    if (!payload) {
      return null;
    }

    const parsed = tryJsonParse(payload);
    const record = parsed.ok ? decode(parsed.value) : null;
    if (!record) {
      options.logger.warn({ id, kind }, 'redisStore.decode.failed');
    }
    return record;
  };
}

async function readMany<T>(
  redis: RedisCommands,
  indexKey: string,
  read: (id: string) => Promise<T | null>,
): Promise<T[]> {
  const ids = await redis.sMembers(indexKey);
  const records: T[] = [];
  for (const id of ids) {
    const record = await read(id);
    if (record) {
      records.push(record);
    }
  }
  return records;
}

export function createRedisSessionRepository(options: RedisRepositoryOptions): SessionRepository {
  const hashKey = `${options.keyPrefix}:sessions`;
  const byPlayerKey = (playerId: string) => `${options.keyPrefix}:sessions:by-player:${playerId}`;
  const getSession = createRecordReader(options, hashKey, decodeSession, 'session');

  return {
    getSession,
    async saveSession(session: Session) {
      const redis = await options.commands();
      await redis.hSet(hashKey, session.sessionId, JSON.stringify(session));
      await redis.sAdd(byPlayerKey(session.playerId), session.sessionId);
    },
    async deleteSession(sessionId) {
      const existing = await getSession(sessionId);
      const redis = await options.commands();
      await redis.hDel(hashKey, sessionId);
      if (existing) {
        await redis.sRem(byPlayerKey(existing.playerId), sessionId);
      }
    },
    async listSessionsForPlayer(playerId) {
      const redis = await options.commands();
      return readMany(redis, byPlayerKey(playerId), getSession);
    },
  };
}

function stakeUserIds(stake: StakeContract): string[] {
  return stake.staker.kind === 'APP_USER'
    ? [stake.stakedPlayerId, stake.staker.userId]
    : [stake.stakedPlayerId];
}

export function createRedisStakeRepository(options: RedisRepositoryOptions): StakeRepository {
  const hashKey = `${options.keyPrefix}:stakes`;
  const bySessionKey = (sessionId: string) => `${options.keyPrefix}:stakes:by-session:${sessionId}`;
  const byUserKey = (userId: string) => `${options.keyPrefix}:stakes:by-user:${userId}`;
  const getStake = createRecordReader(options, hashKey, decodeStake, 'stake');

  return {
    getStake,
    async saveStake(stake: StakeContract) {
      const redis = await options.commands();
      await redis.hSet(hashKey, stake.stakeId, JSON.stringify(stake));
      await redis.sAdd(bySessionKey(stake.sessionId), stake.stakeId);
      for (const userId of stakeUserIds(stake)) {
        await redis.sAdd(byUserKey(userId), stake.stakeId);
      }
    },
    async deleteStake(stakeId) {
      const existing = await getStake(stakeId);
      const redis = await options.commands();
      await redis.hDel(hashKey, stakeId);
      if (!existing) {
        return;
      }
      await redis.sRem(bySessionKey(existing.sessionId), stakeId);
      for (const userId of stakeUserIds(existing)) {
        await redis.sRem(byUserKey(userId), stakeId);
      }
    },
    async listStakesForSession(sessionId) {
      const redis = await options.commands();
      return readMany(redis, bySessionKey(sessionId), getStake);
    },
    async listStakesForUser(userId) {
      const redis = await options.commands();
      return readMany(redis, byUserKey(userId), getStake);
    },
  };
}

export function createRedisManualStakerRepository(
  options: RedisRepositoryOptions,
): ManualStakerRepository {
  const hashKey = `${options.keyPrefix}:manual-stakers`;
  const byOwnerKey = (ownerId: string) => `${options.keyPrefix}:manual-stakers:by-owner:${ownerId}`;
  const getProfile = createRecordReader(
    options,
    hashKey,
    decodeManualStakerProfile,
    'manualStaker',
  );

  return {
    getProfile,
    async saveProfile(profile: ManualStakerProfile) {
      const redis = await options.commands();
      await redis.hSet(hashKey, profile.profileId, JSON.stringify(profile));
      await redis.sAdd(byOwnerKey(profile.ownerId), profile.profileId);
    },
    async deleteProfile(profileId) {
      const existing = await getProfile(profileId);
      const redis = await options.commands();
      await redis.hDel(hashKey, profileId);
      if (existing) {
        await redis.sRem(byOwnerKey(existing.ownerId), profileId);
      }
    },
    async listProfilesForOwner(ownerId) {
      const redis = await options.commands();
      return readMany(redis, byOwnerKey(ownerId), getProfile);
    },
  };
}

export function createRedisRepositories(options: RedisRepositoryOptions): LedgerRepositories {
  return {
    sessions: createRedisSessionRepository(options),
    stakes: createRedisStakeRepository(options),
    manualStakers: createRedisManualStakerRepository(options),
  };
}
