import type { Logger } from 'pino';
import type { StakerRef } from '../domain/types';
import type { ManualStakerRepository } from '../storage/types';

/** Identity collaborator that knows app users' display names. */
export interface StakerDirectory {
  resolveDisplayName(userId: string): Promise<string | null>;
}

export type StakerNameResolver = {
  displayNameFor(staker: StakerRef): Promise<string>;
};

export type StakerNameResolverOptions = {
  directory: StakerDirectory;
  manualStakers: ManualStakerRepository;
  logger: Logger;
  labels: { unresolvedAppStaker: string; unresolvedManualStaker: string };
  timeoutMs: number;
};

export const emptyStakerDirectory: StakerDirectory = {
  resolveDisplayName: async () => null,
};

async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T | null> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Best-effort display names. Lookups that fail, time out or come back empty fall back to the
 * stake's denormalized name or a placeholder label; they never fail the caller.
 */
export function createStakerNameResolver(options: StakerNameResolverOptions): StakerNameResolver {
  const { directory, manualStakers, logger, labels, timeoutMs } = options;

  const resolveAppUser = async (userId: string): Promise<string> => {
    try {
      const name = await withTimeout(directory.resolveDisplayName(userId), timeoutMs);
      return name?.trim() || labels.unresolvedAppStaker;
    } catch (error) {
      logger.warn({ err: error, userId }, 'stakerDirectory.resolve.failed');
      return labels.unresolvedAppStaker;
    }
  };

  const resolveManual = async (profileId: string, fallback: string): Promise<string> => {
    try {
      const profile = await manualStakers.getProfile(profileId);
      if (profile) {
        return profile.name;
      }
    } catch (error) {
      logger.warn({ err: error, profileId }, 'stakerDirectory.resolve.failed');
    }
    return fallback.trim() || labels.unresolvedManualStaker;
  };

  return {
    displayNameFor: (staker) =>
      staker.kind === 'APP_USER'
        ? resolveAppUser(staker.userId)
        : resolveManual(staker.profileId, staker.displayNameFallback),
  };
}
