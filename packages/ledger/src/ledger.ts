import type { Logger } from 'pino';
import type { Subject } from '@stakebook/shared';
import { getConfig, type Config } from './config';
import type { LedgerEvent } from './domain/types';
import defaultLogger from './observability/logger';
import {
  createLedgerDependencies,
  settingsFromConfig,
  type LedgerServiceDependencies,
} from './services/dependencies';
import { ManualStakerService } from './services/manualStakerService';
import { SessionService } from './services/sessionService';
import { StakeService } from './services/stakeService';
import type { StakerDirectory } from './services/stakerDirectory';
import { createInMemoryRepositories } from './storage/inMemoryRepositories';
import { createRedisConnection } from './storage/redisClient';
import { createRedisRepositories } from './storage/redisRepositories';
import type { LedgerRepositories } from './storage/types';

export type CreateLedgerOptions = {
  config?: Config;
  /** Replaces the configured storage; `close()` then leaves it alone. */
  repositories?: LedgerRepositories;
  stakerDirectory?: StakerDirectory;
  logger?: Logger;
  clock?: LedgerServiceDependencies['clock'];
  ids?: LedgerServiceDependencies['ids'];
  metrics?: LedgerServiceDependencies['metrics'];
};

export type Ledger = {
  sessions: SessionService;
  stakes: StakeService;
  manualStakers: ManualStakerService;
  events: Subject<LedgerEvent>;
  close(): Promise<void>;
};

/**
 * Wires the services around one set of repositories and one session lock. Storage is Redis when
 * `redisUrl` is configured and in-memory otherwise.
 */
export function createLedger(options: CreateLedgerOptions = {}): Ledger {
  const config = options.config ?? getConfig();
  const logger = options.logger ?? defaultLogger;

  let repositories = options.repositories;
  let close = async (): Promise<void> => undefined;

  if (!repositories && config.redisUrl) {
    const connection = createRedisConnection(config.redisUrl, logger);
    repositories = createRedisRepositories({
      commands: () => connection.getCommands(),
      keyPrefix: config.redisKeyPrefix,
      logger,
    });
    close = () => connection.close();
    logger.info({ keyPrefix: config.redisKeyPrefix }, 'ledger.storage.redis');
  }

  const storage = repositories ?? createInMemoryRepositories();
  const deps = createLedgerDependencies({
    ...storage,
    stakerDirectory: options.stakerDirectory,
    logger,
    clock: options.clock,
    ids: options.ids,
    metrics: options.metrics,
    settings: settingsFromConfig(config),
  });

  return {
    sessions: new SessionService(deps),
    stakes: new StakeService(deps),
    manualStakers: new ManualStakerService(deps),
    events: deps.events,
    close: () => close(),
  };
}
