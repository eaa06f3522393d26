import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { createKeyedLock, createSubject, type KeyedLock, type Subject } from '@stakebook/shared';
import { getConfig, type Config } from '../config';
import type { LedgerEvent } from '../domain/types';
import defaultLogger from '../observability/logger';
import { metrics as defaultMetrics, type LedgerMetrics } from '../observability/metrics';
import { createInMemoryRepositories } from '../storage/inMemoryRepositories';
import type {
  ManualStakerRepository,
  SessionRepository,
  StakeRepository,
} from '../storage/types';
import { emptyStakerDirectory, type StakerDirectory } from './stakerDirectory';

export type LedgerSettings = {
  staleSessionHours: number;
  maxNoteLength: number;
  unresolvedAppStakerLabel: string;
  unresolvedManualStakerLabel: string;
  stakerNameTimeoutMs: number;
};

/**
 * Everything the ledger services touch. Session and stake services must share one instance,
 * since the lock and the repositories are what keep a session and its stakes consistent.
 */
export type LedgerServiceDependencies = {
  readonly sessions: SessionRepository;
  readonly stakes: StakeRepository;
  readonly manualStakers: ManualStakerRepository;
  readonly stakerDirectory: StakerDirectory;
  readonly lock: KeyedLock;
  readonly events: Subject<LedgerEvent>;
  readonly metrics: LedgerMetrics;
  readonly logger: Logger;
  readonly settings: LedgerSettings;
  readonly clock: {
    now(): Date;
  };
  readonly ids: {
    randomUUID(): string;
  };
};

export function settingsFromConfig(config: Config = getConfig()): LedgerSettings {
  return {
    staleSessionHours: config.staleSessionHours,
    maxNoteLength: config.maxNoteLength,
    unresolvedAppStakerLabel: config.unresolvedAppStakerLabel,
    unresolvedManualStakerLabel: config.unresolvedManualStakerLabel,
    stakerNameTimeoutMs: config.stakerNameTimeoutMs,
  };
}

export function createLedgerDependencies(
  overrides: Partial<LedgerServiceDependencies> = {},
): LedgerServiceDependencies {
  const logger = overrides.logger ?? defaultLogger;
  const repositories = createInMemoryRepositories();

  return {
    sessions: overrides.sessions ?? repositories.sessions,
    stakes: overrides.stakes ?? repositories.stakes,
    manualStakers: overrides.manualStakers ?? repositories.manualStakers,
    stakerDirectory: overrides.stakerDirectory ?? emptyStakerDirectory,
    lock: overrides.lock ?? createKeyedLock(),
    events:
      overrides.events ??
      createSubject<LedgerEvent>({
        onError: (error, event) =>
          logger.error({ err: error, event: event.type }, 'ledger.observer.failed'),
      }),
    metrics: overrides.metrics ?? defaultMetrics,
    logger,
    settings: overrides.settings ?? settingsFromConfig(),
    clock: overrides.clock ?? { now: () => new Date() },
    ids: overrides.ids ?? { randomUUID },
  };
}
