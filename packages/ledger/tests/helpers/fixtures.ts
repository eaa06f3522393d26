import pino, { type Logger } from 'pino';
import { createKeyedLock, createSubject } from '@stakebook/shared';
import type {
  LedgerEvent,
  ManualStakerProfile,
  RecomputeTrigger,
  Session,
  StakeContract,
} from '../../src/domain/types';
import type { LedgerMetrics } from '../../src/observability/metrics';
import type {
  LedgerServiceDependencies,
  LedgerSettings,
} from '../../src/services/dependencies';
import { createInMemoryRepositories } from '../../src/storage/inMemoryRepositories';
import { isRecord } from '../../src/utils/guards';

export const T0 = '2026-03-01T18:00:00.000Z';

export function at(secondsAfterT0: number): Date {
  return new Date(Date.parse(T0) + secondsAfterT0 * 1000);
}

export function makeSession(overrides: Partial<Session> = {}): Session {
  return {
    sessionId: 's1',
    playerId: 'player-1',
    gameType: 'CASH_GAME',
    gameName: 'Friday Home Game',
    stakes: '1/2 NLH',
    mode: 'ACTIVE',
    initialBuyIn: 300,
    totalBuyIn: 300,
    rebuyCount: 0,
    cashout: null,
    chipUpdates: [],
    notes: [],
    elapsedSeconds: 0,
    lastActiveAt: T0,
    lastPausedAt: null,
    startedAt: T0,
    endedAt: null,
    createdAt: T0,
    updatedAt: T0,
    version: 1,
    ...overrides,
  };
}

export function makeStake(overrides: Partial<StakeContract> = {}): StakeContract {
  return {
    stakeId: 'stake-1',
    sessionId: 's1',
    staker: { kind: 'APP_USER', userId: 'staker-a' },
    stakedPlayerId: 'player-1',
    percentage: 0.5,
    markup: 1,
    sessionBuyIn: 300,
    sessionCashout: 300,
    settlementAmount: 0,
    status: 'AWAITING_SETTLEMENT',
    sessionGameName: 'Friday Home Game',
    sessionStakes: '1/2 NLH',
    isTournament: false,
    proposedAt: T0,
    acceptedAt: T0,
    settlementInitiatedByUserId: null,
    settlementInitiatedAt: null,
    settledAt: null,
    settledByUserId: null,
    reopenedAt: null,
    cancelledAt: null,
    lastUpdatedAt: T0,
    ...overrides,
  };
}

export function makeProfile(overrides: Partial<ManualStakerProfile> = {}): ManualStakerProfile {
  return {
    profileId: 'profile-1',
    ownerId: 'player-1',
    name: 'Uncle Ray',
    contactInfo: null,
    notes: null,
    createdAt: T0,
    lastUpdatedAt: T0,
    ...overrides,
  };
}

export type TestClock = {
  now(): Date;
  advance(seconds: number): void;
};

export function createTestClock(start: string = T0): TestClock {
  let current = Date.parse(start);
  return {
    now: () => new Date(current),
    advance: (seconds) => {
      current += seconds * 1000;
    },
  };
}

export function createSequentialIds(prefix = 'id'): { randomUUID(): string } {
  let next = 0;
  return {
    randomUUID: () => {
      next += 1;
      return `${prefix}-${next}`;
    },
  };
}

export type RecordingMetrics = LedgerMetrics & {
  sessionTransitions: string[];
  stakeTransitions: string[];
  recomputations: Array<[RecomputeTrigger, number]>;
  rollbacks: number;
};

export function createRecordingMetrics(): RecordingMetrics {
  const metrics: RecordingMetrics = {
    sessionTransitions: [],
    stakeTransitions: [],
    recomputations: [],
    rollbacks: 0,
    recordSessionTransition: (transition) => {
      metrics.sessionTransitions.push(transition);
    },
    recordStakeTransition: (transition) => {
      metrics.stakeTransitions.push(transition);
    },
    recordRecomputation: (trigger, count) => {
      metrics.recomputations.push([trigger, count]);
    },
    recordRollback: () => {
      metrics.rollbacks += 1;
    },
  };
  return metrics;
}

export type CapturedLogs = {
  logger: Logger;
  entries(): Array<Record<string, unknown>>;
};

export function createCapturingLogger(): CapturedLogs {
  const lines: string[] = [];
  const logger = pino(
    { level: 'debug', base: undefined, timestamp: false },
    { write: (line: string) => lines.push(line) },
  );
  return {
    logger,
    entries: () =>
      lines.map((line) => {
        const parsed: unknown = JSON.parse(line);
        return isRecord(parsed) ? parsed : {};
      }),
  };
}

export const TEST_SETTINGS: LedgerSettings = {
  staleSessionHours: 24,
  maxNoteLength: 40,
  unresolvedAppStakerLabel: 'Loading...',
  unresolvedManualStakerLabel: 'Manual Staker',
  stakerNameTimeoutMs: 50,
};

export type TestDependencies = LedgerServiceDependencies & {
  clock: TestClock;
  metrics: RecordingMetrics;
  published: LedgerEvent[];
};

export function createTestDependencies(
  overrides: Partial<Omit<LedgerServiceDependencies, 'clock' | 'metrics'>> = {},
): TestDependencies {
  const repositories = createInMemoryRepositories();
  const events = createSubject<LedgerEvent>();
  const published: LedgerEvent[] = [];
  events.subscribe((event) => {
    published.push(event);
  });

  return {
    sessions: repositories.sessions,
    stakes: repositories.stakes,
    manualStakers: repositories.manualStakers,
    stakerDirectory: { resolveDisplayName: async () => null },
    lock: createKeyedLock(),
    events,
    logger: pino({ level: 'silent' }),
    settings: TEST_SETTINGS,
    ids: createSequentialIds(),
    ...overrides,
    clock: createTestClock(),
    metrics: createRecordingMetrics(),
    published,
  };
}
