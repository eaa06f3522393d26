import { describe, expect, it } from 'vitest';
import { SessionService } from '../../src/services/sessionService';
import { StakeService } from '../../src/services/stakeService';
import type { StakerDirectory } from '../../src/services/stakerDirectory';
import {
  T0,
  createCapturingLogger,
  createTestDependencies,
  makeProfile,
  makeSession,
  makeStake,
} from '../helpers/fixtures';

const directory: StakerDirectory = {
  resolveDisplayName: async (userId) => (userId === 'staker-a' ? 'Alice' : null),
};

const createServices = (overrides: Parameters<typeof createTestDependencies>[0] = {}) => {
  const deps = createTestDependencies({ stakerDirectory: directory, ...overrides });
  return {
    deps,
    sessions: new SessionService(deps),
    stakes: new StakeService(deps),
  };
};

const appStake = { sessionId: 's1', actorId: 'player-1', percentage: 0.5, markup: 1 } as const;

describe('StakeService.addStake', () => {
  it('proposes an app-user stake priced against the live session', async () => {
    const { deps, stakes } = createServices();
    await deps.sessions.saveSession(makeSession());

    const result = await stakes.addStake({ ...appStake, staker: { appUserId: 'staker-a' } });

    expect(result).toEqual({
      ok: true,
      value: {
        ...makeStake({ stakeId: 'id-1', status: 'PROPOSED', acceptedAt: null }),
        stakerDisplayName: 'Alice',
      },
    });
    expect(deps.metrics.stakeTransitions).toEqual(['propose']);
  });

  it('starts manual stakes as agreed and names them from the profile', async () => {
    const { deps, stakes } = createServices();
    await deps.sessions.saveSession(makeSession());
    await deps.manualStakers.saveProfile(makeProfile());

    const result = await stakes.addStake({
      ...appStake,
      staker: { manualStakerId: 'profile-1' },
    });

    expect(result.ok && result.value).toMatchObject({
      staker: { kind: 'MANUAL', profileId: 'profile-1', displayNameFallback: 'Uncle Ray' },
      status: 'AWAITING_SETTLEMENT',
      acceptedAt: T0,
      stakerDisplayName: 'Uncle Ray',
    });
  });

  it('validates terms and the staker selection', async () => {
    const { deps, stakes } = createServices();
    await deps.sessions.saveSession(makeSession());
    await deps.sessions.saveSession(makeSession({ sessionId: 's2', mode: 'SETUP' }));
    await deps.manualStakers.saveProfile(makeProfile({ profileId: 'theirs', ownerId: 'player-9' }));
    const staker = { appUserId: 'staker-a' };

    const cases = [
      [{ ...appStake, staker, percentage: 0 }, 'INVALID_PERCENTAGE'],
      [{ ...appStake, staker, percentage: 1.5 }, 'INVALID_PERCENTAGE'],
      [{ ...appStake, staker, markup: 0.9 }, 'INVALID_MARKUP'],
      [{ ...appStake, staker: { appUserId: '  ' } }, 'MISSING_STAKER'],
      [{ ...appStake, staker: { appUserId: 'staker-a', manualStakerId: 'p' } }, 'AMBIGUOUS_STAKER'],
      [{ ...appStake, staker, sessionId: 'missing' }, 'SESSION_NOT_FOUND'],
      [{ ...appStake, staker, sessionId: 's2' }, 'UNINITIALIZED_SESSION'],
      [{ ...appStake, staker: { manualStakerId: 'nobody' } }, 'STAKER_PROFILE_NOT_FOUND'],
      [{ ...appStake, staker: { manualStakerId: 'theirs' } }, 'FORBIDDEN'],
      [{ ...appStake, staker, actorId: 'stranger' }, 'FORBIDDEN'],
    ] as const;

    for (const [input, error] of cases) {
      expect(await stakes.addStake(input)).toEqual({ ok: false, error });
    }
    expect(await deps.stakes.listStakesForSession('s1')).toEqual([]);
  });

  it('lets a staker propose their own stake', async () => {
    const { deps, stakes } = createServices();
    await deps.sessions.saveSession(makeSession());

    const result = await stakes.addStake({
      ...appStake,
      actorId: 'staker-a',
      staker: { appUserId: 'staker-a' },
    });

    expect(result.ok && result.value.status).toBe('PROPOSED');
  });

  it('refuses a second open stake for the same staker unless split', async () => {
    const { deps, stakes } = createServices();
    await deps.sessions.saveSession(makeSession());
    const input = { ...appStake, staker: { appUserId: 'staker-a' } };

    await stakes.addStake(input);

    expect(await stakes.addStake(input)).toEqual({ ok: false, error: 'DUPLICATE_STAKE' });
    const split = await stakes.addStake(input, { allowSplit: true });
    expect(split.ok && split.value.stakeId).toBe('id-2');
  });
});

describe('StakeService transitions', () => {
  it('only lets the named staker accept', async () => {
    const { deps, stakes } = createServices();
    await deps.sessions.saveSession(makeSession());
    await deps.stakes.saveStake(makeStake({ status: 'PROPOSED', acceptedAt: null }));
    deps.clock.advance(60);

    expect(await stakes.acceptStake('stake-1', 'player-1')).toEqual({
      ok: false,
      error: 'FORBIDDEN',
    });
    const accepted = await stakes.acceptStake('stake-1', 'staker-a');
    expect(accepted.ok && accepted.value).toMatchObject({
      status: 'AWAITING_SETTLEMENT',
      acceptedAt: '2026-03-01T18:01:00.000Z',
    });
    expect(await stakes.acceptStake('missing', 'staker-a')).toEqual({
      ok: false,
      error: 'STAKE_NOT_FOUND',
    });
  });

  it('settles an app-user stake once the other participant confirms', async () => {
    const capture = createCapturingLogger();
    const { deps, stakes } = createServices({ logger: capture.logger });
    await deps.sessions.saveSession(makeSession());
    await deps.stakes.saveStake(makeStake({ sessionCashout: 500, settlementAmount: -100 }));

    expect(await stakes.confirmSettlement('stake-1', 'staker-a')).toEqual({
      ok: false,
      error: 'SETTLEMENT_NOT_INITIATED',
    });
    expect(await stakes.initiateSettlement('stake-1', 'stranger')).toEqual({
      ok: false,
      error: 'FORBIDDEN',
    });

    const initiated = await stakes.initiateSettlement('stake-1', 'player-1');
    expect(initiated.ok && initiated.value).toMatchObject({
      status: 'AWAITING_SETTLEMENT',
      settlementInitiatedByUserId: 'player-1',
      settlementInitiatedAt: T0,
      settledAt: null,
      settledByUserId: null,
    });
    expect(await stakes.initiateSettlement('stake-1', 'staker-a')).toEqual({
      ok: false,
      error: 'SETTLEMENT_PENDING',
    });
    expect(await stakes.confirmSettlement('stake-1', 'player-1')).toEqual({
      ok: false,
      error: 'SETTLEMENT_NEEDS_COUNTERPARTY',
    });

    deps.clock.advance(60);
    const settled = await stakes.confirmSettlement('stake-1', 'staker-a');

    expect(settled.ok && settled.value).toMatchObject({
      status: 'SETTLED',
      settlementInitiatedByUserId: 'player-1',
      settlementInitiatedAt: T0,
      settledAt: '2026-03-01T18:01:00.000Z',
      settledByUserId: 'staker-a',
      settlementAmount: -100,
    });
    expect(await stakes.markSettled('stake-1', 'player-1')).toEqual({
      ok: false,
      error: 'STAKE_ALREADY_SETTLED',
    });
    expect(deps.metrics.stakeTransitions).toEqual(['initiate_settlement', 'settle']);
    expect(deps.published).toEqual([
      {
        type: 'stake.settlement_initiated',
        stakeId: 'stake-1',
        sessionId: 's1',
        settlementAmount: -100,
        initiatedByUserId: 'player-1',
      },
      {
        type: 'stake.settled',
        stakeId: 'stake-1',
        sessionId: 's1',
        settlementAmount: -100,
        initiatedByUserId: 'player-1',
        settledByUserId: 'staker-a',
      },
    ]);
    const settlementMessages = ['stake.settlement_initiated', 'stake.settled'];
    const settlementLogs = capture
      .entries()
      .filter((entry) => settlementMessages.some((msg) => entry.msg === msg));
    expect(settlementLogs).toEqual([
      {
        level: 30,
        stakeId: 'stake-1',
        sessionId: 's1',
        settlementAmount: -100,
        byUserId: 'player-1',
        msg: 'stake.settlement_initiated',
      },
      {
        level: 30,
        stakeId: 'stake-1',
        sessionId: 's1',
        settlementAmount: -100,
        byUserId: 'staker-a',
        initiatedByUserId: 'player-1',
        msg: 'stake.settled',
      },
    ]);
  });

  it('marks a stake paid by confirming a request from the other side', async () => {
    const { deps, stakes } = createServices();
    await deps.sessions.saveSession(makeSession());
    await deps.stakes.saveStake(makeStake());

    const first = await stakes.markSettled('stake-1', 'staker-a');
    expect(first.ok && first.value.status).toBe('AWAITING_SETTLEMENT');
    expect(await stakes.markSettled('stake-1', 'staker-a')).toEqual({
      ok: false,
      error: 'SETTLEMENT_NEEDS_COUNTERPARTY',
    });

    const second = await stakes.markSettled('stake-1', 'player-1');
    expect(second.ok && second.value).toMatchObject({
      status: 'SETTLED',
      settlementInitiatedByUserId: 'staker-a',
      settledByUserId: 'player-1',
    });
  });

  it('settles a manual stake in one step', async () => {
    const { deps, stakes } = createServices();
    await deps.sessions.saveSession(makeSession());
    await deps.manualStakers.saveProfile(makeProfile());
    await deps.stakes.saveStake(
      makeStake({
        staker: { kind: 'MANUAL', profileId: 'profile-1', displayNameFallback: 'Uncle Ray' },
        sessionCashout: 500,
        settlementAmount: -100,
      }),
    );

    const settled = await stakes.markSettled('stake-1', 'player-1');

    expect(settled.ok && settled.value).toMatchObject({
      status: 'SETTLED',
      settlementInitiatedByUserId: 'player-1',
      settlementInitiatedAt: T0,
      settledAt: T0,
      settledByUserId: 'player-1',
      stakerDisplayName: 'Uncle Ray',
    });
    expect(deps.published).toEqual([
      {
        type: 'stake.settled',
        stakeId: 'stake-1',
        sessionId: 's1',
        settlementAmount: -100,
        initiatedByUserId: 'player-1',
        settledByUserId: 'player-1',
      },
    ]);
  });

  it('drops a pending settlement request when the session moves the amount', async () => {
    const { deps, sessions, stakes } = createServices();
    await deps.sessions.saveSession(makeSession());
    await deps.stakes.saveStake(makeStake());
    await stakes.initiateSettlement('stake-1', 'player-1');

    await sessions.appendChipUpdate('s1', { amount: 400 });

    expect(await deps.stakes.getStake('stake-1')).toEqual(
      makeStake({ sessionCashout: 400, settlementAmount: -50 }),
    );
    expect(await stakes.confirmSettlement('stake-1', 'staker-a')).toEqual({
      ok: false,
      error: 'SETTLEMENT_NOT_INITIATED',
    });
  });

  it('updates terms and recomputes against current facts', async () => {
    const { deps, stakes } = createServices();
    await deps.sessions.saveSession(makeSession({ cashout: 500, mode: 'COMPLETED' }));
    await deps.stakes.saveStake(makeStake({ sessionCashout: 500, settlementAmount: -100 }));

    const result = await stakes.updateStake('stake-1', 'player-1', {
      percentage: 0.25,
      markup: 1,
    });

    expect(result.ok && result.value).toMatchObject({ percentage: 0.25, settlementAmount: -50 });
    expect(deps.metrics.recomputations).toEqual([['TERMS_UPDATE', 1]]);
    expect(deps.metrics.stakeTransitions).toEqual(['update_terms']);
  });

  it('cancels open stakes but not settled ones', async () => {
    const { deps, stakes } = createServices();
    await deps.sessions.saveSession(makeSession());
    await deps.stakes.saveStake(makeStake());
    await deps.stakes.saveStake(makeStake({ stakeId: 'stake-2', status: 'SETTLED' }));

    const cancelled = await stakes.cancelStake('stake-1', 'player-1');

    expect(cancelled.ok && cancelled.value).toMatchObject({
      status: 'CANCELLED',
      cancelledAt: T0,
    });
    expect(await stakes.cancelStake('stake-2', 'player-1')).toEqual({
      ok: false,
      error: 'STAKE_ALREADY_SETTLED',
    });
  });

  it('reopens only settled stakes and needs a reason', async () => {
    const { deps, stakes } = createServices();
    await deps.sessions.saveSession(makeSession());
    await deps.stakes.saveStake(makeStake());

    expect(await stakes.reopenStake('stake-1', 'player-1', '  ')).toEqual({
      ok: false,
      error: 'MISSING_REOPEN_REASON',
    });
    expect(await stakes.reopenStake('stake-1', 'player-1', 'typo')).toEqual({
      ok: false,
      error: 'STAKE_NOT_SETTLED',
    });
  });
});

describe('StakeService settlement across session edits', () => {
  it('recomputes open stakes, freezes settled ones and recomputes them on reopen', async () => {
    const capture = createCapturingLogger();
    const { deps, sessions, stakes } = createServices({ logger: capture.logger });
    await deps.manualStakers.saveProfile(makeProfile());

    await sessions.createSession({
      playerId: 'player-1',
      gameType: 'CASH_GAME',
      gameName: 'Friday Home Game',
      stakes: '1/2 NLH',
    });
    await sessions.startSession('id-1', 300);
    await stakes.addStake({ ...appStake, sessionId: 'id-1', staker: { appUserId: 'staker-a' } });
    await stakes.addStake({
      sessionId: 'id-1',
      actorId: 'player-1',
      staker: { manualStakerId: 'profile-1' },
      percentage: 0.2,
      markup: 1.2,
    });
    await stakes.acceptStake('id-2', 'staker-a');

    await sessions.appendRebuy('id-1', { amount: 100 });
    await sessions.finalizeSession('id-1', 600);

    expect(await stakes.settlementAmount('id-2')).toEqual({ ok: true, value: -100 });
    expect(await stakes.settlementAmount('id-3')).toEqual({ ok: true, value: -48 });

    await stakes.markSettled('id-2', 'player-1');
    await stakes.markSettled('id-2', 'staker-a');
    const edited = await sessions.editCashout('id-1', 500);

    expect(await stakes.settlementAmount('id-2')).toEqual({ ok: true, value: -100 });
    expect(await stakes.settlementAmount('id-3')).toEqual({ ok: true, value: -24 });
    const stale = edited.ok ? edited.value.staleSettled : [];
    expect(stale.map(({ stake, currentAmount }) => [stake.stakeId, currentAmount])).toEqual([
      ['id-2', -50],
    ]);

    deps.published.length = 0;
    const reopened = await stakes.reopenStake('id-2', 'staker-a', ' cashout corrected ');

    expect(reopened.ok && reopened.value).toMatchObject({
      status: 'AWAITING_SETTLEMENT',
      sessionBuyIn: 400,
      sessionCashout: 500,
      settlementAmount: -50,
      settledAt: null,
      reopenedAt: T0,
      stakerDisplayName: 'Alice',
    });
    expect(deps.published).toEqual([
      {
        type: 'stake.reopened',
        stakeId: 'id-2',
        sessionId: 'id-1',
        reopenedByUserId: 'staker-a',
        reason: 'cashout corrected',
      },
      {
        type: 'stake.recomputed',
        stakeId: 'id-2',
        sessionId: 'id-1',
        trigger: 'REOPEN',
        previousAmount: -100,
        settlementAmount: -50,
      },
    ]);
    expect(capture.entries().find((entry) => entry.msg === 'stake.reopened')).toMatchObject({
      level: 40,
      reason: 'cashout corrected',
      settledAmount: -100,
      settlementAmount: -50,
    });
  });
});

describe('StakeService reads', () => {
  it('lists a user stakes with display names and fallbacks', async () => {
    const { deps, stakes } = createServices();
    await deps.stakes.saveStake(makeStake());
    await deps.stakes.saveStake(
      makeStake({
        stakeId: 'stake-2',
        proposedAt: '2026-03-02T18:00:00.000Z',
        staker: { kind: 'MANUAL', profileId: 'deleted', displayNameFallback: 'Cousin Vinny' },
      }),
    );
    await deps.stakes.saveStake(
      makeStake({
        stakeId: 'stake-3',
        proposedAt: '2026-03-03T18:00:00.000Z',
        staker: { kind: 'APP_USER', userId: 'staker-z' },
      }),
    );

    const listed = await stakes.listStakesForUser('player-1');

    expect(listed.map((stake) => [stake.stakeId, stake.stakerDisplayName])).toEqual([
      ['stake-3', 'Loading...'],
      ['stake-2', 'Cousin Vinny'],
      ['stake-1', 'Alice'],
    ]);
  });

  it('summarizes a staker performance over settled stakes', async () => {
    const { deps, stakes } = createServices();
    await deps.stakes.saveStake(
      makeStake({ status: 'SETTLED', sessionCashout: 500, settlementAmount: -100 }),
    );

    expect(await stakes.getStakerPerformance('staker-a')).toEqual({
      stakeCount: 1,
      totalStaked: 150,
      totalProfit: 100,
      roi: 100 / 150,
      winRate: 1,
    });
  });
});
