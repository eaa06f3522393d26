import { describe, expect, it } from 'vitest';
import {
  currentProfit,
  currentStack,
  elapsedActiveSeconds,
  isStaleSession,
  liveSnapshot,
  settlementFacts,
  stackSeries,
  totalBuyIn,
} from '../../src/domain/liveSessionAccumulator';
import { appendChipUpdate, appendRebuy } from '../../src/domain/sessionEventLog';
import {
  planSessionPause,
  planSessionResume,
  planSessionStart,
  type SessionTransitionPlan,
} from '../../src/domain/sessionStateMachine';
import type { Session } from '../../src/domain/types';
import { at, makeSession } from '../helpers/fixtures';

function applied(plan: SessionTransitionPlan): Session {
  if (plan.type !== 'apply') {
    throw new Error(`expected apply, got ${plan.error}`);
  }
  return plan.session;
}

function withUpdate(session: Session, updateId: string, amount: number, timestamp: Date): Session {
  const result = appendChipUpdate(session, {
    updateId,
    amount,
    note: null,
    timestamp: timestamp.toISOString(),
  });
  if (!result.ok) {
    throw new Error(result.error);
  }
  return result.value.session;
}

describe('liveSessionAccumulator', () => {
  describe('currentStack', () => {
    it('counts the buy-in as the stack before any update', () => {
      expect(currentStack(makeSession())).toEqual({ ok: true, value: 300 });
    });

    it('tracks the most recently appended update for equal or increasing timestamps', () => {
      const steps: Array<[number, number]> = [
        [250, 0],
        [410, 0],
        [380, 60],
        [0, 60],
        [520, 120],
      ];

      let session = makeSession();
      steps.forEach(([amount, seconds], index) => {
        session = withUpdate(session, `u${index}`, amount, at(seconds));
        expect(currentStack(session)).toEqual({ ok: true, value: amount });
      });
    });

    it('reports the recorded cashout once completed', () => {
      const session = makeSession({
        mode: 'COMPLETED',
        cashout: 640,
        chipUpdates: [
          {
            updateId: 'u1',
            amount: 700,
            note: null,
            timestamp: at(10).toISOString(),
            source: 'MANUAL',
          },
        ],
      });

      expect(currentStack(session)).toEqual({ ok: true, value: 640 });
      expect(currentProfit(session)).toEqual({ ok: true, value: 340 });
    });

    it('refuses to derive anything before the session has a buy-in', () => {
      const session = makeSession({ mode: 'SETUP', initialBuyIn: 0, totalBuyIn: 0 });

      expect(currentStack(session)).toEqual({ ok: false, error: 'UNINITIALIZED_SESSION' });
      expect(currentProfit(session)).toEqual({ ok: false, error: 'UNINITIALIZED_SESSION' });
      expect(totalBuyIn(session)).toEqual({ ok: false, error: 'UNINITIALIZED_SESSION' });
      expect(settlementFacts(session)).toEqual({ ok: false, error: 'UNINITIALIZED_SESSION' });
      expect(liveSnapshot(session, at(0).getTime())).toEqual({
        ok: false,
        error: 'UNINITIALIZED_SESSION',
      });
    });
  });

  describe('rebuys', () => {
    it('raise stack and buy-in together, leaving profit unchanged', () => {
      const before = withUpdate(makeSession(), 'u1', 180, at(30));
      expect(currentProfit(before)).toEqual({ ok: true, value: -120 });

      const rebought = appendRebuy(before, {
        updateId: 'r1',
        amount: 100,
        timestamp: at(40).toISOString(),
      });
      if (!rebought.ok) {
        throw new Error(rebought.error);
      }
      const after = rebought.value.session;

      expect(currentStack(after)).toEqual({ ok: true, value: 280 });
      expect(totalBuyIn(after)).toEqual({ ok: true, value: 400 });
      expect(currentProfit(after)).toEqual({ ok: true, value: -120 });
      expect(after.rebuyCount).toBe(1);
    });

    it('measure profit against the current total buy-in', () => {
      const session = makeSession({ totalBuyIn: 400, initialBuyIn: 300 });
      const updated = withUpdate(session, 'u1', 450, at(10));

      expect(currentProfit(updated)).toEqual({ ok: true, value: 50 });
    });
  });

  describe('elapsedActiveSeconds', () => {
    it('counts only active time across a pause and resume', () => {
      const setup = makeSession({
        mode: 'SETUP',
        initialBuyIn: 0,
        totalBuyIn: 0,
        startedAt: null,
        lastActiveAt: null,
      });

      const started = applied(planSessionStart(setup, 300, at(0)));
      const paused = applied(planSessionPause(started, at(100)));
      expect(elapsedActiveSeconds(paused, at(600).getTime())).toBe(100);

      const resumed = applied(planSessionResume(paused, at(600)));
      expect(elapsedActiveSeconds(resumed, at(650).getTime())).toBe(150);
    });

    it('never counts backwards when the clock reads earlier than the last resume', () => {
      const session = makeSession({ elapsedSeconds: 42, lastActiveAt: at(100).toISOString() });

      expect(elapsedActiveSeconds(session, at(90).getTime())).toBe(42);
    });
  });

  it('builds a live snapshot from the derived values', () => {
    const session = withUpdate(makeSession({ rebuyCount: 0 }), 'u1', 365, at(20));

    expect(liveSnapshot(session, at(90).getTime())).toEqual({
      ok: true,
      value: {
        sessionId: 's1',
        mode: 'ACTIVE',
        totalBuyIn: 300,
        currentStack: 365,
        currentProfit: 65,
        elapsedActiveSeconds: 90,
        rebuyCount: 0,
      },
    });
  });

  it('charts the stack starting from the initial buy-in', () => {
    let session = withUpdate(makeSession(), 'u1', 320, at(10));
    session = withUpdate(session, 'u2', 275, at(20));

    expect(stackSeries(session)).toEqual([300, 320, 275]);
    expect(stackSeries(makeSession({ mode: 'SETUP' }))).toEqual([]);
  });

  describe('isStaleSession', () => {
    it('flags unfinished sessions started longer ago than the window', () => {
      const session = makeSession();

      expect(isStaleSession(session, at(25 * 3600).getTime(), 24)).toBe(true);
      expect(isStaleSession(session, at(23 * 3600).getTime(), 24)).toBe(false);
    });

    it('measures a paused session from when it was paused', () => {
      const session = makeSession({
        mode: 'PAUSED',
        lastActiveAt: null,
        lastPausedAt: at(10 * 3600).toISOString(),
      });

      expect(isStaleSession(session, at(30 * 3600).getTime(), 24)).toBe(false);
      expect(isStaleSession(session, at(35 * 3600).getTime(), 24)).toBe(true);
    });

    it('never flags completed sessions', () => {
      const session = makeSession({ mode: 'COMPLETED', cashout: 100 });

      expect(isStaleSession(session, at(72 * 3600).getTime(), 24)).toBe(false);
    });
  });
});
