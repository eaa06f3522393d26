import { err, ok, type Result } from '@stakebook/shared';
import type { LiveSnapshot, Session, SettlementFacts } from './types';

type Uninitialized = 'UNINITIALIZED_SESSION';

export function isInitialized(session: Session): boolean {
  return session.mode !== 'SETUP';
}

export function totalBuyIn(session: Session): Result<number, Uninitialized> {
  return isInitialized(session) ? ok(session.totalBuyIn) : err('UNINITIALIZED_SESSION');
}

function latestStack(session: Session): number {
  const last = session.chipUpdates.at(-1);
  return last ? last.amount : session.totalBuyIn;
}

/**
 * The newest snapshot, or the buy-in while no snapshot exists yet.
 * A completed session reports its recorded cashout.
 */
export function currentStack(session: Session): Result<number, Uninitialized> {
  if (!isInitialized(session)) {
    return err('UNINITIALIZED_SESSION');
  }
  if (session.mode === 'COMPLETED' && session.cashout !== null) {
    return ok(session.cashout);
  }
  return ok(latestStack(session));
}

/** Measured against the current total buy-in; a rebuy is profit-neutral until the stack moves. */
export function currentProfit(session: Session): Result<number, Uninitialized> {
  const stack = currentStack(session);
  if (!stack.ok) {
    return stack;
  }
  return ok(stack.value - session.totalBuyIn);
}

export function elapsedActiveSeconds(session: Session, nowMs: number): number {
  if (session.mode !== 'ACTIVE' || !session.lastActiveAt) {
    return session.elapsedSeconds;
  }
  const runningMs = Math.max(0, nowMs - Date.parse(session.lastActiveAt));
  return session.elapsedSeconds + runningMs / 1000;
}

/** Facts a stake settles against: final figures once completed, the live stack before that. */
export function settlementFacts(session: Session): Result<SettlementFacts, Uninitialized> {
  const stack = currentStack(session);
  if (!stack.ok) {
    return stack;
  }
  return ok({ buyIn: session.totalBuyIn, cashout: stack.value });
}

/** Stack values for charting, starting from the initial buy-in. */
export function stackSeries(session: Session): number[] {
  if (!isInitialized(session)) {
    return [];
  }
  return [session.initialBuyIn, ...session.chipUpdates.map((update) => update.amount)];
}

export function liveSnapshot(session: Session, nowMs: number): Result<LiveSnapshot, Uninitialized> {
  const stack = currentStack(session);
  if (!stack.ok) {
    return stack;
  }

  return ok({
    sessionId: session.sessionId,
    mode: session.mode,
    totalBuyIn: session.totalBuyIn,
    currentStack: stack.value,
    currentProfit: stack.value - session.totalBuyIn,
    elapsedActiveSeconds: elapsedActiveSeconds(session, nowMs),
    rebuyCount: session.rebuyCount,
  });
}

/**
 * Unfinished and untouched for longer than the window, measured from the last time the clock
 * started or stopped.
 */
export function isStaleSession(session: Session, nowMs: number, staleHours: number): boolean {
  if (session.mode === 'COMPLETED') {
    return false;
  }
  const since =
    session.lastActiveAt ?? session.lastPausedAt ?? session.startedAt ?? session.createdAt;
  return nowMs - Date.parse(since) > staleHours * 60 * 60 * 1000;
}
