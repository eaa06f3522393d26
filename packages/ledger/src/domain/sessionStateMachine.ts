import type { Session, SessionMode } from './types';
import { elapsedActiveSeconds } from './liveSessionAccumulator';

export type SessionTransitionError =
  | 'INVALID_TRANSITION'
  | 'INVALID_AMOUNT'
  | 'MISSING_GAME'
  | 'UNINITIALIZED_SESSION';

export type SessionTransitionPlan =
  | { type: 'apply'; session: Session }
  | { type: 'reject'; error: SessionTransitionError };

type StateContext = {
  session: Session;
  nowMs: number;
  nowIso: string;
};

type SessionState = {
  onStart(ctx: StateContext, buyIn: number): SessionTransitionPlan;
  onPause(ctx: StateContext): SessionTransitionPlan;
  onResume(ctx: StateContext): SessionTransitionPlan;
  onBeginEnding(ctx: StateContext): SessionTransitionPlan;
  onFinalize(ctx: StateContext, cashout: number): SessionTransitionPlan;
};

const reject = (error: SessionTransitionError): SessionTransitionPlan => ({
  type: 'reject',
  error,
});

/** Stops the clock, folding the running stretch into the banked seconds. */
function stopClock({ session, nowMs, nowIso }: StateContext): Session {
  return {
    ...session,
    elapsedSeconds: elapsedActiveSeconds(session, nowMs),
    lastActiveAt: null,
    lastPausedAt: nowIso,
  };
}

function isValidCashout(cashout: number): boolean {
  return Number.isFinite(cashout) && cashout >= 0;
}

function finalize(ctx: StateContext, cashout: number): SessionTransitionPlan {
  if (!isValidCashout(cashout)) {
    return reject('INVALID_AMOUNT');
  }
  return {
    type: 'apply',
    session: {
      ...stopClock(ctx),
      mode: 'COMPLETED',
      cashout,
      endedAt: ctx.nowIso,
    },
  };
}

const setupState: SessionState = {
  onStart: ({ session, nowIso }, buyIn) => {
    if (session.gameName.trim().length === 0) {
      return reject('MISSING_GAME');
    }
    if (!Number.isFinite(buyIn) || buyIn <= 0) {
      return reject('INVALID_AMOUNT');
    }
    return {
      type: 'apply',
      session: {
        ...session,
        mode: 'ACTIVE',
        initialBuyIn: buyIn,
        totalBuyIn: buyIn,
        startedAt: nowIso,
        lastActiveAt: nowIso,
        elapsedSeconds: 0,
      },
    };
  },
  onPause: () => reject('INVALID_TRANSITION'),
  onResume: () => reject('INVALID_TRANSITION'),
  onBeginEnding: () => reject('INVALID_TRANSITION'),
  onFinalize: () => reject('UNINITIALIZED_SESSION'),
};

const activeState: SessionState = {
  onStart: () => reject('INVALID_TRANSITION'),
  onPause: (ctx) => ({ type: 'apply', session: { ...stopClock(ctx), mode: 'PAUSED' } }),
  onResume: () => reject('INVALID_TRANSITION'),
  onBeginEnding: (ctx) => ({ type: 'apply', session: { ...stopClock(ctx), mode: 'ENDING' } }),
  onFinalize: finalize,
};

const resumable: Pick<SessionState, 'onResume'> = {
  onResume: ({ session, nowIso }) => ({
    type: 'apply',
    session: { ...session, mode: 'ACTIVE', lastActiveAt: nowIso },
  }),
};

const pausedState: SessionState = {
  ...resumable,
  onStart: () => reject('INVALID_TRANSITION'),
  onPause: () => reject('INVALID_TRANSITION'),
  onBeginEnding: ({ session }) => ({ type: 'apply', session: { ...session, mode: 'ENDING' } }),
  onFinalize: finalize,
};

const endingState: SessionState = {
  ...resumable,
  onStart: () => reject('INVALID_TRANSITION'),
  onPause: () => reject('INVALID_TRANSITION'),
  onBeginEnding: () => reject('INVALID_TRANSITION'),
  onFinalize: finalize,
};

const completedState: SessionState = {
  onStart: () => reject('INVALID_TRANSITION'),
  onPause: () => reject('INVALID_TRANSITION'),
  onResume: () => reject('INVALID_TRANSITION'),
  onBeginEnding: () => reject('INVALID_TRANSITION'),
  onFinalize: () => reject('INVALID_TRANSITION'),
};

const states: Record<SessionMode, SessionState> = {
  SETUP: setupState,
  ACTIVE: activeState,
  PAUSED: pausedState,
  ENDING: endingState,
  COMPLETED: completedState,
};

function context(session: Session, now: Date): StateContext {
  return { session, nowMs: now.getTime(), nowIso: now.toISOString() };
}

export function planSessionStart(
  session: Session,
  buyIn: number,
  now: Date,
): SessionTransitionPlan {
  return states[session.mode].onStart(context(session, now), buyIn);
}

export function planSessionPause(session: Session, now: Date): SessionTransitionPlan {
  return states[session.mode].onPause(context(session, now));
}

export function planSessionResume(session: Session, now: Date): SessionTransitionPlan {
  return states[session.mode].onResume(context(session, now));
}

export function planSessionBeginEnding(session: Session, now: Date): SessionTransitionPlan {
  return states[session.mode].onBeginEnding(context(session, now));
}

export function planSessionFinalize(
  session: Session,
  cashout: number,
  now: Date,
): SessionTransitionPlan {
  return states[session.mode].onFinalize(context(session, now), cashout);
}

/** Buy-in correction; allowed in any initialized mode, including after completion. */
export function planBuyInEdit(session: Session, totalBuyIn: number): SessionTransitionPlan {
  if (!Number.isFinite(totalBuyIn) || totalBuyIn < 0) {
    return reject('INVALID_AMOUNT');
  }
  if (session.mode === 'SETUP') {
    return reject('UNINITIALIZED_SESSION');
  }
  return { type: 'apply', session: { ...session, totalBuyIn } };
}

/** Cashout correction; only a completed session has a cashout to amend. */
export function planCashoutEdit(session: Session, cashout: number): SessionTransitionPlan {
  if (!isValidCashout(cashout)) {
    return reject('INVALID_AMOUNT');
  }
  if (session.mode !== 'COMPLETED') {
    return reject(session.mode === 'SETUP' ? 'UNINITIALIZED_SESSION' : 'INVALID_TRANSITION');
  }
  return { type: 'apply', session: { ...session, cashout } };
}
