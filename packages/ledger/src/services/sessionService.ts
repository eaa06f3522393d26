import { err, ok, type Result } from '@stakebook/shared';
import type { LedgerErrorCode } from '../domain/errors';
import {
  isStaleSession,
  liveSnapshot,
  settlementFacts,
} from '../domain/liveSessionAccumulator';
import { appendAdjustment, appendChipUpdate, appendRebuy } from '../domain/sessionEventLog';
import {
  planBuyInEdit,
  planCashoutEdit,
  planSessionBeginEnding,
  planSessionFinalize,
  planSessionPause,
  planSessionResume,
  planSessionStart,
  type SessionTransitionPlan,
} from '../domain/sessionStateMachine';
import { planRecomputation, type RecomputationPlan } from '../domain/settlement';
import { planStakeCancel } from '../domain/stakeStateMachine';
import type {
  GameType,
  LedgerEvent,
  LiveSnapshot,
  RecomputeTrigger,
  Session,
  StakeContract,
} from '../domain/types';
import { createLedgerDependencies, type LedgerServiceDependencies } from './dependencies';
import { commitLedgerChange } from './ledgerCommit';
import { publishEvents, recomputationEvents } from './ledgerEvents';

// =============================================================================
// Types
// =============================================================================

export type StaleSettlement = {
  stake: StakeContract;
  /** What the frozen stake would settle at against the session's current facts. */
  currentAmount: number;
};

export type SessionMutation = {
  session: Session;
  /** Unsettled stakes whose settlement amounts moved with this change. */
  recomputed: StakeContract[];
  /** Settled stakes left untouched although their facts no longer match the session. */
  staleSettled: StaleSettlement[];
};

export type ChipUpdateMutation = SessionMutation & { updateId: string };

export type CreateSessionInput = {
  playerId: string;
  gameType: GameType;
  gameName: string;
  stakes: string;
};

export type ChipUpdateRequest = {
  amount: number;
  note?: string | null;
  timestamp?: Date;
  updateId?: string;
};

export type RebuyRequest = {
  amount: number;
  timestamp?: Date;
  updateId?: string;
};

export type AdjustmentRequest = {
  delta: number;
  note?: string | null;
  timestamp?: Date;
  updateId?: string;
};

export type SessionDeletion = {
  sessionId: string;
  cancelledStakes: StakeContract[];
};

type SessionResult<T> = Promise<Result<T, LedgerErrorCode>>;

type SessionEdit = (session: Session, now: Date) => Result<Session, LedgerErrorCode>;

type MutationOptions = {
  operation: string;
  /** Set for edits that move buy-in or stack; attached stakes are recomputed in the same commit. */
  trigger?: RecomputeTrigger;
  /** Counted as a lifecycle transition. */
  transition?: string;
  events?: (session: Session) => LedgerEvent[];
};

function fromPlan(plan: SessionTransitionPlan): Result<Session, LedgerErrorCode> {
  return plan.type === 'apply' ? ok(plan.session) : err(plan.error);
}

const EMPTY_PLAN: RecomputationPlan = { updated: [], staleSettled: [] };

function completionEvent(session: Session): LedgerEvent[] {
  if (session.cashout === null || session.endedAt === null) {
    return [];
  }
  return [
    {
      type: 'session.completed',
      sessionId: session.sessionId,
      playerId: session.playerId,
      totalBuyIn: session.totalBuyIn,
      cashout: session.cashout,
      profit: session.cashout - session.totalBuyIn,
      elapsedSeconds: session.elapsedSeconds,
      completedAt: session.endedAt,
    },
  ];
}

// =============================================================================
// SessionService class with dependency injection
// =============================================================================

export class SessionService {
  private readonly deps: LedgerServiceDependencies;

  constructor(deps: LedgerServiceDependencies) {
    this.deps = deps;
  }

  private normalizeNote(note: string | null | undefined): Result<string | null, 'INVALID_NOTE'> {
    const trimmed = note?.trim() ?? '';
    if (trimmed.length === 0) {
      return ok(null);
    }
    return trimmed.length > this.deps.settings.maxNoteLength ? err('INVALID_NOTE') : ok(trimmed);
  }

  private requireNote(text: string): Result<string, 'INVALID_NOTE'> {
    const note = this.normalizeNote(text);
    if (!note.ok) {
      return note;
    }
    return note.value === null ? err('INVALID_NOTE') : ok(note.value);
  }

  /**
   * Load, edit, recompute and commit under the session lock. Events are published once the
   * lock is released, so observers may call back into the ledger.
   */
  private async mutate(
    sessionId: string,
    options: MutationOptions,
    edit: SessionEdit,
  ): SessionResult<SessionMutation> {
    const outcome = await this.deps.lock.withLock(
      sessionId,
      async (): SessionResult<{ mutation: SessionMutation; events: LedgerEvent[] }> => {
        const current = await this.deps.sessions.getSession(sessionId);
        if (!current) {
          return err('SESSION_NOT_FOUND');
        }

        const now = this.deps.clock.now();
        const edited = edit(current, now);
        if (!edited.ok) {
          return edited;
        }

        const nowIso = now.toISOString();
        const next: Session = { ...edited.value, updatedAt: nowIso, version: current.version + 1 };

        let plan = EMPTY_PLAN;
        const facts = settlementFacts(next);
        if (options.trigger && facts.ok) {
          const stakes = await this.deps.stakes.listStakesForSession(sessionId);
          plan = planRecomputation(stakes, facts.value, nowIso);
        }

        const committed = await commitLedgerChange(this.deps, {
          operation: options.operation,
          sessionId,
          session: { type: 'save', previous: current, next },
          stakes: plan.updated,
        });
        if (!committed.ok) {
          return committed;
        }

        if (options.transition) {
          this.deps.metrics.recordSessionTransition(options.transition);
        }
        if (options.trigger) {
          this.deps.metrics.recordRecomputation(options.trigger, plan.updated.length);
          if (plan.staleSettled.length > 0) {
            this.deps.logger.warn(
              {
                sessionId,
                operation: options.operation,
                stakeIds: plan.staleSettled.map(({ stake }) => stake.stakeId),
              },
              'stake.settlement_stale',
            );
          }
        }

        const events = [
          ...(options.events ? options.events(next) : []),
          ...(options.trigger ? recomputationEvents(plan, options.trigger) : []),
        ];

        return ok({
          mutation: {
            session: next,
            recomputed: plan.updated.map(({ next: stake }) => stake),
            staleSettled: plan.staleSettled,
          },
          events,
        });
      },
    );

    if (!outcome.ok) {
      return outcome;
    }
    await publishEvents(this.deps, outcome.value.events);
    return ok(outcome.value.mutation);
  }

  async createSession(input: CreateSessionInput): SessionResult<Session> {
    const nowIso = this.deps.clock.now().toISOString();
    const session: Session = {
      sessionId: this.deps.ids.randomUUID(),
      playerId: input.playerId,
      gameType: input.gameType,
      gameName: input.gameName.trim(),
      stakes: input.stakes.trim(),
      mode: 'SETUP',
      initialBuyIn: 0,
      totalBuyIn: 0,
      rebuyCount: 0,
      cashout: null,
      chipUpdates: [],
      notes: [],
      elapsedSeconds: 0,
      lastActiveAt: null,
      lastPausedAt: null,
      startedAt: null,
      endedAt: null,
      createdAt: nowIso,
      updatedAt: nowIso,
      version: 1,
    };

    const committed = await commitLedgerChange(this.deps, {
      operation: 'createSession',
      sessionId: session.sessionId,
      session: { type: 'save', previous: null, next: session },
    });
    return committed.ok ? ok(session) : committed;
  }

  async getSession(sessionId: string): SessionResult<Session> {
    const session = await this.deps.sessions.getSession(sessionId);
    return session ? ok(session) : err('SESSION_NOT_FOUND');
  }

  /** Newest first. */
  async listSessions(playerId: string): Promise<Session[]> {
    const sessions = await this.deps.sessions.listSessionsForPlayer(playerId);
    return sessions.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async getLiveSnapshot(sessionId: string): SessionResult<LiveSnapshot> {
    const session = await this.deps.sessions.getSession(sessionId);
    if (!session) {
      return err('SESSION_NOT_FOUND');
    }
    return liveSnapshot(session, this.deps.clock.now().getTime());
  }

  /** Sessions left running longer than the configured window, typically forgotten after play. */
  async findStaleSessions(playerId: string): Promise<Session[]> {
    const nowMs = this.deps.clock.now().getTime();
    const sessions = await this.deps.sessions.listSessionsForPlayer(playerId);
    return sessions.filter((session) =>
      isStaleSession(session, nowMs, this.deps.settings.staleSessionHours),
    );
  }

  async startSession(sessionId: string, buyIn: number): SessionResult<SessionMutation> {
    return this.mutate(
      sessionId,
      { operation: 'startSession', transition: 'start' },
      (session, now) => fromPlan(planSessionStart(session, buyIn, now)),
    );
  }

  async pauseSession(sessionId: string): SessionResult<SessionMutation> {
    return this.mutate(
      sessionId,
      { operation: 'pauseSession', transition: 'pause' },
      (session, now) => fromPlan(planSessionPause(session, now)),
    );
  }

  /** Resumes a paused session, or cancels a cash-out that was begun. */
  async resumeSession(sessionId: string): SessionResult<SessionMutation> {
    return this.mutate(
      sessionId,
      { operation: 'resumeSession', transition: 'resume' },
      (session, now) => fromPlan(planSessionResume(session, now)),
    );
  }

  async beginEnding(sessionId: string): SessionResult<SessionMutation> {
    return this.mutate(
      sessionId,
      { operation: 'beginEnding', transition: 'begin_ending' },
      (session, now) => fromPlan(planSessionBeginEnding(session, now)),
    );
  }

  async finalizeSession(sessionId: string, cashout: number): SessionResult<SessionMutation> {
    const result = await this.mutate(
      sessionId,
      {
        operation: 'finalizeSession',
        transition: 'finalize',
        trigger: 'FINALIZE',
        events: completionEvent,
      },
      (session, now) => fromPlan(planSessionFinalize(session, cashout, now)),
    );

    if (result.ok) {
      const { session } = result.value;
      this.deps.logger.info(
        { sessionId, playerId: session.playerId, totalBuyIn: session.totalBuyIn, cashout },
        'session.completed',
      );
    }
    return result;
  }

  async appendChipUpdate(
    sessionId: string,
    request: ChipUpdateRequest,
  ): SessionResult<ChipUpdateMutation> {
    const note = this.normalizeNote(request.note);
    if (!note.ok) {
      return note;
    }
    const updateId = request.updateId ?? this.deps.ids.randomUUID();

    const result = await this.mutate(
      sessionId,
      { operation: 'appendChipUpdate', trigger: 'CHIP_UPDATE' },
      (session, now) => {
        const appended = appendChipUpdate(session, {
          updateId,
          amount: request.amount,
          note: note.value,
          timestamp: (request.timestamp ?? now).toISOString(),
        });
        return appended.ok ? ok(appended.value.session) : appended;
      },
    );
    return result.ok ? ok({ ...result.value, updateId }) : result;
  }

  async appendRebuy(sessionId: string, request: RebuyRequest): SessionResult<ChipUpdateMutation> {
    const updateId = request.updateId ?? this.deps.ids.randomUUID();

    const result = await this.mutate(
      sessionId,
      { operation: 'appendRebuy', trigger: 'REBUY' },
      (session, now) => {
        const appended = appendRebuy(session, {
          updateId,
          amount: request.amount,
          timestamp: (request.timestamp ?? now).toISOString(),
        });
        return appended.ok ? ok(appended.value.session) : appended;
      },
    );
    return result.ok ? ok({ ...result.value, updateId }) : result;
  }

  /** Rebuys a tournament at its original entry price. */
  async addTournamentRebuy(
    sessionId: string,
    request: Omit<RebuyRequest, 'amount'> = {},
  ): SessionResult<ChipUpdateMutation> {
    const updateId = request.updateId ?? this.deps.ids.randomUUID();

    const result = await this.mutate(
      sessionId,
      { operation: 'addTournamentRebuy', trigger: 'REBUY' },
      (session, now) => {
        if (session.gameType !== 'TOURNAMENT') {
          return err('INVALID_TRANSITION');
        }
        const appended = appendRebuy(session, {
          updateId,
          amount: session.initialBuyIn,
          timestamp: (request.timestamp ?? now).toISOString(),
        });
        return appended.ok ? ok(appended.value.session) : appended;
      },
    );
    return result.ok ? ok({ ...result.value, updateId }) : result;
  }

  async adjustStack(
    sessionId: string,
    request: AdjustmentRequest,
  ): SessionResult<ChipUpdateMutation> {
    const note = this.normalizeNote(request.note);
    if (!note.ok) {
      return note;
    }
    const updateId = request.updateId ?? this.deps.ids.randomUUID();

    const result = await this.mutate(
      sessionId,
      { operation: 'adjustStack', trigger: 'CHIP_UPDATE' },
      (session, now) => {
        const appended = appendAdjustment(session, {
          updateId,
          delta: request.delta,
          note: note.value,
          timestamp: (request.timestamp ?? now).toISOString(),
        });
        return appended.ok ? ok(appended.value.session) : appended;
      },
    );
    return result.ok ? ok({ ...result.value, updateId }) : result;
  }

  /** Sets the cumulative buy-in, live or after completion. */
  async editBuyIn(sessionId: string, totalBuyIn: number): SessionResult<SessionMutation> {
    return this.mutate(
      sessionId,
      { operation: 'editBuyIn', trigger: 'BUY_IN_EDIT' },
      (session) => fromPlan(planBuyInEdit(session, totalBuyIn)),
    );
  }

  async editCashout(sessionId: string, cashout: number): SessionResult<SessionMutation> {
    return this.mutate(
      sessionId,
      { operation: 'editCashout', trigger: 'CASHOUT_EDIT' },
      (session) => fromPlan(planCashoutEdit(session, cashout)),
    );
  }

  async addNote(sessionId: string, text: string): SessionResult<SessionMutation> {
    const note = this.requireNote(text);
    if (!note.ok) {
      return note;
    }
    return this.mutate(sessionId, { operation: 'addNote' }, (session) =>
      ok({ ...session, notes: [...session.notes, note.value] }),
    );
  }

  async updateNote(sessionId: string, index: number, text: string): SessionResult<SessionMutation> {
    const note = this.requireNote(text);
    if (!note.ok) {
      return note;
    }
    return this.mutate(sessionId, { operation: 'updateNote' }, (session) => {
      if (!Number.isInteger(index) || index < 0 || index >= session.notes.length) {
        return err('INVALID_NOTE');
      }
      const notes = session.notes.map((existing, i) => (i === index ? note.value : existing));
      return ok({ ...session, notes });
    });
  }

  /**
   * Deletes a session and cancels its open stakes in one commit. Refused while any stake is
   * settled, since that record has already been reconciled between the parties.
   */
  async deleteSession(sessionId: string): SessionResult<SessionDeletion> {
    return this.deps.lock.withLock(sessionId, async (): SessionResult<SessionDeletion> => {
      const session = await this.deps.sessions.getSession(sessionId);
      if (!session) {
        return err('SESSION_NOT_FOUND');
      }

      const stakes = await this.deps.stakes.listStakesForSession(sessionId);
      if (stakes.some((stake) => stake.status === 'SETTLED')) {
        return err('SESSION_HAS_SETTLED_STAKES');
      }

      const nowIso = this.deps.clock.now().toISOString();
      const cancelled: Array<{ previous: StakeContract; next: StakeContract }> = [];
      for (const stake of stakes) {
        const plan = planStakeCancel(stake, nowIso, session.playerId);
        if (plan.type === 'apply') {
          cancelled.push({ previous: stake, next: plan.stake });
        }
      }

      const committed = await commitLedgerChange(this.deps, {
        operation: 'deleteSession',
        sessionId,
        session: { type: 'delete', previous: session },
        stakes: cancelled,
      });
      if (!committed.ok) {
        return committed;
      }

      cancelled.forEach(() => this.deps.metrics.recordStakeTransition('cancel'));
      this.deps.logger.info({ sessionId, cancelledStakes: cancelled.length }, 'session.deleted');
      return ok({ sessionId, cancelledStakes: cancelled.map(({ next }) => next) });
    });
  }
}

// =============================================================================
// Factory function
// =============================================================================

export function createSessionService(
  overrides: Partial<LedgerServiceDependencies> = {},
): SessionService {
  return new SessionService(createLedgerDependencies(overrides));
}
