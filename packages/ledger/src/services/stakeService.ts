import { err, ok, type Result } from '@stakebook/shared';
import type { LedgerErrorCode } from '../domain/errors';
import { settlementFacts } from '../domain/liveSessionAccumulator';
import {
  applySettlementFacts,
  calculateSettlementAmount,
  hasCurrentFacts,
  validateStakeTerms,
  type StakeTerms,
} from '../domain/settlement';
import {
  initialStakeStatus,
  isUnresolved,
  planStakeAccept,
  planStakeCancel,
  planStakeConfirmSettlement,
  planStakeInitiateSettlement,
  planStakeReopen,
  planStakeTermsUpdate,
  type StakeTransitionPlan,
} from '../domain/stakeStateMachine';
import {
  isStakeParticipant,
  parseStakerSelection,
  sameStaker,
  type StakerSelection,
  type StakerSelectionResult,
} from '../domain/stakerRef';
import { summarizeStakerPerformance } from '../domain/stakingSummary';
import type {
  LedgerEvent,
  RecomputeTrigger,
  Session,
  StakeContract,
  StakerPerformance,
  StakerRef,
  StakeView,
} from '../domain/types';
import { createLedgerDependencies, type LedgerServiceDependencies } from './dependencies';
import { commitLedgerChange } from './ledgerCommit';
import { publishEvents } from './ledgerEvents';
import { createStakerNameResolver, type StakerNameResolver } from './stakerDirectory';

// =============================================================================
// Types
// =============================================================================

export type AddStakeInput = {
  sessionId: string;
  /** The session's player or the app-user staker proposing the deal. */
  actorId: string;
  staker: StakerSelection;
  percentage: number;
  markup: number;
};

export type AddStakeOptions = {
  /** Permit a second open stake for the same staker on one session (a deliberately split deal). */
  allowSplit?: boolean;
};

type StakeResult<T> = Promise<Result<T, LedgerErrorCode>>;

type SettlementStep = 'initiateSettlement' | 'confirmSettlement' | 'markSettled';

type StakeChange = {
  next: StakeContract;
  transition: string;
  trigger?: RecomputeTrigger;
  events: LedgerEvent[];
};

type StakeEdit = (
  stake: StakeContract,
  context: { session: Session | null; nowIso: string },
) => Result<StakeChange, LedgerErrorCode>;

function fromPlan(plan: StakeTransitionPlan): Result<StakeContract, LedgerErrorCode> {
  return plan.type === 'apply' ? ok(plan.stake) : err(plan.error);
}

function requireParticipant(stake: StakeContract, userId: string): Result<void, 'FORBIDDEN'> {
  return isStakeParticipant(stake, userId) ? ok(undefined) : err('FORBIDDEN');
}

function recomputedEvent(
  previous: StakeContract,
  next: StakeContract,
  trigger: RecomputeTrigger,
): LedgerEvent {
  return {
    type: 'stake.recomputed',
    stakeId: next.stakeId,
    sessionId: next.sessionId,
    trigger,
    previousAmount: previous.settlementAmount,
    settlementAmount: next.settlementAmount,
  };
}

function newestFirst(a: StakeContract, b: StakeContract): number {
  return b.proposedAt.localeCompare(a.proposedAt);
}

// =============================================================================
// StakeService class with dependency injection
// =============================================================================

export class StakeService {
  private readonly deps: LedgerServiceDependencies;
  private readonly names: StakerNameResolver;

  constructor(deps: LedgerServiceDependencies) {
    this.deps = deps;
    this.names = createStakerNameResolver({
      directory: deps.stakerDirectory,
      manualStakers: deps.manualStakers,
      logger: deps.logger,
      labels: {
        unresolvedAppStaker: deps.settings.unresolvedAppStakerLabel,
        unresolvedManualStaker: deps.settings.unresolvedManualStakerLabel,
      },
      timeoutMs: deps.settings.stakerNameTimeoutMs,
    });
  }

  private async toView(stake: StakeContract): Promise<StakeView> {
    return { ...stake, stakerDisplayName: await this.names.displayNameFor(stake.staker) };
  }

  private async toViews(stakes: StakeContract[]): Promise<StakeView[]> {
    return Promise.all(stakes.sort(newestFirst).map((stake) => this.toView(stake)));
  }

  private async resolveStaker(
    selection: StakerSelectionResult,
    session: Session,
  ): StakeResult<StakerRef> {
    if (selection.kind === 'APP_USER') {
      return ok(selection);
    }

    const profile = await this.deps.manualStakers.getProfile(selection.profileId);
    if (!profile) {
      return err('STAKER_PROFILE_NOT_FOUND');
    }
    if (profile.ownerId !== session.playerId) {
      return err('FORBIDDEN');
    }
    return ok({ kind: 'MANUAL', profileId: profile.profileId, displayNameFallback: profile.name });
  }

  /**
   * Runs a stake edit under its session's lock. The stake is read once to learn the session and
   * again inside the lock, so the edit always sees committed state.
   */
  private async mutate(
    stakeId: string,
    operation: string,
    edit: StakeEdit,
  ): StakeResult<StakeView> {
    const existing = await this.deps.stakes.getStake(stakeId);
    if (!existing) {
      return err('STAKE_NOT_FOUND');
    }

    const outcome = await this.deps.lock.withLock(
      existing.sessionId,
      async (): StakeResult<StakeChange> => {
        const current = await this.deps.stakes.getStake(stakeId);
        if (!current) {
          return err('STAKE_NOT_FOUND');
        }

        const session = await this.deps.sessions.getSession(current.sessionId);
        const nowIso = this.deps.clock.now().toISOString();
        const change = edit(current, { session, nowIso });
        if (!change.ok) {
          return change;
        }

        const committed = await commitLedgerChange(this.deps, {
          operation,
          sessionId: current.sessionId,
          stakes: [{ previous: current, next: change.value.next }],
        });
        if (!committed.ok) {
          return committed;
        }

        this.deps.metrics.recordStakeTransition(change.value.transition);
        if (change.value.trigger) {
          this.deps.metrics.recordRecomputation(change.value.trigger, 1);
        }
        return change;
      },
    );

    if (!outcome.ok) {
      return outcome;
    }
    await publishEvents(this.deps, outcome.value.events);
    return ok(await this.toView(outcome.value.next));
  }

  async addStake(input: AddStakeInput, options: AddStakeOptions = {}): StakeResult<StakeView> {
    const terms = validateStakeTerms({ percentage: input.percentage, markup: input.markup });
    if (!terms.ok) {
      return terms;
    }
    const selection = parseStakerSelection(input.staker);
    if (!selection.ok) {
      return selection;
    }

    const outcome = await this.deps.lock.withLock(
      input.sessionId,
      async (): StakeResult<StakeContract> => {
        const session = await this.deps.sessions.getSession(input.sessionId);
        if (!session) {
          return err('SESSION_NOT_FOUND');
        }
        const facts = settlementFacts(session);
        if (!facts.ok) {
          return facts;
        }

        const staker = await this.resolveStaker(selection.value, session);
        if (!staker.ok) {
          return staker;
        }
        const proposedByStaker =
          staker.value.kind === 'APP_USER' && staker.value.userId === input.actorId;
        if (input.actorId !== session.playerId && !proposedByStaker) {
          return err('FORBIDDEN');
        }

        const attached = await this.deps.stakes.listStakesForSession(session.sessionId);
        const duplicate = attached.some(
          (stake) => isUnresolved(stake.status) && sameStaker(stake.staker, staker.value),
        );
        if (duplicate && !options.allowSplit) {
          return err('DUPLICATE_STAKE');
        }

        const nowIso = this.deps.clock.now().toISOString();
        const status = initialStakeStatus(staker.value);
        const stake: StakeContract = {
          stakeId: this.deps.ids.randomUUID(),
          sessionId: session.sessionId,
          staker: staker.value,
          stakedPlayerId: session.playerId,
          percentage: terms.value.percentage,
          markup: terms.value.markup,
          sessionBuyIn: facts.value.buyIn,
          sessionCashout: facts.value.cashout,
          settlementAmount: calculateSettlementAmount(facts.value, terms.value),
          status,
          sessionGameName: session.gameName,
          sessionStakes: session.stakes,
          isTournament: session.gameType === 'TOURNAMENT',
          proposedAt: nowIso,
          acceptedAt: status === 'AWAITING_SETTLEMENT' ? nowIso : null,
          settlementInitiatedByUserId: null,
          settlementInitiatedAt: null,
          settledAt: null,
          settledByUserId: null,
          reopenedAt: null,
          cancelledAt: null,
          lastUpdatedAt: nowIso,
        };

        const committed = await commitLedgerChange(this.deps, {
          operation: 'addStake',
          sessionId: session.sessionId,
          stakes: [{ previous: null, next: stake }],
        });
        if (!committed.ok) {
          return committed;
        }

        this.deps.metrics.recordStakeTransition('propose');
        return ok(stake);
      },
    );

    return outcome.ok ? ok(await this.toView(outcome.value)) : outcome;
  }

  /** New terms for an unsettled stake, recomputed against the session's current facts. */
  async updateStake(stakeId: string, actorId: string, terms: StakeTerms): StakeResult<StakeView> {
    const validated = validateStakeTerms(terms);
    if (!validated.ok) {
      return validated;
    }

    return this.mutate(stakeId, 'updateStake', (stake, { session, nowIso }) => {
      const allowed = requireParticipant(stake, actorId);
      if (!allowed.ok) {
        return allowed;
      }
      const planned = fromPlan(planStakeTermsUpdate(stake, nowIso, actorId));
      if (!planned.ok) {
        return planned;
      }
      if (!session) {
        return err('SESSION_NOT_FOUND');
      }
      const facts = settlementFacts(session);
      if (!facts.ok) {
        return facts;
      }

      const withTerms = { ...planned.value, ...validated.value };
      const next = applySettlementFacts(withTerms, facts.value, nowIso);
      return ok({
        next,
        transition: 'update_terms',
        trigger: 'TERMS_UPDATE',
        events: [recomputedEvent(stake, next, 'TERMS_UPDATE')],
      });
    });
  }

  /** Only the app-user staker named on the proposal can accept it. */
  async acceptStake(stakeId: string, actorId: string): StakeResult<StakeView> {
    return this.mutate(stakeId, 'acceptStake', (stake, { nowIso }) => {
      if (stake.staker.kind !== 'APP_USER' || stake.staker.userId !== actorId) {
        return err('FORBIDDEN');
      }
      const planned = fromPlan(planStakeAccept(stake, nowIso, actorId));
      return planned.ok ? ok({ next: planned.value, transition: 'accept', events: [] }) : planned;
    });
  }

  /**
   * First half of an app-user settlement: the other participant still has to confirm it.
   * A manual stake is settled by this call alone.
   */
  async initiateSettlement(stakeId: string, byUserId: string): StakeResult<StakeView> {
    return this.settlementStep(stakeId, byUserId, 'initiateSettlement');
  }

  async confirmSettlement(stakeId: string, byUserId: string): StakeResult<StakeView> {
    return this.settlementStep(stakeId, byUserId, 'confirmSettlement');
  }

  /** Marks the stake paid: confirms a request pending from the other side, or starts one. */
  async markSettled(stakeId: string, byUserId: string): StakeResult<StakeView> {
    return this.settlementStep(stakeId, byUserId, 'markSettled');
  }

  private async settlementStep(
    stakeId: string,
    byUserId: string,
    operation: SettlementStep,
  ): StakeResult<StakeView> {
    return this.mutate(stakeId, operation, (stake, { nowIso }) => {
      const allowed = requireParticipant(stake, byUserId);
      if (!allowed.ok) {
        return allowed;
      }
      const confirming =
        operation === 'confirmSettlement' ||
        (operation === 'markSettled' && stake.settlementInitiatedByUserId !== null);
      const planned = fromPlan(
        confirming
          ? planStakeConfirmSettlement(stake, nowIso, byUserId)
          : planStakeInitiateSettlement(stake, nowIso, byUserId),
      );
      if (!planned.ok) {
        return planned;
      }

      const next = planned.value;
      const initiatedByUserId = next.settlementInitiatedByUserId ?? byUserId;
      const logged = {
        stakeId,
        sessionId: stake.sessionId,
        settlementAmount: stake.settlementAmount,
        byUserId,
      };

      if (next.status !== 'SETTLED') {
        this.deps.logger.info(logged, 'stake.settlement_initiated');
        return ok({
          next,
          transition: 'initiate_settlement',
          events: [
            {
              type: 'stake.settlement_initiated',
              stakeId,
              sessionId: stake.sessionId,
              settlementAmount: next.settlementAmount,
              initiatedByUserId,
            },
          ],
        });
      }

      this.deps.logger.info({ ...logged, initiatedByUserId }, 'stake.settled');
      return ok({
        next,
        transition: 'settle',
        events: [
          {
            type: 'stake.settled',
            stakeId,
            sessionId: stake.sessionId,
            settlementAmount: next.settlementAmount,
            initiatedByUserId,
            settledByUserId: byUserId,
          },
        ],
      });
    });
  }

  /**
   * The only way out of SETTLED. Back in AWAITING_SETTLEMENT the stake picks up whatever the
   * session's facts are now.
   */
  async reopenStake(stakeId: string, byUserId: string, reason: string): StakeResult<StakeView> {
    const trimmedReason = reason.trim();
    if (trimmedReason.length === 0) {
      return err('MISSING_REOPEN_REASON');
    }

    return this.mutate(stakeId, 'reopenStake', (stake, { session, nowIso }) => {
      const allowed = requireParticipant(stake, byUserId);
      if (!allowed.ok) {
        return allowed;
      }
      const planned = fromPlan(planStakeReopen(stake, nowIso, byUserId));
      if (!planned.ok) {
        return planned;
      }
      if (!session) {
        return err('SESSION_NOT_FOUND');
      }
      const facts = settlementFacts(session);
      if (!facts.ok) {
        return facts;
      }

      const events: LedgerEvent[] = [
        {
          type: 'stake.reopened',
          stakeId,
          sessionId: stake.sessionId,
          reopenedByUserId: byUserId,
          reason: trimmedReason,
        },
      ];
      const stale = !hasCurrentFacts(planned.value, facts.value);
      const next = stale ? applySettlementFacts(planned.value, facts.value, nowIso) : planned.value;
      if (stale) {
        events.push(recomputedEvent(stake, next, 'REOPEN'));
      }

      this.deps.logger.warn(
        {
          stakeId,
          sessionId: stake.sessionId,
          byUserId,
          reason: trimmedReason,
          settledAmount: stake.settlementAmount,
          settlementAmount: next.settlementAmount,
        },
        'stake.reopened',
      );
      return ok({
        next,
        transition: 'reopen',
        trigger: stale ? 'REOPEN' : undefined,
        events,
      });
    });
  }

  /** Withdraws a proposal or calls off an agreed stake before money changes hands. */
  async cancelStake(stakeId: string, actorId: string): StakeResult<StakeView> {
    return this.mutate(stakeId, 'cancelStake', (stake, { nowIso }) => {
      const allowed = requireParticipant(stake, actorId);
      if (!allowed.ok) {
        return allowed;
      }
      const planned = fromPlan(planStakeCancel(stake, nowIso, actorId));
      return planned.ok ? ok({ next: planned.value, transition: 'cancel', events: [] }) : planned;
    });
  }

  async getStake(stakeId: string): StakeResult<StakeView> {
    const stake = await this.deps.stakes.getStake(stakeId);
    return stake ? ok(await this.toView(stake)) : err('STAKE_NOT_FOUND');
  }

  async settlementAmount(stakeId: string): StakeResult<number> {
    const stake = await this.deps.stakes.getStake(stakeId);
    return stake ? ok(stake.settlementAmount) : err('STAKE_NOT_FOUND');
  }

  async listStakesForSession(sessionId: string): Promise<StakeView[]> {
    return this.toViews(await this.deps.stakes.listStakesForSession(sessionId));
  }

  /** Stakes the user backs or is backed on, newest proposal first. */
  async listStakesForUser(userId: string): Promise<StakeView[]> {
    const stakes = await this.deps.stakes.listStakesForUser(userId);
    const unique = new Map(stakes.map((stake) => [stake.stakeId, stake]));
    return this.toViews(Array.from(unique.values()));
  }

  async getStakerPerformance(userId: string): Promise<StakerPerformance> {
    const stakes = await this.deps.stakes.listStakesForUser(userId);
    return summarizeStakerPerformance(stakes, { kind: 'APP_USER', userId });
  }
}

// =============================================================================
// Factory function
// =============================================================================

export function createStakeService(
  overrides: Partial<LedgerServiceDependencies> = {},
): StakeService {
  return new StakeService(createLedgerDependencies(overrides));
}
