import type { RecomputationPlan } from '../domain/settlement';
import type { LedgerEvent, RecomputeTrigger } from '../domain/types';
import type { LedgerServiceDependencies } from './dependencies';

export function recomputationEvents(
  plan: RecomputationPlan,
  trigger: RecomputeTrigger,
): LedgerEvent[] {
  const recomputed = plan.updated.map(
    ({ previous, next }): LedgerEvent => ({
      type: 'stake.recomputed',
      stakeId: next.stakeId,
      sessionId: next.sessionId,
      trigger,
      previousAmount: previous.settlementAmount,
      settlementAmount: next.settlementAmount,
    }),
  );

  const stale = plan.staleSettled.map(
    ({ stake, currentAmount }): LedgerEvent => ({
      type: 'stake.settlement_stale',
      stakeId: stake.stakeId,
      sessionId: stake.sessionId,
      settledAmount: stake.settlementAmount,
      currentAmount,
    }),
  );

  return [...recomputed, ...stale];
}

/** Notifies in order; observer failures are reported by the subject and never reach the caller. */
export async function publishEvents(
  deps: Pick<LedgerServiceDependencies, 'events'>,
  events: readonly LedgerEvent[],
): Promise<void> {
  for (const event of events) {
    await deps.events.notify(event);
  }
}
