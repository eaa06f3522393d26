import { Counter, Registry } from 'prom-client';
import type { RecomputeTrigger } from '../domain/types';

export type LedgerMetrics = {
  recordSessionTransition(transition: string): void;
  recordStakeTransition(transition: string): void;
  recordRecomputation(trigger: RecomputeTrigger, count: number): void;
  recordRollback(): void;
};

export function createLedgerMetrics(registry: Registry): LedgerMetrics {
  const sessionTransitions = new Counter({
    name: 'stakebook_session_transitions_total',
    help: 'Session lifecycle transitions committed.',
    labelNames: ['transition'],
    registers: [registry],
  });

  const stakeTransitions = new Counter({
    name: 'stakebook_stake_transitions_total',
    help: 'Stake status transitions committed.',
    labelNames: ['transition'],
    registers: [registry],
  });

  const recomputations = new Counter({
    name: 'stakebook_settlement_recomputations_total',
    help: 'Stake settlement amounts recomputed after a change to session facts or terms.',
    labelNames: ['trigger'],
    registers: [registry],
  });

  const rollbacks = new Counter({
    name: 'stakebook_ledger_rollbacks_total',
    help: 'Ledger commits rolled back after a persistence failure.',
    registers: [registry],
  });

  return {
    recordSessionTransition: (transition) => sessionTransitions.inc({ transition }),
    recordStakeTransition: (transition) => stakeTransitions.inc({ transition }),
    recordRecomputation: (trigger, count) => {
      if (count > 0) {
        recomputations.inc({ trigger }, count);
      }
    },
    recordRollback: () => rollbacks.inc(),
  };
}

const registry = new Registry();

export const metrics: LedgerMetrics = createLedgerMetrics(registry);

export function getMetricsRegistry(): Registry {
  return registry;
}

export async function renderMetrics(): Promise<string> {
  return registry.metrics();
}
