import { Registry } from 'prom-client';
import { describe, expect, it } from 'vitest';
import { createLedgerMetrics, renderMetrics } from '../../src/observability/metrics';

describe('ledger metrics', () => {
  it('counts transitions, recomputations and rollbacks', async () => {
    const registry = new Registry();
    const metrics = createLedgerMetrics(registry);

    metrics.recordSessionTransition('finalize');
    metrics.recordStakeTransition('settle');
    metrics.recordStakeTransition('settle');
    metrics.recordRecomputation('FINALIZE', 2);
    metrics.recordRecomputation('CHIP_UPDATE', 0);
    metrics.recordRollback();

    const lines = (await registry.metrics()).split('\n');
    expect(lines).toContain('stakebook_session_transitions_total{transition="finalize"} 1');
    expect(lines).toContain('stakebook_stake_transitions_total{transition="settle"} 2');
    expect(lines).toContain('stakebook_settlement_recomputations_total{trigger="FINALIZE"} 2');
    expect(lines).toContain('stakebook_ledger_rollbacks_total 1');
    expect(lines.some((line) => line.includes('trigger="CHIP_UPDATE"'))).toBe(false);
  });

  it('renders the default registry', async () => {
    const output = await renderMetrics();

    expect(output).toContain('# TYPE stakebook_ledger_rollbacks_total counter');
  });
});
