import { err, ok, type Result } from '@stakebook/shared';
import { applyAllOrRevert, type UndoableWrite } from '../domain/undoableWrite';
import type { Session, StakeContract } from '../domain/types';
import type { LedgerServiceDependencies } from './dependencies';

type CommitError = 'PERSIST_FAILED';
type CommitWrite = UndoableWrite<CommitError>;

export type SessionWrite =
  | { type: 'save'; previous: Session | null; next: Session }
  | { type: 'delete'; previous: Session };

export type StakeWrite = { previous: StakeContract | null; next: StakeContract };

/** One atomic unit: the writes land together or not at all. */
export type LedgerChange = {
  operation: string;
  sessionId: string;
  session?: SessionWrite;
  stakes?: StakeWrite[];
};

type CommitDeps = Pick<LedgerServiceDependencies, 'sessions' | 'stakes' | 'logger' | 'metrics'>;

function guarded(
  deps: CommitDeps,
  change: LedgerChange,
  id: string,
  apply: () => Promise<void>,
  revert: () => Promise<void>,
): CommitWrite {
  const run = async (phase: 'apply' | 'revert', work: () => Promise<void>) => {
    try {
      await work();
      return ok(undefined);
    } catch (error) {
      deps.logger.error(
        {
          err: error,
          write: id,
          phase,
          operation: change.operation,
          sessionId: change.sessionId,
        },
        'ledger.persist.failed',
      );
      return err<CommitError>('PERSIST_FAILED');
    }
  };

  return {
    id,
    apply: () => run('apply', apply),
    revert: () => run('revert', revert),
  };
}

function stakeWrite(deps: CommitDeps, change: LedgerChange, write: StakeWrite): CommitWrite {
  const { previous, next } = write;
  return guarded(
    deps,
    change,
    `stake:${next.stakeId}`,
    () => deps.stakes.saveStake(next),
    () => (previous ? deps.stakes.saveStake(previous) : deps.stakes.deleteStake(next.stakeId)),
  );
}

function sessionWrite(
  deps: CommitDeps,
  change: LedgerChange,
  write: SessionWrite,
): CommitWrite {
  if (write.type === 'delete') {
    const { previous } = write;
    return guarded(
      deps,
      change,
      `session:${previous.sessionId}`,
      () => deps.sessions.deleteSession(previous.sessionId),
      () => deps.sessions.saveSession(previous),
    );
  }

  const { previous, next } = write;
  return guarded(
    deps,
    change,
    `session:${next.sessionId}`,
    () => deps.sessions.saveSession(next),
    () =>
      previous ? deps.sessions.saveSession(previous) : deps.sessions.deleteSession(next.sessionId),
  );
}

/**
 * Persists a change. A deleted session goes last so its stakes are never left pointing at
 * nothing; a saved session goes first so recomputed stakes never reference facts that did not
 * persist.
 */
export async function commitLedgerChange(
  deps: CommitDeps,
  change: LedgerChange,
): Promise<Result<void, CommitError>> {
  const stakeWrites = (change.stakes ?? []).map((write) => stakeWrite(deps, change, write));
  const writes: CommitWrite[] = [];

  if (change.session?.type === 'save') {
    writes.push(sessionWrite(deps, change, change.session), ...stakeWrites);
  } else if (change.session?.type === 'delete') {
    writes.push(...stakeWrites, sessionWrite(deps, change, change.session));
  } else {
    writes.push(...stakeWrites);
  }

  const result = await applyAllOrRevert(writes);
  if (result.ok) {
    return ok(undefined);
  }

  const { error, failedWrite, unreverted } = result.error;
  const context = { operation: change.operation, sessionId: change.sessionId, failedWrite };
  deps.metrics.recordRollback();
  if (unreverted.length > 0) {
    deps.logger.error(
      { ...context, unreverted: unreverted.map(({ id }) => id) },
      'ledger.rollback.incomplete',
    );
  } else {
    deps.logger.warn(context, 'ledger.commit.rolled_back');
  }
  return err(error);
}
