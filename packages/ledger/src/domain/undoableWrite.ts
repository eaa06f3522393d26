import { err, ok, type Result } from '@stakebook/shared';

/** One persisted write together with the write that reverses it. */
export type UndoableWrite<E> = {
  id: string;
  apply(): Promise<Result<void, E>>;
  revert(): Promise<Result<void, E>>;
};

export type UnrevertedWrite = {
  id: string;
  cause: unknown;
};

export type WriteFailure<E> = {
  error: E;
  failedWrite: string;
  /** Writes still applied because their revert failed as well; empty after a clean rollback. */
  unreverted: UnrevertedWrite[];
};

async function revertNewestFirst<E>(
  applied: readonly UndoableWrite<E>[],
): Promise<UnrevertedWrite[]> {
  const unreverted: UnrevertedWrite[] = [];

  for (const write of [...applied].reverse()) {
    try {
      const result = await write.revert();
      if (!result.ok) {
        unreverted.push({ id: write.id, cause: result.error });
      }
    } catch (error) {
      unreverted.push({ id: write.id, cause: error });
    }
  }

  return unreverted;
}

/**
 * Applies writes in order. The first failure reverts everything already applied, newest first.
 * A write that throws is reverted around as well and the error is rethrown.
 */
export async function applyAllOrRevert<E>(
  writes: readonly UndoableWrite<E>[],
): Promise<Result<void, WriteFailure<E>>> {
  const applied: UndoableWrite<E>[] = [];

  for (const write of writes) {
    let result: Result<void, E>;
    try {
      result = await write.apply();
    } catch (error) {
      await revertNewestFirst(applied);
      throw error;
    }

    if (!result.ok) {
      const unreverted = await revertNewestFirst(applied);
      return err({ error: result.error, failedWrite: write.id, unreverted });
    }
    applied.push(write);
  }

  return ok(undefined);
}
