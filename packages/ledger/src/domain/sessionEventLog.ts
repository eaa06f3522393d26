import { err, ok, type Result } from '@stakebook/shared';
import type { ChipStackUpdate, ChipUpdateSource, Session } from './types';
import { currentStack } from './liveSessionAccumulator';

export type EventLogErrorCode =
  | 'INVALID_AMOUNT'
  | 'DUPLICATE_EVENT'
  | 'UNINITIALIZED_SESSION'
  | 'INVALID_TRANSITION';

export type AppendedUpdate = {
  session: Session;
  update: ChipStackUpdate;
};

export type ChipUpdateInput = {
  updateId: string;
  amount: number;
  note: string | null;
  timestamp: string;
};

export type RebuyInput = {
  updateId: string;
  amount: number;
  timestamp: string;
};

export type AdjustmentInput = {
  updateId: string;
  delta: number;
  note: string | null;
  timestamp: string;
};

function checkLive(session: Session): EventLogErrorCode | null {
  if (session.mode === 'SETUP') {
    return 'UNINITIALIZED_SESSION';
  }
  if (session.mode !== 'ACTIVE' && session.mode !== 'PAUSED') {
    return 'INVALID_TRANSITION';
  }
  return null;
}

/**
 * Rebuys and adjustments are built from the newest snapshot, so they may not be
 * backdated behind it.
 */
function precedesNewest(session: Session, timestamp: string): boolean {
  const newest = session.chipUpdates[session.chipUpdates.length - 1];
  return newest !== undefined && Date.parse(timestamp) < Date.parse(newest.timestamp);
}

/** Inserts after every update with the same or an earlier timestamp. */
function insertInOrder(updates: ChipStackUpdate[], update: ChipStackUpdate): ChipStackUpdate[] {
  const at = Date.parse(update.timestamp);
  const index = updates.findIndex((existing) => Date.parse(existing.timestamp) > at);
  if (index === -1) {
    return [...updates, update];
  }
  return [...updates.slice(0, index), update, ...updates.slice(index)];
}

function append(
  session: Session,
  input: { updateId: string; amount: number; note: string | null; timestamp: string },
  source: ChipUpdateSource,
  buyInIncrease: number,
): Result<AppendedUpdate, EventLogErrorCode> {
  if (session.chipUpdates.some((existing) => existing.updateId === input.updateId)) {
    return err('DUPLICATE_EVENT');
  }

  const update: ChipStackUpdate = {
    updateId: input.updateId,
    amount: input.amount,
    note: input.note,
    timestamp: input.timestamp,
    source,
  };

  return ok({
    update,
    session: {
      ...session,
      totalBuyIn: session.totalBuyIn + buyInIncrease,
      rebuyCount: source === 'REBUY' ? session.rebuyCount + 1 : session.rebuyCount,
      chipUpdates: insertInOrder(session.chipUpdates, update),
    },
  });
}

export function appendChipUpdate(
  session: Session,
  input: ChipUpdateInput,
): Result<AppendedUpdate, EventLogErrorCode> {
  if (!Number.isFinite(input.amount) || input.amount < 0) {
    return err('INVALID_AMOUNT');
  }
  const blocked = checkLive(session);
  if (blocked) {
    return err(blocked);
  }
  return append(session, input, 'MANUAL', 0);
}

/**
 * A rebuy raises the total buy-in and appends a snapshot of `currentStack + amount`
 * in the same step, so profit is unchanged at the moment of the rebuy.
 */
export function appendRebuy(
  session: Session,
  input: RebuyInput,
): Result<AppendedUpdate, EventLogErrorCode> {
  if (!Number.isFinite(input.amount) || input.amount <= 0) {
    return err('INVALID_AMOUNT');
  }
  const blocked = checkLive(session);
  if (blocked) {
    return err(blocked);
  }
  if (precedesNewest(session, input.timestamp)) {
    return err('INVALID_TRANSITION');
  }
  const stack = currentStack(session);
  if (!stack.ok) {
    return stack;
  }

  return append(
    session,
    {
      updateId: input.updateId,
      amount: stack.value + input.amount,
      note: null,
      timestamp: input.timestamp,
    },
    'REBUY',
    input.amount,
  );
}

/** Quick +/- stack adjustment, recorded as an absolute snapshot. */
export function appendAdjustment(
  session: Session,
  input: AdjustmentInput,
): Result<AppendedUpdate, EventLogErrorCode> {
  if (!Number.isFinite(input.delta) || input.delta === 0) {
    return err('INVALID_AMOUNT');
  }
  const blocked = checkLive(session);
  if (blocked) {
    return err(blocked);
  }
  if (precedesNewest(session, input.timestamp)) {
    return err('INVALID_TRANSITION');
  }
  const stack = currentStack(session);
  if (!stack.ok) {
    return stack;
  }
  const amount = stack.value + input.delta;
  if (amount < 0) {
    return err('INVALID_AMOUNT');
  }

  return append(
    session,
    { updateId: input.updateId, amount, note: input.note, timestamp: input.timestamp },
    'ADJUSTMENT',
    0,
  );
}
