export type GameType = 'CASH_GAME' | 'TOURNAMENT';

export type SessionMode = 'SETUP' | 'ACTIVE' | 'PAUSED' | 'ENDING' | 'COMPLETED';

export type ChipUpdateSource = 'MANUAL' | 'ADJUSTMENT' | 'REBUY';

/**
 * A chip-stack snapshot. `amount` is the absolute stack at `timestamp`, never a delta:
 * the newest snapshot alone is the current stack, so a corrected or backdated entry
 * cannot skew the running total.
 */
export interface ChipStackUpdate {
  updateId: string;
  amount: number;
  note: string | null;
  timestamp: string;
  source: ChipUpdateSource;
}

export interface Session {
  sessionId: string;
  playerId: string;
  gameType: GameType;
  gameName: string;
  stakes: string;
  mode: SessionMode;
  /** Buy-in recorded at start; the tournament rebuy amount. */
  initialBuyIn: number;
  /** Cumulative buy-in including rebuys and corrections. Authoritative for profit. */
  totalBuyIn: number;
  rebuyCount: number;
  cashout: number | null;
  chipUpdates: ChipStackUpdate[];
  notes: string[];
  /** Active seconds banked up to the last pause; the running stretch is added on read. */
  elapsedSeconds: number;
  lastActiveAt: string | null;
  lastPausedAt: string | null;
  startedAt: string | null;
  endedAt: string | null;
  createdAt: string;
  updatedAt: string;
  version: number;
}

export type StakerRef =
  | { kind: 'APP_USER'; userId: string }
  | { kind: 'MANUAL'; profileId: string; displayNameFallback: string };

export type StakeStatus = 'PROPOSED' | 'AWAITING_SETTLEMENT' | 'SETTLED' | 'CANCELLED';

export interface StakeContract {
  stakeId: string;
  sessionId: string;
  staker: StakerRef;
  stakedPlayerId: string;
  /** Share of the player's action sold, in (0, 1]. */
  percentage: number;
  /** Premium multiplier paid by the staker, >= 1. */
  markup: number;
  /** Session buy-in and cashout the settlement amount was last computed from. */
  sessionBuyIn: number;
  sessionCashout: number;
  /** Negative: player owes staker. Positive: staker owes player. */
  settlementAmount: number;
  status: StakeStatus;
  sessionGameName: string;
  sessionStakes: string;
  isTournament: boolean;
  proposedAt: string;
  acceptedAt: string | null;
  /**
   * Set while an app-user settlement waits for the other participant to confirm it.
   * Kept after settlement as the record of who asked for it.
   */
  settlementInitiatedByUserId: string | null;
  settlementInitiatedAt: string | null;
  settledAt: string | null;
  /** The confirming participant; for a manual staker, whoever marked it paid. */
  settledByUserId: string | null;
  reopenedAt: string | null;
  cancelledAt: string | null;
  lastUpdatedAt: string;
}

export interface ManualStakerProfile {
  profileId: string;
  ownerId: string;
  name: string;
  contactInfo: string | null;
  notes: string | null;
  createdAt: string;
  lastUpdatedAt: string;
}

export interface SettlementFacts {
  buyIn: number;
  cashout: number;
}

export interface LiveSnapshot {
  sessionId: string;
  mode: SessionMode;
  totalBuyIn: number;
  currentStack: number;
  currentProfit: number;
  elapsedActiveSeconds: number;
  rebuyCount: number;
}

export type StakeView = StakeContract & { stakerDisplayName: string };

export type SettlementPayer = 'PLAYER' | 'STAKER' | 'NONE';

export interface SettlementParties {
  payer: SettlementPayer;
  amount: number;
}

export interface StakerPerformance {
  stakeCount: number;
  totalStaked: number;
  totalProfit: number;
  roi: number;
  winRate: number;
}

export type RecomputeTrigger =
  | 'CHIP_UPDATE'
  | 'REBUY'
  | 'BUY_IN_EDIT'
  | 'CASHOUT_EDIT'
  | 'FINALIZE'
  | 'TERMS_UPDATE'
  | 'REOPEN';

export type LedgerEvent =
  | {
      type: 'session.completed';
      sessionId: string;
      playerId: string;
      totalBuyIn: number;
      cashout: number;
      profit: number;
      elapsedSeconds: number;
      completedAt: string;
    }
  | {
      type: 'stake.recomputed';
      stakeId: string;
      sessionId: string;
      trigger: RecomputeTrigger;
      previousAmount: number;
      settlementAmount: number;
    }
  | {
      type: 'stake.settlement_initiated';
      stakeId: string;
      sessionId: string;
      settlementAmount: number;
      initiatedByUserId: string;
    }
  | {
      type: 'stake.settled';
      stakeId: string;
      sessionId: string;
      settlementAmount: number;
      initiatedByUserId: string;
      settledByUserId: string;
    }
  | {
      type: 'stake.reopened';
      stakeId: string;
      sessionId: string;
      reopenedByUserId: string;
      reason: string;
    }
  | {
      type: 'stake.settlement_stale';
      stakeId: string;
      sessionId: string;
      settledAmount: number;
      currentAmount: number;
    };
