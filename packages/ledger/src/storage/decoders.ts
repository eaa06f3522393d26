import type {
  ChipStackUpdate,
  GameType,
  ManualStakerProfile,
  Session,
  SessionMode,
  StakeContract,
  StakeStatus,
  StakerRef,
} from '../domain/types';
import { isRecord, readBoolean, readNumber, readOneOf, readString } from '../utils/guards';

const GAME_TYPES: readonly GameType[] = ['CASH_GAME', 'TOURNAMENT'];
const SESSION_MODES: readonly SessionMode[] = ['SETUP', 'ACTIVE', 'PAUSED', 'ENDING', 'COMPLETED'];
const STAKE_STATUSES: readonly StakeStatus[] = [
  'PROPOSED',
  'AWAITING_SETTLEMENT',
  'SETTLED',
  'CANCELLED',
];
const UPDATE_SOURCES = ['MANUAL', 'ADJUSTMENT', 'REBUY'] as const;

function decodeChipUpdate(value: unknown): ChipStackUpdate | null {
  if (!isRecord(value)) {
    return null;
  }
  const updateId = readString(value, 'updateId');
  const amount = readNumber(value, 'amount');
  const timestamp = readString(value, 'timestamp');
  const source = readOneOf(value, 'source', UPDATE_SOURCES);
  if (!updateId || amount === null || !timestamp || !source) {
    return null;
  }
  return { updateId, amount, note: readString(value, 'note'), timestamp, source };
}

function decodeList<T>(value: unknown, decode: (item: unknown) => T | null): T[] | null {
  if (!Array.isArray(value)) {
    return null;
  }
  const items: T[] = [];
  for (const raw of value) {
    const item = decode(raw);
    if (item === null) {
      return null;
    }
    items.push(item);
  }
  return items;
}

const decodeNote = (value: unknown): string | null => (typeof value === 'string' ? value : null);

export function decodeSession(value: unknown): Session | null {
  if (!isRecord(value)) {
    return null;
  }

  const sessionId = readString(value, 'sessionId');
  const playerId = readString(value, 'playerId');
  const gameType = readOneOf(value, 'gameType', GAME_TYPES);
  const gameName = readString(value, 'gameName');
  const stakes = readString(value, 'stakes');
  const mode = readOneOf(value, 'mode', SESSION_MODES);
  const initialBuyIn = readNumber(value, 'initialBuyIn');
  const totalBuyIn = readNumber(value, 'totalBuyIn');
  const rebuyCount = readNumber(value, 'rebuyCount');
  const elapsedSeconds = readNumber(value, 'elapsedSeconds');
  const createdAt = readString(value, 'createdAt');
  const updatedAt = readString(value, 'updatedAt');
  const version = readNumber(value, 'version');
  const chipUpdates = decodeList(value.chipUpdates, decodeChipUpdate);
  const notes = decodeList(value.notes, decodeNote);

  if (
    !sessionId ||
    !playerId ||
    !gameType ||
    gameName === null ||
    stakes === null ||
    !mode ||
    initialBuyIn === null ||
    totalBuyIn === null ||
    rebuyCount === null ||
    elapsedSeconds === null ||
    !createdAt ||
    !updatedAt ||
    version === null ||
    !chipUpdates ||
    !notes
  ) {
    return null;
  }

  return {
    sessionId,
    playerId,
    gameType,
    gameName,
    stakes,
    mode,
    initialBuyIn,
    totalBuyIn,
    rebuyCount,
    cashout: readNumber(value, 'cashout'),
    chipUpdates,
    notes,
    elapsedSeconds,
    lastActiveAt: readString(value, 'lastActiveAt'),
    lastPausedAt: readString(value, 'lastPausedAt'),
    startedAt: readString(value, 'startedAt'),
    endedAt: readString(value, 'endedAt'),
    createdAt,
    updatedAt,
    version,
  };
}

function decodeStakerRef(value: unknown): StakerRef | null {
  if (!isRecord(value)) {
    return null;
  }
  if (value.kind === 'APP_USER') {
    const userId = readString(value, 'userId');
    return userId ? { kind: 'APP_USER', userId } : null;
  }
  if (value.kind === 'MANUAL') {
    const profileId = readString(value, 'profileId');
    const displayNameFallback = readString(value, 'displayNameFallback');
    return profileId && displayNameFallback !== null
      ? { kind: 'MANUAL', profileId, displayNameFallback }
      : null;
  }
  return null;
}

export function decodeStake(value: unknown): StakeContract | null {
  if (!isRecord(value)) {
    return null;
  }

  const stakeId = readString(value, 'stakeId');
  const sessionId = readString(value, 'sessionId');
  const staker = decodeStakerRef(value.staker);
  const stakedPlayerId = readString(value, 'stakedPlayerId');
  const percentage = readNumber(value, 'percentage');
  const markup = readNumber(value, 'markup');
  const sessionBuyIn = readNumber(value, 'sessionBuyIn');
  const sessionCashout = readNumber(value, 'sessionCashout');
  const settlementAmount = readNumber(value, 'settlementAmount');
  const status = readOneOf(value, 'status', STAKE_STATUSES);
  const sessionGameName = readString(value, 'sessionGameName');
  const sessionStakes = readString(value, 'sessionStakes');
  const isTournament = readBoolean(value, 'isTournament');
  const proposedAt = readString(value, 'proposedAt');
  const lastUpdatedAt = readString(value, 'lastUpdatedAt');

  if (
    !stakeId ||
    !sessionId ||
    !staker ||
    !stakedPlayerId ||
    percentage === null ||
    markup === null ||
    sessionBuyIn === null ||
    sessionCashout === null ||
    settlementAmount === null ||
    !status ||
    sessionGameName === null ||
    sessionStakes === null ||
    isTournament === null ||
    !proposedAt ||
    !lastUpdatedAt
  ) {
    return null;
  }

  return {
    stakeId,
    sessionId,
    staker,
    stakedPlayerId,
    percentage,
    markup,
    sessionBuyIn,
    sessionCashout,
    settlementAmount,
    status,
    sessionGameName,
    sessionStakes,
    isTournament,
    proposedAt,
    acceptedAt: readString(value, 'acceptedAt'),
    settlementInitiatedByUserId: readString(value, 'settlementInitiatedByUserId'),
    settlementInitiatedAt: readString(value, 'settlementInitiatedAt'),
    settledAt: readString(value, 'settledAt'),
    settledByUserId: readString(value, 'settledByUserId'),
    reopenedAt: readString(value, 'reopenedAt'),
    cancelledAt: readString(value, 'cancelledAt'),
    lastUpdatedAt,
  };
}

export function decodeManualStakerProfile(value: unknown): ManualStakerProfile | null {
  if (!isRecord(value)) {
    return null;
  }

  const profileId = readString(value, 'profileId');
  const ownerId = readString(value, 'ownerId');
  const name = readString(value, 'name');
  const createdAt = readString(value, 'createdAt');
  const lastUpdatedAt = readString(value, 'lastUpdatedAt');
  if (!profileId || !ownerId || !name || !createdAt || !lastUpdatedAt) {
    return null;
  }

  // Older records stored contact info as a bare phone number.
  const rawContact = value.contactInfo;
  const contactInfo =
    typeof rawContact === 'number' && Number.isFinite(rawContact)
      ? String(Math.trunc(rawContact))
      : readString(value, 'contactInfo');

  return {
    profileId,
    ownerId,
    name,
    contactInfo,
    notes: readString(value, 'notes'),
    createdAt,
    lastUpdatedAt,
  };
}
