export type ValidationErrorCode =
  | 'INVALID_AMOUNT'
  | 'INVALID_PERCENTAGE'
  | 'INVALID_MARKUP'
  | 'MISSING_STAKER'
  | 'AMBIGUOUS_STAKER'
  | 'DUPLICATE_STAKE'
  | 'MISSING_GAME'
  | 'INVALID_NOTE'
  | 'MISSING_REOPEN_REASON'
  | 'INVALID_STAKER_NAME'
  | 'DUPLICATE_STAKER_PROFILE'
  | 'DUPLICATE_EVENT';

export const VALIDATION_ERROR_CODES = [
  'INVALID_AMOUNT',
  'INVALID_PERCENTAGE',
  'INVALID_MARKUP',
  'MISSING_STAKER',
  'AMBIGUOUS_STAKER',
  'DUPLICATE_STAKE',
  'MISSING_GAME',
  'INVALID_NOTE',
  'MISSING_REOPEN_REASON',
  'INVALID_STAKER_NAME',
  'DUPLICATE_STAKER_PROFILE',
  'DUPLICATE_EVENT',
] as const satisfies readonly ValidationErrorCode[];

export type StateErrorCode =
  | 'UNINITIALIZED_SESSION'
  | 'INVALID_TRANSITION'
  | 'STAKE_ALREADY_SETTLED'
  | 'STAKE_NOT_SETTLED'
  | 'SETTLEMENT_PENDING'
  | 'SETTLEMENT_NOT_INITIATED'
  | 'SETTLEMENT_NEEDS_COUNTERPARTY'
  | 'SESSION_HAS_SETTLED_STAKES';

export const STATE_ERROR_CODES = [
  'UNINITIALIZED_SESSION',
  'INVALID_TRANSITION',
  'STAKE_ALREADY_SETTLED',
  'STAKE_NOT_SETTLED',
  'SETTLEMENT_PENDING',
  'SETTLEMENT_NOT_INITIATED',
  'SETTLEMENT_NEEDS_COUNTERPARTY',
  'SESSION_HAS_SETTLED_STAKES',
] as const satisfies readonly StateErrorCode[];

export type LookupErrorCode =
  | 'SESSION_NOT_FOUND'
  | 'STAKE_NOT_FOUND'
  | 'STAKER_PROFILE_NOT_FOUND'
  | 'FORBIDDEN';

export const LOOKUP_ERROR_CODES = [
  'SESSION_NOT_FOUND',
  'STAKE_NOT_FOUND',
  'STAKER_PROFILE_NOT_FOUND',
  'FORBIDDEN',
] as const satisfies readonly LookupErrorCode[];

export type PersistenceErrorCode = 'PERSIST_FAILED';

export type LedgerErrorCode =
  | ValidationErrorCode
  | StateErrorCode
  | LookupErrorCode
  | PersistenceErrorCode;

export const LEDGER_ERROR_CODES = [
  ...VALIDATION_ERROR_CODES,
  ...STATE_ERROR_CODES,
  ...LOOKUP_ERROR_CODES,
  'PERSIST_FAILED',
] as const satisfies readonly LedgerErrorCode[];

const VALIDATION_ERROR_CODE_SET: ReadonlySet<string> = new Set(VALIDATION_ERROR_CODES);

export function isValidationError(code: LedgerErrorCode): code is ValidationErrorCode {
  return VALIDATION_ERROR_CODE_SET.has(code);
}
