export { createLedger, type CreateLedgerOptions, type Ledger } from './ledger';
export { getConfig, loadConfig, resetConfigForTests, type Config } from './config';
export {
  LEDGER_ERROR_CODES,
  LOOKUP_ERROR_CODES,
  STATE_ERROR_CODES,
  VALIDATION_ERROR_CODES,
  isValidationError,
  type LedgerErrorCode,
  type LookupErrorCode,
  type PersistenceErrorCode,
  type StateErrorCode,
  type ValidationErrorCode,
} from './domain/errors';
export type * from './domain/types';
export {
  currentProfit,
  currentStack,
  elapsedActiveSeconds,
  isStaleSession,
  liveSnapshot,
  stackSeries,
  totalBuyIn,
} from './domain/liveSessionAccumulator';
export {
  calculateSettlementAmount,
  describeSettlement,
  validateStakeTerms,
  type StakeTerms,
} from './domain/settlement';
export { isOffAppStaker, type StakerSelection } from './domain/stakerRef';
export { summarizeStakerPerformance } from './domain/stakingSummary';
export {
  createLedgerMetrics,
  getMetricsRegistry,
  type LedgerMetrics,
} from './observability/metrics';
export {
  ManualStakerService,
  createManualStakerService,
  type ManualStakerInput,
  type ManualStakerPatch,
} from './services/manualStakerService';
export {
  SessionService,
  createSessionService,
  type AdjustmentRequest,
  type ChipUpdateMutation,
  type ChipUpdateRequest,
  type CreateSessionInput,
  type RebuyRequest,
  type SessionDeletion,
  type SessionMutation,
  type StaleSettlement,
} from './services/sessionService';
export {
  StakeService,
  createStakeService,
  type AddStakeInput,
  type AddStakeOptions,
} from './services/stakeService';
export type { StakerDirectory } from './services/stakerDirectory';
export { createInMemoryRepositories } from './storage/inMemoryRepositories';
export { createRedisRepositories, type RedisRepositoryOptions } from './storage/redisRepositories';
export type { RedisCommands } from './storage/redisClient';
export type {
  LedgerRepositories,
  ManualStakerRepository,
  SessionRepository,
  StakeRepository,
} from './storage/types';
