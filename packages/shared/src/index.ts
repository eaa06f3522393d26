export * from './config';
export { ensureError } from './errors/ensureError';
export { createKeyedLock, type KeyedLock } from './locking/keyedLock';
export { createPinoLogger, type CreatePinoLoggerOptions } from './observability/pinoLogger';
export {
  createSubject,
  type Observer,
  type Subject,
  type SubjectOptions,
  type Unsubscribe,
} from './observer';
export { err, ok, type Err, type Ok, type Result } from './result';
