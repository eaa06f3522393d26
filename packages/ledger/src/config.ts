import dotenv from 'dotenv';
import { createConfigAccessors, createConfigBuilder } from '@stakebook/shared';

export interface Config {
  logLevel: string;
  redisUrl: string | null;
  redisKeyPrefix: string;
  staleSessionHours: number;
  unresolvedAppStakerLabel: string;
  unresolvedManualStakerLabel: string;
  maxNoteLength: number;
  stakerNameTimeoutMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  dotenv.config();

  const config: Config = createConfigBuilder(env)
    .string('logLevel', 'LOG_LEVEL', 'info')
    .nullableString('redisUrl', 'REDIS_URL')
    .string('redisKeyPrefix', 'REDIS_KEY_PREFIX', 'stakebook')
    .int('staleSessionHours', 'STALE_SESSION_HOURS', 24, { min: 1 })
    .string('unresolvedAppStakerLabel', 'UNRESOLVED_APP_STAKER_LABEL', 'Loading...')
    .string('unresolvedManualStakerLabel', 'UNRESOLVED_MANUAL_STAKER_LABEL', 'Manual Staker')
    .int('maxNoteLength', 'MAX_NOTE_LENGTH', 500, { min: 1 })
    .int('stakerNameTimeoutMs', 'STAKER_NAME_TIMEOUT_MS', 2000, { min: 0 })
    .build();

  return config;
}

const configAccessors = createConfigAccessors(() => loadConfig());

export function getConfig(): Config {
  return configAccessors.getConfig();
}

export function resetConfigForTests(): void {
  configAccessors.resetConfigForTests();
}
