export type { Env, ReadIntEnvOptions } from './env';
export { readIntEnv, readNullableStringEnv, readStringEnv } from './env';
export { ConfigBuilder, createConfigBuilder } from './configBuilder';
export { createConfigAccessors, type ConfigAccessors } from './configAccessors';
