import type { Env, ReadIntEnvOptions } from './env';
import { readIntEnv, readNullableStringEnv, readStringEnv } from './env';

/**
 * Immutable fluent builder; each step returns a builder whose type carries the new key.
 */
export class ConfigBuilder<TConfig extends Record<string, unknown>> {
  private readonly env: Env;
  private readonly config: TConfig;

  constructor(env: Env, config: TConfig) {
    this.env = env;
    this.config = config;
  }

  private with<TKey extends string, TValue>(
    key: TKey,
    value: TValue,
  ): ConfigBuilder<TConfig & Record<TKey, TValue>> {
    const entry: Record<TKey, TValue> = { [key]: value } as Record<TKey, TValue>;
    return new ConfigBuilder(this.env, { ...this.config, ...entry });
  }

  int<TKey extends string>(
    key: TKey,
    envKeys: readonly string[] | string,
    fallback: number,
    options?: ReadIntEnvOptions,
  ): ConfigBuilder<TConfig & Record<TKey, number>> {
    return this.with(key, readIntEnv(this.env, envKeys, fallback, options));
  }

  string<TKey extends string>(
    key: TKey,
    envKeys: readonly string[] | string,
    fallback: string,
  ): ConfigBuilder<TConfig & Record<TKey, string>> {
    return this.with(key, readStringEnv(this.env, envKeys, fallback));
  }

  nullableString<TKey extends string>(
    key: TKey,
    envKeys: readonly string[] | string,
    fallback?: string | null,
  ): ConfigBuilder<TConfig & Record<TKey, string | null>> {
    return this.with(key, readNullableStringEnv(this.env, envKeys, fallback));
  }

  build(): TConfig {
    return this.config;
  }
}

export function createConfigBuilder(env: Env = process.env): ConfigBuilder<Record<string, never>> {
  return new ConfigBuilder<Record<string, never>>(env, {});
}
