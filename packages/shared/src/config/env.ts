export type Env = Record<string, string | undefined>;

/** An out-of-range or non-integer value is skipped and the next key is tried. */
export type ReadIntEnvOptions = {
  min?: number;
  max?: number;
};

function asKeyList(keys: readonly string[] | string): readonly string[] {
  return typeof keys === 'string' ? [keys] : keys;
}

/** Values are trimmed; a blank value counts as unset. */
function firstPresent(
  env: Env,
  keys: readonly string[] | string,
): string | null {
  for (const key of asKeyList(keys)) {
    const value = env[key]?.trim();
    if (value) {
      return value;
    }
  }
  return null;
}

function isIntInRange(value: string, options: ReadIntEnvOptions): boolean {
  const parsed = Number(value);
  return (
    Number.isSafeInteger(parsed) &&
    (options.min === undefined || parsed >= options.min) &&
    (options.max === undefined || parsed <= options.max)
  );
}

export function readIntEnv(
  env: Env,
  keys: readonly string[] | string,
  fallback: number,
  options: ReadIntEnvOptions = {},
): number {
  for (const key of asKeyList(keys)) {
    const present = firstPresent(env, key);
    if (present && isIntInRange(present, options)) {
      return Number(present);
    }
  }

  return fallback;
}

export function readStringEnv(
  env: Env,
  keys: readonly string[] | string,
  fallback: string,
): string {
  return firstPresent(env, keys) ?? fallback;
}

export function readNullableStringEnv(
  env: Env,
  keys: readonly string[] | string,
  fallback: string | null = null,
): string | null {
  return firstPresent(env, keys) ?? fallback;
}
