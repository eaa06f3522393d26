export type ConfigAccessors<TConfig> = {
  getConfig(): TConfig;
  resetConfigForTests(): void;
};

/**
 * Loads the config on first `getConfig` and caches it until `resetConfigForTests`.
 */
export function createConfigAccessors<TConfig>(
  loadConfig: () => TConfig,
): ConfigAccessors<TConfig> {
  let cached: { config: TConfig } | null = null;

  return {
    getConfig: () => {
      if (!cached) {
        cached = { config: loadConfig() };
      }
      return cached.config;
    },
    resetConfigForTests: () => {
      cached = null;
    },
  };
}
