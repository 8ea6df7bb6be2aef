import { loadEnvironment } from '@/config/environment';
import { resolveEngineSettings, type EngineSettings } from '@/config/engine';

/**
 * Aggregates the environment and engine tunables into a single bootstrap helper.
 */
export const loadConfig = (overrides: Partial<EngineSettings> = {}, cwd?: string) => {
  const env = loadEnvironment(cwd);
  return {
    env,
    engine: resolveEngineSettings(overrides),
  };
};

export type AppConfig = ReturnType<typeof loadConfig>;
